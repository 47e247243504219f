import type { Dispatchable, DispatchableInput, Middleware, MiddlewareObject, Next, RequestMessage, ResponseMessage } from "./types";

/**
 * Continuation that ends a chain by handing back the response unchanged.
 */
export const passThrough: Next = (_request, response) => response;

/**
 * Checks whether a value satisfies the response message contract.
 */
export function isResponseMessage(value: unknown): value is ResponseMessage {
	return (
		typeof value === "object" &&
		value !== null &&
		"getStatusCode" in value &&
		typeof value.getStatusCode === "function" &&
		"withStatus" in value &&
		typeof value.withStatus === "function"
	);
}

/**
 * Checks whether a value is an object with a `dispatch(request, response, next)` method.
 */
export function isMiddlewareObject(value: unknown): value is MiddlewareObject {
	return typeof value === "object" && value !== null && "dispatch" in value && typeof value.dispatch === "function";
}

function isDispatchableList(value: DispatchableInput): value is readonly DispatchableInput[] {
	return Array.isArray(value);
}

/**
 * Resolves caller input into the tagged form the dispatcher runs.
 * Called once per registration; the result is reused for every request.
 *
 * @example
 * ```typescript
 * toDispatchable((request, response, next) => next(request, response)); // { kind: "handler", ... }
 * toDispatchable([auth, handler]); // { kind: "chain", items: [...] }
 * toDispatchable(new HttpResponse({ status: 204 })); // { kind: "response", ... }
 * ```
 */
export function toDispatchable(input: DispatchableInput): Dispatchable {
	if (typeof input === "function") {
		return { kind: "handler", handler: input };
	}
	if (isDispatchableList(input)) {
		return { kind: "chain", items: input.map(toDispatchable) };
	}
	if (isResponseMessage(input)) {
		return { kind: "response", response: input };
	}
	return { kind: "handler", handler: (request, response, next) => input.dispatch(request, response, next) };
}

/**
 * Runs dispatchables against a request/response pair.
 *
 * Execution is sequential and synchronous. Each item receives a continuation for the rest of the chain;
 * the last item's continuation is the `next` given to `dispatch`. An item that returns without
 * calling its continuation stops the chain there.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher();
 * const chain = toDispatchable([
 *   (request, response, next) => next(request, response.withHeader("X-Trace", "1")),
 *   (request, response) => response.withBody("Hello"),
 * ]);
 * const result = dispatcher.dispatch(chain, new ServerRequest(), new HttpResponse(), passThrough);
 * result.getBody(); // "Hello"
 * ```
 */
export class Dispatcher {
	dispatch(dispatchable: Dispatchable, request: RequestMessage, response: ResponseMessage, next: Next): ResponseMessage {
		switch (dispatchable.kind) {
			case "handler":
				return dispatchable.handler(request, response, next);
			case "response":
				return dispatchable.response;
			case "chain":
				return this.dispatchChain(dispatchable.items, request, response, next);
			case "method-map": {
				const method = request.getMethod().toUpperCase();
				const selected = dispatchable.map.select(method);
				if (selected) {
					return this.dispatch(selected, request, response, next);
				}
				const allow = dispatchable.map.getAllowedMethods().join(", ");
				return response.withStatus(method === "OPTIONS" ? 200 : 405).withHeader("Allow", allow);
			}
		}
	}

	/**
	 * Dispatches a chain. Continuations are built on demand, so unreached items cost nothing.
	 * @private
	 */
	private dispatchChain(items: readonly Dispatchable[], request: RequestMessage, response: ResponseMessage, next: Next): ResponseMessage {
		const step =
			(index: number): Next =>
			(currentRequest, currentResponse) => {
				const item = items[index];
				if (item === undefined) {
					return next(currentRequest, currentResponse);
				}
				return this.dispatch(item, currentRequest, currentResponse, step(index + 1));
			};

		return step(0)(request, response);
	}
}

/**
 * Wraps a factory whose middleware is built on first use and cached afterwards.
 * Useful for handlers that are expensive to construct and may never be requested.
 *
 * @example
 * ```typescript
 * router.add("/reports/", lazy(() => new ReportHandler(loadTemplates())));
 * ```
 */
export function lazy(factory: () => DispatchableInput, dispatcher: Dispatcher = new Dispatcher()): Middleware {
	let resolved: Dispatchable | undefined;

	return (request, response, next) => {
		if (!resolved) {
			resolved = toDispatchable(factory());
		}
		return dispatcher.dispatch(resolved, request, response, next);
	};
}
