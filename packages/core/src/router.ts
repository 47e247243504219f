import { Dispatcher, isMiddlewareObject, isResponseMessage, passThrough, toDispatchable } from "./dispatcher";
import { isHttpError } from "./errors";
import { extractPath, HttpResponse, ServerRequest, toWebResponse } from "./message";
import { toMethodMap } from "./method-map";
import { defaultResponsePreparationHooks } from "./response-prep";
import { RouteFactory } from "./route-factory";
import { RouteTable } from "./route-table";
import type {
	Dispatchable,
	DispatchableInput,
	MethodHandlers,
	MiddlewareObject,
	Next,
	PathVariables,
	RequestMessage,
	ResponseMessage,
	RouteKind,
	RouteMatch,
	RouterOptions,
	TemplateOptions,
} from "./types";

/**
 * Tells a verb-to-handler mapping apart from every other kind of dispatchable input.
 */
function isMethodHandlers(value: DispatchableInput | MethodHandlers): value is MethodHandlers {
	return typeof value === "object" && value !== null && !Array.isArray(value) && !isResponseMessage(value) && !isMiddlewareObject(value);
}

/**
 * Request router with a fixed hook pipeline.
 *
 * Features:
 * - Exact, prefix (longest wins), URI template and regular expression routes
 * - Per-route method maps with automatic 405, OPTIONS and HEAD handling
 * - Router-level middleware wrapped around every matched route
 * - Pre-route, post-route and response-preparation hooks
 * - Status handlers bound to response status codes
 * - Typed HTTP exceptions converted to error responses
 * - Nesting: a router is itself a dispatchable
 *
 * Each request runs through: pre-route hooks → route table → status handler → post-route hooks → response preparation.
 *
 * @example
 * ```typescript
 * const router = new Router();
 *
 * router.add("/cats/", {
 *   GET: (request, response) => response.withBody(JSON.stringify(listCats())),
 *   POST: createCat,
 * });
 *
 * router.add("/cats/{id}", (request, response) => {
 *   const cat = findCat(String(request.getAttribute("id")));
 *   if (!cat) throw new NotFoundException();
 *   return response.withBody(JSON.stringify(cat));
 * });
 *
 * router.setStatusHandler(404, (request, response) => response.withBody("Nothing here"));
 *
 * const response = router.dispatch(new ServerRequest({ target: "/cats/42" }), new HttpResponse());
 * ```
 */
export class Router implements MiddlewareObject {
	/** Collection of routes */
	private readonly routeTable = new RouteTable();
	/** Middleware run around every matched route */
	private readonly middlewares: Dispatchable[] = [];
	/** Middleware run before the route table is consulted */
	private readonly preRouteHooks: Dispatchable[] = [];
	/** Middleware run after routing and status handling */
	private readonly postRouteHooks: Dispatchable[] = [];
	/** Middleware run immediately before the response leaves the router */
	private readonly responsePreparationHooks: Dispatchable[];
	/** Status code → middleware */
	private readonly statusHandlers = new Map<number, Dispatchable>();

	private readonly routeFactory: RouteFactory;
	private readonly dispatcher: Dispatcher;
	private readonly continueOnNotFound: boolean;
	private readonly pathVariablesAttribute?: string;

	/**
	 * Creates a new Router
	 *
	 * @example
	 * ```typescript
	 * // Defaults: 404 on no match, one attribute per path variable
	 * const router = new Router();
	 *
	 * // Fall through to the next middleware and collect variables under "pathVariables"
	 * const api = new Router({ continueOnNotFound: true, pathVariablesAttribute: "pathVariables" });
	 * ```
	 */
	constructor(options: RouterOptions = {}) {
		const {
			continueOnNotFound = false,
			pathVariablesAttribute,
			responsePreparationHooks = defaultResponsePreparationHooks(),
			routeFactory = new RouteFactory(),
			dispatcher = new Dispatcher(),
		} = options;

		this.continueOnNotFound = continueOnNotFound;
		this.pathVariablesAttribute = pathVariablesAttribute;
		this.responsePreparationHooks = responsePreparationHooks.map(toDispatchable);
		this.routeFactory = routeFactory;
		this.dispatcher = dispatcher;
	}

	/**
	 * Registers a route. The factory picks the route kind from the target:
	 * - "/cats/" exact path
	 * - "/cats/*" prefix
	 * - "/cats/{id}" URI template
	 * - "~/cats/([0-9]+)~" regular expression
	 *
	 * A plain object keyed by verbs registers a method map. Adding the same target again adds methods
	 * to the existing route instead of creating a second one.
	 *
	 * @param target - Path, prefix, template or pattern to match
	 * @param dispatchable - Handler, middleware chain, response value, router or verb-to-handler mapping
	 * @param extra - Variable patterns for template routes
	 * @returns The Router instance for method chaining
	 * @throws {InvalidArgumentError} If the target or a verb list is malformed
	 *
	 * @example
	 * ```typescript
	 * router.add("/cats/", { GET: listCats });
	 * router.add("/cats/", { POST: createCat }); // same route, now answers GET and POST
	 *
	 * router.add("/cats/{id}", showCat, { variablePatterns: { id: TemplatePatterns.NUM } });
	 * router.add("/admin/*", [requireAdmin, adminRouter]);
	 * ```
	 */
	add(target: string, dispatchable: DispatchableInput | MethodHandlers, extra?: TemplateOptions): this {
		const resolved = isMethodHandlers(dispatchable) ? toMethodMap(dispatchable) : toDispatchable(dispatchable);
		this.routeFactory.register(this.routeTable, target, resolved, extra);
		return this;
	}

	/**
	 * Registers router-level middleware. It runs, in registration order, around every matched route.
	 * Unmatched requests never reach it.
	 *
	 * @example
	 * ```typescript
	 * router.use((request, response, next) => {
	 *   const result = next(request, response);
	 *   return result.withHeader("X-Powered-By", "switchyard");
	 * });
	 * ```
	 */
	use(middleware: DispatchableInput): this {
		this.middlewares.push(toDispatchable(middleware));
		return this;
	}

	/**
	 * Registers middleware to run before routing. Calling `next` with a new request replaces
	 * the request for routing and every later stage.
	 */
	addPreRouteHook(middleware: DispatchableInput): this {
		this.preRouteHooks.push(toDispatchable(middleware));
		return this;
	}

	/**
	 * Registers middleware to run after routing and status handling, whatever the routing outcome.
	 */
	addPostRouteHook(middleware: DispatchableInput): this {
		this.postRouteHooks.push(toDispatchable(middleware));
		return this;
	}

	/**
	 * Registers middleware to run last, after the default Content-Length and HEAD preparation.
	 */
	addResponsePreparationHook(middleware: DispatchableInput): this {
		this.responsePreparationHooks.push(toDispatchable(middleware));
		return this;
	}

	/**
	 * Binds middleware to a status code. It runs after routing whenever the response carries that status.
	 *
	 * @example
	 * ```typescript
	 * router.setStatusHandler(404, (request, response) =>
	 *   response.withHeader("Content-Type", "text/plain").withBody("Page not found")
	 * );
	 * ```
	 */
	setStatusHandler(statusCode: number, middleware: DispatchableInput): this {
		this.statusHandlers.set(statusCode, toDispatchable(middleware));
		return this;
	}

	/**
	 * Finds the route for a path without dispatching it.
	 *
	 * @example
	 * ```typescript
	 * router.match("/cats/42")?.pathVariables; // { id: "42" }
	 * ```
	 */
	match(path: string): RouteMatch | null {
		return this.routeTable.match(path);
	}

	/**
	 * Gets all registered routes in registration order.
	 */
	getRoutes(): Array<{ target: string; kind: RouteKind }> {
		return this.routeTable.getRoutes().map((route) => ({
			target: route.target,
			kind: route.kind,
		}));
	}

	/**
	 * Runs the full pipeline for one request.
	 *
	 * @param next - Continuation for the stage after this router. A matched route receives it as its continuation,
	 *   and with `continueOnNotFound` an unmatched request is handed to it.
	 * @returns The final response
	 */
	dispatch(request: RequestMessage, response: ResponseMessage, next: Next = passThrough): ResponseMessage {
		let current = request;
		const keepRequest: Next = (nextRequest, nextResponse) => {
			current = nextRequest;
			return nextResponse;
		};

		for (const hook of this.preRouteHooks) {
			response = this.dispatcher.dispatch(hook, current, response, keepRequest);
		}

		try {
			response = this.dispatchRouteTable(current, response, next);
		} catch (error) {
			if (!isHttpError(error)) throw error;
			response = response.withStatus(error.statusCode).withBody(error.message);
		}

		const statusHandler = this.statusHandlers.get(response.getStatusCode());
		if (statusHandler) {
			response = this.dispatcher.dispatch(statusHandler, current, response, passThrough);
		}

		for (const hook of this.postRouteHooks) {
			response = this.dispatcher.dispatch(hook, current, response, passThrough);
		}

		for (const hook of this.responsePreparationHooks) {
			response = this.dispatcher.dispatch(hook, current, response, passThrough);
		}

		return response;
	}

	/**
	 * Request handler for Fetch-style servers. Converts the Fetch request, runs `dispatch`
	 * with an empty 200 response and converts the result back.
	 *
	 * @example
	 * ```typescript
	 * // Any server that speaks Fetch Request/Response
	 * export default {
	 *   fetch: (request: Request) => router.handle(request),
	 * };
	 * ```
	 */
	handle(request: Request): Response {
		return toWebResponse(this.dispatch(ServerRequest.fromRequest(request), new HttpResponse()));
	}

	/**
	 * Matches the request path and dispatches the route, wrapped in router-level middleware when any is registered.
	 * @private
	 */
	private dispatchRouteTable(request: RequestMessage, response: ResponseMessage, next: Next): ResponseMessage {
		const matched = this.routeTable.match(extractPath(request.getRequestTarget()));
		if (!matched) {
			if (this.continueOnNotFound) {
				return next(request, response);
			}
			return response.withStatus(404);
		}

		const routed = this.bindPathVariables(request, matched.pathVariables);
		const target = matched.route.getDispatchable();

		// Fast path: no router-level middleware
		if (this.middlewares.length === 0) {
			return this.dispatcher.dispatch(target, routed, response, next);
		}

		return this.dispatcher.dispatch({ kind: "chain", items: [...this.middlewares, target] }, routed, response, next);
	}

	/**
	 * Attaches path variables to the request, either one attribute each or grouped under `pathVariablesAttribute`.
	 * @private
	 */
	private bindPathVariables(request: RequestMessage, pathVariables: PathVariables): RequestMessage {
		if (this.pathVariablesAttribute !== undefined) {
			return request.withAttribute(this.pathVariablesAttribute, pathVariables);
		}

		let result = request;
		for (const [name, value] of Object.entries(pathVariables)) {
			result = result.withAttribute(name, value);
		}
		return result;
	}
}
