import type { Dispatcher } from "./dispatcher";
import type { MethodMap } from "./method-map";
import type { Route } from "./route";
import type { RouteFactory } from "./route-factory";

/**
 * Body carried by a response message. `null` stands for an empty body.
 */
export type ResponseBody = string | null;

/**
 * Named values extracted from a matched template or pattern route.
 *
 * @example
 * ```typescript
 * // Route "/cats/{id}" matched against "/cats/42"
 * const vars: PathVariables = { id: "42" };
 * ```
 */
export type PathVariables = Record<string, string>;

/**
 * Request contract consumed by the router.
 * Requests are immutable: `withAttribute` returns a new value, and stages further down the chain see that value.
 */
export interface RequestMessage {
	/** HTTP method, as sent by the client */
	getMethod(): string;
	/** Raw request target, e.g. "/cats/42?sort=asc" */
	getRequestTarget(): string;
	/** Header value, or null when the header is absent */
	getHeader(name: string): string | null;
	/** All headers, keyed by lower-case name */
	getHeaders(): Record<string, string>;
	/** Attribute set by an earlier stage (path variables, request id, ...) */
	getAttribute(name: string): unknown;
	getAttributes(): Readonly<Record<string, unknown>>;
	/** Returns a copy of the request carrying the additional attribute */
	withAttribute(name: string, value: unknown): RequestMessage;
}

/**
 * Response contract produced by the router. Every `with*` method returns a new value.
 */
export interface ResponseMessage {
	getStatusCode(): number;
	withStatus(code: number): ResponseMessage;
	getBody(): ResponseBody;
	withBody(body: ResponseBody): ResponseMessage;
	getHeader(name: string): string | null;
	hasHeader(name: string): boolean;
	withHeader(name: string, value: string): ResponseMessage;
	withoutHeader(name: string): ResponseMessage;
	/** All headers, keyed by lower-case name */
	getHeaders(): Record<string, string>;
}

/**
 * Continuation representing the rest of the chain.
 *
 * @example
 * ```typescript
 * const timing: Middleware = (request, response, next) => {
 *   const started = Date.now();
 *   const result = next(request, response);
 *   return result.withHeader("X-Elapsed", `${Date.now() - started}ms`);
 * };
 * ```
 */
export type Next = (request: RequestMessage, response: ResponseMessage) => ResponseMessage;

/**
 * Middleware function type. Receives the current request/response pair and a continuation.
 * Calling `next` passes control down the chain; returning without calling it short-circuits the chain.
 *
 * @example
 * ```typescript
 * const requireToken: Middleware = (request, response, next) => {
 *   if (!request.getHeader("authorization")) {
 *     return response.withStatus(401);
 *   }
 *   return next(request, response);
 * };
 * ```
 */
export type Middleware = (request: RequestMessage, response: ResponseMessage, next: Next) => ResponseMessage;

/**
 * Object form of a middleware. Routers implement it, so a router can be mounted inside another router.
 */
export interface MiddlewareObject {
	dispatch(request: RequestMessage, response: ResponseMessage, next: Next): ResponseMessage;
}

/**
 * Anything a caller may register as a handler, hook or middleware:
 * - a middleware function
 * - an object with a `dispatch` method
 * - a prebuilt response, returned as-is
 * - an array of the above, run in order as one chain
 */
export type DispatchableInput = Middleware | MiddlewareObject | ResponseMessage | readonly DispatchableInput[];

/**
 * Method to handler mapping accepted by `Router.add`.
 * Keys are verbs or comma-separated verb lists; "*" matches any verb not listed.
 *
 * @example
 * ```typescript
 * router.add("/cats/", {
 *   GET: listCats,
 *   "PUT,PATCH": updateCats,
 * });
 * ```
 */
export type MethodHandlers = Record<string, DispatchableInput>;

/**
 * Normalized dispatch target. Input is resolved into one of these once, at registration time.
 */
export type Dispatchable =
	| { kind: "handler"; handler: Middleware }
	| { kind: "chain"; items: readonly Dispatchable[] }
	| { kind: "response"; response: ResponseMessage }
	| { kind: "method-map"; map: MethodMap };

/**
 * Route classification, decided from the target's syntax:
 * - "static": exact path, e.g. "/cats/"
 * - "prefix": trailing wildcard, e.g. "/cats/*"
 * - "template": URI template, e.g. "/cats/{id}"
 * - "pattern": delimited regular expression, e.g. "~/cats/([0-9]+)~"
 */
export type RouteKind = "static" | "prefix" | "template" | "pattern";

/**
 * Options used when compiling a template route.
 */
export interface TemplateOptions {
	/** Pattern used for variables without their own entry. Default: TemplatePatterns.SLUG */
	defaultPattern?: string;
	/** Per-variable patterns, keyed by variable name */
	variablePatterns?: Record<string, string>;
}

/**
 * Configuration for a Router instance.
 */
export interface RouterOptions {
	/**
	 * When no route matches, call the outer `next` instead of answering 404.
	 * Default: false
	 */
	continueOnNotFound?: boolean;

	/**
	 * Attach all path variables under this single attribute instead of one attribute per variable.
	 * Default: undefined (one attribute per variable)
	 */
	pathVariablesAttribute?: string;

	/**
	 * Hooks run just before the response leaves the router.
	 * Default: [contentLengthPrep, headPrep]
	 */
	responsePreparationHooks?: DispatchableInput[];

	/** Factory used to classify targets and build routes */
	routeFactory?: RouteFactory;

	/** Dispatcher used to run hooks, middleware and routes */
	dispatcher?: Dispatcher;
}

/**
 * Result of matching a path against the route table.
 */
export interface RouteMatch {
	route: Route;
	pathVariables: PathVariables;
}
