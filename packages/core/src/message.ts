import type { RequestMessage, ResponseBody, ResponseMessage } from "./types";

/** Frozen empty object used as default attributes to avoid object allocation */
const EMPTY_ATTRIBUTES: Readonly<Record<string, unknown>> = Object.freeze({});

/** Statuses whose Fetch `Response` may not carry a body */
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

function headersToRecord(headers: Headers): Record<string, string> {
	const record: Record<string, string> = {};
	headers.forEach((value, key) => {
		record[key] = value;
	});
	return record;
}

/**
 * Options for building a ServerRequest by hand.
 */
export interface ServerRequestInit {
	/** Default: "GET" */
	method?: string;
	/** Default: "/" */
	target?: string;
	headers?: HeadersInit;
	attributes?: Record<string, unknown>;
	/** Original Fetch request, when the message was built from one */
	raw?: Request;
}

/**
 * Default immutable request message.
 *
 * @example
 * ```typescript
 * const request = new ServerRequest({ method: "PUT", target: "/cats/42" });
 * const tagged = request.withAttribute("id", "42");
 * request.getAttribute("id"); // undefined
 * tagged.getAttribute("id"); // "42"
 * ```
 */
export class ServerRequest implements RequestMessage {
	private readonly method: string;
	private readonly target: string;
	private readonly headers: Headers;
	private readonly attributes: Readonly<Record<string, unknown>>;
	private readonly raw?: Request;

	constructor(init: ServerRequestInit = {}) {
		this.method = init.method ?? "GET";
		this.target = init.target ?? "/";
		this.headers = new Headers(init.headers);
		this.attributes = init.attributes ? Object.freeze({ ...init.attributes }) : EMPTY_ATTRIBUTES;
		this.raw = init.raw;
	}

	/**
	 * Builds a request message from a Fetch API Request.
	 * The target keeps the origin-form path and query; scheme and host are dropped.
	 */
	static fromRequest(request: Request): ServerRequest {
		const url = new URL(request.url);
		return new ServerRequest({
			method: request.method,
			target: url.pathname + url.search,
			headers: request.headers,
			raw: request,
		});
	}

	getMethod(): string {
		return this.method;
	}

	getRequestTarget(): string {
		return this.target;
	}

	getHeader(name: string): string | null {
		return this.headers.get(name);
	}

	getHeaders(): Record<string, string> {
		return headersToRecord(this.headers);
	}

	getAttribute(name: string): unknown {
		return this.attributes[name];
	}

	getAttributes(): Readonly<Record<string, unknown>> {
		return this.attributes;
	}

	/** The Fetch request this message was built from, if any */
	getRaw(): Request | undefined {
		return this.raw;
	}

	withAttribute(name: string, value: unknown): ServerRequest {
		return new ServerRequest({
			method: this.method,
			target: this.target,
			headers: this.headers,
			attributes: { ...this.attributes, [name]: value },
			raw: this.raw,
		});
	}

	withoutAttribute(name: string): ServerRequest {
		const { [name]: _removed, ...attributes } = this.attributes;
		return new ServerRequest({
			method: this.method,
			target: this.target,
			headers: this.headers,
			attributes,
			raw: this.raw,
		});
	}
}

/**
 * Options for building an HttpResponse.
 */
export interface HttpResponseInit {
	/** Default: 200 */
	status?: number;
	headers?: HeadersInit;
	/** Default: null (empty body) */
	body?: ResponseBody;
}

/**
 * Default immutable response message.
 *
 * @example
 * ```typescript
 * const response = new HttpResponse()
 *   .withStatus(201)
 *   .withHeader("Content-Type", "application/json")
 *   .withBody(JSON.stringify({ id: 42 }));
 * ```
 */
export class HttpResponse implements ResponseMessage {
	private readonly status: number;
	private readonly headers: Headers;
	private readonly body: ResponseBody;

	constructor(init: HttpResponseInit = {}) {
		this.status = init.status ?? 200;
		this.headers = new Headers(init.headers);
		this.body = init.body ?? null;
	}

	getStatusCode(): number {
		return this.status;
	}

	withStatus(code: number): HttpResponse {
		return new HttpResponse({ status: code, headers: this.headers, body: this.body });
	}

	getBody(): ResponseBody {
		return this.body;
	}

	withBody(body: ResponseBody): HttpResponse {
		return new HttpResponse({ status: this.status, headers: this.headers, body });
	}

	getHeader(name: string): string | null {
		return this.headers.get(name);
	}

	hasHeader(name: string): boolean {
		return this.headers.has(name);
	}

	withHeader(name: string, value: string): HttpResponse {
		const headers = new Headers(this.headers);
		headers.set(name, value);
		return new HttpResponse({ status: this.status, headers, body: this.body });
	}

	withoutHeader(name: string): HttpResponse {
		const headers = new Headers(this.headers);
		headers.delete(name);
		return new HttpResponse({ status: this.status, headers, body: this.body });
	}

	getHeaders(): Record<string, string> {
		return headersToRecord(this.headers);
	}
}

/**
 * Converts any response message into a Fetch API Response.
 * Statuses that forbid a body (204, 205, 304) are sent without one. A Fetch Response can only carry
 * statuses 200-599, so any other status (informational codes included) is sent as an empty 500.
 */
export function toWebResponse(response: ResponseMessage): Response {
	const status = response.getStatusCode();
	if (!Number.isInteger(status) || status < 200 || status > 599) {
		return new Response(null, { status: 500 });
	}

	const body = NULL_BODY_STATUSES.has(status) ? null : response.getBody();
	return new Response(body, {
		status,
		headers: response.getHeaders(),
	});
}

/**
 * Extracts the path component from a request target.
 * Query strings and fragments are dropped, and absolute-form targets are reduced to their path.
 *
 * @example
 * ```typescript
 * extractPath("/cats/42?sort=asc"); // "/cats/42"
 * extractPath("http://example.com/cats#top"); // "/cats"
 * extractPath("http://example.com"); // "/"
 * ```
 */
export function extractPath(target: string): string {
	// Fast path: plain path without query or fragment (most common case)
	if (target[0] === "/" && !target.includes("?") && !target.includes("#")) {
		return target;
	}

	let end = target.length;
	const queryStart = target.indexOf("?");
	const hashStart = target.indexOf("#");
	if (queryStart !== -1) end = Math.min(end, queryStart);
	if (hashStart !== -1) end = Math.min(end, hashStart);

	const protocolEnd = target.indexOf("://");
	if (protocolEnd !== -1 && protocolEnd < end) {
		const pathStart = target.indexOf("/", protocolEnd + 3);
		return pathStart !== -1 && pathStart < end ? target.slice(pathStart, end) : "/";
	}

	return target.slice(0, end) || "/";
}
