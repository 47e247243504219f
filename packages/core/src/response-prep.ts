import type { Middleware, ResponseBody } from "./types";

const encoder = new TextEncoder();

function byteLength(body: ResponseBody): number {
	return body === null ? 0 : encoder.encode(body).byteLength;
}

/**
 * Sets Content-Length to the final body size. A header that no longer matches the body
 * (for example one set by a nested router before a status handler rewrote the body) is replaced.
 * Chunked responses are left alone, and so are HEAD responses that already carry a length,
 * since their body has been dropped on purpose.
 */
export const contentLengthPrep: Middleware = (request, response, next) => {
	if (response.getHeader("Transfer-Encoding")?.toLowerCase() === "chunked") {
		return next(request, response);
	}
	if (request.getMethod().toUpperCase() === "HEAD" && response.hasHeader("Content-Length")) {
		return next(request, response);
	}

	const length = String(byteLength(response.getBody()));
	if (response.getHeader("Content-Length") === length) {
		return next(request, response);
	}
	return next(request, response.withHeader("Content-Length", length));
};

/**
 * Drops the body of a HEAD response. Headers computed for the equivalent GET are kept,
 * so it must run after `contentLengthPrep`.
 */
export const headPrep: Middleware = (request, response, next) => {
	if (request.getMethod().toUpperCase() !== "HEAD") {
		return next(request, response);
	}
	return next(request, response.withBody(null));
};

/**
 * Response-preparation hooks every router starts with, in the order they run.
 */
export function defaultResponsePreparationHooks(): Middleware[] {
	return [contentLengthPrep, headPrep];
}
