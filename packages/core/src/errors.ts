/**
 * Raised at registration time for malformed route targets and verb lists.
 */
export class InvalidArgumentError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "InvalidArgumentError";
	}
}

/**
 * Shape of any error the router converts into a response: an integer status code plus a message.
 */
export interface HttpError extends Error {
	statusCode: number;
}

/**
 * Base class for errors that map onto an HTTP status.
 * Thrown from a handler or middleware, it is caught by `Router.dispatch` and turned into a response
 * carrying `statusCode` as its status and `message` as its body.
 *
 * @example
 * ```typescript
 * router.add("/cats/{id}", (request, response) => {
 *   const cat = cats.get(String(request.getAttribute("id")));
 *   if (!cat) throw new NotFoundException(`No cat with id ${request.getAttribute("id")}`);
 *   return response.withBody(JSON.stringify(cat));
 * });
 * ```
 */
export class HttpException extends Error implements HttpError {
	readonly statusCode: number;

	constructor(message = "500 Internal Server Error", statusCode = 500) {
		super(message);
		this.name = new.target.name;
		this.statusCode = statusCode;
	}
}

export class BadRequestException extends HttpException {
	constructor(message = "400 Bad Request") {
		super(message, 400);
	}
}

export class UnauthorizedException extends HttpException {
	constructor(message = "401 Unauthorized") {
		super(message, 401);
	}
}

export class ForbiddenException extends HttpException {
	constructor(message = "403 Forbidden") {
		super(message, 403);
	}
}

export class NotFoundException extends HttpException {
	constructor(message = "404 Not Found") {
		super(message, 404);
	}
}

export class MethodNotAllowedException extends HttpException {
	constructor(message = "405 Method Not Allowed") {
		super(message, 405);
	}
}

export class NotAcceptableException extends HttpException {
	constructor(message = "406 Not Acceptable") {
		super(message, 406);
	}
}

export class ConflictException extends HttpException {
	constructor(message = "409 Conflict") {
		super(message, 409);
	}
}

export class GoneException extends HttpException {
	constructor(message = "410 Gone") {
		super(message, 410);
	}
}

export class LengthRequiredException extends HttpException {
	constructor(message = "411 Length Required") {
		super(message, 411);
	}
}

export class PreconditionFailedException extends HttpException {
	constructor(message = "412 Precondition Failed") {
		super(message, 412);
	}
}

export class RequestEntityTooLargeException extends HttpException {
	constructor(message = "413 Request Entity Too Large") {
		super(message, 413);
	}
}

export class UnsupportedMediaTypeException extends HttpException {
	constructor(message = "415 Unsupported Media Type") {
		super(message, 415);
	}
}

export class InternalServerErrorException extends HttpException {
	constructor(message = "500 Internal Server Error") {
		super(message, 500);
	}
}

export class NotImplementedException extends HttpException {
	constructor(message = "501 Not Implemented") {
		super(message, 501);
	}
}

export class ServiceUnavailableException extends HttpException {
	constructor(message = "503 Service Unavailable") {
		super(message, 503);
	}
}

/**
 * Checks whether a thrown value should be converted into an error response.
 * Accepts any Error, HttpException included, whose `statusCode` is an integer error status (400-599).
 * Anything else is not an HTTP error and keeps propagating.
 *
 * @example
 * ```typescript
 * isHttpError(new NotFoundException()); // true
 * isHttpError(Object.assign(new Error("teapot"), { statusCode: 418 })); // true
 * isHttpError(new HttpException("odd", 999)); // false
 * isHttpError(new Error("boom")); // false
 * ```
 */
export function isHttpError(value: unknown): value is HttpError {
	if (!(value instanceof Error) || !("statusCode" in value)) return false;
	const { statusCode } = value;
	return typeof statusCode === "number" && Number.isInteger(statusCode) && statusCode >= 400 && statusCode <= 599;
}
