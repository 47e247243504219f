import { extractPath, isHttpError } from "@switchyard/core";
import type { Middleware, RequestMessage, ResponseMessage } from "@switchyard/core";
import { ConsoleTransport, Levels, Logger, NDJsonTransport } from "@rabbit-company/logger";

/**
 * Anything that can receive log entries. A `Logger` from @rabbit-company/logger satisfies it.
 */
export interface LogSink {
	log(level: number, message: string, metadata?: Record<string, unknown>): void;
}

/**
 * Options for configuring the logger middleware.
 */
export interface LoggerOptions {
	/**
	 * Logger instance to use. If not provided, a console logger will be created.
	 */
	logger?: LogSink;

	/**
	 * Log level for HTTP requests.
	 * Default: Levels.HTTP
	 */
	level?: number;

	/**
	 * Preset configuration for common use cases.
	 * Individual options override the preset.
	 * - "minimal": Just method, target, status, and duration
	 * - "standard": Adds request ID
	 * - "detailed": Includes headers and user agent
	 */
	preset?: "minimal" | "standard" | "detailed";

	/**
	 * Whether to log incoming requests.
	 * Default: true
	 */
	logRequests?: boolean;

	/**
	 * Whether to log responses.
	 * Default: true
	 */
	logResponses?: boolean;

	/**
	 * Whether to include the duration in response metadata.
	 * Default: true
	 */
	logDuration?: boolean;

	/**
	 * Whether to include request ID in logs and attach it to the request.
	 * Default: true
	 */
	includeRequestId?: boolean;

	/**
	 * Whether to include request headers.
	 * Default: false
	 */
	includeHeaders?: boolean;

	/**
	 * Whether to include user agent.
	 * Default: false
	 */
	includeUserAgent?: boolean;

	/**
	 * Whether to log the response body (be careful with large responses).
	 * Default: false
	 */
	logResponseBody?: boolean;

	/**
	 * Maximum length of logged bodies (in characters).
	 * Default: 1000
	 */
	maxBodyLength?: number;

	/**
	 * Headers to exclude from logging (case-insensitive).
	 * Default: ["authorization", "cookie", "set-cookie"]
	 */
	excludeHeaders?: string[];

	/**
	 * Paths to exclude from logging (exact match or regex).
	 * Default: ["/health", "/ping"]
	 */
	excludePaths?: (string | RegExp)[];

	/**
	 * HTTP status codes whose responses are not logged.
	 * Default: []
	 */
	excludeStatusCodes?: number[];

	/**
	 * Function to generate request ID. By default the x-request-id or x-correlation-id header is reused,
	 * otherwise a random UUID is generated.
	 */
	generateRequestId?: (request: RequestMessage) => string;

	/**
	 * Request attribute the request ID is stored under.
	 * Default: "requestId"
	 */
	requestIdAttribute?: string;

	/**
	 * Function to extract user identifier for logging.
	 */
	getUserId?: (request: RequestMessage) => string | undefined;

	/**
	 * Function to determine if a request should be skipped.
	 */
	skip?: (request: RequestMessage) => boolean;

	/**
	 * Custom message formatter for request logs.
	 */
	formatRequestMessage?: (request: RequestMessage, requestId: string) => string;

	/**
	 * Custom message formatter for response logs.
	 */
	formatResponseMessage?: (request: RequestMessage, requestId: string, duration: number, statusCode: number) => string;

	/**
	 * Additional metadata to include in all logs.
	 */
	metadata?: Record<string, unknown> | ((request: RequestMessage) => Record<string, unknown>);
}

/**
 * HTTP request/response logging middleware using @rabbit-company/logger.
 *
 * Logs once when the request enters and once when the response comes back. Mount it around
 * the stage to observe: as router-level middleware it sees matched routes only, in a chain in front of
 * a router it sees every request.
 *
 * @example
 * ```typescript
 * // Minimal logging
 * router.use(logger({ preset: "minimal" }));
 * // Output: GET - /cats/42 - 200 - 3ms
 *
 * // Log everything the router answers, 404s included
 * const app = toDispatchable([logger({ preset: "standard" }), router]);
 *
 * // Custom logger with specific transports
 * const customLogger = new Logger({
 *   level: Levels.INFO,
 *   transports: [new ConsoleTransport(), new NDJsonTransport()],
 * });
 *
 * router.use(logger({
 *   logger: customLogger,
 *   excludePaths: ["/health", /^\/static/],
 *   excludeStatusCodes: [404],
 *   metadata: { service: "api" },
 * }));
 * ```
 */
export function logger(options: LoggerOptions = {}): Middleware {
	const presetConfig = getPresetConfiguration(options.preset);
	const mergedOptions: LoggerOptions = { ...presetConfig, ...options };

	const {
		logger: providedLogger,
		level = Levels.HTTP,
		logRequests = true,
		logResponses = true,
		logDuration = true,
		includeRequestId = true,
		includeHeaders = false,
		includeUserAgent = false,
		logResponseBody = false,
		maxBodyLength = 1000,
		excludeHeaders = ["authorization", "cookie", "set-cookie"],
		excludePaths = ["/health", "/ping"],
		excludeStatusCodes = [],
		generateRequestId = defaultRequestIdGenerator,
		requestIdAttribute = "requestId",
		getUserId,
		skip,
		formatRequestMessage = defaultRequestFormatter,
		formatResponseMessage = defaultResponseFormatter,
		metadata,
	} = mergedOptions;

	const sink: LogSink =
		providedLogger ??
		new Logger({
			level,
			transports: [new ConsoleTransport()],
		});

	const normalizedExcludeHeaders = excludeHeaders.map((h) => h.toLowerCase());

	return (request, response, next) => {
		if (skip && skip(request)) {
			return next(request, response);
		}

		const pathname = extractPath(request.getRequestTarget());
		const shouldExcludePath = excludePaths.some((path) => (typeof path === "string" ? pathname === path : path.test(pathname)));
		if (shouldExcludePath) {
			return next(request, response);
		}

		const requestId = includeRequestId ? generateRequestId(request) : undefined;
		const tracked = requestId !== undefined ? request.withAttribute(requestIdAttribute, requestId) : request;

		const startTime = Date.now();
		const baseMetadata = getMetadata(metadata, tracked);
		const userId = getUserId ? getUserId(tracked) : undefined;
		const identity: Record<string, unknown> = {
			...baseMetadata,
			...(requestId !== undefined ? { requestId } : {}),
			...(userId ? { userId } : {}),
		};

		if (logRequests) {
			const requestMetadata = buildRequestMetadata(tracked, identity, {
				includeHeaders,
				includeUserAgent,
				normalizedExcludeHeaders,
			});
			sink.log(level, formatRequestMessage(tracked, requestId ?? ""), requestMetadata);
		}

		let result: ResponseMessage;
		try {
			result = next(tracked, response);
		} catch (error) {
			const duration = Date.now() - startTime;
			const statusCode = isHttpError(error) ? error.statusCode : 500;

			if (logResponses) {
				const errorMetadata = {
					...identity,
					...(logDuration ? { duration } : {}),
					statusCode,
					error: {
						name: error instanceof Error ? error.name : "Unknown",
						message: error instanceof Error ? error.message : String(error),
						stack: error instanceof Error ? error.stack : undefined,
					},
				};
				sink.log(Levels.ERROR, formatResponseMessage(tracked, requestId ?? "", duration, statusCode), errorMetadata);
			}

			throw error;
		}

		const duration = Date.now() - startTime;
		const statusCode = result.getStatusCode();

		if (logResponses && !excludeStatusCodes.includes(statusCode)) {
			const body = result.getBody();
			const responseMetadata = {
				...identity,
				...(logDuration ? { duration } : {}),
				response: {
					statusCode,
					...(logResponseBody && body ? { body: truncateString(body, maxBodyLength) } : {}),
				},
			};
			sink.log(level, formatResponseMessage(tracked, requestId ?? "", duration, statusCode), responseMetadata);
		}

		return result;
	};
}

/**
 * Get preset configuration for common logging scenarios.
 */
function getPresetConfiguration(preset: LoggerOptions["preset"]): LoggerOptions {
	switch (preset) {
		case "minimal":
			return {
				includeRequestId: false,
				includeHeaders: false,
				includeUserAgent: false,
				logResponseBody: false,
			};

		case "standard":
			return {
				includeRequestId: true,
				includeHeaders: false,
				includeUserAgent: false,
				logResponseBody: false,
			};

		case "detailed":
			return {
				includeRequestId: true,
				includeHeaders: true,
				includeUserAgent: true,
				logResponseBody: false,
			};

		default:
			return {};
	}
}

function defaultRequestIdGenerator(request: RequestMessage): string {
	// Try to use existing request ID from headers
	const existingId = request.getHeader("x-request-id") || request.getHeader("x-correlation-id");
	if (existingId) {
		return existingId;
	}

	return crypto.randomUUID();
}

/**
 * Default request message formatter.
 */
function defaultRequestFormatter(request: RequestMessage, _requestId: string): string {
	return `${request.getMethod()} - ${request.getRequestTarget()}`;
}

/**
 * Default response message formatter.
 */
function defaultResponseFormatter(request: RequestMessage, _requestId: string, duration: number, statusCode: number): string {
	return `${request.getMethod()} - ${request.getRequestTarget()} - ${statusCode} - ${duration}ms`;
}

/**
 * Build request metadata object.
 */
function buildRequestMetadata(
	request: RequestMessage,
	identity: Record<string, unknown>,
	options: {
		includeHeaders: boolean;
		includeUserAgent: boolean;
		normalizedExcludeHeaders: string[];
	}
): Record<string, unknown> {
	const metadata: Record<string, unknown> = { ...identity };

	// Only include request details if any request options are enabled
	if (!options.includeHeaders && !options.includeUserAgent) {
		return metadata;
	}

	const target = request.getRequestTarget();
	const requestData: Record<string, unknown> = {
		method: request.getMethod(),
		target,
		pathname: extractPath(target),
	};

	if (options.includeHeaders) {
		const headers: Record<string, string> = {};
		for (const [key, value] of Object.entries(request.getHeaders())) {
			if (!options.normalizedExcludeHeaders.includes(key.toLowerCase())) {
				headers[key] = value;
			}
		}
		requestData.headers = headers;
		requestData.referer = request.getHeader("referer");
	}

	if (options.includeUserAgent) {
		requestData.userAgent = request.getHeader("user-agent");
	}

	metadata.request = requestData;
	return metadata;
}

function getMetadata(metadata: LoggerOptions["metadata"], request: RequestMessage): Record<string, unknown> {
	if (!metadata) return {};
	if (typeof metadata === "function") return metadata(request);
	return metadata;
}

/**
 * Truncate string to maximum length.
 */
function truncateString(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return str.substring(0, maxLength) + "... (truncated)";
}

/**
 * Options for `createRouterLogger`.
 */
export interface RouterLoggerOptions {
	/** Default: Levels.INFO */
	level?: number;
	/** Human-readable console output. Default: true */
	console?: boolean;
	/** One JSON document per line. Default: false */
	ndjson?: boolean;
}

/**
 * Create a logger instance with common transports.
 *
 * @example
 * ```typescript
 * const log = createRouterLogger({ level: Levels.HTTP, console: false, ndjson: true });
 * router.use(logger({ logger: log }));
 * ```
 */
export function createRouterLogger(options: RouterLoggerOptions = {}): Logger {
	const { level = Levels.INFO, console: enableConsole = true, ndjson = false } = options;

	const transports = [...(enableConsole ? [new ConsoleTransport()] : []), ...(ndjson ? [new NDJsonTransport()] : [])];

	return new Logger({ level, transports });
}

export * from "@rabbit-company/logger";
