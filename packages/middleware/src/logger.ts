import type { Context, Middleware } from "@pathwright/core";
import { compilePattern, matchPath } from "@pathwright/core";
import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";

export { Levels };

/**
 * Options for configuring the logger middleware.
 */
export interface LoggerOptions<T extends Record<string, unknown>> {
	/**
	 * Logger instance to use. If not provided, a default logger will be created.
	 */
	logger?: Pick<Logger, "log">;

	/**
	 * Log level for HTTP requests.
	 * Default: Levels.HTTP
	 */
	level?: number;

	/**
	 * Preset configuration for common use cases.
	 * Explicit options take precedence over the preset.
	 * - "minimal": method, path, status and duration
	 * - "standard": adds the request ID and the matched route
	 * - "detailed": adds headers and user agent
	 */
	preset?: "minimal" | "standard" | "detailed";

	/**
	 * Whether to log the incoming request.
	 * Default: true
	 */
	logRequests?: boolean;

	/**
	 * Whether to log the outgoing response.
	 * Default: true
	 */
	logResponses?: boolean;

	/**
	 * Whether to include the duration in response logs.
	 * Default: true
	 */
	logDuration?: boolean;

	/**
	 * Whether to include request ID in logs.
	 * Default: true with the "standard" and "detailed" presets, false otherwise
	 */
	includeRequestId?: boolean;

	/**
	 * Whether to include the matched route pattern and its captures.
	 * Default: true with the "standard" and "detailed" presets, false otherwise
	 */
	includeRoute?: boolean;

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
	 * Headers to exclude from logging (case-insensitive).
	 * Default: ["authorization", "cookie", "set-cookie"]
	 */
	excludeHeaders?: string[];

	/**
	 * Paths to exclude from logging. Strings are route patterns (`/static/**`), regular
	 * expressions are tested against the pathname.
	 * Default: ["/health", "/ping"]
	 */
	excludePaths?: (string | RegExp)[];

	/**
	 * HTTP status codes to exclude from logging.
	 * Default: []
	 */
	excludeStatusCodes?: number[];

	/**
	 * Function to generate request ID. Defaults to the `x-request-id` or
	 * `x-correlation-id` header, or a random UUID.
	 */
	generateRequestId?: (ctx: Context<T>) => string;

	/**
	 * Key in context state where the request ID will be stored.
	 * Default: "requestId"
	 */
	requestIdKey?: keyof T;

	/**
	 * Function to determine if a request should be skipped.
	 */
	skip?: (ctx: Context<T>) => boolean;

	/**
	 * Custom message formatter for request logs.
	 */
	formatRequestMessage?: (ctx: Context<T>, requestId: string) => string;

	/**
	 * Custom message formatter for response logs.
	 */
	formatResponseMessage?: (ctx: Context<T>, requestId: string, duration: number, statusCode: number) => string;

	/**
	 * Additional metadata to include in all logs.
	 */
	metadata?: Record<string, unknown> | ((ctx: Context<T>) => Record<string, unknown>);
}

type PathFilter = (pathname: string) => boolean;

/**
 * HTTP request/response logging middleware using @rabbit-company/logger.
 *
 * @example
 * ```typescript
 * // Method, path, status and duration
 * router.use(logger({ preset: "minimal" }));
 * // GET /api/users 200 4ms
 *
 * // Adds the request ID and the route that served the request
 * router.use(logger({ preset: "standard" }));
 *
 * // Custom logger, skipping static files
 * router.use(logger({
 *   logger: new Logger({ level: Levels.INFO, transports: [new ConsoleTransport()] }),
 *   level: Levels.INFO,
 *   excludePaths: ["/health", "/static/**", /^\/internal\//],
 *   excludeStatusCodes: [404],
 * }));
 * ```
 */
export function logger<T extends Record<string, unknown> = Record<string, unknown>>(options: LoggerOptions<T> = {}): Middleware<T> {
	const mergedOptions: LoggerOptions<T> = { ...getPresetConfiguration(options.preset), ...options };

	const {
		logger: providedLogger,
		level = Levels.HTTP,
		logRequests = true,
		logResponses = true,
		logDuration = true,
		includeRequestId = true,
		includeRoute = false,
		includeHeaders = false,
		includeUserAgent = false,
		excludeHeaders = ["authorization", "cookie", "set-cookie"],
		excludePaths = ["/health", "/ping"],
		excludeStatusCodes = [],
		generateRequestId = defaultRequestIdGenerator,
		requestIdKey = "requestId" as keyof T,
		skip,
		formatRequestMessage = defaultRequestFormatter,
		formatResponseMessage = defaultResponseFormatter,
		metadata,
	} = mergedOptions;

	const loggerInstance =
		providedLogger ??
		new Logger({
			level,
			transports: [new ConsoleTransport()],
		});

	const normalizedExcludeHeaders = excludeHeaders.map((h) => h.toLowerCase());
	const pathFilters = excludePaths.map(createPathFilter);

	return async (ctx, next) => {
		if (skip && skip(ctx)) {
			return next();
		}

		const pathname = new URL(ctx.req.url).pathname;
		if (pathFilters.some((excluded) => excluded(pathname))) {
			return next();
		}

		const requestId = includeRequestId ? generateRequestId(ctx) : undefined;
		if (requestId) {
			ctx.set(requestIdKey, requestId as T[keyof T]);
		}

		const startTime = Date.now();
		const baseMetadata = {
			...getMetadata(metadata, ctx),
			...(requestId ? { requestId } : {}),
			...(includeRoute ? buildRouteMetadata(ctx) : {}),
		};

		if (logRequests) {
			const requestMetadata = buildRequestMetadata(ctx, baseMetadata, {
				includeHeaders,
				includeUserAgent,
				normalizedExcludeHeaders,
			});
			loggerInstance.log(level, formatRequestMessage(ctx, requestId ?? ""), requestMetadata);
		}

		try {
			const response = await next();
			const duration = Date.now() - startTime;
			const statusCode = response instanceof Response ? response.status : 200;

			if (logResponses && !excludeStatusCodes.includes(statusCode)) {
				loggerInstance.log(level, formatResponseMessage(ctx, requestId ?? "", duration, statusCode), {
					...baseMetadata,
					...(logDuration ? { duration } : {}),
					response: { statusCode },
				});
			}

			return response;
		} catch (error) {
			const duration = Date.now() - startTime;

			if (logResponses) {
				loggerInstance.log(Levels.ERROR, formatResponseMessage(ctx, requestId ?? "", duration, 500), {
					...baseMetadata,
					...(logDuration ? { duration } : {}),
					response: { statusCode: 500 },
					error: {
						name: error instanceof Error ? error.name : "Unknown",
						message: error instanceof Error ? error.message : String(error),
						stack: error instanceof Error ? error.stack : undefined,
					},
				});
			}

			throw error;
		}
	};
}

function createPathFilter(path: string | RegExp): PathFilter {
	if (typeof path !== "string") {
		return (pathname) => path.test(pathname);
	}
	const pattern = compilePattern(path);
	return (pathname) => matchPath(pattern, pathname) !== null;
}

/**
 * Get preset configuration for common logging scenarios.
 */
function getPresetConfiguration<T extends Record<string, unknown>>(preset?: LoggerOptions<T>["preset"]): LoggerOptions<T> {
	switch (preset) {
		case "standard":
			return {
				includeRequestId: true,
				includeRoute: true,
				includeHeaders: false,
				includeUserAgent: false,
			};

		case "detailed":
			return {
				includeRequestId: true,
				includeRoute: true,
				includeHeaders: true,
				includeUserAgent: true,
			};

		case "minimal":
		default:
			return {
				includeRequestId: false,
				includeRoute: false,
				includeHeaders: false,
				includeUserAgent: false,
			};
	}
}

function defaultRequestIdGenerator<T extends Record<string, unknown>>(ctx: Context<T>): string {
	const existingId = ctx.req.headers.get("x-request-id") || ctx.req.headers.get("x-correlation-id");
	return existingId || crypto.randomUUID();
}

function defaultRequestFormatter<T extends Record<string, unknown>>(ctx: Context<T>): string {
	const url = new URL(ctx.req.url);
	return `${ctx.req.method} ${url.pathname}${url.search}`;
}

function defaultResponseFormatter<T extends Record<string, unknown>>(ctx: Context<T>, _requestId: string, duration: number, statusCode: number): string {
	const url = new URL(ctx.req.url);
	return `${ctx.req.method} ${url.pathname}${url.search} ${statusCode} ${duration}ms`;
}

function buildRouteMetadata<T extends Record<string, unknown>>(ctx: Context<T>): Record<string, unknown> {
	if (!ctx.route) return {};
	return {
		route: {
			method: ctx.route.method,
			pattern: ctx.route.path,
			params: Object.fromEntries(ctx.bindings),
		},
	};
}

function buildRequestMetadata<T extends Record<string, unknown>>(
	ctx: Context<T>,
	baseMetadata: Record<string, unknown>,
	options: {
		includeHeaders: boolean;
		includeUserAgent: boolean;
		normalizedExcludeHeaders: string[];
	}
): Record<string, unknown> {
	if (!options.includeHeaders && !options.includeUserAgent) {
		return baseMetadata;
	}

	const request: Record<string, unknown> = {
		method: ctx.req.method,
		url: ctx.req.url,
	};

	if (options.includeHeaders) {
		const headers: Record<string, string> = {};
		ctx.req.headers.forEach((value, key) => {
			if (!options.normalizedExcludeHeaders.includes(key.toLowerCase())) {
				headers[key] = value;
			}
		});
		request.headers = headers;
	}

	if (options.includeUserAgent) {
		request.userAgent = ctx.req.headers.get("user-agent");
	}

	return { ...baseMetadata, request };
}

function getMetadata<T extends Record<string, unknown>>(
	metadata: Record<string, unknown> | ((ctx: Context<T>) => Record<string, unknown>) | undefined,
	ctx: Context<T>
): Record<string, unknown> {
	if (!metadata) return {};
	if (typeof metadata === "function") return metadata(ctx);
	return metadata;
}
