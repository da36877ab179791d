import type { Logger } from "@rabbit-company/logger";

/**
 * HTTP methods supported by the router.
 *
 * @example
 * ```typescript
 * const method: Method = 'GET';
 * router.addRoute(method, '/users', handler);
 * ```
 */
export type Method = "GET" | "POST" | "PUT" | "DELETE" | "PATCH" | "OPTIONS" | "HEAD";

/** Every method in registration order, used by `Router.all()`. */
export const METHODS: readonly Method[] = Object.freeze(["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS", "HEAD"]);

/** Path segment that must equal the request segment exactly (case-sensitive). */
export interface LiteralToken {
	readonly kind: "literal";
	readonly text: string;
}

/** `:name` - binds one non-empty path segment. */
export interface ParamToken {
	readonly kind: "param";
	readonly name: string;
}

/** `*` or `*name` - matches exactly one segment, bound only when named. */
export interface SingleWildcardToken {
	readonly kind: "single-wildcard";
	readonly name?: string;
}

/** `**` or `**name` - matches zero or more segments, joined with `/` when bound. */
export interface MultiWildcardToken {
	readonly kind: "multi-wildcard";
	readonly name?: string;
}

/** `*.ext` or `*.{a,b}` - one segment ending in `.` plus one of the extensions. */
export interface ExtensionToken {
	readonly kind: "extension";
	readonly extensions: readonly string[];
}

/**
 * One compiled unit of a route pattern.
 *
 * @example
 * ```typescript
 * // compilePattern("/files/:owner/**path/*.{jpg,png}")
 * [
 *   { kind: "literal", text: "files" },
 *   { kind: "param", name: "owner" },
 *   { kind: "multi-wildcard", name: "path" },
 *   { kind: "extension", extensions: ["jpg", "png"] },
 * ]
 * ```
 */
export type Token = LiteralToken | ParamToken | SingleWildcardToken | MultiWildcardToken | ExtensionToken;

export type TokenKind = Token["kind"];

/** Ordered, frozen token sequence produced once per pattern. */
export type CompiledPattern = readonly Token[];

/** A single captured `(name, value)` pair. */
export type Binding = readonly [name: string, value: string];

/** Captures in the order their tokens appear in the pattern. */
export type ParameterBinding = readonly Binding[];

/**
 * A registered route. Entries are created by the route index and never mutated afterwards.
 *
 * @template H - Handler identity stored with the route
 */
export interface RouteEntry<H> {
	/** Position in registration order, starting at 0 */
	readonly order: number;
	readonly method: Method;
	/** Canonical pattern text */
	readonly path: string;
	readonly pattern: CompiledPattern;
	readonly handler: H;
	/** Route-level middleware chain that runs before `handler` */
	readonly middleware: readonly H[];
}

/**
 * A successful lookup: the route plus its captures.
 *
 * @template H - Handler identity stored with the route
 */
export interface RouteMatch<H> {
	readonly route: RouteEntry<H>;
	readonly bindings: ParameterBinding;
}

/** Input accepted by `RouteIndex.from()` and `RouteIndex.register()`. */
export interface RouteDefinition<H> {
	method: Method;
	pattern: string | CompiledPattern;
	handler: H;
	middleware?: readonly H[];
}

/** The part of `Logger` the router writes to. */
export type LogSink = Pick<Logger, "log">;

/**
 * Router configuration, read once at construction.
 */
export interface RouterOptions {
	/**
	 * URI-decode parameter values exposed through `ctx.params`.
	 * Ordered bindings always keep the raw segment text.
	 * Default: true
	 */
	decodeParams?: boolean;

	/**
	 * Number of method+path lookups memoised per route index snapshot.
	 * Set to 0 to disable the cache.
	 * Default: 500
	 */
	matchCacheSize?: number;

	/**
	 * Destination for registration and unhandled error logs.
	 * Default: a `Logger` with a `ConsoleTransport` at `Levels.WARN`.
	 */
	logger?: LogSink;
}

/**
 * Middleware function type that processes requests and can return responses.
 * Middleware functions receive a context object and a next function to call the next middleware in the chain.
 *
 * @template T - The type of the context state object
 * @param ctx - Context object containing request data and helper methods
 * @param next - Function to call the next middleware in the chain
 * @returns Response object, Promise resolving to Response, or void to continue to next middleware
 *
 * @example
 * ```typescript
 * const authMiddleware: Middleware<{ user: User }> = async (ctx, next) => {
 *   const token = ctx.req.headers.get('authorization');
 *   if (!token) {
 *     return ctx.json({ error: 'Unauthorized' }, 401);
 *   }
 *
 *   ctx.set('user', await verifyToken(token));
 *   return next();
 * };
 * ```
 */
export type Middleware<T extends Record<string, unknown> = Record<string, unknown>> = (ctx: Context<T>, next: Next) => Response | void | Promise<Response | void>;

/**
 * Calls the next middleware in the chain.
 */
export type Next = () => Promise<Response | void>;

/**
 * Result of a router lookup.
 *
 * @template T - The type of the context state object
 */
export interface RouterMatch<T extends Record<string, unknown> = Record<string, unknown>> {
	/** The matched route; `route.handler` is the final handler of the chain */
	route: RouteEntry<Middleware<T>>;
	/** Raw captures in pattern order */
	bindings: ParameterBinding;
	/** Captures keyed by name, decoded when `decodeParams` is on */
	params: Record<string, string>;
}

/**
 * Internal representation of middleware registered through `use()`.
 *
 * @template T - The type of the context state object
 */
export interface MiddlewareRoute<T extends Record<string, unknown> = Record<string, unknown>> {
	id: string;
	/** Only run for this method */
	method?: Method;
	/** Pattern text this middleware applies to */
	path?: string;
	/** Compiled `path`; absent for global middleware */
	pattern?: CompiledPattern;
	handler: Middleware<T>;
}

/**
 * Internal representation of a registered route before it is indexed.
 *
 * @template T - The type of the context state object
 */
export interface RouteRecord<T extends Record<string, unknown> = Record<string, unknown>> {
	id: string;
	method: Method;
	path: string;
	pattern: CompiledPattern;
	handlers: Middleware<T>[];
}

/**
 * Context object passed to middleware and route handlers containing request data and helper methods.
 *
 * @template T - The type of the context state object for sharing data between middleware
 *
 * @example
 * ```typescript
 * const handler: Middleware<{ requestId: string }> = async (ctx) => {
 *   const userId = ctx.params.id;
 *   const page = ctx.query().get('page');
 *   ctx.set('requestId', crypto.randomUUID());
 *   return ctx.json({ userId, page });
 * };
 * ```
 */
export interface Context<T extends Record<string, unknown> = Record<string, unknown>> {
	/** The original Request object */
	req: Request;
	/** Captures keyed by name (route and matching middleware) */
	params: Record<string, string>;
	/** Raw route captures in pattern order */
	bindings: ParameterBinding;
	/** The route serving the request; `null` in not-found and error handlers */
	route: RouteEntry<Middleware<T>> | null;
	/** Application state object for sharing data between middleware */
	state: T;
	/**
	 * Returns a plain text response.
	 *
	 * @example
	 * ```typescript
	 * return ctx.text('Hello World');
	 * return ctx.text('Not Found', 404);
	 * ```
	 */
	text: (body: string | null | undefined, status?: number, headers?: Record<string, string>) => Response;
	/**
	 * Returns a JSON response with the `Content-Type` header set.
	 *
	 * @example
	 * ```typescript
	 * return ctx.json({ error: 'Not found' }, 404);
	 * ```
	 */
	json: (data: unknown, status?: number, headers?: Record<string, string>) => Response;
	/** Returns an HTML response. */
	html: (html: string | null | undefined, status?: number, headers?: Record<string, string>) => Response;
	/** Query string of the request URL. */
	query: () => URLSearchParams;
	/**
	 * Parses the request body as JSON or form data, based on `Content-Type`.
	 * Other content types resolve to an empty object.
	 */
	body: <U>() => Promise<U>;
	/** Sets a header on responses produced through this context. */
	header: (name: string, value: string) => void;
	/** Stores a value in the context state. */
	set: <K extends keyof T>(key: K, value: T[K]) => void;
	/** Reads a value from the context state. */
	get: <K extends keyof T>(key: K) => T[K] | undefined;
	/**
	 * Returns a redirect response.
	 *
	 * @example
	 * ```typescript
	 * return ctx.redirect('/login');
	 * return ctx.redirect('https://example.com', 301);
	 * ```
	 */
	redirect: (url: string, status?: number) => Response;
}
