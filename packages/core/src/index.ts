import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
import { RouterError } from "./errors";
import { bindingsToRecord, matchTokens } from "./matcher";
import { compilePattern, formatPattern } from "./pattern";
import { joinPaths, parsePathname, splitPath } from "./path";
import { RouteIndex } from "./route-index";
import { METHODS } from "./types";
import type { Context, Method, Middleware, MiddlewareRoute, Next, ParameterBinding, RouteEntry, RouteRecord, RouterMatch, RouterOptions } from "./types";

/** Frozen empty object used as default params to avoid object allocation */
const EMPTY_PARAMS: Record<string, string> = Object.freeze<Record<string, string>>({});

const EMPTY_BINDINGS: ParameterBinding = Object.freeze([]);

/** A route index together with the lookups memoised against it. */
interface Snapshot<T extends Record<string, unknown>> {
	index: RouteIndex<Middleware<T>>;
	cache: Map<string, RouterMatch<T> | null>;
}

function isMethod(value: string): value is Method {
	return METHODS.some((method) => method === value);
}

/**
 * Request router built on compiled route patterns.
 *
 * Routes are compiled when they are registered and collected into an immutable
 * `RouteIndex`. Every change to the route table builds a fresh index on the next
 * lookup and swaps it in whole; requests already in flight keep the index they started with.
 *
 * Among routes of the same method, the first one registered wins.
 *
 * Pattern syntax:
 * - `segment` - literal
 * - `:name` - one segment, bound to `name`
 * - `*`, `*name` - one segment, bound when named
 * - `**`, `**name` - zero or more segments, bound (joined with `/`) when named
 * - `*.ext`, `*.{ext1,ext2}` - one segment ending in one of the extensions
 *
 * @template T - The type of the context state object that will be shared across middleware
 *
 * @example
 * ```typescript
 * const router = new Router<{ user: User }>();
 *
 * router.get('/users/:id', (ctx) => ctx.json({ id: ctx.params.id }));
 * router.get('/assets/**path/*.{css,js}', (ctx) => ctx.text(ctx.params.path));
 *
 * router.use('/admin/**', async (ctx, next) => {
 *   if (!ctx.get('user')?.isAdmin) {
 *     return ctx.json({ error: 'Unauthorized' }, 401);
 *   }
 *   return next();
 * });
 *
 * const res = await router.handle(new Request('http://localhost/users/42'));
 * ```
 */
export class Router<T extends Record<string, unknown> = Record<string, unknown>> {
	/** All registered routes, in registration order */
	private routes: RouteRecord<T>[] = [];
	/** All registered middleware, in registration order */
	private middlewares: MiddlewareRoute<T>[] = [];
	/** Cache for method-specific middleware to avoid filtering on each request */
	private methodMiddlewareCache = new Map<Method, MiddlewareRoute<T>[]>();
	/** Current route index; `null` until the next lookup after a change */
	private snapshot: Snapshot<T> | null = null;
	/** Counter for generating unique IDs */
	private idCounter = 0;

	private readonly config: Readonly<Required<RouterOptions>>;

	/** Error handler function for handling uncaught errors */
	private errorHandler?: (err: Error, ctx: Context<T>) => Response | Promise<Response>;

	/** 404 Not Found handler function */
	private notFoundHandler?: (ctx: Context<T>) => Response | Promise<Response>;

	constructor(options: RouterOptions = {}) {
		this.config = Object.freeze({
			decodeParams: options.decodeParams ?? true,
			matchCacheSize: options.matchCacheSize ?? 500,
			logger: options.logger ?? new Logger({ level: Levels.WARN, transports: [new ConsoleTransport()] }),
		});
		this.handle = this.handle.bind(this);
	}

	private generateId(): string {
		return `${Date.now()}-${++this.idCounter}`;
	}

	/**
	 * Drops the current route index and every cache derived from the route table.
	 */
	private invalidate(): void {
		this.snapshot = null;
		this.methodMiddlewareCache.clear();
	}

	private current(): Snapshot<T> {
		if (!this.snapshot) {
			const index = RouteIndex.from(
				this.routes.map((route) => ({
					method: route.method,
					pattern: route.pattern,
					handler: route.handlers[route.handlers.length - 1],
					middleware: route.handlers.slice(0, -1),
				}))
			);
			this.snapshot = { index, cache: new Map() };
		}
		return this.snapshot;
	}

	/**
	 * The route index currently used for lookups.
	 */
	get index(): RouteIndex<Middleware<T>> {
		return this.current().index;
	}

	/**
	 * Sets a global error handler for the application.
	 * This handler will be called whenever an unhandled error occurs during request processing.
	 *
	 * @example
	 * ```typescript
	 * router.onError((err, ctx) => ctx.json({ error: err.message }, 500));
	 * ```
	 */
	onError(handler: (err: Error, ctx: Context<T>) => Response | Promise<Response>): this {
		this.errorHandler = handler;
		return this;
	}

	/**
	 * Sets the handler for requests that match no route.
	 *
	 * @example
	 * ```typescript
	 * router.onNotFound((ctx) => ctx.json({ error: 'Not Found', path: ctx.req.url }, 404));
	 * ```
	 */
	onNotFound(handler: (ctx: Context<T>) => Response | Promise<Response>): this {
		this.notFoundHandler = handler;
		return this;
	}

	/**
	 * Registers middleware that will run for matching requests.
	 * Middleware paths use the route pattern syntax, so `/api/**` covers everything under `/api`.
	 *
	 * @param args - Variable arguments for different middleware registration patterns:
	 *   - `[handler]` - Global middleware that runs for all requests
	 *   - `[path, handler]` - Path-specific middleware
	 *   - `[method, path, handler]` - Method and path-specific middleware
	 * @returns The Router instance for method chaining
	 *
	 * @example
	 * ```typescript
	 * router.use(async (ctx, next) => {
	 *   ctx.set('startTime', Date.now());
	 *   return next();
	 * });
	 *
	 * router.use('/api/**', async (ctx, next) => {
	 *   ctx.header('X-Api-Version', '1.0');
	 *   return next();
	 * });
	 *
	 * router.use('POST', '/users', validateUser);
	 * ```
	 */
	use(...args: [Middleware<T>] | [string, Middleware<T>] | [Method, string, Middleware<T>]): this {
		this.addMiddleware(...args);
		return this;
	}

	/**
	 * Adds middleware like `use()` and returns its ID for later removal.
	 *
	 * @throws {PatternError} When the middleware path is malformed
	 */
	addMiddleware(...args: [Middleware<T>] | [string, Middleware<T>] | [Method, string, Middleware<T>]): string {
		const id = this.generateId();

		if (args.length === 1) {
			const [handler] = args;
			this.middlewares.push({ id, handler });
		} else if (args.length === 2) {
			const [path, handler] = args;
			const pattern = compilePattern(path);
			this.middlewares.push({ id, path: formatPattern(pattern), pattern, handler });
		} else {
			const [method, path, handler] = args;
			const pattern = compilePattern(path);
			this.middlewares.push({ id, method, path: formatPattern(pattern), pattern, handler });
		}

		this.methodMiddlewareCache.clear();
		return id;
	}

	/**
	 * Removes middleware by its ID.
	 *
	 * @returns true if middleware was found and removed, false otherwise
	 */
	removeMiddleware(id: string): boolean {
		const initialLength = this.middlewares.length;
		this.middlewares = this.middlewares.filter((mw) => mw.id !== id);

		if (this.middlewares.length !== initialLength) {
			this.methodMiddlewareCache.clear();
			return true;
		}
		return false;
	}

	/**
	 * Removes all middleware matching the given criteria.
	 *
	 * @returns Number of middleware items removed
	 */
	removeMiddlewareBy(criteria: { method?: Method; path?: string }): number {
		if (criteria.method === undefined && criteria.path === undefined) return 0;

		const path = criteria.path !== undefined ? formatPattern(compilePattern(criteria.path)) : undefined;
		const initialLength = this.middlewares.length;
		this.middlewares = this.middlewares.filter((mw) => {
			if (criteria.method !== undefined && mw.method !== criteria.method) return true;
			if (path !== undefined && mw.path !== path) return true;
			return false;
		});

		const removedCount = initialLength - this.middlewares.length;
		if (removedCount > 0) this.methodMiddlewareCache.clear();
		return removedCount;
	}

	/**
	 * Gets all registered middleware with their IDs and metadata.
	 */
	getMiddlewares(): Array<{ id: string; method?: Method; path?: string }> {
		return this.middlewares.map((mw) => ({
			id: mw.id,
			method: mw.method,
			path: mw.path,
		}));
	}

	/**
	 * Adds a route with the specified method, path, and handlers.
	 * Handlers before the last one act as route-level middleware.
	 *
	 * @param method - HTTP method (GET, POST, etc.)
	 * @param path - Route pattern
	 * @param handlers - One or more middleware handlers for this route
	 * @returns The route ID for later removal
	 * @throws {PatternError} When `path` is malformed
	 *
	 * @example
	 * ```typescript
	 * const routeId = router.addRoute('GET', '/users/:id', async (ctx) => {
	 *   return ctx.json({ id: ctx.params.id });
	 * });
	 *
	 * router.removeRoute(routeId);
	 * ```
	 */
	addRoute(method: Method, path: string, ...handlers: Middleware<T>[]): string {
		if (handlers.length === 0) {
			throw new RouterError(`Route ${method} ${path} needs at least one handler`);
		}

		const pattern = compilePattern(path);
		const id = this.generateId();
		const canonical = formatPattern(pattern);

		this.routes.push({ id, method, path: canonical, pattern, handlers });
		this.invalidate();

		this.config.logger.log(Levels.DEBUG, `Registered route ${method} ${canonical}`, { id });
		return id;
	}

	/**
	 * Removes a route by its ID.
	 *
	 * @returns true if route was found and removed, false otherwise
	 */
	removeRoute(id: string): boolean {
		const initialLength = this.routes.length;
		this.routes = this.routes.filter((route) => route.id !== id);

		if (this.routes.length !== initialLength) {
			this.invalidate();
			return true;
		}
		return false;
	}

	/**
	 * Removes all routes matching the given criteria.
	 * Paths are compared by their compiled form, so `/users/:id/` removes `/users/:id`.
	 *
	 * @returns Number of routes removed
	 *
	 * @example
	 * ```typescript
	 * router.removeRoutesBy({ path: '/users/:id' });
	 * router.removeRoutesBy({ method: 'GET' });
	 * router.removeRoutesBy({ method: 'POST', path: '/users' });
	 * ```
	 */
	removeRoutesBy(criteria: { method?: Method; path?: string }): number {
		if (criteria.method === undefined && criteria.path === undefined) return 0;

		const path = criteria.path !== undefined ? formatPattern(compilePattern(criteria.path)) : undefined;
		const initialLength = this.routes.length;
		this.routes = this.routes.filter((route) => {
			if (criteria.method !== undefined && route.method !== criteria.method) return true;
			if (path !== undefined && route.path !== path) return true;
			return false;
		});

		const removedCount = initialLength - this.routes.length;
		if (removedCount > 0) this.invalidate();
		return removedCount;
	}

	/**
	 * Gets all registered routes with their IDs, in registration order.
	 */
	getRoutes(): Array<{ id: string; method: Method; path: string }> {
		return this.routes.map((route) => ({
			id: route.id,
			method: route.method,
			path: route.path,
		}));
	}

	/**
	 * Removes all routes and middleware.
	 */
	clear(): void {
		this.routes = [];
		this.middlewares = [];
		this.invalidate();
	}

	/**
	 * Finds the route a request would be dispatched to.
	 *
	 * @param method - HTTP method to match
	 * @param path - URL path to match
	 * @returns The route, its raw bindings and its params, or null when nothing matches
	 *
	 * @example
	 * ```typescript
	 * const match = router.match('GET', '/users/123');
	 * match?.params.id;  // "123"
	 * match?.bindings;   // [["id", "123"]]
	 * ```
	 */
	match(method: Method, path: string): RouterMatch<T> | null {
		return this.lookup(this.current(), method, path);
	}

	private lookup(snapshot: Snapshot<T>, method: Method, path: string): RouterMatch<T> | null {
		const cacheKey = `${method}:${path}`;
		const cached = snapshot.cache.get(cacheKey);
		if (cached !== undefined) return cached;

		const found = snapshot.index.find(method, path);
		const result: RouterMatch<T> | null = found
			? {
					route: found.route,
					bindings: found.bindings,
					params: found.bindings.length === 0 ? EMPTY_PARAMS : Object.freeze(bindingsToRecord(found.bindings, this.config.decodeParams)),
				}
			: null;

		if (snapshot.cache.size < this.config.matchCacheSize) {
			snapshot.cache.set(cacheKey, result);
		}
		return result;
	}

	private getMethodMiddlewares(method: Method): MiddlewareRoute<T>[] {
		let result = this.methodMiddlewareCache.get(method);
		if (!result) {
			result = this.middlewares.filter((mw) => !mw.method || mw.method === method);
			this.methodMiddlewareCache.set(method, result);
		}
		return result;
	}

	/**
	 * Creates a sub-router, lets `callback` configure it, and mounts it at `path`.
	 *
	 * @example
	 * ```typescript
	 * router.scope('/api/v1', (api) => {
	 *   api.get('/users', listUsers);
	 *   api.post('/users', createUser);
	 * });
	 * // Routes are available at /api/v1/users
	 * ```
	 */
	scope(path: string, callback: (scoped: Router<T>) => void): this {
		const scoped = new Router<T>(this.config);
		callback(scoped);
		return this.route(path, scoped);
	}

	/**
	 * Mounts a sub-router at the specified path prefix.
	 * Its routes and middleware are re-registered under the prefix, in their original order.
	 * Global middleware of the sub-router applies to everything under the prefix.
	 *
	 * @throws {PatternError} When the prefix is malformed or rebinds a name used by a mounted route
	 *
	 * @example
	 * ```typescript
	 * const admin = new Router();
	 * admin.get('/dashboard', handler);
	 *
	 * router.route('/admin', admin);
	 * // Dashboard is available at /admin/dashboard
	 * ```
	 */
	route(prefix: string, subRouter: Router<T>): this {
		for (const mw of subRouter.middlewares) {
			const path = joinPaths(prefix, mw.path ?? "**");
			if (mw.method) this.addMiddleware(mw.method, path, mw.handler);
			else this.addMiddleware(path, mw.handler);
		}

		for (const route of subRouter.routes) {
			this.addRoute(route.method, joinPaths(prefix, route.path), ...route.handlers);
		}
		return this;
	}

	/**
	 * Registers a GET route handler.
	 *
	 * @example
	 * ```typescript
	 * router.get('/users/:id', async (ctx) => ctx.json(await getUserById(ctx.params.id)));
	 * ```
	 */
	get(path: string, ...handlers: Middleware<T>[]): this {
		this.addRoute("GET", path, ...handlers);
		return this;
	}

	/** Registers a POST route handler. */
	post(path: string, ...handlers: Middleware<T>[]): this {
		this.addRoute("POST", path, ...handlers);
		return this;
	}

	/** Registers a PUT route handler. */
	put(path: string, ...handlers: Middleware<T>[]): this {
		this.addRoute("PUT", path, ...handlers);
		return this;
	}

	/** Registers a DELETE route handler. */
	delete(path: string, ...handlers: Middleware<T>[]): this {
		this.addRoute("DELETE", path, ...handlers);
		return this;
	}

	/** Registers a PATCH route handler. */
	patch(path: string, ...handlers: Middleware<T>[]): this {
		this.addRoute("PATCH", path, ...handlers);
		return this;
	}

	/** Registers an OPTIONS route handler. */
	options(path: string, ...handlers: Middleware<T>[]): this {
		this.addRoute("OPTIONS", path, ...handlers);
		return this;
	}

	/**
	 * Registers a HEAD route handler.
	 * HEAD responses automatically strip the response body while preserving headers and status.
	 */
	head(path: string, ...handlers: Middleware<T>[]): this {
		this.addRoute(
			"HEAD",
			path,
			...handlers.map((handler) => async (ctx: Context<T>, next: Next) => {
				const res = await handler(ctx, next);
				if (res instanceof Response) {
					return new Response(null, {
						status: res.status,
						headers: res.headers,
					});
				}
				return res;
			})
		);
		return this;
	}

	/**
	 * Registers the same handlers for every method.
	 */
	all(path: string, ...handlers: Middleware<T>[]): this {
		for (const method of METHODS) {
			if (method === "HEAD") this.head(path, ...handlers);
			else this.addRoute(method, path, ...handlers);
		}
		return this;
	}

	/**
	 * Creates a context object for the current request with helper methods.
	 */
	private createContext(
		req: Request,
		route: RouteEntry<Middleware<T>> | null,
		params: Record<string, string>,
		bindings: ParameterBinding,
		search: string
	): Context<T> {
		const responseHeaders = new Headers();
		const state = {} as T;
		let searchParams: URLSearchParams | undefined;

		const withHeaders = (contentType: string | undefined, headers?: Record<string, string>): Headers => {
			const allHeaders = new Headers(responseHeaders);
			if (contentType) allHeaders.set("Content-Type", contentType);
			if (headers) {
				for (const [name, value] of Object.entries(headers)) {
					allHeaders.set(name, value);
				}
			}
			return allHeaders;
		};

		return {
			req,
			route,
			params,
			bindings,
			state,
			header: (name: string, value: string) => {
				responseHeaders.set(name, value);
			},
			set: (key, value) => {
				state[key] = value;
			},
			get: (key) => state[key],
			redirect: (url: string, status = 302) => {
				const headers = withHeaders(undefined);
				headers.set("Location", url);
				return new Response(null, { status, headers });
			},
			body: async <U>(): Promise<U> => {
				if (!req.body) return {} as U;
				const type = req.headers.get("content-type") ?? "";
				if (type.includes("application/x-www-form-urlencoded")) {
					const formData = await req.formData();
					return Object.fromEntries(formData.entries()) as U;
				}
				return type.includes("application/json") ? (req.json() as Promise<U>) : ({} as U);
			},
			json: (data: unknown, status = 200, headers?: Record<string, string>) => {
				return new Response(JSON.stringify(data), { status, headers: withHeaders("application/json", headers) });
			},
			text: (data: string | null | undefined, status = 200, headers?: Record<string, string>) => {
				return new Response(data, { status, headers: withHeaders("text/plain", headers) });
			},
			html: (html: string | null | undefined, status = 200, headers?: Record<string, string>) => {
				return new Response(html, { status, headers: withHeaders("text/html; charset=utf-8", headers) });
			},
			query: () => {
				searchParams ??= new URLSearchParams(search);
				return searchParams;
			},
		};
	}

	private async createNotFoundResponse(req: Request, search: string): Promise<Response> {
		if (this.notFoundHandler) {
			return this.notFoundHandler(this.createContext(req, null, EMPTY_PARAMS, EMPTY_BINDINGS, search));
		}
		return new Response("Not Found", { status: 404 });
	}

	/**
	 * Runs `chain` with `next()` composition and returns the response it produced, if any.
	 */
	private async runChain(chain: Middleware<T>[], ctx: Context<T>): Promise<Response | undefined> {
		let currentIndex = 0;
		let response: Response | undefined;

		const dispatch = async (): Promise<Response | void> => {
			if (currentIndex >= chain.length) return;

			const middleware = chain[currentIndex++];
			const result = await middleware(ctx, dispatch);
			if (result instanceof Response) response = result;
			return result;
		};

		await dispatch();
		return response;
	}

	/**
	 * Dispatches a Fetch API request.
	 *
	 * The route is resolved first; middleware registered through `use()` whose method and
	 * path match then runs ahead of the route's own handlers. Captures from middleware paths
	 * are added to `ctx.params` without overriding the route's captures.
	 *
	 * @param req - The incoming Request object
	 * @returns Promise that resolves to a Response object
	 *
	 * @example
	 * ```typescript
	 * const res = await router.handle(new Request('http://localhost/users/42?tab=posts'));
	 * await res.json();
	 * ```
	 */
	async handle(req: Request): Promise<Response> {
		const { pathname, search } = parsePathname(req.url);
		const snapshot = this.current();

		try {
			const matched = isMethod(req.method) ? this.lookup(snapshot, req.method, pathname) : null;
			if (!matched) {
				return await this.createNotFoundResponse(req, search);
			}

			const method = matched.route.method;
			const methodMiddlewares = this.getMethodMiddlewares(method);
			const chain: Middleware<T>[] = [];
			let params = matched.params;

			if (methodMiddlewares.length > 0) {
				const segments = splitPath(pathname);
				for (const mw of methodMiddlewares) {
					if (!mw.pattern) {
						chain.push(mw.handler);
						continue;
					}

					const captured = matchTokens(mw.pattern, segments);
					if (!captured) continue;

					if (captured.length > 0) {
						params = { ...bindingsToRecord(captured, this.config.decodeParams), ...params };
					}
					chain.push(mw.handler);
				}
			}

			chain.push(...matched.route.middleware, matched.route.handler);

			const ctx = this.createContext(req, matched.route, params, matched.bindings, search);
			const response = await this.runChain(chain, ctx);
			return response ?? new Response("No response returned by handler", { status: 500 });
		} catch (err) {
			const error = err instanceof Error ? err : new Error(String(err));
			if (this.errorHandler) {
				return this.errorHandler(error, this.createContext(req, null, EMPTY_PARAMS, EMPTY_BINDINGS, search));
			}

			this.config.logger.log(Levels.ERROR, `Unhandled error in ${req.method} ${pathname}`, {
				error: { name: error.name, message: error.message, stack: error.stack },
			});
			return new Response("Internal Server Error", { status: 500 });
		}
	}
}

export { RouteIndex } from "./route-index";
export { compilePattern, formatPattern, normalizePattern, paramNames, patternsEqual, segmentBounds, staticPrefix, tokenName } from "./pattern";
export { bindingsToRecord, matchPath, matchTokens } from "./matcher";
export type { MatchOptions } from "./matcher";
export { joinPaths, parsePathname, safeDecode, splitPath } from "./path";
export { PatternError, RouterError } from "./errors";
export type { PatternErrorCode } from "./errors";
export * from "./types";
