import { matchTokens } from "./matcher";
import { compilePattern, formatPattern, normalizePattern, segmentBounds, staticPrefix } from "./pattern";
import { splitPath } from "./path";
import type { CompiledPattern, Method, RouteDefinition, RouteEntry, RouteMatch } from "./types";

/**
 * A node in the literal-prefix trie. Each route is parked on the node reached by
 * walking its leading literal segments.
 */
interface IndexNode {
	/** Children keyed by literal segment */
	readonly children: Map<string, IndexNode>;
	/** Registration order of the routes parked here, ascending */
	readonly routes: number[];
}

interface IndexedRoute<H> {
	entry: RouteEntry<H>;
	min: number;
	max: number;
}

function createNode(): IndexNode {
	return { children: new Map(), routes: [] };
}

/**
 * Immutable collection of compiled routes, searched once per request.
 *
 * Lookups honour registration order: among the routes of the requested method, the
 * earliest registered route whose pattern matches wins, even if a later route is more
 * specific. A literal-prefix trie narrows each lookup to the routes whose leading
 * literals agree with the path, so a table of N literal routes is searched in time
 * proportional to the path depth rather than N.
 *
 * `register()` returns a new index and leaves the receiver untouched, so a snapshot can
 * be shared by concurrent lookups while a replacement is being built.
 *
 * @template H - Handler identity stored with each route
 *
 * @example
 * ```typescript
 * const index = RouteIndex.empty<string>()
 *   .register("GET", "/users/:id", "show-user")
 *   .register("GET", "/users/admin", "admin");
 *
 * const match = index.find("GET", "/users/admin");
 * match?.route.handler; // "show-user"
 * match?.bindings;      // [["id", "admin"]]
 * ```
 */
export class RouteIndex<H> {
	/** Routes in registration order */
	readonly entries: readonly RouteEntry<H>[];

	private readonly routes: readonly IndexedRoute<H>[];
	private readonly trees: ReadonlyMap<Method, IndexNode>;

	private constructor(entries: readonly RouteEntry<H>[]) {
		this.entries = Object.freeze(entries);
		this.routes = Object.freeze(
			entries.map((entry) => {
				const { min, max } = segmentBounds(entry.pattern);
				return { entry, min, max };
			})
		);

		const trees = new Map<Method, IndexNode>();
		for (const entry of entries) {
			let node = trees.get(entry.method);
			if (!node) {
				node = createNode();
				trees.set(entry.method, node);
			}

			for (const literal of staticPrefix(entry.pattern)) {
				let child: IndexNode | undefined = node.children.get(literal);
				if (!child) {
					child = createNode();
					node.children.set(literal, child);
				}
				node = child;
			}
			node.routes.push(entry.order);
		}

		for (const root of trees.values()) freezeNode(root);
		this.trees = trees;
	}

	/**
	 * An index with no routes.
	 */
	static empty<H>(): RouteIndex<H> {
		return new RouteIndex<H>([]);
	}

	/**
	 * Builds an index from route definitions, in list order.
	 *
	 * @throws {PatternError} When a string pattern is malformed
	 */
	static from<H>(definitions: Iterable<RouteDefinition<H>>): RouteIndex<H> {
		const entries: RouteEntry<H>[] = [];
		for (const definition of definitions) {
			entries.push(createEntry(entries.length, definition));
		}
		return new RouteIndex(entries);
	}

	/**
	 * Returns a new index with one more route, registered after all existing ones.
	 *
	 * @param method - HTTP method the route answers
	 * @param pattern - Pattern text or an already compiled pattern
	 * @param handler - Handler identity returned on a match
	 * @param middleware - Route-level middleware chain
	 * @throws {PatternError} When `pattern` is malformed
	 */
	register(method: Method, pattern: string | CompiledPattern, handler: H, middleware: readonly H[] = []): RouteIndex<H> {
		const entry = createEntry(this.entries.length, { method, pattern, handler, middleware });
		return new RouteIndex([...this.entries, entry]);
	}

	/** Number of registered routes. */
	get size(): number {
		return this.entries.length;
	}

	/** Methods with at least one route. */
	methods(): Method[] {
		return [...this.trees.keys()];
	}

	/**
	 * Finds the first registered route of `method` that matches `path`.
	 *
	 * @returns The route and its captures, or `null` when nothing matches
	 */
	find(method: Method, path: string): RouteMatch<H> | null {
		return this.findSegments(method, splitPath(path));
	}

	/**
	 * Same as `find()` for a path that is already split.
	 */
	findSegments(method: Method, segments: readonly string[]): RouteMatch<H> | null {
		for (const route of this.candidates(method, segments)) {
			const bindings = matchTokens(route.pattern, segments);
			if (bindings) return { route, bindings };
		}
		return null;
	}

	/**
	 * Routes that could match `segments`, in registration order.
	 * Any route left out of this list cannot match.
	 */
	candidates(method: Method, segments: readonly string[]): RouteEntry<H>[] {
		let node = this.trees.get(method);
		if (!node) return [];

		const lists: number[][] = [node.routes];
		for (const segment of segments) {
			const child: IndexNode | undefined = node.children.get(segment);
			if (!child) break;
			node = child;
			if (child.routes.length > 0) lists.push(child.routes);
		}

		const orders = lists.length === 1 ? lists[0] : mergeAscending(lists);
		const count = segments.length;
		const result: RouteEntry<H>[] = [];
		for (const order of orders) {
			const route = this.routes[order];
			if (count >= route.min && count <= route.max) result.push(route.entry);
		}
		return result;
	}
}

function createEntry<H>(order: number, definition: RouteDefinition<H>): RouteEntry<H> {
	const pattern = typeof definition.pattern === "string" ? compilePattern(definition.pattern) : normalizePattern(definition.pattern);
	return Object.freeze({
		order,
		method: definition.method,
		path: formatPattern(pattern),
		pattern,
		handler: definition.handler,
		middleware: Object.freeze([...(definition.middleware ?? [])]),
	});
}

function freezeNode(node: IndexNode): void {
	Object.freeze(node.routes);
	for (const child of node.children.values()) freezeNode(child);
	Object.freeze(node);
}

/**
 * Merges ascending number lists into one ascending list.
 */
function mergeAscending(lists: number[][]): number[] {
	const merged: number[] = [];
	for (const list of lists) merged.push(...list);
	return merged.sort((a, b) => a - b);
}
