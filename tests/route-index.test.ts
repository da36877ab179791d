import { describe, expect, it } from "vitest";
import { PatternError, RouteIndex, compilePattern, matchTokens, splitPath } from "../packages/core/src";
import type { Method, RouteEntry, Token } from "../packages/core/src";

describe("RouteIndex", () => {
	describe("Registration order", () => {
		it("should pick the earliest matching route even when a later one is more specific", () => {
			const index = RouteIndex.empty<string>().register("GET", "/users/:id", "show").register("GET", "/users/admin", "admin");

			const match = index.find("GET", "/users/admin");
			expect(match?.route.handler).toBe("show");
			expect(match?.bindings).toEqual([["id", "admin"]]);
		});

		it("should pick the literal route when it is registered first", () => {
			const index = RouteIndex.empty<string>().register("GET", "/users/admin", "admin").register("GET", "/users/:id", "show");

			expect(index.find("GET", "/users/admin")?.route.handler).toBe("admin");
			expect(index.find("GET", "/users/7")?.route.handler).toBe("show");
		});

		it("should let a catch-all registered first shadow everything after it", () => {
			const index = RouteIndex.from<string>([
				{ method: "GET", pattern: "/**", handler: "all" },
				{ method: "GET", pattern: "/api/health", handler: "health" },
			]);

			expect(index.find("GET", "/api/health")?.route.handler).toBe("all");
		});

		it("should order routes parked on different trie nodes", () => {
			const index = RouteIndex.from<string>([
				{ method: "GET", pattern: "/api/:rest", handler: "api-param" },
				{ method: "GET", pattern: "/:any/users", handler: "root-param" },
				{ method: "GET", pattern: "/api/users", handler: "literal" },
			]);

			expect(index.candidates("GET", ["api", "users"]).map((route) => route.handler)).toEqual(["api-param", "root-param", "literal"]);
			expect(index.find("GET", "/api/users")?.route.handler).toBe("api-param");
		});
	});

	describe("Lookup", () => {
		const index = RouteIndex.from<string>([
			{ method: "GET", pattern: "/", handler: "home" },
			{ method: "GET", pattern: "/users/:id", handler: "user" },
			{ method: "POST", pattern: "/users", handler: "create" },
			{ method: "GET", pattern: "/assets/**path/*.{css,js}", handler: "asset" },
		]);

		it("should match the root", () => {
			expect(index.find("GET", "/")).toEqual({ route: index.entries[0], bindings: [] });
		});

		it("should filter by method", () => {
			expect(index.find("POST", "/users/1")).toBeNull();
			expect(index.find("GET", "/users")).toBeNull();
			expect(index.find("POST", "/users")?.route.handler).toBe("create");
			expect(index.find("DELETE", "/users/1")).toBeNull();
		});

		it("should return raw captures", () => {
			expect(index.find("GET", "/assets/js/vendor/app.js")?.bindings).toEqual([["path", "js/vendor"]]);
			expect(index.find("GET", "/users/a%20b")?.bindings).toEqual([["id", "a%20b"]]);
		});

		it("should normalize slashes in the request path", () => {
			expect(index.find("GET", "//users//9/")?.bindings).toEqual([["id", "9"]]);
		});

		it("should accept split segments", () => {
			expect(index.findSegments("GET", ["users", "3"])?.route.handler).toBe("user");
		});

		it("should list the methods with routes", () => {
			expect(index.methods()).toEqual(["GET", "POST"]);
		});
	});

	describe("Entries", () => {
		it("should store canonical paths and frozen entries", () => {
			const index = RouteIndex.empty<string>().register("GET", "//files/:id/*.{ png , jpg }/", "file", ["auth"]);
			const [entry] = index.entries;

			expect(entry.order).toBe(0);
			expect(entry.path).toBe("/files/:id/*.{png,jpg}");
			expect(entry.middleware).toEqual(["auth"]);
			expect(Object.isFrozen(entry)).toBe(true);
			expect(Object.isFrozen(index.entries)).toBe(true);
		});

		it("should accept compiled patterns", () => {
			const tokens = compilePattern("/a/:b");
			const index = RouteIndex.empty<string>().register("PUT", tokens, "put");

			expect(index.entries[0].pattern).toEqual(tokens);
			expect(index.find("PUT", "/a/x")?.bindings).toEqual([["b", "x"]]);
		});

		it("should keep its own frozen copy of hand-built tokens", () => {
			const tokens: Token[] = [
				{ kind: "literal", text: "a" },
				{ kind: "param", name: "id" },
			];
			const index = RouteIndex.empty<string>().register("GET", tokens, "show");

			tokens[0] = { kind: "literal", text: "b" };
			tokens.push({ kind: "literal", text: "edit" });

			expect(Object.isFrozen(index.entries[0].pattern)).toBe(true);
			expect(index.entries[0].path).toBe("/a/:id");
			expect(index.find("GET", "/a/1")?.bindings).toEqual([["id", "1"]]);
			expect(index.find("GET", "/b/1/edit")).toBeNull();
		});

		it("should reject hand-built tokens that repeat a capture name", () => {
			const tokens: Token[] = [
				{ kind: "param", name: "x" },
				{ kind: "param", name: "x" },
			];

			expect(() => RouteIndex.empty<string>().register("GET", tokens, "dup")).toThrow(PatternError);
			expect(() => RouteIndex.from([{ method: "GET", pattern: tokens, handler: "dup" }])).toThrow(PatternError);
		});

		it("should reject malformed patterns", () => {
			expect(() => RouteIndex.empty<string>().register("GET", "/:id/:id", "dup")).toThrow(PatternError);
		});
	});

	describe("Immutability", () => {
		it("should leave the receiver unchanged on register", () => {
			const first = RouteIndex.empty<string>().register("GET", "/a", "a");
			const second = first.register("GET", "/b", "b");

			expect(first.size).toBe(1);
			expect(second.size).toBe(2);
			expect(first.find("GET", "/b")).toBeNull();
			expect(second.find("GET", "/b")?.route.handler).toBe("b");
			expect(second.entries[0]).toBe(first.entries[0]);
		});
	});

	describe("Candidates", () => {
		it("should skip routes whose leading literals differ", () => {
			const index = RouteIndex.from<string>([
				{ method: "GET", pattern: "/users/:id", handler: "user" },
				{ method: "GET", pattern: "/posts/:id", handler: "post" },
				{ method: "GET", pattern: "/:kind/:id", handler: "any" },
			]);

			expect(index.candidates("GET", ["posts", "1"]).map((route) => route.handler)).toEqual(["post", "any"]);
		});

		it("should skip routes that cannot consume the segment count", () => {
			const index = RouteIndex.from<string>([
				{ method: "GET", pattern: "/:a", handler: "one" },
				{ method: "GET", pattern: "/:a/:b", handler: "two" },
				{ method: "GET", pattern: "/:a/**", handler: "many" },
			]);

			expect(index.candidates("GET", ["x", "y"]).map((route) => route.handler)).toEqual(["two", "many"]);
			expect(index.candidates("GET", ["x"]).map((route) => route.handler)).toEqual(["one", "many"]);
		});

		it("should agree with a linear scan over every route", () => {
			const patterns = ["/", "/users", "/users/:id", "/users/admin", "/users/:id/posts/*", "/files/**path", "/files/**dir/*.{png,jpg}", "/*/:b", "/**tail", "/docs/*.pdf"];
			const methods: Method[] = ["GET", "POST"];
			const index = RouteIndex.from<string>(patterns.flatMap((pattern) => methods.map((method) => ({ method, pattern, handler: `${method} ${pattern}` }))));

			const linear = (method: Method, path: string): RouteEntry<string> | null => {
				const segments = splitPath(path);
				return index.entries.find((entry) => entry.method === method && matchTokens(entry.pattern, segments) !== null) ?? null;
			};

			const paths = ["/", "/users", "/users/admin", "/users/7/posts/3", "/files", "/files/a/b.png", "/files/a/b.gif", "/x/y", "/docs/guide.pdf", "/a/b/c/d"];
			for (const method of methods) {
				for (const path of paths) {
					expect(index.find(method, path)?.route ?? null).toBe(linear(method, path));
				}
			}
		});
	});
});
