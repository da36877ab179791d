import { describe, expect, it } from "vitest";
import { bindingsToRecord, compilePattern, matchPath, matchTokens } from "../packages/core/src";

function match(pattern: string, segments: string[]) {
	return matchTokens(compilePattern(pattern), segments);
}

describe("matchTokens", () => {
	describe("Root pattern", () => {
		it("should match only the empty path", () => {
			expect(match("/", [])).toEqual([]);
			expect(match("/", ["x"])).toBeNull();
		});
	});

	describe("Literals and params", () => {
		it("should bind a named param", () => {
			expect(match("/users/:id", ["users", "42"])).toEqual([["id", "42"]]);
		});

		it("should bind params in pattern order", () => {
			expect(match("/:z/:a/:m", ["1", "2", "3"])).toEqual([
				["z", "1"],
				["a", "2"],
				["m", "3"],
			]);
		});

		it("should compare literals case-sensitively", () => {
			expect(match("/Users", ["users"])).toBeNull();
			expect(match("/Users", ["Users"])).toEqual([]);
		});

		it("should require the same number of segments", () => {
			expect(match("/users/:id", ["users"])).toBeNull();
			expect(match("/users/:id", ["users", "42", "posts"])).toBeNull();
		});

		it("should keep raw segment values", () => {
			expect(match("/tags/:tag", ["tags", "a%20b"])).toEqual([["tag", "a%20b"]]);
		});
	});

	describe("Single-segment wildcards", () => {
		it("should discard anonymous captures", () => {
			expect(match("/files/*", ["files", "a"])).toEqual([]);
		});

		it("should bind named captures", () => {
			expect(match("/files/*name", ["files", "a"])).toEqual([["name", "a"]]);
		});

		it("should match exactly one segment", () => {
			expect(match("/files/*", ["files"])).toBeNull();
			expect(match("/files/*", ["files", "a", "b"])).toBeNull();
		});
	});

	describe("Multi-segment wildcards", () => {
		it("should grow the capture lazily", () => {
			const tokens = compilePattern("/a/**/b");
			const attempts: string[][] = [];

			const result = matchTokens(tokens, ["a", "x", "y", "b"], {
				onCapture: (_token, capture) => attempts.push([...capture]),
			});

			expect(result).toEqual([]);
			expect(attempts).toEqual([[], ["x"], ["x", "y"]]);
		});

		it("should allow a zero-length capture", () => {
			expect(match("/a/**/b", ["a", "b"])).toEqual([]);
			expect(match("/a/**rest/b", ["a", "b"])).toEqual([["rest", ""]]);
		});

		it("should join a named capture with slashes", () => {
			expect(match("/a/**rest/b", ["a", "x", "y", "b"])).toEqual([["rest", "x/y"]]);
		});

		it("should take everything when last", () => {
			const attempts: string[][] = [];
			const result = matchTokens(compilePattern("/static/**path"), ["static", "css", "site", "main.css"], {
				onCapture: (_token, capture) => attempts.push([...capture]),
			});

			expect(result).toEqual([["path", "css/site/main.css"]]);
			expect(attempts).toEqual([["css", "site", "main.css"]]);
		});

		it("should match a trailing wildcard with nothing left", () => {
			expect(match("/static/**path", ["static"])).toEqual([["path", ""]]);
		});

		it("should leave exactly one segment for a following extension", () => {
			const attempts: string[][] = [];
			const result = matchTokens(compilePattern("/files/**dir/*.{jpg,png}"), ["files", "a", "b", "c", "photo.jpg"], {
				onCapture: (_token, capture) => attempts.push([...capture]),
			});

			expect(result).toEqual([["dir", "a/b/c"]]);
			expect(attempts).toEqual([[], ["a"], ["a", "b"], ["a", "b", "c"]]);
		});

		it("should prefer the shortest capture when several would match", () => {
			expect(match("/**head/x/**tail", ["x", "x", "x"])).toEqual([
				["head", ""],
				["tail", "x/x"],
			]);
		});

		it("should backtrack across two wildcards", () => {
			expect(match("/**a/m/**b/n", ["1", "m", "2", "m", "3", "n"])).toEqual([
				["a", "1"],
				["b", "2/m/3"],
			]);
		});

		it("should drop bindings from abandoned attempts", () => {
			expect(match("/**a/:p/end", ["x", "y", "end"])).toEqual([
				["a", "x"],
				["p", "y"],
			]);
		});

		it("should fail when the tail never matches", () => {
			expect(match("/a/**/b", ["a", "x", "y"])).toBeNull();
			expect(match("/a/**/b", ["a"])).toBeNull();
		});

		it("should stay fast on long paths with several wildcards", () => {
			const segments = Array.from({ length: 200 }, () => "x");
			expect(match("/**/**/**/**/y", segments)).toBeNull();
		});

		it("should try each capture end once per wildcard on a failing path", () => {
			const count = 2_000;
			const segments = Array.from({ length: count }, () => "x");
			let attempts = 0;

			const result = matchTokens(compilePattern("/**/x/**/y"), segments, {
				onCapture: () => attempts++,
			});

			expect(result).toBeNull();
			expect(attempts).toBe(2 * (count - 1));
		});

		it("should reject thousands of segments against stacked wildcards quickly", () => {
			const segments = Array.from({ length: 2_000 }, () => "x");

			const start = performance.now();
			expect(match("/**/x/**/y", segments)).toBeNull();
			expect(match("/**/**/**/**/**/y", segments)).toBeNull();
			expect(match("/**a/x/**b/x/**c/y", segments)).toBeNull();
			expect(performance.now() - start).toBeLessThan(500);
		});

		it("should bind captures correctly on long matching paths", () => {
			const segments = [...Array.from({ length: 1_999 }, () => "x"), "y"];

			expect(match("/**head/x/**tail/y", segments)).toEqual([
				["head", ""],
				["tail", Array.from({ length: 1_998 }, () => "x").join("/")],
			]);
		});
	});

	describe("Extensions", () => {
		it("should match any listed extension", () => {
			expect(match("/img/*.{jpg,png}", ["img", "photo.png"])).toEqual([]);
			expect(match("/img/*.{jpg,png}", ["img", "photo.jpg"])).toEqual([]);
		});

		it("should reject other extensions", () => {
			expect(match("/img/*.{jpg,png}", ["img", "photo.gif"])).toBeNull();
		});

		it("should test the suffix after a dot", () => {
			expect(match("/img/*.png", ["img", "png"])).toBeNull();
			expect(match("/img/*.png", ["img", "photo.PNG"])).toBeNull();
			expect(match("/img/*.gz", ["img", "archive.tar.gz"])).toEqual([]);
			expect(match("/img/*.tar.gz", ["img", "archive.tar.gz"])).toEqual([]);
		});

		it("should consume exactly one segment", () => {
			expect(match("/img/*.png", ["img"])).toBeNull();
			expect(match("/img/*.png", ["img", "a", "b.png"])).toBeNull();
		});
	});
});

describe("matchPath", () => {
	it("should split the path before matching", () => {
		const tokens = compilePattern("/users/:id");
		expect(matchPath(tokens, "//users/7/")).toEqual([["id", "7"]]);
		expect(matchPath(tokens, "/users")).toBeNull();
	});
});

describe("bindingsToRecord", () => {
	it("should key values by name", () => {
		expect(
			bindingsToRecord([
				["a", "1"],
				["b", "2"],
			])
		).toEqual({ a: "1", b: "2" });
	});

	it("should decode values on request", () => {
		expect(bindingsToRecord([["q", "a%20b"]], true)).toEqual({ q: "a b" });
		expect(bindingsToRecord([["q", "a%20b"]])).toEqual({ q: "a%20b" });
	});
});
