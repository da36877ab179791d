import { PatternError } from "./errors";
import { splitPath } from "./path";
import type { CompiledPattern, ExtensionToken, Token } from "./types";

const NAME_PATTERN = /^[A-Za-z0-9_$-]+$/;

/**
 * Compiles a route pattern into its token sequence.
 *
 * Segments are classified by prefix, first match wins:
 * `:` param, `**` multi-segment wildcard, `*.` extension, `*` single-segment wildcard,
 * anything else is a literal. Empty segments are dropped, so `/`, `""` and `//`
 * all compile to an empty sequence.
 *
 * The result and every token in it are frozen. Compiling the same string twice
 * yields structurally equal sequences.
 *
 * @param pattern - Route pattern, e.g. `/users/:id/files/**path`
 * @returns The compiled token sequence
 * @throws {PatternError} When a segment is malformed or a capture name repeats
 *
 * @example
 * ```typescript
 * compilePattern("/img/*.{jpg, png}");
 * // [{ kind: "literal", text: "img" }, { kind: "extension", extensions: ["jpg", "png"] }]
 * ```
 */
export function compilePattern(pattern: string): CompiledPattern {
	const segments = splitPath(pattern);
	const tokens: Token[] = [];
	const bound = new Set<string>();

	for (let i = 0; i < segments.length; i++) {
		const token = classifySegment(pattern, segments[i], i);

		const name = tokenName(token);
		if (name !== undefined) {
			if (bound.has(name)) {
				throw new PatternError(pattern, i, "DUPLICATE_PARAM", name);
			}
			bound.add(name);
		}

		tokens.push(Object.freeze(token));
	}

	return Object.freeze(tokens);
}

function classifySegment(pattern: string, segment: string, index: number): Token {
	if (segment.startsWith(":")) {
		const name = segment.slice(1);
		if (name === "") throw new PatternError(pattern, index, "EMPTY_PARAM_NAME");
		return { kind: "param", name: checkName(pattern, index, name) };
	}

	if (segment.startsWith("**")) {
		const name = segment.slice(2);
		return name === "" ? { kind: "multi-wildcard" } : { kind: "multi-wildcard", name: checkName(pattern, index, name) };
	}

	if (segment.startsWith("*.")) {
		return { kind: "extension", extensions: parseExtensions(pattern, index, segment.slice(2)) };
	}

	if (segment.startsWith("*")) {
		const name = segment.slice(1);
		return name === "" ? { kind: "single-wildcard" } : { kind: "single-wildcard", name: checkName(pattern, index, name) };
	}

	return { kind: "literal", text: segment };
}

function checkName(pattern: string, index: number, name: string): string {
	if (!NAME_PATTERN.test(name)) {
		throw new PatternError(pattern, index, "INVALID_NAME", name);
	}
	return name;
}

/**
 * Parses the text after `*.`: either a single extension or a `{a, b}` list.
 */
function parseExtensions(pattern: string, index: number, suffix: string): readonly string[] {
	if (suffix === "") throw new PatternError(pattern, index, "EMPTY_EXTENSION");

	if (!suffix.startsWith("{")) {
		if (suffix.includes("{") || suffix.includes("}")) {
			throw new PatternError(pattern, index, "UNTERMINATED_BRACE", suffix);
		}
		return Object.freeze([suffix]);
	}

	const inner = suffix.slice(1, -1);
	if (!suffix.endsWith("}") || suffix.length < 2 || inner.includes("{") || inner.includes("}")) {
		throw new PatternError(pattern, index, "UNTERMINATED_BRACE", suffix);
	}
	if (inner.trim() === "") throw new PatternError(pattern, index, "EMPTY_EXTENSION_LIST");

	const extensions = inner.split(",").map((ext) => ext.trim());
	if (extensions.includes("")) {
		throw new PatternError(pattern, index, "EMPTY_EXTENSION", suffix);
	}
	return Object.freeze(extensions);
}

/**
 * Name a token binds, or `undefined` for literals, extensions and anonymous wildcards.
 */
export function tokenName(token: Token): string | undefined {
	switch (token.kind) {
		case "param":
		case "single-wildcard":
		case "multi-wildcard":
			return token.name;
		default:
			return undefined;
	}
}

/**
 * Names bound by a pattern, in order of appearance.
 */
export function paramNames(tokens: CompiledPattern): string[] {
	const names: string[] = [];
	for (const token of tokens) {
		const name = tokenName(token);
		if (name !== undefined) names.push(name);
	}
	return names;
}

/**
 * Structural equality of two compiled patterns.
 */
export function patternsEqual(a: CompiledPattern, b: CompiledPattern): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (!tokensEqual(a[i], b[i])) return false;
	}
	return true;
}

function tokensEqual(a: Token, b: Token): boolean {
	switch (a.kind) {
		case "literal":
			return b.kind === "literal" && a.text === b.text;
		case "param":
			return b.kind === "param" && a.name === b.name;
		case "single-wildcard":
			return b.kind === "single-wildcard" && a.name === b.name;
		case "multi-wildcard":
			return b.kind === "multi-wildcard" && a.name === b.name;
		case "extension":
			return b.kind === "extension" && sameExtensions(a, b);
	}
}

function sameExtensions(a: ExtensionToken, b: ExtensionToken): boolean {
	return a.extensions.length === b.extensions.length && a.extensions.every((ext, i) => ext === b.extensions[i]);
}

/**
 * Canonical text of a compiled pattern.
 *
 * @example
 * ```typescript
 * formatPattern(compilePattern("//users/:id/*.{ jpg ,png}/")); // "/users/:id/*.{jpg,png}"
 * ```
 */
export function formatPattern(tokens: CompiledPattern): string {
	return "/" + tokens.map(formatToken).join("/");
}

function formatToken(token: Token): string {
	switch (token.kind) {
		case "literal":
			return token.text;
		case "param":
			return `:${token.name}`;
		case "single-wildcard":
			return `*${token.name ?? ""}`;
		case "multi-wildcard":
			return `**${token.name ?? ""}`;
		case "extension":
			return token.extensions.length === 1 ? `*.${token.extensions[0]}` : `*.{${token.extensions.join(",")}}`;
	}
}

/**
 * Checks a token sequence built outside `compilePattern()` and returns a frozen copy.
 *
 * The tokens are formatted and compiled again. Every token must come back unchanged,
 * so a literal that would read as a capture, a name with illegal characters or a
 * repeated capture name is rejected.
 *
 * @throws {PatternError} When the tokens are not what their pattern text compiles to
 */
export function normalizePattern(tokens: CompiledPattern): CompiledPattern {
	const text = formatPattern(tokens);
	const compiled = compilePattern(text);
	if (patternsEqual(compiled, tokens)) return compiled;

	let segment = 0;
	while (segment < tokens.length && segment < compiled.length && tokensEqual(tokens[segment], compiled[segment])) segment++;
	throw new PatternError(text, segment, "NON_CANONICAL_TOKEN");
}

/**
 * Texts of the leading literal tokens.
 *
 * @example
 * ```typescript
 * staticPrefix(compilePattern("/api/v1/:id/raw")); // ["api", "v1"]
 * ```
 */
export function staticPrefix(tokens: CompiledPattern): string[] {
	const prefix: string[] = [];
	for (const token of tokens) {
		if (token.kind !== "literal") break;
		prefix.push(token.text);
	}
	return prefix;
}

/**
 * Fewest and most path segments a pattern can consume.
 * `max` is `Infinity` when the pattern contains a multi-segment wildcard.
 */
export function segmentBounds(tokens: CompiledPattern): { min: number; max: number } {
	let min = 0;
	let unbounded = false;
	for (const token of tokens) {
		if (token.kind === "multi-wildcard") unbounded = true;
		else min++;
	}
	return { min, max: unbounded ? Infinity : min };
}
