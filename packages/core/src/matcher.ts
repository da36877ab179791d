import { safeDecode, splitPath } from "./path";
import type { Binding, CompiledPattern, MultiWildcardToken, ParameterBinding, Token } from "./types";

/**
 * Hooks for observing a match.
 */
export interface MatchOptions {
	/**
	 * Called with each capture a multi-segment wildcard tries, in the order tried.
	 */
	onCapture?: (token: MultiWildcardToken, capture: readonly string[]) => void;
}

/** Per-call matcher state. */
interface MatchState {
	tokens: CompiledPattern;
	segments: readonly string[];
	/** Fixed-width tokens at or after each token index */
	minRest: number[];
	/** Whether a multi-segment wildcard appears at or after each token index */
	openRest: boolean[];
	/** `(token index, segment index)` pairs already known not to match */
	failed: Set<number>;
	/** `(multi-wildcard index, segment index)` pairs where ending the capture there or later never matches */
	exhausted: Set<number>;
	onCapture?: MatchOptions["onCapture"];
}

/** A capture as a `[start, end)` range of segments, joined once the match succeeds. */
type Capture = readonly [name: string, start: number, end: number];

const EMPTY_BINDING: ParameterBinding = Object.freeze([]);

/**
 * Matches path segments against a compiled pattern.
 *
 * Fixed-width tokens consume one segment each. A `**` token is lazy: it first tries to
 * capture nothing, then grows its capture one segment at a time until the rest of the
 * pattern matches the rest of the path. A `**` in last position takes every remaining
 * segment at once. The match succeeds only when tokens and segments run out together.
 *
 * @param tokens - Compiled pattern
 * @param segments - Non-empty path segments, as produced by `splitPath()`
 * @returns Captures in pattern order, or `null` when the path does not match
 *
 * @example
 * ```typescript
 * matchTokens(compilePattern("/files/**dir/*.{jpg,png}"), ["files", "a", "b", "cat.jpg"]);
 * // [["dir", "a/b"]]
 * ```
 */
export function matchTokens(tokens: CompiledPattern, segments: readonly string[], options: MatchOptions = {}): ParameterBinding | null {
	if (tokens.length === 0) {
		return segments.length === 0 ? EMPTY_BINDING : null;
	}

	const minRest = new Array<number>(tokens.length + 1);
	const openRest = new Array<boolean>(tokens.length + 1);
	minRest[tokens.length] = 0;
	openRest[tokens.length] = false;
	for (let i = tokens.length - 1; i >= 0; i--) {
		const isMulti = tokens[i].kind === "multi-wildcard";
		minRest[i] = minRest[i + 1] + (isMulti ? 0 : 1);
		openRest[i] = openRest[i + 1] || isMulti;
	}

	const state: MatchState = {
		tokens,
		segments,
		minRest,
		openRest,
		failed: new Set(),
		exhausted: new Set(),
		onCapture: options.onCapture,
	};

	const captures: Capture[] = [];
	if (!step(state, 0, 0, captures)) return null;
	return Object.freeze(captures.map(([name, start, end]): Binding => [name, segments.slice(start, end).join("/")]));
}

/**
 * Splits `path` and matches it against `tokens`.
 */
export function matchPath(tokens: CompiledPattern, path: string, options?: MatchOptions): ParameterBinding | null {
	return matchTokens(tokens, splitPath(path), options);
}

function step(state: MatchState, ti: number, si: number, out: Capture[]): boolean {
	const remaining = state.segments.length - si;
	if (remaining < state.minRest[ti]) return false;
	if (!state.openRest[ti] && remaining !== state.minRest[ti]) return false;
	if (ti === state.tokens.length) return true;

	const key = ti * (state.segments.length + 1) + si;
	if (state.failed.has(key)) return false;

	const token = state.tokens[ti];
	const mark = out.length;
	const matched = token.kind === "multi-wildcard" ? stepMulti(state, token, ti, si, out) : matchSegment(token, state.segments[si], si, out) && step(state, ti + 1, si + 1, out);

	if (!matched) {
		out.length = mark;
		state.failed.add(key);
	}
	return matched;
}

function stepMulti(state: MatchState, token: MultiWildcardToken, ti: number, si: number, out: Capture[]): boolean {
	const { segments } = state;

	if (ti === state.tokens.length - 1) {
		state.onCapture?.(token, segments.slice(si));
		if (token.name !== undefined) out.push([token.name, si, segments.length]);
		return true;
	}

	// Whether the rest matches from an end position does not depend on where the capture
	// started, so an end already exhausted by an earlier start ends this loop too.
	// Each end position is tried at most once per token across the whole match.
	const width = segments.length + 1;
	const last = segments.length - state.minRest[ti + 1];
	let end = si;
	for (; end <= last; end++) {
		if (state.exhausted.has(ti * width + end)) break;
		state.onCapture?.(token, segments.slice(si, end));

		const mark = out.length;
		if (token.name !== undefined) out.push([token.name, si, end]);
		if (step(state, ti + 1, end, out)) return true;
		out.length = mark;
	}

	for (let i = si; i < end; i++) {
		state.exhausted.add(ti * width + i);
	}
	return false;
}

/**
 * Matches one fixed-width token against one segment, appending its capture.
 */
function matchSegment(token: Exclude<Token, MultiWildcardToken>, segment: string, si: number, out: Capture[]): boolean {
	switch (token.kind) {
		case "literal":
			return segment === token.text;
		case "param":
			if (segment === "") return false;
			out.push([token.name, si, si + 1]);
			return true;
		case "single-wildcard":
			if (segment === "") return false;
			if (token.name !== undefined) out.push([token.name, si, si + 1]);
			return true;
		case "extension":
			return segment !== "" && token.extensions.some((ext) => segment.endsWith("." + ext));
	}
}

/**
 * Converts ordered captures into an object keyed by name.
 *
 * @param bindings - Captures from `matchTokens()`
 * @param decode - URI-decode each value
 */
export function bindingsToRecord(bindings: ParameterBinding, decode = false): Record<string, string> {
	const params: Record<string, string> = {};
	for (const [name, value] of bindings) {
		params[name] = decode ? safeDecode(value) : value;
	}
	return params;
}
