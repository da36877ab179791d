/**
 * Base class for errors raised while building routes.
 */
export class RouterError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Reasons a pattern is rejected at registration time.
 */
export type PatternErrorCode = "EMPTY_PARAM_NAME" | "INVALID_NAME" | "EMPTY_EXTENSION" | "EMPTY_EXTENSION_LIST" | "UNTERMINATED_BRACE" | "DUPLICATE_PARAM" | "NON_CANONICAL_TOKEN";

const MESSAGES: Record<PatternErrorCode, string> = {
	EMPTY_PARAM_NAME: "parameter name is empty",
	INVALID_NAME: "capture names may only contain letters, digits, '_', '$' and '-'",
	EMPTY_EXTENSION: "extension is empty",
	EMPTY_EXTENSION_LIST: "extension list is empty",
	UNTERMINATED_BRACE: "extension list must be a single '{...}' group",
	DUPLICATE_PARAM: "capture name is already bound earlier in the pattern",
	NON_CANONICAL_TOKEN: "token does not compile back from its pattern text",
};

/**
 * Thrown by `compilePattern()` for a malformed route pattern.
 *
 * @example
 * ```typescript
 * try {
 *   compilePattern("/img/*.{}");
 * } catch (err) {
 *   if (err instanceof PatternError) {
 *     err.code;    // "EMPTY_EXTENSION_LIST"
 *     err.segment; // 1
 *   }
 * }
 * ```
 */
export class PatternError extends RouterError {
	constructor(
		public readonly pattern: string,
		public readonly segment: number,
		public readonly code: PatternErrorCode,
		public readonly detail?: string
	) {
		super(`Invalid route pattern "${pattern}" at segment ${segment}: ${MESSAGES[code]}${detail ? ` (${detail})` : ""}`);
	}
}
