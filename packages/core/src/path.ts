/**
 * Splits a path into its non-empty segments.
 * Leading, trailing and repeated slashes carry no meaning.
 *
 * @example
 * ```typescript
 * splitPath("/a//b///"); // ["a", "b"]
 * splitPath("/");        // []
 * ```
 */
export function splitPath(path: string): string[] {
	return path.split("/").filter(Boolean);
}

/**
 * Extracts the pathname and raw query string from a request URL.
 * Handles both absolute and relative URLs; the fragment is dropped.
 *
 * @example
 * ```typescript
 * parsePathname("https://example.com/users/42?tab=posts#top");
 * // { pathname: "/users/42", search: "tab=posts" }
 * ```
 */
export function parsePathname(url: string): { pathname: string; search: string } {
	// Fast path: pathname-only URLs
	if (url[0] === "/" && !url.includes("?") && !url.includes("#")) {
		return { pathname: url, search: "" };
	}

	const queryStart = url.indexOf("?");
	const hashStart = url.indexOf("#");

	let pathnameEnd = url.length;
	if (queryStart !== -1) pathnameEnd = Math.min(pathnameEnd, queryStart);
	if (hashStart !== -1) pathnameEnd = Math.min(pathnameEnd, hashStart);

	let pathname: string;
	const protocolEnd = url.indexOf("://");
	if (protocolEnd !== -1 && protocolEnd < pathnameEnd) {
		// Absolute URL: first '/' after the host
		const pathStart = url.indexOf("/", protocolEnd + 3);
		pathname = pathStart !== -1 && pathStart < pathnameEnd ? url.slice(pathStart, pathnameEnd) : "/";
	} else {
		pathname = url.slice(0, pathnameEnd) || "/";
	}

	let search = "";
	if (queryStart !== -1 && (hashStart === -1 || queryStart < hashStart)) {
		search = url.slice(queryStart + 1, hashStart !== -1 ? hashStart : url.length);
	}

	return { pathname, search };
}

/**
 * Joins path pieces into a single path with one slash between them.
 *
 * @example
 * ```typescript
 * joinPaths("/api/", "/v1", "users/"); // "/api/v1/users"
 * joinPaths("", "users", ":id");       // "/users/:id"
 * ```
 */
export function joinPaths(...paths: string[]): string {
	let result = "/";
	for (const p of paths) {
		if (!p || p === "/") continue;

		let start = 0;
		let end = p.length;
		if (p[0] === "/") start++;
		if (p[end - 1] === "/") end--;

		if (end > start) {
			if (result !== "/") result += "/";
			result += p.slice(start, end);
		}
	}
	return result;
}

/** `decodeURIComponent` that returns the input unchanged when it is malformed. */
export function safeDecode(segment: string): string {
	if (!segment.includes("%")) return segment;
	try {
		return decodeURIComponent(segment);
	} catch {
		return segment;
	}
}
