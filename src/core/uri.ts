// CHANGE: Pure URI helpers for workspace-relative taint paths and display paths
// WHY: Path joining is the only resolution policy CORE applies; no filesystem access
// PURITY: CORE
// INVARIANT: joinWorkspaceUri never inserts a doubled separator
// COMPLEXITY: O(n) where n = |uri|

/**
 * Display string for a location whose file path is unknown.
 */
export const MISSING_FILE_PLACEHOLDER = "Could not locate file";

/**
 * Join a workspace folder URI with a workspace-relative path.
 *
 * Segments of the relative path are percent-encoded, so `#`, `?` and `%`
 * in file names stay part of the path.
 *
 * @pure true
 * @postcondition joinWorkspaceUri("file:///ws", "src/a.py") = "file:///ws/src/a.py"
 * @complexity O(n)
 */
export function joinWorkspaceUri(
	workspaceFolderUri: string,
	relativePath: string,
): string {
	const base = workspaceFolderUri.replace(/\/+$/u, "");
	const rel = relativePath
		.replace(/\\/gu, "/")
		.replace(/^\/+/u, "")
		.split("/")
		.map(encodeURIComponent)
		.join("/");
	return `${base}/${rel}`;
}

/**
 * Decoded path component of a URI, or null when it cannot be parsed.
 *
 * @pure true
 * @example
 * ```ts
 * uriPath("file:///tmp/my%20file.ts"); // "/tmp/my file.ts"
 * ```
 */
export function uriPath(uri: string): string | null {
	let pathname: string;
	try {
		pathname = new URL(uri).pathname;
	} catch {
		return null;
	}
	try {
		return decodeURIComponent(pathname);
	} catch {
		// malformed percent-escape; keep the raw path for display
		return pathname;
	}
}
