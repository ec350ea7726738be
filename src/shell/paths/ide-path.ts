// CHANGE: Translate IDE-relative paths of remote requests into file URIs
// WHY: Remote requests name files relative to the IDE workspace; CORE compares by URI
// PURITY: SHELL (depends on the process working directory by default)
// INVARIANT: Absolute paths ignore basePath; result always has the file: scheme
// COMPLEXITY: O(n) where n = |path|

import type { IdePathResolver } from "../../core/locations/context.js";
import { path, pathToFileURL } from "../utils/node-mods.js";

/**
 * Build a resolver that anchors relative IDE paths at `basePath`.
 *
 * @example
 * ```ts
 * ideFilePathResolver("/ws")("src/a.py"); // "file:///ws/src/a.py"
 * ```
 */
export function ideFilePathResolver(
	basePath: string = process.cwd(),
): IdePathResolver {
	return (ideFilePath) =>
		pathToFileURL(path.resolve(basePath, ideFilePath)).href;
}
