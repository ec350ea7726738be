// CHANGE: Wire the default SHELL implementations into a ReconcileContext
// WHY: Callers get a fresh request-scoped cache without knowing the individual pieces
// PURITY: SHELL
// INVARIANT: Every call returns a new cache; nothing is shared between contexts
// COMPLEXITY: O(1)

import type { ReconcileContext } from "../core/locations/context.js";
import { md5WithoutWhitespace } from "./digest/md5.js";
import {
	createLocalFileCache,
	type FileLoader,
	type LocalFileCache,
} from "./files/local-file-cache.js";
import { ideFilePathResolver } from "./paths/ide-path.js";

export interface LocalContextOptions {
	readonly basePath?: string;
	readonly loader?: FileLoader;
}

export interface LocalReconcileContext extends ReconcileContext {
	readonly cache: LocalFileCache;
}

export function createLocalReconcileContext(
	options: LocalContextOptions = {},
): LocalReconcileContext {
	return {
		cache: createLocalFileCache(options.loader),
		digest: md5WithoutWhitespace,
		resolveIdePath: ideFilePathResolver(options.basePath),
	};
}
