// CHANGE: Explicit request-scoped dependencies for normalization
// WHY: Cache, digest and IDE path translation are injected per request; nothing is global
// PURITY: CORE (structural interface only)
// INVARIANT: One context ⇔ one reconciliation pass or batch
// COMPLEXITY: O(1)

import type { FileContentCache } from "../files/content.js";

/**
 * Stable digest of a code fragment. Deterministic for identical input.
 */
export type CodeDigest = (code: string) => string;

/**
 * Translate an IDE-relative path into a file URI.
 */
export type IdePathResolver = (ideFilePath: string) => string;

export interface ReconcileContext {
	readonly cache: FileContentCache;
	readonly digest: CodeDigest;
	readonly resolveIdePath: IdePathResolver;
}
