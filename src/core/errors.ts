// CHANGE: Typed failure ADT for reconciliation using Effect.Data
// WHY: Failures are values converted into exists/codeMatches flags, never runtime exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * URI cannot be mapped to a local file (malformed or non-file scheme).
 *
 * @pure true (Data class)
 * @invariant uri.length ≥ 0
 */
export class UnresolvedFile extends Data.TaggedError("UnresolvedFile")<{
	readonly uri: string;
	readonly reason: string;
}> {}

/**
 * Filesystem read or UTF-8 decode failure.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Range lies outside the file or is malformed.
 *
 * @pure true (Data class)
 * @invariant lineCount ≥ 0
 */
export class InvalidRange extends Data.TaggedError("InvalidRange")<{
	readonly detail: string;
	readonly lineCount: number;
}> {}

/**
 * Taint location without a file path to compare against.
 */
export class MissingSourcePath extends Data.TaggedError("MissingSourcePath")<{
	readonly message: string;
}> {}

/**
 * Reasons a file handle cannot produce code for a comparison.
 */
export type ContentError = UnresolvedFile | FSError | InvalidRange;

/**
 * Configuration file present but unreadable or invalid.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Input payload unreadable, not JSON, or not one of the known issue shapes.
 *
 * @pure true (Data class)
 */
export class InputError extends Data.TaggedError("InputError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Errors surfaced by the CLI application layer.
 */
export type AppError = ConfigError | InputError;
