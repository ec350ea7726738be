// CHANGE: File handle port and pure code extraction over file lines
// WHY: CORE compares code without touching the filesystem; SHELL provides handles through FileContentCache
// PURITY: CORE
// INVARIANT: Extraction never throws; out-of-bounds ranges are InvalidRange values
// COMPLEXITY: O(k) where k = number of lines spanned by the range

import { Either } from "effect";
import { match } from "ts-pattern";

import {
	type ContentError,
	type FSError,
	InvalidRange,
	type UnresolvedFile,
} from "../errors.js";
import { isWholeFile, type TextRange } from "../types/text-range.js";

/**
 * Result of resolving a URI through the cache.
 */
export type FileHandle =
	| {
			readonly _tag: "Readable";
			readonly uri: string;
			readonly lines: readonly string[];
	  }
	| {
			readonly _tag: "Unreadable";
			readonly uri: string;
			readonly error: FSError;
	  }
	| {
			readonly _tag: "Unresolved";
			readonly uri: string;
			readonly error: UnresolvedFile;
	  };

/**
 * Request-scoped memoizing resolver of file URIs.
 *
 * @invariant resolve(u) is loaded at most once per cache instance
 */
export interface FileContentCache {
	readonly resolve: (uri: string) => FileHandle;
}

/**
 * Split text into lines the way line-oriented readers do.
 *
 * @pure true
 * @invariant a trailing terminator does not yield an extra empty line
 * @complexity O(n)
 *
 * @example
 * ```ts
 * splitLines("a\r\nb\n"); // ["a", "b"]
 * ```
 */
export function splitLines(text: string): readonly string[] {
	if (text.length === 0) return [];
	const lines = text.split(/\r\n|\n|\r/u);
	const last = lines.at(-1);
	if (last === "") lines.pop();
	return lines;
}

function handleLines(
	handle: FileHandle,
): Either.Either<readonly string[], ContentError> {
	return match<FileHandle, Either.Either<readonly string[], ContentError>>(
		handle,
	)
		.with({ _tag: "Readable" }, (h) => Either.right(h.lines))
		.with({ _tag: "Unreadable" }, (h) => Either.left(h.error))
		.with({ _tag: "Unresolved" }, (h) => Either.left(h.error))
		.exhaustive();
}

/**
 * Entire file content, lines joined with "\n".
 *
 * @pure true
 * @complexity O(n)
 */
export function wholeContent(
	handle: FileHandle,
): Either.Either<string, ContentError> {
	return Either.map(handleLines(handle), (lines) => lines.join("\n"));
}

const outOfBounds = (detail: string, lineCount: number): InvalidRange =>
	new InvalidRange({ detail, lineCount });

/**
 * Extract code spanned by a range from file lines.
 *
 * The end offset is clamped to the end line length; every other bound must
 * hold exactly.
 *
 * @pure true
 * @precondition 1 ≤ startLine ≤ endLine ≤ lines.length
 * @postcondition multi-line results are joined with "\n"
 * @complexity O(endLine - startLine)
 */
export function extractRange(
	lines: readonly string[],
	range: TextRange,
): Either.Either<string, InvalidRange> {
	const { startLine, startLineOffset, endLine, endLineOffset } = range;
	const lineCount = lines.length;
	if (startLine < 1 || endLine < startLine || endLine > lineCount) {
		return Either.left(
			outOfBounds(`lines ${startLine}-${endLine} outside 1-${lineCount}`, lineCount),
		);
	}
	if (startLineOffset < 0 || endLineOffset < 0) {
		return Either.left(outOfBounds("negative offset", lineCount));
	}

	const first = lines[startLine - 1] ?? "";
	const last = lines[endLine - 1] ?? "";
	const end = Math.min(endLineOffset, last.length);
	if (startLineOffset > first.length) {
		return Either.left(
			outOfBounds(
				`offset ${startLineOffset} beyond line ${startLine} length ${first.length}`,
				lineCount,
			),
		);
	}

	if (startLine === endLine) {
		if (startLineOffset > end) {
			return Either.left(
				outOfBounds(`offset ${startLineOffset} after end ${end}`, lineCount),
			);
		}
		return Either.right(first.slice(startLineOffset, end));
	}

	const middle = lines.slice(startLine, endLine - 1);
	return Either.right(
		[first.slice(startLineOffset), ...middle, last.slice(0, end)].join("\n"),
	);
}

/**
 * Range-bounded content of a resolved file.
 *
 * @pure true
 */
export function rangeContent(
	handle: FileHandle,
	range: TextRange,
): Either.Either<string, ContentError> {
	return Either.flatMap(handleLines(handle), (lines) =>
		extractRange(lines, range),
	);
}

/**
 * Code a recorded range refers to: whole file for the 0/0 sentinel,
 * range-bounded extraction otherwise.
 *
 * @pure true
 * @invariant isWholeFile(range) ⇒ result = wholeContent(handle)
 */
export function codeAt(
	handle: FileHandle,
	range: TextRange,
): Either.Either<string, ContentError> {
	return isWholeFile(range)
		? wholeContent(handle)
		: rangeContent(handle, range);
}
