// CHANGE: Canonical text range model shared by all issue sources
// WHY: Live, remote and taint issues encode ranges differently; CORE works on one shape
// PURITY: CORE
// INVARIANT: Lines are 1-based, offsets 0-based; startLine = endLine = 0 means "whole file"
// COMPLEXITY: O(1)

/**
 * Range of code inside a file.
 *
 * @property startLine First line (1-based), 0 for the whole-file sentinel
 * @property startLineOffset Offset inside the first line (0-based)
 * @property endLine Last line (1-based), 0 for the whole-file sentinel
 * @property endLineOffset Offset inside the last line (exclusive)
 */
export interface TextRange {
	readonly startLine: number;
	readonly startLineOffset: number;
	readonly endLine: number;
	readonly endLineOffset: number;
}

/**
 * Text range annotated with the digest of the code it anchored.
 */
export interface TextRangeWithHash extends TextRange {
	readonly hash: string;
}

/**
 * Whole-file sentinel check.
 *
 * @pure true
 * @invariant result ⇒ comparison target is the entire file content
 * @complexity O(1)
 */
export function isWholeFile(range: TextRange): boolean {
	return range.startLine === 0 && range.endLine === 0;
}

export function withHash(range: TextRange, hash: string): TextRangeWithHash {
	return {
		startLine: range.startLine,
		startLineOffset: range.startLineOffset,
		endLine: range.endLine,
		endLineOffset: range.endLineOffset,
		hash,
	};
}

/**
 * Drop the hash so the range matches the plain root-level shape.
 *
 * @pure true
 * @complexity O(1)
 */
export function withoutHash(range: TextRangeWithHash): TextRange {
	return {
		startLine: range.startLine,
		startLineOffset: range.startLineOffset,
		endLine: range.endLine,
		endLineOffset: range.endLineOffset,
	};
}
