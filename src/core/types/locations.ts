// CHANGE: Display-side output model for the "show all locations" command
// WHY: One immutable shape regardless of which source produced the issue
// PURITY: CORE
// INVARIANT: codeMatches ⇒ exists; flows mirror source order and count
// COMPLEXITY: O(1)

import type { TextRange, TextRangeWithHash } from "./text-range.js";

/**
 * Single anchor of an issue in a file.
 *
 * @property uri Resolved file URI or null when the file could not be located
 * @property filePath Display string for the file (placeholder when uri is null)
 * @property textRange Recorded range with hash, null for whole-file locations
 * @property exists Whether the file and range could be resolved now
 * @property codeMatches Whether the current code equals the recorded code
 */
export interface Location {
	readonly uri: string | null;
	readonly filePath: string | null;
	readonly message: string;
	readonly textRange: TextRangeWithHash | null;
	readonly exists: boolean;
	readonly codeMatches: boolean;
}

/**
 * Ordered path through the code. Ordering is meaningful and preserved.
 */
export interface Flow {
	readonly locations: readonly Location[];
}

/**
 * Root parameter of the show-all-locations command.
 *
 * `connectionId` and `creationDate` are omitted when the source does not
 * supply them; consumers branch on their presence.
 */
export interface DisplayIssue {
	readonly fileUri: string | null;
	readonly message: string;
	readonly severity: string;
	readonly ruleKey: string;
	readonly textRange: TextRange | null;
	readonly flows: readonly Flow[];
	readonly connectionId?: string;
	readonly creationDate?: string;
	readonly codeMatches: boolean;
}

/**
 * Location counters across all flows of one issue.
 */
export interface DriftSummary {
	readonly locations: number;
	readonly existing: number;
	readonly matching: number;
	readonly missing: number;
}
