// CHANGE: Pure drift counters over a built display issue
// WHY: The printer and exit-code decision need aggregate facts, not per-location walks
// PURITY: CORE
// INVARIANT: existing + missing = locations ∧ matching ≤ existing
// COMPLEXITY: O(n) where n = total locations

import { pipe } from "effect";

import type { DisplayIssue, DriftSummary, Location } from "../types/locations.js";
import type { IssueSourceKind } from "../types/sources.js";

const allLocations = (issue: DisplayIssue): readonly Location[] =>
	issue.flows.flatMap((flow) => flow.locations);

/**
 * Count locations, existing, matching and missing ones across all flows.
 *
 * @pure true
 * @example
 * ```ts
 * summarizeDrift(issue); // { locations: 3, existing: 2, matching: 2, missing: 1 }
 * ```
 */
export const summarizeDrift = (issue: DisplayIssue): DriftSummary =>
	pipe(allLocations(issue), (locations) =>
		locations.reduce<DriftSummary>(
			(acc, location) => ({
				locations: acc.locations + 1,
				existing: acc.existing + (location.exists ? 1 : 0),
				matching: acc.matching + (location.codeMatches ? 1 : 0),
				missing: acc.missing + (location.exists ? 0 : 1),
			}),
			{ locations: 0, existing: 0, matching: 0, missing: 0 },
		),
	);

/**
 * Whether the issue no longer reflects the code on disk.
 *
 * Live locations are never compared, so only missing files count for them.
 * For remote requests a stale root range counts as drift too.
 *
 * @pure true
 */
export function hasDrift(
	kind: IssueSourceKind,
	issue: DisplayIssue,
	summary: DriftSummary = summarizeDrift(issue),
): boolean {
	if (summary.missing > 0) return true;
	if (kind === "live") return false;
	if (kind === "remote" && !issue.codeMatches) return true;
	return summary.matching < summary.existing;
}
