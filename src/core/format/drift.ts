// CHANGE: Pure text rendering of reconciled issues for terminal output
// WHY: Formatting stays deterministic in CORE; SHELL only prints the lines
// PURITY: CORE
// INVARIANT: One line per location, flows in source order
// COMPLEXITY: O(n) where n = total locations

import { match } from "ts-pattern";

import { summarizeDrift } from "../locations/summary.js";
import {
	type DisplayIssue,
	type IssueSourceKind,
	isWholeFile,
	type Location,
	type TextRange,
} from "../types/index.js";

/**
 * Status marker of a location.
 *
 * @pure true
 * @invariant missing → "✗", matching → "✓", live (never compared) → "•", otherwise "~"
 */
export function locationStatus(
	kind: IssueSourceKind,
	location: Location,
): "✗" | "✓" | "•" | "~" {
	return match({ kind, exists: location.exists, matches: location.codeMatches })
		.with({ exists: false }, () => "✗" as const)
		.with({ matches: true }, () => "✓" as const)
		.with({ kind: "live" }, () => "•" as const)
		.otherwise(() => "~" as const);
}

/**
 * "startLine:startOffset-endLine:endOffset", or "file" for whole-file anchors.
 *
 * @pure true
 */
export function formatRange(range: TextRange | null): string {
	if (range === null || isWholeFile(range)) {
		return "file";
	}
	return `${range.startLine}:${range.startLineOffset}-${range.endLine}:${range.endLineOffset}`;
}

/**
 * Render one issue as summary lines.
 *
 * @pure true
 * @example
 * ```ts
 * formatDriftSummary("remote", issue);
 * // ["[remote] py:S1 Unused variable", "  file:///ws/a.py 2:0-2:10 root code matches: yes", ...]
 * ```
 */
export function formatDriftSummary(
	kind: IssueSourceKind,
	issue: DisplayIssue,
): readonly string[] {
	const summary = summarizeDrift(issue);
	const rootMatch =
		kind === "remote"
			? ` root code matches: ${issue.codeMatches ? "yes" : "no"}`
			: "";
	const lines: string[] = [
		`[${kind}] ${issue.ruleKey} ${issue.message}`,
		`  ${issue.fileUri ?? "<no file>"} ${formatRange(issue.textRange)}${rootMatch}`,
	];
	issue.flows.forEach((flow, index) => {
		lines.push(`  flow ${index + 1} (${flow.locations.length} locations)`);
		for (const location of flow.locations) {
			lines.push(
				`    ${locationStatus(kind, location)} ${location.filePath ?? "<no file>"} ${formatRange(location.textRange)} ${location.message}`,
			);
		}
	});
	lines.push(
		`  ${summary.locations} locations, ${summary.existing} existing, ${summary.matching} matching, ${summary.missing} missing`,
	);
	return lines;
}
