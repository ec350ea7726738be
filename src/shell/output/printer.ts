// CHANGE: Console output of reconciled issues
// WHY: Printing is a SHELL concern; CORE provides the command envelopes and summary lines
// PURITY: SHELL
// EFFECT: writes to the provided sink (console.log by default)
// INVARIANT: JSON output mirrors the input shape (single object or batch array)
// COMPLEXITY: O(n) where n = serialized payload size

import type { ShowAllLocationsCommand } from "../../core/commands.js";
import { formatDriftSummary } from "../../core/format/drift.js";
import type { DisplayIssue, IssueSourceKind } from "../../core/types/index.js";
import type { FailedFileHandle } from "../files/local-file-cache.js";

export type LineSink = (line: string) => void;

const consoleSink: LineSink = (line) => {
	console.log(line);
};

/**
 * Serialize command envelopes; absent optional fields are omitted.
 *
 * @pure true
 */
export function formatCommandsJson(
	commands: readonly ShowAllLocationsCommand[],
	batch: boolean,
	compact: boolean,
): string {
	const payload = batch ? commands : commands[0];
	return JSON.stringify(payload ?? null, null, compact ? undefined : 2);
}

export function printCommands(
	commands: readonly ShowAllLocationsCommand[],
	options: { readonly batch: boolean; readonly compact: boolean },
	sink: LineSink = consoleSink,
): void {
	sink(formatCommandsJson(commands, options.batch, options.compact));
}

export interface ReportedIssue {
	readonly kind: IssueSourceKind;
	readonly issue: DisplayIssue;
}

/**
 * Human-readable summary of every issue, then the files that could not be read.
 */
export function printDriftSummary(
	issues: readonly ReportedIssue[],
	failures: readonly FailedFileHandle[],
	sink: LineSink = consoleSink,
): void {
	for (const { kind, issue } of issues) {
		for (const line of formatDriftSummary(kind, issue)) sink(line);
	}
	for (const failure of failures) {
		console.warn(
			`⚠️  Unable to read ${failure.uri}: ${failure._tag === "Unresolved" ? failure.error.reason : failure.error.detail}`,
		);
	}
	if (issues.length === 0) {
		sink("✅ No issues in input");
	}
}
