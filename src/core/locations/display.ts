// CHANGE: Display parameter builder for the three issue sources
// WHY: The editor renders one structure; provenance only decides how flags are computed
// PURITY: CORE
// INVARIANT: Root codeMatches is computed for remote requests only; live and taint leave it false
// COMPLEXITY: O(n) where n = total locations across flows

import { match } from "ts-pattern";

import type { DisplayIssue } from "../types/locations.js";
import type {
	IssueSource,
	LiveIssue,
	ShowIssueRequest,
	TaintVulnerability,
} from "../types/sources.js";
import { withoutHash } from "../types/text-range.js";
import { joinWorkspaceUri } from "../uri.js";
import type { ReconcileContext } from "./context.js";
import { liveFlow, remoteFlow, taintFlow } from "./flows.js";
import { compareRecorded } from "./normalize.js";

/**
 * Display parameter for an issue from a live analysis.
 *
 * @pure false (live locations read their input file)
 * @postcondition codeMatches = false; no connectionId or creationDate
 */
export function fromLiveIssue(
	issue: LiveIssue,
	context: ReconcileContext,
): DisplayIssue {
	return {
		fileUri: issue.inputFile === null ? null : issue.inputFile.uri,
		message: issue.message,
		severity: issue.severity,
		ruleKey: issue.ruleKey,
		textRange: issue.textRange,
		flows: issue.flows.map((flow) => liveFlow(flow, context.digest)),
		codeMatches: false,
	};
}

/**
 * Display parameter for a remote "show issue" request.
 *
 * The source supplies no severity. The root code match compares the
 * request snippet with the local code (whole file for the 0/0 sentinel) and
 * degrades to false on any failure.
 *
 * @pure true (given a pure cache)
 */
export function fromShowIssueRequest(
	request: ShowIssueRequest,
	connectionId: string | null,
	context: ReconcileContext,
): DisplayIssue {
	const fileUri = context.resolveIdePath(request.ideFilePath);
	const textRange = {
		startLine: request.textRange.startLine,
		startLineOffset: request.textRange.startLineOffset,
		endLine: request.textRange.endLine,
		endLineOffset: request.textRange.endLineOffset,
	};
	const root = compareRecorded(
		context.cache.resolve(fileUri),
		textRange,
		(localCode) => localCode === request.codeSnippet,
	);
	return {
		fileUri,
		message: request.message,
		severity: "",
		ruleKey: request.ruleKey,
		textRange,
		flows: request.flows.map((flow) => remoteFlow(flow, context)),
		...(connectionId === null ? {} : { connectionId }),
		...(request.creationDate === null
			? {}
			: { creationDate: request.creationDate }),
		codeMatches: root.codeMatches,
	};
}

/**
 * ISO-8601 UTC timestamp, or null for an invalid date.
 *
 * @pure true
 */
export function formatCreationDate(date: Date): string | null {
	return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Display parameter for a tracked taint vulnerability.
 *
 * Only flow locations carry match flags; the root flag stays false.
 *
 * @pure true (given a pure cache)
 * @postcondition fileUri = joinWorkspaceUri(workspaceFolderUri, taint.ideFilePath)
 */
export function fromTaintVulnerability(
	taint: TaintVulnerability,
	workspaceFolderUri: string,
	connectionId: string | null,
	context: ReconcileContext,
): DisplayIssue {
	// absent values are omitted from the payload, not serialized as null
	const creationDate = formatCreationDate(taint.introductionDate);
	return {
		fileUri: joinWorkspaceUri(workspaceFolderUri, taint.ideFilePath),
		message: taint.message,
		severity: taint.severity,
		ruleKey: taint.ruleKey,
		textRange: withoutHash(taint.textRange),
		flows: taint.flows.map((flow) =>
			taintFlow(flow, workspaceFolderUri, context),
		),
		...(connectionId === null ? {} : { connectionId }),
		...(creationDate === null ? {} : { creationDate }),
		codeMatches: false,
	};
}

/**
 * Build the display parameter for any issue source.
 *
 * @pure true (given a pure cache)
 * @invariant exhaustive over IssueSource["kind"]
 */
export function buildDisplayIssue(
	source: IssueSource,
	context: ReconcileContext,
): DisplayIssue {
	return match(source)
		.with({ kind: "live" }, ({ issue }) => fromLiveIssue(issue, context))
		.with({ kind: "remote" }, ({ request, connectionId }) =>
			fromShowIssueRequest(request, connectionId, context),
		)
		.with({ kind: "taint" }, ({ taint, workspaceFolderUri, connectionId }) =>
			fromTaintVulnerability(taint, workspaceFolderUri, connectionId, context),
		)
		.exhaustive();
}

/**
 * Build display parameters for a batch of issues over one shared context,
 * so each file is read at most once across the whole batch.
 *
 * @invariant result[i] = buildDisplayIssue(sources[i], context)
 */
export function buildDisplayIssues(
	sources: readonly IssueSource[],
	context: ReconcileContext,
): readonly DisplayIssue[] {
	return sources.map((source) => buildDisplayIssue(source, context));
}
