// CHANGE: Central export file for CORE type definitions
// WHY: Single import point for the model shared by CORE, SHELL and APP
// PURITY: CORE (re-exports only)

export type {
	DisplayIssue,
	DriftSummary,
	Flow,
	Location,
} from "./locations.js";
export type {
	IssueSource,
	IssueSourceKind,
	LiveFlow,
	LiveInputFile,
	LiveIssue,
	LiveIssueLocation,
	RemoteFlow,
	RemoteLocation,
	ShowIssueRequest,
	TaintFlow,
	TaintLocation,
	TaintVulnerability,
} from "./sources.js";
export type { TextRange, TextRangeWithHash } from "./text-range.js";
export { isWholeFile, withHash, withoutHash } from "./text-range.js";
