// CHANGE: Public API entry point for library consumers
// WHY: Export CORE builders and types plus the default SHELL wiring; keep CLI internals private
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are pure functions, typed interfaces or explicit SHELL factories
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	DisplayIssue,
	DriftSummary,
	Flow,
	IssueSource,
	IssueSourceKind,
	LiveFlow,
	LiveInputFile,
	LiveIssue,
	LiveIssueLocation,
	Location,
	RemoteFlow,
	RemoteLocation,
	ShowIssueRequest,
	TaintFlow,
	TaintLocation,
	TaintVulnerability,
	TextRange,
	TextRangeWithHash,
} from "./core/types/index.js";
export type { ExitCode } from "./core/models.js";
export {
	type ContentError,
	FSError,
	InvalidRange,
	MissingSourcePath,
	UnresolvedFile,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Build the show-all-locations parameter for any issue source.
 *
 * @example
 * ```typescript
 * import { buildDisplayIssue, createLocalReconcileContext } from "location-drift";
 *
 * const context = createLocalReconcileContext({ basePath: "/ws" });
 * const issue = buildDisplayIssue({ kind: "remote", request, connectionId: null }, context);
 * issue.codeMatches; // false once the recorded snippet drifted
 * ```
 */
export {
	buildDisplayIssue,
	buildDisplayIssues,
	formatCreationDate,
	fromLiveIssue,
	fromShowIssueRequest,
	fromTaintVulnerability,
} from "./core/locations/display.js";
export { liveFlow, remoteFlow, taintFlow } from "./core/locations/flows.js";
export {
	compareRecorded,
	type DriftFacts,
	fromLiveLocation,
	fromRemoteLocation,
	fromTaintLocation,
} from "./core/locations/normalize.js";
export type {
	CodeDigest,
	IdePathResolver,
	ReconcileContext,
} from "./core/locations/context.js";
export { hasDrift, summarizeDrift } from "./core/locations/summary.js";
export {
	codeAt,
	extractRange,
	type FileContentCache,
	type FileHandle,
	rangeContent,
	splitLines,
	wholeContent,
} from "./core/files/content.js";
export {
	SHOW_ALL_LOCATIONS_COMMAND,
	type ShowAllLocationsCommand,
	toShowAllLocationsCommand,
} from "./core/commands.js";
export { joinWorkspaceUri, MISSING_FILE_PLACEHOLDER } from "./core/uri.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL DEFAULTS (filesystem, digest, input decoding)
// ═══════════════════════════════════════════════════════════════════════════════

export { createLocalReconcileContext } from "./shell/context.js";
export {
	createLocalFileCache,
	type LocalFileCache,
	loadLocalFile,
} from "./shell/files/local-file-cache.js";
export { md5WithoutWhitespace } from "./shell/digest/md5.js";
export { ideFilePathResolver } from "./shell/paths/ide-path.js";
export { decodeInput, type SourceDefaults } from "./shell/input/decode.js";

// ═══════════════════════════════════════════════════════════════════════════════
// APP
// ═══════════════════════════════════════════════════════════════════════════════

export { runShowAllLocations } from "./app/showAllLocations.js";
export { main } from "./main.js";
