// CHANGE: Input shapes of the three issue sources as a tagged union
// WHY: The three constructors share nothing but their output; dispatch on `kind` instead of a base class
// PURITY: CORE
// INVARIANT: Every IssueSource carries exactly the context its normalizer path needs
// COMPLEXITY: O(1)

import type { TextRange, TextRangeWithHash } from "./text-range.js";

/**
 * File handed over by the live analysis. `contents` may throw on I/O failure.
 */
export interface LiveInputFile {
	readonly uri: string;
	readonly contents: () => string;
}

export interface LiveIssueLocation {
	readonly inputFile: LiveInputFile | null;
	readonly textRange: TextRange | null;
	readonly message: string;
}

export interface LiveFlow {
	readonly locations: readonly LiveIssueLocation[];
}

/**
 * Issue raised by an analysis that just ran on the local files.
 */
export interface LiveIssue {
	readonly inputFile: LiveInputFile | null;
	readonly message: string;
	readonly severity: string;
	readonly ruleKey: string;
	readonly textRange: TextRange | null;
	readonly flows: readonly LiveFlow[];
}

/**
 * Location as delivered by a remote "show issue" request.
 *
 * @property ideFilePath Path relative to the IDE workspace
 * @property codeSnippet Code at the range when the issue was detected
 */
export interface RemoteLocation {
	readonly ideFilePath: string;
	readonly textRange: TextRange | null;
	readonly codeSnippet: string;
	readonly message: string;
}

export interface RemoteFlow {
	readonly locations: readonly RemoteLocation[];
}

export interface ShowIssueRequest {
	readonly ideFilePath: string;
	readonly message: string;
	readonly ruleKey: string;
	readonly textRange: TextRange;
	readonly codeSnippet: string;
	readonly creationDate: string | null;
	readonly flows: readonly RemoteFlow[];
}

/**
 * Taint flow location. Only the hash of the recorded code is known.
 */
export interface TaintLocation {
	readonly filePath: string | null;
	readonly textRange: TextRangeWithHash | null;
	readonly message: string;
}

export interface TaintFlow {
	readonly locations: readonly TaintLocation[];
}

export interface TaintVulnerability {
	readonly ideFilePath: string;
	readonly message: string;
	readonly severity: string;
	readonly ruleKey: string;
	readonly textRange: TextRangeWithHash;
	readonly introductionDate: Date;
	readonly flows: readonly TaintFlow[];
}

/**
 * Issue together with the context its source shape needs.
 */
export type IssueSource =
	| { readonly kind: "live"; readonly issue: LiveIssue }
	| {
			readonly kind: "remote";
			readonly request: ShowIssueRequest;
			readonly connectionId: string | null;
	  }
	| {
			readonly kind: "taint";
			readonly taint: TaintVulnerability;
			readonly workspaceFolderUri: string;
			readonly connectionId: string | null;
	  };

export type IssueSourceKind = IssueSource["kind"];
