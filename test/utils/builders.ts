// CHANGE: Centralize test builders for issue sources and in-memory file caches
// WHY: CORE tests run against the FileContentCache port without touching the disk

import { Either } from "effect";

import { FSError } from "../../src/core/errors.js";
import {
	type FileContentCache,
	type FileHandle,
	splitLines,
} from "../../src/core/files/content.js";
import type { ReconcileContext } from "../../src/core/locations/context.js";
import type {
	LiveInputFile,
	RemoteLocation,
	ShowIssueRequest,
	TaintLocation,
	TaintVulnerability,
	TextRange,
	TextRangeWithHash,
} from "../../src/core/types/index.js";
import { md5WithoutWhitespace } from "../../src/shell/digest/md5.js";

export const WS = "file:///ws";

export const A_PY = ["import os", "def foo():", "    return 1"].join("\n");

/** In-memory cache; URIs without text resolve as unreadable. */
export const memoryCache = (
	files: Readonly<Record<string, string>>,
): FileContentCache => ({
	resolve: (uri): FileHandle => {
		const text = files[uri];
		return text === undefined
			? {
					_tag: "Unreadable",
					uri,
					error: new FSError({ detail: "ENOENT", path: uri }),
				}
			: { _tag: "Readable", uri, lines: splitLines(text) };
	},
});

/** Context resolving IDE paths under file:///ws with the default digest. */
export const memoryContext = (
	files: Readonly<Record<string, string>>,
): ReconcileContext => ({
	cache: memoryCache(files),
	digest: md5WithoutWhitespace,
	resolveIdePath: (ideFilePath) => `${WS}/${ideFilePath}`,
});

export const range = (
	startLine: number,
	startLineOffset: number,
	endLine: number,
	endLineOffset: number,
): TextRange => ({ startLine, startLineOffset, endLine, endLineOffset });

export const hashedRange = (
	r: TextRange,
	hash: string,
): TextRangeWithHash => ({ ...r, hash });

export const inputFile = (uri: string, text: string): LiveInputFile => ({
	uri,
	contents: () => text,
});

export const failingInputFile = (uri: string): LiveInputFile => ({
	uri,
	contents: () => {
		throw new Error("EACCES: permission denied");
	},
});

export const remoteLocation = (
	over: Partial<RemoteLocation> = {},
): RemoteLocation => ({
	ideFilePath: "a.py",
	textRange: range(2, 0, 2, 10),
	codeSnippet: "def foo():",
	message: "remote location",
	...over,
});

export const showIssueRequest = (
	over: Partial<ShowIssueRequest> = {},
): ShowIssueRequest => ({
	ideFilePath: "a.py",
	message: "Rename this function",
	ruleKey: "python:S100",
	textRange: range(2, 0, 2, 10),
	codeSnippet: "def foo():",
	creationDate: "2024-03-01T10:00:00Z",
	flows: [],
	...over,
});

export const taintLocation = (
	over: Partial<TaintLocation> = {},
): TaintLocation => ({
	filePath: "a.py",
	textRange: hashedRange(range(2, 0, 2, 10), md5WithoutWhitespace("def foo():")),
	message: "taint step",
	...over,
});

export const taintVulnerability = (
	over: Partial<TaintVulnerability> = {},
): TaintVulnerability => ({
	ideFilePath: "src/a.py",
	message: "Change this code to not construct SQL queries from user data",
	severity: "MAJOR",
	ruleKey: "pythonsecurity:S3649",
	textRange: hashedRange(range(2, 0, 2, 10), "test-hash"),
	introductionDate: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
	flows: [],
	...over,
});

export const getRight = <A, E>(either: Either.Either<A, E>): A =>
	Either.getOrThrowWith(either, (error) => new Error(`expected Right, got ${String(error)}`));

export const getLeft = <A, E>(either: Either.Either<A, E>): E =>
	Either.getOrThrowWith(Either.flip(either), () => new Error("expected Left"));
