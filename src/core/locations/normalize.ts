// CHANGE: Three source-specific constructors of the canonical Location
// WHY: Live, remote and taint locations carry different evidence (file handle, snippet, hash)
// PURITY: CORE
// INVARIANT: codeMatches ⇒ exists; live locations always exist and never compare
// COMPLEXITY: O(k) per location where k = lines spanned by its range

import { Either, pipe } from "effect";

import { FSError, MissingSourcePath } from "../errors.js";
import {
	codeAt,
	type FileHandle,
	splitLines,
	wholeContent,
} from "../files/content.js";
import type { Location } from "../types/locations.js";
import type {
	LiveInputFile,
	LiveIssueLocation,
	RemoteLocation,
	TaintLocation,
} from "../types/sources.js";
import { type TextRange, withHash } from "../types/text-range.js";
import {
	joinWorkspaceUri,
	MISSING_FILE_PLACEHOLDER,
	uriPath,
} from "../uri.js";
import type { CodeDigest, ReconcileContext } from "./context.js";

/**
 * Existence and match facts for one recorded anchor.
 */
export interface DriftFacts {
	readonly exists: boolean;
	readonly codeMatches: boolean;
}

/**
 * Compare recorded code against the current content of a file.
 *
 * A null range only checks that the file is readable and never matches.
 *
 * @pure true
 * @invariant result.codeMatches ⇒ result.exists
 * @complexity O(k)
 */
export function compareRecorded(
	handle: FileHandle,
	range: TextRange | null,
	matches: (localCode: string) => boolean,
): DriftFacts {
	const local = range === null ? wholeContent(handle) : codeAt(handle, range);
	return Either.match(local, {
		onLeft: () => ({ exists: false, codeMatches: false }),
		onRight: (code) => ({
			exists: true,
			codeMatches: range !== null && matches(code),
		}),
	});
}

const errorDetail = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

function liveRangeHash(
	inputFile: LiveInputFile | null,
	range: TextRange,
	digest: CodeDigest,
): string {
	if (inputFile === null) return "";
	return pipe(
		Either.try({
			try: () => inputFile.contents(),
			catch: (error) =>
				new FSError({ detail: errorDetail(error), path: inputFile.uri }),
		}),
		Either.flatMap((text) =>
			codeAt(
				{ _tag: "Readable", uri: inputFile.uri, lines: splitLines(text) },
				range,
			),
		),
		Either.match({ onLeft: () => "", onRight: digest }),
	);
}

/**
 * Location reported by a live analysis.
 *
 * The code was just analysed, so the location exists by definition; the
 * range is annotated with the digest of its current code for later reuse.
 * Read failures degrade to an empty hash.
 *
 * @pure false (invokes inputFile.contents)
 * @postcondition exists = true ∧ codeMatches = false
 */
export function fromLiveLocation(
	location: LiveIssueLocation,
	digest: CodeDigest,
): Location {
	const { inputFile, textRange } = location;
	const uri = inputFile === null ? null : inputFile.uri;
	return {
		uri,
		filePath: uri === null ? null : uriPath(uri),
		message: location.message,
		textRange:
			textRange === null
				? null
				: withHash(textRange, liveRangeHash(inputFile, textRange, digest)),
		exists: true,
		codeMatches: false,
	};
}

/**
 * Location from a remote "show issue" request: compare the embedded snippet
 * with the local code by exact string equality.
 *
 * @pure true (given a pure cache)
 * @invariant codeMatches ⇒ exists
 */
export function fromRemoteLocation(
	location: RemoteLocation,
	context: ReconcileContext,
): Location {
	const uri = context.resolveIdePath(location.ideFilePath);
	const { textRange, codeSnippet } = location;
	const facts = compareRecorded(
		context.cache.resolve(uri),
		textRange,
		(localCode) => localCode === codeSnippet,
	);
	return {
		uri,
		filePath: uri,
		message: location.message,
		textRange:
			textRange === null
				? null
				: withHash(textRange, context.digest(codeSnippet)),
		exists: facts.exists,
		codeMatches: facts.codeMatches,
	};
}

const taintLocationUri = (
	location: TaintLocation,
	workspaceFolderUri: string,
): Either.Either<string, MissingSourcePath> =>
	location.filePath === null
		? Either.left(new MissingSourcePath({ message: location.message }))
		: Either.right(joinWorkspaceUri(workspaceFolderUri, location.filePath));

/**
 * Taint flow location: compare the digest of the local code with the
 * recorded hash, since the original snippet was never transmitted.
 *
 * @pure true (given a pure cache)
 * @postcondition filePath = null ⇒ uri = null ∧ exists = false
 */
export function fromTaintLocation(
	location: TaintLocation,
	workspaceFolderUri: string,
	context: ReconcileContext,
): Location {
	const { textRange } = location;
	return Either.match(taintLocationUri(location, workspaceFolderUri), {
		onLeft: (): Location => ({
			uri: null,
			filePath: MISSING_FILE_PLACEHOLDER,
			message: location.message,
			textRange,
			exists: false,
			codeMatches: false,
		}),
		onRight: (uri): Location => {
			const facts = compareRecorded(
				context.cache.resolve(uri),
				textRange,
				(localCode) =>
					textRange !== null && textRange.hash === context.digest(localCode),
			);
			return {
				uri,
				filePath: location.filePath,
				message: location.message,
				textRange,
				exists: facts.exists,
				codeMatches: facts.codeMatches,
			};
		},
	});
}
