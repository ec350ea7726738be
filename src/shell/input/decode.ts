// CHANGE: Decode CLI input payloads into CORE issue sources
// WHY: Envelope fields override CLI/config defaults; live files become lazily read input files
// PURITY: SHELL
// EFFECT: Either<DecodedInput, InputError> (decoding itself is synchronous)
// INVARIANT: Order of envelopes in a batch is preserved
// COMPLEXITY: O(n) where n = payload size

import { Either, pipe, Schema } from "effect";
import { match } from "ts-pattern";

import { InputError } from "../../core/errors.js";
import type {
	IssueSource,
	LiveInputFile,
	LiveIssue,
} from "../../core/types/index.js";
import { readUtf8File } from "../files/local-file-cache.js";
import { fileURLToPath } from "../utils/node-mods.js";
import {
	type Envelope,
	type InputPayload,
	InputPayloadSchema,
	type LiveIssuePayload,
} from "./schema.js";

/**
 * Values applied when an envelope does not carry its own.
 */
export interface SourceDefaults {
	readonly connectionId: string | null;
	readonly workspaceFolderUri: string | null;
}

export interface DecodedInput {
	readonly sources: readonly IssueSource[];
	/** True when the payload was an array; output mirrors the input shape. */
	readonly batch: boolean;
}

export type InputFileFactory = (uri: string) => LiveInputFile;

/**
 * Input file that reads the disk each time its contents are requested.
 *
 * @pure false
 * @postcondition contents() throws on unreadable or invalid UTF-8 files, as the file cache reports them
 */
export const localInputFile: InputFileFactory = (uri) => ({
	uri,
	contents: () => readUtf8File(fileURLToPath(uri)),
});

function toLiveIssue(
	payload: LiveIssuePayload,
	inputFile: InputFileFactory,
): LiveIssue {
	const fileOf = (uri: string | null): LiveInputFile | null =>
		uri === null ? null : inputFile(uri);
	return {
		inputFile: fileOf(payload.fileUri),
		message: payload.message,
		severity: payload.severity,
		ruleKey: payload.ruleKey,
		textRange: payload.textRange,
		flows: payload.flows.map((flow) => ({
			locations: flow.locations.map((location) => ({
				inputFile: fileOf(location.fileUri),
				textRange: location.textRange,
				message: location.message,
			})),
		})),
	};
}

function toIssueSource(
	envelope: Envelope,
	index: number,
	path: string,
	defaults: SourceDefaults,
	inputFile: InputFileFactory,
): Either.Either<IssueSource, InputError> {
	return match<Envelope, Either.Either<IssueSource, InputError>>(envelope)
		.with({ kind: "live" }, ({ issue }) =>
			Either.right<IssueSource>({ kind: "live", issue: toLiveIssue(issue, inputFile) }),
		)
		.with({ kind: "remote" }, ({ request, connectionId }) =>
			Either.right<IssueSource>({
				kind: "remote",
				request,
				connectionId: connectionId ?? defaults.connectionId,
			}),
		)
		.with({ kind: "taint" }, ({ taint, connectionId, workspaceFolderUri }) => {
			const workspace = workspaceFolderUri ?? defaults.workspaceFolderUri;
			return workspace === null
				? Either.left(
						new InputError({
							path,
							detail: `taint issue #${index} needs a workspace folder URI (--workspace)`,
						}),
					)
				: Either.right<IssueSource>({
						kind: "taint",
						taint,
						workspaceFolderUri: workspace,
						connectionId: connectionId ?? defaults.connectionId,
					});
		})
		.exhaustive();
}

const isBatch = (payload: InputPayload): payload is readonly Envelope[] =>
	Array.isArray(payload);

const decodePayload = Schema.decodeUnknownEither(
	Schema.parseJson(InputPayloadSchema),
);

/**
 * Decode the text of an input file.
 *
 * @param text - Raw JSON text
 * @param path - File the text came from, for error reporting
 *
 * @example
 * ```ts
 * decodeInput('{"kind":"remote","request":{...}}', "issue.json", defaults);
 * // Either.right({ sources: [{ kind: "remote", ... }], batch: false })
 * ```
 */
export function decodeInput(
	text: string,
	path: string,
	defaults: SourceDefaults,
	inputFile: InputFileFactory = localInputFile,
): Either.Either<DecodedInput, InputError> {
	return pipe(
		decodePayload(text),
		Either.mapLeft((error) => new InputError({ path, detail: error.message })),
		Either.flatMap((payload) => {
			const batch = isBatch(payload);
			const envelopes = batch ? payload : [payload];
			return pipe(
				Either.all(
					envelopes.map((envelope, index) =>
						toIssueSource(envelope, index, path, defaults, inputFile),
					),
				),
				Either.map((sources) => ({ sources, batch })),
			);
		}),
	);
}
