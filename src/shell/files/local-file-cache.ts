// CHANGE: Filesystem-backed FileContentCache scoped to one reconciliation pass
// WHY: Flows often revisit the same file; each distinct URI is loaded at most once per pass
// PURITY: SHELL
// EFFECT: blocking fs reads, failures returned as FileHandle values
// INVARIANT: Never throws upstream; resolve(u) calls the loader at most once per cache instance
// COMPLEXITY: O(1) amortized per lookup, O(n) for the first load of a file of size n

import { Either, pipe } from "effect";

import { FSError, UnresolvedFile } from "../../core/errors.js";
import {
	type FileContentCache,
	type FileHandle,
	splitLines,
} from "../../core/files/content.js";
import { fileURLToPath, fs } from "../utils/node-mods.js";

export type FileLoader = (uri: string) => FileHandle;

export type FailedFileHandle = Exclude<FileHandle, { readonly _tag: "Readable" }>;

export interface LocalFileCache extends FileContentCache {
	/** Number of distinct URIs loaded so far. */
	readonly size: () => number;
	/** Handles that could not be resolved or read, in load order. */
	readonly failures: () => readonly FailedFileHandle[];
}

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Read a file as strictly decoded UTF-8; throws on read or decode failure.
 *
 * @pure false (filesystem read)
 */
export const readUtf8File = (localPath: string): string =>
	utf8.decode(fs.readFileSync(localPath));

/**
 * Load a `file:` URI as lines of strictly decoded UTF-8.
 *
 * @pure false (filesystem read)
 * @postcondition malformed or non-file URIs ⇒ Unresolved; read/decode failure ⇒ Unreadable
 */
export function loadLocalFile(uri: string): FileHandle {
	const filePath = Either.try({
		try: () => fileURLToPath(uri),
		catch: (error) => new UnresolvedFile({ uri, reason: errorMessage(error) }),
	});
	if (Either.isLeft(filePath)) {
		return { _tag: "Unresolved", uri, error: filePath.left };
	}
	const localPath = filePath.right;
	return pipe(
		Either.try({
			try: () => readUtf8File(localPath),
			catch: (error) =>
				new FSError({ detail: errorMessage(error), path: localPath }),
		}),
		Either.match({
			onLeft: (error): FileHandle => ({ _tag: "Unreadable", uri, error }),
			onRight: (text): FileHandle => ({
				_tag: "Readable",
				uri,
				lines: splitLines(text),
			}),
		}),
	);
}

const isFailed = (handle: FileHandle): handle is FailedFileHandle =>
	handle._tag !== "Readable";

/**
 * Create a memoizing cache for one pass (a request or a batch).
 *
 * @param loader - Loads a handle on first lookup; defaults to the local filesystem
 *
 * @example
 * ```ts
 * const cache = createLocalFileCache();
 * cache.resolve("file:///ws/src/a.py"); // reads the file
 * cache.resolve("file:///ws/src/a.py"); // memoized handle
 * ```
 */
export function createLocalFileCache(
	loader: FileLoader = loadLocalFile,
): LocalFileCache {
	const handles = new Map<string, FileHandle>();
	return {
		resolve: (uri) => {
			const cached = handles.get(uri);
			if (cached !== undefined) return cached;
			const handle = loader(uri);
			handles.set(uri, handle);
			return handle;
		},
		size: () => handles.size,
		failures: () => [...handles.values()].filter(isFailed),
	};
}
