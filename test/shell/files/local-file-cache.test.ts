// CHANGE: Tests for the filesystem-backed file cache
// WHY: Failures must surface as handles, and each URI must be loaded once per pass

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { FileHandle } from "../../../src/core/files/content.js";
import {
	createLocalFileCache,
	loadLocalFile,
} from "../../../src/shell/files/local-file-cache.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

describe("loadLocalFile", () => {
	let project: TempProject;

	beforeEach(() => {
		project = createTempProject({ "a.py": "x = 1\r\ny = 2\n" });
	});

	afterEach(() => {
		project.cleanup();
	});

	it("reads a file as lines", () => {
		const uri = project.uri("a.py");
		expect(loadLocalFile(uri)).toEqual({
			_tag: "Readable",
			uri,
			lines: ["x = 1", "y = 2"],
		});
	});

	it("reports a missing file as unreadable", () => {
		expect(loadLocalFile(project.uri("gone.py"))).toMatchObject({
			_tag: "Unreadable",
			error: { _tag: "FS" },
		});
	});

	it("reports invalid UTF-8 as unreadable", () => {
		project.write("latin1.txt", new Uint8Array([0x63, 0x61, 0x66, 0xe9]));
		expect(loadLocalFile(project.uri("latin1.txt"))._tag).toBe("Unreadable");
	});

	it("reports a directory as unreadable", () => {
		project.write("pkg/mod.py", "");
		expect(loadLocalFile(project.uri("pkg"))._tag).toBe("Unreadable");
	});

	it("reports a non-file URI as unresolved", () => {
		expect(loadLocalFile("http://example.invalid/a.py")).toMatchObject({
			_tag: "Unresolved",
			uri: "http://example.invalid/a.py",
			error: { _tag: "UnresolvedFile" },
		});
	});
});

describe("createLocalFileCache", () => {
	const countingLoader = () => {
		const calls: string[] = [];
		const loader = (uri: string): FileHandle => {
			calls.push(uri);
			return uri.endsWith("gone.py")
				? loadLocalFile("http://example.invalid/gone.py")
				: { _tag: "Readable", uri, lines: ["x"] };
		};
		return { calls, loader };
	};

	it("loads each URI at most once", () => {
		const { calls, loader } = countingLoader();
		const cache = createLocalFileCache(loader);
		const first = cache.resolve("file:///ws/a.py");
		const second = cache.resolve("file:///ws/a.py");
		cache.resolve("file:///ws/b.py");
		expect(second).toBe(first);
		expect(calls).toEqual(["file:///ws/a.py", "file:///ws/b.py"]);
		expect(cache.size()).toBe(2);
	});

	it("lists failed handles in load order", () => {
		const { loader } = countingLoader();
		const cache = createLocalFileCache(loader);
		cache.resolve("file:///ws/a.py");
		cache.resolve("file:///ws/gone.py");
		cache.resolve("file:///ws/gone.py");
		expect(cache.failures().map((handle) => handle._tag)).toEqual(["Unresolved"]);
	});

	it("keeps caches independent", () => {
		const { calls, loader } = countingLoader();
		createLocalFileCache(loader).resolve("file:///ws/a.py");
		createLocalFileCache(loader).resolve("file:///ws/a.py");
		expect(calls).toHaveLength(2);
	});
});
