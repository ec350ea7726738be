import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	codeAt,
	extractRange,
	type FileHandle,
	rangeContent,
	splitLines,
	wholeContent,
} from "../../../src/core/files/content.js";
import { FSError, UnresolvedFile } from "../../../src/core/errors.js";
import { getLeft, getRight, range } from "../../utils/builders.js";

const LINES = ["import os", "def foo():", "    return 1"] as const;

const readable = (lines: readonly string[]): FileHandle => ({
	_tag: "Readable",
	uri: "file:///ws/a.py",
	lines,
});

describe("splitLines", () => {
	it("splits on every line terminator", () => {
		expect(splitLines("a\r\nb\nc\rd")).toEqual(["a", "b", "c", "d"]);
	});

	it("drops a single trailing terminator", () => {
		expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
		expect(splitLines("a\n\n")).toEqual(["a", ""]);
	});

	it("returns no lines for empty text", () => {
		expect(splitLines("")).toEqual([]);
	});
});

describe("extractRange", () => {
	it("extracts a single-line range", () => {
		expect(getRight(extractRange(LINES, range(2, 0, 2, 10)))).toBe("def foo():");
		expect(getRight(extractRange(LINES, range(2, 4, 2, 7)))).toBe("foo");
	});

	it("joins a multi-line range with newlines", () => {
		expect(getRight(extractRange(LINES, range(1, 7, 3, 5)))).toBe(
			"os\ndef foo():\n    r",
		);
	});

	it("clamps the end offset to the end line length", () => {
		expect(getRight(extractRange(LINES, range(2, 4, 2, 100)))).toBe("foo():");
	});

	it("accepts an empty range at the end of a line", () => {
		expect(getRight(extractRange(LINES, range(1, 9, 1, 9)))).toBe("");
	});

	it("rejects lines past the end of the file", () => {
		const error = getLeft(extractRange(LINES, range(4, 0, 4, 1)));
		expect(error._tag).toBe("InvalidRange");
		expect(error.lineCount).toBe(3);
		expect(error.detail).toBe("lines 4-4 outside 1-3");
	});

	it("rejects line zero and inverted line spans", () => {
		expect(getLeft(extractRange(LINES, range(0, 0, 0, 0)))._tag).toBe(
			"InvalidRange",
		);
		expect(getLeft(extractRange(LINES, range(3, 0, 2, 0)))._tag).toBe(
			"InvalidRange",
		);
	});

	it("rejects a start offset beyond the start line", () => {
		expect(getLeft(extractRange(LINES, range(1, 10, 2, 3))).detail).toBe(
			"offset 10 beyond line 1 length 9",
		);
	});

	it("rejects a start offset after the end offset on one line", () => {
		expect(getLeft(extractRange(LINES, range(2, 5, 2, 2))).detail).toBe(
			"offset 5 after end 2",
		);
	});

	it("rejects negative offsets", () => {
		expect(getLeft(extractRange(LINES, range(1, -1, 1, 2))).detail).toBe(
			"negative offset",
		);
	});

	it("spanning a whole file reproduces its joined content", () => {
		fc.assert(
			fc.property(fc.array(fc.string(), { minLength: 1 }), (lines) => {
				const last = lines[lines.length - 1] ?? "";
				const whole = extractRange(
					lines,
					range(1, 0, lines.length, last.length),
				);
				expect(getRight(whole)).toBe(lines.join("\n"));
			}),
		);
	});
});

describe("content of file handles", () => {
	it("joins whole content with newlines", () => {
		expect(getRight(wholeContent(readable(LINES)))).toBe(
			"import os\ndef foo():\n    return 1",
		);
	});

	it("surfaces the handle error for unreadable and unresolved files", () => {
		const unreadable: FileHandle = {
			_tag: "Unreadable",
			uri: "file:///ws/gone.py",
			error: new FSError({ detail: "ENOENT" }),
		};
		const unresolved: FileHandle = {
			_tag: "Unresolved",
			uri: "http://example.invalid/a.py",
			error: new UnresolvedFile({ uri: "http://example.invalid/a.py", reason: "not a file URI" }),
		};
		expect(getLeft(wholeContent(unreadable))._tag).toBe("FS");
		expect(getLeft(rangeContent(unresolved, range(1, 0, 1, 1)))._tag).toBe(
			"UnresolvedFile",
		);
	});

	it("treats the 0/0 range as the whole file", () => {
		expect(getRight(codeAt(readable(["a", "b"]), range(0, 0, 0, 0)))).toBe(
			"a\nb",
		);
	});

	it("extracts ranges for any other range", () => {
		expect(getRight(codeAt(readable(LINES), range(1, 0, 1, 6)))).toBe("import");
	});

	it("does not treat a range with only one zero line as whole file", () => {
		expect(getLeft(codeAt(readable(LINES), range(0, 0, 1, 3)))._tag).toBe(
			"InvalidRange",
		);
	});
});
