import { describe, expect, it } from "vitest";

import {
	liveFlow,
	remoteFlow,
	taintFlow,
} from "../../../src/core/locations/flows.js";
import { md5WithoutWhitespace } from "../../../src/shell/digest/md5.js";
import {
	A_PY,
	inputFile,
	memoryContext,
	range,
	remoteLocation,
	taintLocation,
	WS,
} from "../../utils/builders.js";

const files = {
	[`${WS}/a.py`]: A_PY,
	[`${WS}/c.py`]: "x = 1\n",
};

describe("flows", () => {
	it("keeps every location in order when the middle file is missing", () => {
		const flow = remoteFlow(
			{
				locations: [
					remoteLocation({ message: "source" }),
					remoteLocation({ ideFilePath: "b.py", message: "propagation" }),
					remoteLocation({
						ideFilePath: "c.py",
						textRange: range(1, 0, 1, 5),
						codeSnippet: "x = 1",
						message: "sink",
					}),
				],
			},
			memoryContext(files),
		);
		expect(
			flow.locations.map(({ message, exists, codeMatches }) => ({
				message,
				exists,
				codeMatches,
			})),
		).toEqual([
			{ message: "source", exists: true, codeMatches: true },
			{ message: "propagation", exists: false, codeMatches: false },
			{ message: "sink", exists: true, codeMatches: true },
		]);
	});

	it("resolves taint locations against the workspace folder", () => {
		const flow = taintFlow(
			{
				locations: [
					taintLocation(),
					taintLocation({ filePath: null, message: "unknown" }),
				],
			},
			WS,
			memoryContext(files),
		);
		expect(flow.locations.map((location) => location.uri)).toEqual([
			"file:///ws/a.py",
			null,
		]);
	});

	it("maps live locations one to one", () => {
		const flow = liveFlow(
			{
				locations: [
					{ inputFile: inputFile(`${WS}/a.py`, A_PY), textRange: null, message: "one" },
					{ inputFile: null, textRange: null, message: "two" },
				],
			},
			md5WithoutWhitespace,
		);
		expect(flow.locations.map((location) => location.message)).toEqual([
			"one",
			"two",
		]);
		expect(flow.locations.every((location) => location.exists)).toBe(true);
	});

	it("returns an empty flow for no locations", () => {
		expect(remoteFlow({ locations: [] }, memoryContext(files))).toEqual({
			locations: [],
		});
	});
});
