import { afterEach, describe, expect, it, vi } from "vitest";

import { toShowAllLocationsCommand } from "../../../src/core/commands.js";
import { FSError, UnresolvedFile } from "../../../src/core/errors.js";
import {
	formatCommandsJson,
	printCommands,
	printDriftSummary,
} from "../../../src/shell/output/printer.js";
import { displayIssue } from "../../utils/issues.js";

const issue = displayIssue({ textRange: null, message: "m", ruleKey: "r" });
const command = toShowAllLocationsCommand(issue);

describe("formatCommandsJson", () => {
	it("prints a single command as an object", () => {
		expect(JSON.parse(formatCommandsJson([command], false, true))).toEqual({
			command: "ShowAllLocations",
			arguments: [
				{
					fileUri: "file:///ws/a.py",
					message: "m",
					severity: "",
					ruleKey: "r",
					textRange: null,
					flows: [],
					codeMatches: true,
				},
			],
		});
	});

	it("prints a batch as an array", () => {
		const text = formatCommandsJson([command, command], true, true);
		expect(text.startsWith("[{")).toBe(true);
		expect(JSON.parse(text)).toHaveLength(2);
	});

	it("indents unless compact", () => {
		expect(formatCommandsJson([], true, false)).toBe("[]");
		expect(formatCommandsJson([command], false, false).split("\n")[1]).toBe(
			'  "command": "ShowAllLocations",',
		);
	});
});

describe("printers", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("writes commands to the sink", () => {
		const lines: string[] = [];
		printCommands([command], { batch: false, compact: true }, (line) => {
			lines.push(line);
		});
		expect(lines).toEqual([formatCommandsJson([command], false, true)]);
	});

	it("reports an empty input", () => {
		const lines: string[] = [];
		printDriftSummary([], [], (line) => {
			lines.push(line);
		});
		expect(lines).toEqual(["✅ No issues in input"]);
	});

	it("warns about files that could not be read", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const lines: string[] = [];
		printDriftSummary(
			[{ kind: "taint", issue }],
			[
				{ _tag: "Unreadable", uri: "file:///ws/gone.py", error: new FSError({ detail: "ENOENT" }) },
				{
					_tag: "Unresolved",
					uri: "ftp://host/a.py",
					error: new UnresolvedFile({ uri: "ftp://host/a.py", reason: "bad scheme" }),
				},
			],
			(line) => {
				lines.push(line);
			},
		);
		expect(lines[0]).toBe("[taint] r m");
		expect(warn.mock.calls).toEqual([
			["⚠️  Unable to read file:///ws/gone.py: ENOENT"],
			["⚠️  Unable to read ftp://host/a.py: bad scheme"],
		]);
	});
});
