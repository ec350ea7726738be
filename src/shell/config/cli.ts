// CHANGE: CLI argument parsing for the location-drift command
// WHY: Keep argv handling out of APP orchestration
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Unknown flags are ignored; the last positional argument is the input file
// COMPLEXITY: O(n) where n = |args|

import { DEFAULT_CONFIG_FILE, type CLIOptions } from "./types.js";

interface ArgProcessResult {
	readonly state: CLIOptions;
	readonly skipNext: boolean;
}

// CHANGE: Handlers for flags taking a value
// WHY: Lookup table keeps processArgument free of branching per flag
type ValueFlagHandler = (state: CLIOptions, value: string) => CLIOptions;

const valueHandlers: Readonly<Record<string, ValueFlagHandler | undefined>> = {
	"--workspace": (state, value) => ({ ...state, workspaceFolderUri: value }),
	"--base": (state, value) => ({ ...state, basePath: value }),
	"--connection": (state, value) => ({ ...state, connectionId: value }),
	"--config": (state, value) => ({ ...state, configPath: value }),
};

type BooleanFlagHandler = (state: CLIOptions) => CLIOptions;

const booleanHandlers: Readonly<
	Record<string, BooleanFlagHandler | undefined>
> = {
	"--summary": (state) => ({ ...state, summary: true }),
	"--compact": (state) => ({ ...state, compact: true }),
	"--fail-on-drift": (state) => ({ ...state, failOnDrift: true }),
};

function processArgument(
	arg: string,
	next: string | undefined,
	state: CLIOptions,
): ArgProcessResult {
	const valueHandler = valueHandlers[arg];
	if (valueHandler !== undefined) {
		// a value flag at the end of argv has nothing to consume
		if (next === undefined) return { state, skipNext: false };
		return { state: valueHandler(state, next), skipNext: true };
	}

	const booleanHandler = booleanHandlers[arg];
	if (booleanHandler !== undefined) {
		return { state: booleanHandler(state), skipNext: false };
	}

	if (!arg.startsWith("--")) {
		return { state: { ...state, inputPath: arg }, skipNext: false };
	}

	return { state, skipNext: false };
}

/**
 * Parse command-line arguments.
 *
 * @param args - Arguments after the executable and script names
 *
 * @example
 * ```ts
 * // Command: location-drift issue.json --workspace file:///ws --summary
 * const options = parseCLIArgs();
 * // Returns: { inputPath: "issue.json", workspaceFolderUri: "file:///ws", summary: true, ... }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state: CLIOptions = {
		inputPath: null,
		configPath: DEFAULT_CONFIG_FILE,
		summary: false,
		compact: false,
		failOnDrift: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args.at(i + 1), state);
		state = result.state;
		if (result.skipNext) {
			i++;
		}
	}

	return state;
}
