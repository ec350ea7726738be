// CHANGE: Application layer orchestration for one CLI run
// WHY: APP composes SHELL I/O (config, input, files) with the pure CORE builder
// PURITY: APP (no process.exit; returns ExitCode as value)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: One fresh file cache per run, shared by every issue of a batch
// COMPLEXITY: O(n) where n = total locations across the input

import { Effect, Either } from "effect";

import {
	type ShowAllLocationsCommand,
	toShowAllLocationsCommand,
} from "../core/commands.js";
import { computeExitCode } from "../core/decision.js";
import { type AppError, InputError } from "../core/errors.js";
import { buildDisplayIssue } from "../core/locations/display.js";
import { hasDrift } from "../core/locations/summary.js";
import type { ExitCode } from "../core/models.js";
import type { IssueSource } from "../core/types/index.js";
import {
	type CLIOptions,
	loadConfigFile,
	resolveSettings,
	type Settings,
} from "../shell/config/index.js";
import { createLocalReconcileContext } from "../shell/context.js";
import type { FailedFileHandle } from "../shell/files/local-file-cache.js";
import {
	type DecodedInput,
	decodeInput,
	type InputFileFactory,
	localInputFile,
} from "../shell/input/decode.js";
import {
	type LineSink,
	printCommands,
	printDriftSummary,
	type ReportedIssue,
} from "../shell/output/printer.js";
import { fs, path } from "../shell/utils/node-mods.js";

export const USAGE =
	"Usage: location-drift <input.json> [--workspace <uri>] [--base <dir>] [--connection <id>] [--config <file>] [--summary] [--compact] [--fail-on-drift]";

/**
 * Outcome of reconciling one decoded input.
 */
export interface Reconciliation {
	readonly commands: readonly ShowAllLocationsCommand[];
	readonly reported: readonly ReportedIssue[];
	readonly failures: readonly FailedFileHandle[];
	readonly hasDrift: boolean;
}

/**
 * Reconcile decoded sources against the local files with one shared cache.
 *
 * @pure false (reads files)
 * @invariant commands[i] describes sources[i]
 */
export function reconcileSources(
	sources: readonly IssueSource[],
	settings: Settings,
): Reconciliation {
	const context = createLocalReconcileContext({ basePath: settings.basePath });
	const reported = sources.map(
		(source): ReportedIssue => ({
			kind: source.kind,
			issue: buildDisplayIssue(source, context),
		}),
	);
	return {
		commands: reported.map(({ issue }) => toShowAllLocationsCommand(issue)),
		reported,
		failures: context.cache.failures(),
		hasDrift: reported.some(({ kind, issue }) => hasDrift(kind, issue)),
	};
}

function readInput(
	inputPath: string,
	settings: Settings,
	inputFile: InputFileFactory,
): Effect.Effect<DecodedInput, InputError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(inputPath, "utf8"),
		catch: (error) =>
			new InputError({
				path: inputPath,
				detail: error instanceof Error ? error.message : String(error),
			}),
	}).pipe(
		Effect.flatMap((text) =>
			Either.match(
				decodeInput(
					text,
					inputPath,
					{
						connectionId: settings.connectionId,
						workspaceFolderUri: settings.workspaceFolderUri,
					},
					inputFile,
				),
				{
					onLeft: (error) => Effect.fail(error),
					onRight: (decoded) => Effect.succeed(decoded),
				},
			),
		),
	);
}

const reportError = (error: AppError): void => {
	console.error(`❌ ${error._tag} (${error.path}): ${error.detail}`);
};

export interface RunOptions {
	readonly cwd?: string;
	readonly sink?: LineSink;
	readonly inputFile?: InputFileFactory;
}

/**
 * Orchestrates a run and returns the exit code as a value.
 *
 * @param cliOptions - Parsed CLI options
 * @returns Effect<ExitCode, never>; errors are reported and mapped to 1
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @postcondition input/config error → 1; drift → 1 only with --fail-on-drift
 */
export function runShowAllLocations(
	cliOptions: CLIOptions,
	runOptions: RunOptions = {},
): Effect.Effect<ExitCode, never> {
	const cwd = runOptions.cwd ?? process.cwd();
	const { inputPath } = cliOptions;
	if (inputPath === null) {
		console.error(USAGE);
		return Effect.succeed<ExitCode>(1);
	}

	return Effect.gen(function* () {
		const configFile = yield* loadConfigFile(
			path.resolve(cwd, cliOptions.configPath),
		);
		const settings = resolveSettings(cliOptions, configFile, cwd);
		const decoded = yield* readInput(
			path.resolve(cwd, inputPath),
			settings,
			runOptions.inputFile ?? localInputFile,
		);
		const result = reconcileSources(decoded.sources, settings);

		if (cliOptions.summary) {
			printDriftSummary(result.reported, result.failures, runOptions.sink);
		} else {
			printCommands(
				result.commands,
				{ batch: decoded.batch, compact: cliOptions.compact },
				runOptions.sink,
			);
		}

		return computeExitCode({
			hasInputErrors: false,
			hasDrift: result.hasDrift,
			failOnDrift: cliOptions.failOnDrift,
		});
	}).pipe(
		Effect.catchAll((error) => {
			reportError(error);
			return Effect.succeed(
				computeExitCode({
					hasInputErrors: true,
					hasDrift: false,
					failOnDrift: cliOptions.failOnDrift,
				}),
			);
		}),
	);
}
