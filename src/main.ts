// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI options and delegates orchestration to app/showAllLocations
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runShowAllLocations } from "./app/showAllLocations.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	return Effect.runPromise(runShowAllLocations(parseCLIArgs(args)));
}
