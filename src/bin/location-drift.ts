#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { runShowAllLocations } from "../app/showAllLocations.js";
import { parseCLIArgs } from "../shell/config/index.js";

/**
 * CLI entry point for location-drift.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const cliOptions = parseCLIArgs();
		const code = await Effect.runPromise(runShowAllLocations(cliOptions));
		process.exit(code);
	} catch (error) {
		// Shell boundary: report fatal and exit with failure
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
