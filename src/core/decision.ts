// CHANGE: Pure decision function computing the exit code of a reconciliation run
// WHY: Centralize termination logic in Functional Core with Effect composition support
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s: (s.hasInputErrors ∨ (s.failOnDrift ∧ s.hasDrift)) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from the run state.
 *
 * Drift only fails the run when the caller asked for it (CI usage); input
 * and configuration errors always do.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ hasInputErrors: false, hasDrift: true, failOnDrift: false }); // 0
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.hasInputErrors || (s.failOnDrift && s.hasDrift),
		(failed): ExitCode => (failed ? 1 : 0),
	);
