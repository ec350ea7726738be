// CHANGE: Functional Core models for the CLI decision
// WHY: CORE contains only pure types and invariants
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing the exit code of a run.
 *
 * @remarks
 * - @pure true
 * - @precondition flags are computed from the reconciled issues deterministically
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly hasInputErrors: boolean;
	readonly hasDrift: boolean;
	readonly failOnDrift: boolean;
}
