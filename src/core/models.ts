// CHANGE: Functional Core models for the resolver CLI
// WHY: APP returns an exit code as a value; only BIN terminates the process
// REF: REQ-CMDLINE-CLI
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
 * Outcome flags of one CLI run.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly hasUsageError: boolean;
	readonly hasInputError: boolean;
}
