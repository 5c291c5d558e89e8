// CHANGE: Pure decision function computing the CLI exit code
// WHY: Centralize termination logic in Functional Core
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s ∈ State: (s.hasUsageError ∨ s.hasInputError) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from the run state.
 *
 * @returns 1 if the invocation was invalid or an input could not be read; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ hasUsageError: false, hasInputError: true }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.hasUsageError || s.hasInputError,
		(failed): ExitCode => (failed ? 1 : 0),
	);
