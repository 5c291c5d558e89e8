// CHANGE: Make main.ts a thin APP delegator
// WHY: Enforce FCIS — main forwards process arguments to app/runResolver
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects
// COMPLEXITY: O(1)

import { runResolver } from "./app/runResolver.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(): Promise<ExitCode> {
	return runResolver(process.argv.slice(2));
}
