// CHANGE: Domain types for compiler command lines recorded in program databases
// WHY: CORE resolver and SHELL printers share one immutable record shape
// REF: REQ-CMDLINE-MODEL
// PURITY: CORE
// INVARIANT: warningLevel ∈ [0,4] ∧ warningsExplicitlyDisabled strictly ascending
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Global warning level selected by /w, /W0../W4 and /Wall.
 */
export type WarningLevel = 0 | 1 | 2 | 3 | 4;

/**
 * Level a single warning is moved to by /w1nnnn../w4nnnn.
 */
export type WarningOverrideLevel = 1 | 2 | 3 | 4;

/**
 * Last directive seen for one warning number.
 *
 * The compiler keeps the per-warning level and the once/as-error markers in one
 * slot, so a later /wo or /we replaces an earlier /w1 instead of merging with it.
 *
 * @invariant _tag ∈ {Level, AsError, Once, Disabled}
 */
export type WarningState = Data.TaggedEnum<{
	Level: { readonly level: WarningOverrideLevel };
	AsError: {};
	Once: {};
	Disabled: {};
}>;

export const WarningState = Data.taggedEnum<WarningState>();

/**
 * Settings resolved from one raw compiler command line.
 *
 * @property raw Command line exactly as recorded ("" when absent)
 * @property warningsExplicitlyDisabled Sorted, distinct warning numbers
 *
 * @pure true
 * @invariant object is frozen once returned by the resolver
 */
export interface CompilerCommandLine {
	readonly raw: string;
	readonly warningLevel: WarningLevel;
	readonly warningsAsErrors: boolean;
	readonly optimizationsEnabled: boolean;
	readonly usesDebugCRuntime: boolean;
	readonly eliminateDuplicateStringsEnabled: boolean;
	readonly wholeProgramOptimizationEnabled: boolean;
	readonly warningsExplicitlyDisabled: readonly number[];
}

/**
 * Mutable accumulator threaded through a single resolver pass.
 *
 * @invariant never escapes the resolver call that created it
 */
export interface SettingsAccumulator {
	warningLevel: WarningLevel;
	warningsAsErrors: boolean;
	optimizationsEnabled: boolean;
	usesDebugCRuntime: boolean;
	eliminateDuplicateStringsEnabled: boolean;
	wholeProgramOptimizationEnabled: boolean;
	readonly explicitWarnings: Map<number, WarningState>;
}
