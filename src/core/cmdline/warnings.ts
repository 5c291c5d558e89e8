// CHANGE: Per-warning directives (/wdN, /weN, /woN, /w1N../w4N) and their final resolution
// WHY: A warning counts as disabled only after every directive and the final /W level are known
// REF: REQ-CMDLINE-WARNINGS
// FORMAT THEOREM: ∀n ∈ dom(map): n ∈ disabled(map, lvl) ↔ ¬isWarningEnabled(map(n), lvl)
// PURITY: CORE
// INVARIANT: collectDisabledWarnings returns a strictly ascending list
// COMPLEXITY: O(k log k) where k = |map|

import { match } from "ts-pattern";

import { type WarningLevel, WarningState } from "../types/settings.js";

const DIGITS_ONLY = /^[0-9]+$/u;

/**
 * Maps the mode character of a seven-character /w directive to its state.
 *
 * @returns null for characters that do not name a directive
 * @pure true
 */
export function warningStateForMode(mode: string): WarningState | null {
	return match<string, WarningState | null>(mode)
		.with("d", () => WarningState.Disabled())
		.with("e", () => WarningState.AsError())
		.with("o", () => WarningState.Once())
		.with("1", () => WarningState.Level({ level: 1 }))
		.with("2", () => WarningState.Level({ level: 2 }))
		.with("3", () => WarningState.Level({ level: 3 }))
		.with("4", () => WarningState.Level({ level: 4 }))
		.otherwise(() => null);
}

/**
 * Parses the warning number that follows `/wX`.
 *
 * Only plain ASCII digits are accepted: no sign, no blanks.
 *
 * @pure true
 * @complexity O(k)
 */
export function parseWarningNumber(text: string): number | null {
	if (!DIGITS_ONLY.test(text)) {
		return null;
	}
	const value = Number.parseInt(text, 10);
	return Number.isSafeInteger(value) ? value : null;
}

/**
 * Parses a per-warning directive such as `/wd4996` or `-w14265`.
 *
 * @param token Option token of exactly seven characters
 * @returns Warning number and state, or null when the token is not a directive
 *
 * @pure true
 * @precondition token.length === 7
 */
export function parseWarningDirective(
	token: string,
): { readonly warning: number; readonly state: WarningState } | null {
	if (token.charAt(1) !== "w") {
		return null;
	}
	const state = warningStateForMode(token.charAt(2));
	if (state === null) {
		return null;
	}
	const warning = parseWarningNumber(token.slice(3));
	return warning === null ? null : { warning, state };
}

/**
 * Decides whether a warning is still emitted given its last directive.
 *
 * /we and /wo count as enabled whatever the global level is; the compiler
 * stores them in the same slot as the per-warning level.
 *
 * @param warningLevel Final global level after the whole command line
 *
 * @pure true
 * @complexity O(1)
 */
export function isWarningEnabled(
	state: WarningState,
	warningLevel: WarningLevel,
): boolean {
	return match<WarningState, boolean>(state)
		.with({ _tag: "AsError" }, { _tag: "Once" }, () => true)
		.with({ _tag: "Disabled" }, () => false)
		.with({ _tag: "Level" }, ({ level }) => warningLevel >= level)
		.otherwise(() => true);
}

/**
 * Resolves the override map into the sorted list of disabled warnings.
 *
 * @pure true
 * @postcondition result strictly ascending
 * @complexity O(k log k)
 */
export function collectDisabledWarnings(
	explicitWarnings: ReadonlyMap<number, WarningState>,
	warningLevel: WarningLevel,
): readonly number[] {
	const disabled: number[] = [];
	for (const [warning, state] of explicitWarnings) {
		if (!isWarningEnabled(state, warningLevel)) {
			disabled.push(warning);
		}
	}
	return disabled.sort((a, b) => a - b);
}
