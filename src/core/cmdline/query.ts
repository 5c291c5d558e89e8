// CHANGE: Read-side helpers over a resolved command line
// WHY: Consumers ask "is C4996 disabled?" rather than re-parsing the raw line
// REF: REQ-CMDLINE-QUERY
// PURITY: CORE
// INVARIANT: Queries never mutate the record
// COMPLEXITY: O(log k) lookup, O(1) formatting

import type { CompilerCommandLine } from "../types/settings.js";

const WARNING_ID_PATTERN = /^[Cc]?([0-9]+)$/u;

/**
 * Checks whether a warning number ended up explicitly disabled.
 *
 * @pure true
 * @precondition settings.warningsExplicitlyDisabled is sorted ascending
 * @complexity O(log k)
 */
export function isWarningExplicitlyDisabled(
	settings: CompilerCommandLine,
	warning: number,
): boolean {
	const list = settings.warningsExplicitlyDisabled;
	let lo = 0;
	let hi = list.length - 1;
	while (lo <= hi) {
		const mid = (lo + hi) >>> 1;
		const value = list[mid];
		if (value === undefined) {
			return false;
		}
		if (value === warning) {
			return true;
		}
		if (value < warning) {
			lo = mid + 1;
		} else {
			hi = mid - 1;
		}
	}
	return false;
}

/**
 * Formats a warning number the way the compiler prints it.
 *
 * @example formatWarningId(4996) === "C4996"; formatWarningId(5) === "C0005"
 */
export function formatWarningId(warning: number): string {
	return `C${String(warning).padStart(4, "0")}`;
}

/**
 * Parses `4996`, `C4996` or `c4996` into a warning number.
 *
 * @returns null for anything else
 * @pure true
 */
export function parseWarningId(text: string): number | null {
	const matched = WARNING_ID_PATTERN.exec(text.trim());
	if (matched === null) {
		return null;
	}
	const value = Number.parseInt(matched[1] ?? "", 10);
	return Number.isSafeInteger(value) ? value : null;
}
