// CHANGE: Pure rendering of resolved settings as text and JSON
// WHY: FCIS — SHELL prints strings built here; CORE never touches the console
// REF: REQ-CMDLINE-OUTPUT
// PURITY: CORE
// INVARIANT: Output depends only on (settings, watched); watched ids rendered in ascending order
// COMPLEXITY: O(k + w log w) where k = |disabled|, w = |watched|

import { pipe } from "effect";

import { formatWarningId, isWarningExplicitlyDisabled } from "../cmdline/query.js";
import type { CompilerCommandLine } from "../types/settings.js";

/**
 * Plain JSON view of a settings record.
 */
export interface SettingsJSON {
	readonly raw: string;
	readonly warningLevel: number;
	readonly warningsAsErrors: boolean;
	readonly optimizationsEnabled: boolean;
	readonly usesDebugCRuntime: boolean;
	readonly eliminateDuplicateStringsEnabled: boolean;
	readonly wholeProgramOptimizationEnabled: boolean;
	readonly warningsExplicitlyDisabled: number[];
	readonly watched: Record<string, boolean>;
}

const yesNo = (flag: boolean): string => (flag ? "yes" : "no");

const sortedUnique = (warnings: readonly number[]): number[] =>
	[...new Set(warnings)].sort((a, b) => a - b);

/**
 * Renders one record as `key: value` lines.
 *
 * @param watched Warning numbers to report individually
 * @returns Lines joined with "\n", no trailing newline
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatSettingsSummary(parseCompilerCommandLine("cl /W3 /wd4996"), [4996]);
 * // "command line: cl /W3 /wd4996\nwarning level: 3\n...\nC4996: disabled"
 * ```
 */
export function formatSettingsSummary(
	settings: CompilerCommandLine,
	watched: readonly number[] = [],
): string {
	const disabled = pipe(
		settings.warningsExplicitlyDisabled,
		(list) => list.map(formatWarningId),
		(ids) => (ids.length > 0 ? ids.join(", ") : "none"),
	);

	const lines = [
		`command line: ${settings.raw}`,
		`warning level: ${settings.warningLevel}`,
		`warnings as errors: ${yesNo(settings.warningsAsErrors)}`,
		`optimizations: ${yesNo(settings.optimizationsEnabled)}`,
		`debug C runtime: ${yesNo(settings.usesDebugCRuntime)}`,
		`eliminate duplicate strings: ${yesNo(settings.eliminateDuplicateStringsEnabled)}`,
		`whole program optimization: ${yesNo(settings.wholeProgramOptimizationEnabled)}`,
		`disabled warnings: ${disabled}`,
	];

	for (const warning of sortedUnique(watched)) {
		const status = isWarningExplicitlyDisabled(settings, warning)
			? "disabled"
			: "not disabled";
		lines.push(`${formatWarningId(warning)}: ${status}`);
	}

	return lines.join("\n");
}

/**
 * Converts a record into a JSON-serializable object.
 *
 * @pure true
 * @postcondition Object.keys(result.watched) are C-prefixed ids of `watched`
 */
export function settingsToJSON(
	settings: CompilerCommandLine,
	watched: readonly number[] = [],
): SettingsJSON {
	const watchedStatus: Record<string, boolean> = {};
	for (const warning of sortedUnique(watched)) {
		watchedStatus[formatWarningId(warning)] = isWarningExplicitlyDisabled(
			settings,
			warning,
		);
	}

	return {
		raw: settings.raw,
		warningLevel: settings.warningLevel,
		warningsAsErrors: settings.warningsAsErrors,
		optimizationsEnabled: settings.optimizationsEnabled,
		usesDebugCRuntime: settings.usesDebugCRuntime,
		eliminateDuplicateStringsEnabled: settings.eliminateDuplicateStringsEnabled,
		wholeProgramOptimizationEnabled: settings.wholeProgramOptimizationEnabled,
		warningsExplicitlyDisabled: [...settings.warningsExplicitlyDisabled],
		watched: watchedStatus,
	};
}
