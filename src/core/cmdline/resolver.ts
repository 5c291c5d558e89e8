// CHANGE: Resolve a recorded MSVC command line into compilation settings
// WHY: Downstream analysis asks whether a warning was suppressed for a compiland, which depends on flag order
// REF: REQ-CMDLINE-RESOLVE
// SOURCE: https://learn.microsoft.com/cpp/build/reference/compiler-options-listed-by-category
// FORMAT THEOREM: ∀s: parse(s) = resolve(fold(dispatch, init, filter(isOption, split(s))))
// PURITY: CORE
// INVARIANT: Total over all strings; later tokens override earlier ones within a flag family
// COMPLEXITY: O(n + k log k) where n = |raw|, k = distinct per-warning directives

import { match } from "ts-pattern";

import type {
	CompilerCommandLine,
	SettingsAccumulator,
	WarningLevel,
} from "../types/settings.js";
import { splitCommandLine } from "./argv.js";
import { isCommandLineOption } from "./option.js";
import { collectDisabledWarnings, parseWarningDirective } from "./warnings.js";

/**
 * Updates the accumulator for one option token of a fixed length.
 */
type TokenHandler = (token: string, acc: SettingsAccumulator) => void;

// /O1 /O2 /Og /Os /Ot /Ox all turn the optimizer on
const OPTIMIZING_SUFFIXES: readonly string[] = ["O1", "O2", "Og", "Os", "Ot", "Ox"];

// /GF is in effect whenever /O1 or /O2 is used
const STRING_POOLING_SUFFIXES: readonly string[] = ["O1", "O2"];

function endsWithAny(token: string, suffixes: readonly string[]): boolean {
	return suffixes.some((suffix) => token.endsWith(suffix));
}

function toWarningLevel(digit: string): WarningLevel | null {
	return match<string, WarningLevel | null>(digit)
		.with("0", () => 0)
		.with("1", () => 1)
		.with("2", () => 2)
		.with("3", () => 3)
		.with("4", () => 4)
		.otherwise(() => null);
}

/**
 * Handles /WX and /W0../W4. Any other /W? token is ignored and does not fall
 * through to the suffix checks.
 */
function applyWarningSwitch(token: string, acc: SettingsAccumulator): void {
	const ch = token.charAt(2);
	if (ch === "X") {
		acc.warningsAsErrors = true;
		return;
	}
	const level = toWarningLevel(ch);
	if (level !== null) {
		acc.warningLevel = level;
	}
}

// /w
const applyTwoCharOption: TokenHandler = (token, acc) => {
	if (token.charAt(1) === "w") {
		acc.warningLevel = 0;
	}
};

// /W?, /O?, /MT, /MD, /GL, /GF
const applyThreeCharOption: TokenHandler = (token, acc) => {
	if (token.charAt(1) === "W") {
		applyWarningSwitch(token, acc);
	} else if (endsWithAny(token, OPTIMIZING_SUFFIXES)) {
		acc.optimizationsEnabled = true;
		if (endsWithAny(token, STRING_POOLING_SUFFIXES)) {
			acc.eliminateDuplicateStringsEnabled = true;
		}
	} else if (token.endsWith("Od")) {
		acc.optimizationsEnabled = false;
	} else if (token.endsWith("MT") || token.endsWith("MD")) {
		acc.usesDebugCRuntime = false;
	} else if (token.endsWith("GL")) {
		acc.wholeProgramOptimizationEnabled = true;
	} else if (token.endsWith("GF")) {
		acc.eliminateDuplicateStringsEnabled = true;
	}
};

// /WX-, /MTd, /MDd, /GL-
const applyFourCharOption: TokenHandler = (token, acc) => {
	if (token.endsWith("WX-")) {
		acc.warningsAsErrors = false;
	} else if (token.endsWith("MTd") || token.endsWith("MDd")) {
		acc.usesDebugCRuntime = true;
	} else if (token.endsWith("GL-")) {
		acc.wholeProgramOptimizationEnabled = false;
	}
};

// /Wall: everything /W4 reports and more
const applyFiveCharOption: TokenHandler = (token, acc) => {
	if (token.endsWith("Wall")) {
		acc.warningLevel = 4;
	}
};

// /wdNNNN, /weNNNN, /woNNNN, /w1NNNN../w4NNNN
const applySevenCharOption: TokenHandler = (token, acc) => {
	const directive = parseWarningDirective(token);
	if (directive !== null) {
		acc.explicitWarnings.set(directive.warning, directive.state);
	}
};

// CHANGE: Dispatch on exact token length instead of substring search
// WHY: A longer option sharing a suffix (e.g. /FoO2) must not be read as /O2
// INVARIANT: At most one handler runs per token
const HANDLERS_BY_LENGTH: ReadonlyMap<number, TokenHandler> = new Map([
	[2, applyTwoCharOption],
	[3, applyThreeCharOption],
	[4, applyFourCharOption],
	[5, applyFiveCharOption],
	[7, applySevenCharOption],
]);

function createAccumulator(): SettingsAccumulator {
	return {
		warningLevel: 0,
		warningsAsErrors: false,
		optimizationsEnabled: false,
		usesDebugCRuntime: false,
		eliminateDuplicateStringsEnabled: false,
		wholeProgramOptimizationEnabled: false,
		explicitWarnings: new Map(),
	};
}

/**
 * Applies one option token to the accumulator. Unknown tokens are ignored.
 *
 * @pure false (mutates acc, which is local to one parse)
 * @complexity O(|token|)
 */
function applyOption(token: string, acc: SettingsAccumulator): void {
	const handler = HANDLERS_BY_LENGTH.get(token.length);
	if (handler !== undefined) {
		handler(token, acc);
	}
}

/**
 * Parses a compiler command line recorded in a program database.
 *
 * Tokens are split with CommandLineToArgvW rules, positional arguments are
 * dropped, and each option is applied left to right. Per-warning directives
 * are resolved against the final warning level once every token is seen.
 *
 * @param commandLine Raw command line; null or undefined is treated as ""
 * @returns Frozen settings record
 *
 * @pure true
 * @invariant result.warningLevel ∈ [0,4]
 * @postcondition result.warningsExplicitlyDisabled strictly ascending
 * @complexity O(n + k log k)
 *
 * @example
 * ```ts
 * const settings = parseCompilerCommandLine("cl.exe /c /W3 /wd4996 /wd4100");
 * // settings.warningLevel === 3
 * // settings.warningsExplicitlyDisabled → [4100, 4996]
 * ```
 */
export function parseCompilerCommandLine(
	commandLine?: string | null,
): CompilerCommandLine {
	const raw = commandLine ?? "";
	const acc = createAccumulator();

	for (const token of splitCommandLine(raw)) {
		if (isCommandLineOption(token)) {
			applyOption(token, acc);
		}
	}

	return Object.freeze({
		raw,
		warningLevel: acc.warningLevel,
		warningsAsErrors: acc.warningsAsErrors,
		optimizationsEnabled: acc.optimizationsEnabled,
		usesDebugCRuntime: acc.usesDebugCRuntime,
		eliminateDuplicateStringsEnabled: acc.eliminateDuplicateStringsEnabled,
		wholeProgramOptimizationEnabled: acc.wholeProgramOptimizationEnabled,
		warningsExplicitlyDisabled: Object.freeze(
			collectDisabledWarnings(acc.explicitWarnings, acc.warningLevel),
		),
	});
}
