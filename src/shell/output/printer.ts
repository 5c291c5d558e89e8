// CHANGE: Console output for resolved command lines
// WHY: All console I/O lives in SHELL; strings are built by core/format/summary
// REF: REQ-CMDLINE-OUTPUT
// SOURCE: n/a
// PURITY: SHELL (console)
// EFFECT: Effect<void>
// INVARIANT: JSON mode writes exactly one JSON document to stdout

import { Effect } from "effect";

import { type AppError, describeAppError } from "../../core/errors.js";
import {
	formatSettingsSummary,
	settingsToJSON,
} from "../../core/format/summary.js";
import type {
	CompilerCommandLine,
	OutputFormat,
} from "../../core/types/index.js";

/**
 * Prints resolved settings in the requested format.
 *
 * Text blocks are separated by a blank line; JSON is an array even for one
 * command line.
 *
 * @pure false (console output)
 */
export function printResults(
	results: readonly CompilerCommandLine[],
	format: OutputFormat,
	watched: readonly number[],
): Effect.Effect<void> {
	return Effect.sync(() => {
		if (format === "json") {
			const payload = results.map((r) => settingsToJSON(r, watched));
			console.log(JSON.stringify(payload, null, 2));
			return;
		}
		console.log(
			results.map((r) => formatSettingsSummary(r, watched)).join("\n\n"),
		);
	});
}

/**
 * Prints an application error to stderr.
 *
 * @pure false (console output)
 */
export function printError(error: AppError): Effect.Effect<void> {
	return Effect.sync(() => {
		console.error(`Error: ${describeAppError(error)}`);
	});
}

/** Prints usage text to stdout. */
export function printUsage(usage: string): Effect.Effect<void> {
	return Effect.sync(() => {
		console.log(usage);
	});
}
