// CHANGE: CLI argument parsing for the resolver
// WHY: Positionals are raw compiler command lines; flags select inputs, format and watched warnings
// REF: REQ-CMDLINE-CLI
// SOURCE: n/a
// PURITY: SHELL (reads process.argv by default)
// EFFECT: Effect<CLIOptions, UsageError>
// INVARIANT: Options are applied left to right; watch list stays sorted and distinct
// COMPLEXITY: O(n) where n = |args|

import { Effect } from "effect";

import { parseWarningId } from "../../core/cmdline/query.js";
import { UsageError } from "../../core/errors.js";
import type { CLIOptions } from "../../core/types/index.js";

export const DEFAULT_CLI_OPTIONS: CLIOptions = {
	commandLines: [],
	files: [],
	readStdin: false,
	format: undefined,
	watch: [],
	configPath: undefined,
	help: false,
};

export const USAGE = [
	"Usage: compiland-cmdline [options] [--] <command line>...",
	"",
	"Resolves MSVC command lines recorded in PDBs into compilation settings.",
	"",
	"Options:",
	"  --file <path>      read one command line per non-empty line",
	"  --stdin            read command lines from standard input",
	"  --json             print JSON instead of text",
	"  --format <fmt>     text | json",
	"  --watch <ids>      comma-separated warnings to report, e.g. C4996,4100",
	"  --config <path>    config file (default: ./cmdline.config.json)",
	"  --help             show this message",
].join("\n");

/**
 * Merges two warning lists into one ascending, duplicate-free list.
 *
 * @pure true
 */
export function mergeWarningLists(
	a: ReadonlyArray<number>,
	b: ReadonlyArray<number>,
): ReadonlyArray<number> {
	return [...new Set([...a, ...b])].sort((x, y) => x - y);
}

/**
 * Parses a comma-separated warning list such as `C4996, 4100`.
 *
 * @pure true
 * @effect Effect<number[], UsageError>
 */
export function parseWatchList(
	value: string,
): Effect.Effect<ReadonlyArray<number>, UsageError> {
	const parts = value
		.split(",")
		.map((part) => part.trim())
		.filter((part) => part.length > 0);
	const warnings: number[] = [];
	for (const part of parts) {
		const warning = parseWarningId(part);
		if (warning === null) {
			return Effect.fail(
				new UsageError({ detail: `invalid warning id: ${part}` }),
			);
		}
		warnings.push(warning);
	}
	return Effect.succeed(mergeWarningLists([], warnings));
}

// CHANGE: Handler tables for boolean and value flags
// WHY: Keeps parseCLIArgs a flat loop instead of a chain of branches
type ToggleHandler = (current: CLIOptions) => CLIOptions;
type ValueHandler = (
	value: string,
	current: CLIOptions,
) => Effect.Effect<CLIOptions, UsageError>;

const toggleHandlers: ReadonlyMap<string, ToggleHandler> = new Map([
	["--json", (c: CLIOptions): CLIOptions => ({ ...c, format: "json" })],
	["--stdin", (c: CLIOptions): CLIOptions => ({ ...c, readStdin: true })],
	["--help", (c: CLIOptions): CLIOptions => ({ ...c, help: true })],
]);

const valueHandlers: ReadonlyMap<string, ValueHandler> = new Map<
	string,
	ValueHandler
>([
	["--file", (v, c) => Effect.succeed({ ...c, files: [...c.files, v] })],
	["--config", (v, c) => Effect.succeed({ ...c, configPath: v })],
	[
		"--format",
		(v, c) =>
			v === "text" || v === "json"
				? Effect.succeed({ ...c, format: v })
				: Effect.fail(new UsageError({ detail: `unknown format: ${v}` })),
	],
	[
		"--watch",
		(v, c) =>
			Effect.map(parseWatchList(v), (watch) => ({
				...c,
				watch: mergeWarningLists(c.watch, watch),
			})),
	],
]);

/**
 * Парсит аргументы командной строки.
 *
 * Arguments not starting with `--` are raw compiler command lines; quote a
 * whole command line to pass it as one argument. Everything after `--` is
 * positional.
 *
 * @param args Arguments without node and script path
 * @returns Effect with options, failing with UsageError on unknown flags or missing values
 *
 * @example
 * ```ts
 * // compiland-cmdline "cl.exe /c /W3 /wd4996" --watch C4996 --json
 * Effect.runSync(parseCLIArgs(["cl.exe /c /W3 /wd4996", "--watch", "C4996", "--json"]));
 * // { commandLines: ["cl.exe /c /W3 /wd4996"], watch: [4996], format: "json", ... }
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Effect.Effect<CLIOptions, UsageError> {
	return Effect.gen(function* () {
		let state = DEFAULT_CLI_OPTIONS;
		let positionalOnly = false;

		for (let i = 0; i < args.length; i++) {
			const arg: string = args.at(i) ?? "";
			if (arg.length === 0) continue;

			if (positionalOnly || !arg.startsWith("--")) {
				state = { ...state, commandLines: [...state.commandLines, arg] };
				continue;
			}
			if (arg === "--") {
				positionalOnly = true;
				continue;
			}

			const toggle = toggleHandlers.get(arg);
			if (toggle !== undefined) {
				state = toggle(state);
				continue;
			}

			const handler = valueHandlers.get(arg);
			if (handler === undefined) {
				return yield* Effect.fail(
					new UsageError({ detail: `unknown option: ${arg}` }),
				);
			}
			const value = args.at(i + 1);
			if (value === undefined) {
				return yield* Effect.fail(
					new UsageError({ detail: `missing value for ${arg}` }),
				);
			}
			state = yield* handler(value, state);
			i++;
		}

		return state;
	});
}
