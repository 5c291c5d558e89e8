// CHANGE: Application layer composing CORE resolution with SHELL input/output
// WHY: FCIS — APP wires config, input readers and printers around the pure resolver
// REF: REQ-CMDLINE-CLI
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, AppError>
// INVARIANT: Returns ExitCode as value; every failure is printed once to stderr
// COMPLEXITY: O(n) where n = total size of the command lines

import * as path from "node:path";
import type { Readable } from "node:stream";

import { Effect } from "effect";

import { parseCompilerCommandLine } from "../core/cmdline/resolver.js";
import { computeExitCode } from "../core/decision.js";
import { type AppError, type FSError, UsageError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import {
	loadResolverConfig,
	mergeWarningLists,
	parseCLIArgs,
	USAGE,
} from "../shell/config/index.js";
import {
	readCommandLinesFromFile,
	readCommandLinesFromStream,
} from "../shell/input/read.js";
import { printError, printResults, printUsage } from "../shell/output/index.js";

/**
 * Process environment the APP reads from.
 *
 * @property cwd Base directory for relative --file and --config paths
 * @property stdin Stream read when --stdin is given
 */
export interface ResolverEnv {
	readonly cwd: string;
	readonly stdin: Readable;
}

const defaultEnv = (): ResolverEnv => ({
	cwd: process.cwd(),
	stdin: process.stdin,
});

/**
 * Gathers command lines in order: positionals, then files, then stdin.
 *
 * @pure false (reads files and stdin)
 * @effect Effect<readonly string[], FSError>
 */
function collectCommandLines(
	cliOptions: CLIOptions,
	env: ResolverEnv,
): Effect.Effect<readonly string[], FSError> {
	return Effect.gen(function* () {
		const fromFiles = yield* Effect.forEach(cliOptions.files, (file) =>
			readCommandLinesFromFile(path.resolve(env.cwd, file)),
		);
		const fromStdin = cliOptions.readStdin
			? yield* readCommandLinesFromStream(env.stdin)
			: [];
		return [...cliOptions.commandLines, ...fromFiles.flat(), ...fromStdin];
	});
}

/**
 * Resolves every command line and prints the result.
 *
 * @pure false (filesystem, console)
 * @effect Effect<ExitCode, AppError>
 */
export function resolveCommandLines(
	cliOptions: CLIOptions,
	env: ResolverEnv = defaultEnv(),
): Effect.Effect<ExitCode, AppError> {
	return Effect.gen(function* () {
		if (cliOptions.help) {
			yield* printUsage(USAGE);
			return computeExitCode({ hasUsageError: false, hasInputError: false });
		}

		const config = yield* loadResolverConfig(cliOptions.configPath, env.cwd);
		const commandLines = yield* collectCommandLines(cliOptions, env);
		if (commandLines.length === 0) {
			return yield* Effect.fail(
				new UsageError({ detail: "no command line given (see --help)" }),
			);
		}

		const results = commandLines.map((line) => parseCompilerCommandLine(line));
		yield* printResults(
			results,
			cliOptions.format ?? config.format,
			mergeWarningLists(config.watch, cliOptions.watch),
		);
		return computeExitCode({ hasUsageError: false, hasInputError: false });
	});
}

/**
 * Maps a failure to its exit code after reporting it.
 *
 * @pure false (console output)
 */
function reportFailure(error: AppError): Effect.Effect<ExitCode> {
	return printError(error).pipe(
		Effect.as(
			computeExitCode({
				hasUsageError: error._tag === "UsageError",
				hasInputError: error._tag !== "UsageError",
			}),
		),
	);
}

/**
 * Full CLI run: parse arguments, resolve, print.
 *
 * @param args Arguments without node and script path
 * @returns Promise of ExitCode; never rejects for AppError failures
 *
 * @pure false
 * @invariant ExitCode ∈ {0,1}
 */
export function runResolver(
	args: ReadonlyArray<string>,
	env: ResolverEnv = defaultEnv(),
): Promise<ExitCode> {
	return Effect.runPromise(
		parseCLIArgs(args).pipe(
			Effect.flatMap((cliOptions) => resolveCommandLines(cliOptions, env)),
			Effect.catchAll(reportFailure),
		),
	);
}
