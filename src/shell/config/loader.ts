// CHANGE: Load cmdline.config.json with hand-written JSON guards
// WHY: Config is optional; a present but broken file must surface as a typed error
// REF: REQ-CMDLINE-CONFIG
// SOURCE: n/a
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<ResolverConfig, ConfigError>
// INVARIANT: Returned watch list is ascending and distinct
// COMPLEXITY: O(n) where n = |file|

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { parseWarningId } from "../../core/cmdline/query.js";
import { ConfigError } from "../../core/errors.js";
import type { OutputFormat, ResolverConfig } from "../../core/types/index.js";
import { mergeWarningLists } from "./cli.js";

export const DEFAULT_CONFIG_FILE = "cmdline.config.json";

export const DEFAULT_CONFIG: ResolverConfig = {
	format: "text",
	watch: [],
};

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

function isOutputFormat(value: JSONValue): value is OutputFormat {
	return value === "text" || value === "json";
}

/**
 * Converts one `watch` entry. Numbers must be non-negative integers; strings
 * go through parseWarningId. Anything else is dropped.
 */
function toWarningNumber(value: JSONValue): number | null {
	if (typeof value === "number") {
		return Number.isSafeInteger(value) && value >= 0 ? value : null;
	}
	if (typeof value === "string") {
		return parseWarningId(value);
	}
	return null;
}

/**
 * Валидирует разобранный JSON и строит конфигурацию.
 *
 * @param configPath Used in error messages only
 * @returns Effect with config, or ConfigError when the shape is wrong
 *
 * @pure true
 */
export function validateConfig(
	parsed: JSONValue,
	configPath: string,
): Effect.Effect<ResolverConfig, ConfigError> {
	if (!isJSONObject(parsed)) {
		return Effect.fail(
			new ConfigError({ path: configPath, detail: "expected a JSON object" }),
		);
	}

	const format = parsed["format"] ?? DEFAULT_CONFIG.format;
	if (!isOutputFormat(format)) {
		return Effect.fail(
			new ConfigError({
				path: configPath,
				detail: `format must be "text" or "json"`,
			}),
		);
	}

	const watchValue = parsed["watch"] ?? [];
	if (!isArray(watchValue)) {
		return Effect.fail(
			new ConfigError({ path: configPath, detail: "watch must be an array" }),
		);
	}

	const watch = watchValue
		.map(toWarningNumber)
		.filter((w): w is number => w !== null);

	return Effect.succeed({ format, watch: mergeWarningLists([], watch) });
}

function readConfigFile(configPath: string): Effect.Effect<string, ConfigError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(configPath, "utf8"),
		catch: (error) =>
			new ConfigError({
				path: configPath,
				detail: `cannot read file: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});
}

function parseJSON(
	text: string,
	configPath: string,
): Effect.Effect<JSONValue, ConfigError> {
	return Effect.try({
		try: (): JSONValue => JSON.parse(text) as JSONValue,
		catch: (error) =>
			new ConfigError({
				path: configPath,
				detail: error instanceof Error ? error.message : String(error),
			}),
	});
}

/**
 * Загружает конфигурацию из cmdline.config.json.
 *
 * @param configPath Explicit path; when undefined the file in `cwd` is used if it exists
 * @param cwd Directory searched for the default file
 * @returns Effect with the config; DEFAULT_CONFIG when no file applies
 *
 * @pure false (reads the filesystem)
 * @invariant explicit path that cannot be read ⇒ ConfigError
 */
export function loadResolverConfig(
	configPath?: string,
	cwd: string = process.cwd(),
): Effect.Effect<ResolverConfig, ConfigError> {
	const resolved =
		configPath === undefined
			? path.resolve(cwd, DEFAULT_CONFIG_FILE)
			: path.resolve(cwd, configPath);

	if (configPath === undefined && !fs.existsSync(resolved)) {
		return Effect.succeed(DEFAULT_CONFIG);
	}

	return readConfigFile(resolved).pipe(
		Effect.flatMap((text) => parseJSON(text, resolved)),
		Effect.flatMap((parsed) => validateConfig(parsed, resolved)),
	);
}
