// CHANGE: Typed error ADT for the SHELL/APP layers using Effect.Data
// WHY: Failures travel through Effect signatures as values, discriminated by `_tag`
// REF: REQ-CMDLINE-ERRORS
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw); the resolver itself never fails
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Invalid CLI invocation (unknown flag, missing value, no input).
 *
 * @invariant detail.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Configuration file exists but cannot be used.
 *
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError = UsageError | FSError | ConfigError;

/**
 * One-line human message for an application error.
 *
 * @pure true
 */
export function describeAppError(error: AppError): string {
	switch (error._tag) {
		case "UsageError":
			return error.detail;
		case "FS":
			return error.path === undefined
				? error.detail
				: `${error.detail} (${error.path})`;
		case "ConfigError":
			return `invalid config ${error.path}: ${error.detail}`;
	}
}
