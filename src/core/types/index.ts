// CHANGE: Central export file for all type definitions
// WHY: Provides a single import point for types used across modules
// REF: REQ-CMDLINE-MODEL
// SOURCE: n/a

export type { CLIOptions, OutputFormat, ResolverConfig } from "./config.js";
export {
	type CompilerCommandLine,
	type SettingsAccumulator,
	type WarningLevel,
	type WarningOverrideLevel,
	WarningState,
} from "./settings.js";
