// CHANGE: Public library surface
// WHY: Consumers import the resolver without pulling in the CLI
// REF: REQ-CMDLINE-API

export {
	collectDisabledWarnings,
	formatWarningId,
	isCommandLineOption,
	isWarningEnabled,
	isWarningExplicitlyDisabled,
	OPTION_PREFIXES,
	parseCompilerCommandLine,
	parseWarningDirective,
	parseWarningId,
	parseWarningNumber,
	splitCommandLine,
	warningStateForMode,
} from "./core/cmdline/index.js";
export {
	formatSettingsSummary,
	type SettingsJSON,
	settingsToJSON,
} from "./core/format/summary.js";
export {
	type CompilerCommandLine,
	type WarningLevel,
	type WarningOverrideLevel,
	WarningState,
} from "./core/types/index.js";
