export { splitCommandLine } from "./argv.js";
export { isCommandLineOption, OPTION_PREFIXES } from "./option.js";
export {
	formatWarningId,
	isWarningExplicitlyDisabled,
	parseWarningId,
} from "./query.js";
export { parseCompilerCommandLine } from "./resolver.js";
export {
	collectDisabledWarnings,
	isWarningEnabled,
	parseWarningDirective,
	parseWarningNumber,
	warningStateForMode,
} from "./warnings.js";
