// CHANGE: Re-export SHELL configuration modules
// WHY: APP and tests import configuration from one place
// REF: REQ-CMDLINE-CONFIG

export {
	DEFAULT_CLI_OPTIONS,
	mergeWarningLists,
	parseCLIArgs,
	parseWatchList,
	USAGE,
} from "./cli.js";
export {
	DEFAULT_CONFIG,
	DEFAULT_CONFIG_FILE,
	loadResolverConfig,
	validateConfig,
} from "./loader.js";
