// CHANGE: Configuration and CLI option types for the resolver CLI
// WHY: SHELL parsers and APP orchestration share one option shape
// REF: REQ-CMDLINE-CONFIG
// SOURCE: n/a

/**
 * Output format of the CLI.
 */
export type OutputFormat = "text" | "json";

/**
 * Configuration from cmdline.config.json.
 *
 * @property format Output format when no --json flag is given
 * @property watch Warning numbers reported individually, ascending
 */
export interface ResolverConfig {
	readonly format: OutputFormat;
	readonly watch: ReadonlyArray<number>;
}

/**
 * Command-line options of the CLI.
 *
 * @property commandLines Raw compiler command lines given as positionals
 * @property files Files holding one command line per non-empty line
 * @property readStdin Read command lines from standard input
 * @property format Explicit output format; undefined defers to config
 * @property watch Warning numbers from --watch, ascending
 * @property configPath Explicit config file; undefined means ./cmdline.config.json when present
 * @property help Print usage and exit
 */
export interface CLIOptions {
	readonly commandLines: ReadonlyArray<string>;
	readonly files: ReadonlyArray<string>;
	readonly readStdin: boolean;
	readonly format: OutputFormat | undefined;
	readonly watch: ReadonlyArray<number>;
	readonly configPath: string | undefined;
	readonly help: boolean;
}
