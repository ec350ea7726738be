// CHANGE: Configuration types for the CLI run
// WHY: CLI flags and the optional config file merge into one settings value
// PURITY: CORE-like (types only)

/**
 * Options parsed from the command line.
 *
 * @property inputPath JSON file with one envelope or a batch
 * @property configPath Config file; a missing file is not an error
 * @property summary Print a human-readable drift summary instead of JSON
 * @property failOnDrift Exit with 1 when any issue drifted
 */
export interface CLIOptions {
	readonly inputPath: string | null;
	readonly configPath: string;
	readonly workspaceFolderUri?: string;
	readonly basePath?: string;
	readonly connectionId?: string;
	readonly summary: boolean;
	readonly compact: boolean;
	readonly failOnDrift: boolean;
}

/**
 * Contents of `location-drift.config.json`. Every key is optional.
 */
export interface ConfigFile {
	readonly workspaceFolderUri?: string | undefined;
	readonly basePath?: string | undefined;
	readonly connectionId?: string | undefined;
}

/**
 * Effective settings after applying precedence CLI flag > config file > default.
 */
export interface Settings {
	readonly basePath: string;
	readonly workspaceFolderUri: string | null;
	readonly connectionId: string | null;
}

export const DEFAULT_CONFIG_FILE = "location-drift.config.json";
