// CHANGE: Single import point for SHELL configuration
// PURITY: SHELL (re-exports only)

export { parseCLIArgs } from "./cli.js";
export { loadConfigFile, resolveSettings } from "./loader.js";
export type { CLIOptions, ConfigFile, Settings } from "./types.js";
export { DEFAULT_CONFIG_FILE } from "./types.js";
