// CHANGE: Load the optional JSON config file and merge it with CLI flags
// WHY: Teams pin the workspace folder and connection once instead of passing flags every run
// PURITY: SHELL
// EFFECT: Effect<ConfigFile, ConfigError>
// INVARIANT: Missing file ⇒ empty config; present but invalid ⇒ ConfigError
// COMPLEXITY: O(n) where n = config file size

import { Effect, Either, Schema } from "effect";

import { ConfigError } from "../../core/errors.js";
import { fs, path } from "../utils/node-mods.js";
import type { CLIOptions, ConfigFile, Settings } from "./types.js";

const ConfigFileSchema = Schema.Struct({
	workspaceFolderUri: Schema.optional(Schema.String),
	basePath: Schema.optional(Schema.String),
	connectionId: Schema.optional(Schema.String),
});

const decodeConfig = Schema.decodeUnknownEither(
	Schema.parseJson(ConfigFileSchema),
);

const isMissingFile = (error: Error): boolean =>
	"code" in error && error.code === "ENOENT";

/**
 * Read and validate the config file.
 *
 * @pure false (filesystem read)
 * @effect Effect<ConfigFile, ConfigError>
 */
export function loadConfigFile(
	configPath: string,
): Effect.Effect<ConfigFile, ConfigError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(configPath, "utf8"),
		catch: (error) =>
			error instanceof Error ? error : new Error(String(error)),
	}).pipe(
		Effect.catchAll((error) =>
			isMissingFile(error)
				? Effect.succeed(null)
				: Effect.fail(
						new ConfigError({ path: configPath, detail: error.message }),
					),
		),
		Effect.flatMap((text) => {
			if (text === null) return Effect.succeed<ConfigFile>({});
			return Either.match(decodeConfig(text), {
				onLeft: (error) =>
					Effect.fail(
						new ConfigError({ path: configPath, detail: error.message }),
					),
				onRight: (config) => Effect.succeed<ConfigFile>(config),
			});
		}),
	);
}

/**
 * Merge flags over file values. A relative basePath from the file is
 * anchored at the config file's directory.
 *
 * @pure true (given cwd)
 * @invariant CLI flag > config file > default
 */
export function resolveSettings(
	cli: CLIOptions,
	file: ConfigFile,
	cwd: string = process.cwd(),
): Settings {
	const fileBase =
		file.basePath === undefined
			? undefined
			: path.resolve(
					path.dirname(path.resolve(cwd, cli.configPath)),
					file.basePath,
				);
	return {
		basePath: path.resolve(cwd, cli.basePath ?? fileBase ?? "."),
		workspaceFolderUri:
			cli.workspaceFolderUri ?? file.workspaceFolderUri ?? null,
		connectionId: cli.connectionId ?? file.connectionId ?? null,
	};
}
