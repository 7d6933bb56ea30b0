// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Environment configuration as pure `Config` values. Nothing is read until
 * the CLI yields `EnvConfigSpec`.
 *
 * Two groups: the `VAULTKEEP_` namespace for the tool itself, and the
 * un-namespaced variables the deployment already exports to its containers.
 */

import { Config, ConfigProvider, Option, type Redacted } from "effect";
import type { LogFormat, LogLevel } from "./field-values";

export interface EnvConfig {
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
  readonly configPath: Option.Option<string>;
  readonly debug: boolean;
  readonly deployment: {
    readonly databaseUrl: Option.Option<string>;
    readonly passphrase: Option.Option<Redacted.Redacted<string>>;
    readonly keepDatabase: Option.Option<number>;
    readonly keepFull: Option.Option<number>;
    readonly backupDir: Option.Option<string>;
  };
}

export const LogLevelConfig: Config.Config<LogLevel> = Config.nested(
  Config.literal("debug", "info", "warn", "error")("LOG_LEVEL").pipe(
    Config.withDefault("info" as const)
  ),
  "VAULTKEEP"
);

export const LogFormatConfig: Config.Config<LogFormat> = Config.nested(
  Config.literal("pretty", "json")("LOG_FORMAT").pipe(Config.withDefault("pretty" as const)),
  "VAULTKEEP"
);

export const ConfigPathConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.nonEmptyString("CONFIG")),
  "VAULTKEEP"
);

/** Forces the debug log level. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "VAULTKEEP"
);

export const DatabaseUrlConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nonEmptyString("DATABASE_URL")
);

export const PassphraseConfig: Config.Config<Option.Option<Redacted.Redacted<string>>> =
  Config.option(Config.redacted("BACKUP_PASSPHRASE"));

const positiveInt = (name: string): Config.Config<Option.Option<number>> =>
  Config.option(
    Config.integer(name).pipe(
      Config.validate({ message: `${name} must be at least 1`, validation: (n) => n >= 1 })
    )
  );

export const KeepDatabaseConfig: Config.Config<Option.Option<number>> =
  positiveInt("BACKUP_KEEP_DB");

export const KeepFullConfig: Config.Config<Option.Option<number>> = positiveInt("BACKUP_KEEP_FULL");

export const BackupDirConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nonEmptyString("BACKUP_DIR")
);

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  LogLevelConfig,
  LogFormatConfig,
  ConfigPathConfig,
  DebugModeConfig,
  DatabaseUrlConfig,
  PassphraseConfig,
  KeepDatabaseConfig,
  KeepFullConfig,
  BackupDirConfig,
]).pipe(
  Config.map(
    ([
      level,
      format,
      configPath,
      debug,
      databaseUrl,
      passphrase,
      keepDatabase,
      keepFull,
      backupDir,
    ]): EnvConfig => ({
      logging: { level, format },
      configPath,
      debug,
      deployment: { databaseUrl, passphrase, keepDatabase, keepFull, backupDir },
    })
  )
);

const envVarNames = {
  logLevel: "VAULTKEEP_LOG_LEVEL",
  logFormat: "VAULTKEEP_LOG_FORMAT",
  config: "VAULTKEEP_CONFIG",
  debug: "VAULTKEEP_DEBUG",
  databaseUrl: "DATABASE_URL",
  passphrase: "BACKUP_PASSPHRASE",
  keepDatabase: "BACKUP_KEEP_DB",
  keepFull: "BACKUP_KEEP_FULL",
  backupDir: "BACKUP_DIR",
} as const;

export type TestConfigOverrides = {
  readonly [K in keyof typeof envVarNames]?: string;
};

/**
 * ConfigProvider over a fixed map, for tests.
 *
 * @example
 * const provider = createTestConfigProvider({ keepDatabase: "7" });
 * Effect.withConfigProvider(EnvConfigSpec, provider)
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const values = new Map<string, string>([
    [envVarNames.logLevel, "info"],
    [envVarNames.logFormat, "pretty"],
    [envVarNames.debug, "false"],
  ]);
  const entries: ReadonlyArray<readonly [string, string | undefined]> = [
    [envVarNames.logLevel, overrides.logLevel],
    [envVarNames.logFormat, overrides.logFormat],
    [envVarNames.config, overrides.config],
    [envVarNames.debug, overrides.debug],
    [envVarNames.databaseUrl, overrides.databaseUrl],
    [envVarNames.passphrase, overrides.passphrase],
    [envVarNames.keepDatabase, overrides.keepDatabase],
    [envVarNames.keepFull, overrides.keepFull],
    [envVarNames.backupDir, overrides.backupDir],
  ];
  for (const [name, value] of entries) {
    if (value !== undefined) {
      values.set(name, value);
    }
  }
  // Same key shape as the process environment: VAULTKEEP_LOG_LEVEL, not VAULTKEEP.LOG_LEVEL
  return ConfigProvider.fromMap(values, { pathDelim: "_" });
};

/**
 * Effective log level. `--verbose` and `VAULTKEEP_DEBUG` force debug; an
 * explicit CLI or env level beats the file.
 */
export const resolveLogLevel = (
  cliVerbose: boolean,
  cliLogLevel: Option.Option<LogLevel>,
  envConfig: EnvConfig,
  fileLogLevel: LogLevel
): LogLevel => {
  if (cliVerbose || envConfig.debug) {
    return "debug";
  }
  return Option.getOrElse(cliLogLevel, () =>
    envConfig.logging.level !== "info" ? envConfig.logging.level : fileLogLevel
  );
};

/** `--json` is shorthand for `--format json`. */
export const resolveLogFormat = (
  cliJson: boolean,
  cliFormat: Option.Option<LogFormat>,
  envConfig: EnvConfig,
  fileFormat: LogFormat
): LogFormat => {
  if (cliJson) {
    return "json";
  }
  return Option.getOrElse(cliFormat, () =>
    envConfig.logging.format !== "pretty" ? envConfig.logging.format : fileFormat
  );
};
