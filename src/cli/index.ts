// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes configuration,
 * logging, service wiring and error display so each command stays focused
 * on its logic.
 */

import { Command, ValidationError } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Match, Option, pipe } from "effect";
import { type AppConfig, buildAppConfig } from "../config/app-config";
import { EnvConfigSpec, resolveLogFormat, resolveLogLevel } from "../config/env";
import type { LogFormat, LogLevel } from "../config/field-values";
import { loadFileConfig } from "../config/loader";
import { VaultkeepLoggerLive, detectColorSupport } from "../lib/effect-logger";
import {
  type AppError,
  ConfigError,
  ErrorCode,
  type SystemError,
  isAppError,
  toExitCode,
} from "../lib/errors";
import { PROGRAM_NAME, VERSION } from "../lib/version";
import { sampleLoad, shouldThrottle } from "../system/resources";
import { type SystemServices, SystemServicesLive } from "../system/services";

import { executeBackup } from "./commands/backup";
import { executeFullBackup } from "./commands/full-backup";
import { executeHealth } from "./commands/health";
import { executeList } from "./commands/list";
import { executeRestore } from "./commands/restore";

import {
  type GlobalOptions,
  artifactFormat,
  artifactPathArg,
  categoryFilter,
  configOnly,
  databaseOnly,
  dryRun,
  effectiveFormat,
  formatOption,
  globalOptions,
  includeLogs,
  latest,
  reportOnly,
  restoreScope,
  setName,
  validate,
  verifyArtifact,
} from "./options";

/** Resolved runtime context for commands. CLI > environment > file > defaults. */
export interface CommandContext {
  readonly config: AppConfig;
  /** Output format of the final summary. */
  readonly format: LogFormat;
  /** Decided once per run from `throttle.mode` and the current load. */
  readonly throttled: boolean;
}

interface ResolvedContext {
  readonly ctx: CommandContext;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
}

// Context resolution

const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<ResolvedContext, ConfigError | SystemError> =>
  Effect.gen(function* () {
    const env = yield* Effect.mapError(
      EnvConfigSpec,
      (e) =>
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid environment: ${String(e)}`,
        })
    );
    const configPath = Option.orElse(globals.config, () => env.configPath);
    const file = yield* loadFileConfig(configPath);
    yield* Option.match(file.source, {
      onNone: () => Effect.logDebug("No configuration file found; using defaults"),
      onSome: (source) => Effect.logDebug(`Configuration: ${source}`),
    });

    const cliFormat = effectiveFormat(globals);
    const logLevel = resolveLogLevel(globals.verbose, globals.logLevel, env, file.config.logging.level);
    const logFormat = resolveLogFormat(
      globals.json,
      globals.format ?? Option.none(),
      env,
      file.config.logging.format
    );
    const config = yield* buildAppConfig(file.config, env, { logLevel, logFormat });
    const throttled = shouldThrottle(config.throttle.mode, yield* sampleLoad());

    return {
      ctx: { config, format: Option.getOrElse(cliFormat, () => logFormat), throttled },
      logLevel,
      logFormat,
    };
  });

// Error display

/** Formats error for terminal output with optional color. Sync because called in exit path. */
const displayError = (err: unknown, format: LogFormat): void => {
  if (!isAppError(err)) {
    return;
  }
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(`${JSON.stringify({ error: err.message, code: err.code })}\n`)
    ),
    Match.when("pretty", () => {
      const prefix = detectColorSupport() ? "\x1b[31m✗\x1b[0m" : "✗";
      process.stderr.write(`${prefix} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

/** Centralizes init, context, and error handling so each command stays focused on its logic. */
const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, AppError, SystemServices>
): Effect.Effect<void, AppError> =>
  Effect.gen(function* () {
    const fallback = Option.getOrElse(effectiveFormat(globals), (): LogFormat => "pretty");
    const resolved = yield* Effect.tapError(resolveContext(globals), (err) =>
      Effect.sync(() => displayError(err, fallback))
    );
    const { ctx } = resolved;
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
      Effect.provide(SystemServicesLive(ctx.config, ctx.throttled)),
      Effect.provide(
        VaultkeepLoggerLive({
          level: resolved.logLevel,
          format: resolved.logFormat,
        })
      )
    );
  });

// Commands

const backupCmd = Command.make(
  "backup",
  { ...globalOptions, artifactFormat, validate, dryRun, verify: verifyArtifact },
  (args) =>
    runCommand(args, "backup", (ctx) =>
      executeBackup({
        config: ctx.config,
        format: ctx.format,
        selection: args.artifactFormat,
        validate: args.validate,
        dryRun: args.dryRun,
        verify: args.verify,
        throttled: ctx.throttled,
      })
    )
).pipe(Command.withDescription("Back up the database in one or more formats"));

const fullBackupCmd = Command.make(
  "full-backup",
  { ...globalOptions, ...formatOption, includeLogs, name: setName, reportOnly },
  (args) =>
    runCommand(args, "full-backup", (ctx) =>
      executeFullBackup({
        config: ctx.config,
        format: ctx.format,
        includeLogs: args.includeLogs,
        name: args.name,
        reportOnly: args.reportOnly,
        throttled: ctx.throttled,
      })
    )
).pipe(Command.withDescription("Back up volumes, configuration, data and database together"));

const restoreCmd = Command.make(
  "restore",
  {
    ...globalOptions,
    ...formatOption,
    databaseOnly,
    configOnly,
    latest,
    scope: restoreScope,
    dryRun,
    artifact: artifactPathArg,
  },
  (args) =>
    runCommand(args, "restore", (ctx) =>
      executeRestore({
        config: ctx.config,
        format: ctx.format,
        databaseOnly: args.databaseOnly,
        configOnly: args.configOnly,
        artifact: args.artifact,
        latest: args.latest,
        scope: args.scope,
        dryRun: args.dryRun,
      })
    )
).pipe(Command.withDescription("Restore from an encrypted artifact"));

const listCmd = Command.make(
  "list",
  { ...globalOptions, ...formatOption, category: categoryFilter },
  (args) =>
    runCommand(args, "list", (ctx) =>
      executeList({ config: ctx.config, format: ctx.format, category: args.category })
    )
).pipe(Command.withDescription("List backup sets and their status"));

const healthCmd = Command.make("health", { ...globalOptions, ...formatOption }, (args) =>
  runCommand(args, "health", (ctx) => executeHealth({ config: ctx.config, format: ctx.format }))
).pipe(Command.withDescription("Check service health once (exit 0 when healthy)"));

// Root command

const root = Command.make(PROGRAM_NAME).pipe(
  Command.withDescription("Backup, encryption and restore for a Vaultwarden deployment"),
  Command.withSubcommands([backupCmd, fullBackupCmd, restoreCmd, listCmd, healthCmd])
);

export const cli: (args: readonly string[]) => Effect.Effect<void, unknown, CliApp.Environment> =
  Command.run(root, {
    name: PROGRAM_NAME,
    version: VERSION,
  });

/** Run the CLI on a full `process.argv`. */
export const program = (argv: readonly string[]): Effect.Effect<void, unknown> =>
  cli(argv).pipe(Effect.provide(NodeContext.layer));

/** Application errors exit with their code, argument errors with 2, anything else with 1. */
export const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(isAppError, (e) => toExitCode(e.code)),
            Match.when(ValidationError.isValidationError, () => ErrorCode.INVALID_ARGS),
            Match.orElse(() => 1)
          ),
      }),
  });
