// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The merged, immutable configuration every command runs against.
 * Built once at startup from CLI flags, environment and the TOML file
 * (in that order of precedence) and passed to every operation.
 */

import { Array as Arr, Effect, Option, type Redacted, pipe } from "effect";
import type { ConfigError } from "../lib/errors";
import {
  type AbsolutePath,
  type VolumeName,
  isVolumeName,
  pathJoin,
  toAbsolutePath,
} from "../lib/types";
import type { EnvConfig } from "./env";
import type {
  EncryptionBackend,
  LogFormat,
  LogLevel,
  RestoreScope,
  ThrottleMode,
} from "./field-values";
import type { FileConfig } from "./schema";

export interface AppConfig {
  readonly paths: {
    readonly root: AbsolutePath;
    readonly backupRoot: AbsolutePath;
    readonly dataDir: AbsolutePath;
    readonly secretFile: AbsolutePath;
    readonly logDir: AbsolutePath;
    readonly lockDir: AbsolutePath;
  };
  /** `sqlite://` URL from env or file. The secret-file fallback is resolved on use. */
  readonly databaseUrl: Option.Option<string>;
  readonly encryption: { readonly backend: EncryptionBackend };
  readonly secrets: {
    readonly passphrase: Option.Option<Redacted.Redacted<string>>;
    readonly passphraseFile: Option.Option<AbsolutePath>;
  };
  readonly retention: { readonly keepDatabase: number; readonly keepFull: number };
  readonly full: {
    readonly volumes: readonly VolumeName[];
    readonly configFiles: readonly string[];
    readonly configDirs: readonly string[];
    readonly freshnessHours: number;
    readonly volumeTimeoutMs: number;
    readonly helperImage: string;
  };
  readonly docker: {
    readonly composeFile: AbsolutePath;
    readonly service: string;
    readonly container: string;
  };
  readonly restore: {
    readonly healthIntervalMs: number;
    readonly healthAttempts: { readonly [S in RestoreScope]: number };
  };
  readonly cloud: Option.Option<{ readonly remote: string; readonly path: string }>;
  readonly lock: { readonly waitMs: number; readonly staleMs: number };
  readonly throttle: { readonly mode: ThrottleMode };
  readonly logging: { readonly level: LogLevel; readonly format: LogFormat };
}

/** Per-scope health polling ceilings when `restore.healthAttempts` is unset. */
export const DEFAULT_HEALTH_ATTEMPTS: { readonly [S in RestoreScope]: number } = {
  database: 30,
  config: 30,
  full: 40,
};

export interface CliOverrides {
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
}

/**
 * Merge the three sources. `cwd` anchors a relative `paths.root`; every
 * other relative path hangs off the root.
 */
export const buildAppConfig = (
  file: FileConfig,
  env: EnvConfig,
  cli: CliOverrides,
  cwd: string = process.cwd()
): Effect.Effect<AppConfig, ConfigError> =>
  Effect.gen(function* () {
    const root = yield* toAbsolutePath(file.paths.root, cwd);
    const underRoot = (p: string): Effect.Effect<AbsolutePath, ConfigError> =>
      toAbsolutePath(p, root);

    const backupRoot = yield* underRoot(
      Option.getOrElse(env.deployment.backupDir, () => file.paths.backupRoot)
    );
    const lockDir = yield* pipe(
      Option.fromNullable(file.paths.lockDir),
      Option.match({
        onNone: (): Effect.Effect<AbsolutePath, ConfigError> =>
          Effect.succeed(pathJoin(backupRoot, ".locks")),
        onSome: underRoot,
      })
    );
    const passphraseFile = yield* pipe(
      Option.fromNullable(file.secrets.passphraseFile),
      Option.match({
        onNone: (): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
          Effect.succeed(Option.none()),
        onSome: (p): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
          Effect.map(underRoot(p), Option.some),
      })
    );

    const volumes = file.full.volumes;
    const healthAttempts = pipe(
      Option.fromNullable(file.restore.healthAttempts),
      Option.match({
        onNone: (): { readonly [S in RestoreScope]: number } => DEFAULT_HEALTH_ATTEMPTS,
        onSome: (n): { readonly [S in RestoreScope]: number } => ({
          database: n,
          config: n,
          full: n,
        }),
      })
    );

    return {
      paths: {
        root,
        backupRoot,
        dataDir: yield* underRoot(file.paths.dataDir),
        secretFile: yield* underRoot(file.paths.secretFile),
        logDir: yield* underRoot(file.paths.logDir),
        lockDir,
      },
      databaseUrl: Option.orElse(env.deployment.databaseUrl, () =>
        Option.fromNullable(file.database.url)
      ),
      encryption: { backend: file.encryption.backend },
      secrets: { passphrase: env.deployment.passphrase, passphraseFile },
      retention: {
        keepDatabase: Option.getOrElse(
          env.deployment.keepDatabase,
          () => file.retention.keepDatabase
        ),
        keepFull: Option.getOrElse(env.deployment.keepFull, () => file.retention.keepFull),
      },
      full: {
        volumes: Arr.filter(volumes, isVolumeName),
        configFiles: file.full.configFiles,
        configDirs: file.full.configDirs,
        freshnessHours: file.full.freshnessHours,
        volumeTimeoutMs: file.full.volumeTimeoutMs,
        helperImage: file.full.helperImage,
      },
      docker: {
        composeFile: yield* underRoot(file.docker.composeFile),
        service: file.docker.service,
        container: file.docker.container,
      },
      restore: { healthIntervalMs: file.restore.healthIntervalMs, healthAttempts },
      cloud:
        file.cloud.remote !== undefined && file.cloud.path !== undefined
          ? Option.some({ remote: file.cloud.remote, path: file.cloud.path })
          : Option.none(),
      lock: { waitMs: file.lock.waitMs, staleMs: file.lock.staleMs },
      throttle: { mode: file.throttle.mode },
      logging: { level: cli.logLevel, format: cli.logFormat },
    } satisfies AppConfig;
  });
