// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Secret and live-database resolution. Both fall back to the deployment's
 * JSON secret file, which is read on demand and never copied anywhere.
 */

import { Effect, Option, Redacted, pipe } from "effect";
import { z } from "zod";
import { ConfigError, ErrorCode, causeOf, errorMessage } from "../lib/errors";
import { type AbsolutePath, toAbsolutePath } from "../lib/types";
import { fileExists, readText } from "../system/fs";
import type { AppConfig } from "./app-config";

const secretFileSchema = z.record(z.string(), z.unknown());

const readSecretFile = (
  path: AbsolutePath
): Effect.Effect<Option.Option<Record<string, unknown>>, ConfigError> =>
  Effect.gen(function* () {
    if (!(yield* fileExists(path))) {
      return Option.none();
    }
    const text = yield* pipe(
      readText(path),
      Effect.mapError(
        (e): ConfigError =>
          new ConfigError({
            code: ErrorCode.CONFIG_PARSE_ERROR,
            message: e.message,
            path,
          })
      )
    );
    const parsed = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Secret file ${path} is not valid JSON: ${errorMessage(e)}`,
          path,
          ...causeOf(e),
        }),
    });
    const result = secretFileSchema.safeParse(parsed);
    return result.success ? Option.some(result.data) : Option.none();
  });

const secretFileString = (
  path: AbsolutePath,
  key: string
): Effect.Effect<Option.Option<string>, ConfigError> =>
  Effect.map(
    readSecretFile(path),
    Option.flatMap((record) => {
      const value = record[key];
      return typeof value === "string" && value.length > 0 ? Option.some(value) : Option.none();
    })
  );

const missingSecret = (config: AppConfig): ConfigError =>
  new ConfigError({
    code: ErrorCode.SECRET_MISSING,
    message:
      "No encryption passphrase: set BACKUP_PASSPHRASE, secrets.passphraseFile, " +
      `or BACKUP_PASSPHRASE in ${config.paths.secretFile}`,
  });

/** Environment, then `secrets.passphraseFile`, then the secret file. */
export const resolvePassphrase = (
  config: AppConfig
): Effect.Effect<Redacted.Redacted<string>, ConfigError> =>
  Effect.gen(function* () {
    if (Option.isSome(config.secrets.passphrase)) {
      return config.secrets.passphrase.value;
    }

    if (Option.isSome(config.secrets.passphraseFile)) {
      const file = config.secrets.passphraseFile.value;
      const content = yield* pipe(
        readText(file),
        Effect.mapError(
          (e): ConfigError =>
            new ConfigError({
              code: ErrorCode.SECRET_MISSING,
              message: `Cannot read passphrase file: ${e.message}`,
              path: file,
            })
        )
      );
      const trimmed = content.trim();
      if (trimmed.length === 0) {
        return yield* Effect.fail(missingSecret(config));
      }
      return Redacted.make(trimmed);
    }

    return yield* pipe(
      secretFileString(config.paths.secretFile, "BACKUP_PASSPHRASE"),
      Effect.flatMap(
        Option.match({
          onNone: (): Effect.Effect<Redacted.Redacted<string>, ConfigError> =>
            Effect.fail(missingSecret(config)),
          onSome: (v): Effect.Effect<Redacted.Redacted<string>, ConfigError> =>
            Effect.succeed(Redacted.make(v)),
        })
      )
    );
  });

const SQLITE_URL_PREFIX = "sqlite://";

/**
 * Path of the database named by a `sqlite://` URL. Relative paths resolve
 * against `root`.
 */
export const parseDatabaseUrl = (
  url: string,
  root: AbsolutePath
): Effect.Effect<AbsolutePath, ConfigError> =>
  pipe(
    Effect.succeed(url.trim()),
    Effect.filterOrFail(
      (u) => u.startsWith(SQLITE_URL_PREFIX) && u.length > SQLITE_URL_PREFIX.length,
      () =>
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `DATABASE_URL must be a sqlite:// URL with a path, got '${url}'`,
        })
    ),
    Effect.flatMap((u) => toAbsolutePath(u.slice(SQLITE_URL_PREFIX.length), root))
  );

/**
 * Path named by `DATABASE_URL` from env or file, else the secret file.
 * The file itself may be missing (restore onto an empty host).
 */
export const resolveDatabasePath = (
  config: AppConfig
): Effect.Effect<AbsolutePath, ConfigError> =>
  pipe(
    config.databaseUrl,
    Option.match({
      onSome: (u): Effect.Effect<Option.Option<string>, ConfigError> =>
        Effect.succeed(Option.some(u)),
      onNone: (): Effect.Effect<Option.Option<string>, ConfigError> =>
        secretFileString(config.paths.secretFile, "DATABASE_URL"),
    }),
    Effect.flatMap(
      Option.match({
        onNone: (): Effect.Effect<string, ConfigError> =>
          Effect.fail(
            new ConfigError({
              code: ErrorCode.DATABASE_NOT_FOUND,
              message: "DATABASE_URL is not set in the environment, config file or secret file",
            })
          ),
        onSome: (u): Effect.Effect<string, ConfigError> => Effect.succeed(u),
      })
    ),
    Effect.flatMap((url) => parseDatabaseUrl(url, config.paths.root))
  );

/** `resolveDatabasePath`, and the file must exist. */
export const resolveLiveDatabase = (
  config: AppConfig
): Effect.Effect<AbsolutePath, ConfigError> =>
  Effect.gen(function* () {
    const dbPath = yield* resolveDatabasePath(config);

    return yield* pipe(
      fileExists(dbPath),
      Effect.filterOrFail(
        (exists) => exists,
        () =>
          new ConfigError({
            code: ErrorCode.DATABASE_NOT_FOUND,
            message: `Database file not found: ${dbPath}`,
            path: dbPath,
          })
      ),
      Effect.as(dbPath)
    );
  });
