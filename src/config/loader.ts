// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading. Parse and validation errors name the file.
 * An explicit path must exist; without one the default locations are tried
 * in order and an empty configuration is used when none exists.
 */

import { Effect, Option, pipe } from "effect";
import { parse as parseToml } from "smol-toml";
import { ConfigError, ErrorCode, type SystemError, causeOf, errorMessage } from "../lib/errors";
import { type AbsolutePath, toAbsolutePath } from "../lib/types";
import { fileExists, readText } from "../system/fs";
import { type FileConfig, fileConfigSchema, formatZodError } from "./schema";

export const DEFAULT_CONFIG_PATHS: readonly string[] = [
  "./vaultkeep.toml",
  "/etc/vaultkeep/vaultkeep.toml",
];

/** Validate an already-parsed document. */
export const decodeFileConfig = (
  raw: unknown,
  source: string
): Effect.Effect<FileConfig, ConfigError> => {
  const result = fileConfigSchema.safeParse(raw);
  return result.success
    ? Effect.succeed(result.data)
    : Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid configuration in ${source}:\n${formatZodError(result.error)}`,
          path: source,
        })
      );
};

export const loadTomlFile = (
  filePath: AbsolutePath
): Effect.Effect<FileConfig, ConfigError | SystemError> =>
  Effect.gen(function* () {
    yield* pipe(
      fileExists(filePath),
      Effect.filterOrFail(
        (exists): exists is true => exists,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* readText(filePath);

    const parsed = yield* Effect.try({
      try: (): unknown => parseToml(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...causeOf(e),
        }),
    });

    return yield* decodeFileConfig(parsed, filePath);
  });

/** Defaults only; used when no file is present. */
export const emptyFileConfig = (): Effect.Effect<FileConfig, ConfigError> =>
  decodeFileConfig({}, "(defaults)");

const firstExisting = (
  candidates: readonly string[]
): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
  Effect.reduce(candidates, Option.none<AbsolutePath>(), (found, candidate) =>
    Option.isSome(found)
      ? Effect.succeed(found)
      : pipe(
          toAbsolutePath(candidate),
          Effect.flatMap((abs) =>
            Effect.map(fileExists(abs), (exists) => (exists ? Option.some(abs) : Option.none()))
          )
        )
  );

/**
 * Load the configuration file: the explicit path when given, otherwise the
 * first default location that exists, otherwise defaults. Returns the path
 * actually read alongside the config.
 */
export const loadFileConfig = (
  explicitPath: Option.Option<string>,
  searchPaths: readonly string[] = DEFAULT_CONFIG_PATHS
): Effect.Effect<
  { readonly config: FileConfig; readonly source: Option.Option<AbsolutePath> },
  ConfigError | SystemError
> =>
  pipe(
    explicitPath,
    Option.match({
      onSome: (p) =>
        pipe(
          toAbsolutePath(p),
          Effect.flatMap((abs) =>
            Effect.map(loadTomlFile(abs), (config) => ({ config, source: Option.some(abs) }))
          )
        ),
      onNone: () =>
        pipe(
          firstExisting(searchPaths),
          Effect.flatMap(
            Option.match({
              onNone: () =>
                Effect.map(emptyFileConfig(), (config) => ({
                  config,
                  source: Option.none<AbsolutePath>(),
                })),
              onSome: (abs) =>
                Effect.map(loadTomlFile(abs), (config) => ({ config, source: Option.some(abs) })),
            })
          )
        ),
    })
  );
