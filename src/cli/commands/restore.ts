// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `restore`. Works out the scope and artifact from the flags, then hands
 * over to the orchestrator. A dry run does not take the operations lock.
 */

import { Array as Arr, Effect, Match, Option, pipe } from "effect";
import type { AppConfig } from "../../config/app-config";
import type { LogFormat, RestoreScope } from "../../config/field-values";
import { type AppError, ErrorCode, GeneralError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { type AbsolutePath, toAbsolutePath } from "../../lib/types";
import { type RestoreOutcome, type RestoreRequest, restore } from "../../restore/orchestrator";
import type { SystemServices } from "../../system/services";
import { chooseOutput, withOperationsLock } from "./utils";

export interface RestoreOptions {
  readonly config: AppConfig;
  readonly format: LogFormat;
  readonly databaseOnly: Option.Option<string>;
  readonly configOnly: Option.Option<string>;
  readonly artifact: Option.Option<string>;
  readonly latest: boolean;
  readonly scope: Option.Option<RestoreScope>;
  readonly dryRun: boolean;
}

const invalid = (message: string): GeneralError =>
  new GeneralError({ code: ErrorCode.INVALID_ARGS, message });

interface Selection {
  readonly scope: RestoreScope;
  readonly artifact: Option.Option<string>;
}

/**
 * `--database-only <a>` and `--config-only <a>` name both scope and
 * artifact; a bare path means full scope. `--latest` replaces the path.
 */
export const selectRestore = (
  options: Pick<RestoreOptions, "databaseOnly" | "configOnly" | "artifact" | "latest" | "scope">
): Effect.Effect<Selection, GeneralError> => {
  const named = Arr.getSomes([
    Option.map(options.databaseOnly, (a): Selection => ({ scope: "database", artifact: Option.some(a) })),
    Option.map(options.configOnly, (a): Selection => ({ scope: "config", artifact: Option.some(a) })),
    Option.map(options.artifact, (a): Selection => ({ scope: "full", artifact: Option.some(a) })),
  ]);

  return pipe(
    Match.value(named),
    Match.when(
      (n) => n.length > 1,
      () => Effect.fail(invalid("Give one artifact: --database-only, --config-only or a path"))
    ),
    Match.when(
      (n) => n.length === 1 && options.latest,
      () => Effect.fail(invalid("--latest cannot be combined with an artifact path"))
    ),
    Match.when(
      (n) => n.length === 1 && Option.isSome(options.scope),
      () => Effect.fail(invalid("--scope only applies with --latest"))
    ),
    Match.orElse((n) =>
      Option.match(Arr.head(n), {
        onSome: (selection): Effect.Effect<Selection, GeneralError> => Effect.succeed(selection),
        onNone: (): Effect.Effect<Selection, GeneralError> =>
          options.latest
            ? Effect.succeed({
                scope: Option.getOrElse(options.scope, (): RestoreScope => "full"),
                artifact: Option.none(),
              })
            : Effect.fail(invalid("Name an artifact to restore, or pass --latest")),
      })
    )
  );
};

const renderOutcome = (outcome: RestoreOutcome): string =>
  pipe(
    Match.value(outcome),
    Match.tag("Applied", (o) =>
      [
        `✓ Restored from ${o.artifact}`,
        ...o.targets.map((t) => `  replaced ${t}`),
        `  healthy after ${o.healthAttempts} check(s)`,
        `  ${o.history.join(" -> ")}`,
      ].join("\n")
    ),
    Match.tag("DryRun", (o) =>
      [
        `Dry run of ${o.report.artifact} (${o.report.kind}): nothing changed`,
        `  check    ${o.report.check}`,
        `  entries  ${o.report.entries}`,
        ...o.report.targets.map((t) => `  would replace ${t}`),
        `  ${o.history.join(" -> ")}`,
      ].join("\n")
    ),
    Match.exhaustive
  );

export const executeRestore = (
  options: RestoreOptions
): Effect.Effect<void, AppError, SystemServices> =>
  Effect.gen(function* () {
    const selection = yield* selectRestore(options);
    const artifact = yield* Option.match(selection.artifact, {
      onNone: (): Effect.Effect<Option.Option<AbsolutePath>, AppError> =>
        Effect.succeed(Option.none()),
      onSome: (p): Effect.Effect<Option.Option<AbsolutePath>, AppError> =>
        Effect.map(toAbsolutePath(p), Option.some),
    });
    const request: RestoreRequest = {
      artifact,
      latest: options.latest,
      scope: selection.scope,
      mode: options.dryRun ? "dry-run" : "apply",
    };

    const run = restore(options.config, request);
    const outcome = yield* options.dryRun ? run : withOperationsLock(options.config, run);

    yield* writeOutput(chooseOutput(options.format, () => outcome, () => renderOutcome(outcome)));
  });
