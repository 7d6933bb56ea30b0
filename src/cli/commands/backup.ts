// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `backup`: database set production, its dry run, and single-artifact
 * verification.
 */

import { Clock, Effect, Option } from "effect";
import { firstFailedLayer, verificationPassed } from "../../backup/manifest";
import { planArtifacts, preflight, produce, verifyOne } from "../../backup/producer";
import type { AppConfig } from "../../config/app-config";
import {
  BACKUP_FORMAT_VALUES,
  type BackupFormat,
  type FormatSelection,
  type LogFormat,
} from "../../config/field-values";
import { type AppError, BackupError, ErrorCode } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { toAbsolutePath } from "../../lib/types";
import type { SystemServices } from "../../system/services";
import {
  afterSuccess,
  chooseOutput,
  formatBytes,
  formatDuration,
  renderManifest,
  renderOffload,
  renderVerification,
  withOperationsLock,
} from "./utils";

export interface BackupOptions {
  readonly config: AppConfig;
  readonly format: LogFormat;
  readonly selection: FormatSelection;
  readonly validate: boolean;
  readonly dryRun: boolean;
  readonly verify: Option.Option<string>;
  readonly throttled: boolean;
}

export const selectFormats = (selection: FormatSelection): readonly BackupFormat[] =>
  selection === "all" ? BACKUP_FORMAT_VALUES : [selection];

const executeVerify = (
  config: AppConfig,
  format: LogFormat,
  path: string
): Effect.Effect<void, AppError, SystemServices> =>
  Effect.gen(function* () {
    const artifact = yield* toAbsolutePath(path);
    const result = yield* verifyOne(config, artifact);
    yield* writeOutput(
      chooseOutput(
        format,
        () => ({ artifact, passed: verificationPassed(result), layers: result }),
        () => [`Verification of ${artifact}`, ...renderVerification(result)].join("\n")
      )
    );
    yield* Option.match(firstFailedLayer(result), {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: ({ layer, detail }): Effect.Effect<never, BackupError> =>
        Effect.fail(
          new BackupError({
            code: ErrorCode.VERIFY_FAILED,
            message: `Verification failed at ${layer}: ${detail}`,
            path: artifact,
          })
        ),
    });
  });

const executeDryRun = (options: BackupOptions): Effect.Effect<void, AppError, SystemServices> =>
  Effect.gen(function* () {
    const pre = yield* preflight(options.config, options.throttled);
    const now = new Date(yield* Clock.currentTimeMillis);
    const planned = planArtifacts(selectFormats(options.selection), now);
    yield* writeOutput(
      chooseOutput(
        options.format,
        () => ({
          dryRun: true,
          source: pre.source,
          databaseBytes: pre.databaseBytes,
          journalMode: pre.journalMode,
          timeoutMs: pre.timeoutMs,
          throttled: pre.throttled,
          artifacts: planned.map((p) => p.file),
        }),
        () =>
          [
            `Dry run: nothing written`,
            `  source   ${pre.source} (${formatBytes(pre.databaseBytes)}, ${pre.journalMode})`,
            `  timeout  ${formatDuration(pre.timeoutMs)} per format${pre.throttled ? ", throttled" : ""}`,
            ...planned.map((p) => `  would write ${p.file}  (${p.describe})`),
          ].join("\n")
      )
    );
  });

const executeProduce = (options: BackupOptions): Effect.Effect<void, AppError, SystemServices> =>
  withOperationsLock(
    options.config,
    Effect.gen(function* () {
      const started = yield* Clock.currentTimeMillis;
      const pre = yield* preflight(options.config, options.throttled);
      const set = yield* produce(pre, {
        formats: selectFormats(options.selection),
        validate: options.validate,
        now: new Date(started),
      });
      const housekeeping = yield* afterSuccess(options.config, "database", set.id, set.dir);
      const elapsed = (yield* Clock.currentTimeMillis) - started;

      yield* writeOutput(
        chooseOutput(
          options.format,
          () => ({
            set: set.id,
            dir: set.dir,
            manifest: set.manifest,
            pruned: housekeeping.pruned,
            offload: housekeeping.offload._tag,
            durationMs: elapsed,
          }),
          () =>
            [
              renderManifest(set.manifest, set.dir),
              `Retention removed ${housekeeping.pruned.length} set(s)`,
              renderOffload(housekeeping.offload),
              `Finished in ${formatDuration(elapsed)}`,
            ].join("\n")
        )
      );
    })
  );

export const executeBackup = (options: BackupOptions): Effect.Effect<void, AppError, SystemServices> =>
  Option.match(options.verify, {
    onSome: (path) => executeVerify(options.config, options.format, path),
    onNone: () => (options.dryRun ? executeDryRun(options) : executeProduce(options)),
  });
