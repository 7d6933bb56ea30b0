// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `full-backup`: volumes, configuration, data directory and a database set
 * in one sealed archive. `--report-only` shows the plan and writes nothing.
 */

import { Clock, Effect, Option, pipe } from "effect";
import { type FullOptions, type FullPlan, assembleFull, planFull } from "../../backup/assembler";
import type { AppConfig } from "../../config/app-config";
import type { LogFormat } from "../../config/field-values";
import type { AppError, GeneralError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { type SetLabel, decodeSetLabel, parseErrorToGeneralError } from "../../lib/types";
import type { SystemServices } from "../../system/services";
import {
  afterSuccess,
  chooseOutput,
  formatDuration,
  renderManifest,
  renderOffload,
  withOperationsLock,
} from "./utils";

export interface FullBackupOptions {
  readonly config: AppConfig;
  readonly format: LogFormat;
  readonly includeLogs: boolean;
  readonly name: Option.Option<string>;
  readonly reportOnly: boolean;
  readonly throttled: boolean;
}

const decodeLabel = (
  name: Option.Option<string>
): Effect.Effect<Option.Option<SetLabel>, GeneralError> =>
  Option.match(name, {
    onNone: (): Effect.Effect<Option.Option<SetLabel>, GeneralError> =>
      Effect.succeed(Option.none()),
    onSome: (raw): Effect.Effect<Option.Option<SetLabel>, GeneralError> =>
      pipe(decodeSetLabel(raw), Effect.map(Option.some), Effect.mapError(parseErrorToGeneralError)),
  });

const mark = (present: boolean): string => (present ? "✓" : "-");

const renderPlan = (plan: FullPlan): string =>
  [
    `Report only: nothing written`,
    `  set      ${plan.id}`,
    `  archive  ${plan.artifact}`,
    `  database ${Option.match(plan.reuse, {
      onNone: () => "new set produced inline",
      onSome: (id) => `reuse ${id}`,
    })}`,
    `  volumes`,
    ...plan.volumes.map((v) => `    ${mark(v.present)} ${v.path}`),
    `  config`,
    ...plan.configPaths.map((c) => `    ${mark(c.present)} ${c.path}`),
    `  data     ${mark(plan.dataDir.present)} ${plan.dataDir.path}`,
    ...Option.match(plan.logs, {
      onNone: (): readonly string[] => [],
      onSome: (l): readonly string[] => [`  logs     ${mark(l.present)} ${l.path}`],
    }),
  ].join("\n");

const executeReport = (
  options: FullBackupOptions,
  fullOptions: FullOptions
): Effect.Effect<void, AppError, SystemServices> =>
  Effect.gen(function* () {
    const plan = yield* planFull(options.config, fullOptions);
    yield* writeOutput(
      chooseOutput(
        options.format,
        () => ({
          reportOnly: true,
          id: plan.id,
          artifact: plan.artifact,
          reuse: Option.getOrNull(plan.reuse),
          volumes: plan.volumes,
          configPaths: plan.configPaths,
          dataDir: plan.dataDir,
          logs: Option.getOrNull(plan.logs),
        }),
        () => renderPlan(plan)
      )
    );
  });

const executeAssemble = (
  options: FullBackupOptions,
  fullOptions: FullOptions
): Effect.Effect<void, AppError, SystemServices> =>
  withOperationsLock(
    options.config,
    Effect.gen(function* () {
      const set = yield* assembleFull(options.config, fullOptions);
      const housekeeping = yield* afterSuccess(options.config, "full", set.id, set.dir);
      const elapsed = (yield* Clock.currentTimeMillis) - fullOptions.now.getTime();

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

export const executeFullBackup = (
  options: FullBackupOptions
): Effect.Effect<void, AppError, SystemServices> =>
  Effect.gen(function* () {
    const fullOptions: FullOptions = {
      includeLogs: options.includeLogs,
      label: yield* decodeLabel(options.name),
      throttled: options.throttled,
      now: new Date(yield* Clock.currentTimeMillis),
    };
    return yield* options.reportOnly
      ? executeReport(options, fullOptions)
      : executeAssemble(options, fullOptions);
  });
