// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stage-then-rename apply. Every target is first built next to its final
 * path; only when all of them staged is anything live replaced. A staging
 * failure discards every stage and leaves live data as it was.
 */

import { relative } from "node:path";
import { Array as Arr, Data, Effect, Match, Option, Ref, pipe } from "effect";
import type { AppConfig } from "../config/app-config";
import type { RestoreScope } from "../config/field-values";
import { type ConfigEntry, allowList } from "../backup/assembler";
import {
  BackupError,
  ErrorCode,
  type ServiceError,
  type SystemError,
  causeOf,
} from "../lib/errors";
import { logSuccess } from "../lib/log";
import {
  type AbsolutePath,
  type VolumeName,
  parentPath,
  pathJoin,
  pathWithSuffix,
} from "../lib/types";
import {
  cleanupPath,
  copyFile,
  copyTree,
  directoryExists,
  ensureDirectory,
  fileExists,
  readText,
  removePath,
  renamePath,
} from "../system/fs";
import { Archiver } from "../system/services/archive";
import { DatabaseChecker } from "../system/services/database";
import { ServiceRuntime } from "../system/services/runtime";
import type { QuiesceReceipt } from "./quiesce";

export const STAGE_SUFFIX = ".vaultkeep-stage";
export const OLD_SUFFIX = ".vaultkeep-old";

/** SQLite side files that must not outlive the database they belong to. */
const SIDE_FILES = ["-wal", "-shm", "-journal"] as const;

export type StagedTarget = Data.TaggedEnum<{
  File: { readonly target: AbsolutePath; readonly stage: AbsolutePath };
  Directory: { readonly target: AbsolutePath; readonly stage: AbsolutePath };
  Volume: { readonly volume: VolumeName };
}>;

export const StagedTarget = Data.taggedEnum<StagedTarget>();

export const describeTarget = (target: StagedTarget): string =>
  pipe(
    Match.value(target),
    Match.tag("File", ({ target: t }) => t),
    Match.tag("Directory", ({ target: t }) => `${t}/`),
    Match.tag("Volume", ({ volume }) => `volume:${volume}`),
    Match.exhaustive
  );

export type DatabasePayload = Data.TaggedEnum<{
  Native: { readonly path: AbsolutePath };
  Sql: { readonly path: AbsolutePath };
}>;

export const DatabasePayload = Data.taggedEnum<DatabasePayload>();

/** Everything an apply will put in place, resolved from the extracted artifact. */
export interface ApplyPlan {
  readonly database: Option.Option<{ readonly payload: DatabasePayload; readonly target: AbsolutePath }>;
  /** Extracted `project/` directory. */
  readonly project: Option.Option<AbsolutePath>;
  readonly volumes: readonly { readonly volume: VolumeName; readonly archive: AbsolutePath }[];
  readonly dataSnapshot: Option.Option<AbsolutePath>;
}

export type ApplyServices = Archiver | DatabaseChecker | ServiceRuntime;

const restoreError = (message: string, e?: SystemError | ServiceError | BackupError): BackupError =>
  new BackupError({
    code: ErrorCode.RESTORE_FAILED,
    message: e === undefined ? message : `${message}: ${e.message}`,
    ...causeOf(e),
  });

// ─────────────────────────────────────────────────────────────────────────────
// Staging
// ─────────────────────────────────────────────────────────────────────────────

/** Build the database at `stage` and prove it passes `integrity_check`. */
export const stageDatabase = (
  payload: DatabasePayload,
  stage: AbsolutePath
): Effect.Effect<void, BackupError, DatabaseChecker> =>
  Effect.gen(function* () {
    const checker = yield* DatabaseChecker;
    yield* Effect.mapError(removePath(stage), (e) =>
      restoreError("Cannot clear database stage", e)
    );
    yield* pipe(
      Match.value(payload),
      Match.tag("Native", ({ path }) =>
        Effect.mapError(copyFile(path, stage), (e) => restoreError("Cannot stage database", e))
      ),
      Match.tag("Sql", ({ path }) =>
        pipe(
          readText(path),
          Effect.mapError((e) => restoreError("Cannot read SQL dump", e)),
          Effect.flatMap((sql) => checker.replaySql(sql, stage)),
          Effect.mapError((e) => restoreError("SQL replay failed", e))
        )
      ),
      Match.exhaustive
    );
    const verdict = yield* Effect.mapError(checker.integrityCheck(stage), (e) =>
      restoreError("Staged database cannot be opened", e)
    );
    if (verdict !== "ok") {
      return yield* Effect.fail(restoreError(`Staged database failed integrity_check: ${verdict}`));
    }
    yield* pipe(
      Effect.forEach(SIDE_FILES, (suffix) => removePath(pathWithSuffix(stage, suffix)), {
        discard: true,
      }),
      Effect.mapError((e) => restoreError("Cannot clear database stage", e))
    );
  });

/**
 * The secret file is never backed up, so a directory swap over a tree that
 * holds it would delete it. Copy the live one into the stage first.
 */
const carrySecretFile = (
  config: AppConfig,
  target: AbsolutePath,
  stage: AbsolutePath
): Effect.Effect<void, BackupError> =>
  Effect.gen(function* () {
    const rel = relative(target, config.paths.secretFile);
    if (rel.length === 0 || rel.startsWith("..") || !(yield* fileExists(config.paths.secretFile))) {
      return;
    }
    const dest = pathJoin(stage, rel);
    yield* pipe(
      ensureDirectory(parentPath(dest), { mode: 0o700 }),
      Effect.zipRight(copyFile(config.paths.secretFile, dest)),
      Effect.mapError((e) =>
        restoreError(`Cannot keep ${config.paths.secretFile} across the restore`, e)
      )
    );
  });

const stageConfigEntry = (
  config: AppConfig,
  project: AbsolutePath,
  entry: ConfigEntry
): Effect.Effect<Option.Option<StagedTarget>, BackupError> =>
  Effect.gen(function* () {
    const source = pathJoin(project, entry.rel);
    const target = pathJoin(config.paths.root, entry.rel);
    const stage = pathWithSuffix(target, STAGE_SUFFIX);
    const present = entry.dir ? yield* directoryExists(source) : yield* fileExists(source);
    if (!present) {
      return Option.none();
    }
    yield* Effect.mapError(removePath(stage), (e) =>
      restoreError(`Cannot clear stage of ${entry.rel}`, e)
    );
    yield* pipe(
      ensureDirectory(parentPath(stage)),
      Effect.zipRight(
        entry.dir
          ? copyTree(source, stage, (p) => p === pathJoin(project, relative(config.paths.root, config.paths.secretFile)))
          : copyFile(source, stage)
      ),
      Effect.mapError((e) => restoreError(`Cannot stage ${entry.rel}`, e))
    );
    if (entry.dir) {
      yield* carrySecretFile(config, target, stage);
    }
    return Option.some(
      entry.dir ? StagedTarget.Directory({ target, stage }) : StagedTarget.File({ target, stage })
    );
  });

/**
 * Stage every part of `plan`. On failure the stages built so far are
 * discarded before the error propagates.
 */
export const stageAll = (
  config: AppConfig,
  plan: ApplyPlan
): Effect.Effect<readonly StagedTarget[], BackupError, ApplyServices> =>
  Effect.gen(function* () {
    const staged = yield* Ref.make<readonly StagedTarget[]>([]);
    const push = (target: StagedTarget): Effect.Effect<void> =>
      Ref.update(staged, (all) => [...all, target]);

    const build = Effect.gen(function* () {
      const runtime = yield* ServiceRuntime;
      const archiver = yield* Archiver;

      for (const { volume, archive } of plan.volumes) {
        yield* push(StagedTarget.Volume({ volume }));
        yield* Effect.mapError(
          runtime.stageVolume(volume, archive, config.full.volumeTimeoutMs),
          (e) => restoreError(`Cannot stage volume ${volume}`, e)
        );
      }

      // The data directory is swapped whole. A database living inside it is
      // staged into the new tree so the swap carries it along.
      const dataStage = pathWithSuffix(config.paths.dataDir, STAGE_SUFFIX);
      const dbInsideData = (db: AbsolutePath): boolean => {
        const rel = relative(config.paths.dataDir, db);
        return rel.length > 0 && !rel.startsWith("..");
      };

      if (Option.isSome(plan.dataSnapshot)) {
        yield* Effect.mapError(removePath(dataStage), (e) =>
          restoreError("Cannot clear data directory stage", e)
        );
        yield* push(StagedTarget.Directory({ target: config.paths.dataDir, stage: dataStage }));
        yield* Effect.mapError(archiver.extractArchive(plan.dataSnapshot.value, dataStage), (e) =>
          restoreError("Cannot stage data directory", e)
        );
        yield* carrySecretFile(config, config.paths.dataDir, dataStage);
      }

      if (Option.isSome(plan.database)) {
        const { payload, target } = plan.database.value;
        const intoData = Option.isSome(plan.dataSnapshot) && dbInsideData(target);
        const stage = intoData
          ? pathJoin(dataStage, relative(config.paths.dataDir, target))
          : pathWithSuffix(target, STAGE_SUFFIX);
        if (!intoData) {
          yield* push(StagedTarget.File({ target, stage }));
        }
        yield* Effect.mapError(ensureDirectory(parentPath(stage), { mode: 0o700 }), (e) =>
          restoreError("Cannot stage database", e)
        );
        yield* stageDatabase(payload, stage);
      }

      if (Option.isSome(plan.project)) {
        const project = plan.project.value;
        yield* Effect.forEach(
          allowList(config),
          (entry) =>
            Effect.flatMap(
              stageConfigEntry(config, project, entry),
              Option.match({ onNone: () => Effect.void, onSome: push })
            ),
          { discard: true }
        );
      }
    });

    yield* Effect.onError(build, () =>
      Effect.flatMap(Ref.get(staged), (all) => discardStages(config, all))
    );
    const result = yield* Ref.get(staged);
    if (result.length === 0) {
      return yield* Effect.fail(restoreError("Nothing to restore from this artifact"));
    }
    return result;
  });

/** Remove every stage. Best effort: a failure here is only logged. */
export const discardStages = (
  config: AppConfig,
  stages: readonly StagedTarget[]
): Effect.Effect<void, never, ServiceRuntime> =>
  Effect.flatMap(ServiceRuntime, (runtime) =>
    Effect.forEach(
      stages,
      (stage) =>
        pipe(
          Match.value(stage),
          Match.tag("File", ({ stage: s }) => cleanupPath(s)),
          Match.tag("Directory", ({ stage: s }) => cleanupPath(s)),
          Match.tag("Volume", ({ volume }) =>
            pipe(
              runtime.discardVolumeStage(volume, config.full.volumeTimeoutMs),
              Effect.catchAll((e) =>
                Effect.logWarning(`Could not discard stage of volume ${volume}: ${e.message}`)
              )
            )
          ),
          Match.exhaustive
        ),
      { discard: true }
    )
  );

// ─────────────────────────────────────────────────────────────────────────────
// Commit
// ─────────────────────────────────────────────────────────────────────────────

const commitOne = (
  config: AppConfig,
  stage: StagedTarget
): Effect.Effect<void, BackupError, ServiceRuntime> =>
  pipe(
    Match.value(stage),
    Match.tag("File", ({ target, stage: s }) =>
      pipe(
        renamePath(s, target),
        Effect.zipRight(
          Effect.forEach(SIDE_FILES, (suffix) => removePath(pathWithSuffix(target, suffix)), {
            discard: true,
          })
        ),
        Effect.mapError((e) => restoreError(`Cannot commit ${target}`, e))
      )
    ),
    Match.tag("Directory", ({ target, stage: s }) => {
      const old = pathWithSuffix(target, OLD_SUFFIX);
      return pipe(
        removePath(old),
        Effect.zipRight(directoryExists(target)),
        Effect.flatMap((exists) => (exists ? renamePath(target, old) : Effect.void)),
        Effect.zipRight(renamePath(s, target)),
        Effect.zipRight(removePath(old)),
        Effect.mapError((e) => restoreError(`Cannot commit ${target}/`, e))
      );
    }),
    Match.tag("Volume", ({ volume }) =>
      Effect.flatMap(ServiceRuntime, (runtime) =>
        Effect.mapError(runtime.commitVolume(volume, config.full.volumeTimeoutMs), (e) =>
          restoreError(`Cannot commit volume ${volume}`, e)
        )
      )
    ),
    Match.exhaustive
  );

/**
 * Replace live data with the stages. Needs the receipt of a quiesce that
 * covers `scope`; there is no rollback once the first rename has happened.
 */
export const applyStages = (
  config: AppConfig,
  receipt: QuiesceReceipt,
  scope: RestoreScope,
  stages: readonly StagedTarget[]
): Effect.Effect<readonly string[], BackupError, ServiceRuntime> =>
  Effect.gen(function* () {
    if (!receipt.covers(scope)) {
      return yield* Effect.fail(
        restoreError(`Services were quiesced for ${receipt.scope}, not ${scope}`)
      );
    }
    yield* Effect.forEach(stages, (stage) => commitOne(config, stage), { discard: true });
    const targets = Arr.map(stages, describeTarget);
    yield* logSuccess(`Applied ${targets.length} target(s)`);
    return targets;
  });
