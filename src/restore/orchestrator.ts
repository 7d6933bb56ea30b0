// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restore orchestrator: drives the apply and dry-run state machines.
 *
 * Failures before the first commit discard the stages and bring the
 * stopped services back up. Failures after it leave the host as it is:
 * there is no rollback.
 */

import { basename } from "node:path";
import { Array as Arr, Effect, Match, Option, type Redacted, Ref, pipe } from "effect";
import type { AppConfig } from "../config/app-config";
import type { RestoreMode, RestoreScope } from "../config/field-values";
import { resolveDatabasePath, resolvePassphrase } from "../config/secrets";
import { DATABASE_DIR, DATA_SNAPSHOT, PROJECT_DIR } from "../backup/assembler";
import { latestArtifact } from "../backup/catalog";
import { readManifest } from "../backup/manifest";
import { unseal } from "../backup/seal";
import { type ArtifactKind, kindOfArtifact } from "../backup/types";
import {
  BackupError,
  type ConfigError,
  ErrorCode,
  GeneralError,
  type ServiceError,
  type SystemError,
} from "../lib/errors";
import { logFail, logSuccess } from "../lib/log";
import { attemptSchedule } from "../lib/retry";
import { type AbsolutePath, parentPath, pathJoin } from "../lib/types";
import {
  directoryExists,
  ensureDirectory,
  fileExists,
  listDirectory,
  readText,
  scopedTempDirectory,
} from "../system/fs";
import { volumeNameFromArchive } from "../system/docker";
import { Archiver } from "../system/services/archive";
import type { Compressor } from "../system/services/compress";
import { DatabaseChecker } from "../system/services/database";
import type { Encryptor } from "../system/services/encrypt";
import { ServiceRuntime } from "../system/services/runtime";
import {
  type ApplyPlan,
  type ApplyServices,
  DatabasePayload,
  type StagedTarget,
  applyStages,
  discardStages,
  stageAll,
} from "./apply";
import { quiesce } from "./quiesce";
import { DryRunState, type DryRunReport, RestoreState, type RestoreStateTag } from "./state";

export interface RestoreRequest {
  readonly artifact: Option.Option<AbsolutePath>;
  readonly latest: boolean;
  readonly scope: RestoreScope;
  readonly mode: RestoreMode;
}

export interface AppliedRestore {
  readonly _tag: "Applied";
  readonly artifact: AbsolutePath;
  readonly targets: readonly string[];
  readonly healthAttempts: number;
  readonly history: readonly RestoreStateTag[];
}

export interface DryRunRestore {
  readonly _tag: "DryRun";
  readonly report: DryRunReport;
  readonly history: readonly DryRunState["_tag"][];
}

export type RestoreOutcome = AppliedRestore | DryRunRestore;

export type RestoreServices = ApplyServices | Compressor | Encryptor;

type RestoreError = ConfigError | SystemError | ServiceError | BackupError | GeneralError;

const restoreFailed = (message: string): BackupError =>
  new BackupError({ code: ErrorCode.RESTORE_FAILED, message });

// ─────────────────────────────────────────────────────────────────────────────
// Artifact resolution
// ─────────────────────────────────────────────────────────────────────────────

/** Artifact kinds each scope can restore from. */
const ACCEPTED_KINDS: { readonly [S in RestoreScope]: readonly ArtifactKind[] } = {
  database: ["native", "sql", "full"],
  config: ["full"],
  full: ["full"],
};

export const resolveArtifact = (
  config: AppConfig,
  request: RestoreRequest
): Effect.Effect<{ readonly path: AbsolutePath; readonly kind: ArtifactKind }, RestoreError> =>
  Effect.gen(function* () {
    const path = yield* Option.match(request.artifact, {
      onSome: (p): Effect.Effect<AbsolutePath, RestoreError> =>
        Effect.flatMap(fileExists(p), (exists) =>
          exists
            ? Effect.succeed(p)
            : Effect.fail(
                new BackupError({
                  code: ErrorCode.BACKUP_NOT_FOUND,
                  message: `Artifact not found: ${p}`,
                  path: p,
                })
              )
        ),
      onNone: (): Effect.Effect<AbsolutePath, RestoreError> =>
        request.latest
          ? Effect.flatMap(
              latestArtifact(config.paths.backupRoot, request.scope),
              Option.match({
                onNone: (): Effect.Effect<AbsolutePath, RestoreError> =>
                  Effect.fail(
                    new BackupError({
                      code: ErrorCode.BACKUP_NOT_FOUND,
                      message: `No ${request.scope} backup found under ${config.paths.backupRoot}`,
                    })
                  ),
                onSome: (p): Effect.Effect<AbsolutePath, RestoreError> => Effect.succeed(p),
              })
            )
          : Effect.fail(
              new GeneralError({
                code: ErrorCode.INVALID_ARGS,
                message: "Name an artifact to restore, or pass --latest",
              })
            ),
    });

    const kind = yield* pipe(
      kindOfArtifact(basename(path)),
      Option.match({
        onNone: (): Effect.Effect<ArtifactKind, BackupError> =>
          Effect.fail(restoreFailed(`${basename(path)} is not a recognised artifact name`)),
        onSome: (k): Effect.Effect<ArtifactKind, BackupError> => Effect.succeed(k),
      })
    );
    if (!ACCEPTED_KINDS[request.scope].includes(kind)) {
      return yield* Effect.fail(
        restoreFailed(`A ${kind} artifact cannot be used for a ${request.scope} restore`)
      );
    }
    return { path, kind };
  });

// ─────────────────────────────────────────────────────────────────────────────
// Planning from extracted content
// ─────────────────────────────────────────────────────────────────────────────

/** The database payload inside an extracted full archive's `db/` set. */
const embeddedDatabase = (
  root: AbsolutePath,
  workDir: AbsolutePath,
  secret: Redacted.Redacted<string>
): Effect.Effect<Option.Option<DatabasePayload>, RestoreError, Compressor | Encryptor> =>
  Effect.gen(function* () {
    const setDir = pathJoin(root, DATABASE_DIR);
    const files = yield* listDirectory(setDir);
    const pick = (kind: ArtifactKind): Option.Option<string> =>
      pipe(
        Arr.findFirst(files, (f) =>
          f.isFile && Option.exists(kindOfArtifact(f.name), (k) => k === kind) && f.name.endsWith(".gpg")
        ),
        Option.map((f) => f.name)
      );
    const native = pick("native");
    const chosen = Option.isSome(native)
      ? Option.some({ name: native.value, sql: false })
      : Option.map(pick("sql"), (name) => ({ name, sql: true }));
    if (Option.isNone(chosen)) {
      return Option.none();
    }
    const dbWork = pathJoin(workDir, "embedded-db");
    yield* ensureDirectory(dbWork, { mode: 0o700 });
    const plain = yield* unseal(pathJoin(setDir, chosen.value.name), dbWork, secret);
    return Option.some(
      chosen.value.sql ? DatabasePayload.Sql({ path: plain }) : DatabasePayload.Native({ path: plain })
    );
  });

const directPayload = (kind: ArtifactKind, plaintext: AbsolutePath): Option.Option<DatabasePayload> =>
  pipe(
    Match.value(kind),
    Match.when("native", () => Option.some(DatabasePayload.Native({ path: plaintext }))),
    Match.when("sql", () => Option.some(DatabasePayload.Sql({ path: plaintext }))),
    Match.orElse(() => Option.none<DatabasePayload>())
  );

/**
 * Volumes the set manifest beside `artifact` records as exported. None for
 * an artifact outside its set directory or a manifest without contents.
 */
const recordedVolumes = (
  artifact: AbsolutePath
): Effect.Effect<Option.Option<readonly string[]>> =>
  pipe(
    readManifest(parentPath(artifact)),
    Effect.map(
      Option.flatMap((manifest) =>
        manifest.artifacts.some((a) => a.file === basename(artifact))
          ? Option.fromNullable(manifest.contents?.volumes)
          : Option.none<readonly string[]>()
      )
    ),
    Effect.catchAll((e) =>
      Effect.as(
        Effect.logWarning(`Ignoring the set manifest: ${e.message}`),
        Option.none<readonly string[]>()
      )
    )
  );

const buildPlan = (
  config: AppConfig,
  scope: RestoreScope,
  extracted: {
    readonly artifact: AbsolutePath;
    readonly root: AbsolutePath;
    readonly entries: readonly string[];
    readonly kind: ArtifactKind;
  },
  plaintext: AbsolutePath,
  workDir: AbsolutePath,
  secret: Redacted.Redacted<string>
): Effect.Effect<ApplyPlan, RestoreError, Compressor | Encryptor> =>
  Effect.gen(function* () {
    const wantsDatabase = scope === "database" || scope === "full";
    const payload = !wantsDatabase
      ? Option.none<DatabasePayload>()
      : extracted.kind === "full"
        ? yield* embeddedDatabase(extracted.root, workDir, secret)
        : directPayload(extracted.kind, plaintext);

    if (scope === "database" && Option.isNone(payload)) {
      return yield* Effect.fail(restoreFailed("The artifact holds no database set to restore"));
    }
    const target = wantsDatabase ? yield* resolveDatabasePath(config) : undefined;

    const isFull = extracted.kind === "full";
    const projectDir = pathJoin(extracted.root, PROJECT_DIR);
    const project =
      isFull && (scope === "config" || scope === "full") && (yield* directoryExists(projectDir))
        ? Option.some(projectDir)
        : Option.none();
    if (scope === "config" && Option.isNone(project)) {
      return yield* Effect.fail(restoreFailed(`The archive has no ${PROJECT_DIR}/ tree`));
    }

    // The manifest is authoritative: a volume listed under `failed` is
    // never restored, whatever the archive holds.
    const recorded =
      isFull && scope === "full"
        ? yield* recordedVolumes(extracted.artifact)
        : Option.none<readonly string[]>();
    const volumes =
      isFull && scope === "full"
        ? Arr.filterMap(extracted.entries, (entry) =>
            pipe(
              volumeNameFromArchive(entry),
              Option.filter((volume) =>
                Option.match(recorded, {
                  onNone: () => true,
                  onSome: (listed) => listed.includes(volume),
                })
              ),
              Option.map((volume) => ({ volume, archive: pathJoin(extracted.root, entry) }))
            )
          )
        : [];
    const dataSnapshot =
      isFull && scope === "full" && extracted.entries.includes(DATA_SNAPSHOT)
        ? Option.some(pathJoin(extracted.root, DATA_SNAPSHOT))
        : Option.none();

    return {
      database:
        target === undefined
          ? Option.none()
          : Option.map(payload, (p) => ({ payload: p, target })),
      project,
      volumes,
      dataSnapshot,
    };
  });

/** Targets an apply of `plan` would replace, without staging anything. */
const planTargets = (config: AppConfig, plan: ApplyPlan): readonly string[] => [
  ...plan.volumes.map(({ volume }) => `volume:${volume}`),
  ...Option.toArray(Option.map(plan.dataSnapshot, () => `${config.paths.dataDir}/`)),
  ...Option.toArray(Option.map(plan.database, ({ target }) => target)),
  ...Option.toArray(Option.map(plan.project, () => `${config.paths.root} (configuration)`)),
];

// ─────────────────────────────────────────────────────────────────────────────
// Shared steps
// ─────────────────────────────────────────────────────────────────────────────

interface Unpacked {
  readonly plaintext: AbsolutePath;
  readonly root: AbsolutePath;
  readonly entries: readonly string[];
}

/** Decrypt and decompress, then untar a full archive (entries checked for traversal). */
const unpack = (
  artifact: AbsolutePath,
  kind: ArtifactKind,
  workDir: AbsolutePath,
  secret: Redacted.Redacted<string>,
  onDecrypted: (plaintext: AbsolutePath) => Effect.Effect<void>
): Effect.Effect<Unpacked, RestoreError, Archiver | Compressor | Encryptor> =>
  Effect.gen(function* () {
    const plaintext = yield* unseal(artifact, workDir, secret);
    yield* onDecrypted(plaintext);
    if (kind !== "full") {
      return { plaintext, root: workDir, entries: [basename(plaintext)] };
    }
    const archiver = yield* Archiver;
    const root = pathJoin(workDir, "extract");
    const entries = yield* archiver.extractArchive(plaintext, root);
    return { plaintext, root, entries };
  });

const waitHealthy = (
  config: AppConfig,
  scope: RestoreScope
): Effect.Effect<number, BackupError, ServiceRuntime> =>
  Effect.gen(function* () {
    const runtime = yield* ServiceRuntime;
    const attempts = config.restore.healthAttempts[scope];
    const counter = yield* Ref.make(0);
    const probe = pipe(
      Ref.updateAndGet(counter, (n) => n + 1),
      Effect.zipRight(runtime.isHealthy()),
      Effect.filterOrFail(
        (healthy) => healthy,
        () => restoreFailed("unhealthy")
      )
    );
    yield* pipe(
      probe,
      Effect.retry(attemptSchedule(attempts, config.restore.healthIntervalMs)),
      Effect.mapError(() =>
        restoreFailed(
          `Service not healthy after ${attempts} checks ${config.restore.healthIntervalMs}ms apart; ` +
            "restored data was left in place"
        )
      )
    );
    return yield* Ref.get(counter);
  });

// ─────────────────────────────────────────────────────────────────────────────
// Apply
// ─────────────────────────────────────────────────────────────────────────────

const applyRestore = (
  config: AppConfig,
  request: RestoreRequest
): Effect.Effect<AppliedRestore, RestoreError, RestoreServices> =>
  Effect.gen(function* () {
    const history = yield* Ref.make<readonly RestoreStateTag[]>([]);
    const enter = (state: RestoreState): Effect.Effect<void> =>
      Effect.zipRight(
        Ref.update(history, (h) => [...h, state._tag]),
        Effect.logDebug(`Restore state: ${state._tag}`)
      );

    const { path: artifact, kind } = yield* resolveArtifact(config, request);
    const secret = yield* resolvePassphrase(config);
    yield* enter(RestoreState.Idle({ artifact, kind }));

    const receipt = yield* quiesce(request.scope);
    yield* enter(RestoreState.ServiceQuiesced({ artifact, kind, receipt }));

    const runtime = yield* ServiceRuntime;
    const staged = yield* Ref.make<readonly StagedTarget[]>([]);

    // Until the commit starts, a failure leaves live data untouched: put
    // the services back the way they were.
    const prepare = Effect.scoped(
      Effect.gen(function* () {
        const workDir = yield* scopedTempDirectory("vaultkeep-restore");
        const unpacked = yield* unpack(artifact, kind, workDir, secret, (plaintext) =>
          enter(RestoreState.Decrypted({ plaintext, kind, receipt }))
        );
        yield* enter(
          RestoreState.Extracted({ root: unpacked.root, entries: unpacked.entries, kind, receipt })
        );
        const plan = yield* buildPlan(
          config,
          request.scope,
          { artifact, root: unpacked.root, entries: unpacked.entries, kind },
          unpacked.plaintext,
          workDir,
          secret
        );
        const stages = yield* stageAll(config, plan);
        yield* Ref.set(staged, stages);
        return stages;
      })
    );

    const recover = (message: string): Effect.Effect<void, never, ServiceRuntime> =>
      Effect.gen(function* () {
        yield* enter(RestoreState.Failed({ from: "prepare", message }));
        yield* discardStages(config, yield* Ref.get(staged));
        yield* pipe(
          runtime.start(request.scope),
          Effect.zipRight(Effect.logWarning("Restore aborted before any change; services restarted")),
          Effect.catchAll((e) => logFail(`Restore aborted and services did not restart: ${e.message}`))
        );
      });

    const stages = yield* Effect.tapError(prepare, (e) => recover(e.message));

    const targets = yield* pipe(
      applyStages(config, receipt, request.scope, stages),
      Effect.tapError((e) => enter(RestoreState.Failed({ from: "Applied", message: e.message })))
    );
    yield* enter(RestoreState.Applied({ targets, receipt }));

    yield* pipe(
      runtime.start(request.scope),
      Effect.mapError((e) =>
        restoreFailed(`Data restored but services failed to start: ${e.message}`)
      ),
      Effect.tapError((e) => enter(RestoreState.Failed({ from: "ServiceResumed", message: e.message })))
    );
    yield* enter(RestoreState.ServiceResumed({ targets }));

    const attempts = yield* pipe(
      waitHealthy(config, request.scope),
      Effect.tapError((e) => enter(RestoreState.Failed({ from: "HealthVerified", message: e.message })))
    );
    yield* enter(RestoreState.HealthVerified({ targets, attempts }));
    yield* logSuccess(`Restore of ${basename(artifact)} complete; service healthy`);

    return {
      _tag: "Applied",
      artifact,
      targets,
      healthAttempts: attempts,
      history: yield* Ref.get(history),
    } satisfies AppliedRestore;
  });

// ─────────────────────────────────────────────────────────────────────────────
// Dry run
// ─────────────────────────────────────────────────────────────────────────────

const checkPayload = (
  payload: Option.Option<DatabasePayload>,
  workDir: AbsolutePath
): Effect.Effect<string, BackupError, DatabaseChecker> =>
  Effect.gen(function* () {
    if (Option.isNone(payload)) {
      return "no database payload";
    }
    const checker = yield* DatabaseChecker;
    const db = yield* pipe(
      Match.value(payload.value),
      Match.tag("Native", ({ path }): Effect.Effect<AbsolutePath, BackupError> => Effect.succeed(path)),
      Match.tag("Sql", ({ path }): Effect.Effect<AbsolutePath, BackupError> => {
        const replayed = pathJoin(workDir, "dry-run-replay.sqlite3");
        return pipe(
          readText(path),
          Effect.mapError((e) => restoreFailed(`Cannot read SQL dump: ${e.message}`)),
          Effect.flatMap((sql) => checker.replaySql(sql, replayed)),
          Effect.as(replayed)
        );
      }),
      Match.exhaustive
    );
    const verdict = yield* checker.integrityCheck(db);
    if (verdict !== "ok") {
      return yield* Effect.fail(restoreFailed(`Database payload failed integrity_check: ${verdict}`));
    }
    return "database integrity_check ok";
  });

const dryRunRestore = (
  config: AppConfig,
  request: RestoreRequest
): Effect.Effect<DryRunRestore, RestoreError, RestoreServices> =>
  Effect.scoped(
    Effect.gen(function* () {
      const history = yield* Ref.make<readonly DryRunState["_tag"][]>([]);
      const enter = (state: DryRunState): Effect.Effect<void> =>
        Effect.zipRight(
          Ref.update(history, (h) => [...h, state._tag]),
          Effect.logDebug(`Dry-run state: ${state._tag}`)
        );

      const { path: artifact, kind } = yield* resolveArtifact(config, request);
      const secret = yield* resolvePassphrase(config);
      yield* enter(DryRunState.Idle({ artifact, kind }));

      const workDir = yield* scopedTempDirectory("vaultkeep-dry-run");
      const unpacked = yield* unpack(artifact, kind, workDir, secret, (plaintext) =>
        enter(DryRunState.Decrypted({ plaintext, kind }))
      );
      yield* enter(DryRunState.Extracted({ root: unpacked.root, entries: unpacked.entries, kind }));

      const plan = yield* buildPlan(
        config,
        request.scope,
        { artifact, root: unpacked.root, entries: unpacked.entries, kind },
        unpacked.plaintext,
        workDir,
        secret
      );
      const check = yield* checkPayload(
        Option.map(plan.database, ({ payload }) => payload),
        workDir
      );
      const report: DryRunReport = {
        artifact,
        kind,
        check,
        targets: planTargets(config, plan),
        entries: unpacked.entries.length,
      };
      yield* enter(DryRunState.Verified({ report }));
      yield* logSuccess(`Dry run of ${basename(artifact)} passed: ${check}`);
      return { _tag: "DryRun", report, history: yield* Ref.get(history) } satisfies DryRunRestore;
    })
  );

/** Restore `request`; a dry run never stops a service or touches live data. */
export const restore = (
  config: AppConfig,
  request: RestoreRequest
): Effect.Effect<RestoreOutcome, RestoreError, RestoreServices> =>
  request.mode === "dry-run" ? dryRunRestore(config, request) : applyRestore(config, request);
