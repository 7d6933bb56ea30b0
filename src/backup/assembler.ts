// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Full snapshot assembler. Stages volumes, the configuration allow-list, a
 * database set and the data directory under one private directory, then
 * archives and seals it as a single `full-<ts>.tar.gz.gpg`.
 *
 * Stage layout (and so the archive layout):
 *
 *   volume-<name>.tar.gz
 *   project/...               configuration allow-list, config-manifest.json
 *   db/...                    a complete database set
 *   bwdata-snapshot.tar.gz    data directory minus the live database
 *   logs/...                  only with --include-logs
 */

import { basename, relative, sep } from "node:path";
import { Array as Arr, Effect, Either, Option, type Redacted, pipe } from "effect";
import type { AppConfig } from "../config/app-config";
import { BACKUP_FORMAT_VALUES } from "../config/field-values";
import { resolveDatabasePath, resolvePassphrase } from "../config/secrets";
import {
  BackupError,
  type ConfigError,
  ErrorCode,
  type SystemError,
  errorMessage,
} from "../lib/errors";
import { createStepCounter, logFail, logSuccess, withSet } from "../lib/log";
import {
  type AbsolutePath,
  type SetLabel,
  type VolumeName,
  parentPath,
  pathJoin,
} from "../lib/types";
import { PROGRAM_NAME, VERSION } from "../lib/version";
import {
  cleanupPath,
  copyFile,
  copyTree,
  directoryExists,
  ensureDirectory,
  fileExists,
  removePath,
  scopedTempDirectory,
  writeText,
} from "../system/fs";
import { volumeArchiveName } from "../system/docker";
import { Archiver } from "../system/services/archive";
import { ServiceRuntime } from "../system/services/runtime";
import { type SetSummary, freshDatabaseSet } from "./catalog";
import {
  type ArtifactRecord,
  type FailedComponent,
  type FullContents,
  type SetManifest,
  writeManifest,
} from "./manifest";
import { type ProducerServices, preflight, produce } from "./producer";
import { categoryDir } from "./retention";
import { seal } from "./seal";
import { type SetId, artifactName, formatTimestamp, makeSetId, plaintextName } from "./types";
import { verifyArtifact } from "./verifier";

export const PROJECT_DIR = "project";
export const DATABASE_DIR = "db";
export const LOGS_DIR = "logs";
export const DATA_SNAPSHOT = "bwdata-snapshot.tar.gz";
export const CONFIG_MANIFEST = "config-manifest.json";

export interface FullOptions {
  readonly includeLogs: boolean;
  readonly label: Option.Option<SetLabel>;
  readonly throttled: boolean;
  readonly now: Date;
}

export type AssemblerServices = ProducerServices | ServiceRuntime;

// ─────────────────────────────────────────────────────────────────────────────
// Planning (--report-only)
// ─────────────────────────────────────────────────────────────────────────────

export interface PathPresence {
  readonly path: string;
  readonly present: boolean;
}

export interface FullPlan {
  readonly id: SetId;
  readonly artifact: string;
  readonly volumes: readonly PathPresence[];
  readonly configPaths: readonly PathPresence[];
  readonly reuse: Option.Option<SetId>;
  readonly dataDir: PathPresence;
  readonly logs: Option.Option<PathPresence>;
}

export interface ConfigEntry {
  readonly rel: string;
  readonly dir: boolean;
}

/** Allow-list entries, minus the live secret file however it is named. */
export const allowList = (config: AppConfig): readonly ConfigEntry[] =>
  pipe(
    [
      ...config.full.configFiles.map((rel) => ({ rel, dir: false })),
      ...config.full.configDirs.map((rel) => ({ rel, dir: true })),
    ],
    Arr.filter(({ rel }) => pathJoin(config.paths.root, rel) !== config.paths.secretFile)
  );

const volumePresent = (volume: VolumeName): Effect.Effect<boolean, never, ServiceRuntime> =>
  Effect.flatMap(ServiceRuntime, (runtime) =>
    pipe(
      runtime.volumeExists(volume),
      Effect.catchAll((e) =>
        Effect.as(Effect.logWarning(`Cannot inspect volume ${volume}: ${e.message}`), false)
      )
    )
  );

export const planFull = (
  config: AppConfig,
  options: FullOptions
): Effect.Effect<FullPlan, SystemError, ServiceRuntime> =>
  Effect.gen(function* () {
    const timestamp = formatTimestamp(options.now);
    const volumes = yield* Effect.forEach(config.full.volumes, (volume) =>
      Effect.map(volumePresent(volume), (present) => ({ path: volume, present }))
    );
    const configPaths = yield* Effect.forEach(allowList(config), ({ rel, dir }) =>
      Effect.map(
        dir
          ? directoryExists(pathJoin(config.paths.root, rel))
          : fileExists(pathJoin(config.paths.root, rel)),
        (present) => ({ path: dir ? `${rel}/` : rel, present })
      )
    );
    const reuse = yield* freshDatabaseSet(
      config.paths.backupRoot,
      config.full.freshnessHours,
      options.now
    );
    const logs = options.includeLogs
      ? Option.some({
          path: config.paths.logDir,
          present: yield* directoryExists(config.paths.logDir),
        })
      : Option.none();

    return {
      id: makeSetId(timestamp, options.label),
      artifact: artifactName("full", timestamp),
      volumes,
      configPaths,
      reuse: Option.map(reuse, (set) => set.id),
      dataDir: { path: config.paths.dataDir, present: yield* directoryExists(config.paths.dataDir) },
      logs,
    };
  });

// ─────────────────────────────────────────────────────────────────────────────
// Stage builders
// ─────────────────────────────────────────────────────────────────────────────

interface Collected<A> {
  readonly included: readonly A[];
  readonly failed: readonly FailedComponent[];
}

const exportVolumes = (
  config: AppConfig,
  content: AbsolutePath
): Effect.Effect<Collected<string>, never, ServiceRuntime> =>
  Effect.gen(function* () {
    const runtime = yield* ServiceRuntime;
    const results = yield* Effect.forEach(config.full.volumes, (volume) =>
      Effect.gen(function* () {
        if (!(yield* volumePresent(volume))) {
          yield* Effect.logWarning(`Volume ${volume} does not exist, skipping`);
          return Option.none<Either.Either<string, FailedComponent>>();
        }
        return Option.some(
          yield* pipe(
            runtime.exportVolume(volume, content, config.full.volumeTimeoutMs),
            // A failed or timed-out export may leave a truncated archive behind.
            Effect.tapError(() => cleanupPath(pathJoin(content, volumeArchiveName(volume)))),
            Effect.tap((file) => logSuccess(`Exported volume ${volume} as ${file}`)),
            Effect.as(volume),
            Effect.either,
            Effect.map(
              Either.mapLeft(
                (e): FailedComponent => ({ component: `volume:${volume}`, error: e.message })
              )
            )
          )
        );
      })
    );
    const [failed, included] = Arr.partitionMap(Arr.getSomes(results), (r) => r);
    yield* Effect.forEach(failed, (f) => logFail(`${f.component}: ${f.error}`), { discard: true });
    return { included, failed };
  });

const copyEntry = (
  config: AppConfig,
  projectDir: AbsolutePath,
  entry: ConfigEntry
): Effect.Effect<Option.Option<Either.Either<string, FailedComponent>>> =>
  Effect.gen(function* () {
    const source = pathJoin(config.paths.root, entry.rel);
    const dest = pathJoin(projectDir, entry.rel);
    const present = entry.dir ? yield* directoryExists(source) : yield* fileExists(source);
    if (!present) {
      yield* Effect.logWarning(`Configuration ${entry.dir ? "directory" : "file"} not found: ${entry.rel}`);
      return Option.none();
    }
    const copy = Effect.zipRight(
      ensureDirectory(parentPath(dest), { mode: 0o700 }),
      entry.dir
        ? copyTree(source, dest, (p) => p === config.paths.secretFile)
        : copyFile(source, dest)
    );
    return Option.some(
      yield* pipe(
        copy,
        Effect.as(entry.dir ? `${entry.rel}/` : entry.rel),
        Effect.either,
        Effect.map(
          Either.mapLeft(
            (e): FailedComponent => ({ component: `config:${entry.rel}`, error: e.message })
          )
        )
      )
    );
  });

const copyConfig = (
  config: AppConfig,
  content: AbsolutePath
): Effect.Effect<Collected<string>, SystemError> =>
  Effect.gen(function* () {
    const projectDir = pathJoin(content, PROJECT_DIR);
    yield* ensureDirectory(projectDir, { mode: 0o700 });
    const results = yield* Effect.forEach(allowList(config), (entry) =>
      copyEntry(config, projectDir, entry)
    );
    const [failed, included] = Arr.partitionMap(Arr.getSomes(results), (r) => r);

    yield* writeText(
      pathJoin(projectDir, CONFIG_MANIFEST),
      `${JSON.stringify(
        {
          copied: included,
          failed: failed.map((f) => f.component),
          excluded: [relative(config.paths.root, config.paths.secretFile)],
          note: "The secret file is never included in a backup.",
        },
        null,
        2
      )}\n`,
      { mode: 0o600 }
    );
    yield* logSuccess(`Configuration: ${included.length} item(s) copied`);
    return { included, failed };
  });

const copyLogs = (
  config: AppConfig,
  content: AbsolutePath
): Effect.Effect<Option.Option<FailedComponent>> =>
  Effect.gen(function* () {
    if (!(yield* directoryExists(config.paths.logDir))) {
      yield* Effect.logWarning(`Log directory ${config.paths.logDir} not found, skipping logs`);
      return Option.none();
    }
    return yield* pipe(
      copyTree(config.paths.logDir, pathJoin(content, LOGS_DIR)),
      Effect.as(Option.none<FailedComponent>()),
      Effect.catchAll((e) => Effect.succeed(Option.some({ component: "logs", error: e.message })))
    );
  });

interface IncludedDatabase {
  readonly id: Option.Option<string>;
  readonly reused: boolean;
  readonly failure: Option.Option<FailedComponent>;
}

const copySet = (
  set: { readonly dir: AbsolutePath },
  content: AbsolutePath
): Effect.Effect<void, SystemError> => copyTree(set.dir, pathJoin(content, DATABASE_DIR));

/**
 * Reuse a fresh database set, or produce one in `scratch` (outside the
 * backup root's own `db/` category) and include that.
 */
const includeDatabase = (
  config: AppConfig,
  content: AbsolutePath,
  scratch: AbsolutePath,
  options: FullOptions
): Effect.Effect<IncludedDatabase, SystemError, ProducerServices> =>
  Effect.gen(function* () {
    const fresh: Option.Option<SetSummary> = yield* freshDatabaseSet(
      config.paths.backupRoot,
      config.full.freshnessHours,
      options.now
    );
    if (Option.isSome(fresh)) {
      const reused = yield* Effect.either(copySet(fresh.value, content));
      if (Either.isRight(reused)) {
        yield* logSuccess(`Database set ${fresh.value.id} reused`);
        return { id: Option.some(fresh.value.id), reused: true, failure: Option.none() };
      }
      yield* Effect.logWarning(
        `Could not copy database set ${fresh.value.id} (${reused.left.message}); producing a fresh one`
      );
    }

    const produced = yield* pipe(
      preflight(config, options.throttled),
      Effect.map((pre) => ({ ...pre, backupRoot: scratch })),
      Effect.flatMap((pre) =>
        produce(pre, { formats: BACKUP_FORMAT_VALUES, validate: false, now: options.now })
      ),
      Effect.tap((set) => copySet(set, content)),
      Effect.either
    );
    return Either.match(produced, {
      onLeft: (e: ConfigError | SystemError | BackupError): IncludedDatabase => ({
        id: Option.none(),
        reused: false,
        failure: Option.some({ component: "database", error: e.message }),
      }),
      onRight: (set): IncludedDatabase => ({
        id: Option.some(set.id),
        reused: false,
        failure: Option.none(),
      }),
    });
  });

/** Paths relative to the data directory that the snapshot leaves out. */
const snapshotExclusions = (
  config: AppConfig,
  database: Option.Option<AbsolutePath>
): ReadonlySet<string> =>
  new Set(
    pipe(
      [
        ...Option.match(database, {
          onNone: (): string[] => [],
          onSome: (db): string[] => [db, `${db}-wal`, `${db}-shm`, `${db}-journal`],
        }),
        config.paths.secretFile,
      ],
      Arr.map((p) => relative(config.paths.dataDir, p)),
      Arr.filter((rel) => rel.length > 0 && !rel.startsWith("..")),
      Arr.map((rel) => rel.split(sep).join("/"))
    )
  );

const snapshotData = (
  config: AppConfig,
  content: AbsolutePath
): Effect.Effect<Either.Either<boolean, FailedComponent>, never, Archiver> =>
  Effect.gen(function* () {
    if (!(yield* directoryExists(config.paths.dataDir))) {
      yield* Effect.logWarning(`Data directory ${config.paths.dataDir} not found, skipping snapshot`);
      return Either.right(false);
    }
    const archiver = yield* Archiver;
    const database = yield* pipe(
      resolveDatabasePath(config),
      Effect.map(Option.some),
      Effect.catchAll((e) =>
        Effect.as(Effect.logDebug(`Live database unknown: ${errorMessage(e)}`), Option.none())
      )
    );
    const excluded = snapshotExclusions(config, database);
    return yield* pipe(
      archiver.createArchive(config.paths.dataDir, pathJoin(content, DATA_SNAPSHOT), {
        gzip: true,
        exclude: (rel) => excluded.has(rel),
      }),
      Effect.tap(() => logSuccess(`Data snapshot: ${DATA_SNAPSHOT}`)),
      Effect.as(Either.right(true)),
      Effect.catchAll((e) =>
        Effect.as(
          logFail(`Data snapshot failed: ${e.message}`),
          Either.left({ component: "data-snapshot", error: e.message })
        )
      )
    );
  });

// ─────────────────────────────────────────────────────────────────────────────
// Assembly
// ─────────────────────────────────────────────────────────────────────────────

export interface AssembledSet {
  readonly id: SetId;
  readonly dir: AbsolutePath;
  readonly manifest: SetManifest;
}

const sealAndVerify = (
  content: AbsolutePath,
  work: AbsolutePath,
  setDir: AbsolutePath,
  timestamp: string,
  secret: Redacted.Redacted<string>,
  throttled: boolean
): Effect.Effect<ArtifactRecord, BackupError | SystemError, ProducerServices> =>
  Effect.gen(function* () {
    const archiver = yield* Archiver;
    const tarPath = pathJoin(work, plaintextName("full", timestamp));
    yield* archiver.createArchive(content, tarPath);
    const sealed = yield* seal(tarPath, pathJoin(setDir, artifactName("full", timestamp)), secret, {
      lowPriority: throttled,
    });
    yield* removePath(tarPath);
    const verification = yield* verifyArtifact(sealed.path, secret);
    return {
      kind: "full",
      file: basename(sealed.path),
      plaintextBytes: sealed.plaintextBytes,
      compressedBytes: sealed.compressedBytes,
      encryptedBytes: sealed.encryptedBytes,
      verification,
    } satisfies ArtifactRecord;
  });

/**
 * Build a full set under `<backupRoot>/full/<id>`. Component failures are
 * recorded and the run continues; only the final archive, seal or manifest
 * failing fails the run, and then the set directory is removed.
 */
export const assembleFull = (
  config: AppConfig,
  options: FullOptions
): Effect.Effect<AssembledSet, ConfigError | SystemError | BackupError, AssemblerServices> => {
  const timestamp = formatTimestamp(options.now);
  const id = makeSetId(timestamp, options.label);
  const setDir = pathJoin(categoryDir(config.paths.backupRoot, "full"), id);

  const assemble = Effect.scoped(
    Effect.gen(function* () {
      const secret = yield* resolvePassphrase(config);
      if (yield* directoryExists(setDir)) {
        return yield* Effect.fail(
          new BackupError({
            code: ErrorCode.BACKUP_FAILED,
            message: `Full backup set ${setDir} already exists`,
            path: setDir,
          })
        );
      }

      yield* ensureDirectory(config.paths.backupRoot, { mode: 0o700 });
      const stage = yield* scopedTempDirectory(`.staging-full-${id}`, config.paths.backupRoot);
      const content = pathJoin(stage, "content");
      const work = pathJoin(stage, "work");
      const scratch = pathJoin(stage, "scratch");
      yield* Effect.forEach([content, work, scratch], (d) => ensureDirectory(d, { mode: 0o700 }), {
        discard: true,
      });

      const steps = yield* createStepCounter(options.includeLogs ? 6 : 5);

      yield* steps.next("Exporting volumes");
      const volumes = yield* exportVolumes(config, content);

      yield* steps.next("Copying configuration");
      const configured = yield* copyConfig(config, content);

      const logFailure = options.includeLogs
        ? yield* Effect.zipRight(steps.next("Copying logs"), copyLogs(config, content))
        : Option.none<FailedComponent>();

      yield* steps.next("Including database set");
      const database = yield* includeDatabase(config, content, scratch, options);

      yield* steps.next("Snapshotting data directory");
      const snapshot = yield* snapshotData(config, content);

      yield* steps.next("Archiving, sealing and verifying");
      yield* ensureDirectory(setDir, { mode: 0o700 });
      const artifact = yield* Effect.onError(
        sealAndVerify(content, work, setDir, timestamp, secret, options.throttled),
        () => cleanupPath(setDir)
      );

      const failed: readonly FailedComponent[] = [
        ...volumes.failed,
        ...configured.failed,
        ...Option.toArray(logFailure),
        ...Option.toArray(database.failure),
        ...Either.match(snapshot, { onLeft: (f) => [f], onRight: (): FailedComponent[] => [] }),
      ];
      const contents: FullContents = {
        volumes: volumes.included,
        configPaths: configured.included,
        databaseSet: Option.getOrUndefined(database.id),
        databaseSetReused: database.reused,
        dataSnapshot: Either.getOrElse(snapshot, () => false),
        logs: options.includeLogs && Option.isNone(logFailure),
      };
      const manifest: SetManifest = {
        schemaVersion: 1,
        producer: `${PROGRAM_NAME} ${VERSION}`,
        id,
        category: "full",
        createdAt: options.now.toISOString(),
        artifacts: [artifact],
        failed,
        contents,
      };
      yield* Effect.onError(writeManifest(setDir, manifest), () => cleanupPath(setDir));
      return { id, dir: setDir, manifest };
    })
  );

  return withSet(id)(assemble);
};
