// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup producer: one database set per run, one artifact per requested
 * format. Formats are independent; a failing format is recorded in the
 * manifest and the others carry on.
 */

import { basename } from "node:path";
import { Array as Arr, Duration, Effect, Either, Option, type Redacted, pipe } from "effect";
import type { AppConfig } from "../config/app-config";
import type { BackupFormat } from "../config/field-values";
import { resolveLiveDatabase, resolvePassphrase } from "../config/secrets";
import {
  BackupError,
  type ConfigError,
  ErrorCode,
  SystemError,
  errorMessage,
} from "../lib/errors";
import { createStepCounter, logFail, logSuccess, withSet } from "../lib/log";
import { type AbsolutePath, parentPath, pathJoin, pathWithSuffix } from "../lib/types";
import { PROGRAM_NAME, VERSION } from "../lib/version";
import {
  cleanupPath,
  directoryExists,
  ensureDirectory,
  fileExists,
  fileSizeOrZero,
  removePath,
  scopedTempDirectory,
} from "../system/fs";
import {
  WAL_CHECKPOINT_THRESHOLD,
  ensureFreeSpace,
  extractionTimeoutMs,
  lowerOwnPriority,
} from "../system/resources";
import type { Archiver } from "../system/services/archive";
import { DatabaseChecker } from "../system/services/database";
import { checkpointWal } from "../system/sqlite";
import { FORMAT_STRATEGIES } from "./formats";
import {
  type ArtifactRecord,
  type FailedComponent,
  type SetManifest,
  type VerificationResult,
  failed,
  firstFailedLayer,
  skipped,
  verificationPassed,
  writeManifest,
} from "./manifest";
import { seal } from "./seal";
import { categoryDir } from "./retention";
import {
  type SetId,
  artifactName,
  formatTimestamp,
  makeSetId,
  plaintextName,
} from "./types";
import { type VerifyServices, verifyArtifact } from "./verifier";

// ─────────────────────────────────────────────────────────────────────────────
// Pre-flight
// ─────────────────────────────────────────────────────────────────────────────

export interface Preflight {
  readonly source: AbsolutePath;
  readonly secret: Redacted.Redacted<string>;
  readonly backupRoot: AbsolutePath;
  readonly databaseBytes: number;
  readonly walBytes: number;
  readonly journalMode: string;
  readonly timeoutMs: number;
  readonly throttled: boolean;
}

/** Closest existing directory at or above `path`; statfs needs one. */
const existingAncestor = (path: AbsolutePath): Effect.Effect<AbsolutePath> =>
  Effect.flatMap(directoryExists(path), (exists) =>
    exists || parentPath(path) === path
      ? Effect.succeed(path)
      : existingAncestor(parentPath(path))
  );

/**
 * Everything a run needs to know before writing a byte. Configuration
 * problems surface here, ahead of any side effect.
 */
export const preflight = (
  config: AppConfig,
  throttled: boolean
): Effect.Effect<Preflight, ConfigError | SystemError | BackupError, DatabaseChecker> =>
  Effect.gen(function* () {
    const source = yield* resolveLiveDatabase(config);
    const secret = yield* resolvePassphrase(config);
    const checker = yield* DatabaseChecker;

    const databaseBytes = yield* fileSizeOrZero(source);
    const walBytes = yield* fileSizeOrZero(pathWithSuffix(source, "-wal"));

    const available = yield* ensureFreeSpace(
      yield* existingAncestor(config.paths.backupRoot),
      databaseBytes
    );
    const journalMode = yield* checker.journalMode(source);
    const timeoutMs = extractionTimeoutMs(databaseBytes, walBytes);

    yield* Effect.logDebug(
      `Source ${source}: ${databaseBytes} bytes, WAL ${walBytes} bytes, journal ${journalMode}, ` +
        `${available} bytes free, extraction timeout ${timeoutMs}ms`
    );
    if (throttled) {
      yield* Effect.logInfo("System under load: running at reduced priority");
    }

    return {
      source,
      secret,
      backupRoot: config.paths.backupRoot,
      databaseBytes,
      walBytes,
      journalMode,
      timeoutMs,
      throttled,
    };
  });

/** Checkpoint a large WAL and drop our own priority when throttled. */
const prepareSource = (pre: Preflight): Effect.Effect<void, BackupError> =>
  Effect.gen(function* () {
    if (pre.journalMode === "wal" && pre.walBytes > WAL_CHECKPOINT_THRESHOLD) {
      yield* Effect.logInfo(`WAL is ${pre.walBytes} bytes: running a passive checkpoint`);
      yield* checkpointWal(pre.source);
    }
    if (pre.throttled) {
      yield* lowerOwnPriority();
    }
  });

// ─────────────────────────────────────────────────────────────────────────────
// Planning
// ─────────────────────────────────────────────────────────────────────────────

export interface PlannedArtifact {
  readonly format: BackupFormat;
  readonly describe: string;
  readonly file: string;
}

export const planArtifacts = (
  formats: readonly BackupFormat[],
  now: Date
): readonly PlannedArtifact[] => {
  const timestamp = formatTimestamp(now);
  return formats.map((format) => ({
    format,
    describe: FORMAT_STRATEGIES[format].describe,
    file: artifactName(format, timestamp),
  }));
};

// ─────────────────────────────────────────────────────────────────────────────
// Production
// ─────────────────────────────────────────────────────────────────────────────

export interface ProduceOptions {
  readonly formats: readonly BackupFormat[];
  /** A failed verification fails the run. */
  readonly validate: boolean;
  readonly now: Date;
}

export interface ProducedSet {
  readonly id: SetId;
  readonly dir: AbsolutePath;
  readonly manifest: SetManifest;
}

export type ProducerServices = VerifyServices | Archiver;

type FormatOutcome = Either.Either<ArtifactRecord, FailedComponent>;

const timeoutError = (format: BackupFormat, timeoutMs: number): SystemError =>
  new SystemError({
    code: ErrorCode.OPERATION_TIMEOUT,
    message: `${format} extraction exceeded ${Math.round(timeoutMs / 1000)}s`,
  });

/** Verification that could not even start counts as a failed exists layer. */
const verifyOrReport = (
  artifact: AbsolutePath,
  secret: Redacted.Redacted<string>,
  source: AbsolutePath
): Effect.Effect<VerificationResult, never, VerifyServices> =>
  pipe(
    verifyArtifact(artifact, secret, Option.some(source)),
    Effect.catchAll((e) =>
      Effect.succeed<VerificationResult>({
        exists: failed(`verification could not start: ${e.message}`),
        decrypt: skipped(),
        decompress: skipped(),
        structure: skipped(),
        crossCheck: skipped(),
      })
    )
  );

const produceFormat = (
  pre: Preflight,
  format: BackupFormat,
  stage: AbsolutePath,
  setDir: AbsolutePath,
  now: Date
): Effect.Effect<FormatOutcome, SystemError, ProducerServices> =>
  Effect.gen(function* () {
    const timestamp = formatTimestamp(now);
    const strategy = FORMAT_STRATEGIES[format];
    const workDir = pathJoin(stage, format);
    const plaintext = pathJoin(workDir, plaintextName(format, timestamp));
    const finalPath = pathJoin(setDir, artifactName(format, timestamp));

    const attempt = Effect.gen(function* () {
      yield* Effect.mapError(
        ensureDirectory(workDir, { mode: 0o700 }),
        (e) => new BackupError({ code: ErrorCode.BACKUP_FAILED, message: e.message, path: workDir })
      );
      yield* pipe(
        strategy.extract(pre.source, plaintext, { createdAt: now, timestamp, workDir }),
        Effect.timeoutFail({
          duration: Duration.millis(pre.timeoutMs),
          onTimeout: () => timeoutError(format, pre.timeoutMs),
        })
      );
      const sealed = yield* seal(plaintext, finalPath, pre.secret, {
        lowPriority: pre.throttled,
      });
      yield* Effect.mapError(
        removePath(workDir),
        (e) => new BackupError({ code: ErrorCode.BACKUP_FAILED, message: e.message, path: workDir })
      );
      const verification = yield* verifyOrReport(sealed.path, pre.secret, pre.source);
      return {
        kind: format,
        file: basename(sealed.path),
        plaintextBytes: sealed.plaintextBytes,
        compressedBytes: sealed.compressedBytes,
        encryptedBytes: sealed.encryptedBytes,
        verification,
      } satisfies ArtifactRecord;
    });

    // A timeout is resource exhaustion and ends the run; everything else
    // is a per-format failure.
    const outcome = yield* pipe(
      attempt,
      Effect.map((record): FormatOutcome => Either.right(record)),
      Effect.catchTag("BackupError", (e) =>
        Effect.succeed<FormatOutcome>(Either.left({ component: format, error: e.message }))
      )
    );

    yield* Either.match(outcome, {
      onLeft: (f) => logFail(`${format}: ${f.error}`),
      onRight: (r) =>
        pipe(
          Option.fromNullable(r.verification),
          Option.flatMap(firstFailedLayer),
          Option.match({
            onNone: () => logSuccess(`${format}: ${r.file} (${r.encryptedBytes} bytes)`),
            onSome: ({ layer, detail }) =>
              Effect.logWarning(`${format}: ${r.file} failed verification at ${layer}: ${detail}`),
          })
        ),
    });
    return outcome;
  });

const setAlreadyExists = (dir: AbsolutePath): BackupError =>
  new BackupError({
    code: ErrorCode.BACKUP_FAILED,
    message: `Backup set ${dir} already exists; wait a second and retry`,
    path: dir,
  });

/**
 * Extract, seal and verify every requested format into a new set under
 * `<backupRoot>/db/<id>`. Native failure (when requested) fails the run;
 * with `validate`, so does any failed verification. A timeout removes the
 * set entirely.
 */
export const produce = (
  pre: Preflight,
  options: ProduceOptions
): Effect.Effect<ProducedSet, BackupError | SystemError, ProducerServices> => {
  const timestamp = formatTimestamp(options.now);
  const id = makeSetId(timestamp, Option.none());
  const setDir = pathJoin(categoryDir(pre.backupRoot, "database"), id);

  const collect = Effect.scoped(
    Effect.gen(function* () {
      yield* ensureDirectory(pre.backupRoot, { mode: 0o700 });
      const stage = yield* scopedTempDirectory(`.staging-${id}`, pre.backupRoot);
      yield* ensureDirectory(setDir, { mode: 0o700 });
      yield* prepareSource(pre);

      const steps = yield* createStepCounter(options.formats.length);
      return yield* Effect.forEach(options.formats, (format) =>
        Effect.zipRight(
          steps.next(`${format}: ${FORMAT_STRATEGIES[format].describe}`),
          produceFormat(pre, format, stage, setDir, options.now)
        )
      );
    })
  );

  return pipe(
    Effect.gen(function* () {
      if (yield* directoryExists(setDir)) {
        return yield* Effect.fail(setAlreadyExists(setDir));
      }

      const outcomes = yield* Effect.onError(collect, () => cleanupPath(setDir));
      const [failures, artifacts] = Arr.partitionMap(outcomes, (o) => o);

      if (artifacts.length === 0) {
        yield* removePath(setDir);
        return yield* Effect.fail(
          new BackupError({
            code: ErrorCode.BACKUP_FAILED,
            message: `No artifact produced: ${failures.map((f) => `${f.component} (${f.error})`).join(", ")}`,
          })
        );
      }

      const manifest: SetManifest = {
        schemaVersion: 1,
        producer: `${PROGRAM_NAME} ${VERSION}`,
        id,
        category: "database",
        createdAt: options.now.toISOString(),
        source: { path: pre.source, bytes: pre.databaseBytes, journalMode: pre.journalMode },
        artifacts,
        failed: failures,
      };
      yield* writeManifest(setDir, manifest);

      if (failures.some((f) => f.component === "native")) {
        return yield* Effect.fail(
          new BackupError({
            code: ErrorCode.BACKUP_FAILED,
            message: `Native backup failed: ${failures.find((f) => f.component === "native")?.error ?? "unknown error"}`,
            path: setDir,
          })
        );
      }

      const unverified = artifacts.filter(
        (a) => a.verification !== undefined && !verificationPassed(a.verification)
      );
      if (options.validate && unverified.length > 0) {
        return yield* Effect.fail(
          new BackupError({
            code: ErrorCode.VERIFY_FAILED,
            message: `Verification failed for ${unverified.map((a) => a.file).join(", ")}`,
            path: setDir,
          })
        );
      }

      return { id, dir: setDir, manifest };
    }),
    withSet(id)
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Single-artifact verification
// ─────────────────────────────────────────────────────────────────────────────

/**
 * `backup --verify <artifact>`. The live database, when it resolves,
 * serves as the cross-check source.
 */
export const verifyOne = (
  config: AppConfig,
  artifact: AbsolutePath
): Effect.Effect<VerificationResult, ConfigError | SystemError | BackupError, VerifyServices> =>
  Effect.gen(function* () {
    if (!(yield* fileExists(artifact))) {
      return yield* Effect.fail(
        new BackupError({
          code: ErrorCode.BACKUP_NOT_FOUND,
          message: `Artifact not found: ${artifact}`,
          path: artifact,
        })
      );
    }
    const secret = yield* resolvePassphrase(config);
    const live = yield* pipe(
      resolveLiveDatabase(config),
      Effect.map(Option.some),
      Effect.catchAll((e) =>
        Effect.as(
          Effect.logDebug(`No live database for cross-check: ${errorMessage(e)}`),
          Option.none<AbsolutePath>()
        )
      )
    );
    return yield* verifyArtifact(artifact, secret, live);
  });
