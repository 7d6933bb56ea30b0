// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Cross-process lock files. Acquisition is an O_EXCL create. A lock is
 * stale only when its holder process is gone; the holder's age never
 * matters, however long the run. Content that cannot be parsed is stale
 * once the file is older than `staleMs`, which covers a holder that died
 * between creating the file and writing it.
 *
 * Takeover moves the stale file aside under a name private to this
 * process. Only one contender's rename can succeed, and the winner checks
 * that what it moved is the lock it judged stale before creating its own.
 *
 * Lock file content: `<pid>\n<epoch-ms>\n<token>\n`.
 */

import { randomUUID } from "node:crypto";
import { Effect, Option, type Scope, pipe } from "effect";
import { ErrorCode, GeneralError, type SystemError } from "../lib/errors";
import { pollingSchedule } from "../lib/retry";
import { type AbsolutePath, pathJoin, pathWithSuffix } from "../lib/types";
import {
  cleanupPath,
  ensureDirectory,
  modifiedAt,
  readText,
  renamePath,
  writeFileExclusive,
} from "./fs";

/** Serializes backup, full-backup and restore. */
export const OPERATIONS_LOCK = "operations";
/** Held by one health-monitor cycle at a time. */
export const MONITOR_LOCK = "monitor";

/** Grace period for a lock file whose content cannot be parsed. */
export const DEFAULT_STALE_MS = 60_000;

export interface LockOptions {
  readonly dir: AbsolutePath;
  readonly waitMs: number;
  readonly staleMs: number;
  readonly retryIntervalMs?: number;
}

interface LockInfo {
  readonly pid: number;
  readonly timestamp: number;
}

const isValidResourceName = (name: string): boolean =>
  name.length > 0 &&
  !(name.includes("/") || name.includes("\\") || name.includes("..") || name.includes("\x00"));

/** Unique per acquisition, so a release never mistakes another holder's file for ours. */
const lockContent = (): string => `${process.pid}\n${Date.now()}\n${randomUUID()}\n`;

export const parseLockContent = (content: string): Option.Option<LockInfo> => {
  const [pidLine, timestampLine] = content.trim().split("\n");
  const pid = Number.parseInt(pidLine ?? "", 10);
  const timestamp = Number.parseInt(timestampLine ?? "", 10);
  return Number.isNaN(pid) || Number.isNaN(timestamp) ? Option.none() : Option.some({ pid, timestamp });
};

/** Signal 0 probes without delivering; EPERM means alive under another user. */
export const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return e instanceof Error && "code" in e && e.code === "EPERM";
  }
};

/**
 * The lock's content when it is stale, None while a holder may still own
 * it. A file that vanished or cannot be read is not judged.
 */
const staleContent = (
  lockPath: AbsolutePath,
  staleMs: number
): Effect.Effect<Option.Option<string>> =>
  pipe(
    Effect.all([readText(lockPath), modifiedAt(lockPath)]),
    Effect.map(([content, mtime]) =>
      Option.match(parseLockContent(content), {
        onSome: (info) => !isProcessAlive(info.pid),
        onNone: () => Date.now() - mtime.getTime() > staleMs,
      })
        ? Option.some(content)
        : Option.none()
    ),
    Effect.orElseSucceed(() => Option.none<string>())
  );

const createLock = (lockPath: AbsolutePath): Effect.Effect<Option.Option<string>, SystemError> => {
  const content = lockContent();
  return Effect.map(writeFileExclusive(lockPath, content), Option.as(content));
};

/**
 * Replace the stale lock holding `judged` with ours. None when another
 * contender got there first or the lock changed hands in between; a live
 * lock moved aside by mistake is put back.
 */
const takeoverStaleLock = (
  lockPath: AbsolutePath,
  judged: string
): Effect.Effect<Option.Option<string>, SystemError> => {
  const aside = pathWithSuffix(lockPath, `.${process.pid}.${randomUUID()}.stale`);
  return Effect.gen(function* () {
    const moved = yield* pipe(
      renamePath(lockPath, aside),
      Effect.as(true),
      Effect.orElseSucceed(() => false)
    );
    if (!moved) {
      return Option.none<string>();
    }
    const content = yield* readText(aside);
    if (content !== judged) {
      yield* writeFileExclusive(lockPath, content);
      return Option.none<string>();
    }
    yield* Effect.logDebug(`Took over stale lock ${lockPath}`);
    return yield* createLock(lockPath);
  }).pipe(Effect.ensuring(cleanupPath(aside)));
};

/** Our lock content when acquired, None while a live holder owns the lock. */
const tryAcquireOnce = (
  lockPath: AbsolutePath,
  staleMs: number
): Effect.Effect<Option.Option<string>, SystemError> =>
  pipe(
    createLock(lockPath),
    Effect.flatMap((created) =>
      Option.isSome(created)
        ? Effect.succeed(created)
        : Effect.flatMap(
            staleContent(lockPath, staleMs),
            Option.match({
              onNone: (): Effect.Effect<Option.Option<string>, SystemError> =>
                Effect.succeed(Option.none()),
              onSome: (judged) => takeoverStaleLock(lockPath, judged),
            })
          )
    )
  );

/** Remove the lock only while it still holds `ours`. */
const releaseLock = (lockPath: AbsolutePath, ours: string): Effect.Effect<void> =>
  pipe(
    readText(lockPath),
    Effect.flatMap((content) =>
      content === ours
        ? cleanupPath(lockPath)
        : Effect.logWarning(`Lock ${lockPath} changed hands while held; leaving it in place`)
    ),
    Effect.catchAll((e) => Effect.logWarning(`Lock ${lockPath} vanished while held: ${e.message}`))
  );

const resolveLockPath = (
  dir: AbsolutePath,
  resourceName: string
): Effect.Effect<AbsolutePath, GeneralError | SystemError> =>
  pipe(
    Effect.succeed(resourceName),
    Effect.filterOrFail(isValidResourceName, () =>
      new GeneralError({
        code: ErrorCode.INVALID_ARGS,
        message: `Invalid lock resource name: ${resourceName}`,
      })
    ),
    Effect.zipLeft(ensureDirectory(dir, { mode: 0o700 })),
    Effect.map((name) => pathJoin(dir, `${name}.lock`))
  );

const busyError = (resourceName: string): GeneralError =>
  new GeneralError({ code: ErrorCode.LOCK_BUSY, message: `Lock '${resourceName}' is busy` });

const isBusy = (e: GeneralError | SystemError): boolean =>
  e._tag === "GeneralError" && e.code === ErrorCode.LOCK_BUSY;

/**
 * Run `operation` holding `resourceName`, waiting up to `waitMs` for it.
 * The lock file is removed when the operation ends, however it ends.
 */
export const withLock = <A, E, R>(
  resourceName: string,
  operation: Effect.Effect<A, E, R>,
  options: LockOptions
): Effect.Effect<A, E | GeneralError | SystemError, R> =>
  Effect.gen(function* () {
    const lockPath = yield* resolveLockPath(options.dir, resourceName);
    const intervalMs = options.retryIntervalMs ?? 50;

    const acquire = pipe(
      tryAcquireOnce(lockPath, options.staleMs),
      Effect.flatMap(
        Option.match({
          onNone: (): Effect.Effect<string, GeneralError> => Effect.fail(busyError(resourceName)),
          onSome: (content): Effect.Effect<string, GeneralError> => Effect.succeed(content),
        })
      ),
      Effect.retry({ schedule: pollingSchedule(options.waitMs, intervalMs), while: isBusy }),
      Effect.mapError((e) =>
        isBusy(e)
          ? new GeneralError({
              code: ErrorCode.LOCK_BUSY,
              message: `Timeout acquiring lock '${resourceName}' after ${options.waitMs}ms. Another vaultkeep run is in progress.`,
            })
          : e
      )
    );

    return yield* Effect.acquireUseRelease(
      acquire,
      () => operation,
      (ours) => releaseLock(lockPath, ours)
    );
  });

/**
 * Non-blocking acquisition for the health monitor. `None` means a live
 * holder owns the lock and this cycle should be skipped. The lock is
 * released when the scope closes.
 */
export const tryMonitorLock = (
  dir: AbsolutePath
): Effect.Effect<Option.Option<AbsolutePath>, GeneralError | SystemError, Scope.Scope> =>
  Effect.gen(function* () {
    const lockPath = yield* resolveLockPath(dir, MONITOR_LOCK);
    const acquired = yield* tryAcquireOnce(lockPath, DEFAULT_STALE_MS);
    if (Option.isNone(acquired)) {
      return Option.none();
    }
    const ours = acquired.value;
    yield* Effect.addFinalizer(() => releaseLock(lockPath, ours));
    return Option.some(lockPath);
  });
