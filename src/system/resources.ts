// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Host resource checks made before a backup writes anything: free space,
 * load-based throttling, and the per-format extraction timeout.
 */

import { availableParallelism, constants as osConstants, loadavg, setPriority } from "node:os";
import { Effect, Match, pipe } from "effect";
import type { ThrottleMode } from "../config/field-values";
import { ErrorCode, SystemError } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { availableSpace } from "./fs";

const MB = 1024 * 1024;

/** Free space demanded on the backup volume, as a multiple of the database size. */
export const SPACE_MULTIPLIER = 4;

export const requiredSpace = (databaseBytes: number): number => databaseBytes * SPACE_MULTIPLIER;

export const ensureFreeSpace = (
  backupRoot: AbsolutePath,
  databaseBytes: number
): Effect.Effect<number, SystemError> =>
  pipe(
    availableSpace(backupRoot),
    Effect.filterOrFail(
      (available) => available >= requiredSpace(databaseBytes),
      (available) =>
        new SystemError({
          code: ErrorCode.INSUFFICIENT_DISK_SPACE,
          message: `Insufficient disk space in ${backupRoot}: ${Math.floor(available / MB)} MB available, ${Math.ceil(requiredSpace(databaseBytes) / MB)} MB required`,
          path: backupRoot,
        })
    )
  );

export interface LoadSample {
  readonly loadAverage: number;
  readonly cpuCount: number;
}

export const sampleLoad = (): Effect.Effect<LoadSample> =>
  Effect.sync(() => ({ loadAverage: loadavg()[0] ?? 0, cpuCount: availableParallelism() }));

/** `auto` throttles when the 1-minute load exceeds twice the CPU count. */
export const shouldThrottle = (mode: ThrottleMode, sample: LoadSample): boolean =>
  pipe(
    Match.value(mode),
    Match.when("always", () => true),
    Match.when("never", () => false),
    Match.when("auto", () => sample.loadAverage > sample.cpuCount * 2),
    Match.exhaustive
  );

/** Lower this process's own CPU priority before in-process compression. */
export const lowerOwnPriority = (): Effect.Effect<void> =>
  pipe(
    Effect.try(() => setPriority(osConstants.priority.PRIORITY_BELOW_NORMAL)),
    Effect.catchAll((e) => Effect.logDebug(`Could not lower process priority: ${String(e)}`))
  );

const MIN_TIMEOUT_S = 30;
const MAX_TIMEOUT_S = 600;

/**
 * Per-format extraction timeout: 30 s, plus 1 s per 100 MB of database and
 * 1 s per 50 MB of WAL, clamped to 30..600 s.
 */
export const extractionTimeoutMs = (databaseBytes: number, walBytes: number): number => {
  const seconds =
    MIN_TIMEOUT_S + Math.floor(databaseBytes / (100 * MB)) + Math.floor(walBytes / (50 * MB));
  return Math.min(MAX_TIMEOUT_S, Math.max(MIN_TIMEOUT_S, seconds)) * 1000;
};

/** WAL size above which a passive checkpoint runs before extraction. */
export const WAL_CHECKPOINT_THRESHOLD = 100 * MB;
