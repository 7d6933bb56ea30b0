// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Shared command plumbing: the operations lock, post-run housekeeping and
 * the text every command prints at the end.
 */

import { Array as Arr, Effect, Match, Option, pipe } from "effect";
import {
  type SetManifest,
  type SetStatus,
  type VerificationResult,
  deriveStatus,
  firstFailedLayer,
  verificationPassed,
} from "../../backup/manifest";
import { type OffloadOutcome, offloadSet } from "../../backup/offload";
import { prune } from "../../backup/retention";
import type { AppConfig } from "../../config/app-config";
import type { Category, LogFormat } from "../../config/field-values";
import type { GeneralError, SystemError } from "../../lib/errors";
import { logFail } from "../../lib/log";
import type { AbsolutePath } from "../../lib/types";
import { OPERATIONS_LOCK, withLock } from "../../system/lock";
import type { CloudSync } from "../../system/services/cloud";

// ============================================================================
// Formatting Utilities
// ============================================================================

/** Threshold entry for data-driven formatting */
interface ThresholdEntry<T> {
  readonly threshold: number;
  readonly format: (value: T) => string;
}

const DURATION_THRESHOLDS: readonly ThresholdEntry<number>[] = [
  {
    threshold: 60000,
    format: (ms): string => {
      const minutes = Math.floor(ms / 60000);
      const seconds = Math.floor((ms % 60000) / 1000);
      return `${minutes}m ${seconds}s`;
    },
  },
  { threshold: 1000, format: (ms): string => `${(ms / 1000).toFixed(1)}s` },
];

export const formatDuration = (ms: number): string =>
  pipe(
    DURATION_THRESHOLDS,
    Arr.findFirst((t) => ms >= t.threshold),
    Option.match({
      onNone: (): string => `${ms}ms`,
      onSome: (t): string => t.format(ms),
    })
  );

/** Byte formatting thresholds (descending order) */
const BYTE_THRESHOLDS: readonly ThresholdEntry<number>[] = [
  { threshold: 1024 ** 3, format: (b): string => `${(b / 1024 ** 3).toFixed(2)} GB` },
  { threshold: 1024 ** 2, format: (b): string => `${(b / 1024 ** 2).toFixed(2)} MB` },
  { threshold: 1024, format: (b): string => `${(b / 1024).toFixed(2)} KB` },
];

export const formatBytes = (bytes: number): string =>
  pipe(
    BYTE_THRESHOLDS,
    Arr.findFirst((t) => bytes >= t.threshold),
    Option.match({
      onNone: (): string => `${bytes} B`,
      onSome: (t): string => t.format(bytes),
    })
  );

const STATUS_MARK: { readonly [S in SetStatus]: string } = {
  verified: "✓",
  unverified: "?",
  degraded: "!",
};

export const statusMark = (status: SetStatus): string => STATUS_MARK[status];

/** One line per verification layer. */
export const renderVerification = (result: VerificationResult): readonly string[] =>
  (["exists", "decrypt", "decompress", "structure", "crossCheck"] as const).map((layer) => {
    const { status, detail } = result[layer];
    return `    ${layer.padEnd(11)}${status}${detail === "" ? "" : `  ${detail}`}`;
  });

const verificationWord = (result: VerificationResult | undefined): string =>
  result === undefined
    ? "not verified"
    : verificationPassed(result)
      ? "verified"
      : Option.match(firstFailedLayer(result), {
          onNone: (): string => "verification failed",
          onSome: ({ layer }): string => `failed at ${layer}`,
        });

/** Human-readable summary of a finished set: what succeeded, what failed. */
export const renderManifest = (manifest: SetManifest, dir: AbsolutePath): string => {
  const status = deriveStatus(manifest);
  const lines = [
    `${statusMark(status)} ${manifest.category} set ${manifest.id} (${status})`,
    `  ${dir}`,
    ...manifest.artifacts.map(
      (a) =>
        `  ✓ ${a.kind.padEnd(7)}${a.file}  ${formatBytes(a.encryptedBytes)}  ${verificationWord(a.verification)}`
    ),
    ...manifest.failed.map((f) => `  ✗ ${f.component.padEnd(7)}${f.error}`),
  ];
  return lines.join("\n");
};

export const renderOffload = (outcome: OffloadOutcome): string =>
  pipe(
    Match.value(outcome),
    Match.tag("Skipped", ({ reason }) => `Cloud offload skipped: ${reason}`),
    Match.tag("Mirrored", ({ target, files }) => `Cloud offload: ${files} file(s) to ${target}`),
    Match.tag("Warning", ({ target, message }) => `Cloud offload to ${target} incomplete: ${message}`),
    Match.exhaustive
  );

/** `{...}` on one line for json, the pretty text otherwise. */
export const chooseOutput = (format: LogFormat, json: () => unknown, pretty: () => string): string =>
  format === "json" ? JSON.stringify(json()) : pretty();

// ============================================================================
// Run plumbing
// ============================================================================

/** Backup, full-backup and restore never overlap. */
export const withOperationsLock = <A, E, R>(
  config: AppConfig,
  operation: Effect.Effect<A, E, R>
): Effect.Effect<A, E | GeneralError | SystemError, R> =>
  withLock(OPERATIONS_LOCK, operation, {
    dir: config.paths.lockDir,
    waitMs: config.lock.waitMs,
    staleMs: config.lock.staleMs,
  });

export interface Housekeeping {
  readonly pruned: readonly string[];
  readonly offload: OffloadOutcome;
}

/**
 * Retention then cloud offload after a successful run. Neither can fail
 * the run: a retention error is logged and leaves every set in place.
 */
export const afterSuccess = (
  config: AppConfig,
  category: Category,
  setId: string,
  setDir: AbsolutePath
): Effect.Effect<Housekeeping, never, CloudSync> =>
  Effect.gen(function* () {
    const keep = category === "database" ? config.retention.keepDatabase : config.retention.keepFull;
    const pruned = yield* pipe(
      prune(config.paths.backupRoot, category, keep),
      Effect.catchAll((e) =>
        Effect.as(
          logFail(`Retention for ${category} failed: ${e.message}`),
          Arr.empty<string>()
        )
      )
    );
    const offload = yield* offloadSet(config.cloud, category, setId, setDir);
    return { pruned, offload };
  });
