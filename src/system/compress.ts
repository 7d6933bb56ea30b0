// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Gzip (RFC 1952) over `node:zlib` streams, so database-sized files never
 * sit in memory. Output is readable by `gunzip`.
 */

import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { createGunzip, createGzip, gunzipSync, gzipSync } from "node:zlib";
import { Effect, pipe } from "effect";
import { BackupError, ErrorCode, causeOf, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { cleanupPath } from "./fs";

/** 0 = store only, 9 = maximum. */
export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export interface GzipOptions {
  readonly level?: CompressionLevel;
}

/** Backups always use the maximum level. */
export const BACKUP_COMPRESSION_LEVEL: CompressionLevel = 9;

const compressError = (path: string, verb: string, e: unknown): BackupError =>
  new BackupError({
    code: ErrorCode.COMPRESS_FAILED,
    message: `Failed to ${verb} ${path}: ${errorMessage(e)}`,
    path,
    ...causeOf(e),
  });

/** Gzip `source` into `dest`. A partial `dest` is removed on failure. */
export const compressFile = (
  source: AbsolutePath,
  dest: AbsolutePath,
  options: GzipOptions = {}
): Effect.Effect<void, BackupError> =>
  pipe(
    Effect.tryPromise({
      try: (): Promise<void> =>
        pipeline(
          createReadStream(source),
          createGzip({ level: options.level ?? BACKUP_COMPRESSION_LEVEL }),
          createWriteStream(dest, { mode: 0o600 })
        ),
      catch: (e): BackupError => compressError(source, "compress", e),
    }),
    Effect.tapError(() => cleanupPath(dest))
  );

/** Gunzip `source` into `dest`. Truncated or corrupt input fails. */
export const decompressFile = (
  source: AbsolutePath,
  dest: AbsolutePath
): Effect.Effect<void, BackupError> =>
  pipe(
    Effect.tryPromise({
      try: (): Promise<void> =>
        pipeline(
          createReadStream(source),
          createGunzip(),
          createWriteStream(dest, { mode: 0o600 })
        ),
      catch: (e): BackupError => compressError(source, "decompress", e),
    }),
    Effect.tapError(() => cleanupPath(dest))
  );

export const gzipBytes = (
  data: Uint8Array,
  options: GzipOptions = {}
): Effect.Effect<Uint8Array, BackupError> =>
  Effect.try({
    try: (): Uint8Array =>
      new Uint8Array(gzipSync(data, { level: options.level ?? BACKUP_COMPRESSION_LEVEL })),
    catch: (e): BackupError => compressError("(buffer)", "compress", e),
  });

export const gunzipBytes = (data: Uint8Array): Effect.Effect<Uint8Array, BackupError> =>
  Effect.try({
    try: (): Uint8Array => new Uint8Array(gunzipSync(data)),
    catch: (e): BackupError => compressError("(buffer)", "decompress", e),
  });
