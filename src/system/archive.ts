// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tar archives through the `tar` package. Entry paths are always relative
 * to the archived directory; extraction refuses absolute and `..` entries.
 */

import { posix } from "node:path";
import { Array as Arr, Effect, pipe } from "effect";
import { create, extract, list } from "tar";
import { BackupError, ErrorCode, causeOf, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { cleanupPath, ensureDirectory } from "./fs";

export interface CreateArchiveOptions {
  readonly gzip?: boolean;
  /** Receives each entry path relative to the source directory. */
  readonly exclude?: (relativePath: string) => boolean;
}

const archiveError = (path: string, verb: string, e: unknown): BackupError =>
  new BackupError({
    code: ErrorCode.BACKUP_FAILED,
    message: `Failed to ${verb} archive ${path}: ${errorMessage(e)}`,
    path,
    ...causeOf(e),
  });

const stripDotSlash = (p: string): string => (p.startsWith("./") ? p.slice(2) : p);

/** Archive the contents of `sourceDir` (not the directory itself). */
export const createArchive = (
  sourceDir: AbsolutePath,
  dest: AbsolutePath,
  options: CreateArchiveOptions = {}
): Effect.Effect<void, BackupError> =>
  pipe(
    Effect.tryPromise({
      try: (): Promise<void> =>
        create(
          {
            file: dest,
            cwd: sourceDir,
            gzip: options.gzip === true ? { level: 9 } : false,
            portable: true,
            filter: (path: string): boolean =>
              options.exclude === undefined || !options.exclude(stripDotSlash(path)),
          },
          ["."]
        ),
      catch: (e): BackupError => archiveError(dest, "create", e),
    }),
    Effect.tapError(() => cleanupPath(dest))
  );

/** Entry paths in archive order, gzip detected automatically. */
export const listArchive = (file: AbsolutePath): Effect.Effect<readonly string[], BackupError> =>
  Effect.tryPromise({
    try: async (): Promise<readonly string[]> => {
      const names: string[] = [];
      await list({
        file,
        strict: true,
        filter: (path: string): boolean => {
          names.push(path);
          return true;
        },
      });
      return names;
    },
    catch: (e): BackupError => archiveError(file, "list", e),
  });

/** Names that would land outside the extraction directory. */
export const findUnsafeEntries = (names: readonly string[]): readonly string[] =>
  Arr.filter(names, (name) => {
    const normalized = posix.normalize(name);
    return (
      name.startsWith("/") ||
      normalized === ".." ||
      normalized.startsWith("../") ||
      name.split("/").includes("..")
    );
  });

/** Entries of interest with `./` and trailing `/` removed, directories dropped. */
export const normalizeEntries = (names: readonly string[]): readonly string[] =>
  pipe(
    names,
    Arr.map(stripDotSlash),
    Arr.filter((n) => n.length > 0 && n !== "." && !n.endsWith("/"))
  );

/** Extract `file` into `destDir` after checking every entry path. */
export const extractArchive = (
  file: AbsolutePath,
  destDir: AbsolutePath
): Effect.Effect<readonly string[], BackupError> =>
  Effect.gen(function* () {
    const names = yield* listArchive(file);
    const unsafe = findUnsafeEntries(names);
    if (unsafe.length > 0) {
      return yield* Effect.fail(
        new BackupError({
          code: ErrorCode.VERIFY_FAILED,
          message: `Archive ${file} contains unsafe paths: ${unsafe.slice(0, 5).join(", ")}`,
          path: file,
        })
      );
    }
    yield* Effect.mapError(ensureDirectory(destDir, { mode: 0o700 }), (e) =>
      archiveError(file, "extract", e)
    );
    yield* Effect.tryPromise({
      try: (): Promise<void> => extract({ file, cwd: destDir, strict: true, preserveOwner: false }),
      catch: (e): BackupError => archiveError(file, "extract", e),
    });
    return normalizeEntries(names);
  });
