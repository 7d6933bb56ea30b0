// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations lifted into Effect. Every failure becomes a
 * `SystemError` carrying the path, so callers never see a raw errno.
 */

import { constants } from "node:fs";
import {
  access,
  chmod,
  cp,
  copyFile as nodeCopyFile,
  mkdir,
  mkdtemp,
  writeFile as nodeWriteFile,
  readFile,
  readdir,
  rename,
  rm,
  stat,
  statfs,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Option, type Scope, pipe } from "effect";
import { ErrorCode, SystemError, causeOf, errorMessage } from "../lib/errors";
import { type AbsolutePath, pathWithSuffix, toAbsolutePathUnsafe } from "../lib/types";

const isErrnoException = (e: unknown): e is NodeJS.ErrnoException =>
  e instanceof Error && "code" in e;

const hasErrno = (e: unknown, code: string): boolean => isErrnoException(e) && e.code === code;

const readError = (path: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_READ_FAILED,
    message: `Failed to read ${path}: ${errorMessage(e)}`,
    path,
    ...causeOf(e),
  });

const writeError = (path: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_WRITE_FAILED,
    message: `Failed to write ${path}: ${errorMessage(e)}`,
    path,
    ...causeOf(e),
  });

export const readText = (path: AbsolutePath): Effect.Effect<string, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<string> => readFile(path, "utf8"),
    catch: (e): SystemError => readError(path, e),
  });

export const readBytes = (path: AbsolutePath): Effect.Effect<Uint8Array, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Uint8Array> => new Uint8Array(await readFile(path)),
    catch: (e): SystemError => readError(path, e),
  });

export const writeText = (
  path: AbsolutePath,
  content: string,
  options: { readonly mode?: number } = {}
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => nodeWriteFile(path, content, { encoding: "utf8", mode: options.mode }),
    catch: (e): SystemError => writeError(path, e),
  });

export const writeBytes = (
  path: AbsolutePath,
  content: Uint8Array,
  options: { readonly mode?: number } = {}
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => nodeWriteFile(path, content, { mode: options.mode }),
    catch: (e): SystemError => writeError(path, e),
  });

/**
 * Create a file exclusively (O_CREAT | O_EXCL).
 * Some = created, None = the file already existed.
 */
export const writeFileExclusive = (
  path: AbsolutePath,
  content: string
): Effect.Effect<Option.Option<void>, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Option.Option<void>> => {
      try {
        await nodeWriteFile(path, content, { flag: "wx", encoding: "utf8" });
        return Option.some(undefined);
      } catch (e) {
        if (hasErrno(e, "EEXIST")) {
          return Option.none();
        }
        throw e;
      }
    },
    catch: (e): SystemError => writeError(path, e),
  });

/** Write through a sibling temp file and rename, so readers never see a partial file. */
export const atomicWrite = (
  path: AbsolutePath,
  content: string,
  options: { readonly mode?: number } = {}
): Effect.Effect<void, SystemError> => {
  const tempPath = pathWithSuffix(path, `.${process.pid}.tmp`);
  return pipe(
    writeText(tempPath, content, options),
    Effect.zipRight(renamePath(tempPath, path)),
    Effect.tapError(() => cleanupPath(tempPath))
  );
};

export const fileExists = (path: string): Effect.Effect<boolean> =>
  Effect.promise(async (): Promise<boolean> => {
    try {
      return (await stat(path)).isFile();
    } catch {
      return false;
    }
  });

export const directoryExists = (path: string): Effect.Effect<boolean> =>
  Effect.promise(async (): Promise<boolean> => {
    try {
      return (await stat(path)).isDirectory();
    } catch {
      return false;
    }
  });

export const pathExists = (path: string): Effect.Effect<boolean> =>
  Effect.promise(async (): Promise<boolean> => {
    try {
      await access(path, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  });

export const isExecutableOnPath = (command: string): Effect.Effect<boolean> =>
  Effect.promise(async (): Promise<boolean> => {
    const dirs = (process.env["PATH"] ?? "").split(":").filter((d) => d.length > 0);
    const checks = await Promise.allSettled(
      dirs.map((dir) => access(join(dir, command), constants.X_OK))
    );
    return checks.some((r) => r.status === "fulfilled");
  });

export const ensureDirectory = (
  path: AbsolutePath,
  options: { readonly mode?: number } = {}
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<void> => {
      await mkdir(path, { recursive: true, mode: options.mode });
    },
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.DIRECTORY_CREATE_FAILED,
        message: `Failed to create directory ${path}: ${errorMessage(e)}`,
        path,
        ...causeOf(e),
      }),
  });

/** Recursive; a missing path is not an error. */
export const removePath = (path: string): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => rm(path, { recursive: true, force: true }),
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.FILE_WRITE_FAILED,
        message: `Failed to remove ${path}: ${errorMessage(e)}`,
        path,
        ...causeOf(e),
      }),
  });

/**
 * `removePath` for finalizers and error paths, where the original outcome
 * must survive. A failed removal is logged as a warning.
 */
export const cleanupPath = (path: string): Effect.Effect<void> =>
  pipe(
    removePath(path),
    Effect.catchAll((e) => Effect.logWarning(e.message))
  );

export const renamePath = (from: AbsolutePath, to: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => rename(from, to),
    catch: (e): SystemError => writeError(to, e),
  });

export const copyFile = (
  source: AbsolutePath,
  dest: AbsolutePath
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => nodeCopyFile(source, dest),
    catch: (e): SystemError => writeError(dest, e),
  });

/**
 * Copy a directory tree. `exclude` receives each source path and drops it
 * (and everything below it) when it returns true.
 */
export const copyTree = (
  source: AbsolutePath,
  dest: AbsolutePath,
  exclude: (sourcePath: string) => boolean = (): boolean => false
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> =>
      cp(source, dest, {
        recursive: true,
        preserveTimestamps: true,
        filter: (src): boolean => !exclude(src),
      }),
    catch: (e): SystemError => writeError(dest, e),
  });

export const setMode = (path: AbsolutePath, mode: number): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => chmod(path, mode),
    catch: (e): SystemError => writeError(path, e),
  });

export const fileSize = (path: AbsolutePath): Effect.Effect<number, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<number> => (await stat(path)).size,
    catch: (e): SystemError => readError(path, e),
  });

/** Size of a file, or 0 when it does not exist. */
export const fileSizeOrZero = (path: string): Effect.Effect<number> =>
  Effect.promise(async (): Promise<number> => {
    try {
      return (await stat(path)).size;
    } catch {
      return 0;
    }
  });

export const modifiedAt = (path: AbsolutePath): Effect.Effect<Date, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Date> => (await stat(path)).mtime,
    catch: (e): SystemError => readError(path, e),
  });

export interface DirectoryEntry {
  readonly name: string;
  readonly isDirectory: boolean;
  readonly isFile: boolean;
}

/** Entries of a directory; a missing directory lists as empty. */
export const listDirectory = (
  path: AbsolutePath
): Effect.Effect<readonly DirectoryEntry[], SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<readonly DirectoryEntry[]> => {
      try {
        const entries = await readdir(path, { withFileTypes: true });
        return entries.map(
          (e): DirectoryEntry => ({
            name: e.name,
            isDirectory: e.isDirectory(),
            isFile: e.isFile(),
          })
        );
      } catch (e) {
        if (hasErrno(e, "ENOENT")) {
          return [];
        }
        throw e;
      }
    },
    catch: (e): SystemError => readError(path, e),
  });

/** Bytes available to an unprivileged writer on the filesystem holding `path`. */
export const availableSpace = (path: AbsolutePath): Effect.Effect<number, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<number> => {
      const s = await statfs(path);
      return s.bavail * s.bsize;
    },
    catch: (e): SystemError => readError(path, e),
  });

/** Private (0700) directory under `parent` or the OS temp dir. */
export const makeTempDirectory = (
  prefix: string,
  parent?: AbsolutePath
): Effect.Effect<AbsolutePath, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<AbsolutePath> => {
      const base = parent ?? tmpdir();
      const dir = await mkdtemp(join(base, `${prefix}-`));
      await chmod(dir, 0o700);
      return toAbsolutePathUnsafe(dir);
    },
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.DIRECTORY_CREATE_FAILED,
        message: `Failed to create temporary directory: ${errorMessage(e)}`,
        ...causeOf(e),
      }),
  });

/**
 * Scoped temporary directory, removed when the scope closes on every exit
 * path (success, failure, interruption).
 */
export const scopedTempDirectory = (
  prefix: string,
  parent?: AbsolutePath
): Effect.Effect<AbsolutePath, SystemError, Scope.Scope> =>
  Effect.acquireRelease(makeTempDirectory(prefix, parent), (dir) => cleanupPath(dir));
