// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * SQLite access through better-sqlite3. Handles are scoped so they close
 * on every exit path. Backup paths only ever open the live database
 * read-only; `checkpointWal` is the one read-write use and does not change
 * logical content.
 */

import Database from "better-sqlite3";
import { Effect, Option, type Scope, pipe } from "effect";
import { BackupError, ErrorCode, causeOf, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";

export type SqliteDatabase = Database.Database;

const sqliteError = (path: string, verb: string, e: unknown): BackupError =>
  new BackupError({
    code: ErrorCode.BACKUP_FAILED,
    message: `SQLite ${verb} failed for ${path}: ${errorMessage(e)}`,
    path,
    ...causeOf(e),
  });

const openDatabase = (
  path: AbsolutePath,
  options: Database.Options
): Effect.Effect<SqliteDatabase, BackupError, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.try({
      try: (): SqliteDatabase => new Database(path, options),
      catch: (e): BackupError => sqliteError(path, "open", e),
    }),
    (db) =>
      Effect.sync(() => {
        if (db.open) {
          db.close();
        }
      })
  );

/** Scoped read-only handle. The file must exist. */
export const openReadOnly = (
  path: AbsolutePath
): Effect.Effect<SqliteDatabase, BackupError, Scope.Scope> =>
  openDatabase(path, { readonly: true, fileMustExist: true });

/** Scoped read-write handle; creates the file when missing. */
export const openReadWrite = (
  path: AbsolutePath
): Effect.Effect<SqliteDatabase, BackupError, Scope.Scope> => openDatabase(path, {});

export const withReadOnly = <A>(
  path: AbsolutePath,
  f: (db: SqliteDatabase) => A,
  verb = "read"
): Effect.Effect<A, BackupError> =>
  Effect.scoped(
    Effect.flatMap(openReadOnly(path), (db) =>
      Effect.try({
        try: (): A => f(db),
        catch: (e): BackupError => sqliteError(path, verb, e),
      })
    )
  );

export const withReadWrite = <A>(
  path: AbsolutePath,
  f: (db: SqliteDatabase) => A,
  verb = "write"
): Effect.Effect<A, BackupError> =>
  Effect.scoped(
    Effect.flatMap(openReadWrite(path), (db) =>
      Effect.try({
        try: (): A => f(db),
        catch: (e): BackupError => sqliteError(path, verb, e),
      })
    )
  );

/** `PRAGMA integrity_check`; "ok" for a sound database, otherwise the first problem. */
export const integrityCheck = (path: AbsolutePath): Effect.Effect<string, BackupError> =>
  withReadOnly(
    path,
    (db): string => {
      const result: unknown = db.pragma("integrity_check", { simple: true });
      return typeof result === "string" ? result : String(result);
    },
    "integrity check"
  );

export const journalMode = (path: AbsolutePath): Effect.Effect<string, BackupError> =>
  withReadOnly(path, (db): string => {
    const mode: unknown = db.pragma("journal_mode", { simple: true });
    return typeof mode === "string" ? mode.toLowerCase() : "unknown";
  });

/** Passive checkpoint: copies WAL frames into the database without blocking writers. */
export const checkpointWal = (path: AbsolutePath): Effect.Effect<void, BackupError> =>
  withReadWrite(
    path,
    (db): void => {
      db.pragma("wal_checkpoint(PASSIVE)");
    },
    "WAL checkpoint"
  );

/** Consistent copy through the online backup API. */
export const onlineBackup = (
  source: AbsolutePath,
  dest: AbsolutePath
): Effect.Effect<void, BackupError> =>
  Effect.scoped(
    Effect.flatMap(openReadOnly(source), (db) =>
      Effect.tryPromise({
        try: async (): Promise<void> => {
          await db.backup(dest);
        },
        catch: (e): BackupError => sqliteError(source, "online backup", e),
      })
    )
  );

/** Execute a dump into a (new) database file. */
export const replaySql = (sql: string, dest: AbsolutePath): Effect.Effect<void, BackupError> =>
  withReadWrite(
    dest,
    (db): void => {
      db.exec(sql);
    },
    "replay"
  );

interface NameRow {
  readonly name: string;
}

const isNameRow = (row: unknown): row is NameRow =>
  typeof row === "object" && row !== null && "name" in row && typeof row.name === "string";

/** User tables in name order, excluding SQLite's own. */
export const listUserTables = (db: SqliteDatabase): readonly string[] =>
  db
    .prepare(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all()
    .filter(isNameRow)
    .map((row) => row.name);

export const quoteIdentifier = (name: string): string => `"${name.replaceAll('"', '""')}"`;

export const countRows = (db: SqliteDatabase, table: string): number => {
  const value: unknown = db
    .prepare(`SELECT COUNT(*) FROM ${quoteIdentifier(table)}`)
    .pluck()
    .get();
  return typeof value === "number" ? value : Number(value);
};

export interface TableStats {
  readonly tableCount: number;
  readonly firstTable: Option.Option<{ readonly name: string; readonly rows: number }>;
}

export const tableStats = (path: AbsolutePath): Effect.Effect<TableStats, BackupError> =>
  withReadOnly(path, (db): TableStats => {
    const tables = listUserTables(db);
    return {
      tableCount: tables.length,
      firstTable: pipe(
        Option.fromNullable(tables[0]),
        Option.map((name) => ({ name, rows: countRows(db, name) }))
      ),
    };
  });
