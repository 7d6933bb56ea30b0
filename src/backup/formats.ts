// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * One extraction strategy per database format. Every strategy reads the
 * live database through a read-only handle and writes a single plaintext
 * file into the staging directory; sealing happens afterwards.
 */

import { basename } from "node:path";
import { Array as Arr, Effect, pipe } from "effect";
import type { BackupFormat } from "../config/field-values";
import { BackupError, ErrorCode, type SystemError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { ensureDirectory, writeText } from "../system/fs";
import { Archiver } from "../system/services/archive";
import {
  type SqliteDatabase,
  listUserTables,
  onlineBackup,
  withReadOnly,
} from "../system/sqlite";
import {
  type CsvTable,
  type DumpContext,
  buildJsonExport,
  csvFileNames,
  renderCsvTable,
  renderSchemaDump,
  renderSqlDump,
} from "./dump";

export interface ExtractContext {
  readonly createdAt: Date;
  readonly timestamp: string;
  /** Scratch space inside the run's staging directory. */
  readonly workDir: AbsolutePath;
}

export interface FormatStrategy {
  readonly format: BackupFormat;
  readonly describe: string;
  readonly extract: (
    source: AbsolutePath,
    dest: AbsolutePath,
    context: ExtractContext
  ) => Effect.Effect<void, BackupError, Archiver>;
}

const stagingWriteError = (e: SystemError): BackupError =>
  new BackupError({ code: ErrorCode.BACKUP_FAILED, message: e.message, path: e.path });

const dumpContext = (source: AbsolutePath, context: ExtractContext): DumpContext => ({
  createdAt: context.createdAt,
  source: basename(source),
});

const writeRendered = (
  source: AbsolutePath,
  dest: AbsolutePath,
  render: (db: SqliteDatabase) => string,
  verb: string
): Effect.Effect<void, BackupError> =>
  pipe(
    withReadOnly(source, render, verb),
    Effect.flatMap((text) => Effect.mapError(writeText(dest, text, { mode: 0o600 }), stagingWriteError))
  );

const nativeStrategy: FormatStrategy = {
  format: "native",
  describe: "native binary copy (online backup API)",
  extract: (source, dest) => onlineBackup(source, dest),
};

const sqlStrategy: FormatStrategy = {
  format: "sql",
  describe: "portable SQL dump",
  extract: (source, dest, context) =>
    writeRendered(source, dest, (db) => renderSqlDump(db, dumpContext(source, context)), "dump"),
};

const jsonStrategy: FormatStrategy = {
  format: "json",
  describe: "structured JSON export",
  extract: (source, dest, context) =>
    writeRendered(
      source,
      dest,
      (db) => `${JSON.stringify(buildJsonExport(db, dumpContext(source, context)), null, 2)}\n`,
      "JSON export"
    ),
};

const schemaStrategy: FormatStrategy = {
  format: "schema",
  describe: "schema-only dump",
  extract: (source, dest, context) =>
    writeRendered(source, dest, (db) => renderSchemaDump(db, dumpContext(source, context)), "schema dump"),
};

/** Index of a CSV bundle; `verify` requires it. */
export const CSV_MANIFEST_FILE = "manifest.json";

interface CsvFile {
  readonly table: CsvTable;
  readonly file: string;
}

const csvManifest = (
  source: AbsolutePath,
  context: ExtractContext,
  files: readonly CsvFile[]
): Readonly<Record<string, unknown>> => ({
  export_metadata: {
    created: context.createdAt.toISOString(),
    database_file: basename(source),
    export_format: "csv",
    tables_exported: files.length,
    export_timestamp: context.timestamp,
  },
  tables: files.map(({ table, file }) => ({ table: table.table, file, rows: table.rows })),
  usage: {
    encoding: "UTF-8",
    line_ending: "CRLF",
    blob_encoding: "base64",
  },
});

const csvStrategy: FormatStrategy = {
  format: "csv",
  describe: "per-table CSV bundle",
  extract: (source, dest, context) =>
    Effect.gen(function* () {
      const archiver = yield* Archiver;
      const bundleDir = pathJoin(context.workDir, `csv-${context.timestamp}`);
      yield* Effect.mapError(ensureDirectory(bundleDir, { mode: 0o700 }), stagingWriteError);

      const tables = yield* withReadOnly(
        source,
        (db): readonly CsvTable[] =>
          listUserTables(db)
            .map((table) => renderCsvTable(db, table))
            .filter((t) => t.rows > 0),
        "CSV export"
      );

      const files = Arr.zipWith(
        tables,
        csvFileNames(tables.map((t) => t.table)),
        (table, file): CsvFile => ({ table, file })
      );

      yield* Effect.forEach(
        files,
        ({ table, file }) =>
          Effect.mapError(
            writeText(pathJoin(bundleDir, file), table.content, { mode: 0o600 }),
            stagingWriteError
          ),
        { discard: true }
      );
      yield* Effect.mapError(
        writeText(
          pathJoin(bundleDir, CSV_MANIFEST_FILE),
          `${JSON.stringify(csvManifest(source, context, files), null, 2)}\n`,
          { mode: 0o600 }
        ),
        stagingWriteError
      );

      yield* archiver.createArchive(bundleDir, dest);
    }),
};

export const FORMAT_STRATEGIES: { readonly [F in BackupFormat]: FormatStrategy } = {
  native: nativeStrategy,
  sql: sqlStrategy,
  json: jsonStrategy,
  csv: csvStrategy,
  schema: schemaStrategy,
};
