// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Logical renderings of an open SQLite database: portable SQL dump,
 * schema-only dump, structured JSON export and per-table CSV.
 * Synchronous and side-effect free apart from reading `db`.
 */

import { Match, pipe } from "effect";
import { z } from "zod";
import { PROGRAM_NAME, VERSION } from "../lib/version";
import { type SqliteDatabase, listUserTables, quoteIdentifier } from "../system/sqlite";

export interface DumpContext {
  readonly createdAt: Date;
  /** Shown in headers; the database file name, never a secret. */
  readonly source: string;
}

const GENERATOR = `${PROGRAM_NAME} ${VERSION}`;

// ─────────────────────────────────────────────────────────────────────────────
// Catalog queries
// ─────────────────────────────────────────────────────────────────────────────

const schemaRowSchema = z.object({
  type: z.string(),
  name: z.string(),
  tbl_name: z.string(),
  sql: z.string().nullable(),
});

export type SchemaRow = z.infer<typeof schemaRowSchema>;

const tableDefinitions = (db: SqliteDatabase): readonly SchemaRow[] =>
  z
    .array(schemaRowSchema)
    .parse(
      db
        .prepare(
          "SELECT type, name, tbl_name, sql FROM sqlite_master " +
            "WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
        )
        .all()
    );

/** Indexes, views, then triggers: the order they can be recreated in. */
const secondaryObjects = (db: SqliteDatabase): readonly SchemaRow[] =>
  z
    .array(schemaRowSchema)
    .parse(
      db
        .prepare(
          "SELECT type, name, tbl_name, sql FROM sqlite_master " +
            "WHERE type IN ('index', 'view', 'trigger') AND sql IS NOT NULL " +
            "AND name NOT LIKE 'sqlite_%' " +
            "ORDER BY CASE type WHEN 'index' THEN 0 WHEN 'view' THEN 1 ELSE 2 END, name"
        )
        .all()
    );

const hasSequenceTable = (db: SqliteDatabase): boolean =>
  db.prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = 'sqlite_sequence'").get() !==
  undefined;

const pragmaNumber = (db: SqliteDatabase, name: string): number => {
  const value: unknown = db.pragma(name, { simple: true });
  return typeof value === "number" ? value : Number(value);
};

export const sqliteVersion = (db: SqliteDatabase): string => {
  const value: unknown = db.prepare("SELECT sqlite_version()").pluck().get();
  return typeof value === "string" ? value : "unknown";
};

/** Rows as positional arrays; integers as bigint so nothing is rounded. */
const rawRows = (db: SqliteDatabase, table: string): Iterable<unknown> =>
  db
    .prepare(`SELECT * FROM ${quoteIdentifier(table)}`)
    .raw(true)
    .safeIntegers(true)
    .iterate();

const columnNames = (db: SqliteDatabase, table: string): readonly string[] =>
  db
    .prepare(`SELECT * FROM ${quoteIdentifier(table)}`)
    .columns()
    .map((c) => c.name);

const asRow = (row: unknown): readonly unknown[] => (Array.isArray(row) ? row : [row]);

// ─────────────────────────────────────────────────────────────────────────────
// SQL
// ─────────────────────────────────────────────────────────────────────────────

const formatReal = (n: number): string =>
  Number.isNaN(n)
    ? "NULL"
    : !Number.isFinite(n)
      ? n > 0
        ? "1e999"
        : "-1e999"
      : Number.isInteger(n)
        ? `${n}.0`
        : String(n);

/** SQL literal for a value read with `safeIntegers`. */
export const sqlLiteral = (value: unknown): string =>
  pipe(
    Match.value(value),
    Match.when(Match.null, () => "NULL"),
    Match.when(Match.undefined, () => "NULL"),
    Match.when(Match.bigint, (v) => v.toString()),
    Match.when(Match.number, formatReal),
    Match.when(Match.string, (v) => `'${v.replaceAll("'", "''")}'`),
    Match.when(Match.instanceOf(Uint8Array), (v) => `X'${Buffer.from(v).toString("hex").toUpperCase()}'`),
    Match.orElse((v) => `'${String(v).replaceAll("'", "''")}'`)
  );

const insertStatements = (db: SqliteDatabase, table: string): string[] => {
  const lines: string[] = [];
  for (const row of rawRows(db, table)) {
    lines.push(`INSERT INTO ${quoteIdentifier(table)} VALUES(${asRow(row).map(sqlLiteral).join(",")});`);
  }
  return lines;
};

const header = (title: string, context: DumpContext): string[] => [
  `-- ${title}`,
  `-- Created: ${context.createdAt.toISOString()}`,
  `-- Source: ${context.source}`,
  `-- Generator: ${GENERATOR}`,
  "-- Restore: sqlite3 new.sqlite3 < this-file.sql",
  "PRAGMA foreign_keys=OFF;",
  "BEGIN TRANSACTION;",
];

const FOOTER: readonly string[] = ["COMMIT;", "PRAGMA foreign_keys=ON;"];

const withSemicolon = (sql: string): string => (sql.trimEnd().endsWith(";") ? sql : `${sql};`);

/**
 * Full dump: tables with their rows, AUTOINCREMENT counters, then indexes,
 * views and triggers. Replays with `sqlite3 new.db < dump.sql`.
 */
export const renderSqlDump = (db: SqliteDatabase, context: DumpContext): string => {
  const lines = header("vaultkeep portable SQL dump", context);

  for (const table of tableDefinitions(db)) {
    if (table.sql !== null) {
      lines.push(withSemicolon(table.sql));
    }
    lines.push(...insertStatements(db, table.name));
  }

  if (hasSequenceTable(db)) {
    lines.push("DELETE FROM sqlite_sequence;");
    lines.push(...insertStatements(db, "sqlite_sequence"));
  }

  for (const object of secondaryObjects(db)) {
    if (object.sql !== null) {
      lines.push(withSemicolon(object.sql));
    }
  }

  return `${[...lines, ...FOOTER].join("\n")}\n`;
};

/** Structure only, plus the `user_version` and `application_id` pragmas. */
export const renderSchemaDump = (db: SqliteDatabase, context: DumpContext): string => {
  const lines = header("vaultkeep schema-only dump (no data)", context);

  for (const object of [...tableDefinitions(db), ...secondaryObjects(db)]) {
    if (object.sql !== null) {
      lines.push(withSemicolon(object.sql));
    }
  }
  lines.push(`PRAGMA user_version = ${pragmaNumber(db, "user_version")};`);
  lines.push(`PRAGMA application_id = ${pragmaNumber(db, "application_id")};`);

  return `${[...lines, ...FOOTER].join("\n")}\n`;
};

// ─────────────────────────────────────────────────────────────────────────────
// JSON
// ─────────────────────────────────────────────────────────────────────────────

type JsonValue = string | number | null;

const jsonValue = (value: unknown): JsonValue =>
  pipe(
    Match.value(value),
    Match.when(Match.null, (): JsonValue => null),
    Match.when(Match.undefined, (): JsonValue => null),
    Match.when(
      Match.bigint,
      (v): JsonValue => (Number.isSafeInteger(Number(v)) ? Number(v) : v.toString())
    ),
    Match.when(Match.number, (v): JsonValue => (Number.isFinite(v) ? v : String(v))),
    Match.when(Match.string, (v): JsonValue => v),
    Match.when(Match.instanceOf(Uint8Array), (v): JsonValue => Buffer.from(v).toString("base64")),
    Match.orElse((v): JsonValue => String(v))
  );

export interface JsonExport {
  readonly database_export: {
    readonly metadata: {
      readonly created: string;
      readonly generator: string;
      readonly format_version: string;
      readonly source: string;
      readonly sqlite_version: string;
      readonly tables: number;
      readonly encoding: "UTF-8";
      readonly blob_encoding: "base64";
    };
    readonly schema: readonly SchemaRow[];
    readonly data: Readonly<Record<string, readonly Readonly<Record<string, JsonValue>>[]>>;
  };
}

export const buildJsonExport = (db: SqliteDatabase, context: DumpContext): JsonExport => {
  const tables = listUserTables(db);
  const data: Record<string, Record<string, JsonValue>[]> = {};
  for (const table of tables) {
    const columns = columnNames(db, table);
    const rows: Record<string, JsonValue>[] = [];
    for (const row of rawRows(db, table)) {
      const values = asRow(row);
      rows.push(Object.fromEntries(columns.map((c, i) => [c, jsonValue(values[i])])));
    }
    data[table] = rows;
  }

  return {
    database_export: {
      metadata: {
        created: context.createdAt.toISOString(),
        generator: GENERATOR,
        format_version: "1.0",
        source: context.source,
        sqlite_version: sqliteVersion(db),
        tables: tables.length,
        encoding: "UTF-8",
        blob_encoding: "base64",
      },
      schema: [...tableDefinitions(db), ...secondaryObjects(db)],
      data,
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// CSV (RFC 4180)
// ─────────────────────────────────────────────────────────────────────────────

const CSV_NEEDS_QUOTES = /[",\r\n]/;

export const csvField = (value: unknown): string => {
  const text = pipe(
    Match.value(value),
    Match.when(Match.null, () => ""),
    Match.when(Match.undefined, () => ""),
    Match.when(Match.instanceOf(Uint8Array), (v) => Buffer.from(v).toString("base64")),
    Match.orElse((v) => String(v))
  );
  return CSV_NEEDS_QUOTES.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
};

export const csvLine = (values: readonly unknown[]): string => values.map(csvField).join(",");

export interface CsvTable {
  readonly table: string;
  readonly rows: number;
  readonly content: string;
}

/** Header row plus one line per row, CRLF terminated. */
export const renderCsvTable = (db: SqliteDatabase, table: string): CsvTable => {
  const lines = [csvLine(columnNames(db, table))];
  for (const row of rawRows(db, table)) {
    lines.push(csvLine(asRow(row)));
  }
  return { table, rows: lines.length - 1, content: `${lines.join("\r\n")}\r\n` };
};

/** A table name as a safe file name. */
export const csvFileName = (table: string): string =>
  `${table.replace(/[^A-Za-z0-9_.-]/g, "_").replace(/^\.+/, "_")}.csv`;

/**
 * File names for `tables`, in order. Names that sanitize to the same file
 * get `-2`, `-3`, ... so no table overwrites another.
 */
export const csvFileNames = (tables: readonly string[]): readonly string[] => {
  const used = new Set<string>();
  return tables.map((table) => {
    const base = csvFileName(table).slice(0, -".csv".length);
    let name = `${base}.csv`;
    for (let n = 2; used.has(name); n++) {
      name = `${base}-${n}.csv`;
    }
    used.add(name);
    return name;
  });
};
