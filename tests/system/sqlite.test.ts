// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import Database from "better-sqlite3";
import { Effect, Either, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import {
  checkpointWal,
  integrityCheck,
  journalMode,
  onlineBackup,
  quoteIdentifier,
  replaySql,
  tableStats,
} from "../../src/system/sqlite";
import { SAMPLE_USERS, cleanup, createSampleDatabase, readUsers, tempDir } from "../helpers/fixtures";
import { runTest } from "../helpers/layers";

describe("quoteIdentifier", () => {
  test("doubles embedded quotes", () => {
    expect(quoteIdentifier("users")).toBe('"users"');
    expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
  });
});

describe("sqlite", () => {
  let dir: AbsolutePath;
  let database: AbsolutePath;

  beforeEach(() => {
    dir = tempDir();
    database = pathJoin(dir, "db.sqlite3");
    createSampleDatabase(database);
  });

  afterEach(() => {
    cleanup(dir);
  });

  test("integrityCheck answers ok for a sound database", async () => {
    expect(await runTest(integrityCheck(database))).toBe("ok");
  });

  test("tableStats counts user tables and rows of the first by name", async () => {
    const stats = await runTest(tableStats(database));

    expect(stats.tableCount).toBe(2);
    expect(stats.firstTable).toEqual(Option.some({ name: "folders", rows: 0 }));
  });

  test("onlineBackup copies every row", async () => {
    const copy = pathJoin(dir, "copy.sqlite3");

    await runTest(onlineBackup(database, copy));

    expect(readUsers(copy)).toEqual(readUsers(database));
    expect(readUsers(copy)).toHaveLength(SAMPLE_USERS.length);
  });

  test("replaySql builds a database from statements", async () => {
    const target = pathJoin(dir, "replayed.sqlite3");

    await runTest(replaySql("CREATE TABLE t (x INTEGER); INSERT INTO t VALUES (42);", target));

    const db = new Database(target, { readonly: true });
    try {
      expect(db.prepare("SELECT x FROM t").pluck().get()).toBe(42);
    } finally {
      db.close();
    }
  });

  test("journalMode and checkpointWal on a WAL database", async () => {
    const db = new Database(database);
    db.pragma("journal_mode = WAL");
    db.close();

    expect(await runTest(journalMode(database))).toBe("wal");
    await runTest(checkpointWal(database));
    expect(await runTest(integrityCheck(database))).toBe("ok");
  });

  test("opening a missing file read-only fails with BACKUP_FAILED", async () => {
    const result = await runTest(Effect.either(integrityCheck(pathJoin(dir, "absent.sqlite3"))));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.code).toBe(ErrorCode.BACKUP_FAILED);
    }
  });
});
