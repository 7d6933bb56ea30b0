// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { readFileSync, readdirSync, writeFileSync } from "node:fs";
import Database from "better-sqlite3";
import { Effect, Option, Redacted } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { failed, passed, skipped, verificationPassed } from "../../src/backup/manifest";
import { seal } from "../../src/backup/seal";
import { verifyArtifact } from "../../src/backup/verifier";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import { createArchive } from "../../src/system/archive";
import { encryptBytes } from "../../src/system/encrypt";
import { onlineBackup } from "../../src/system/sqlite";
import { TEST_SECRET, cleanup, createSampleDatabase, tempDir, writeFile } from "../helpers/fixtures";
import { runTest } from "../helpers/layers";

const secret = Redacted.make(TEST_SECRET);

describe("verifyArtifact", () => {
  let dir: AbsolutePath;
  let database: AbsolutePath;

  /** Seal `content` as `name` inside `dir/out`. */
  const sealText = (name: string, content: string): Promise<AbsolutePath> => {
    const plain = pathJoin(dir, "plain");
    writeFile(plain, content);
    writeFile(pathJoin(dir, "out", ".keep"), "");
    return runTest(Effect.map(seal(plain, pathJoin(dir, "out", name), secret), (s) => s.path));
  };

  const sealNative = (name = "db-native-20250101-020000.sqlite3.gz.gpg"): Promise<AbsolutePath> => {
    const copy = pathJoin(dir, "copy.sqlite3");
    writeFile(pathJoin(dir, "out", ".keep"), "");
    return runTest(
      Effect.zipRight(
        onlineBackup(database, copy),
        Effect.map(seal(copy, pathJoin(dir, "out", name), secret), (s) => s.path)
      )
    );
  };

  beforeEach(() => {
    dir = tempDir();
    database = pathJoin(dir, "live.sqlite3");
    createSampleDatabase(database);
  });

  afterEach(() => {
    cleanup(dir);
  });

  test("a sound native artifact passes every layer", async () => {
    const artifact = await sealNative();

    const result = await runTest(verifyArtifact(artifact, secret, Option.some(database)));

    expect(result.decrypt).toEqual(passed("decrypted"));
    expect(result.decompress).toEqual(passed("decompressed"));
    expect(result.structure).toEqual(passed("database: integrity_check ok"));
    expect(result.crossCheck).toEqual(passed("2 tables, folders has 0 rows"));
  });

  test("without a live source the cross-check is skipped", async () => {
    const artifact = await sealNative();

    const result = await runTest(verifyArtifact(artifact, secret));

    expect(result.crossCheck).toEqual(skipped("no live source to compare"));
    expect(verificationPassed(result)).toBe(true);
  });

  test("a cross-check mismatch is reported but verification still passes", async () => {
    const artifact = await sealNative();
    const db = new Database(database);
    db.exec("CREATE TABLE audit (id INTEGER)");
    db.close();

    const result = await runTest(verifyArtifact(artifact, secret, Option.some(database)));

    expect(result.crossCheck).toEqual(
      failed("backup has 2 tables, folders has 0 rows; live has 3 tables, audit has 0 rows")
    );
    expect(verificationPassed(result)).toBe(true);
  });

  test("a truncated artifact fails at decrypt and leaves nothing beside it", async () => {
    const artifact = await sealNative();
    const bytes = readFileSync(artifact);
    writeFileSync(artifact, bytes.subarray(0, Math.floor(bytes.length / 2)));

    const result = await runTest(verifyArtifact(artifact, secret));

    expect(result.exists.status).toBe("passed");
    expect(result.decrypt.status).toBe("failed");
    expect([result.decompress, result.structure, result.crossCheck]).toEqual([
      skipped(),
      skipped(),
      skipped(),
    ]);
    expect(readdirSync(pathJoin(dir, "out")).sort()).toEqual([
      ".keep",
      "db-native-20250101-020000.sqlite3.gz.gpg",
    ]);
  });

  test("the wrong passphrase fails at decrypt", async () => {
    const artifact = await sealNative();

    const result = await runTest(verifyArtifact(artifact, Redacted.make("wrong-secret")));

    expect(result.decrypt.status).toBe("failed");
    expect(verificationPassed(result)).toBe(false);
  });

  test("a missing artifact fails at exists", async () => {
    const result = await runTest(verifyArtifact(pathJoin(dir, "db-native-20250101-020000.sqlite3.gz.gpg"), secret));

    expect(result.exists).toEqual(failed("db-native-20250101-020000.sqlite3.gz.gpg is missing or empty"));
    expect(result.decrypt).toEqual(skipped());
  });

  test("encrypted data that is not gzip fails at decompress", async () => {
    const sealed = await runTest(encryptBytes(new TextEncoder().encode("not gzip"), secret));
    const artifact = pathJoin(dir, "db-portable-20250101-020000.sql.gz.gpg");
    writeFileSync(artifact, sealed);

    const result = await runTest(verifyArtifact(artifact, secret));

    expect(result.decrypt.status).toBe("passed");
    expect(result.decompress.status).toBe("failed");
    expect(result.structure).toEqual(skipped());
  });

  test("a SQL dump that does not replay fails at structure", async () => {
    const artifact = await sealText("db-portable-20250101-020000.sql.gz.gpg", "CREATE TABLE (;\n");

    const result = await runTest(verifyArtifact(artifact, secret));

    expect(result.structure.status).toBe("failed");
    expect(result.crossCheck).toEqual(skipped());
  });

  test("a JSON export without its envelope fails at structure", async () => {
    const artifact = await sealText("db-export-20250101-020000.json.gz.gpg", '{"tables": []}');

    const result = await runTest(verifyArtifact(artifact, secret));

    expect(result.structure).toEqual(failed("missing database_export envelope"));
  });

  test("a CSV bundle needs its manifest", async () => {
    const bundle = pathJoin(dir, "bundle");
    writeFile(pathJoin(bundle, "users.csv"), "id\r\n1\r\n");
    const tar = pathJoin(dir, "bundle.tar");
    await runTest(createArchive(bundle, tar));
    writeFile(pathJoin(dir, "out", ".keep"), "");
    const artifact = await runTest(
      Effect.map(seal(tar, pathJoin(dir, "out", "db-csv-20250101-020000.tar.gz.gpg"), secret), (s) => s.path)
    );

    const result = await runTest(verifyArtifact(artifact, secret));

    expect(result.structure).toEqual(failed("CSV bundle has no manifest.json"));
  });

  test("an unrecognised file name fails at structure", async () => {
    const artifact = await sealText("mystery.bin.gz.gpg", "data");

    const result = await runTest(verifyArtifact(artifact, secret));

    expect(result.structure).toEqual(failed("mystery.bin.gz.gpg is not a recognised artifact name"));
  });
});
