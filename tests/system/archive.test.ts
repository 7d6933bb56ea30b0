// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { existsSync, readFileSync } from "node:fs";
import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import {
  createArchive,
  extractArchive,
  findUnsafeEntries,
  listArchive,
  normalizeEntries,
} from "../../src/system/archive";
import { cleanup, tempDir, writeFile } from "../helpers/fixtures";
import { runTest } from "../helpers/layers";

describe("findUnsafeEntries", () => {
  test("flags absolute and parent-escaping names", () => {
    expect(
      findUnsafeEntries(["./ok.txt", "/etc/passwd", "../up", "a/../../b", "dir/..", "fine/.."])
    ).toEqual(["/etc/passwd", "../up", "a/../../b", "dir/..", "fine/.."]);
  });

  test("plain relative names are safe", () => {
    expect(findUnsafeEntries(["./", "./a", "b/c.txt", "..hidden"])).toEqual([]);
  });
});

describe("normalizeEntries", () => {
  test("strips ./ and drops directory entries", () => {
    expect(normalizeEntries(["./", "./caddy/", "./caddy/Caddyfile", "settings.json"])).toEqual([
      "caddy/Caddyfile",
      "settings.json",
    ]);
  });
});

describe("createArchive / extractArchive", () => {
  let dir: AbsolutePath;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    cleanup(dir);
  });

  test("round-trips a gzip tree with relative entry names", async () => {
    const source = pathJoin(dir, "src");
    const archive = pathJoin(dir, "tree.tar.gz");
    const dest = pathJoin(dir, "out");
    writeFile(pathJoin(source, "top.txt"), "top");
    writeFile(pathJoin(source, "nested", "deep.txt"), "deep");

    const entries = await runTest(
      Effect.zipRight(createArchive(source, archive, { gzip: true }), extractArchive(archive, dest))
    );

    expect([...entries].sort()).toEqual(["nested/deep.txt", "top.txt"]);
    expect(readFileSync(pathJoin(dest, "nested", "deep.txt"), "utf8")).toBe("deep");
  });

  test("exclude drops matching entries", async () => {
    const source = pathJoin(dir, "src");
    const archive = pathJoin(dir, "tree.tar");
    writeFile(pathJoin(source, "keep.txt"), "k");
    writeFile(pathJoin(source, "logs", "run.log"), "l");

    const names = await runTest(
      Effect.zipRight(
        createArchive(source, archive, {
          exclude: (p) => p === "logs" || p.startsWith("logs/"),
        }),
        listArchive(archive)
      )
    );

    expect(normalizeEntries(names)).toEqual(["keep.txt"]);
  });

  test("a corrupt archive fails to list and extracts nothing", async () => {
    const archive = pathJoin(dir, "broken.tar.gz");
    const dest = pathJoin(dir, "out");
    writeFile(archive, "this is not a tarball at all, just text padding ".repeat(20));

    const result = await runTest(Effect.either(extractArchive(archive, dest)));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.code).toBe(ErrorCode.BACKUP_FAILED);
    }
    expect(existsSync(dest)).toBe(false);
  });
});
