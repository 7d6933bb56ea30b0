// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { existsSync, readFileSync, statSync } from "node:fs";
import { Effect, Exit, Option } from "effect";
import { afterEach, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import {
  atomicWrite,
  cleanupPath,
  copyTree,
  fileSizeOrZero,
  listDirectory,
  readText,
  removePath,
  scopedTempDirectory,
  writeFileExclusive,
} from "../../src/system/fs";
import { cleanup, tempDir, writeFile } from "../helpers/fixtures";
import { runTest, runTestExit } from "../helpers/layers";

describe("fs", () => {
  const dirs: string[] = [];
  const fresh = (): AbsolutePath => {
    const dir = tempDir();
    dirs.push(dir);
    return dir;
  };

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      cleanup(dir);
    }
  });

  test("readText maps a missing file to FILE_READ_FAILED with the path", async () => {
    const missing = pathJoin(fresh(), "nope.txt");
    const result = await runTest(Effect.either(readText(missing)));
    expect(result._tag).toBe("Left");
    if (result._tag === "Left") {
      expect(result.left.code).toBe(ErrorCode.FILE_READ_FAILED);
      expect(result.left.path).toBe(missing);
    }
  });

  test("writeFileExclusive creates once and reports an existing file as None", async () => {
    const target = pathJoin(fresh(), "lock");

    const first = await runTest(writeFileExclusive(target, "one"));
    const second = await runTest(writeFileExclusive(target, "two"));

    expect(Option.isSome(first)).toBe(true);
    expect(Option.isNone(second)).toBe(true);
    expect(readFileSync(target, "utf8")).toBe("one");
  });

  test("atomicWrite leaves no temp file behind and applies the mode", async () => {
    const dir = fresh();
    const target = pathJoin(dir, "state.json");

    await runTest(atomicWrite(target, "{}", { mode: 0o600 }));

    const names = (await runTest(listDirectory(dir))).map((e) => e.name);
    expect(names).toEqual(["state.json"]);
    expect(statSync(target).mode & 0o777).toBe(0o600);
  });

  test("listDirectory lists a missing directory as empty", async () => {
    const entries = await runTest(listDirectory(pathJoin(fresh(), "absent")));

    expect(entries).toEqual([]);
  });

  test("fileSizeOrZero is 0 for a missing file", async () => {
    const dir = fresh();
    writeFile(pathJoin(dir, "five"), "12345");

    expect(await runTest(fileSizeOrZero(pathJoin(dir, "five")))).toBe(5);
    expect(await runTest(fileSizeOrZero(pathJoin(dir, "absent")))).toBe(0);
  });

  test("copyTree skips excluded paths and everything below them", async () => {
    const src = fresh();
    const dest = pathJoin(fresh(), "copy");
    writeFile(pathJoin(src, "keep", "a.txt"), "a");
    writeFile(pathJoin(src, "skip", "b.txt"), "b");

    await runTest(copyTree(src, dest, (p) => p.endsWith("/skip")));

    expect(readFileSync(pathJoin(dest, "keep", "a.txt"), "utf8")).toBe("a");
    expect(existsSync(pathJoin(dest, "skip"))).toBe(false);
  });

  test("scopedTempDirectory is private and removed when the scope closes", async () => {
    const parent = fresh();
    const seen = await runTest(
      Effect.scoped(
        Effect.map(scopedTempDirectory("work", parent), (dir) => ({
          dir,
          mode: statSync(dir).mode & 0o777,
        }))
      )
    );

    expect(seen.mode).toBe(0o700);
    expect(existsSync(seen.dir)).toBe(false);
  });

  test("scopedTempDirectory is removed when the scoped effect fails", async () => {
    const parent = fresh();
    let created = "";
    const exit = await runTestExit(
      Effect.scoped(
        Effect.flatMap(scopedTempDirectory("work", parent), (dir) => {
          created = dir;
          return Effect.fail("boom");
        })
      )
    );

    expect(Exit.isFailure(exit)).toBe(true);
    expect(created).not.toBe("");
    expect(existsSync(created)).toBe(false);
  });

  test("removePath treats a missing path as removed", async () => {
    await runTest(removePath(pathJoin(fresh(), "never-existed")));
  });

  test("removePath reports a failed removal as FILE_WRITE_FAILED", async () => {
    const bad = `${fresh()}/bad\u0000name`;
    const result = await runTest(Effect.either(removePath(bad)));
    expect(result._tag).toBe("Left");
    if (result._tag === "Left") {
      expect(result.left._tag).toBe("SystemError");
      expect(result.left.code).toBe(ErrorCode.FILE_WRITE_FAILED);
      expect(result.left.path).toBe(bad);
    }
  });

  test("cleanupPath logs a failed removal instead of failing", async () => {
    const exit = await runTestExit(cleanupPath(`${fresh()}/bad\u0000name`));
    expect(Exit.isSuccess(exit)).toBe(true);
  });
});
