// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { existsSync, readFileSync, readdirSync, utimesSync, writeFileSync } from "node:fs";
import { Effect, Either, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import { isProcessAlive, parseLockContent, tryMonitorLock, withLock } from "../../src/system/lock";
import { cleanup, tempDir } from "../helpers/fixtures";
import { runTest } from "../helpers/layers";

// Far above any pid_max, so signal 0 always answers ESRCH.
const DEAD_PID = 2_147_483_000;

describe("parseLockContent", () => {
  test("reads pid and timestamp lines", () => {
    expect(parseLockContent("1234\n1700000000000\nsome-token\n")).toEqual(
      Option.some({ pid: 1234, timestamp: 1_700_000_000_000 })
    );
    expect(parseLockContent("1234\n1700000000000\n")).toEqual(
      Option.some({ pid: 1234, timestamp: 1_700_000_000_000 })
    );
  });

  test("malformed content is None", () => {
    expect(Option.isNone(parseLockContent("garbage"))).toBe(true);
    expect(Option.isNone(parseLockContent(""))).toBe(true);
  });
});

describe("isProcessAlive", () => {
  test("the current process is alive", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });

  test("an unused pid is dead", () => {
    expect(isProcessAlive(DEAD_PID)).toBe(false);
  });
});

describe("withLock", () => {
  let dir: AbsolutePath;
  const options = (): { dir: AbsolutePath; waitMs: number; staleMs: number } => ({
    dir,
    waitMs: 150,
    staleMs: 60_000,
  });

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    cleanup(dir);
  });

  test("runs the operation and removes the lock file afterwards", async () => {
    const result = await runTest(
      withLock(
        "operations",
        Effect.sync(() => existsSync(pathJoin(dir, "operations.lock"))),
        options()
      )
    );

    expect(result).toBe(true);
    expect(existsSync(pathJoin(dir, "operations.lock"))).toBe(false);
  });

  test("writes the holder's pid into the lock file", async () => {
    const content = await runTest(
      withLock(
        "operations",
        Effect.sync(() => readFileSync(pathJoin(dir, "operations.lock"), "utf8")),
        options()
      )
    );

    expect(content.split("\n")[0]).toBe(String(process.pid));
  });

  test("releases the lock when the operation fails", async () => {
    const first = await runTest(Effect.either(withLock("operations", Effect.fail("boom"), options())));
    const second = await runTest(withLock("operations", Effect.succeed("again"), options()));

    expect(Either.isLeft(first)).toBe(true);
    expect(second).toBe("again");
  });

  test("a live holder makes the lock busy after the wait", async () => {
    writeFileSync(pathJoin(dir, "operations.lock"), `${process.pid}\n${Date.now()}\n`);

    const result = await runTest(Effect.either(withLock("operations", Effect.succeed("ran"), options())));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toMatchObject({ _tag: "GeneralError", code: ErrorCode.LOCK_BUSY });
    }
  });

  test("a dead holder's lock is taken over", async () => {
    writeFileSync(pathJoin(dir, "operations.lock"), `${DEAD_PID}\n${Date.now()}\n`);

    const result = await runTest(withLock("operations", Effect.succeed("ran"), options()));

    expect(result).toBe("ran");
    expect(existsSync(pathJoin(dir, "operations.lock"))).toBe(false);
  });

  test("a live holder's lock is never stale, however old", async () => {
    writeFileSync(pathJoin(dir, "operations.lock"), `${process.pid}\n${Date.now() - 120_000}\n`);

    const result = await runTest(Effect.either(withLock("operations", Effect.succeed("ran"), options())));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toMatchObject({ code: ErrorCode.LOCK_BUSY });
    }
  });

  test("a run longer than staleMs keeps a second run out", async () => {
    const trace: string[] = [];
    const holder = withLock(
      "operations",
      Effect.gen(function* () {
        trace.push("first-enter");
        yield* Effect.sleep("400 millis");
        trace.push("first-exit");
      }),
      { dir, waitMs: 100, staleMs: 100 }
    );
    const contender = Effect.zipRight(
      Effect.sleep("200 millis"),
      Effect.either(
        withLock(
          "operations",
          Effect.sync(() => void trace.push("second-enter")),
          { dir, waitMs: 100, staleMs: 100 }
        )
      )
    );

    const [, second] = await runTest(Effect.all([holder, contender], { concurrency: 2 }));

    expect(trace).toEqual(["first-enter", "first-exit"]);
    expect(Either.isLeft(second)).toBe(true);
    if (Either.isLeft(second)) {
      expect(second.left).toMatchObject({ code: ErrorCode.LOCK_BUSY });
    }
  });

  test("two waiters on a dead holder's lock never hold it together", async () => {
    writeFileSync(pathJoin(dir, "operations.lock"), `${DEAD_PID}\n${Date.now()}\n`);
    let active = 0;
    let peak = 0;
    const critical = Effect.gen(function* () {
      active += 1;
      peak = Math.max(peak, active);
      yield* Effect.sleep("50 millis");
      active -= 1;
      return "ran";
    });
    const run = withLock("operations", critical, {
      dir,
      waitMs: 2000,
      staleMs: 60_000,
      retryIntervalMs: 10,
    });

    const results = await runTest(Effect.all([run, run], { concurrency: 2 }));

    expect(results).toEqual(["ran", "ran"]);
    expect(peak).toBe(1);
    expect(readdirSync(dir)).toEqual([]);
  });

  test("unparseable content is stale only once older than staleMs", async () => {
    const lockFile = pathJoin(dir, "operations.lock");
    writeFileSync(lockFile, "");

    const fresh = await runTest(Effect.either(withLock("operations", Effect.succeed("ran"), options())));
    const old = new Date(Date.now() - 120_000);
    utimesSync(lockFile, old, old);
    const aged = await runTest(withLock("operations", Effect.succeed("ran"), options()));

    expect(Either.isLeft(fresh)).toBe(true);
    expect(aged).toBe("ran");
  });

  test("release leaves a lock that another holder put in place", async () => {
    const lockFile = pathJoin(dir, "operations.lock");
    const other = `${process.pid}\n${Date.now()}\nanother-holder\n`;

    await runTest(withLock("operations", Effect.sync(() => writeFileSync(lockFile, other)), options()));

    expect(readFileSync(lockFile, "utf8")).toBe(other);
  });

  test("rejects resource names that would escape the lock directory", async () => {
    const result = await runTest(Effect.either(withLock("../evil", Effect.succeed("ran"), options())));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toMatchObject({ code: ErrorCode.INVALID_ARGS });
    }
  });
});

describe("tryMonitorLock", () => {
  let dir: AbsolutePath;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    cleanup(dir);
  });

  test("acquires a free lock and releases it with the scope", async () => {
    const held = await runTest(Effect.scoped(tryMonitorLock(dir)));

    expect(Option.isSome(held)).toBe(true);
    expect(existsSync(pathJoin(dir, "monitor.lock"))).toBe(false);
  });

  test("a live holder means None, however old its lock", async () => {
    writeFileSync(pathJoin(dir, "monitor.lock"), `${process.pid}\n0\n`);

    const held = await runTest(Effect.scoped(tryMonitorLock(dir)));

    expect(Option.isNone(held)).toBe(true);
    expect(existsSync(pathJoin(dir, "monitor.lock"))).toBe(true);
  });

  test("a second cycle inside the first is skipped", async () => {
    const [outer, inner] = await runTest(
      Effect.scoped(
        Effect.flatMap(tryMonitorLock(dir), (first) =>
          Effect.map(Effect.scoped(tryMonitorLock(dir)), (second) => [first, second] as const)
        )
      )
    );

    expect(Option.isSome(outer)).toBe(true);
    expect(Option.isNone(inner)).toBe(true);
  });
});
