// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either } from "effect";
import { describe, expect, test } from "vitest";
import { ErrorCode, ServiceError, SystemError } from "../../src/lib/errors";
import { attemptSchedule, isTransientError } from "../../src/lib/retry";

const serviceError = (message: string): ServiceError =>
  new ServiceError({ code: ErrorCode.SERVICE_START_FAILED, message });

describe("isTransientError", () => {
  test("daemon and network hiccups are transient", () => {
    expect(isTransientError(serviceError("Cannot connect to the Docker daemon at unix:///var/run/docker.sock"))).toBe(
      true
    );
    expect(
      isTransientError(new SystemError({ code: ErrorCode.EXEC_FAILED, message: "read ECONNRESET" }))
    ).toBe(true);
  });

  test("permanent wording wins over transient wording", () => {
    expect(isTransientError(serviceError("no such volume: caddy_data (connection refused)"))).toBe(false);
  });

  test("anything else is permanent", () => {
    expect(isTransientError(serviceError("exit status 1"))).toBe(false);
  });
});

describe("attemptSchedule", () => {
  test("runs the effect at most `attempts` times", async () => {
    let calls = 0;
    const failing = Effect.suspend(() => {
      calls += 1;
      return Effect.fail("down");
    });

    const result = await Effect.runPromise(Effect.either(Effect.retry(failing, attemptSchedule(3, 1))));

    expect(Either.isLeft(result)).toBe(true);
    expect(calls).toBe(3);
  });

  test("stops retrying once the effect succeeds", async () => {
    let calls = 0;
    const flaky = Effect.suspend(() => {
      calls += 1;
      return calls < 2 ? Effect.fail("down") : Effect.succeed("up");
    });

    expect(await Effect.runPromise(Effect.retry(flaky, attemptSchedule(5, 1)))).toBe("up");
    expect(calls).toBe(2);
  });
});
