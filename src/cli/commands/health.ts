// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `health`: one monitoring cycle. Exit 0 when the service is healthy, 1
 * otherwise. A cycle that finds another monitor running is skipped and
 * exits 0.
 */

import { Effect, Option } from "effect";
import type { AppConfig } from "../../config/app-config";
import type { LogFormat } from "../../config/field-values";
import { ErrorCode, GeneralError, type SystemError } from "../../lib/errors";
import { logSuccess, writeOutput } from "../../lib/log";
import { tryMonitorLock } from "../../system/lock";
import { ServiceRuntime } from "../../system/services/runtime";
import { chooseOutput } from "./utils";

export interface HealthOptions {
  readonly config: AppConfig;
  readonly format: LogFormat;
}

export const executeHealth = (
  options: HealthOptions
): Effect.Effect<void, GeneralError | SystemError, ServiceRuntime> =>
  Effect.scoped(
    Effect.gen(function* () {
      const lock = yield* tryMonitorLock(options.config.paths.lockDir);
      if (Option.isNone(lock)) {
        yield* Effect.logInfo("Another health check is running; skipping this cycle");
        yield* writeOutput(
          chooseOutput(
            options.format,
            () => ({ skipped: true }),
            () => "skipped: another health check is running"
          )
        );
        return;
      }

      const runtime = yield* ServiceRuntime;
      const healthy = yield* runtime.isHealthy();
      const container = options.config.docker.container;
      yield* writeOutput(
        chooseOutput(
          options.format,
          () => ({ container, healthy }),
          () => `${healthy ? "✓" : "✗"} ${container} ${healthy ? "healthy" : "unhealthy"}`
        )
      );
      if (!healthy) {
        return yield* Effect.fail(
          new GeneralError({
            code: ErrorCode.GENERAL_ERROR,
            message: `${container} is not healthy`,
          })
        );
      }
      yield* logSuccess(`${container} is healthy`);
    })
  );
