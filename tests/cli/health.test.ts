// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either } from "effect";
import { afterEach, describe, expect, test } from "vitest";
import { executeHealth } from "../../src/cli/commands/health";
import { ErrorCode } from "../../src/lib/errors";
import { tryMonitorLock } from "../../src/system/lock";
import { type ProjectTree, cleanup, createProject } from "../helpers/fixtures";
import { TestServicesLayer, makeFakeRuntime, runTest } from "../helpers/layers";

describe("health", () => {
  const projects: ProjectTree[] = [];
  const project = (): ProjectTree => {
    const p = createProject();
    projects.push(p);
    return p;
  };

  afterEach(() => {
    for (const p of projects.splice(0)) {
      cleanup(p.root);
    }
  });

  test("healthy", async () => {
    const { config } = project();
    const fake = makeFakeRuntime({ healthyOnCall: 1 });

    await runTest(executeHealth({ config, format: "json" }), TestServicesLayer(fake.service));

    expect(fake.events).toEqual(["isHealthy"]);
  });

  test("unhealthy fails the run", async () => {
    const { config } = project();

    const result = await runTest(
      Effect.either(executeHealth({ config, format: "json" })),
      TestServicesLayer(makeFakeRuntime().service)
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.code).toBe(ErrorCode.GENERAL_ERROR);
      expect(result.left.message).toBe("vaultwarden is not healthy");
    }
  });

  test("a cycle that finds another monitor is skipped", async () => {
    const { config } = project();
    const fake = makeFakeRuntime();

    await runTest(
      Effect.scoped(
        Effect.flatMap(tryMonitorLock(config.paths.lockDir), () => executeHealth({ config, format: "json" }))
      ),
      TestServicesLayer(fake.service)
    );

    expect(fake.events).toEqual([]);
  });
});
