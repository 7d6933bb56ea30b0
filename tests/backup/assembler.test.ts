// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { readFileSync } from "node:fs";
import { Effect, Option } from "effect";
import { afterEach, describe, expect, test } from "vitest";
import { type FullOptions, assembleFull, planFull } from "../../src/backup/assembler";
import { deriveStatus } from "../../src/backup/manifest";
import { preflight, produce } from "../../src/backup/producer";
import { unseal } from "../../src/backup/seal";
import type { AppConfig } from "../../src/config/app-config";
import { decodeSetLabel, pathJoin, volumeName } from "../../src/lib/types";
import { extractArchive, listArchive, normalizeEntries } from "../../src/system/archive";
import { scopedTempDirectory } from "../../src/system/fs";
import { type ProjectTree, TEST_SECRET, cleanup, createProject } from "../helpers/fixtures";
import { type FakeRuntimeOptions, TestServicesLayer, makeFakeRuntime, runTest } from "../helpers/layers";

const NOW = new Date(Date.UTC(2025, 0, 1, 2, 0, 0));

const options = (overrides: Partial<FullOptions> = {}): FullOptions => ({
  includeLogs: false,
  label: Option.none(),
  throttled: false,
  now: NOW,
  ...overrides,
});

describe("full backup", () => {
  const projects: ProjectTree[] = [];
  const project = (): ProjectTree => {
    const base = createProject();
    const config: AppConfig = {
      ...base.config,
      full: { ...base.config.full, volumes: [volumeName("caddy_data"), volumeName("missing_vol")] },
    };
    const p = { ...base, config };
    projects.push(p);
    return p;
  };
  const runtime = (extra: FakeRuntimeOptions = {}) =>
    makeFakeRuntime({ volumes: [volumeName("caddy_data")], ...extra });

  afterEach(() => {
    for (const p of projects.splice(0)) {
      cleanup(p.root);
    }
  });

  test("report-only plan shows what would be included", async () => {
    const { config } = project();
    const fake = runtime();

    const plan = await runTest(planFull(config, options()), TestServicesLayer(fake.service));

    expect(plan.id).toBe("20250101-020000");
    expect(plan.artifact).toBe("full-20250101-020000.tar.gz.gpg");
    expect(plan.volumes).toEqual([
      { path: "caddy_data", present: true },
      { path: "missing_vol", present: false },
    ]);
    expect(plan.configPaths).toEqual([
      { path: "docker-compose.yml", present: true },
      { path: "startup.sh", present: false },
      { path: "caddy/", present: true },
    ]);
    expect(Option.isNone(plan.reuse)).toBe(true);
    expect(plan.dataDir).toEqual({ path: config.paths.dataDir, present: true });
    expect(Option.isNone(plan.logs)).toBe(true);
    expect(fake.events).toEqual(["volumeExists:caddy_data", "volumeExists:missing_vol"]);
  });

  test("assembles one verified artifact without touching the service", async () => {
    const { config } = project();
    const fake = runtime();

    const set = await runTest(assembleFull(config, options()), TestServicesLayer(fake.service));

    expect(set.dir).toBe(pathJoin(config.paths.backupRoot, "full", "20250101-020000"));
    expect(set.manifest.artifacts.map((a) => a.file)).toEqual(["full-20250101-020000.tar.gz.gpg"]);
    expect(set.manifest.failed).toEqual([]);
    expect(set.manifest.contents).toEqual({
      volumes: ["caddy_data"],
      configPaths: ["docker-compose.yml", "caddy/"],
      databaseSet: "20250101-020000",
      databaseSetReused: false,
      dataSnapshot: true,
      logs: false,
    });
    expect(deriveStatus(set.manifest)).toBe("verified");
    expect(fake.events).toEqual([
      "volumeExists:caddy_data",
      "exportVolume:caddy_data",
      "volumeExists:missing_vol",
    ]);
  });

  test("the archive holds every component and never the secret file", async () => {
    const { config } = project();

    const { entries, snapshot, raw } = await runTest(
      Effect.scoped(
        Effect.gen(function* () {
          const set = yield* assembleFull(config, options());
          const work = yield* scopedTempDirectory("full-check");
          const tar = yield* unseal(
            pathJoin(set.dir, "full-20250101-020000.tar.gz.gpg"),
            work,
            Option.getOrThrow(config.secrets.passphrase)
          );
          const unpacked = pathJoin(work, "unpacked");
          const entries = yield* extractArchive(tar, unpacked);
          const snapshot = normalizeEntries(
            yield* listArchive(pathJoin(unpacked, "bwdata-snapshot.tar.gz"))
          );
          return { entries, snapshot, raw: readFileSync(tar) };
        })
      ),
      TestServicesLayer(runtime().service)
    );

    expect(entries).toContain("volume-caddy_data.tar.gz");
    expect(entries).toContain("project/docker-compose.yml");
    expect(entries).toContain("project/caddy/Caddyfile");
    expect(entries).toContain("project/config-manifest.json");
    expect(entries).toContain("bwdata-snapshot.tar.gz");
    expect(entries).toContain("db/manifest.json");
    expect(entries).toContain("db/db-native-20250101-020000.sqlite3.gz.gpg");
    expect(entries).not.toContain("project/settings.json");
    expect(snapshot).toEqual(["attachments/a1.bin"]);
    expect(raw.includes(Buffer.from("test-admin-token"))).toBe(false);
    expect(raw.includes(Buffer.from(TEST_SECRET))).toBe(false);
  });

  test("a fresh database set is reused instead of produced", async () => {
    const { config } = project();
    const earlier = new Date(NOW.getTime() - 3_600_000);

    const set = await runTest(
      Effect.zipRight(
        Effect.flatMap(preflight(config, false), (pre) =>
          produce(pre, { formats: ["native"], validate: false, now: earlier })
        ),
        assembleFull(config, options())
      ),
      TestServicesLayer(runtime().service)
    );

    expect(set.manifest.contents?.databaseSet).toBe("20250101-010000");
    expect(set.manifest.contents?.databaseSetReused).toBe(true);
  });

  test("a failing volume is recorded and the run still succeeds", async () => {
    const { config } = project();
    const fake = runtime({ failingVolumes: [volumeName("caddy_data")] });

    const set = await runTest(assembleFull(config, options()), TestServicesLayer(fake.service));

    expect(set.manifest.failed).toEqual([
      { component: "volume:caddy_data", error: "helper container failed for caddy_data" },
    ]);
    expect(set.manifest.contents?.volumes).toEqual([]);
    expect(deriveStatus(set.manifest)).toBe("degraded");
  });

  test("a volume export that dies mid-stream leaves nothing in the archive", async () => {
    const { config } = project();
    const fake = runtime({ failingVolumes: [volumeName("caddy_data")] });

    const entries = await runTest(
      Effect.scoped(
        Effect.gen(function* () {
          const set = yield* assembleFull(config, options());
          const work = yield* scopedTempDirectory("full-check");
          const tar = yield* unseal(
            pathJoin(set.dir, "full-20250101-020000.tar.gz.gpg"),
            work,
            Option.getOrThrow(config.secrets.passphrase)
          );
          return normalizeEntries(yield* listArchive(tar));
        })
      ),
      TestServicesLayer(fake.service)
    );

    expect(entries.filter((e) => e.startsWith("volume-"))).toEqual([]);
    expect(entries).toContain("project/docker-compose.yml");
  });

  test("a label is appended to the set id", async () => {
    const { config } = project();
    const label = await runTest(decodeSetLabel("pre-upgrade"));

    const set = await runTest(
      assembleFull(config, options({ label: Option.some(label) })),
      TestServicesLayer(runtime().service)
    );

    expect(set.id).toBe("20250101-020000-pre-upgrade");
    expect(set.manifest.artifacts[0]?.file).toBe("full-20250101-020000.tar.gz.gpg");
  });
});
