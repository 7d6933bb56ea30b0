// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { existsSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import Database from "better-sqlite3";
import { Effect, Either, Option } from "effect";
import { afterEach, describe, expect, test } from "vitest";
import { assembleFull } from "../../src/backup/assembler";
import { preflight, produce } from "../../src/backup/producer";
import type { AppConfig } from "../../src/config/app-config";
import type { BackupFormat, RestoreScope } from "../../src/config/field-values";
import { ErrorCode } from "../../src/lib/errors";
import { type AbsolutePath, pathJoin, volumeName } from "../../src/lib/types";
import { type RestoreRequest, resolveArtifact, restore } from "../../src/restore/orchestrator";
import { type ProjectTree, cleanup, createProject, readUsers, writeFile } from "../helpers/fixtures";
import { type FakeRuntimeOptions, TestServicesLayer, makeFakeRuntime, runTest } from "../helpers/layers";

const NOW = new Date(Date.UTC(2025, 0, 1, 2, 0, 0));
const SET = "20250101-020000";

const backup = (config: AppConfig, formats: readonly BackupFormat[]) =>
  Effect.flatMap(preflight(config, false), (pre) => produce(pre, { formats, validate: false, now: NOW }));

const request = (scope: RestoreScope, overrides: Partial<RestoreRequest> = {}): RestoreRequest => ({
  artifact: Option.none(),
  latest: true,
  scope,
  mode: "apply",
  ...overrides,
});

/** Drop every user but alice from the live database. */
const damage = (database: string): void => {
  const db = new Database(database);
  try {
    db.exec("DELETE FROM users WHERE id > 1");
  } finally {
    db.close();
  }
};

describe("restore", () => {
  const projects: ProjectTree[] = [];
  const project = (): ProjectTree => {
    const base = createProject();
    const config: AppConfig = {
      ...base.config,
      full: { ...base.config.full, volumes: [volumeName("caddy_data")] },
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

  describe("resolveArtifact", () => {
    test("a named artifact that does not exist", async () => {
      const { config } = project();
      const missing = pathJoin(config.paths.backupRoot, "db-native-20250101-020000.sqlite3.gz.gpg");

      const result = await runTest(
        Effect.either(resolveArtifact(config, request("database", { artifact: Option.some(missing) })))
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.BACKUP_NOT_FOUND);
      }
    });

    test("neither an artifact nor --latest", async () => {
      const { config } = project();

      const result = await runTest(
        Effect.either(resolveArtifact(config, request("database", { latest: false })))
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.INVALID_ARGS);
      }
    });

    test("--latest with no sets", async () => {
      const { config } = project();

      const result = await runTest(Effect.either(resolveArtifact(config, request("database"))));

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.BACKUP_NOT_FOUND);
        expect(result.left.message).toBe(`No database backup found under ${config.paths.backupRoot}`);
      }
    });

    test("--latest picks the native artifact of the newest set", async () => {
      const { config } = project();
      const set = await runTest(backup(config, ["sql", "native"]));

      const resolved = await runTest(resolveArtifact(config, request("database")));

      expect(resolved).toEqual({
        path: pathJoin(set.dir, `db-native-${SET}.sqlite3.gz.gpg`),
        kind: "native",
      });
    });

    test("a schema dump cannot restore a database", async () => {
      const { config } = project();
      const set = await runTest(backup(config, ["schema"]));
      const artifact = pathJoin(set.dir, `db-schema-${SET}.sql.gz.gpg`);

      const result = await runTest(
        Effect.either(resolveArtifact(config, request("database", { artifact: Option.some(artifact) })))
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.RESTORE_FAILED);
        expect(result.left.message).toBe("A schema artifact cannot be used for a database restore");
      }
    });

    test("a database artifact cannot restore configuration", async () => {
      const { config } = project();
      const set = await runTest(backup(config, ["native"]));
      const artifact = pathJoin(set.dir, `db-native-${SET}.sqlite3.gz.gpg`);

      const result = await runTest(
        Effect.either(resolveArtifact(config, request("config", { artifact: Option.some(artifact) })))
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.message).toBe("A native artifact cannot be used for a config restore");
      }
    });
  });

  describe("database scope", () => {
    test("replaces the live database from the native artifact", async () => {
      const { config, database } = project();
      const before = readUsers(database);
      await runTest(backup(config, ["native"]));
      damage(database);
      const fake = runtime({ healthyOnCall: 1 });
      let rowsAtStop = -1;
      const service = {
        ...fake.service,
        stop: (scope: RestoreScope) =>
          Effect.zipRight(
            Effect.sync(() => {
              rowsAtStop = readUsers(database).length;
            }),
            fake.service.stop(scope)
          ),
      };

      const outcome = await runTest(restore(config, request("database")), TestServicesLayer(service));

      expect(rowsAtStop).toBe(1);
      expect(readUsers(database)).toEqual(before);
      expect(fake.events).toEqual(["stop:database", "isRunning:database", "start:database", "isHealthy"]);
      expect(outcome).toEqual({
        _tag: "Applied",
        artifact: pathJoin(config.paths.backupRoot, "db", SET, `db-native-${SET}.sqlite3.gz.gpg`),
        targets: [database],
        healthAttempts: 1,
        history: [
          "Idle",
          "ServiceQuiesced",
          "Decrypted",
          "Extracted",
          "Applied",
          "ServiceResumed",
          "HealthVerified",
        ],
      });
      expect(readdirSync(config.paths.dataDir).sort()).toEqual(["attachments", "db.sqlite3"]);
    });

    test("replays the SQL artifact", async () => {
      const { config, database } = project();
      const before = readUsers(database);
      const set = await runTest(backup(config, ["sql"]));
      damage(database);
      const artifact = pathJoin(set.dir, `db-portable-${SET}.sql.gz.gpg`);

      await runTest(
        restore(config, request("database", { artifact: Option.some(artifact), latest: false })),
        TestServicesLayer(runtime({ healthyOnCall: 2 }).service)
      );

      expect(readUsers(database)).toEqual(before);
    });

    test("a service that stays up leaves everything as it was", async () => {
      const { config, database } = project();
      await runTest(backup(config, ["native"]));
      damage(database);
      const fake = runtime({ stuckRunning: true });

      const result = await runTest(
        Effect.either(restore(config, request("database"))),
        TestServicesLayer(fake.service)
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.RESTORE_FAILED);
      }
      expect(fake.events).toEqual(["stop:database", "isRunning:database"]);
      expect(readUsers(database)).toHaveLength(1);
    });

    test("a corrupt artifact restarts the services and changes nothing", async () => {
      const { config, database } = project();
      const set = await runTest(backup(config, ["native"]));
      damage(database);
      const artifact = pathJoin(set.dir, `db-native-${SET}.sqlite3.gz.gpg`);
      writeFileSync(artifact, readFileSync(artifact).subarray(0, 40));
      const fake = runtime({ healthyOnCall: 1 });

      const result = await runTest(
        Effect.either(restore(config, request("database"))),
        TestServicesLayer(fake.service)
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.DECRYPT_FAILED);
      }
      expect(fake.events).toEqual(["stop:database", "isRunning:database", "start:database"]);
      expect(readUsers(database)).toHaveLength(1);
      expect(readdirSync(config.paths.dataDir).sort()).toEqual(["attachments", "db.sqlite3"]);
    });

    test("an unhealthy service after apply fails without undoing the restore", async () => {
      const { config, database } = project();
      const before = readUsers(database);
      await runTest(backup(config, ["native"]));
      damage(database);
      const fake = runtime();

      const result = await runTest(
        Effect.either(restore(config, request("database"))),
        TestServicesLayer(fake.service)
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.RESTORE_FAILED);
        expect(result.left.message).toBe(
          "Service not healthy after 3 checks 10ms apart; restored data was left in place"
        );
      }
      expect(fake.events.filter((e) => e === "isHealthy")).toHaveLength(3);
      expect(readUsers(database)).toEqual(before);
    });
  });

  describe("dry run", () => {
    test("verifies the payload without stopping anything", async () => {
      const { config, database } = project();
      const set = await runTest(backup(config, ["sql"]));
      damage(database);
      const fake = runtime();
      const artifact = pathJoin(set.dir, `db-portable-${SET}.sql.gz.gpg`);

      const outcome = await runTest(
        restore(config, request("database", { artifact: Option.some(artifact), mode: "dry-run" })),
        TestServicesLayer(fake.service)
      );

      expect(fake.events).toEqual([]);
      expect(outcome).toEqual({
        _tag: "DryRun",
        report: { artifact, kind: "sql", check: "database integrity_check ok", targets: [database], entries: 1 },
        history: ["Idle", "Decrypted", "Extracted", "Verified"],
      });
      expect(readUsers(database)).toHaveLength(1);
    });
  });

  describe("full archives", () => {
    const fullArtifact = async (config: AppConfig): Promise<AbsolutePath> => {
      const set = await runTest(
        assembleFull(config, { includeLogs: false, label: Option.none(), throttled: false, now: NOW }),
        TestServicesLayer(runtime().service)
      );
      return pathJoin(set.dir, `full-${SET}.tar.gz.gpg`);
    };

    test("full scope puts back volumes, data, database and configuration", async () => {
      const { root, config, database } = project();
      const before = readUsers(database);
      const artifact = await fullArtifact(config);
      damage(database);
      rmSync(pathJoin(config.paths.dataDir, "attachments"), { recursive: true });
      writeFile(pathJoin(root, "caddy", "Caddyfile"), "changed\n");
      writeFile(pathJoin(root, "docker-compose.yml"), "changed\n");
      writeFile(pathJoin(root, "settings.json"), JSON.stringify({ ADMIN_TOKEN: "rotated" }));
      const fake = runtime({ healthyOnCall: 1 });

      const outcome = await runTest(
        restore(config, request("full", { artifact: Option.some(artifact), latest: false })),
        TestServicesLayer(fake.service)
      );

      expect(fake.events).toEqual([
        "stop:full",
        "isRunning:full",
        "stageVolume:caddy_data",
        "commitVolume:caddy_data",
        "start:full",
        "isHealthy",
      ]);
      expect(outcome._tag === "Applied" && outcome.targets).toEqual([
        "volume:caddy_data",
        `${config.paths.dataDir}/`,
        pathJoin(root, "docker-compose.yml"),
        `${pathJoin(root, "caddy")}/`,
      ]);
      expect(readUsers(database)).toEqual(before);
      expect(readFileSync(pathJoin(config.paths.dataDir, "attachments", "a1.bin"), "utf8")).toBe("attachment");
      expect(readFileSync(pathJoin(root, "caddy", "Caddyfile"), "utf8")).toBe("example.test {\n}\n");
      expect(readFileSync(pathJoin(root, "docker-compose.yml"), "utf8")).toBe("services:\n  vaultwarden: {}\n");
      expect(readFileSync(pathJoin(root, "settings.json"), "utf8")).toBe(JSON.stringify({ ADMIN_TOKEN: "rotated" }));
      expect(existsSync(`${config.paths.dataDir}.vaultkeep-stage`)).toBe(false);
      expect(existsSync(`${config.paths.dataDir}.vaultkeep-old`)).toBe(false);
    });

    test("config scope touches only the allow-listed files", async () => {
      const { root, config, database } = project();
      const artifact = await fullArtifact(config);
      damage(database);
      writeFile(pathJoin(root, "caddy", "Caddyfile"), "changed\n");
      const fake = runtime({ healthyOnCall: 1 });

      const outcome = await runTest(
        restore(config, request("config", { artifact: Option.some(artifact), latest: false })),
        TestServicesLayer(fake.service)
      );

      expect(fake.events).toEqual(["stop:config", "isRunning:config", "start:config", "isHealthy"]);
      expect(outcome._tag === "Applied" && outcome.targets).toEqual([
        pathJoin(root, "docker-compose.yml"),
        `${pathJoin(root, "caddy")}/`,
      ]);
      expect(readFileSync(pathJoin(root, "caddy", "Caddyfile"), "utf8")).toBe("example.test {\n}\n");
      expect(readUsers(database)).toHaveLength(1);
    });

    test("a volume the set manifest does not record is left alone", async () => {
      const { root, config } = project();
      const artifact = await fullArtifact(config);
      const manifestFile = pathJoin(root, "backups", "full", SET, "manifest.json");
      const manifest: { contents: { volumes: string[] }; failed: unknown[] } = JSON.parse(
        readFileSync(manifestFile, "utf8")
      );
      manifest.contents.volumes = [];
      manifest.failed = [{ component: "volume:caddy_data", error: "timed out" }];
      writeFileSync(manifestFile, JSON.stringify(manifest));
      const fake = runtime({ healthyOnCall: 1 });

      const outcome = await runTest(
        restore(config, request("full", { artifact: Option.some(artifact), latest: false })),
        TestServicesLayer(fake.service)
      );

      expect(fake.events).toEqual(["stop:full", "isRunning:full", "start:full", "isHealthy"]);
      expect(outcome._tag === "Applied" && outcome.targets).toEqual([
        `${config.paths.dataDir}/`,
        pathJoin(root, "docker-compose.yml"),
        `${pathJoin(root, "caddy")}/`,
      ]);
    });

    test("a secret file inside a restored config directory is kept", async () => {
      const { root, config } = project();
      const secretFile = pathJoin(root, "caddy", "secrets.json");
      writeFile(secretFile, JSON.stringify({ BACKUP_PASSPHRASE: "test-secret" }));
      const nested: AppConfig = { ...config, paths: { ...config.paths, secretFile } };
      const artifact = await fullArtifact(nested);
      writeFile(pathJoin(root, "caddy", "Caddyfile"), "changed\n");
      writeFile(secretFile, JSON.stringify({ BACKUP_PASSPHRASE: "rotated-secret" }));

      await runTest(
        restore(nested, request("config", { artifact: Option.some(artifact), latest: false })),
        TestServicesLayer(runtime({ healthyOnCall: 1 }).service)
      );

      expect(readFileSync(pathJoin(root, "caddy", "Caddyfile"), "utf8")).toBe("example.test {\n}\n");
      expect(readFileSync(secretFile, "utf8")).toBe(JSON.stringify({ BACKUP_PASSPHRASE: "rotated-secret" }));
      expect(existsSync(`${pathJoin(root, "caddy")}.vaultkeep-old`)).toBe(false);
    });

    test("database scope takes the embedded set of a full archive", async () => {
      const { config, database } = project();
      const before = readUsers(database);
      const artifact = await fullArtifact(config);
      damage(database);

      const outcome = await runTest(
        restore(config, request("database", { artifact: Option.some(artifact), latest: false })),
        TestServicesLayer(runtime({ healthyOnCall: 1 }).service)
      );

      expect(outcome._tag === "Applied" && outcome.targets).toEqual([database]);
      expect(readUsers(database)).toEqual(before);
    });
  });
});
