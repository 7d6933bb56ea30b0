// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { join } from "node:path";
import { Effect, Either, Option, Redacted } from "effect";
import { afterEach, describe, expect, test } from "vitest";
import type { AppConfig } from "../../src/config/app-config";
import {
  parseDatabaseUrl,
  resolveDatabasePath,
  resolveLiveDatabase,
  resolvePassphrase,
} from "../../src/config/secrets";
import { ErrorCode } from "../../src/lib/errors";
import { path, toAbsolutePathUnsafe } from "../../src/lib/types";
import { type ProjectTree, cleanup, createProject, writeFile } from "../helpers/fixtures";

const passphrase = (config: AppConfig): Promise<string> =>
  Effect.runPromise(Effect.map(resolvePassphrase(config), Redacted.value));

describe("secrets", () => {
  const projects: ProjectTree[] = [];
  const project = (): ProjectTree => {
    const p = createProject();
    projects.push(p);
    return p;
  };
  const withoutPassphrase = (config: AppConfig): AppConfig => ({
    ...config,
    secrets: { passphrase: Option.none(), passphraseFile: Option.none() },
  });

  afterEach(() => {
    for (const p of projects.splice(0)) {
      cleanup(p.root);
    }
  });

  describe("resolvePassphrase", () => {
    test("the environment value comes first", async () => {
      const { config } = project();

      expect(await passphrase(config)).toBe("test-secret");
    });

    test("then the passphrase file, trimmed", async () => {
      const { root, config } = project();
      const file = toAbsolutePathUnsafe(join(root, "pass.txt"));
      writeFile(file, "  test-secret-from-file\n");

      const resolved = await passphrase({
        ...withoutPassphrase(config),
        secrets: { passphrase: Option.none(), passphraseFile: Option.some(file) },
      });

      expect(resolved).toBe("test-secret-from-file");
    });

    test("an empty passphrase file is a missing secret", async () => {
      const { root, config } = project();
      const file = toAbsolutePathUnsafe(join(root, "pass.txt"));
      writeFile(file, "\n");

      const result = await Effect.runPromise(
        Effect.either(
          resolvePassphrase({
            ...config,
            secrets: { passphrase: Option.none(), passphraseFile: Option.some(file) },
          })
        )
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.SECRET_MISSING);
      }
    });

    test("then BACKUP_PASSPHRASE in the secret file", async () => {
      const { config } = project();
      writeFile(
        config.paths.secretFile,
        JSON.stringify({ ADMIN_TOKEN: "test-admin-token", BACKUP_PASSPHRASE: "test-secret-json" })
      );

      expect(await passphrase(withoutPassphrase(config))).toBe("test-secret-json");
    });

    test("nowhere at all", async () => {
      const { config } = project();

      const result = await Effect.runPromise(Effect.either(resolvePassphrase(withoutPassphrase(config))));

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.SECRET_MISSING);
        expect(result.left.message).toBe(
          "No encryption passphrase: set BACKUP_PASSPHRASE, secrets.passphraseFile, " +
            `or BACKUP_PASSPHRASE in ${config.paths.secretFile}`
        );
      }
    });

    test("a secret file that is not JSON", async () => {
      const { config } = project();
      writeFile(config.paths.secretFile, "ADMIN_TOKEN=test-admin-token");

      const result = await Effect.runPromise(Effect.either(resolvePassphrase(withoutPassphrase(config))));

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
      }
    });
  });

  describe("database location", () => {
    test("parseDatabaseUrl", async () => {
      const root = path("/srv/vault");

      expect(await Effect.runPromise(parseDatabaseUrl("sqlite:///data/db.sqlite3", root))).toBe(
        "/data/db.sqlite3"
      );
      expect(await Effect.runPromise(parseDatabaseUrl(" sqlite://bwdata/db.sqlite3 ", root))).toBe(
        "/srv/vault/bwdata/db.sqlite3"
      );
      const wrong = await Effect.runPromise(Effect.either(parseDatabaseUrl("postgres://db/vault", root)));
      const empty = await Effect.runPromise(Effect.either(parseDatabaseUrl("sqlite://", root)));
      expect(Either.isLeft(wrong)).toBe(true);
      expect(Either.isLeft(empty)).toBe(true);
    });

    test("falls back to DATABASE_URL in the secret file", async () => {
      const { config, database } = project();
      writeFile(config.paths.secretFile, JSON.stringify({ DATABASE_URL: "sqlite://bwdata/db.sqlite3" }));

      const resolved = await Effect.runPromise(
        resolveDatabasePath({ ...config, databaseUrl: Option.none() })
      );

      expect(resolved).toBe(database);
    });

    test("no URL anywhere", async () => {
      const { config } = project();

      const result = await Effect.runPromise(
        Effect.either(resolveDatabasePath({ ...config, databaseUrl: Option.none() }))
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.DATABASE_NOT_FOUND);
      }
    });

    test("the live database must exist", async () => {
      const { root, config } = project();
      const missing = `sqlite://${join(root, "bwdata", "gone.sqlite3")}`;

      const result = await Effect.runPromise(
        Effect.either(resolveLiveDatabase({ ...config, databaseUrl: Option.some(missing) }))
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.code).toBe(ErrorCode.DATABASE_NOT_FOUND);
        expect(result.left.message).toBe(`Database file not found: ${join(root, "bwdata", "gone.sqlite3")}`);
      }
    });
  });
});
