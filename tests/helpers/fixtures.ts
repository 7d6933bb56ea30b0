// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Test fixtures: throwaway project trees, a small SQLite database with
 * awkward values, and an `AppConfig` pointing into the tree.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import { Option, Redacted } from "effect";
import type { AppConfig } from "../../src/config/app-config";
import { type AbsolutePath, toAbsolutePathUnsafe } from "../../src/lib/types";

export const TEST_SECRET = "test-secret";

export const tempDir = (prefix = "vaultkeep-test-"): AbsolutePath =>
  toAbsolutePathUnsafe(mkdtempSync(join(tmpdir(), prefix)));

export const cleanup = (dir: string): void => {
  rmSync(dir, { recursive: true, force: true });
};

export const writeFile = (path: string, content: string | Uint8Array): void => {
  mkdirSync(join(path, ".."), { recursive: true });
  writeFileSync(path, content);
};

export interface SampleRow {
  readonly id: number;
  readonly name: string;
  readonly note: string | null;
  readonly avatar: Buffer | null;
}

/** Values chosen to exercise quoting: commas, quotes, newlines, NULL and blobs. */
export const SAMPLE_USERS: readonly SampleRow[] = [
  { id: 1, name: "alice", note: "plain", avatar: Buffer.from([0x00, 0xff, 0x10]) },
  { id: 2, name: "bob, jr", note: 'says "hi"', avatar: null },
  { id: 3, name: "carol", note: "line one\nline two", avatar: null },
  { id: 4, name: "dan's", note: null, avatar: Buffer.from("png") },
];

/**
 * Two tables (`users`, `folders`), an index, a view and a trigger.
 * `folders` is empty.
 */
export const createSampleDatabase = (path: string): void => {
  mkdirSync(join(path, ".."), { recursive: true });
  const db = new Database(path);
  try {
    db.exec(`
      CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL, note TEXT, avatar BLOB);
      CREATE TABLE folders (id INTEGER PRIMARY KEY, user_id INTEGER REFERENCES users(id), title TEXT);
      CREATE INDEX users_name ON users(name);
      CREATE VIEW named_users AS SELECT id, name FROM users;
      CREATE TRIGGER users_touch AFTER UPDATE ON users BEGIN SELECT 1; END;
      PRAGMA user_version = 7;
    `);
    const insert = db.prepare("INSERT INTO users (id, name, note, avatar) VALUES (?, ?, ?, ?)");
    for (const row of SAMPLE_USERS) {
      insert.run(row.id, row.name, row.note, row.avatar);
    }
  } finally {
    db.close();
  }
};

/** Roughly `targetBytes` of payload in a `blobs` table. */
export const createLargeDatabase = (path: string, targetBytes: number): void => {
  mkdirSync(join(path, ".."), { recursive: true });
  const db = new Database(path);
  try {
    db.exec("CREATE TABLE blobs (id INTEGER PRIMARY KEY, payload BLOB NOT NULL)");
    const insert = db.prepare("INSERT INTO blobs (payload) VALUES (?)");
    const chunk = 16 * 1024;
    const fill = db.transaction((count: number) => {
      for (let i = 0; i < count; i++) {
        // Deterministic but poorly compressible
        const buf = Buffer.alloc(chunk);
        for (let j = 0; j < chunk; j++) {
          buf[j] = (i * 131 + j * 17 + ((j * j) >> 3)) & 0xff;
        }
        insert.run(buf);
      }
    });
    fill(Math.ceil(targetBytes / chunk));
  } finally {
    db.close();
  }
};

export const readUsers = (path: string): readonly unknown[] => {
  const db = new Database(path, { readonly: true });
  try {
    return db.prepare("SELECT id, name, note, avatar FROM users ORDER BY id").all();
  } finally {
    db.close();
  }
};

export interface ProjectTree {
  readonly root: AbsolutePath;
  readonly config: AppConfig;
  readonly database: AbsolutePath;
}

/**
 * A project root with `bwdata/db.sqlite3`, a compose file, a Caddy config
 * directory, a live secret file and a `backups/` root.
 */
export const createProject = (overrides: Partial<AppConfig> = {}): ProjectTree => {
  const root = tempDir();
  const database = toAbsolutePathUnsafe(join(root, "bwdata", "db.sqlite3"));
  createSampleDatabase(database);
  writeFile(join(root, "bwdata", "attachments", "a1.bin"), "attachment");
  writeFile(join(root, "docker-compose.yml"), "services:\n  vaultwarden: {}\n");
  writeFile(join(root, "caddy", "Caddyfile"), "example.test {\n}\n");
  writeFile(join(root, "settings.json"), JSON.stringify({ ADMIN_TOKEN: "test-admin-token" }));

  const at = (...parts: string[]): AbsolutePath => toAbsolutePathUnsafe(join(root, ...parts));
  const config: AppConfig = {
    paths: {
      root,
      backupRoot: at("backups"),
      dataDir: at("bwdata"),
      secretFile: at("settings.json"),
      logDir: at("logs"),
      lockDir: at("backups", ".locks"),
    },
    databaseUrl: Option.some(`sqlite://${database}`),
    encryption: { backend: "openpgp" },
    secrets: { passphrase: Option.some(Redacted.make(TEST_SECRET)), passphraseFile: Option.none() },
    retention: { keepDatabase: 30, keepFull: 8 },
    full: {
      volumes: [],
      configFiles: ["docker-compose.yml", "startup.sh", "settings.json"],
      configDirs: ["caddy"],
      freshnessHours: 24,
      volumeTimeoutMs: 60_000,
      helperImage: "alpine:3.20",
    },
    docker: { composeFile: at("docker-compose.yml"), service: "vaultwarden", container: "vaultwarden" },
    restore: { healthIntervalMs: 10, healthAttempts: { database: 3, config: 3, full: 3 } },
    cloud: Option.none(),
    lock: { waitMs: 200, staleMs: 60_000 },
    throttle: { mode: "never" },
    logging: { level: "error", format: "pretty" },
    ...overrides,
  };
  return { root, config, database };
};
