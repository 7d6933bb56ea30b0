// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Zod schema for `vaultkeep.toml`. Every key has a default, so an empty
 * file (or no file at all) is a valid configuration.
 */

import { z } from "zod";
import {
  ENCRYPTION_BACKEND_VALUES,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  THROTTLE_MODE_VALUES,
} from "./field-values";

const VOLUME_NAME_REGEX = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

/** Allow-list entries are relative to the project root and may not climb out of it. */
const relativeEntrySchema = z
  .string()
  .min(1)
  .refine((s) => !s.startsWith("/") && !s.split("/").includes(".."), {
    message: "Entry must be a relative path inside the project root",
  });

const containerImageSchema = z.string().regex(/^[\w./-]+(:[\w.-]+)?(@sha256:[a-f0-9]+)?$/, {
  message: "Invalid container image format",
});

export const pathsSchema = z
  .object({
    /** Project root; other relative paths resolve against it. */
    root: z.string().min(1).default("."),
    backupRoot: z.string().min(1).default("backups"),
    dataDir: z.string().min(1).default("bwdata"),
    secretFile: z.string().min(1).default("settings.json"),
    logDir: z.string().min(1).default("logs"),
    lockDir: z.string().min(1).optional(),
  })
  .default({});

export const databaseSchema = z
  .object({
    url: z.string().min(1).optional(),
  })
  .default({});

export const encryptionSchema = z
  .object({
    backend: z.enum(ENCRYPTION_BACKEND_VALUES).default("openpgp"),
  })
  .default({});

export const secretsSchema = z
  .object({
    passphraseFile: z.string().min(1).optional(),
  })
  .default({});

export const retentionSchema = z
  .object({
    keepDatabase: z.number().int().min(1).default(30),
    keepFull: z.number().int().min(1).default(8),
  })
  .default({});

export const fullSchema = z
  .object({
    volumes: z
      .array(z.string().regex(VOLUME_NAME_REGEX, { message: "Invalid volume name" }))
      .default(["caddy_data", "caddy_config"]),
    configFiles: z.array(relativeEntrySchema).default(["docker-compose.yml", "startup.sh"]),
    configDirs: z.array(relativeEntrySchema).default(["caddy", "fail2ban", "templates"]),
    freshnessHours: z.number().positive().default(24),
    volumeTimeoutMs: z.number().int().positive().default(600_000),
    helperImage: containerImageSchema.default("alpine:3.20"),
  })
  .default({});

export const dockerSchema = z
  .object({
    composeFile: z.string().min(1).default("docker-compose.yml"),
    /** Compose service stopped for a database restore. */
    service: z.string().min(1).default("vaultwarden"),
    /** Container whose health status gates the end of a restore. */
    container: z.string().min(1).default("vaultwarden"),
  })
  .default({});

export const restoreSchema = z
  .object({
    healthIntervalMs: z.number().int().positive().default(5000),
    /** Overrides both per-scope defaults when set. */
    healthAttempts: z.number().int().min(1).optional(),
  })
  .default({});

export const cloudSchema = z
  .object({
    remote: z.string().min(1).optional(),
    path: z.string().min(1).optional(),
  })
  .default({});

export const lockSchema = z
  .object({
    waitMs: z.number().int().min(0).default(5000),
    /** Age at which a lock file with unreadable content is cleared. A live holder is never stale. */
    staleMs: z.number().int().positive().default(60_000),
  })
  .default({});

export const throttleSchema = z
  .object({
    mode: z.enum(THROTTLE_MODE_VALUES).default("auto"),
  })
  .default({});

export const loggingSchema = z
  .object({
    level: z.enum(LOG_LEVEL_VALUES).default("info"),
    format: z.enum(LOG_FORMAT_VALUES).default("pretty"),
  })
  .default({});

export const fileConfigSchema = z
  .object({
    paths: pathsSchema,
    database: databaseSchema,
    encryption: encryptionSchema,
    secrets: secretsSchema,
    retention: retentionSchema,
    full: fullSchema,
    docker: dockerSchema,
    restore: restoreSchema,
    cloud: cloudSchema,
    lock: lockSchema,
    throttle: throttleSchema,
    logging: loggingSchema,
  })
  .strict();

export type FileConfig = z.output<typeof fileConfigSchema>;

/** Render zod issues as `path: message` lines. */
export const formatZodError = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("\n");
