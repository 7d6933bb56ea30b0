// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup set and artifact vocabulary: identifiers, artifact kinds and the
 * file naming table. Everything here is pure.
 */

import { Array as Arr, Brand, Option, pipe } from "effect";
import type { BackupFormat, Category } from "../config/field-values";
import type { SetLabel } from "../lib/types";

// ─────────────────────────────────────────────────────────────────────────────
// Set identifiers
// ─────────────────────────────────────────────────────────────────────────────

/** `YYYYMMDD-HHMMSS`, optionally followed by `-<label>`. */
export type SetId = string & Brand.Brand<"SetId">;

const SetId = Brand.nominal<SetId>();

const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})/;

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

/** Second-resolution UTC timestamp used in set and artifact names. */
export const formatTimestamp = (date: Date): string =>
  `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
  `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

export const makeSetId = (timestamp: string, label: Option.Option<SetLabel>): SetId =>
  SetId(
    Option.match(label, {
      onNone: (): string => timestamp,
      onSome: (l): string => `${timestamp}-${l}`,
    })
  );

/** Timestamp prefix of a set directory name, if it has one. */
export const setTimestamp = (name: string): Option.Option<string> =>
  pipe(
    Option.fromNullable(TIMESTAMP_PATTERN.exec(name)),
    Option.map((m) => m[0])
  );

export const isSetName = (name: string): boolean => Option.isSome(setTimestamp(name));

export const parseSetId = (name: string): Option.Option<SetId> =>
  isSetName(name) ? Option.some(SetId(name)) : Option.none();

/** Creation time encoded in a set name. */
export const timestampToDate = (timestamp: string): Option.Option<Date> =>
  pipe(
    Option.fromNullable(TIMESTAMP_PATTERN.exec(timestamp)),
    Option.map(([, y, mo, d, h, mi, s]) =>
      new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s)))
    ),
    Option.filter((date) => !Number.isNaN(date.getTime()))
  );

// ─────────────────────────────────────────────────────────────────────────────
// Artifacts
// ─────────────────────────────────────────────────────────────────────────────

/** Everything that ends up as one encrypted file. */
export type ArtifactKind = BackupFormat | "full";

interface ArtifactNaming {
  readonly prefix: string;
  readonly extension: string;
}

const NAMING: { readonly [K in ArtifactKind]: ArtifactNaming } = {
  native: { prefix: "db-native", extension: "sqlite3" },
  sql: { prefix: "db-portable", extension: "sql" },
  json: { prefix: "db-export", extension: "json" },
  csv: { prefix: "db-csv", extension: "tar" },
  schema: { prefix: "db-schema", extension: "sql" },
  full: { prefix: "full", extension: "tar" },
};

export const SEALED_SUFFIX = ".gz.gpg";
export const ENCRYPTED_SUFFIX = ".gpg";

/** Name of the plaintext produced by extraction, before sealing. */
export const plaintextName = (kind: ArtifactKind, timestamp: string): string =>
  `${NAMING[kind].prefix}-${timestamp}.${NAMING[kind].extension}`;

/** Final artifact name, e.g. `db-native-20250101-020000.sqlite3.gz.gpg`. */
export const artifactName = (kind: ArtifactKind, timestamp: string): string =>
  `${plaintextName(kind, timestamp)}${SEALED_SUFFIX}`;

const KINDS: readonly ArtifactKind[] = ["native", "sql", "json", "csv", "schema", "full"];

/** Kind of an artifact from its file name (sealed, gz or plaintext). */
export const kindOfArtifact = (fileName: string): Option.Option<ArtifactKind> =>
  Arr.findFirst(KINDS, (kind) => {
    const { prefix, extension } = NAMING[kind];
    const match = new RegExp(`^${prefix}-\\d{8}-\\d{6}\\.${extension}(\\.gz)?(\\.gpg)?$`);
    return match.test(fileName);
  });

export const categoryOfKind = (kind: ArtifactKind): Category =>
  kind === "full" ? "full" : "database";

/** Subdirectory of the backup root holding a category's sets. */
export const CATEGORY_DIRS: { readonly [C in Category]: string } = {
  database: "db",
  full: "full",
};

export const MANIFEST_FILE = "manifest.json";

/** Drop one trailing suffix when present. */
export const stripSuffix = (name: string, suffix: string): string =>
  name.endsWith(suffix) ? name.slice(0, -suffix.length) : name;
