// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `manifest.json`: the record every set directory carries. It is the only
 * place a set's verification outcome lives; `list` derives status from it.
 */

import { Array as Arr, Effect, Option, ParseResult, Schema, pipe } from "effect";
import { CATEGORY_VALUES } from "../config/field-values";
import { BackupError, ErrorCode, causeOf, errorMessage } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { MANIFEST_SCHEMA_VERSION } from "../lib/version";
import { atomicWrite, fileExists, readText } from "../system/fs";
import { MANIFEST_FILE } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Verification
// ─────────────────────────────────────────────────────────────────────────────

export const LayerStatusSchema = Schema.Literal("passed", "failed", "skipped");
export type LayerStatus = typeof LayerStatusSchema.Type;

export const LayerResultSchema = Schema.Struct({
  status: LayerStatusSchema,
  detail: Schema.String,
});
export type LayerResult = typeof LayerResultSchema.Type;

export const VerificationResultSchema = Schema.Struct({
  exists: LayerResultSchema,
  decrypt: LayerResultSchema,
  decompress: LayerResultSchema,
  structure: LayerResultSchema,
  crossCheck: LayerResultSchema,
});
export type VerificationResult = typeof VerificationResultSchema.Type;

export const passed = (detail: string): LayerResult => ({ status: "passed", detail });
export const failed = (detail: string): LayerResult => ({ status: "failed", detail });
export const skipped = (detail = ""): LayerResult => ({ status: "skipped", detail });

const HARD_LAYERS = ["exists", "decrypt", "decompress", "structure"] as const;

/** Every hard layer passed. A cross-check mismatch does not count against it. */
export const verificationPassed = (result: VerificationResult): boolean =>
  HARD_LAYERS.every((layer) => result[layer].status === "passed");

/** First hard layer that failed, for error messages. */
export const firstFailedLayer = (
  result: VerificationResult
): Option.Option<{ readonly layer: string; readonly detail: string }> =>
  pipe(
    Arr.findFirst(HARD_LAYERS, (layer) => result[layer].status === "failed"),
    Option.map((layer) => ({ layer, detail: result[layer].detail }))
  );

// ─────────────────────────────────────────────────────────────────────────────
// Manifest
// ─────────────────────────────────────────────────────────────────────────────

export const ArtifactRecordSchema = Schema.Struct({
  kind: Schema.Literal("native", "sql", "json", "csv", "schema", "full"),
  file: Schema.String,
  plaintextBytes: Schema.Number,
  compressedBytes: Schema.Number,
  encryptedBytes: Schema.Number,
  verification: Schema.optional(VerificationResultSchema),
});
export type ArtifactRecord = typeof ArtifactRecordSchema.Type;

export const FailedComponentSchema = Schema.Struct({
  component: Schema.String,
  error: Schema.String,
});
export type FailedComponent = typeof FailedComponentSchema.Type;

export const SourceFactsSchema = Schema.Struct({
  path: Schema.String,
  bytes: Schema.Number,
  journalMode: Schema.String,
});
export type SourceFacts = typeof SourceFactsSchema.Type;

/** What a full set bundles besides its database set. */
export const FullContentsSchema = Schema.Struct({
  volumes: Schema.Array(Schema.String),
  configPaths: Schema.Array(Schema.String),
  /** Id of the database set under `db/`; absent when none could be included. */
  databaseSet: Schema.optional(Schema.String),
  databaseSetReused: Schema.Boolean,
  dataSnapshot: Schema.Boolean,
  logs: Schema.Boolean,
});
export type FullContents = typeof FullContentsSchema.Type;

export const SetManifestSchema = Schema.Struct({
  schemaVersion: Schema.Literal(MANIFEST_SCHEMA_VERSION),
  producer: Schema.String,
  id: Schema.String,
  category: Schema.Literal(...CATEGORY_VALUES),
  createdAt: Schema.String,
  source: Schema.optional(SourceFactsSchema),
  artifacts: Schema.Array(ArtifactRecordSchema),
  failed: Schema.Array(FailedComponentSchema),
  contents: Schema.optional(FullContentsSchema),
});
export type SetManifest = typeof SetManifestSchema.Type;

export type SetStatus = "verified" | "unverified" | "degraded";

/**
 * - `degraded`: a component failed or a verification failed
 * - `verified`: at least one artifact, every artifact verified
 * - `unverified`: anything else (verification skipped, no manifest)
 */
export const deriveStatus = (manifest: SetManifest): SetStatus => {
  const verifications = Arr.filterMap(manifest.artifacts, (a) =>
    Option.fromNullable(a.verification)
  );
  if (manifest.failed.length > 0 || verifications.some((v) => !verificationPassed(v))) {
    return "degraded";
  }
  return manifest.artifacts.length > 0 && verifications.length === manifest.artifacts.length
    ? "verified"
    : "unverified";
};

// ─────────────────────────────────────────────────────────────────────────────
// I/O
// ─────────────────────────────────────────────────────────────────────────────

export const manifestPath = (setDir: AbsolutePath): AbsolutePath => pathJoin(setDir, MANIFEST_FILE);

export const writeManifest = (
  setDir: AbsolutePath,
  manifest: SetManifest
): Effect.Effect<void, BackupError> =>
  pipe(
    Schema.encode(SetManifestSchema)(manifest),
    Effect.mapError(
      (e): BackupError =>
        new BackupError({
          code: ErrorCode.BACKUP_FAILED,
          message: `Invalid manifest: ${ParseResult.TreeFormatter.formatErrorSync(e)}`,
        })
    ),
    Effect.flatMap((encoded) =>
      Effect.mapError(
        atomicWrite(manifestPath(setDir), `${JSON.stringify(encoded, null, 2)}\n`, { mode: 0o600 }),
        (e): BackupError =>
          new BackupError({
            code: ErrorCode.BACKUP_FAILED,
            message: e.message,
            path: setDir,
            ...causeOf(e),
          })
      )
    )
  );

/** None when the set has no manifest; a malformed one is an error. */
export const readManifest = (
  setDir: AbsolutePath
): Effect.Effect<Option.Option<SetManifest>, BackupError> =>
  Effect.gen(function* () {
    const file = manifestPath(setDir);
    if (!(yield* fileExists(file))) {
      return Option.none();
    }
    const text = yield* Effect.mapError(
      readText(file),
      (e): BackupError =>
        new BackupError({ code: ErrorCode.BACKUP_NOT_FOUND, message: e.message, path: file })
    );
    const raw = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (e): BackupError =>
        new BackupError({
          code: ErrorCode.VERIFY_FAILED,
          message: `Manifest ${file} is not valid JSON: ${errorMessage(e)}`,
          path: file,
          ...causeOf(e),
        }),
    });
    return yield* pipe(
      Schema.decodeUnknown(SetManifestSchema)(raw),
      Effect.map(Option.some),
      Effect.mapError(
        (e): BackupError =>
          new BackupError({
            code: ErrorCode.VERIFY_FAILED,
            message: `Manifest ${file} is invalid: ${ParseResult.TreeFormatter.formatErrorSync(e)}`,
            path: file,
          })
      )
    );
  });
