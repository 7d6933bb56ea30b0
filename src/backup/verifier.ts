// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Integrity verifier. Peels an artifact layer by layer (exists, decrypt,
 * decompress, structure, cross-check) inside a private temporary directory
 * and reports each layer. The first failing hard layer stops the run; the
 * layers after it are `skipped`.
 *
 * Verification failures are data, not errors: the only failure channel is
 * the temporary directory itself not being creatable.
 */

import { basename } from "node:path";
import { Effect, Either, Match, Option, type Redacted, pipe } from "effect";
import { z } from "zod";
import { type BackupError, type SystemError, errorMessage } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { normalizeEntries } from "../system/archive";
import { fileSizeOrZero, readText, scopedTempDirectory } from "../system/fs";
import { Archiver } from "../system/services/archive";
import type { Compressor } from "../system/services/compress";
import { DatabaseChecker } from "../system/services/database";
import type { Encryptor } from "../system/services/encrypt";
import type { TableStats } from "../system/sqlite";
import { CSV_MANIFEST_FILE } from "./formats";
import {
  type LayerResult,
  type VerificationResult,
  failed,
  passed,
  skipped,
} from "./manifest";
import { decompress, decryptToTemp } from "./seal";
import { type ArtifactKind, kindOfArtifact } from "./types";

export type VerifyServices = Compressor | Encryptor | DatabaseChecker | Archiver;

const stopAt = (
  completed: Partial<VerificationResult>,
  failure: Partial<VerificationResult>
): VerificationResult => ({
  exists: skipped(),
  decrypt: skipped(),
  decompress: skipped(),
  structure: skipped(),
  crossCheck: skipped(),
  ...completed,
  ...failure,
});

interface StructureOutcome {
  readonly result: LayerResult;
  /** A database equivalent to the artifact, for the cross-check. */
  readonly database: Option.Option<AbsolutePath>;
}

const structureFailure = (e: BackupError | SystemError): StructureOutcome => ({
  result: failed(e.message),
  database: Option.none(),
});

const integrityOutcome = (
  path: AbsolutePath,
  verdict: string,
  what: string
): StructureOutcome =>
  verdict === "ok"
    ? { result: passed(`${what}: integrity_check ok`), database: Option.some(path) }
    : { result: failed(`${what}: integrity_check reported ${verdict}`), database: Option.none() };

const jsonExportSchema = z.object({
  database_export: z.object({
    metadata: z.record(z.string(), z.unknown()),
    schema: z.array(z.unknown()),
    data: z.record(z.string(), z.array(z.unknown())),
  }),
});

const checkNative = (
  plain: AbsolutePath
): Effect.Effect<StructureOutcome, never, DatabaseChecker> =>
  Effect.gen(function* () {
    const checker = yield* DatabaseChecker;
    return yield* pipe(
      checker.integrityCheck(plain),
      Effect.map((verdict) => integrityOutcome(plain, verdict, "database")),
      Effect.catchAll((e) => Effect.succeed(structureFailure(e)))
    );
  });

const checkReplay = (
  plain: AbsolutePath,
  workDir: AbsolutePath
): Effect.Effect<StructureOutcome, never, DatabaseChecker> =>
  Effect.gen(function* () {
    const checker = yield* DatabaseChecker;
    const replayDb = pathJoin(workDir, "replay.sqlite3");
    return yield* pipe(
      readText(plain),
      Effect.flatMap((sql) => checker.replaySql(sql, replayDb)),
      Effect.flatMap(() => checker.integrityCheck(replayDb)),
      Effect.map((verdict) => integrityOutcome(replayDb, verdict, "replayed dump")),
      Effect.catchAll((e) => Effect.succeed(structureFailure(e)))
    );
  });

const checkJson = (plain: AbsolutePath): Effect.Effect<StructureOutcome> =>
  pipe(
    readText(plain),
    Effect.flatMap((text) =>
      Effect.try({
        try: (): unknown => JSON.parse(text),
        catch: (e): string => `invalid JSON: ${errorMessage(e)}`,
      })
    ),
    Effect.map((raw): StructureOutcome => {
      const parsed = jsonExportSchema.safeParse(raw);
      return parsed.success
        ? {
            result: passed(
              `database_export with ${Object.keys(parsed.data.database_export.data).length} tables`
            ),
            database: Option.none(),
          }
        : { result: failed("missing database_export envelope"), database: Option.none() };
    }),
    Effect.catchAll((e) =>
      Effect.succeed(
        typeof e === "string"
          ? { result: failed(e), database: Option.none() }
          : structureFailure(e)
      )
    )
  );

const checkArchive = (
  plain: AbsolutePath,
  requirement: (entries: readonly string[]) => Option.Option<string>
): Effect.Effect<StructureOutcome, never, Archiver> =>
  Effect.gen(function* () {
    const archiver = yield* Archiver;
    return yield* pipe(
      archiver.listArchive(plain),
      Effect.map(normalizeEntries),
      Effect.map(
        (entries): StructureOutcome =>
          Option.match(requirement(entries), {
            onNone: (): StructureOutcome => ({
              result: passed(`${entries.length} archive entries`),
              database: Option.none(),
            }),
            onSome: (problem): StructureOutcome => ({
              result: failed(problem),
              database: Option.none(),
            }),
          })
      ),
      Effect.catchAll((e) => Effect.succeed(structureFailure(e)))
    );
  });

const checkStructure = (
  kind: ArtifactKind,
  plain: AbsolutePath,
  workDir: AbsolutePath
): Effect.Effect<StructureOutcome, never, DatabaseChecker | Archiver> =>
  pipe(
    Match.value(kind),
    Match.when("native", () => checkNative(plain)),
    Match.when("sql", () => checkReplay(plain, workDir)),
    Match.when("schema", () => checkReplay(plain, workDir)),
    Match.when("json", () => checkJson(plain)),
    Match.when("csv", () =>
      checkArchive(plain, (entries) =>
        entries.includes(CSV_MANIFEST_FILE)
          ? Option.none()
          : Option.some(`CSV bundle has no ${CSV_MANIFEST_FILE}`)
      )
    ),
    Match.when("full", () =>
      checkArchive(plain, (entries) =>
        entries.length > 0 ? Option.none() : Option.some("archive is empty")
      )
    ),
    Match.exhaustive
  );

const describeStats = (stats: TableStats): string =>
  Option.match(stats.firstTable, {
    onNone: (): string => `${stats.tableCount} tables`,
    onSome: ({ name, rows }): string => `${stats.tableCount} tables, ${name} has ${rows} rows`,
  });

const sameStats = (a: TableStats, b: TableStats): boolean =>
  a.tableCount === b.tableCount &&
  Option.getEquivalence(
    (x: { name: string; rows: number }, y: { name: string; rows: number }) =>
      x.name === y.name && x.rows === y.rows
  )(a.firstTable, b.firstTable);

/** Table count and first-table row count against the live database. Never a hard failure. */
const crossCheck = (
  database: Option.Option<AbsolutePath>,
  liveSource: Option.Option<AbsolutePath>
): Effect.Effect<LayerResult, never, DatabaseChecker> =>
  Effect.gen(function* () {
    if (Option.isNone(database) || Option.isNone(liveSource)) {
      return skipped("no live source to compare");
    }
    const checker = yield* DatabaseChecker;
    const outcome = yield* Effect.either(
      Effect.all([checker.tableStats(database.value), checker.tableStats(liveSource.value)])
    );
    if (Either.isLeft(outcome)) {
      yield* Effect.logWarning(`Cross-check skipped: ${outcome.left.message}`);
      return skipped(outcome.left.message);
    }
    const [backup, live] = outcome.right;
    if (sameStats(backup, live)) {
      return passed(describeStats(backup));
    }
    const detail = `backup has ${describeStats(backup)}; live has ${describeStats(live)}`;
    yield* Effect.logWarning(`Cross-check mismatch: ${detail}`);
    return failed(detail);
  });

/**
 * Verify one artifact. `liveSource`, when given, is the database the
 * artifact was taken from.
 */
export const verifyArtifact = (
  artifact: AbsolutePath,
  secret: Redacted.Redacted<string>,
  liveSource: Option.Option<AbsolutePath> = Option.none()
): Effect.Effect<VerificationResult, SystemError, VerifyServices> =>
  Effect.scoped(
    Effect.gen(function* () {
      const name = basename(artifact);
      const size = yield* fileSizeOrZero(artifact);
      if (size === 0) {
        return stopAt({}, { exists: failed(`${name} is missing or empty`) });
      }
      const exists = passed(`${size} bytes`);

      const workDir = yield* scopedTempDirectory("vaultkeep-verify");

      const decrypted = yield* Effect.either(decryptToTemp(artifact, workDir, secret));
      if (Either.isLeft(decrypted)) {
        return stopAt({ exists }, { decrypt: failed(decrypted.left.message) });
      }
      const decrypt = passed("decrypted");

      const plain = yield* Effect.either(decompress(decrypted.right));
      if (Either.isLeft(plain)) {
        return stopAt({ exists, decrypt }, { decompress: failed(plain.left.message) });
      }
      const decompressLayer = passed("decompressed");

      const structure = yield* Option.match(kindOfArtifact(name), {
        onNone: (): Effect.Effect<StructureOutcome, never, DatabaseChecker | Archiver> =>
          Effect.succeed({
            result: failed(`${name} is not a recognised artifact name`),
            database: Option.none(),
          }),
        onSome: (kind): Effect.Effect<StructureOutcome, never, DatabaseChecker | Archiver> =>
          checkStructure(kind, plain.right, workDir),
      });
      if (structure.result.status !== "passed") {
        return stopAt({ exists, decrypt, decompress: decompressLayer }, { structure: structure.result });
      }

      return {
        exists,
        decrypt,
        decompress: decompressLayer,
        structure: structure.result,
        crossCheck: yield* crossCheck(structure.database, liveSource),
      };
    })
  );
