// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Read side of the backup root: which sets exist, what they hold, how they
 * verified, and which artifact `--latest` or the full backup should use.
 */

import { Array as Arr, Effect, Either, Option, pipe } from "effect";
import type { Category, RestoreScope } from "../config/field-values";
import type { SystemError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { listDirectory } from "../system/fs";
import { type SetManifest, type SetStatus, deriveStatus, readManifest } from "./manifest";
import { categoryDir, listSetNames } from "./retention";
import {
  type ArtifactKind,
  ENCRYPTED_SUFFIX,
  type SetId,
  kindOfArtifact,
  parseSetId,
  setTimestamp,
  timestampToDate,
} from "./types";

export interface SetSummary {
  readonly id: SetId;
  readonly category: Category;
  readonly dir: AbsolutePath;
  readonly createdAt: Option.Option<Date>;
  readonly status: SetStatus;
  /** Encrypted files actually present, in name order. */
  readonly artifacts: readonly string[];
  readonly manifest: Option.Option<SetManifest>;
  /** Why the manifest could not be used, when it could not. */
  readonly note: Option.Option<string>;
}

const summarize = (
  category: Category,
  dir: AbsolutePath,
  id: SetId
): Effect.Effect<SetSummary, SystemError> =>
  Effect.gen(function* () {
    const files = yield* listDirectory(dir);
    const artifacts = pipe(
      files,
      Arr.filter((f) => f.isFile && f.name.endsWith(ENCRYPTED_SUFFIX)),
      Arr.map((f) => f.name)
    );
    const manifest = yield* Effect.either(readManifest(dir));
    const createdAt = pipe(setTimestamp(id), Option.flatMap(timestampToDate));

    return Either.match(manifest, {
      onLeft: (e): SetSummary => ({
        id,
        category,
        dir,
        createdAt,
        status: "unverified",
        artifacts,
        manifest: Option.none(),
        note: Option.some(e.message),
      }),
      onRight: (m): SetSummary => ({
        id,
        category,
        dir,
        createdAt,
        status: Option.match(m, { onNone: (): SetStatus => "unverified", onSome: deriveStatus }),
        artifacts,
        manifest: m,
        note: Option.isNone(m) ? Option.some("no manifest") : Option.none(),
      }),
    });
  });

/** Every set of a category, newest first. */
export const listSets = (
  backupRoot: AbsolutePath,
  category: Category
): Effect.Effect<readonly SetSummary[], SystemError> =>
  Effect.gen(function* () {
    const names = yield* listSetNames(backupRoot, category);
    const dir = categoryDir(backupRoot, category);
    const ids = Arr.filterMap(Arr.reverse(names), parseSetId);
    return yield* Effect.forEach(ids, (id) => summarize(category, pathJoin(dir, id), id));
  });

export const findArtifact = (set: SetSummary, kind: ArtifactKind): Option.Option<AbsolutePath> =>
  pipe(
    Arr.findFirst(set.artifacts, (name) =>
      Option.exists(kindOfArtifact(name), (k) => k === kind)
    ),
    Option.map((name) => pathJoin(set.dir, name))
  );

/**
 * Newest database set no older than `maxAgeHours` that still holds its
 * native artifact.
 */
export const freshDatabaseSet = (
  backupRoot: AbsolutePath,
  maxAgeHours: number,
  now: Date
): Effect.Effect<Option.Option<SetSummary>, SystemError> =>
  Effect.map(listSets(backupRoot, "database"), (sets) =>
    Arr.findFirst(
      sets,
      (set) =>
        Option.isSome(findArtifact(set, "native")) &&
        Option.exists(
          set.createdAt,
          (created) => now.getTime() - created.getTime() <= maxAgeHours * 3_600_000
        )
    )
  );

/** Preference order of artifacts `--latest` restores, per scope. */
const LATEST_KINDS: { readonly [S in RestoreScope]: readonly ArtifactKind[] } = {
  database: ["native", "sql"],
  config: ["full"],
  full: ["full"],
};

const SCOPE_CATEGORY: { readonly [S in RestoreScope]: Category } = {
  database: "database",
  config: "full",
  full: "full",
};

/** Newest artifact a restore of `scope` can use. */
export const latestArtifact = (
  backupRoot: AbsolutePath,
  scope: RestoreScope
): Effect.Effect<Option.Option<AbsolutePath>, SystemError> =>
  Effect.map(listSets(backupRoot, SCOPE_CATEGORY[scope]), (sets) =>
    Arr.findFirst(sets, (set) =>
      Arr.findFirst(LATEST_KINDS[scope], (kind) => findArtifact(set, kind))
    )
  );
