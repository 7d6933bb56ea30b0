// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Retention: keep the newest `keepCount` sets of a category. Set names start
 * with a sortable timestamp, so name order is age order. Anything else in
 * the category directory is left alone.
 */

import { Array as Arr, Effect, Order, pipe } from "effect";
import type { Category } from "../config/field-values";
import type { SystemError } from "../lib/errors";
import { logSuccess } from "../lib/log";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { listDirectory, removePath } from "../system/fs";
import { CATEGORY_DIRS, isSetName } from "./types";

export const categoryDir = (backupRoot: AbsolutePath, category: Category): AbsolutePath =>
  pathJoin(backupRoot, CATEGORY_DIRS[category]);

/** Set directory names of a category, oldest first. */
export const listSetNames = (
  backupRoot: AbsolutePath,
  category: Category
): Effect.Effect<readonly string[], SystemError> =>
  pipe(
    listDirectory(categoryDir(backupRoot, category)),
    Effect.map((entries) =>
      pipe(
        entries,
        Arr.filter((e) => e.isDirectory && isSetName(e.name)),
        Arr.map((e) => e.name),
        Arr.sort(Order.string)
      )
    )
  );

/** Names beyond the newest `keepCount`, oldest first. */
export const selectExpired = (names: readonly string[], keepCount: number): readonly string[] =>
  pipe(names, Arr.sort(Order.string), Arr.dropRight(Math.max(0, keepCount)));

/**
 * Remove the oldest sets beyond `keepCount`; returns the removed names.
 * Running it again removes nothing.
 */
export const prune = (
  backupRoot: AbsolutePath,
  category: Category,
  keepCount: number
): Effect.Effect<readonly string[], SystemError> =>
  Effect.gen(function* () {
    const expired = selectExpired(yield* listSetNames(backupRoot, category), keepCount);
    const dir = categoryDir(backupRoot, category);

    yield* Effect.forEach(expired, (name) => removePath(pathJoin(dir, name)), { discard: true });

    if (expired.length > 0) {
      yield* logSuccess(
        `Retention: removed ${expired.length} ${category} set(s), keeping ${keepCount}`
      );
    } else {
      yield* Effect.logDebug(`Retention: nothing to remove for ${category} (keep ${keepCount})`);
    }
    return expired;
  });
