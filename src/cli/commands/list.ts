// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `list`: every set on disk with the status its manifest gives it.
 */

import { Array as Arr, Effect, Option } from "effect";
import { type SetSummary, listSets } from "../../backup/catalog";
import { directoryExists } from "../../system/fs";
import { categoryDir } from "../../backup/retention";
import type { AppConfig } from "../../config/app-config";
import { CATEGORY_VALUES, type Category, type LogFormat } from "../../config/field-values";
import type { SystemError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { chooseOutput, statusMark } from "./utils";

export interface ListOptions {
  readonly config: AppConfig;
  readonly format: LogFormat;
  readonly category: Option.Option<Category>;
}

const setsOf = (
  config: AppConfig,
  category: Category
): Effect.Effect<readonly SetSummary[], SystemError> =>
  Effect.flatMap(directoryExists(categoryDir(config.paths.backupRoot, category)), (exists) =>
    exists ? listSets(config.paths.backupRoot, category) : Effect.succeed([])
  );

const renderSet = (set: SetSummary): string => {
  const note = Option.match(set.note, { onNone: () => "", onSome: (n) => `  (${n})` });
  return `  ${statusMark(set.status)} ${set.id.padEnd(32)}${set.status.padEnd(12)}${set.artifacts.length} artifact(s)${note}`;
};

const toJson = (set: SetSummary): Record<string, unknown> => ({
  id: set.id,
  category: set.category,
  dir: set.dir,
  createdAt: Option.match(set.createdAt, { onNone: () => null, onSome: (d) => d.toISOString() }),
  status: set.status,
  artifacts: set.artifacts,
  note: Option.getOrNull(set.note),
});

export const executeList = (options: ListOptions): Effect.Effect<void, SystemError> =>
  Effect.gen(function* () {
    const categories = Option.match(options.category, {
      onNone: (): readonly Category[] => CATEGORY_VALUES,
      onSome: (c): readonly Category[] => [c],
    });
    const groups = yield* Effect.forEach(categories, (category) =>
      Effect.map(setsOf(options.config, category), (sets) => ({ category, sets }))
    );

    yield* writeOutput(
      chooseOutput(
        options.format,
        () => Arr.flatMap(groups, (g) => g.sets.map(toJson)),
        () =>
          groups
            .map(({ category, sets }) =>
              [
                `${category} (${sets.length})`,
                ...(sets.length === 0 ? ["  none"] : sets.map(renderSet)),
              ].join("\n")
            )
            .join("\n")
      )
    );
  });
