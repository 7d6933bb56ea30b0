// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Sharing these keeps naming and
 * descriptions consistent across commands.
 *
 * `backup --format` selects artifact formats, so the output format option
 * is not part of the global set; every other command spreads `formatOption`.
 */

import { Args as A, Options as O } from "@effect/cli";
import type { Args } from "@effect/cli/Args";
import type { Options } from "@effect/cli/Options";
import { Match, Option, pipe } from "effect";
import {
  CATEGORY_VALUES,
  type Category,
  FORMAT_SELECTION_VALUES,
  type FormatSelection,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  RESTORE_SCOPE_VALUES,
  type RestoreScope,
} from "../config/field-values";

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly json: Options<boolean>;
  readonly config: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  config: O.text("config").pipe(
    O.withAlias("c"),
    O.withDescription("Path to the TOML configuration file"),
    O.optional
  ),
};

export const formatOption: { readonly format: Options<Option.Option<LogFormat>> } = {
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
};

// backup

export const artifactFormat: Options<FormatSelection> = O.choice(
  "format",
  FORMAT_SELECTION_VALUES
).pipe(O.withDefault("all" as const), O.withDescription("Artifact format to produce"));

export const validate: Options<boolean> = O.boolean("validate").pipe(
  O.withDescription("Fail the run when any artifact fails verification")
);

export const dryRun: Options<boolean> = O.boolean("dry-run").pipe(
  O.withDescription("Show what would be done without doing it")
);

export const verifyArtifact: Options<Option.Option<string>> = O.text("verify").pipe(
  O.withDescription("Verify one existing artifact and exit"),
  O.optional
);

// full-backup

export const includeLogs: Options<boolean> = O.boolean("include-logs").pipe(
  O.withDescription("Add the log directory to the archive")
);

export const setName: Options<Option.Option<string>> = O.text("name").pipe(
  O.withDescription("Label appended to the set directory ([a-z0-9-])"),
  O.optional
);

export const reportOnly: Options<boolean> = O.boolean("report-only").pipe(
  O.withDescription("Print what would be assembled and write nothing")
);

// restore

export const databaseOnly: Options<Option.Option<string>> = O.text("database-only").pipe(
  O.withDescription("Restore only the database from this artifact"),
  O.optional
);

export const configOnly: Options<Option.Option<string>> = O.text("config-only").pipe(
  O.withDescription("Restore only the configuration tree from this full artifact"),
  O.optional
);

export const latest: Options<boolean> = O.boolean("latest").pipe(
  O.withDescription("Use the newest artifact of the matching category")
);

export const restoreScope: Options<Option.Option<RestoreScope>> = O.choice(
  "scope",
  RESTORE_SCOPE_VALUES
).pipe(O.withDescription("Scope for --latest (default full)"), O.optional);

export const artifactPathArg: Args<Option.Option<string>> = A.text({ name: "artifact" }).pipe(
  A.withDescription("Encrypted artifact to restore (full scope)"),
  A.optional
);

// list

export const categoryFilter: Options<Option.Option<Category>> = O.choice(
  "category",
  CATEGORY_VALUES
).pipe(O.withDescription("Only list sets of this category"), O.optional);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly json: boolean;
  readonly config: Option.Option<string>;
  readonly format?: Option.Option<LogFormat>;
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format ?? Option.none()),
    Match.exhaustive
  );
