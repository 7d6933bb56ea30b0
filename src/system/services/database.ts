// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * DatabaseChecker service: structural checks the verifier and restore run
 * against decrypted artifacts.
 */

import { Context, Layer } from "effect";
import { integrityCheck, journalMode, replaySql, tableStats } from "../sqlite";

export interface DatabaseCheckerService {
  readonly integrityCheck: typeof integrityCheck;
  readonly journalMode: typeof journalMode;
  readonly replaySql: typeof replaySql;
  readonly tableStats: typeof tableStats;
}

export interface DatabaseChecker {
  readonly _tag: "DatabaseChecker";
}

export const DatabaseChecker: Context.Tag<DatabaseChecker, DatabaseCheckerService> =
  Context.GenericTag<DatabaseChecker, DatabaseCheckerService>("vaultkeep/DatabaseChecker");

export const DatabaseCheckerLive: Layer.Layer<DatabaseChecker> = Layer.succeed(DatabaseChecker, {
  integrityCheck,
  journalMode,
  replaySql,
  tableStats,
});
