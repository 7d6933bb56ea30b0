// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Context, Layer } from "effect";
import { createArchive, extractArchive, listArchive } from "../archive";

export interface ArchiverService {
  readonly createArchive: typeof createArchive;
  readonly listArchive: typeof listArchive;
  readonly extractArchive: typeof extractArchive;
}

export interface Archiver {
  readonly _tag: "Archiver";
}

export const Archiver: Context.Tag<Archiver, ArchiverService> = Context.GenericTag<
  Archiver,
  ArchiverService
>("vaultkeep/Archiver");

export const ArchiverLive: Layer.Layer<Archiver> = Layer.succeed(Archiver, {
  createArchive,
  listArchive,
  extractArchive,
});
