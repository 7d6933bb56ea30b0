// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Compressor service: gzip a file into another and back.
 */

import { Context, Layer } from "effect";
import { compressFile, decompressFile } from "../compress";

export interface CompressorService {
  readonly compressFile: typeof compressFile;
  readonly decompressFile: typeof decompressFile;
}

export interface Compressor {
  readonly _tag: "Compressor";
}

export const Compressor: Context.Tag<Compressor, CompressorService> = Context.GenericTag<
  Compressor,
  CompressorService
>("vaultkeep/Compressor");

export const CompressorLive: Layer.Layer<Compressor> = Layer.succeed(Compressor, {
  compressFile,
  decompressFile,
});
