// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Encryptor service. The backend is chosen once from `encryption.backend`;
 * callers never see which one runs.
 */

import { Context, type Effect, Layer, Match, type Redacted, pipe } from "effect";
import type { EncryptionBackend } from "../../config/field-values";
import type { BackupError } from "../../lib/errors";
import type { AbsolutePath } from "../../lib/types";
import {
  type EncryptOptions,
  gpgDecryptFile,
  gpgEncryptFile,
  openpgpDecryptFile,
  openpgpEncryptFile,
} from "../encrypt";

export interface EncryptorService {
  readonly backend: EncryptionBackend;
  readonly encryptFile: (
    source: AbsolutePath,
    dest: AbsolutePath,
    secret: Redacted.Redacted<string>,
    options?: EncryptOptions
  ) => Effect.Effect<void, BackupError>;
  readonly decryptFile: (
    source: AbsolutePath,
    dest: AbsolutePath,
    secret: Redacted.Redacted<string>,
    options?: EncryptOptions
  ) => Effect.Effect<void, BackupError>;
}

export interface Encryptor {
  readonly _tag: "Encryptor";
}

export const Encryptor: Context.Tag<Encryptor, EncryptorService> = Context.GenericTag<
  Encryptor,
  EncryptorService
>("vaultkeep/Encryptor");

export const makeEncryptor = (backend: EncryptionBackend): EncryptorService =>
  pipe(
    Match.value(backend),
    Match.when(
      "openpgp",
      (): EncryptorService => ({
        backend,
        encryptFile: (source, dest, secret): Effect.Effect<void, BackupError> =>
          openpgpEncryptFile(source, dest, secret),
        decryptFile: (source, dest, secret): Effect.Effect<void, BackupError> =>
          openpgpDecryptFile(source, dest, secret),
      })
    ),
    Match.when(
      "gpg",
      (): EncryptorService => ({
        backend,
        encryptFile: gpgEncryptFile,
        decryptFile: gpgDecryptFile,
      })
    ),
    Match.exhaustive
  );

export const EncryptorLive = (backend: EncryptionBackend): Layer.Layer<Encryptor> =>
  Layer.succeed(Encryptor, makeEncryptor(backend));
