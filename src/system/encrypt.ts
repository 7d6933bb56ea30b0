// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * OpenPGP symmetric (passphrase) encryption, AES-256, binary packets.
 * Both backends produce files `gpg --decrypt` reads and read files
 * `gpg --symmetric` writes.
 *
 * - `openpgp`: in process, whole file in memory.
 * - `gpg`: the system binary, streaming, passphrase through a transient file.
 */

import * as openpgp from "openpgp";
import { Effect, Redacted, pipe } from "effect";
import { BackupError, ErrorCode, causeOf, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { exec } from "./exec";
import { cleanupPath, readBytes, writeBytes } from "./fs";
import { withTransientSecretFile } from "./secret-file";

export interface EncryptOptions {
  readonly lowPriority?: boolean;
}

const encryptError = (path: string, e: unknown): BackupError =>
  new BackupError({
    code: ErrorCode.ENCRYPT_FAILED,
    message: `Failed to encrypt ${path}: ${errorMessage(e)}`,
    path,
    ...causeOf(e),
  });

const decryptError = (path: string, e: unknown): BackupError =>
  new BackupError({
    code: ErrorCode.DECRYPT_FAILED,
    message: `Failed to decrypt ${path}: ${errorMessage(e)}`,
    path,
    ...causeOf(e),
  });

const OPENPGP_CONFIG: Partial<openpgp.Config> = {
  preferredSymmetricAlgorithm: openpgp.enums.symmetric.aes256,
  preferredCompressionAlgorithm: openpgp.enums.compression.uncompressed,
};

export const encryptBytes = (
  data: Uint8Array,
  secret: Redacted.Redacted<string>,
  label = "(buffer)"
): Effect.Effect<Uint8Array, BackupError> =>
  Effect.tryPromise({
    try: async (): Promise<Uint8Array> => {
      const message = await openpgp.createMessage({ binary: data });
      return openpgp.encrypt({
        message,
        passwords: [Redacted.value(secret)],
        format: "binary",
        config: OPENPGP_CONFIG,
      });
    },
    catch: (e): BackupError => encryptError(label, e),
  });

/** Fails on a wrong passphrase, a truncated message or an integrity mismatch. */
export const decryptBytes = (
  data: Uint8Array,
  secret: Redacted.Redacted<string>,
  label = "(buffer)"
): Effect.Effect<Uint8Array, BackupError> =>
  Effect.tryPromise({
    try: async (): Promise<Uint8Array> => {
      const message = await openpgp.readMessage({ binaryMessage: data });
      const result = await openpgp.decrypt({
        message,
        passwords: [Redacted.value(secret)],
        format: "binary",
      });
      return result.data;
    },
    catch: (e): BackupError => decryptError(label, e),
  });

export const openpgpEncryptFile = (
  source: AbsolutePath,
  dest: AbsolutePath,
  secret: Redacted.Redacted<string>
): Effect.Effect<void, BackupError> =>
  pipe(
    readBytes(source),
    Effect.mapError((e) => encryptError(source, e)),
    Effect.flatMap((data) => encryptBytes(data, secret, source)),
    Effect.flatMap((encrypted) =>
      Effect.mapError(writeBytes(dest, encrypted, { mode: 0o600 }), (e) => encryptError(dest, e))
    ),
    Effect.tapError(() => cleanupPath(dest))
  );

export const openpgpDecryptFile = (
  source: AbsolutePath,
  dest: AbsolutePath,
  secret: Redacted.Redacted<string>
): Effect.Effect<void, BackupError> =>
  pipe(
    readBytes(source),
    Effect.mapError((e) => decryptError(source, e)),
    Effect.flatMap((data) => decryptBytes(data, secret, source)),
    Effect.flatMap((plain) =>
      Effect.mapError(writeBytes(dest, plain, { mode: 0o600 }), (e) => decryptError(dest, e))
    ),
    Effect.tapError(() => cleanupPath(dest))
  );

const GPG_COMMON_ARGS: readonly string[] = [
  "--batch",
  "--yes",
  "--quiet",
  "--no-symkey-cache",
  "--pinentry-mode",
  "loopback",
];

/** argv for `gpg --symmetric`; exported for inspection in tests. */
export const gpgEncryptArgs = (
  source: AbsolutePath,
  dest: AbsolutePath,
  passphraseFile: AbsolutePath
): readonly string[] => [
  "gpg",
  ...GPG_COMMON_ARGS,
  "--cipher-algo",
  "AES256",
  "--compress-algo",
  "none",
  "--passphrase-file",
  passphraseFile,
  "--output",
  dest,
  "--symmetric",
  source,
];

export const gpgDecryptArgs = (
  source: AbsolutePath,
  dest: AbsolutePath,
  passphraseFile: AbsolutePath
): readonly string[] => [
  "gpg",
  ...GPG_COMMON_ARGS,
  "--passphrase-file",
  passphraseFile,
  "--output",
  dest,
  "--decrypt",
  source,
];

const runGpg = (
  argv: readonly string[],
  options: EncryptOptions,
  onError: (e: unknown) => BackupError
): Effect.Effect<void, BackupError> =>
  pipe(
    exec(argv, { lowPriority: options.lowPriority }),
    Effect.mapError(onError),
    Effect.filterOrFail(
      (r) => r.exitCode === 0,
      (r) => onError(new Error(`gpg exited with ${r.exitCode}: ${r.stderr.trim()}`))
    ),
    Effect.asVoid
  );

export const gpgEncryptFile = (
  source: AbsolutePath,
  dest: AbsolutePath,
  secret: Redacted.Redacted<string>,
  options: EncryptOptions = {}
): Effect.Effect<void, BackupError> =>
  pipe(
    withTransientSecretFile(secret, (passphraseFile) =>
      runGpg(gpgEncryptArgs(source, dest, passphraseFile), options, (e) =>
        encryptError(source, e)
      )
    ),
    Effect.mapError((e) => (e._tag === "BackupError" ? e : encryptError(source, e))),
    Effect.tapError(() => cleanupPath(dest))
  );

export const gpgDecryptFile = (
  source: AbsolutePath,
  dest: AbsolutePath,
  secret: Redacted.Redacted<string>,
  options: EncryptOptions = {}
): Effect.Effect<void, BackupError> =>
  pipe(
    withTransientSecretFile(secret, (passphraseFile) =>
      runGpg(gpgDecryptArgs(source, dest, passphraseFile), options, (e) =>
        decryptError(source, e)
      )
    ),
    Effect.mapError((e) => (e._tag === "BackupError" ? e : decryptError(source, e))),
    Effect.tapError(() => cleanupPath(dest))
  );
