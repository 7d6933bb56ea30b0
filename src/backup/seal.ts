// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Encrypt/compress primitive. `seal` turns a plaintext into its final
 * `.gz.gpg` artifact; `decryptToTemp` and `decompress` undo it one layer at
 * a time so the verifier can report which layer broke.
 *
 * No artifact appears under its final name unless both compression and
 * encryption succeeded. Each step removes its own output when it fails.
 */

import { basename } from "node:path";
import { Effect, type Redacted, pipe } from "effect";
import { BackupError, ErrorCode, type SystemError } from "../lib/errors";
import {
  type AbsolutePath,
  parentPath,
  pathJoin,
  pathWithSuffix,
  pathWithoutSuffix,
} from "../lib/types";
import { cleanupPath, fileSize, removePath, renamePath } from "../system/fs";
import { Compressor } from "../system/services/compress";
import { Encryptor } from "../system/services/encrypt";
import { ENCRYPTED_SUFFIX, stripSuffix } from "./types";

export interface SealOptions {
  readonly lowPriority?: boolean;
}

export interface SealedArtifact {
  readonly path: AbsolutePath;
  readonly plaintextBytes: number;
  readonly compressedBytes: number;
  readonly encryptedBytes: number;
}

const asBackupError = (e: SystemError): BackupError =>
  new BackupError({ code: ErrorCode.BACKUP_FAILED, message: e.message, path: e.path });

/** `path` -> `path.gz`, level 9. */
export const compress = (
  path: AbsolutePath
): Effect.Effect<AbsolutePath, BackupError, Compressor> =>
  Effect.gen(function* () {
    const compressor = yield* Compressor;
    const dest = pathWithSuffix(path, ".gz");
    yield* compressor.compressFile(path, dest);
    return dest;
  });

/** `path` -> `path.gpg`. */
export const encrypt = (
  path: AbsolutePath,
  secret: Redacted.Redacted<string>,
  options: SealOptions = {}
): Effect.Effect<AbsolutePath, BackupError, Encryptor> =>
  Effect.gen(function* () {
    const encryptor = yield* Encryptor;
    const dest = pathWithSuffix(path, ENCRYPTED_SUFFIX);
    yield* encryptor.encryptFile(path, dest, secret, { lowPriority: options.lowPriority });
    return dest;
  });

/**
 * Compress then encrypt `plaintext` (both beside it), drop the `.gz`, and
 * rename the result to `finalPath`. The plaintext itself is left for the
 * caller's staging directory to clean up.
 */
export const seal = (
  plaintext: AbsolutePath,
  finalPath: AbsolutePath,
  secret: Redacted.Redacted<string>,
  options: SealOptions = {}
): Effect.Effect<SealedArtifact, BackupError, Compressor | Encryptor> => {
  const gzPath = pathWithSuffix(plaintext, ".gz");
  const encryptedPath = pathWithSuffix(gzPath, ENCRYPTED_SUFFIX);

  return pipe(
    Effect.gen(function* () {
      const plaintextBytes = yield* Effect.mapError(fileSize(plaintext), asBackupError);
      yield* compress(plaintext);
      const compressedBytes = yield* Effect.mapError(fileSize(gzPath), asBackupError);
      yield* encrypt(gzPath, secret, options);
      yield* Effect.mapError(removePath(gzPath), asBackupError);
      const encryptedBytes = yield* Effect.mapError(fileSize(encryptedPath), asBackupError);
      yield* Effect.mapError(renamePath(encryptedPath, finalPath), asBackupError);
      return { path: finalPath, plaintextBytes, compressedBytes, encryptedBytes };
    }),
    Effect.onError(() =>
      Effect.all([cleanupPath(gzPath), cleanupPath(encryptedPath)], { discard: true })
    )
  );
};

/**
 * Decrypt `artifact` into `workDir`, named as the artifact minus `.gpg`.
 * A wrong passphrase or a damaged file fails here.
 */
export const decryptToTemp = (
  artifact: AbsolutePath,
  workDir: AbsolutePath,
  secret: Redacted.Redacted<string>
): Effect.Effect<AbsolutePath, BackupError, Encryptor> =>
  Effect.gen(function* () {
    const encryptor = yield* Encryptor;
    const name = stripSuffix(basename(artifact), ENCRYPTED_SUFFIX);
    const dest = pathJoin(workDir, name === basename(artifact) ? `${name}.decrypted` : name);
    yield* encryptor.decryptFile(artifact, dest, secret);
    return dest;
  });

/** `x.gz` -> `x` in the same directory; the `.gz` is removed afterwards. */
export const decompress = (
  gzPath: AbsolutePath
): Effect.Effect<AbsolutePath, BackupError, Compressor> =>
  Effect.gen(function* () {
    const compressor = yield* Compressor;
    const dest = gzPath.endsWith(".gz")
      ? pathWithoutSuffix(gzPath, ".gz")
      : pathJoin(parentPath(gzPath), `${basename(gzPath)}.plain`);
    yield* compressor.decompressFile(gzPath, dest);
    yield* Effect.mapError(removePath(gzPath), asBackupError);
    return dest;
  });

/** Both inverse layers: the artifact's plaintext inside `workDir`. */
export const unseal = (
  artifact: AbsolutePath,
  workDir: AbsolutePath,
  secret: Redacted.Redacted<string>
): Effect.Effect<AbsolutePath, BackupError, Compressor | Encryptor> =>
  Effect.flatMap(decryptToTemp(artifact, workDir, secret), decompress);
