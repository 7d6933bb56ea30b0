// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { existsSync, readFileSync, statSync } from "node:fs";
import { Effect, Either, Redacted } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { type AbsolutePath, path, pathJoin } from "../../src/lib/types";
import {
  decryptBytes,
  encryptBytes,
  gpgDecryptArgs,
  gpgEncryptArgs,
  openpgpDecryptFile,
  openpgpEncryptFile,
} from "../../src/system/encrypt";
import { SECRET_FILE_MODE, withTransientSecretFile } from "../../src/system/secret-file";
import { TEST_SECRET, cleanup, tempDir, writeFile } from "../helpers/fixtures";
import { runTest } from "../helpers/layers";

const secret = Redacted.make(TEST_SECRET);
const plaintext = new TextEncoder().encode("vault contents\n");

describe("encryptBytes / decryptBytes", () => {
  test("decrypts what it encrypted", async () => {
    const result = await runTest(
      Effect.flatMap(encryptBytes(plaintext, secret), (sealed) => decryptBytes(sealed, secret))
    );

    expect(new TextDecoder().decode(result)).toBe("vault contents\n");
  });

  test("the ciphertext does not contain the plaintext", async () => {
    const sealed = await runTest(encryptBytes(plaintext, secret));

    expect(Buffer.from(sealed).includes(Buffer.from("vault contents"))).toBe(false);
  });

  test("a wrong passphrase fails with DECRYPT_FAILED", async () => {
    const result = await runTest(
      Effect.either(
        Effect.flatMap(encryptBytes(plaintext, secret), (sealed) =>
          decryptBytes(sealed, Redacted.make("other-secret"))
        )
      )
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.code).toBe(ErrorCode.DECRYPT_FAILED);
    }
  });

  test("a truncated message fails with DECRYPT_FAILED", async () => {
    const result = await runTest(
      Effect.either(
        Effect.flatMap(encryptBytes(plaintext, secret), (sealed) =>
          decryptBytes(sealed.subarray(0, Math.floor(sealed.length / 2)), secret)
        )
      )
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.code).toBe(ErrorCode.DECRYPT_FAILED);
    }
  });
});

describe("openpgp file encryption", () => {
  let dir: AbsolutePath;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    cleanup(dir);
  });

  test("round-trips a file and writes both outputs 0600", async () => {
    const source = pathJoin(dir, "db.sql");
    const sealed = pathJoin(dir, "db.sql.gpg");
    const opened = pathJoin(dir, "db.restored.sql");
    writeFile(source, "CREATE TABLE t (x);\n");

    await runTest(
      Effect.zipRight(openpgpEncryptFile(source, sealed, secret), openpgpDecryptFile(sealed, opened, secret))
    );

    expect(readFileSync(opened, "utf8")).toBe("CREATE TABLE t (x);\n");
    expect(statSync(sealed).mode & 0o777).toBe(0o600);
    expect(statSync(opened).mode & 0o777).toBe(0o600);
  });

  test("a failed decrypt leaves no output file", async () => {
    const source = pathJoin(dir, "db.sql");
    const sealed = pathJoin(dir, "db.sql.gpg");
    const opened = pathJoin(dir, "out.sql");
    writeFile(source, "data");

    const result = await runTest(
      Effect.either(
        Effect.zipRight(
          openpgpEncryptFile(source, sealed, secret),
          openpgpDecryptFile(sealed, opened, Redacted.make("wrong-secret"))
        )
      )
    );

    expect(Either.isLeft(result)).toBe(true);
    expect(existsSync(opened)).toBe(false);
  });

  test("a missing source fails with ENCRYPT_FAILED", async () => {
    const result = await runTest(
      Effect.either(openpgpEncryptFile(pathJoin(dir, "absent"), pathJoin(dir, "x.gpg"), secret))
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.code).toBe(ErrorCode.ENCRYPT_FAILED);
    }
  });
});

describe("gpg argv", () => {
  const source = path("/backups/db.sql");
  const dest = path("/backups/db.sql.gpg");
  const pass = path("/tmp/secret/passphrase");

  test("symmetric AES256, no compression, passphrase by file", () => {
    expect(gpgEncryptArgs(source, dest, pass)).toEqual([
      "gpg",
      "--batch",
      "--yes",
      "--quiet",
      "--no-symkey-cache",
      "--pinentry-mode",
      "loopback",
      "--cipher-algo",
      "AES256",
      "--compress-algo",
      "none",
      "--passphrase-file",
      "/tmp/secret/passphrase",
      "--output",
      "/backups/db.sql.gpg",
      "--symmetric",
      "/backups/db.sql",
    ]);
  });

  test("the passphrase itself never appears in argv", () => {
    const argv = [...gpgEncryptArgs(source, dest, pass), ...gpgDecryptArgs(dest, source, pass)];

    expect(argv).not.toContain(TEST_SECRET);
  });
});

describe("withTransientSecretFile", () => {
  test("exposes a 0600 file holding the secret and removes it afterwards", async () => {
    const seen = await runTest(
      withTransientSecretFile(secret, (file) =>
        Effect.sync(() => ({
          file,
          content: readFileSync(file, "utf8"),
          mode: statSync(file).mode & 0o777,
        }))
      )
    );

    expect(seen.content).toBe(TEST_SECRET);
    expect(seen.mode).toBe(SECRET_FILE_MODE);
    expect(existsSync(seen.file)).toBe(false);
  });

  test("removes the file when the use fails", async () => {
    let seenPath = "";
    const result = await runTest(
      Effect.either(
        withTransientSecretFile(secret, (file) => {
          seenPath = file;
          return Effect.fail("tool failed");
        })
      )
    );

    expect(Either.isLeft(result)).toBe(true);
    expect(seenPath).not.toBe("");
    expect(existsSync(seenPath)).toBe(false);
  });
});
