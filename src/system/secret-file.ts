// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Transient passphrase files for external tools that only read secrets
 * from disk. The file lives in a private directory for the duration of
 * `use` and is removed on every exit path.
 */

import { Effect, Redacted, pipe } from "effect";
import type { SystemError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { cleanupPath, makeTempDirectory, writeText } from "./fs";

export const SECRET_FILE_MODE = 0o600;

export const withTransientSecretFile = <A, E, R>(
  secret: Redacted.Redacted<string>,
  use: (secretPath: AbsolutePath) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | SystemError, R> =>
  Effect.acquireUseRelease(
    makeTempDirectory("vaultkeep-secret"),
    (dir) => {
      const secretPath = pathJoin(dir, "passphrase");
      return pipe(
        writeText(secretPath, Redacted.value(secret), { mode: SECRET_FILE_MODE }),
        Effect.zipRight(use(secretPath))
      );
    },
    (dir) => cleanupPath(dir)
  );
