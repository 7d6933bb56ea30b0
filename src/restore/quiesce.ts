// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Quiesce step. Its receipt is the only way into `apply`: the token the
 * constructor demands never leaves this module, and the private field makes
 * the class nominal, so no other code can build one.
 */

import { Effect, pipe } from "effect";
import type { RestoreScope } from "../config/field-values";
import { BackupError, ErrorCode, type ServiceError } from "../lib/errors";
import { logSuccess } from "../lib/log";
import { ServiceRuntime } from "../system/services/runtime";

const MINT: unique symbol = Symbol("vaultkeep/QuiesceReceipt");

export class QuiesceReceipt {
  readonly #minted: typeof MINT;

  constructor(
    token: typeof MINT,
    readonly scope: RestoreScope,
    readonly stoppedAt: Date
  ) {
    this.#minted = token;
  }

  /** Receipts only cover the scope they were issued for, or a narrower one. */
  covers(scope: RestoreScope): boolean {
    return this.#minted === MINT && (this.scope === scope || this.scope === "full");
  }
}

const stillRunning = (scope: RestoreScope): BackupError =>
  new BackupError({
    code: ErrorCode.RESTORE_FAILED,
    message: `Services for ${scope} restore still report running after stop; nothing was changed`,
  });

/** Stop the services a `scope` restore touches and prove they are down. */
export const quiesce = (
  scope: RestoreScope
): Effect.Effect<QuiesceReceipt, BackupError | ServiceError, ServiceRuntime> =>
  Effect.gen(function* () {
    const runtime = yield* ServiceRuntime;
    yield* runtime.stop(scope);
    yield* pipe(
      runtime.isRunning(scope),
      Effect.filterOrFail(
        (running) => !running,
        () => stillRunning(scope)
      )
    );
    yield* logSuccess(`Services stopped for ${scope} restore`);
    return new QuiesceReceipt(MINT, scope, new Date());
  });
