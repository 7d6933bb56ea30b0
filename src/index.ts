#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * vaultkeep: backup, encryption and restore for a Vaultwarden deployment.
 *
 * This is the "imperative shell", the only place the Effect runtime runs.
 */

import { Cause, Effect, Exit, Option } from "effect";
import { exitCodeFromExit, program } from "./cli/index";

const logExitError = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        // Defects and interruptions; application errors were already shown.
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (): void => undefined,
      }),
  });

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(program(process.argv));
  logExitError(exit);
  process.exit(exitCodeFromExit(exit));
}

if (require.main === module) {
  void main();
}
