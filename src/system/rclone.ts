// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, pipe } from "effect";
import { ErrorCode, SystemError } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { execLines, execSuccess } from "./exec";
import { isExecutableOnPath } from "./fs";

/** `remote:path` as rclone spells it. */
export const remoteTarget = (remote: string, path: string): string =>
  `${remote.replace(/:$/, "")}:${path.replace(/^\/+/, "")}`;

export const rcloneAvailable = (): Effect.Effect<boolean> => isExecutableOnPath("rclone");

const asSystemError =
  (what: string) =>
  (e: { readonly message: string }): SystemError =>
    new SystemError({ code: ErrorCode.EXEC_FAILED, message: `${what}: ${e.message}` });

export const rcloneCopy = (
  localDir: AbsolutePath,
  target: string,
  timeoutMs: number
): Effect.Effect<void, SystemError> =>
  pipe(
    execSuccess(["rclone", "copy", localDir, target], { timeoutMs }),
    Effect.mapError(asSystemError(`rclone copy to ${target} failed`)),
    Effect.asVoid
  );

export const rcloneList = (
  target: string,
  timeoutMs: number
): Effect.Effect<readonly string[], SystemError> =>
  pipe(
    execLines(["rclone", "lsf", target], { timeoutMs }),
    Effect.mapError(asSystemError(`rclone lsf ${target} failed`))
  );
