// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Best-effort mirror of a finished set to an rclone remote. Nothing here
 * can fail a run: every problem becomes a warning and an outcome.
 */

import { Array as Arr, Data, Effect, Either, Option, pipe } from "effect";
import type { Category } from "../config/field-values";
import { logSuccess } from "../lib/log";
import type { AbsolutePath } from "../lib/types";
import { listDirectory } from "../system/fs";
import { remoteTarget } from "../system/rclone";
import { CloudSync } from "../system/services/cloud";
import { ENCRYPTED_SUFFIX } from "./types";

export type OffloadOutcome = Data.TaggedEnum<{
  Skipped: { readonly reason: string };
  Mirrored: { readonly target: string; readonly files: number };
  Warning: { readonly target: string; readonly message: string };
}>;

export const OffloadOutcome = Data.taggedEnum<OffloadOutcome>();

export interface CloudTarget {
  readonly remote: string;
  readonly path: string;
}

const OFFLOAD_TIMEOUT_MS = 30 * 60 * 1000;
const LIST_TIMEOUT_MS = 2 * 60 * 1000;

const countEncrypted = (names: readonly string[]): number =>
  Arr.filter(names, (n) => n.endsWith(ENCRYPTED_SUFFIX)).length;

/** `rclone copy <setDir> <remote>:<path>/<category>/<id>`, then compare `.gpg` counts. */
export const offloadSet = (
  cloud: Option.Option<CloudTarget>,
  category: Category,
  setId: string,
  setDir: AbsolutePath
): Effect.Effect<OffloadOutcome, never, CloudSync> =>
  Effect.gen(function* () {
    if (Option.isNone(cloud)) {
      yield* Effect.logDebug("Cloud offload not configured");
      return OffloadOutcome.Skipped({ reason: "not configured" });
    }
    const sync = yield* CloudSync;
    if (!(yield* sync.available())) {
      yield* Effect.logWarning("Cloud offload configured but rclone is not on PATH");
      return OffloadOutcome.Skipped({ reason: "rclone not found" });
    }

    const target = remoteTarget(cloud.value.remote, `${cloud.value.path}/${category}/${setId}`);
    const warn = (message: string): Effect.Effect<OffloadOutcome> =>
      Effect.as(
        Effect.logWarning(`Cloud offload to ${target}: ${message}`),
        OffloadOutcome.Warning({ target, message })
      );

    const localFiles = yield* Effect.either(listDirectory(setDir));
    if (Either.isLeft(localFiles)) {
      return yield* warn(localFiles.left.message);
    }
    const local = countEncrypted(localFiles.right.map((f) => f.name));

    const copied = yield* Effect.either(sync.copy(setDir, target, OFFLOAD_TIMEOUT_MS));
    if (Either.isLeft(copied)) {
      return yield* warn(copied.left.message);
    }

    const listed = yield* Effect.either(sync.list(target, LIST_TIMEOUT_MS));
    if (Either.isLeft(listed)) {
      return yield* warn(`copied, but listing failed: ${listed.left.message}`);
    }
    const remote = countEncrypted(listed.right);

    return yield* pipe(
      remote === local
        ? Effect.as(
            logSuccess(`Mirrored ${local} artifact(s) to ${target}`),
            OffloadOutcome.Mirrored({ target, files: local })
          )
        : warn(`remote has ${remote} encrypted file(s), local has ${local}`)
    );
  });
