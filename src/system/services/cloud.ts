// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Context, type Effect, Layer } from "effect";
import type { SystemError } from "../../lib/errors";
import type { AbsolutePath } from "../../lib/types";
import { rcloneAvailable, rcloneCopy, rcloneList } from "../rclone";

export interface CloudSyncService {
  readonly available: () => Effect.Effect<boolean>;
  readonly copy: (
    localDir: AbsolutePath,
    target: string,
    timeoutMs: number
  ) => Effect.Effect<void, SystemError>;
  readonly list: (target: string, timeoutMs: number) => Effect.Effect<readonly string[], SystemError>;
}

export interface CloudSync {
  readonly _tag: "CloudSync";
}

export const CloudSync: Context.Tag<CloudSync, CloudSyncService> = Context.GenericTag<
  CloudSync,
  CloudSyncService
>("vaultkeep/CloudSync");

export const CloudSyncLive: Layer.Layer<CloudSync> = Layer.succeed(CloudSync, {
  available: rcloneAvailable,
  copy: rcloneCopy,
  list: rcloneList,
});
