// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * ServiceRuntime: the running deployment as the backup and restore code
 * sees it. The live implementation drives Docker Compose; tests swap in an
 * in-memory one.
 */

import { Context, type Effect, Layer } from "effect";
import type { RestoreScope } from "../../config/field-values";
import type { ServiceError } from "../../lib/errors";
import type { AbsolutePath, VolumeName } from "../../lib/types";
import {
  type DockerSettings,
  commitVolume,
  discardVolumeStage,
  exportVolume,
  isHealthy,
  isRunning,
  stageVolume,
  startServices,
  stopServices,
  volumeExists,
} from "../docker";

export interface ServiceRuntimeService {
  readonly stop: (scope: RestoreScope) => Effect.Effect<void, ServiceError>;
  readonly start: (scope: RestoreScope) => Effect.Effect<void, ServiceError>;
  readonly isRunning: (scope: RestoreScope) => Effect.Effect<boolean, ServiceError>;
  readonly isHealthy: () => Effect.Effect<boolean>;
  readonly volumeExists: (volume: VolumeName) => Effect.Effect<boolean, ServiceError>;
  /** Writes `volume-<name>.tar.gz` into `destDir` and returns the file name. */
  readonly exportVolume: (
    volume: VolumeName,
    destDir: AbsolutePath,
    timeoutMs: number
  ) => Effect.Effect<string, ServiceError>;
  readonly stageVolume: (
    volume: VolumeName,
    archive: AbsolutePath,
    timeoutMs: number
  ) => Effect.Effect<void, ServiceError>;
  readonly commitVolume: (volume: VolumeName, timeoutMs: number) => Effect.Effect<void, ServiceError>;
  readonly discardVolumeStage: (
    volume: VolumeName,
    timeoutMs: number
  ) => Effect.Effect<void, ServiceError>;
}

export interface ServiceRuntime {
  readonly _tag: "ServiceRuntime";
}

export const ServiceRuntime: Context.Tag<ServiceRuntime, ServiceRuntimeService> =
  Context.GenericTag<ServiceRuntime, ServiceRuntimeService>("vaultkeep/ServiceRuntime");

export const makeDockerRuntime = (settings: DockerSettings): ServiceRuntimeService => ({
  stop: (scope) => stopServices(settings, scope),
  start: () => startServices(settings),
  isRunning: (scope) => isRunning(settings, scope),
  isHealthy: () => isHealthy(settings),
  volumeExists: (volume) => volumeExists(settings, volume),
  exportVolume: (volume, destDir, timeoutMs) => exportVolume(settings, volume, destDir, timeoutMs),
  stageVolume: (volume, archive, timeoutMs) => stageVolume(settings, volume, archive, timeoutMs),
  commitVolume: (volume, timeoutMs) => commitVolume(settings, volume, timeoutMs),
  discardVolumeStage: (volume, timeoutMs) => discardVolumeStage(settings, volume, timeoutMs),
});

export const ServiceRuntimeLive = (settings: DockerSettings): Layer.Layer<ServiceRuntime> =>
  Layer.succeed(ServiceRuntime, makeDockerRuntime(settings));
