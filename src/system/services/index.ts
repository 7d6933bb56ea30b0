// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * System services index. `SystemServicesLive` wires every tag to its real
 * implementation for a given configuration.
 */

import { Layer } from "effect";
import type { AppConfig } from "../../config/app-config";
import type { DockerSettings } from "../docker";
import { type Archiver, ArchiverLive } from "./archive";
import { type CloudSync, CloudSyncLive } from "./cloud";
import { type Compressor, CompressorLive } from "./compress";
import { type DatabaseChecker, DatabaseCheckerLive } from "./database";
import { type Encryptor, EncryptorLive } from "./encrypt";
import { type ServiceRuntime, ServiceRuntimeLive } from "./runtime";

export { Archiver, type ArchiverService, ArchiverLive } from "./archive";
export { CloudSync, type CloudSyncService, CloudSyncLive } from "./cloud";
export { Compressor, type CompressorService, CompressorLive } from "./compress";
export { DatabaseChecker, type DatabaseCheckerService, DatabaseCheckerLive } from "./database";
export { Encryptor, type EncryptorService, EncryptorLive, makeEncryptor } from "./encrypt";
export {
  ServiceRuntime,
  type ServiceRuntimeService,
  ServiceRuntimeLive,
  makeDockerRuntime,
} from "./runtime";

export type SystemServices =
  | Archiver
  | CloudSync
  | Compressor
  | DatabaseChecker
  | Encryptor
  | ServiceRuntime;

export const dockerSettingsFor = (config: AppConfig, lowPriority: boolean): DockerSettings => ({
  composeFile: config.docker.composeFile,
  projectDir: config.paths.root,
  service: config.docker.service,
  container: config.docker.container,
  helperImage: config.full.helperImage,
  lowPriority,
});

export const SystemServicesLive = (
  config: AppConfig,
  lowPriority = false
): Layer.Layer<SystemServices> =>
  Layer.mergeAll(
    ArchiverLive,
    CloudSyncLive,
    CompressorLive,
    DatabaseCheckerLive,
    EncryptorLive(config.encryption.backend),
    ServiceRuntimeLive(dockerSettingsFor(config, lowPriority))
  );
