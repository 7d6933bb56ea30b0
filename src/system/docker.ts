// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Docker Compose control and volume helpers. Volume contents are only ever
 * touched from a disposable helper container, never through the host's
 * view of the Docker data root.
 */

import { basename, dirname } from "node:path";
import { Effect, Match, Option, pipe } from "effect";
import type { RestoreScope } from "../config/field-values";
import {
  ErrorCode,
  type GeneralError,
  ServiceError,
  type SystemError,
  causeOf,
  errorMessage,
} from "../lib/errors";
import { isTransientError, systemRetrySchedule } from "../lib/retry";
import { type AbsolutePath, type VolumeName, isVolumeName } from "../lib/types";
import { type ExecResult, exec } from "./exec";

export interface DockerSettings {
  readonly composeFile: AbsolutePath;
  readonly projectDir: AbsolutePath;
  readonly service: string;
  readonly container: string;
  readonly helperImage: string;
  readonly lowPriority: boolean;
}

/** Name of the staging directory created inside a volume during restore. */
export const VOLUME_STAGE_DIR = ".vaultkeep-stage";

export const volumeArchiveName = (volume: VolumeName): string => `volume-${volume}.tar.gz`;

const VOLUME_ARCHIVE_PATTERN = /^volume-(.+)\.tar\.gz$/;

/** Inverse of `volumeArchiveName`; only for top-level entries. */
export const volumeNameFromArchive = (entry: string): Option.Option<VolumeName> =>
  pipe(
    Option.fromNullable(VOLUME_ARCHIVE_PATTERN.exec(entry)),
    Option.flatMap((m) => Option.fromNullable(m[1])),
    Option.filter(isVolumeName)
  );

const serviceError = (
  code: ServiceError["code"],
  service: string,
  message: string,
  e?: unknown
): ServiceError =>
  new ServiceError({
    code,
    service,
    message: e === undefined ? message : `${message}: ${errorMessage(e)}`,
    ...causeOf(e),
  });

const composeArgs = (settings: DockerSettings, ...args: string[]): readonly string[] => [
  "docker",
  "compose",
  "-f",
  settings.composeFile,
  ...args,
];

const run = (
  settings: DockerSettings,
  argv: readonly string[],
  timeoutMs?: number
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  exec(argv, { cwd: settings.projectDir, timeoutMs, lowPriority: settings.lowPriority });

const runChecked = (
  settings: DockerSettings,
  argv: readonly string[],
  onError: (e: unknown) => ServiceError,
  timeoutMs?: number
): Effect.Effect<ExecResult, ServiceError> =>
  pipe(
    run(settings, argv, timeoutMs),
    Effect.mapError(onError),
    Effect.filterOrFail(
      (r) => r.exitCode === 0,
      (r) => onError(new Error(r.stderr.trim() || `exit code ${r.exitCode}`))
    )
  );

const withRetry = <A>(effect: Effect.Effect<A, ServiceError>): Effect.Effect<A, ServiceError> =>
  Effect.retry(effect, { schedule: systemRetrySchedule, while: isTransientError });

/** Database scope stops only the application service; wider scopes take the stack down. */
export const stopArgs = (settings: DockerSettings, scope: RestoreScope): readonly string[] =>
  pipe(
    Match.value(scope),
    Match.when("database", () => composeArgs(settings, "stop", settings.service)),
    Match.orElse(() => composeArgs(settings, "down"))
  );

export const stopServices = (
  settings: DockerSettings,
  scope: RestoreScope
): Effect.Effect<void, ServiceError> =>
  pipe(
    runChecked(settings, stopArgs(settings, scope), (e) =>
      serviceError(ErrorCode.SERVICE_STOP_FAILED, settings.service, "Failed to stop services", e)
    ),
    withRetry,
    Effect.asVoid
  );

export const startServices = (settings: DockerSettings): Effect.Effect<void, ServiceError> =>
  pipe(
    runChecked(settings, composeArgs(settings, "up", "-d"), (e) =>
      serviceError(ErrorCode.SERVICE_START_FAILED, settings.service, "Failed to start services", e)
    ),
    withRetry,
    Effect.asVoid
  );

export const isRunning = (
  settings: DockerSettings,
  scope: RestoreScope
): Effect.Effect<boolean, ServiceError> => {
  const argv =
    scope === "database"
      ? composeArgs(settings, "ps", "--status", "running", "-q", settings.service)
      : composeArgs(settings, "ps", "--status", "running", "-q");
  return pipe(
    runChecked(settings, argv, (e) =>
      serviceError(
        ErrorCode.SERVICE_STOP_FAILED,
        settings.service,
        "Failed to query service state",
        e
      )
    ),
    Effect.map((r) => r.stdout.trim().length > 0)
  );
};

const HEALTH_FORMAT = "{{if .State.Health}}{{.State.Health.Status}}{{else}}{{.State.Status}}{{end}}";

/** Healthy when the container's health check passes, or it runs without one. */
export const isHealthy = (settings: DockerSettings): Effect.Effect<boolean> =>
  pipe(
    run(settings, ["docker", "inspect", "--format", HEALTH_FORMAT, settings.container]),
    Effect.map((r) => {
      const status = r.stdout.trim();
      return r.exitCode === 0 && (status === "healthy" || status === "running");
    }),
    Effect.orElseSucceed(() => false)
  );

export const volumeExists = (
  settings: DockerSettings,
  volume: VolumeName
): Effect.Effect<boolean, ServiceError> =>
  pipe(
    run(settings, ["docker", "volume", "inspect", volume]),
    Effect.map((r) => r.exitCode === 0),
    Effect.mapError((e) =>
      serviceError(ErrorCode.SERVICE_UNHEALTHY, volume, "Failed to inspect volume", e)
    )
  );

/** Write `volume-<name>.tar.gz` into `destDir`. */
export const exportVolume = (
  settings: DockerSettings,
  volume: VolumeName,
  destDir: AbsolutePath,
  timeoutMs: number
): Effect.Effect<string, ServiceError> => {
  const archiveName = volumeArchiveName(volume);
  return pipe(
    runChecked(
      settings,
      [
        "docker",
        "run",
        "--rm",
        "-v",
        `${volume}:/source:ro`,
        "-v",
        `${destDir}:/backup`,
        settings.helperImage,
        "tar",
        "-C",
        "/source",
        "-czf",
        `/backup/${archiveName}`,
        ".",
      ],
      (e) => serviceError(ErrorCode.SERVICE_UNHEALTHY, volume, "Volume export failed", e),
      timeoutMs
    ),
    Effect.as(archiveName)
  );
};

const helperShell = (
  settings: DockerSettings,
  volume: VolumeName,
  mounts: readonly string[],
  script: string,
  timeoutMs: number,
  what: string
): Effect.Effect<void, ServiceError> =>
  pipe(
    runChecked(
      settings,
      ["docker", "run", "--rm", "-v", `${volume}:/target`, ...mounts, settings.helperImage, "sh", "-c", script],
      (e) => serviceError(ErrorCode.SERVICE_UNHEALTHY, volume, what, e),
      timeoutMs
    ),
    Effect.asVoid
  );

/** Extract `archive` into `<volume>/.vaultkeep-stage`, leaving live content alone. */
export const stageVolume = (
  settings: DockerSettings,
  volume: VolumeName,
  archive: AbsolutePath,
  timeoutMs: number
): Effect.Effect<void, ServiceError> =>
  helperShell(
    settings,
    volume,
    ["-v", `${dirname(archive)}:/backup:ro`],
    [
      "set -e",
      `rm -rf /target/${VOLUME_STAGE_DIR}`,
      `mkdir /target/${VOLUME_STAGE_DIR}`,
      `tar -C /target/${VOLUME_STAGE_DIR} -xzf /backup/${basename(archive)}`,
    ].join("; "),
    timeoutMs,
    "Volume staging failed"
  );

/** Replace the volume's content with its stage. */
export const commitVolume = (
  settings: DockerSettings,
  volume: VolumeName,
  timeoutMs: number
): Effect.Effect<void, ServiceError> =>
  helperShell(
    settings,
    volume,
    [],
    [
      "set -e",
      `find /target -mindepth 1 -maxdepth 1 ! -name ${VOLUME_STAGE_DIR} -exec rm -rf {} +`,
      `find /target/${VOLUME_STAGE_DIR} -mindepth 1 -maxdepth 1 -exec mv {} /target/ \\;`,
      `rmdir /target/${VOLUME_STAGE_DIR}`,
    ].join("; "),
    timeoutMs,
    "Volume commit failed"
  );

export const discardVolumeStage = (
  settings: DockerSettings,
  volume: VolumeName,
  timeoutMs: number
): Effect.Effect<void, ServiceError> =>
  helperShell(
    settings,
    volume,
    [],
    `rm -rf /target/${VOLUME_STAGE_DIR}`,
    timeoutMs,
    "Volume stage cleanup failed"
  );
