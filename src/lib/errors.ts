// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tagged error hierarchy. Every failure carries a numeric code from
 * `ErrorCode`; the process exit code is derived from it so the scheduler can
 * tell a configuration problem from a failed restore.
 */

import { Data } from "effect";

interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly LOCK_BUSY: 3;
  readonly DEPENDENCY_MISSING: 4;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;
  readonly SECRET_MISSING: 13;
  readonly DATABASE_NOT_FOUND: 14;

  // System (20-29)
  readonly DIRECTORY_CREATE_FAILED: 22;
  readonly INSUFFICIENT_DISK_SPACE: 24;
  readonly OPERATION_TIMEOUT: 25;
  readonly EXEC_FAILED: 26;
  readonly FILE_READ_FAILED: 27;
  readonly FILE_WRITE_FAILED: 28;

  // Service (30-39)
  readonly SERVICE_START_FAILED: 31;
  readonly SERVICE_STOP_FAILED: 32;
  readonly SERVICE_STILL_RUNNING: 33;
  readonly SERVICE_UNHEALTHY: 34;

  // Backup/Restore (50-59)
  readonly BACKUP_FAILED: 50;
  readonly RESTORE_FAILED: 51;
  readonly BACKUP_NOT_FOUND: 52;
  readonly COMPRESS_FAILED: 53;
  readonly ENCRYPT_FAILED: 54;
  readonly DECRYPT_FAILED: 55;
  readonly VERIFY_FAILED: 56;
}

export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  LOCK_BUSY: 3,
  DEPENDENCY_MISSING: 4,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,
  SECRET_MISSING: 13,
  DATABASE_NOT_FOUND: 14,

  DIRECTORY_CREATE_FAILED: 22,
  INSUFFICIENT_DISK_SPACE: 24,
  OPERATION_TIMEOUT: 25,
  EXEC_FAILED: 26,
  FILE_READ_FAILED: 27,
  FILE_WRITE_FAILED: 28,

  SERVICE_START_FAILED: 31,
  SERVICE_STOP_FAILED: 32,
  SERVICE_STILL_RUNNING: 33,
  SERVICE_UNHEALTHY: 34,

  BACKUP_FAILED: 50,
  RESTORE_FAILED: 51,
  BACKUP_NOT_FOUND: 52,
  COMPRESS_FAILED: 53,
  ENCRYPT_FAILED: 54,
  DECRYPT_FAILED: 55,
  VERIFY_FAILED: 56,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

type GeneralCode =
  | ErrorCodeMap["GENERAL_ERROR"]
  | ErrorCodeMap["INVALID_ARGS"]
  | ErrorCodeMap["LOCK_BUSY"]
  | ErrorCodeMap["DEPENDENCY_MISSING"];

type ConfigCode =
  | ErrorCodeMap["CONFIG_NOT_FOUND"]
  | ErrorCodeMap["CONFIG_PARSE_ERROR"]
  | ErrorCodeMap["CONFIG_VALIDATION_ERROR"]
  | ErrorCodeMap["SECRET_MISSING"]
  | ErrorCodeMap["DATABASE_NOT_FOUND"];

type SystemCode =
  | ErrorCodeMap["DIRECTORY_CREATE_FAILED"]
  | ErrorCodeMap["INSUFFICIENT_DISK_SPACE"]
  | ErrorCodeMap["OPERATION_TIMEOUT"]
  | ErrorCodeMap["EXEC_FAILED"]
  | ErrorCodeMap["FILE_READ_FAILED"]
  | ErrorCodeMap["FILE_WRITE_FAILED"];

type ServiceCode =
  | ErrorCodeMap["SERVICE_START_FAILED"]
  | ErrorCodeMap["SERVICE_STOP_FAILED"]
  | ErrorCodeMap["SERVICE_STILL_RUNNING"]
  | ErrorCodeMap["SERVICE_UNHEALTHY"];

type BackupCode =
  | ErrorCodeMap["BACKUP_FAILED"]
  | ErrorCodeMap["RESTORE_FAILED"]
  | ErrorCodeMap["BACKUP_NOT_FOUND"]
  | ErrorCodeMap["COMPRESS_FAILED"]
  | ErrorCodeMap["ENCRYPT_FAILED"]
  | ErrorCodeMap["DECRYPT_FAILED"]
  | ErrorCodeMap["VERIFY_FAILED"];

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly code: ServiceCode;
  readonly message: string;
  readonly service?: string;
  readonly cause?: Error;
}> {}

export class BackupError extends Data.TaggedError("BackupError")<{
  readonly code: BackupCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export type AppError = GeneralError | ConfigError | SystemError | ServiceError | BackupError;

/** Exit codes are capped at 125 (POSIX reserves the rest for the shell). */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

export const isAppError = (err: unknown): err is AppError =>
  typeof err === "object" &&
  err !== null &&
  "_tag" in err &&
  "code" in err &&
  "message" in err &&
  typeof err.code === "number";

export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/**
 * Spread into an error constructor to keep the original failure as `cause`.
 *
 * @example
 * new SystemError({
 *   code: ErrorCode.FILE_WRITE_FAILED,
 *   message: `Failed to write ${path}`,
 *   ...causeOf(e),
 * })
 */
export const causeOf = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
