// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

/** Database extraction formats, in production order. `native` is the primary. */
export const BACKUP_FORMAT_VALUES = ["native", "sql", "json", "csv", "schema"] as const;
export type BackupFormat = (typeof BACKUP_FORMAT_VALUES)[number];

/** CLI selection: one format, or every format. */
export const FORMAT_SELECTION_VALUES = [...BACKUP_FORMAT_VALUES, "all"] as const;
export type FormatSelection = (typeof FORMAT_SELECTION_VALUES)[number];

export const ENCRYPTION_BACKEND_VALUES = ["openpgp", "gpg"] as const;
export type EncryptionBackend = (typeof ENCRYPTION_BACKEND_VALUES)[number];

export const THROTTLE_MODE_VALUES = ["auto", "always", "never"] as const;
export type ThrottleMode = (typeof THROTTLE_MODE_VALUES)[number];

export const CATEGORY_VALUES = ["database", "full"] as const;
export type Category = (typeof CATEGORY_VALUES)[number];

export const RESTORE_SCOPE_VALUES = ["database", "config", "full"] as const;
export type RestoreScope = (typeof RESTORE_SCOPE_VALUES)[number];

export const RESTORE_MODE_VALUES = ["apply", "dry-run"] as const;
export type RestoreMode = (typeof RESTORE_MODE_VALUES)[number];
