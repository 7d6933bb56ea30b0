// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const PROGRAM_NAME = "vaultkeep";

/** Keep in step with package.json; recorded in every set manifest. */
export const VERSION = "0.1.0";

/** Bumped when the shape of `manifest.json` changes. */
export const MANIFEST_SCHEMA_VERSION = 1;
