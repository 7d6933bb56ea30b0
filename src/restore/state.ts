// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restore state machines.
 *
 * Apply:   Idle -> ServiceQuiesced -> Decrypted -> Extracted -> Applied
 *          -> ServiceResumed -> HealthVerified, or Failed from any step.
 * Dry run: Idle -> Decrypted -> Extracted -> Verified.
 *
 * Every apply state after Idle carries the quiesce receipt; dry-run states
 * have nowhere to keep one, so a dry run can never reach `applyStages`.
 */

import { Data } from "effect";
import type { AbsolutePath } from "../lib/types";
import type { ArtifactKind } from "../backup/types";
import type { QuiesceReceipt } from "./quiesce";

export type RestoreState = Data.TaggedEnum<{
  Idle: { readonly artifact: AbsolutePath; readonly kind: ArtifactKind };
  ServiceQuiesced: { readonly artifact: AbsolutePath; readonly kind: ArtifactKind; readonly receipt: QuiesceReceipt };
  Decrypted: { readonly plaintext: AbsolutePath; readonly kind: ArtifactKind; readonly receipt: QuiesceReceipt };
  Extracted: {
    readonly root: AbsolutePath;
    readonly entries: readonly string[];
    readonly kind: ArtifactKind;
    readonly receipt: QuiesceReceipt;
  };
  Applied: { readonly targets: readonly string[]; readonly receipt: QuiesceReceipt };
  ServiceResumed: { readonly targets: readonly string[] };
  HealthVerified: { readonly targets: readonly string[]; readonly attempts: number };
  Failed: { readonly from: string; readonly message: string };
}>;

export const RestoreState = Data.taggedEnum<RestoreState>();

export type DryRunState = Data.TaggedEnum<{
  Idle: { readonly artifact: AbsolutePath; readonly kind: ArtifactKind };
  Decrypted: { readonly plaintext: AbsolutePath; readonly kind: ArtifactKind };
  Extracted: { readonly root: AbsolutePath; readonly entries: readonly string[]; readonly kind: ArtifactKind };
  Verified: { readonly report: DryRunReport };
}>;

export const DryRunState = Data.taggedEnum<DryRunState>();

/** What an apply with the same arguments would do. */
export interface DryRunReport {
  readonly artifact: AbsolutePath;
  readonly kind: ArtifactKind;
  /** Structural check of the payload (integrity check, replay or entry listing). */
  readonly check: string;
  /** Paths and volumes an apply would replace. */
  readonly targets: readonly string[];
  readonly entries: number;
}

export type RestoreStateTag = RestoreState["_tag"];
