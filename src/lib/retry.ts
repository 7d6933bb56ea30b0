// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Schedules for retries and polling.
 */

import { Array as Arr, Duration, type Duration as EffectDuration, Schedule, pipe } from "effect";
import type { ServiceError, SystemError } from "./errors";

/** Docker CLI calls: jittered exponential backoff from 200ms, 4 retries. */
export const systemRetrySchedule: Schedule.Schedule<
  [EffectDuration.Duration, number],
  unknown,
  never
> = pipe(
  Schedule.exponential(Duration.millis(200)),
  Schedule.jittered,
  Schedule.intersect(Schedule.recurs(4))
);

/**
 * Fixed-interval polling bounded by an attempt count. `attempts` is the
 * total number of tries, so the schedule recurs `attempts - 1` times.
 */
export const attemptSchedule = (
  attempts: number,
  intervalMs: number
): Schedule.Schedule<[number, number], unknown, never> =>
  pipe(
    Schedule.spaced(Duration.millis(intervalMs)),
    Schedule.intersect(Schedule.recurs(Math.max(0, attempts - 1)))
  );

/** Fixed-interval polling bounded by total wait time. */
export const pollingSchedule = (
  maxWaitMs: number,
  intervalMs = 100
): Schedule.Schedule<[number, number], unknown, never> =>
  attemptSchedule(Math.ceil(maxWaitMs / intervalMs), intervalMs);

const TRANSIENT_ERROR_PATTERNS: readonly string[] = [
  "connection refused",
  "connection reset",
  "temporarily unavailable",
  "device or resource busy",
  "cannot connect to the docker daemon",
  "is the docker daemon running",
  "etimedout",
  "econnrefused",
  "econnreset",
  "operation timed out",
];

const PERMANENT_ERROR_PATTERNS: readonly string[] = [
  "no such file or directory",
  "permission denied",
  "no such container",
  "no such volume",
  "no such service",
  "invalid argument",
];

const containsAnyPattern = (msg: string, patterns: readonly string[]): boolean =>
  Arr.some(patterns, (pattern) => msg.includes(pattern));

/** A docker invocation worth retrying: transient wording, no permanent wording. */
export const isTransientError = (error: SystemError | ServiceError): boolean => {
  const msg = error.message.toLowerCase();
  return (
    !containsAnyPattern(msg, PERMANENT_ERROR_PATTERNS) &&
    containsAnyPattern(msg, TRANSIENT_ERROR_PATTERNS)
  );
};
