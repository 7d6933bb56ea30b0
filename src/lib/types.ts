// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types keep same-shaped strings apart: a volume name cannot be
 * passed where a set id is expected, and a relative path cannot reach code
 * that writes outside the backup root.
 */

import { dirname, isAbsolute, join, normalize, resolve } from "node:path";
import { type Brand, Effect, ParseResult, Schema, type SchemaAST } from "effect";
import { ConfigError, ErrorCode, GeneralError } from "./errors";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;
export type VolumeName = string & Brand.Brand<"VolumeName">;
export type SetLabel = string & Brand.Brand<"SetLabel">;

const absolutePathMsg = (): string => "Path must be absolute (start with /)";
const volumeNameMsg = (): string => "Volume name must match [a-zA-Z0-9][a-zA-Z0-9_.-]*";
const setLabelMsg = (): string => "Label must match [a-z0-9][a-z0-9-]* (max 40 characters)";

const VOLUME_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;
const SET_LABEL_PATTERN = /^[a-z0-9][a-z0-9-]{0,39}$/;

export const AbsolutePathSchema: Schema.BrandSchema<AbsolutePath, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => s.startsWith("/"), { message: absolutePathMsg }),
    Schema.brand("AbsolutePath")
  );

export const VolumeNameSchema: Schema.BrandSchema<VolumeName, string, never> = Schema.String.pipe(
  Schema.pattern(VOLUME_NAME_PATTERN, { message: volumeNameMsg }),
  Schema.brand("VolumeName")
);

export const SetLabelSchema: Schema.BrandSchema<SetLabel, string, never> = Schema.String.pipe(
  Schema.pattern(SET_LABEL_PATTERN, { message: setLabelMsg }),
  Schema.brand("SetLabel")
);

export const isAbsolutePath: (u: unknown) => u is AbsolutePath = Schema.is(AbsolutePathSchema);
export const isVolumeName: (u: unknown) => u is VolumeName = Schema.is(VolumeNameSchema);

export const decodeSetLabel: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<SetLabel, ParseResult.ParseError, never> = Schema.decode(SetLabelSchema);

/** Bridge Schema `ParseError` into the application error hierarchy. */
export const parseErrorToGeneralError = (error: ParseResult.ParseError): GeneralError =>
  new GeneralError({
    code: ErrorCode.INVALID_ARGS,
    message: ParseResult.TreeFormatter.formatErrorSync(error),
  });

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal. For dynamic
 * input use `toAbsolutePath` or `pathJoin`.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  literal as string as AbsolutePath;

/** Branded literal constructor. For dynamic input, decode with `VolumeNameSchema`. */
export const volumeName = <const S extends string>(literal: S): VolumeName =>
  literal as string as VolumeName;

/** Join path segments, preserving the `AbsolutePath` brand when the base is branded. */
export function pathJoin(base: AbsolutePath, ...segments: string[]): AbsolutePath;
export function pathJoin(base: string, ...segments: string[]): string;
export function pathJoin(base: string, ...segments: string[]): string {
  return segments.length === 0 ? base : join(base, ...segments);
}

/** Append a suffix (e.g. `".gz"`), preserving the `AbsolutePath` brand. */
export function pathWithSuffix(base: AbsolutePath, suffix: string): AbsolutePath;
export function pathWithSuffix(base: string, suffix: string): string;
export function pathWithSuffix(base: string, suffix: string): string {
  return `${base}${suffix}`;
}

/** Remove a trailing suffix when present, preserving the `AbsolutePath` brand. */
export function pathWithoutSuffix(base: AbsolutePath, suffix: string): AbsolutePath;
export function pathWithoutSuffix(base: string, suffix: string): string;
export function pathWithoutSuffix(base: string, suffix: string): string {
  return base.endsWith(suffix) ? base.slice(0, -suffix.length) : base;
}

/** Containing directory, preserving the `AbsolutePath` brand. */
export function parentPath(p: AbsolutePath): AbsolutePath;
export function parentPath(p: string): string;
export function parentPath(p: string): string {
  return dirname(p);
}

const resolveToAbsolute = (p: string, base: string): AbsolutePath => {
  const normalized = normalize(p);
  const absolute = isAbsolute(normalized) ? normalized : resolve(base, normalized);
  return absolute as AbsolutePath;
};

/**
 * Resolve a user or config supplied path. Relative paths resolve against
 * `base` (the working directory unless given). Null bytes are rejected.
 */
export const toAbsolutePath = (
  p: string,
  base: string = process.cwd()
): Effect.Effect<AbsolutePath, ConfigError> =>
  p.includes("\x00")
    ? Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid path contains null byte: ${p}`,
        })
      )
    : Effect.succeed(resolveToAbsolute(p, base));

/** Use only for trusted paths (hardcoded defaults, already validated input). */
export const toAbsolutePathUnsafe = (p: string, base: string = process.cwd()): AbsolutePath =>
  resolveToAbsolute(p, base);
