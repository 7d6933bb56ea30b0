// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Child process execution through the @effect/platform `Command` API.
 * Arguments are always an array; nothing goes through a shell.
 *
 * Processes are scoped: a timeout or interruption closes the scope and the
 * child is killed.
 */

import { Command } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Duration, Effect, Stream, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError, causeOf, errorMessage } from "../lib/errors";

export interface ExecOptions {
  readonly env?: Record<string, string>;
  readonly cwd?: string;
  readonly timeoutMs?: number;
  readonly stdin?: string;
  /** Run under `nice -n 10 ionice -c 3`. */
  readonly lowPriority?: boolean;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export const LOW_PRIORITY_PREFIX = ["nice", "-n", "10", "ionice", "-c", "3"] as const;

const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

const execError = (command: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command}: ${errorMessage(e)}`,
    ...causeOf(e),
  });

const validateCommand = (
  command: readonly string[]
): Effect.Effect<readonly [string, ...string[]], GeneralError> =>
  pipe(
    Effect.succeed(command),
    Effect.filterOrFail(
      (c): c is readonly [string, ...string[]] => c.length > 0 && c[0] !== undefined && c[0] !== "",
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "Command array cannot be empty",
        })
    )
  );

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

/** The full argv actually run, including the priority prefix. */
export const buildArgv = (
  command: readonly [string, ...string[]],
  options: Pick<ExecOptions, "lowPriority">
): readonly [string, ...string[]] =>
  options.lowPriority === true ? [...LOW_PRIORITY_PREFIX, ...command] : command;

export const exec = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const [cmd, ...args] = buildArgv(yield* validateCommand(command), options);
    const commandStr = [cmd, ...args].join(" ");

    const run = withExecutor(
      Effect.gen(function* () {
        const configured = pipe(
          Command.make(cmd, ...args),
          (c) => Command.env(c, { ...process.env, ...options.env }),
          (c) => (options.cwd !== undefined ? Command.workingDirectory(c, options.cwd) : c),
          (c) => (options.stdin !== undefined ? Command.feed(c, options.stdin) : c)
        );

        const child = yield* Command.start(configured);

        const [exitCode, stdout, stderr] = yield* Effect.all(
          [child.exitCode, streamToString(child.stdout), streamToString(child.stderr)],
          { concurrency: 3 }
        );

        return { exitCode: Number(exitCode), stdout, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(commandStr, e)));

    return yield* options.timeoutMs === undefined
      ? run
      : pipe(
          run,
          Effect.timeoutFail({
            duration: Duration.millis(options.timeoutMs),
            onTimeout: (): SystemError =>
              new SystemError({
                code: ErrorCode.OPERATION_TIMEOUT,
                message: `Timed out after ${Math.round((options.timeoutMs ?? 0) / 1000)}s: ${commandStr}`,
              }),
          })
        );
  });

/** Fails on a non-zero exit. Use `exec` when the exit code is information. */
export const execSuccess = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  pipe(
    exec(command, options),
    Effect.filterOrFail(
      (result): result is ExecResult => result.exitCode === 0,
      (result) => {
        const stderr = result.stderr.trim();
        return new SystemError({
          code: ErrorCode.EXEC_FAILED,
          message: `Command failed with exit code ${result.exitCode}: ${command.join(" ")}${stderr ? `\n${stderr}` : ""}`,
        });
      }
    )
  );

export const execOutput = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<string, SystemError | GeneralError> =>
  Effect.map(execSuccess(command, options), (r) => r.stdout);

export const execLines = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<readonly string[], SystemError | GeneralError> =>
  Effect.map(execOutput(command, options), (stdout) =>
    stdout
      .split("\n")
      .map((line) => line.trimEnd())
      .filter((line) => line.length > 0)
  );
