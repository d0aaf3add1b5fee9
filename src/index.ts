#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * iniq - INI file query tool
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Match, Option, pipe } from "effect";
import { cli } from "./cli/index";
import { isIniqError, toExitCode } from "./lib/errors";

const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(isIniqError, (err) => toExitCode(err.code)),
            Match.orElse(() => 1)
          ),
      }),
  });

/** Our own errors were already displayed by the command runner. */
const logExitError = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (err: unknown): void =>
          pipe(
            Match.value(err),
            Match.when(isIniqError, () => undefined),
            Match.when(
              (v: unknown): v is { message: string } =>
                typeof v === "object" && v !== null && "message" in v && typeof v.message === "string",
              (v: { message: string }) => console.error(`Error: ${v.message}`)
            ),
            Match.orElse(() => undefined)
          ),
      }),
  });

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(cli(process.argv).pipe(Effect.provide(NodeContext.layer)));
  logExitError(exit);
  process.exit(exitCodeFromExit(exit));
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error("Unexpected error:", e);
    process.exit(1);
  });
}
