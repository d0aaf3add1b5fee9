// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. `runCommand` resolves the context, installs the logger and
 * prints the failure line for every subcommand.
 */

import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli";
import type { FileSystem, Path } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import { EnvConfigSpec } from "../config/env";
import {
  LOG_FORMAT_DEFAULT,
  LOG_LEVEL_DEFAULT,
  type LogFormat,
  type LogLevel,
} from "../config/field-values";
import { resolve } from "../config/resolve";
import { IniqLoggerLive, detectColor } from "../lib/effect-logger";
import { ErrorCode, GeneralError, getErrorCodeName, isIniqError } from "../lib/errors";
import { writeFailure, writeOutput } from "../lib/log";
import { extractCauseProps, extractMessage } from "../lib/match-helpers";
import { INIQ_VERSION } from "../lib/version";

import { executeDump } from "./commands/dump";
import { executeGet } from "./commands/get";
import { executeSections } from "./commands/sections";

import {
  type GlobalOptions,
  effectiveFormat,
  fileArg,
  flagLogLevel,
  globalOptions,
  keyArg,
  sectionOption,
} from "./options";

/** Resolved runtime context for commands. CLI flags > env vars > defaults. */
export interface CommandContext {
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
  readonly useColor: boolean;
}

// Context resolution

/** INIQ_DEBUG=true forces debug regardless of flags. */
export const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, GeneralError> =>
  Effect.gen(function* () {
    const env = yield* EnvConfigSpec;

    const logLevel: LogLevel = pipe(
      Match.value(env.debug),
      Match.when(true, (): LogLevel => "debug"),
      Match.when(
        false,
        (): LogLevel =>
          resolve({
            cli: flagLogLevel(globals),
            env: env.logging.level,
            fallback: LOG_LEVEL_DEFAULT,
          })
      ),
      Match.exhaustive
    );

    const format: LogFormat = resolve({
      cli: effectiveFormat(globals),
      env: env.logging.format,
      fallback: LOG_FORMAT_DEFAULT,
    });

    return { format, logLevel, useColor: detectColor() };
  }).pipe(
    Effect.mapError(
      (e) =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: `Invalid environment configuration: ${extractMessage(e)}`,
          ...extractCauseProps(e),
        })
    )
  );

// Error display

/** Formats error for terminal output. Errors without our code are left to the caller. */
export const displayError = (err: unknown, ctx: CommandContext): Effect.Effect<void> =>
  isIniqError(err)
    ? pipe(
        Match.value(ctx.format),
        Match.when("json", () =>
          writeOutput(
            JSON.stringify({ error: err.message, code: err.code, name: getErrorCodeName(err.code) })
          )
        ),
        Match.when("pretty", () => writeFailure(err.message, ctx.useColor)),
        Match.exhaustive
      )
    : Effect.void;

// Command runner

type CommandRequirements = FileSystem.FileSystem | Path.Path;

const runCommand = <E>(
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, E, CommandRequirements>
): Effect.Effect<void, E | GeneralError, CommandRequirements> =>
  Effect.gen(function* () {
    const ctx = yield* resolveContext(globals).pipe(
      Effect.tapError((err) => writeFailure(err.message, detectColor()))
    );
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => displayError(err, ctx)),
      Effect.provide(IniqLoggerLive({ level: ctx.logLevel, format: ctx.format, color: ctx.useColor }))
    );
  });

// Subcommand definitions

const getCmd = Command.make(
  "get",
  { ...globalOptions, file: fileArg, key: keyArg, section: sectionOption },
  (args) =>
    runCommand(args, "get", (ctx) =>
      executeGet({ file: args.file, key: args.key, section: args.section, format: ctx.format })
    )
).pipe(Command.withDescription("Print the value of a key, optionally within one section"));

const dumpCmd = Command.make(
  "dump",
  { ...globalOptions, file: fileArg, section: sectionOption },
  (args) =>
    runCommand(args, "dump", (ctx) =>
      executeDump({ file: args.file, section: args.section, format: ctx.format })
    )
).pipe(Command.withDescription("Parse a file and print it back normalized"));

const sectionsCmd = Command.make("sections", { ...globalOptions, file: fileArg }, (args) =>
  runCommand(args, "sections", (ctx) => executeSections({ file: args.file, format: ctx.format }))
).pipe(Command.withDescription("List the named sections of a file"));

// Root command

const iniq = Command.make("iniq").pipe(
  Command.withDescription("Query INI files"),
  Command.withSubcommands([getCmd, dumpCmd, sectionsCmd])
);

/** Expects the full `process.argv`; the first two entries are skipped. */
export const cli: (args: readonly string[]) => Effect.Effect<void, unknown, CliApp.CliApp.Environment> =
  Command.run(iniq, {
    name: "iniq",
    version: INIQ_VERSION,
  });
