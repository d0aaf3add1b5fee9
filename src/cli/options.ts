// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI option definitions shared by every command.
 */

import { Args as A, Options as O } from "@effect/cli";
import { Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Shared positional arguments

export const fileArg: A.Args<string> = A.text({ name: "file" }).pipe(
  A.withDescription("Path to the INI file")
);

export const keyArg: A.Args<string> = A.text({ name: "key" }).pipe(
  A.withDescription("Key to look up")
);

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: O.Options<boolean>;
  readonly quiet: O.Options<boolean>;
  readonly logLevel: O.Options<Option.Option<LogLevel>>;
  readonly format: O.Options<Option.Option<LogFormat>>;
  readonly json: O.Options<boolean>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  quiet: O.boolean("quiet").pipe(
    O.withAlias("q"),
    O.withDescription("Suppress diagnostics (shorthand for --log-level silent)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output and log format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
};

// Per-command options

/** Absent means the lookup ignores section boundaries. */
export const sectionOption: O.Options<Option.Option<string>> = O.text("section").pipe(
  O.withAlias("s"),
  O.withDescription("Section to search; omit to search the whole file"),
  O.optional
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly quiet: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );

/** --verbose beats --quiet; both beat --log-level. */
export const flagLogLevel = (globals: GlobalOptions): Option.Option<LogLevel> =>
  pipe(
    Match.value({ verbose: globals.verbose, quiet: globals.quiet }),
    Match.when({ verbose: true }, (): Option.Option<LogLevel> => Option.some("debug")),
    Match.when({ quiet: true }, (): Option.Option<LogLevel> => Option.some("silent")),
    Match.orElse((): Option.Option<LogLevel> => globals.logLevel)
  );
