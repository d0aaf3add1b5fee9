// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `iniq get <file> <key> [--section name]` - single-key lookup through the
 * direct scanner; the file is never parsed into a model.
 */

import type { FileSystem, Path } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import { find } from "../../ini/find";
import { ErrorCode, type GrammarError, LookupError, type SystemError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { readIniText } from "../../system/fs";

export interface GetOptions {
  readonly file: string;
  readonly key: string;
  readonly section: Option.Option<string>;
  readonly format: LogFormat;
}

const notFound = (options: GetOptions): LookupError =>
  new LookupError({
    code: ErrorCode.KEY_NOT_FOUND,
    message: Option.match(options.section, {
      onNone: (): string => `The file did not contain the key ${options.key}`,
      onSome: (name): string => `The section [${name}] did not contain the key ${options.key}`,
    }),
  });

const render = (options: GetOptions, value: string): string =>
  pipe(
    Match.value(options.format),
    Match.when("pretty", () => value),
    Match.when("json", () =>
      JSON.stringify({
        key: options.key,
        section: Option.getOrNull(options.section),
        value,
      })
    ),
    Match.exhaustive
  );

export const executeGet = (
  options: GetOptions
): Effect.Effect<
  void,
  SystemError | GrammarError | LookupError,
  FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function* () {
    const text = yield* readIniText(options.file);
    const found = yield* find(text, options.key, options.section);
    const value = yield* Option.match(found, {
      onNone: (): Effect.Effect<string, LookupError> => Effect.fail(notFound(options)),
      onSome: (v): Effect.Effect<string, LookupError> => Effect.succeed(v),
    });
    yield* writeOutput(render(options, value));
  }).pipe(Effect.annotateLogs({ source: options.file }));
