// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `iniq dump <file> [--section name]` - full parse, printed back as
 * normalized INI or as JSON.
 */

import type { FileSystem, Path } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import { type IniFile, getSectionByName } from "../../ini/file";
import { formatIniFile, formatNamedSection, toJson } from "../../ini/format";
import { parse } from "../../ini/parse";
import type { Section } from "../../ini/section";
import { ErrorCode, type GrammarError, LookupError, type SystemError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { readIniText } from "../../system/fs";

export interface DumpOptions {
  readonly file: string;
  readonly section: Option.Option<string>;
  readonly format: LogFormat;
}

const renderFile = (file: IniFile, format: LogFormat): string =>
  pipe(
    Match.value(format),
    Match.when("pretty", () => formatIniFile(file).trimEnd()),
    Match.when("json", () => JSON.stringify(toJson(file), null, 2)),
    Match.exhaustive
  );

const renderSection = (name: string, section: Section, format: LogFormat): string =>
  pipe(
    Match.value(format),
    Match.when("pretty", () => formatNamedSection(name, section)),
    Match.when("json", () => JSON.stringify(section.entries, null, 2)),
    Match.exhaustive
  );

const selectSection = (file: IniFile, name: string): Effect.Effect<Section, LookupError> =>
  Option.match(getSectionByName(file, name), {
    onNone: (): Effect.Effect<Section, LookupError> =>
      Effect.fail(
        new LookupError({
          code: ErrorCode.SECTION_NOT_FOUND,
          message: `The file did not contain the section [${name}]`,
        })
      ),
    onSome: (section): Effect.Effect<Section, LookupError> => Effect.succeed(section),
  });

export const executeDump = (
  options: DumpOptions
): Effect.Effect<
  void,
  SystemError | GrammarError | LookupError,
  FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function* () {
    const text = yield* readIniText(options.file);
    const file = yield* parse(text);

    const output = yield* Option.match(options.section, {
      onNone: (): Effect.Effect<string, LookupError> =>
        Effect.succeed(renderFile(file, options.format)),
      onSome: (name): Effect.Effect<string, LookupError> =>
        selectSection(file, name).pipe(
          Effect.map((section) => renderSection(name, section, options.format))
        ),
    });

    yield* writeOutput(output);
  }).pipe(Effect.annotateLogs({ source: options.file }));
