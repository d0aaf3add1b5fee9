// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `iniq sections <file>` - names of the declared sections, in declaration
 * order. The implicit global section is not listed.
 */

import type { FileSystem, Path } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import { sectionNames } from "../../ini/file";
import { parse } from "../../ini/parse";
import type { GrammarError, SystemError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { readIniText } from "../../system/fs";

export interface SectionsOptions {
  readonly file: string;
  readonly format: LogFormat;
}

export const executeSections = (
  options: SectionsOptions
): Effect.Effect<void, SystemError | GrammarError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const text = yield* readIniText(options.file);
    const names = sectionNames(yield* parse(text));

    yield* pipe(
      Match.value(options.format),
      Match.when("pretty", () => Effect.forEach(names, writeOutput, { discard: true })),
      Match.when("json", () => writeOutput(JSON.stringify(names))),
      Match.exhaustive
    );
  }).pipe(Effect.annotateLogs({ source: options.file }));
