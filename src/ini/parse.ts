// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Full parser: classifies every line and folds it into builders, producing a
 * complete `IniFile`. Unparsable lines are reported through the Effect
 * logger and skipped.
 */

import { Chunk, Effect } from "effect";
import type { GrammarError } from "../lib/errors";
import { trimmedLines } from "../lib/str";
import type { IniFile } from "./file";
import { type FileBuilder, buildFile, flushSection, makeFileBuilder } from "./file-builder";
import { type Classifier, type Line, classifyLine, logUnparsable, matchLine } from "./grammar";
import { type SectionBuilder, addKeyValuePair, makeSectionBuilder } from "./section-builder";
import { Named, globalId } from "./section-id";

interface ParseState {
  readonly file: FileBuilder;
  /** Section whose entries are being read; starts as the implicit global one. */
  readonly current: SectionBuilder;
}

const initialState = (): ParseState => ({
  file: makeFileBuilder(),
  current: makeSectionBuilder(globalId),
});

const describeSection = ({ id, entries }: SectionBuilder): string => {
  const label = id._tag === "Global" ? "global section" : `section [${id.name}]`;
  return `${label} (${Chunk.size(entries)} entries)`;
};

const step = (state: ParseState, line: Line): Effect.Effect<ParseState> =>
  matchLine(line, {
    Blank: () => Effect.succeed(state),
    KeyValue: ({ key, value }) =>
      Effect.logDebug(`Entry ${key}=${value}`).pipe(
        Effect.as({ ...state, current: addKeyValuePair(key, value)(state.current) })
      ),
    SectionHeader: ({ name }) =>
      Effect.logDebug(`Header [${name}]: closing ${describeSection(state.current)}`).pipe(
        Effect.as({
          file: flushSection(state.current)(state.file),
          current: makeSectionBuilder(Named({ name })),
        })
      ),
    Unparsable: ({ text }) => logUnparsable(text).pipe(Effect.as(state)),
  });

/**
 * Parse INI text into an `IniFile`.
 *
 * Fails only with `GrammarError`, which means the classifier is broken; bad
 * input never fails a parse. `classify` defaults to the INI grammar.
 */
export const parse = (
  text: string,
  classify: Classifier = classifyLine
): Effect.Effect<IniFile, GrammarError> =>
  Effect.gen(function* () {
    const state = yield* Effect.reduce(
      trimmedLines(text),
      initialState(),
      (acc, [lineNumber, raw]) =>
        classify(raw).pipe(
          Effect.flatMap((line) => step(acc, line)),
          Effect.annotateLogs({ line: lineNumber })
        )
    );

    yield* Effect.logDebug(`End of input: closing ${describeSection(state.current)}`);
    return buildFile(flushSection(state.current)(state.file));
  });
