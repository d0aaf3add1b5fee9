// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Direct lookup: answers one `(key, section?)` query in a single pass over
 * the text, without building an `IniFile`. Stops at the first match, and in
 * scoped mode also stops at the header that closes the target section.
 *
 * Scoped and full-parse lookups can disagree when a section name is declared
 * twice: the scanner searches the first body only, the parser keeps the last.
 */

import { Data, Effect, Match, Option, pipe } from "effect";
import type { GrammarError } from "../lib/errors";
import { trimmedLines } from "../lib/str";
import { type Classifier, type Line, classifyLine, logUnparsable } from "./grammar";

/**
 * - `Anywhere`: no section given; headers are ignored and the first matching
 *   key in the whole file wins, even inside a named section.
 * - `Seeking`: looking for the target header; entries are skipped.
 * - `Inside`: in the target body; the next header ends the search.
 */
export type ScanMode = Data.TaggedEnum<{
  Anywhere: object;
  Seeking: { readonly section: string };
  Inside: { readonly section: string };
}>;

export const { Anywhere, Seeking, Inside } = Data.taggedEnum<ScanMode>();

export type ScanDecision = Data.TaggedEnum<{
  Continue: { readonly mode: ScanMode };
  Found: { readonly value: string };
  Exhausted: object;
}>;

export const { Continue, Found, Exhausted } = Data.taggedEnum<ScanDecision>();

export const initialScanMode = (section: Option.Option<string>): ScanMode =>
  Option.match(section, {
    onNone: (): ScanMode => Anywhere(),
    onSome: (name): ScanMode => Seeking({ section: name }),
  });

const keyMatches = (line: Line, key: string): Option.Option<string> =>
  line._tag === "KeyValue" && line.key === key ? Option.some(line.value) : Option.none();

const foundOr = (line: Line, key: string, otherwise: ScanDecision): ScanDecision =>
  Option.match(keyMatches(line, key), {
    onNone: (): ScanDecision => otherwise,
    onSome: (value): ScanDecision => Found({ value }),
  });

/** One transition of the scanner; pure so every mode can be tested line by line. */
export const scanStep = (mode: ScanMode, line: Line, key: string): ScanDecision =>
  pipe(
    Match.value(mode),
    Match.tag("Anywhere", () => foundOr(line, key, Continue({ mode }))),
    Match.tag("Seeking", ({ section }) =>
      line._tag === "SectionHeader" && line.name === section
        ? Continue({ mode: Inside({ section }) })
        : Continue({ mode })
    ),
    Match.tag("Inside", () =>
      line._tag === "SectionHeader" ? Exhausted() : foundOr(line, key, Continue({ mode }))
    ),
    Match.exhaustive
  );

/**
 * Look up `key`, optionally restricted to the named section.
 *
 * Absence is `Option.none()`, not a failure; the only failure is a
 * `GrammarError` from the classifier.
 */
export const find = (
  text: string,
  key: string,
  section: Option.Option<string> = Option.none(),
  classify: Classifier = classifyLine
): Effect.Effect<Option.Option<string>, GrammarError> =>
  Effect.gen(function* () {
    let mode = initialScanMode(section);

    for (const [lineNumber, raw] of trimmedLines(text)) {
      const line = yield* classify(raw);
      if (line._tag === "Unparsable") {
        yield* logUnparsable(line.text).pipe(Effect.annotateLogs({ line: lineNumber }));
      }

      const decision = scanStep(mode, line, key);
      if (decision._tag === "Found") {
        yield* Effect.logDebug(`Found ${key} on line ${lineNumber}`);
        return Option.some(decision.value);
      }
      if (decision._tag === "Exhausted") {
        yield* Effect.logDebug(`Section ended on line ${lineNumber} without ${key}`);
        return Option.none();
      }
      mode = decision.mode;
    }

    yield* Effect.logDebug(`End of input reached without ${key}`);
    return Option.none();
  });
