// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Line classifier. Each trimmed line is exactly one of blank, key/value,
 * section header or unparsable. Key/value is tried first, so `[a=b]` is an
 * entry with key `[a` and value `b]`, not a header.
 */

import { Data, Effect, Either } from "effect";
import { ErrorCode, GrammarError } from "../lib/errors";

export const ENTRY_KEY_GROUP_NAME = "key";
export const ENTRY_VALUE_GROUP_NAME = "value";
export const SECTION_NAME_GROUP_NAME = "section_name";

/** Compiled once; the patterns carry no `g`/`y` flag, so `exec` keeps no state between calls. */
const KEY_VALUE_PATTERN = new RegExp(
  `^\\s*(?<${ENTRY_KEY_GROUP_NAME}>[^=\\s]+)\\s*=\\s*(?<${ENTRY_VALUE_GROUP_NAME}>[^=\\s]+)\\s*$`
);

/** Greedy interior: the name runs from the first `[` to the last `]`. */
const SECTION_HEADER_PATTERN = new RegExp(`^\\[(?<${SECTION_NAME_GROUP_NAME}>[\\s\\S]+)\\]$`);

export type Line = Data.TaggedEnum<{
  Blank: object;
  KeyValue: { readonly key: string; readonly value: string };
  SectionHeader: { readonly name: string };
  Unparsable: { readonly text: string };
}>;

export const { Blank, KeyValue, SectionHeader, Unparsable, $match: matchLine } =
  Data.taggedEnum<Line>();

const missingGroup = (group: string): GrammarError =>
  new GrammarError({
    code: ErrorCode.GRAMMAR_DEFECT,
    message: `Regex match, but the named group ${group} was not found: did the capture group name change?`,
    group,
  });

/** Fails with `GrammarError` when `group` is not one of the pattern's named groups. */
export const captureGroup = (
  match: RegExpExecArray,
  group: string
): Either.Either<string, GrammarError> => {
  const captured = match.groups?.[group];
  return captured === undefined ? Either.left(missingGroup(group)) : Either.right(captured);
};

export const classifyKeyValue = (match: RegExpExecArray): Either.Either<Line, GrammarError> =>
  Either.all([
    captureGroup(match, ENTRY_KEY_GROUP_NAME),
    captureGroup(match, ENTRY_VALUE_GROUP_NAME),
  ]).pipe(Either.map(([key, value]) => KeyValue({ key, value })));

export const classifySectionHeader = (match: RegExpExecArray): Either.Either<Line, GrammarError> =>
  captureGroup(match, SECTION_NAME_GROUP_NAME).pipe(Either.map((name) => SectionHeader({ name })));

export type Classifier = (line: string) => Either.Either<Line, GrammarError>;

/**
 * Classify one line. The line is expected to be trimmed already; an
 * untrimmed header such as `" [a] "` is unparsable.
 */
export const classifyLine: Classifier = (line) => {
  if (line.length === 0) {
    return Either.right(Blank());
  }

  const keyValue = KEY_VALUE_PATTERN.exec(line);
  if (keyValue !== null) {
    return classifyKeyValue(keyValue);
  }

  const header = SECTION_HEADER_PATTERN.exec(line);
  if (header !== null) {
    return classifySectionHeader(header);
  }

  return Either.right(Unparsable({ text: line }));
};

/** Unparsable lines are not errors; both scanners report them here and move on. */
export const logUnparsable = (text: string): Effect.Effect<void> =>
  Effect.logWarning(`Skipping unparsable non-empty line: ${text}`);
