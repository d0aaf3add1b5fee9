// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Line-level string helpers for the INI scanners.
 */

/**
 * Lazily yields the lines of `text` split on `\n`, with a trailing `\r`
 * dropped. A final empty line after a terminating newline is not yielded.
 * Walking the text with `indexOf` keeps auxiliary space constant, which the
 * single-key scanner relies on.
 */
export function* lines(text: string): Generator<string, void, undefined> {
  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf("\n", start);
    const end = newline === -1 ? text.length : newline;
    const line = text.slice(start, end);
    yield line.endsWith("\r") ? line.slice(0, -1) : line;
    start = end + 1;
  }
}

/** Lines with surrounding whitespace removed, paired with their 1-based number. */
export function* trimmedLines(
  text: string
): Generator<readonly [number, string], void, undefined> {
  let lineNumber = 0;
  for (const line of lines(text)) {
    lineNumber += 1;
    yield [lineNumber, line.trim()] as const;
  }
}
