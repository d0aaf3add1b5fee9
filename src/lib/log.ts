// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Raw program output. These bypass the Effect logger on purpose: results and
 * the final error line must appear even when diagnostics are silenced.
 */

import { Effect } from "effect";
import { colorize } from "./effect-logger";

/** Command results (values, dumps, section lists). */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

/** Styled `✗ message` line on stderr. */
export const writeFailure = (message: string, useColor: boolean): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(`${colorize("red", "✗", useColor)} ${message}\n`);
  });
