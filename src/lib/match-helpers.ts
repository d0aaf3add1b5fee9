// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Helpers for turning unknown thrown values into error constructor props.
 */

import { Match, pipe } from "effect";

/**
 * Extract cause from unknown error for error constructors.
 *
 * @example
 * new SystemError({
 *   code: ErrorCode.FILE_READ_FAILED,
 *   message: `Failed to read ${path}`,
 *   ...extractCauseProps(e),
 * })
 */
export const extractCauseProps = (e: unknown): { readonly cause?: Error } =>
  pipe(
    Match.value(e),
    Match.when(Match.instanceOf(Error), (err) => ({ cause: err })),
    Match.orElse(() => ({}))
  );

/** Replaces: `e instanceof Error ? e.message : String(e)` */
export const extractMessage = (e: unknown): string =>
  pipe(
    Match.value(e),
    Match.when(Match.instanceOf(Error), (err) => err.message),
    Match.orElse(() => String(e))
  );
