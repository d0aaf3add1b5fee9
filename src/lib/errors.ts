// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for iniq.
 * Uses typed error codes that map to exit codes.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;

  // Input (10-19)
  readonly FILE_NOT_FOUND: 10;
  readonly FILE_READ_FAILED: 11;

  // Grammar (20-29)
  readonly GRAMMAR_DEFECT: 20;

  // Lookup (30-39)
  readonly KEY_NOT_FOUND: 30;
  readonly SECTION_NOT_FOUND: 31;
}

/**
 * Error codes for all iniq operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  // General (0-9)
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,

  // Input (10-19)
  FILE_NOT_FOUND: 10,
  FILE_READ_FAILED: 11,

  // Grammar (20-29)
  GRAMMAR_DEFECT: 20,

  // Lookup (30-39)
  KEY_NOT_FOUND: 30,
  SECTION_NOT_FOUND: 31,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

type GeneralErrorCode = ErrorCodeMap["GENERAL_ERROR"] | ErrorCodeMap["INVALID_ARGS"];
type SystemErrorCode = ErrorCodeMap["FILE_NOT_FOUND"] | ErrorCodeMap["FILE_READ_FAILED"];
type LookupErrorCode = ErrorCodeMap["KEY_NOT_FOUND"] | ErrorCodeMap["SECTION_NOT_FOUND"];

/** Argument and catch-all failures. */
export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** The input source could not supply the text. */
export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

/**
 * A grammar pattern matched but one of its named capture groups could not be
 * read back. Means the classifier and its callers disagree on the grammar, so
 * it is never retried and never produced by user data.
 */
export class GrammarError extends Data.TaggedError("GrammarError")<{
  readonly code: ErrorCodeMap["GRAMMAR_DEFECT"];
  readonly message: string;
  readonly group: string;
}> {}

/**
 * Raised by the CLI only. The library reports absence as `Option.none()`;
 * turning it into a failing exit status is the caller's decision.
 */
export class LookupError extends Data.TaggedError("LookupError")<{
  readonly code: LookupErrorCode;
  readonly message: string;
}> {}

export type IniqError = GeneralError | SystemError | GrammarError | LookupError;

const ERROR_TAGS: ReadonlySet<string> = new Set([
  "GeneralError",
  "SystemError",
  "GrammarError",
  "LookupError",
]);

/** Narrows failures coming out of `@effect/cli` (which have no code) from ours. */
export const isIniqError = (err: unknown): err is IniqError =>
  typeof err === "object" &&
  err !== null &&
  "_tag" in err &&
  typeof err._tag === "string" &&
  ERROR_TAGS.has(err._tag) &&
  "code" in err &&
  "message" in err;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};
