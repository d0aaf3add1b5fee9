// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Input source for the CLI: reads an INI file through @effect/platform's
 * FileSystem so tests can swap in an in-memory layer.
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { ErrorCode, SystemError } from "../lib/errors";
import { extractCauseProps } from "../lib/match-helpers";

export const INI_EXTENSION = ".ini";

/** Warns (but still reads) when the extension is not `.ini`. */
export const readIniText = (
  filePath: string
): Effect.Effect<string, SystemError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    if (path.extname(filePath) !== INI_EXTENSION) {
      yield* Effect.logWarning("Specified file does not have an .ini extension!");
    }

    return yield* fs.readFileString(filePath).pipe(
      Effect.mapError((e) =>
        e._tag === "SystemError" && e.reason === "NotFound"
          ? new SystemError({
              code: ErrorCode.FILE_NOT_FOUND,
              message: `File not found: ${filePath}`,
              path: filePath,
              ...extractCauseProps(e),
            })
          : new SystemError({
              code: ErrorCode.FILE_READ_FAILED,
              message: `Failed to read file: ${filePath}: ${e.message}`,
              path: filePath,
              ...extractCauseProps(e),
            })
      )
    );
  });
