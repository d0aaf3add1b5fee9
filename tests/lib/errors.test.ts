// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import {
  ErrorCode,
  GeneralError,
  GrammarError,
  LookupError,
  SystemError,
  getErrorCodeName,
  isIniqError,
  toExitCode,
} from "../../src/lib/errors";

describe("errors", () => {
  describe("toExitCode", () => {
    test("passes small codes through", () => {
      expect(toExitCode(ErrorCode.SUCCESS)).toBe(0);
      expect(toExitCode(ErrorCode.KEY_NOT_FOUND)).toBe(30);
    });
  });

  describe("getErrorCodeName", () => {
    test("finds the name of a code", () => {
      expect(getErrorCodeName(ErrorCode.SECTION_NOT_FOUND)).toBe("SECTION_NOT_FOUND");
      expect(getErrorCodeName(ErrorCode.GRAMMAR_DEFECT)).toBe("GRAMMAR_DEFECT");
    });
  });

  describe("isIniqError", () => {
    test("accepts every error class", () => {
      const errors = [
        new GeneralError({ code: ErrorCode.INVALID_ARGS, message: "bad flag" }),
        new SystemError({ code: ErrorCode.FILE_NOT_FOUND, message: "gone", path: "/x.ini" }),
        new GrammarError({ code: ErrorCode.GRAMMAR_DEFECT, message: "broken", group: "key" }),
        new LookupError({ code: ErrorCode.KEY_NOT_FOUND, message: "absent" }),
      ];
      expect(errors.map(isIniqError)).toEqual([true, true, true, true]);
    });

    test("rejects plain errors and foreign tags", () => {
      expect(isIniqError(new Error("x"))).toBe(false);
      expect(isIniqError({ _tag: "ValidationError", code: 1, message: "x" })).toBe(false);
      expect(isIniqError(null)).toBe(false);
      expect(isIniqError("LookupError")).toBe(false);
    });
  });

  test("tagged errors keep their fields", () => {
    const err = new LookupError({ code: ErrorCode.SECTION_NOT_FOUND, message: "no [db]" });
    expect(err._tag).toBe("LookupError");
    expect(err.code).toBe(31);
    expect(err.message).toBe("no [db]");
  });
});
