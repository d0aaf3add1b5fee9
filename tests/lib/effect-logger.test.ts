// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, HashMap, LogLevel } from "effect";
import { describe, expect, test } from "vitest";
import { colorize, detectColor, formatJson, formatPretty } from "../../src/lib/effect-logger";

const annotations = HashMap.fromIterable<string, unknown>([
  ["source", "app.ini"],
  ["line", 3],
]);

describe("effect-logger", () => {
  describe("formatPretty", () => {
    test("prefixes source and line", () => {
      expect(formatPretty(LogLevel.Warning, "skipped", annotations, Cause.empty, false)).toBe(
        "WARN  [app.ini] line 3: skipped"
      );
    });

    test("no prefix without annotations", () => {
      expect(formatPretty(LogLevel.Debug, "hello", HashMap.empty(), Cause.empty, false)).toBe(
        "DEBUG hello"
      );
    });

    test("colours the level", () => {
      expect(formatPretty(LogLevel.Error, "boom", HashMap.empty(), Cause.empty, true)).toBe(
        "\x1b[31mERROR\x1b[0m boom"
      );
    });

    test("ignores a non-numeric line annotation", () => {
      const odd = HashMap.fromIterable<string, unknown>([["line", "three"]]);
      expect(formatPretty(LogLevel.Info, "x", odd, Cause.empty, false)).toBe("INFO  x");
    });
  });

  describe("formatJson", () => {
    test("one object with lowercase level and annotations", () => {
      const date = new Date("2026-01-02T03:04:05.000Z");
      expect(JSON.parse(formatJson(LogLevel.Warning, "skipped", annotations, date))).toEqual({
        timestamp: "2026-01-02T03:04:05.000Z",
        level: "warn",
        source: "app.ini",
        message: "skipped",
        line: 3,
      });
    });
  });

  describe("detectColor", () => {
    test("NO_COLOR wins over FORCE_COLOR", () => {
      expect(detectColor({ NO_COLOR: "1", FORCE_COLOR: "1" })).toBe(false);
    });

    test("FORCE_COLOR enables colour", () => {
      expect(detectColor({ FORCE_COLOR: "1" })).toBe(true);
    });
  });

  describe("colorize", () => {
    test("returns text unchanged when disabled", () => {
      expect(colorize("red", "x", false)).toBe("x");
    });

    test("wraps text in escape codes when enabled", () => {
      expect(colorize("green", "ok", true)).toBe("\x1b[32mok\x1b[0m");
    });
  });
});
