// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either } from "effect";
import { describe, expect, test } from "vitest";
import {
  Blank,
  KeyValue,
  type Line,
  SectionHeader,
  Unparsable,
  captureGroup,
  classifyKeyValue,
  classifyLine,
  classifySectionHeader,
} from "../../src/ini/grammar";
import type { GrammarError } from "../../src/lib/errors";

const classify = (line: string): Line => Either.getOrThrow(classifyLine(line));

const execOrThrow = (pattern: RegExp, line: string): RegExpExecArray => {
  const match = pattern.exec(line);
  if (match === null) {
    throw new Error(`${pattern} did not match ${line}`);
  }
  return match;
};

const defectOf = <A>(result: Either.Either<A, GrammarError>): GrammarError =>
  Either.getOrThrow(Either.flip(result));

describe("classifyLine", () => {
  test("empty line is blank", () => {
    expect(classify("")).toEqual(Blank());
  });

  describe("key/value", () => {
    test("plain pair", () => {
      expect(classify("key=value")).toEqual(KeyValue({ key: "key", value: "value" }));
    });

    test("whitespace around the separator", () => {
      expect(classify("key \t=  value")).toEqual(KeyValue({ key: "key", value: "value" }));
    });

    test("punctuation is allowed in keys and values", () => {
      expect(classify("db.host=127.0.0.1:5432")).toEqual(
        KeyValue({ key: "db.host", value: "127.0.0.1:5432" })
      );
    });

    test("wins over a header that contains an equals sign", () => {
      expect(classify("[a=b]")).toEqual(KeyValue({ key: "[a", value: "b]" }));
    });
  });

  describe("section header", () => {
    test("plain name", () => {
      expect(classify("[server]")).toEqual(SectionHeader({ name: "server" }));
    });

    test("name may contain spaces", () => {
      expect(classify("[my section]")).toEqual(SectionHeader({ name: "my section" }));
    });

    test("name runs to the last bracket", () => {
      expect(classify("[a]b]")).toEqual(SectionHeader({ name: "a]b" }));
    });
  });

  describe("unparsable", () => {
    test.each([
      ["[]"],
      ["key="],
      ["=value"],
      ["a=b=c"],
      ["key = two words"],
      ["just text"],
      ["# comment"],
      ["[open"],
    ])("%s", (line) => {
      expect(classify(line)).toEqual(Unparsable({ text: line }));
    });
  });

  test("classification does not depend on earlier calls", () => {
    expect(classify("a=1")).toEqual(KeyValue({ key: "a", value: "1" }));
    expect(classify("a=1")).toEqual(KeyValue({ key: "a", value: "1" }));
  });

  describe("missing capture groups", () => {
    test("captureGroup fails on a match without named groups", () => {
      const err = defectOf(captureGroup(execOrThrow(/^(\w+)=(\w+)$/, "k=v"), "key"));
      expect(err._tag).toBe("GrammarError");
      expect(err.code).toBe(20);
      expect(err.group).toBe("key");
      expect(err.message).toBe(
        "Regex match, but the named group key was not found: did the capture group name change?"
      );
    });

    test("captureGroup reads a named group", () => {
      const match = execOrThrow(/^(?<key>\w+)=/, "k=");
      expect(Either.getOrThrow(captureGroup(match, "key"))).toBe("k");
    });

    test("key/value match without a value group", () => {
      const match = execOrThrow(/^(?<key>\w+)=(\w+)$/, "k=v");
      expect(defectOf(classifyKeyValue(match)).group).toBe("value");
    });

    test("header match without a name group", () => {
      const match = execOrThrow(/^\[(?<name>.+)\]$/, "[s]");
      expect(defectOf(classifySectionHeader(match)).group).toBe("section_name");
    });
  });
});
