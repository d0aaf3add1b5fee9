// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Exit, Option } from "effect";
import { describe, expect, test } from "vitest";
import { createTestConfigProvider, type TestConfigOverrides } from "../../src/config/env";
import { type CommandContext, resolveContext } from "../../src/cli/index";
import { type GlobalOptions, effectiveFormat, flagLogLevel } from "../../src/cli/options";
import { failureOf } from "../helpers/layers";

const noFlags: GlobalOptions = {
  verbose: false,
  quiet: false,
  logLevel: Option.none(),
  format: Option.none(),
  json: false,
};

const contextFor = (
  flags: Partial<GlobalOptions>,
  env: TestConfigOverrides = {}
): Pick<CommandContext, "format" | "logLevel"> => {
  const { format, logLevel } = Effect.runSync(
    Effect.withConfigProvider(
      resolveContext({ ...noFlags, ...flags }),
      createTestConfigProvider(env)
    )
  );
  return { format, logLevel };
};

describe("options", () => {
  describe("effectiveFormat", () => {
    test("--json wins over --format", () => {
      expect(Option.getOrNull(effectiveFormat({ ...noFlags, json: true, format: Option.some("pretty") }))).toBe(
        "json"
      );
    });

    test("falls back to --format", () => {
      expect(Option.isNone(effectiveFormat(noFlags))).toBe(true);
    });
  });

  describe("flagLogLevel", () => {
    test("--verbose beats --quiet", () => {
      expect(Option.getOrNull(flagLogLevel({ ...noFlags, verbose: true, quiet: true }))).toBe(
        "debug"
      );
    });

    test("--quiet is silent", () => {
      expect(Option.getOrNull(flagLogLevel({ ...noFlags, quiet: true }))).toBe("silent");
    });

    test("--log-level otherwise", () => {
      expect(Option.getOrNull(flagLogLevel({ ...noFlags, logLevel: Option.some("info") }))).toBe(
        "info"
      );
    });
  });
});

describe("resolveContext", () => {
  test("defaults", () => {
    expect(contextFor({})).toEqual({ format: "pretty", logLevel: "warn" });
  });

  test("environment applies when no flag is given", () => {
    expect(contextFor({}, { logLevel: "error", logFormat: "json" })).toEqual({
      format: "json",
      logLevel: "error",
    });
  });

  test("flags beat the environment", () => {
    expect(
      contextFor({ quiet: true, format: Option.some("pretty") }, { logLevel: "debug", logFormat: "json" })
    ).toEqual({ format: "pretty", logLevel: "silent" });
  });

  test("INIQ_DEBUG forces debug", () => {
    expect(contextFor({ quiet: true }, { debug: "true" }).logLevel).toBe("debug");
  });

  test("invalid environment is an argument error", () => {
    const exit = Effect.runSyncExit(
      Effect.withConfigProvider(resolveContext(noFlags), createTestConfigProvider({ logFormat: "xml" }))
    );
    expect(Exit.isFailure(exit)).toBe(true);
    const err = Option.getOrThrow(failureOf(exit));
    expect(err._tag).toBe("GeneralError");
    expect(err.code).toBe(2);
  });
});
