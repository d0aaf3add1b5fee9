// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Custom logger so parser diagnostics read the same in pretty and JSON mode
 * and never land on stdout, which carries command results.
 */

import { Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogLevel as IniqLogLevel, LogFormat } from "../config/field-values";

type ColorName = "red" | "green" | "yellow" | "blue" | "cyan" | "gray" | "white";

const ANSI_CODES: Readonly<Record<ColorName, string>> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
};

const RESET = "\x1b[0m";

const toEffectLogLevel = (level: IniqLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.when("silent", () => LogLevel.None),
    Match.exhaustive
  );

/** NO_COLOR wins over FORCE_COLOR; otherwise colour only when stderr is a terminal. */
export const detectColor = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const noColor = env["NO_COLOR"];
  if (noColor !== undefined && noColor !== "") {
    return false;
  }
  const forceColor = env["FORCE_COLOR"];
  if (forceColor !== undefined && forceColor !== "0") {
    return true;
  }
  return process.stderr.isTTY === true;
};

export const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? `${ANSI_CODES[color]}${text}${RESET}` : text;

/** Extracts typed string annotation, returning None if absent or wrong type. */
const getStringAnnotation = (
  annotations: HashMap.HashMap<string, unknown>,
  key: string
): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

/** Formats error cause chain, returning empty string for non-errors to avoid noise. */
const formatCause = (cause: Cause.Cause<unknown>): string =>
  pipe(
    Match.value(Cause.isEmpty(cause)),
    Match.when(true, () => ""),
    Match.when(false, () => `\n${Cause.pretty(cause)}`),
    Match.exhaustive
  );

/** `source` and `line` annotations become a `[path] line N:` prefix pointing back into the input. */
export const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string => {
  const levelColor = pipe(
    Option.fromNullable(LEVEL_COLORS[logLevel.label]),
    Option.getOrElse((): ColorName => "white")
  );
  const levelStr = colorize(levelColor, logLevel.label.padEnd(5), useColor);
  const sourceStr = pipe(
    getStringAnnotation(annotations, "source"),
    Option.match({
      onNone: (): string => "",
      onSome: (src): string => `${colorize("cyan", `[${src}]`, useColor)} `,
    })
  );
  const lineStr = pipe(
    HashMap.get(annotations, "line"),
    Option.filter((v): v is number => typeof v === "number"),
    Option.match({
      onNone: (): string => "",
      onSome: (n): string => `${colorize("cyan", `line ${n}:`, useColor)} `,
    })
  );
  return `${levelStr} ${sourceStr}${lineStr}${message}${formatCause(cause)}`;
};

export const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string => {
  const source = getStringAnnotation(annotations, "source");
  return JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    ...pipe(
      source,
      Option.match({
        onNone: (): Record<string, never> => ({}),
        onSome: (s): { readonly source: string } => ({ source: s }),
      })
    ),
    message,
    ...Object.fromEntries(
      Array.from(HashMap.toEntries(annotations)).filter(([k]) => k !== "source")
    ),
  });
};

/** Logger factory dispatching to pretty or JSON format. Everything goes to stderr. */
const IniqLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const msg = Array.isArray(message) ? message.map(String).join(" ") : String(message);

    const output = pipe(
      Match.value(format),
      Match.when("json", () => formatJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, useColor)),
      Match.exhaustive
    );

    process.stderr.write(`${output}\n`);
  });

export const IniqLoggerLive = (options: {
  readonly level: IniqLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> => {
  const useColor = options.color ?? detectColor();
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, IniqLogger(options.format, useColor)),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
};
