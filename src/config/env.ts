// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * This module follows "functional core, imperative shell" philosophy:
 * - All exports are pure Config<A> values (no effects executed)
 * - Configs are composed using combinators (all, map, nested, withDefault)
 * - Effects are only yielded at the application boundary (CLI)
 */

import { Config, ConfigProvider, type Option } from "effect";
import {
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values";

// ============================================================================
// Type Definitions (Pure Data)
// ============================================================================

/**
 * Environment configuration shape. Unset variables are `None`; defaults are
 * applied by `resolve`, after CLI flags.
 */
export interface EnvConfig {
  readonly logging: {
    readonly level: Option.Option<LogLevel>;
    readonly format: Option.Option<LogFormat>;
  };
  readonly debug: boolean;
}

// ============================================================================
// Primitive Configs (Building Blocks)
// ============================================================================

const logLevelField: Config.Config<LogLevel> = Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL");

const logFormatField: Config.Config<LogFormat> =
  Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT");

/**
 * Log level with INIQ_ namespace (INIQ_LOG_LEVEL).
 */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(logLevelField),
  "INIQ"
);

/**
 * Log format with INIQ_ namespace (INIQ_LOG_FORMAT).
 */
export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(logFormatField),
  "INIQ"
);

/**
 * Debug mode flag (INIQ_DEBUG). When true, forces log level to debug.
 */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "INIQ"
);

// ============================================================================
// Composite Config (Pure Transformation)
// ============================================================================

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  LogLevelOptionConfig,
  LogFormatOptionConfig,
  DebugModeConfig,
]).pipe(
  Config.map(([level, format, debug]) => ({
    logging: { level, format },
    debug,
  }))
);

// ============================================================================
// Test Utilities (Pure Functions)
// ============================================================================

const envVarNames = {
  logLevel: "INIQ_LOG_LEVEL",
  logFormat: "INIQ_LOG_FORMAT",
  debug: "INIQ_DEBUG",
} as const;

export interface TestConfigOverrides {
  readonly logLevel?: string;
  readonly logFormat?: string;
  readonly debug?: string;
}

/**
 * Create a ConfigProvider for testing. Only the overrides given are present,
 * so unset variables fall through to their defaults.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const env = Effect.runSync(Effect.withConfigProvider(EnvConfigSpec, provider));
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const entries = new Map<string, string>();
  if (overrides.logLevel !== undefined) {
    entries.set(envVarNames.logLevel, overrides.logLevel);
  }
  if (overrides.logFormat !== undefined) {
    entries.set(envVarNames.logFormat, overrides.logFormat);
  }
  if (overrides.debug !== undefined) {
    entries.set(envVarNames.debug, overrides.debug);
  }
  return ConfigProvider.fromMap(entries, { pathDelim: "_" });
};
