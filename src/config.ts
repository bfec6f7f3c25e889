// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Public API for configuring the library's ambient behaviour (logging and
 * diagnostics). Nothing here changes how a character is classified.
 * @module
 */

import {
  InvalidConfigurationError,
  InvalidParameterError,
  makeInvalidParameterError,
} from "./errors.ts";
import { environment, type AppEnvironment } from "./environment.ts";

/** Upper bound for `maxReportedMismatches`; 128 code points × 8 sets. */
export const MAX_REPORTABLE_MISMATCHES = 1_024 as const;

export type LoggingConfig = {
  /**
   * Master switch for the development logger. Logging is always off in
   * production regardless of this flag.
   */
  readonly enabled: boolean;
};

export type DiagnosticsConfig = {
  /**
   * How many individual mismatches a lookup table verification report
   * carries. The total count is always reported in full.
   */
  readonly maxReportedMismatches: number;
};

const DEFAULT_LOGGING_CONFIG: LoggingConfig = Object.freeze({
  enabled: true,
});

const DEFAULT_DIAGNOSTICS_CONFIG: DiagnosticsConfig = Object.freeze({
  maxReportedMismatches: 32,
});

let _loggingConfig: LoggingConfig = DEFAULT_LOGGING_CONFIG;
let _diagnosticsConfig: DiagnosticsConfig = DEFAULT_DIAGNOSTICS_CONFIG;
let _sealed = false;

function assertNotSealed(): void {
  if (_sealed) {
    throw new InvalidConfigurationError(
      "Configuration is sealed and cannot be changed.",
    );
  }
}

function assertKnownKeys(
  cfg: object,
  allowed: readonly string[],
  context: string,
): void {
  for (const key of Object.keys(cfg)) {
    if (!allowed.includes(key)) {
      throw makeInvalidParameterError(`unknown option "${key}".`, context);
    }
  }
}

export function getLoggingConfig(): LoggingConfig {
  return Object.freeze({ ..._loggingConfig });
}

export function setLoggingConfig(cfg: Partial<LoggingConfig>): void {
  assertNotSealed();
  assertKnownKeys(cfg, ["enabled"], "setLoggingConfig");
  if (cfg.enabled !== undefined && typeof cfg.enabled !== "boolean") {
    throw new InvalidParameterError("enabled must be a boolean.");
  }
  _loggingConfig = Object.freeze({
    enabled: cfg.enabled ?? _loggingConfig.enabled,
  });
}

export function getDiagnosticsConfig(): DiagnosticsConfig {
  return Object.freeze({ ..._diagnosticsConfig });
}

export function setDiagnosticsConfig(cfg: Partial<DiagnosticsConfig>): void {
  assertNotSealed();
  assertKnownKeys(cfg, ["maxReportedMismatches"], "setDiagnosticsConfig");
  const { maxReportedMismatches } = cfg;
  if (maxReportedMismatches !== undefined) {
    if (
      typeof maxReportedMismatches !== "number" ||
      !Number.isInteger(maxReportedMismatches) ||
      maxReportedMismatches < 1 ||
      maxReportedMismatches > MAX_REPORTABLE_MISMATCHES
    ) {
      throw new InvalidParameterError(
        `maxReportedMismatches must be an integer between 1 and ${MAX_REPORTABLE_MISMATCHES}.`,
      );
    }
  }
  _diagnosticsConfig = Object.freeze({
    maxReportedMismatches:
      maxReportedMismatches ?? _diagnosticsConfig.maxReportedMismatches,
  });
}

/**
 * Explicitly sets the application's environment.
 * @param env The environment to set ('development' or 'production').
 */
export function setAppEnvironment(env: AppEnvironment): void {
  assertNotSealed();
  if (env !== "development" && env !== "production") {
    throw new InvalidParameterError(
      'Environment must be either "development" or "production".',
    );
  }
  environment.setExplicitEnv(env);
}

/**
 * Seals the configuration. Call once at application startup after all
 * configuration is complete; every setter throws afterwards.
 */
export function sealConfig(): void {
  _sealed = true;
}

/** Alias for {@link sealConfig}. */
export function freezeConfig(): void {
  sealConfig();
}

export function isConfigSealed(): boolean {
  return _sealed;
}

/**
 * Restores every default and unseals. Test-only.
 *
 * An explicit environment is test state too and is dropped first, so the
 * production check below sees the process's own `NODE_ENV`. In production it
 * throws unless `MAIL_CHARSETS_ALLOW_TEST_APIS=true` or
 * `globalThis.__MAIL_CHARSETS_ALLOW_TEST_APIS === true`.
 */
export function __test_resetConfig(): void {
  environment.clearCache();
  if (environment.isProduction && !testApisAllowed()) {
    throw new InvalidConfigurationError(
      "Test-only APIs are disabled in production. Set MAIL_CHARSETS_ALLOW_TEST_APIS=true or globalThis.__MAIL_CHARSETS_ALLOW_TEST_APIS = true to allow them.",
    );
  }
  _loggingConfig = DEFAULT_LOGGING_CONFIG;
  _diagnosticsConfig = DEFAULT_DIAGNOSTICS_CONFIG;
  _sealed = false;
}

function testApisAllowed(): boolean {
  if (
    typeof process !== "undefined" &&
    process.env["MAIL_CHARSETS_ALLOW_TEST_APIS"] === "true"
  ) {
    return true;
  }
  return Reflect.get(globalThis, "__MAIL_CHARSETS_ALLOW_TEST_APIS") === true;
}
