// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Character classification for mail related grammar parts: whether a
 * character belongs to `atext`, `ctext`, `dtext`, `qtext`, `token` and
 * related charsets.
 * @module mail-charsets
 * @version 0.1.0
 */

// --- Re-export all public APIs ---

// Classification
export {
  Charset,
  CHARSET_NAMES,
  LookupResult,
  contains,
  containsOrNonAscii,
  lookup,
  is,
  isInclNonAscii,
} from "./charset.ts";
export type { CharLike, CharsetName } from "./charset.ts";

// Charsets grouped by RFC
export { rfc5322, rfc2045, rfc6838, rfc7230 } from "./rfc.ts";

// Standalone predicates
export { isWs, isVchar } from "./predicates.ts";

// Grammar provenance
export { getCharsetDefinition, getCharsetDefinitions } from "./grammar.ts";
export type { CharsetDefinition, CodePointRange } from "./grammar.ts";

// Table access and diagnostics
export { getLookupTable } from "./lookup-table.ts";
export {
  describeChar,
  verifyLookupTable,
  assertLookupTableIntegrity,
} from "./diagnostics.ts";
export type { LookupTableReport } from "./diagnostics.ts";

// Errors
export * from "./errors.ts";

// Configuration
export {
  getLoggingConfig,
  setLoggingConfig,
  getDiagnosticsConfig,
  setDiagnosticsConfig,
  setAppEnvironment,
  sealConfig,
  freezeConfig,
  isConfigSealed,
  MAX_REPORTABLE_MISMATCHES,
} from "./config.ts";
export type { LoggingConfig, DiagnosticsConfig } from "./config.ts";

// Environment
export { environment, isDevelopment } from "./environment.ts";

// Logger
export { createLogger } from "./logger.ts";
export type { Logger, LogLevel } from "./logger.ts";
