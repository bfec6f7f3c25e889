// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import type { CharsetName } from "./charset.ts";

/**
 * Custom error classes for machine-readable error handling.
 * Classification itself never throws; these cover configuration and
 * table diagnostics only.
 * @module
 */

const MAX_LOGGED_MESSAGE_LENGTH = 256;

export class InvalidParameterError extends RangeError {
  public readonly code = "ERR_INVALID_PARAMETER";

  constructor(message: string) {
    super(`[mail-charsets] ${message}`);
    this.name = "InvalidParameterError";
  }
}

export class InvalidConfigurationError extends Error {
  public readonly code = "ERR_INVALID_CONFIGURATION";

  constructor(message: string) {
    super(`[mail-charsets] ${message}`);
    this.name = "InvalidConfigurationError";
  }
}

/** One disagreement between the lookup table and a grammar definition. */
export type TableMismatch = {
  readonly codePoint: number;
  readonly charset: CharsetName;
  readonly expected: boolean;
  readonly actual: boolean;
};

export class LookupTableIntegrityError extends Error {
  public readonly code = "ERR_LOOKUP_TABLE_INTEGRITY";

  constructor(
    public readonly mismatches: readonly TableMismatch[],
    public readonly mismatchCount: number = mismatches.length,
    public readonly malformedIndices: readonly number[] = [],
  ) {
    super(
      `[mail-charsets] Lookup table disagrees with the grammar definitions (mismatches=${mismatchCount}, malformed=${malformedIndices.length}).`,
    );
    this.name = "LookupTableIntegrityError";
  }
}

/**
 * Create a typed InvalidParameterError with optional context prefix.
 */
export function makeInvalidParameterError(
  detail: string,
  context?: string,
): InvalidParameterError {
  if (typeof context === "string" && context.length > 0) {
    return new InvalidParameterError(`${context}: ${detail}`);
  }
  return new InvalidParameterError(detail);
}

/**
 * Reduces an error to a small, bounded record suitable for logging.
 *
 * @param error - anything that was thrown
 */
export function sanitizeErrorForLogs(error: unknown): {
  readonly name?: string;
  readonly code?: string;
  readonly message: string;
} {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return {
      name: error.name,
      message: error.message.slice(0, MAX_LOGGED_MESSAGE_LENGTH),
      ...(typeof code === "string" ? { code } : {}),
    };
  }
  return { message: String(error).slice(0, MAX_LOGGED_MESSAGE_LENGTH) };
}
