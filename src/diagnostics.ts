// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Off-hot-path helpers: naming the charsets a character belongs to, and
 * checking the lookup table byte for byte against the grammar definitions.
 * @module
 */

import { lookup, type CharLike, type CharsetName } from "./charset.ts";
import { getDiagnosticsConfig } from "./config.ts";
import { LookupTableIntegrityError, type TableMismatch } from "./errors.ts";
import { definitionContains, getCharsetDefinitions } from "./grammar.ts";
import { createLogger } from "./logger.ts";
import { getLookupTable, US_ASCII_TABLE_SIZE } from "./lookup-table.ts";

const logger = createLogger("mail-charsets:diagnostics");

export type LookupTableReport = {
  readonly ok: boolean;
  /** Number of (code point, charset) pairs compared. */
  readonly checked: number;
  /** Total number of mismatches, including any left out of `mismatches`. */
  readonly mismatchCount: number;
  /** At most `maxReportedMismatches` entries. */
  readonly mismatches: readonly TableMismatch[];
  /**
   * Indices that are missing, lie beyond the 128th entry, or do not hold an
   * integer in 0..255.
   */
  readonly malformedIndices: readonly number[];
};

function isByte(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 0xff
  );
}

/**
 * Names of every charset `ch` belongs to, in ascending bit order. Empty for
 * characters outside US-ASCII.
 */
export function describeChar(ch: CharLike): readonly CharsetName[] {
  const res = lookup(ch);
  if (!res.isAscii()) return [];
  return getCharsetDefinitions()
    .filter((definition) => res.is(definition.charset))
    .map((definition) => definition.name);
}

/**
 * Compares a table (the live one by default) with what the grammar
 * definitions say every entry should be.
 */
export function verifyLookupTable(
  table: readonly unknown[] = getLookupTable(),
): LookupTableReport {
  const { maxReportedMismatches } = getDiagnosticsConfig();
  const definitions = getCharsetDefinitions();
  const mismatches: TableMismatch[] = [];
  const malformedIndices: number[] = [];
  let checked = 0;
  let mismatchCount = 0;

  for (let codePoint = 0; codePoint < US_ASCII_TABLE_SIZE; codePoint++) {
    const entry = table[codePoint];
    if (!isByte(entry)) {
      malformedIndices.push(codePoint);
      continue;
    }
    for (const definition of definitions) {
      const expected = definitionContains(definition, codePoint);
      const actual = (entry & definition.charset) !== 0;
      checked++;
      if (expected === actual) continue;
      mismatchCount++;
      if (mismatches.length < maxReportedMismatches) {
        mismatches.push({
          codePoint,
          charset: definition.name,
          expected,
          actual,
        });
      }
    }
  }
  for (let index = US_ASCII_TABLE_SIZE; index < table.length; index++) {
    malformedIndices.push(index);
  }

  const ok = mismatchCount === 0 && malformedIndices.length === 0;
  if (ok) {
    logger.debug("Lookup table verified", { checked });
  } else {
    logger.error("Lookup table verification failed", {
      mismatchCount,
      malformedIndices,
    });
  }
  return { ok, checked, mismatchCount, mismatches, malformedIndices };
}

/**
 * Throws {@link LookupTableIntegrityError} unless {@link verifyLookupTable}
 * reports the table as correct. Intended for a start-up self-check.
 */
export function assertLookupTableIntegrity(
  table: readonly unknown[] = getLookupTable(),
): void {
  const report = verifyLookupTable(table);
  if (!report.ok) {
    throw new LookupTableIntegrityError(
      report.mismatches,
      report.mismatchCount,
      report.malformedIndices,
    );
  }
}
