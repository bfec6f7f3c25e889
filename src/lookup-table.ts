// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * The precomputed US-ASCII classification table: one byte per code point in
 * [0, 128), each set bit marking membership in one {@link Charset}. Loaded
 * once from `data/us-ascii-lookup.json` and never written afterwards; the
 * typed array itself stays private to the package.
 */

import lookupData from "./data/us-ascii-lookup.json";

export const US_ASCII_TABLE_SIZE = 0x80;

const US_ASCII_LOOKUP: Uint8Array = Uint8Array.from(lookupData);

/**
 * Raw table read. Callers must have checked `0 <= index < 0x80`.
 */
export function lookupByte(index: number): number {
  return US_ASCII_LOOKUP[index] ?? 0;
}

/**
 * Returns a copy of the table as plain numbers, for diagnostics and display.
 */
export function getLookupTable(): readonly number[] {
  return Array.from(US_ASCII_LOOKUP);
}
