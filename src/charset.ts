// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Character classification against the charsets of mail related grammars
 * (`atext`, `ctext`, `dtext`, `qtext`, MIME and HTTP `token`, ...).
 *
 * Every charset is a single bit; the table in `lookup-table.ts` holds, for
 * each US-ASCII code point, the OR of the bits of all charsets containing it.
 * A test is therefore one bounds check, one array read and one AND.
 *
 * `qtext`, `ctext` and `dtext` only ever appear in grammars of the shape
 * `*([FWS] xtext) [FWS]`, so their charsets here already include `WSP`
 * (space and tab). A parser scanning such a production accepts anything in
 * `QTextWs`/`CTextWs`/`DTextWs`; a `"\r"` is in none of them and marks the
 * start of a fold, which the parser must check is followed by `"\n "` or
 * `"\n\t"` before continuing.
 *
 * @example
 * ```ts
 * contains(Charset.AText, "d"); // true
 *
 * const res = lookup(".");
 * res.isAscii(); // true
 * res.is(Charset.Token); // true
 * res.is(Charset.CTextWs); // true
 * res.is(Charset.AText); // false
 * ```
 * @module
 */

import { lookupByte, US_ASCII_TABLE_SIZE } from "./lookup-table.ts";

/**
 * The charsets represented in the lookup table, each mapped to its bit.
 * The obsolete grammar parts are never folded in; combine with
 * {@link Charset.ObsNoWsCtl} to accept them.
 */
export const Charset = Object.freeze({
  /**
   * `qtext` + `WSP`: anything that can appear in a quoted string which is
   * not a quoted-pair. Equivalent to RFC 7230 `qdtext` without the obsolete
   * part of either grammar. RFC 5322.
   */
  QTextWs: 0b0000_0001,
  /** `ctext` + `WSP`, obsolete part excluded. RFC 5322. */
  CTextWs: 0b0000_0010,
  /** `dtext` + `WSP`, obsolete part excluded. RFC 5322. */
  DTextWs: 0b0000_0100,
  /** `atext`. RFC 5322. */
  AText: 0b0000_1000,
  /**
   * `restricted-name-chars`, the subset of the MIME token charset which
   * IETF and IANA registered names must use. RFC 6838.
   */
  RestrictedToken: 0b0001_0000,
  /** MIME `token`. RFC 2045. */
  Token: 0b0010_0000,
  /**
   * `obs-NO-WS-CTL`. Combine with `CTextWs` or `QTextWs` to accept the
   * obsolete grammar:
   *
   * ```ts
   * const isCTextWithObs = (ch: string) => {
   *   const res = lookup(ch);
   *   return res.is(Charset.CTextWs) || res.is(Charset.ObsNoWsCtl);
   * };
   * ```
   * RFC 5322.
   */
  ObsNoWsCtl: 0b0100_0000,
  /**
   * HTTP `token` (`tchar`). Not a mail grammar, but shared by anything
   * Media Type related; unlike the MIME token it excludes `{` and `}`.
   * RFC 7230.
   */
  Rfc7230Token: 0b1000_0000,
} as const);

export type Charset = (typeof Charset)[keyof typeof Charset];
export type CharsetName = keyof typeof Charset;

/** Every charset name, in ascending bit order. */
export const CHARSET_NAMES: readonly CharsetName[] = Object.freeze([
  "QTextWs",
  "CTextWs",
  "DTextWs",
  "AText",
  "RestrictedToken",
  "Token",
  "ObsNoWsCtl",
  "Rfc7230Token",
]);

/**
 * A character: either a string, of which the first code point is
 * classified, or a numeric code point.
 */
export type CharLike = string | number;

const OUT_OF_TABLE = -1;

/**
 * Maps a character to its table index, or `OUT_OF_TABLE` for anything that
 * is not an integer code point below 0x80 (this includes the empty string).
 */
function tableIndex(ch: CharLike): number {
  const codePoint = typeof ch === "number" ? ch : ch.codePointAt(0);
  if (codePoint === undefined || !Number.isInteger(codePoint)) {
    return OUT_OF_TABLE;
  }
  return codePoint >= 0 && codePoint < US_ASCII_TABLE_SIZE
    ? codePoint
    : OUT_OF_TABLE;
}

function maskContains(
  mask: number | undefined,
  charset: Charset,
  outOfTable: boolean,
): boolean {
  return mask === undefined ? outOfTable : (mask & charset) !== 0;
}

/**
 * Result of classifying one character. Holds a copy of the table byte, or
 * nothing if the character is outside US-ASCII, and answers any number of
 * charset tests without touching the table again.
 *
 * Instances are shared: `lookup` hands out one of 129 preallocated results,
 * so `lookup("a") === lookup(0x61)`.
 */
let resultFor: (ch: CharLike) => LookupResult;

export class LookupResult {
  static {
    const nonAscii = new LookupResult(undefined);
    const ascii: readonly LookupResult[] = Array.from(
      { length: US_ASCII_TABLE_SIZE },
      (_, index) => new LookupResult(lookupByte(index)),
    );
    resultFor = (ch) => {
      const index = tableIndex(ch);
      if (index === OUT_OF_TABLE) return nonAscii;
      return ascii[index] ?? nonAscii;
    };
  }

  private constructor(
    /** The table byte, `undefined` outside US-ASCII. */
    public readonly mask: number | undefined,
  ) {
    Object.freeze(this);
  }

  isAscii(): boolean {
    return this.mask !== undefined;
  }

  /** True if the character belongs to `charset`. */
  is(charset: Charset): boolean {
    return maskContains(this.mask, charset, false);
  }

  /** True if the character belongs to `charset` or is not US-ASCII. */
  isInclNonAscii(charset: Charset): boolean {
    return maskContains(this.mask, charset, true);
  }
}

function containsLookup(
  charset: Charset,
  ch: CharLike,
  outOfTable: boolean,
): boolean {
  const index = tableIndex(ch);
  if (index === OUT_OF_TABLE) return outOfTable;
  return (lookupByte(index) & charset) !== 0;
}

/** Returns true if `ch` is part of `charset`. */
export function contains(charset: Charset, ch: CharLike): boolean {
  return containsLookup(charset, ch, false);
}

/**
 * Returns true if `ch` is part of `charset` or is not a US-ASCII character.
 *
 * Meant for use with RFC 6532, which extends every `*text` grammar part to
 * admit any non-US-ASCII character. The widening is applied to every
 * charset alike, tokens included.
 */
export function containsOrNonAscii(charset: Charset, ch: CharLike): boolean {
  return containsLookup(charset, ch, true);
}

/** Classifies `ch` once for testing against several charsets. */
export function lookup(ch: CharLike): LookupResult {
  return resultFor(ch);
}

// A result may come from the other build of this package (ESM and CommonJS
// load separate classes), so results are recognised by shape, not class.
function resultMask(result: object): number | undefined {
  if (!("mask" in result)) return undefined;
  const { mask } = result;
  return typeof mask === "number" ? mask : undefined;
}

/**
 * Character-first form of {@link contains}, also accepting a
 * {@link LookupResult} so both can be handled by the same code.
 */
export function is(ch: CharLike | LookupResult, charset: Charset): boolean {
  return typeof ch === "object"
    ? maskContains(resultMask(ch), charset, false)
    : contains(charset, ch);
}

/** Character-first form of {@link containsOrNonAscii}. */
export function isInclNonAscii(
  ch: CharLike | LookupResult,
  charset: Charset,
): boolean {
  return typeof ch === "object"
    ? maskContains(resultMask(ch), charset, true)
    : containsOrNonAscii(charset, ch);
}
