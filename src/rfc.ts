// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * The {@link Charset} values grouped by the RFC that specifies them, for
 * callers who think in terms of the grammar they implement. These are the
 * same numbers under other names: `rfc2045.Token === Charset.Token`.
 * @module
 */

import { Charset } from "./charset.ts";

/** Charsets from RFC 5322 (Internet Message Format). */
export const rfc5322 = Object.freeze({
  QTextWs: Charset.QTextWs,
  CTextWs: Charset.CTextWs,
  AText: Charset.AText,
  DTextWs: Charset.DTextWs,
  ObsNoWsCtl: Charset.ObsNoWsCtl,
} as const);

/** Charsets from RFC 2045 (MIME Part One). */
export const rfc2045 = Object.freeze({
  Token: Charset.Token,
} as const);

/** Charsets from RFC 6838 (Media Type Specifications). */
export const rfc6838 = Object.freeze({
  RestrictedToken: Charset.RestrictedToken,
} as const);

/**
 * Charsets from RFC 7230 (HTTP/1.1 Message Syntax).
 *
 * `QDText` is `Charset.QTextWs`: RFC 5322 `qtext` + `WSP` and RFC 7230
 * `qdtext` are the same set once the obsolete part of both grammars is left
 * out.
 */
export const rfc7230 = Object.freeze({
  QDText: Charset.QTextWs,
  Token: Charset.Rfc7230Token,
} as const);
