// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * The grammar productions behind each {@link Charset}, written as inclusive
 * code point ranges transcribed from the defining RFC. These are the source
 * of truth the lookup table is verified against; classification itself only
 * ever reads the table.
 * @module
 */

import { Charset, CHARSET_NAMES, type CharsetName } from "./charset.ts";

export type CodePointRange = readonly [first: number, last: number];

export type CharsetDefinition = {
  readonly name: CharsetName;
  readonly charset: Charset;
  /** Number of the RFC defining the production. */
  readonly rfc: number;
  /** The production as written in the RFC's ABNF. */
  readonly production: string;
  readonly ranges: readonly CodePointRange[];
};

function singles(chars: string): readonly CodePointRange[] {
  return Array.from(chars, (ch) => {
    const codePoint = ch.codePointAt(0) ?? 0;
    return [codePoint, codePoint] as const;
  });
}

// RFC 5234 core rules
const WSP: readonly CodePointRange[] = [
  [0x09, 0x09],
  [0x20, 0x20],
];
const ALPHA: readonly CodePointRange[] = [
  [0x41, 0x5a],
  [0x61, 0x7a],
];
const DIGIT: readonly CodePointRange[] = [[0x30, 0x39]];

const DEFINITIONS: Readonly<Record<CharsetName, CharsetDefinition>> = {
  QTextWs: {
    name: "QTextWs",
    charset: Charset.QTextWs,
    rfc: 5322,
    production: "qtext = %d33 / %d35-91 / %d93-126 ; + WSP",
    ranges: [
      ...WSP,
      [33, 33],
      [35, 91],
      [93, 126],
    ],
  },
  CTextWs: {
    name: "CTextWs",
    charset: Charset.CTextWs,
    rfc: 5322,
    production: "ctext = %d33-39 / %d42-91 / %d93-126 ; + WSP",
    ranges: [
      ...WSP,
      [33, 39],
      [42, 91],
      [93, 126],
    ],
  },
  DTextWs: {
    name: "DTextWs",
    charset: Charset.DTextWs,
    rfc: 5322,
    production: "dtext = %d33-90 / %d94-126 ; + WSP",
    ranges: [...WSP, [33, 90], [94, 126]],
  },
  AText: {
    name: "AText",
    charset: Charset.AText,
    rfc: 5322,
    production:
      'atext = ALPHA / DIGIT / "!" / "#" / "$" / "%" / "&" / "\'" / "*" / "+" / "-" / "/" / "=" / "?" / "^" / "_" / "`" / "{" / "|" / "}" / "~"',
    ranges: [...ALPHA, ...DIGIT, ...singles("!#$%&'*+-/=?^_`{|}~")],
  },
  RestrictedToken: {
    name: "RestrictedToken",
    charset: Charset.RestrictedToken,
    rfc: 6838,
    production:
      'restricted-name-chars = ALPHA / DIGIT / "!" / "#" / "$" / "&" / "-" / "^" / "_" / "." / "+"',
    ranges: [...ALPHA, ...DIGIT, ...singles("!#$&-^_.+")],
  },
  Token: {
    name: "Token",
    charset: Charset.Token,
    rfc: 2045,
    production: "token := 1*<any (US-ASCII) CHAR except SPACE, CTLs, or tspecials>",
    // %d33-126 without tspecials ( ) < > @ , ; : \ " / [ ] ? =
    ranges: [
      [33, 33],
      [35, 39],
      [42, 43],
      [45, 46],
      [48, 57],
      [65, 90],
      [94, 126],
    ],
  },
  ObsNoWsCtl: {
    name: "ObsNoWsCtl",
    charset: Charset.ObsNoWsCtl,
    rfc: 5322,
    production: "obs-NO-WS-CTL = %d1-8 / %d11 / %d12 / %d14-31 / %d127",
    ranges: [
      [1, 8],
      [11, 12],
      [14, 31],
      [127, 127],
    ],
  },
  Rfc7230Token: {
    name: "Rfc7230Token",
    charset: Charset.Rfc7230Token,
    rfc: 7230,
    production:
      'tchar = "!" / "#" / "$" / "%" / "&" / "\'" / "*" / "+" / "-" / "." / "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA',
    ranges: [...ALPHA, ...DIGIT, ...singles("!#$%&'*+-.^_`|~")],
  },
};

export function getCharsetDefinition(name: CharsetName): CharsetDefinition {
  return DEFINITIONS[name];
}

/** All definitions, in ascending bit order. */
export function getCharsetDefinitions(): readonly CharsetDefinition[] {
  return CHARSET_NAMES.map((name) => DEFINITIONS[name]);
}

export function definitionContains(
  definition: CharsetDefinition,
  codePoint: number,
): boolean {
  return definition.ranges.some(
    ([first, last]) => codePoint >= first && codePoint <= last,
  );
}
