// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import type { CharLike } from "./charset.ts";

const SPACE = 0x20;
const HTAB = 0x09;
const TILDE = 0x7e;

function codePointOf(ch: CharLike): number | undefined {
  return typeof ch === "number" ? ch : ch.codePointAt(0);
}

/** `WSP`: space or horizontal tab. */
export function isWs(ch: CharLike): boolean {
  const codePoint = codePointOf(ch);
  return codePoint === SPACE || codePoint === HTAB;
}

/** `VCHAR`: `%x21-7E`, i.e. `' ' < ch <= '~'`. */
export function isVchar(ch: CharLike): boolean {
  const codePoint = codePointOf(ch);
  return (
    codePoint !== undefined &&
    Number.isInteger(codePoint) &&
    codePoint > SPACE &&
    codePoint <= TILDE
  );
}
