import { describe, it, expect } from "vitest";
import { Charset, CHARSET_NAMES, contains } from "../../src/charset";
import { getLookupTable } from "../../src/lookup-table";

/**
 * Members of every charset, written out from the RFC grammars independently
 * of the data file: `visible` lists the members in %x21-7E in ascending
 * order, `other` every member outside that range.
 */
const EXPECTED_MEMBERS = {
  QTextWs: {
    visible: "!#$%&'()*+,-./0123456789:;<=>?@ABCDEFGHIJKLMNOPQRSTUVWXYZ[]^_`abcdefghijklmnopqrstuvwxyz{|}~",
    other: [0x09, 0x20],
  },
  CTextWs: {
    visible: "!\"#$%&'*+,-./0123456789:;<=>?@ABCDEFGHIJKLMNOPQRSTUVWXYZ[]^_`abcdefghijklmnopqrstuvwxyz{|}~",
    other: [0x09, 0x20],
  },
  DTextWs: {
    visible: "!\"#$%&'()*+,-./0123456789:;<=>?@ABCDEFGHIJKLMNOPQRSTUVWXYZ^_`abcdefghijklmnopqrstuvwxyz{|}~",
    other: [0x09, 0x20],
  },
  AText: {
    visible: "!#$%&'*+-/0123456789=?ABCDEFGHIJKLMNOPQRSTUVWXYZ^_`abcdefghijklmnopqrstuvwxyz{|}~",
    other: [],
  },
  RestrictedToken: {
    visible: "!#$&+-.0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ^_abcdefghijklmnopqrstuvwxyz",
    other: [],
  },
  Token: {
    visible: "!#$%&'*+-.0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ^_`abcdefghijklmnopqrstuvwxyz{|}~",
    other: [],
  },
  ObsNoWsCtl: {
    visible: "",
    other: [0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08, 0x0b, 0x0c, 0x0e, 0x0f, 0x10, 0x11, 0x12, 0x13, 0x14, 0x15, 0x16, 0x17, 0x18, 0x19, 0x1a, 0x1b, 0x1c, 0x1d, 0x1e, 0x1f, 0x7f],
  },
  Rfc7230Token: {
    visible: "!#$%&'*+-.0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ^_`abcdefghijklmnopqrstuvwxyz|~",
    other: [],
  },
} as const;

function membersOf(charset: Charset): number[] {
  const members: number[] = [];
  for (let codePoint = 0; codePoint < 0x80; codePoint++) {
    if (contains(charset, codePoint)) members.push(codePoint);
  }
  return members;
}

function expectedMembers(expected: {
  readonly visible: string;
  readonly other: readonly number[];
}): number[] {
  const visible = Array.from(expected.visible, (ch) => ch.charCodeAt(0));
  return [...visible, ...expected.other].sort((a, b) => a - b);
}

describe("US-ASCII lookup table", () => {
  it.each(CHARSET_NAMES)("holds exactly the members of %s", (name) => {
    expect(membersOf(Charset[name])).toEqual(
      expectedMembers(EXPECTED_MEMBERS[name]),
    );
  });

  it("has 128 byte-sized entries", () => {
    const table = getLookupTable();
    expect(table).toHaveLength(128);
    expect(table.every((entry) => entry >= 0 && entry <= 0xff)).toBe(true);
  });

  it("leaves NUL, LF and CR out of every charset", () => {
    const table = getLookupTable();
    expect(table[0x00]).toBe(0);
    expect(table[0x0a]).toBe(0);
    expect(table[0x0d]).toBe(0);
  });

  it("merges WSP into the three *TextWs charsets only", () => {
    const table = getLookupTable();
    const wsMask = Charset.QTextWs | Charset.CTextWs | Charset.DTextWs;
    expect(table[0x20]).toBe(wsMask);
    expect(table[0x09]).toBe(wsMask);
  });

  it("keeps backslash out of every charset", () => {
    expect(getLookupTable()[0x5c]).toBe(0);
  });

  it("hands out a copy of the table", () => {
    const copy = [...getLookupTable()];
    copy[0x64] = 0;
    expect(contains(Charset.AText, "d")).toBe(true);
    expect(getLookupTable()[0x64]).toBe(191);
  });
});
