import { describe, it, expect } from "vitest";
import { Charset, contains } from "../../src/charset";
import { rfc2045, rfc5322, rfc6838, rfc7230 } from "../../src/rfc";

describe("charsets grouped by RFC", () => {
  it("re-exports the RFC 5322 charsets", () => {
    expect(rfc5322).toEqual({
      QTextWs: Charset.QTextWs,
      CTextWs: Charset.CTextWs,
      AText: Charset.AText,
      DTextWs: Charset.DTextWs,
      ObsNoWsCtl: Charset.ObsNoWsCtl,
    });
  });

  it("re-exports the MIME token under RFC 2045", () => {
    expect(rfc2045.Token).toBe(Charset.Token);
    expect(Object.keys(rfc2045)).toEqual(["Token"]);
  });

  it("re-exports the restricted name charset under RFC 6838", () => {
    expect(rfc6838.RestrictedToken).toBe(Charset.RestrictedToken);
  });

  it("exposes qtext + WSP as RFC 7230 qdtext and tchar as its token", () => {
    expect(rfc7230.QDText).toBe(Charset.QTextWs);
    expect(rfc7230.Token).toBe(Charset.Rfc7230Token);
    expect(rfc7230.Token).not.toBe(rfc2045.Token);
  });

  it("classifies through an alias exactly as through the charset", () => {
    expect(contains(rfc7230.QDText, "<")).toBe(true);
    expect(contains(rfc7230.QDText, '"')).toBe(false);
    expect(contains(rfc7230.Token, "{")).toBe(false);
  });

  it("cannot be modified", () => {
    for (const group of [rfc5322, rfc2045, rfc6838, rfc7230]) {
      expect(Object.isFrozen(group)).toBe(true);
    }
  });
});
