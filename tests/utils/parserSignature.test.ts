import { describe, expect, it } from "vitest";
import {
  buildParserSignature,
  randomLetters,
  timestampToKey,
  vigenereEncrypt,
} from "../../src/utils/parserSignature.js";

describe("parserSignature", () => {
  it("maps timestamp digits to letters", () => {
    expect(timestampToKey("0123456789")).toBe("abcdefghij");
  });

  it("shifts letters by the key and preserves case", () => {
    // key "bc": a+1=b, B+2=D, y+1=z, Z+2=B
    expect(vigenereEncrypt("aByZ", "bc")).toBe("bDzB");
  });

  it("passes non-letters through without consuming the key", () => {
    expect(vigenereEncrypt("a-a", "bc")).toBe("b-c");
  });

  it("returns the text unchanged for an empty key", () => {
    expect(vigenereEncrypt("abc", "")).toBe("abc");
  });

  it("generates ASCII letters only", () => {
    expect(randomLetters(32)).toMatch(/^[A-Za-z]{32}$/);
  });

  it("signs with the timestamp-derived key", () => {
    const signature = buildParserSignature(1700000000123);
    expect(signature["X-Timestamp"]).toBe("1700000000123");
    expect(signature["X-GCLT-Text"]).toHaveLength(32);
    expect(signature["X-EGCT-Text"]).toBe(vigenereEncrypt(signature["X-GCLT-Text"], "bhaaaaaaaabcd"));
  });
});
