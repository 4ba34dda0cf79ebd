/**
 * Request signing headers expected by the video resolution service.
 * A random letter string is sent alongside its Vigenère encryption, keyed by
 * the request timestamp with digits mapped to letters (0→a … 9→j).
 */

import { randomInt } from "crypto";

const LETTERS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
const DIGIT_LETTERS = "abcdefghij";

export interface ParserSignature {
  "X-Timestamp": string;
  "X-GCLT-Text": string;
  "X-EGCT-Text": string;
}

export function timestampToKey(timestamp: string): string {
  let key = "";
  for (const char of timestamp) {
    key += char >= "0" && char <= "9" ? DIGIT_LETTERS[Number(char)] : "?";
  }
  return key;
}

/**
 * Shifts each ASCII letter by the next key letter, preserving case.
 * Non-letters pass through and do not consume key letters.
 */
export function vigenereEncrypt(text: string, key: string): string {
  const shifts = [...key.toLowerCase()].map((char) => char.charCodeAt(0) - 97);
  if (shifts.length === 0) {
    return text;
  }

  let keyIndex = 0;
  let out = "";
  for (const char of text) {
    const isUpper = char >= "A" && char <= "Z";
    const isLower = char >= "a" && char <= "z";
    if (!isUpper && !isLower) {
      out += char;
      continue;
    }
    const base = isUpper ? 65 : 97;
    const shift = shifts[keyIndex % shifts.length];
    const offset = (((char.charCodeAt(0) - base + shift) % 26) + 26) % 26;
    out += String.fromCharCode(offset + base);
    keyIndex++;
  }
  return out;
}

export function randomLetters(length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += LETTERS[randomInt(LETTERS.length)];
  }
  return out;
}

export function buildParserSignature(now: number = Date.now()): ParserSignature {
  const timestamp = String(now);
  const plain = randomLetters(32);
  return {
    "X-Timestamp": timestamp,
    "X-GCLT-Text": plain,
    "X-EGCT-Text": vigenereEncrypt(plain, timestampToKey(timestamp)),
  };
}
