/**
 * mediagate Media Type: ASCII Character Rules
 *
 * Token alphabet, ASCII-only case folding, and code-unit ordering.
 *
 * None of these functions consult the platform locale. `toLowerCase()` and
 * `localeCompare()` are not used anywhere on the canonicalization path:
 * both can vary with locale and ICU data, and the canonical form must be
 * byte-identical on every node.
 *
 * This module has no dependencies and no side effects.
 */

/** Punctuation allowed in a token, in addition to ASCII letters and digits. */
const TOKEN_PUNCTUATION = '!#$&-^_.+';

/**
 * Test whether a single character belongs to the token alphabet.
 *
 * @example
 * isTokenChar('a') // true
 * isTokenChar('+') // true
 * isTokenChar('/') // false
 */
export function isTokenChar(ch: string): boolean {
  if (ch.length !== 1) return false;
  const code = ch.charCodeAt(0);
  if (code >= 0x30 && code <= 0x39) return true; // 0-9
  if (code >= 0x41 && code <= 0x5a) return true; // A-Z
  if (code >= 0x61 && code <= 0x7a) return true; // a-z
  return TOKEN_PUNCTUATION.includes(ch);
}

/** Test whether a string is a non-empty run of token characters. */
export function isToken(value: string): boolean {
  if (value.length === 0) return false;
  for (const ch of value) {
    if (!isTokenChar(ch)) return false;
  }
  return true;
}

/**
 * Lowercase A-Z only. Every other code unit passes through untouched.
 *
 * @example
 * asciiLower('Audio/OGG') // 'audio/ogg'
 * asciiLower('İ')         // 'İ' (not folded)
 */
export function asciiLower(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    out += code >= 0x41 && code <= 0x5a ? String.fromCharCode(code + 0x20) : value.charAt(i);
  }
  return out;
}

/** Ordering by UTF-16 code unit, independent of locale. */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Number of bytes `value` occupies when UTF-8 encoded. */
export function utf8ByteLength(value: string): number {
  return new TextEncoder().encode(value).length;
}
