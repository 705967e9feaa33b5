/**
 * mediagate Media Type: Canonical Serializer
 *
 * Renders a parsed media type as the one byte sequence every node agrees on.
 *
 * Canonical form:
 *
 *   type "/" subtype *( ";" name "=" value )
 *
 * - type, subtype, and parameter names are ASCII-lowercased
 * - parameters appear in name order (UTF-16 code unit order, not locale order)
 * - no whitespace anywhere
 * - a value is written bare when it is a token, otherwise as a quoted
 *   string with `"` and `\` backslash-escaped
 *
 * Parameter values are written as given. Case folding of values is decided
 * by the registry policy before canonicalization; canonicalize() only sees
 * values that have already been folded where the policy requires it.
 *
 * The output re-tokenizes to an equal ParsedMediaType, so canonicalization
 * is idempotent.
 */

import { asciiLower, compareCodeUnits, isToken } from './ascii.js';
import type { CanonicalMediaType, MediaTypeParameter, ParsedMediaType } from './types.js';

/**
 * Render a parameter value, quoting only when the bare form would not
 * re-tokenize to the same value.
 *
 * @example
 * renderValue('opus')        // 'opus'
 * renderValue('a b')         // '"a b"'
 * renderValue('say "hi"')    // '"say \\"hi\\""'
 * renderValue('')            // '""'
 */
export function renderValue(value: string): string {
  if (isToken(value)) {
    return value;
  }
  return '"' + value.replace(/[\\"]/g, '\\$&') + '"';
}

/** Sort parameters by lowercased name in code-unit order. */
function sortParameters(parameters: ReadonlyArray<MediaTypeParameter>): MediaTypeParameter[] {
  return [...parameters].sort((a, b) => compareCodeUnits(asciiLower(a.name), asciiLower(b.name)));
}

/**
 * Serialize a parsed media type to its canonical string.
 *
 * Total and deterministic: the same ParsedMediaType always yields the same
 * string, whatever the order its parameters were supplied in.
 *
 * @example
 * canonicalize({ type: 'Audio', subtype: 'OGG',
 *   parameters: [{ name: 'codecs', value: 'opus', quoted: true }] })
 * // 'audio/ogg;codecs=opus'
 */
export function canonicalize(parsed: ParsedMediaType): CanonicalMediaType {
  let out = `${asciiLower(parsed.type)}/${asciiLower(parsed.subtype)}`;
  for (const param of sortParameters(parsed.parameters)) {
    out += `;${asciiLower(param.name)}=${renderValue(param.value)}`;
  }
  // Type assertion is the authorized path to produce a CanonicalMediaType.
  // Only this function may perform this assertion.
  return out as CanonicalMediaType;
}
