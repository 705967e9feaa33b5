/**
 * mediagate Kernel: Content Encoding
 *
 * Converts a payload between its submitted string form and raw bytes.
 * Text payloads are UTF-8; binary payloads are hex.
 */

import { classifyMediaType } from './classify.js';

/** A payload string could not be decoded for its media type. */
export class ContentEncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContentEncodingError';
  }
}

function hexDigit(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30; // 0-9
  if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10; // A-F
  if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10; // a-f
  return -1;
}

/**
 * Decode a hex string. Upper- and lowercase digits are both accepted.
 *
 * @throws {ContentEncodingError} On odd length or a non-hex digit
 */
export function decodeHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new ContentEncodingError('Odd-length string');
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    const hi = hexDigit(hex.charCodeAt(i));
    const lo = hexDigit(hex.charCodeAt(i + 1));
    if (hi === -1 || lo === -1) {
      throw new ContentEncodingError(`Non-hexadecimal digit found at position ${hi === -1 ? i : i + 1}`);
    }
    out[i / 2] = (hi << 4) | lo;
  }
  return out;
}

/** Encode bytes as lowercase hex. */
export function encodeHex(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, '0');
  }
  return out;
}

/**
 * Convert a submitted payload to bytes according to its media type.
 *
 * @example
 * contentToBytes('48656c6c6f', 'image/jpeg') // bytes of "Hello"
 * contentToBytes('Hello', 'text/plain')      // bytes of "Hello"
 * @throws {ContentEncodingError} When a binary payload is not valid hex
 */
export function contentToBytes(content: string, mediaType: string): Uint8Array {
  if (classifyMediaType(mediaType) === 'text') {
    return new TextEncoder().encode(content);
  }
  return decodeHex(content);
}

/**
 * Inverse of contentToBytes(). Binary payloads come back as lowercase hex.
 *
 * @throws {ContentEncodingError} When a text payload is not valid UTF-8
 */
export function bytesToContent(bytes: Uint8Array, mediaType: string): string {
  if (classifyMediaType(mediaType) === 'text') {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (err) {
      throw new ContentEncodingError(
        `Invalid UTF-8: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
  return encodeHex(bytes);
}
