/**
 * mediagate Runtime Host: ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier, used as the
 * `event_id` of each verdict log line so that log files merged from several
 * sources can be deduplicated on read.
 *
 * ULID format: 26 characters, Crockford Base32 encoded.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80-bit random
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32 alphabet (no I, L, O, U). */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;

/** Encode exactly `length` Crockford characters, zero-padded on the left. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

function bytesToBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/** Sources of time and randomness for a ULID generator. */
export interface UlidSources {
  readonly now?: (() => number) | undefined;
  readonly random?: ((size: number) => Uint8Array) | undefined;
}

/**
 * Create a ULID generator.
 *
 * Sources default to Date.now() and crypto.randomBytes(); tests inject
 * fixed ones to get predictable ids.
 */
export function createUlid(sources: UlidSources = {}): () => string {
  const now = sources.now ?? Date.now;
  const random = sources.random ?? randomBytes;
  return () =>
    encodeCrockford(BigInt(now()), TIME_CHARS) +
    encodeCrockford(bytesToBigInt(random(RANDOM_BYTES)), RANDOM_CHARS);
}

/**
 * Generate a new ULID with the default sources.
 *
 * @example
 * ulid() // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export const ulid: () => string = createUlid();
