/**
 * modgate Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier, used as the
 * `event_id` of every validation log line so that log files merged from
 * several machines can be deduplicated on read.
 *
 * Layout: 26 characters of Crockford Base32.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80 random bits
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32 alphabet (no I, L, O, U). */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;

/** Encode `value` as exactly `length` Crockford characters, zero-padded on the left. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * The random part is not incremented within one millisecond; ordering of
 * entries written in the same millisecond is arbitrary.
 *
 * @param nowMs - Timestamp to encode (defaults to Date.now())
 * @param random - Source of the 10 random bytes
 */
export function ulid(
  nowMs: number = Date.now(),
  random: (size: number) => Uint8Array = randomBytes,
): string {
  let randValue = 0n;
  for (const byte of random(RANDOM_BYTES)) {
    randValue = (randValue << 8n) | BigInt(byte);
  }
  return encodeCrockford(BigInt(nowMs), TIME_CHARS) + encodeCrockford(randValue, RANDOM_CHARS);
}
