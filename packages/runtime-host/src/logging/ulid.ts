/**
 * Modweave Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier: 26 characters of
 * Crockford Base32.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80-bit cryptographic random
 *
 * Used as `event_id` on every line of load-events.jsonl so readLog() can
 * drop duplicate lines when log files from several runs are concatenated.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32 alphabet: no I, L, O or U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const BITS_PER_CHAR = 5n;
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

/** Encode exactly `length` characters, zero-padded on the left. */
function encodeCrockford(value: bigint, length: number): string {
  const chars: string[] = [];
  let v = value;
  for (let i = 0; i < length; i++) {
    chars.unshift(CROCKFORD_ALPHABET.charAt(Number(v & 0x1fn)));
    v >>= BITS_PER_CHAR;
  }
  return chars.join('');
}

/**
 * Generate a new ULID.
 *
 * The random part is not incremented within one millisecond, so two ids
 * from the same millisecond sort arbitrarily relative to each other.
 *
 * @param nowMs - Timestamp to encode; defaults to Date.now()
 */
export function ulid(nowMs: number = Date.now()): string {
  let random = 0n;
  for (const byte of randomBytes(10)) {
    random = (random << 8n) | BigInt(byte);
  }
  return encodeCrockford(BigInt(nowMs), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}
