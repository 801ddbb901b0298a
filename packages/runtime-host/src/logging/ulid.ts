/**
 * Tollgate Runtime Host — ULID Generator
 *
 * 26-character Crockford Base32 identifiers: a 48-bit millisecond time
 * prefix followed by 80 random bits. Sorting ULIDs as strings sorts them by
 * creation time (to the millisecond).
 *
 * Used for `tx_id` and `event_id` in events.jsonl and for decision log
 * entries, so log lines merged from several runs can be deduplicated.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford Base32: no I, L, O or U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

export const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 0x1fn)) + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * @param now - Millisecond timestamp for the time prefix. Defaults to Date.now().
 */
export function ulid(now: number = Date.now()): string {
  let random = 0n;
  for (const byte of randomBytes(10)) {
    random = (random << 8n) | BigInt(byte);
  }
  return encodeCrockford(BigInt(now), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}

/** Decode the millisecond timestamp carried in a ULID's first ten characters. */
export function ulidTime(id: string): number {
  if (!ULID_PATTERN.test(id)) {
    throw new TypeError(`Invalid ULID: ${id}`);
  }
  let ms = 0;
  for (const ch of id.slice(0, TIME_CHARS)) {
    ms = ms * 32 + CROCKFORD_ALPHABET.indexOf(ch);
  }
  return ms;
}
