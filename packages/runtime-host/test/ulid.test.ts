/**
 * Tollgate Runtime Host — ULID Tests
 */

import { describe, it, expect } from 'vitest';
import { ulid, ulidTime, ULID_PATTERN } from '../src/logging/ulid.js';

describe('ulid', () => {
  it('produces 26 Crockford Base32 characters', () => {
    expect(ulid()).toMatch(ULID_PATTERN);
  });

  it('encodes the given time in the first ten characters', () => {
    const id = ulid(1_700_000_000_000);
    expect(ulidTime(id)).toBe(1_700_000_000_000);
  });

  it('sorts by time as a plain string', () => {
    const earlier = ulid(1_000);
    const later = ulid(2_000);
    expect(earlier < later).toBe(true);
  });

  it('zero time encodes as ten zeros', () => {
    expect(ulid(0).slice(0, 10)).toBe('0000000000');
  });

  it('rejects malformed input to ulidTime', () => {
    expect(() => ulidTime('not-a-ulid')).toThrow(TypeError);
  });
});
