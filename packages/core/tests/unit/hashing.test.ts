import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import {
  canonicalJson,
  computeContextHash,
  computeExperienceId,
  shortDigest,
} from '../../src/hashing.js';

describe('canonicalJson', () => {
  it('sorts keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"y":2,"z":1}]},"b":1}'
    );
  });

  it('keeps array order', () => {
    expect(canonicalJson(['VIC', 'NSW'])).toBe('["VIC","NSW"]');
  });
});

describe('shortDigest', () => {
  it('is a prefix of the SHA-1 hex digest', () => {
    const full = createHash('sha1').update('abc', 'utf8').digest('hex');

    expect(full).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
    expect(shortDigest('abc', 16)).toBe('a9993e364706816a');
  });
});

describe('computeExperienceId', () => {
  it('hashes strategy, race, runner and action joined by pipes', () => {
    const expected = createHash('sha1')
      .update('margin_1.05_top1_stake1.00|R1|R1_101|bet', 'utf8')
      .digest('hex')
      .slice(0, 20);

    expect(computeExperienceId('margin_1.05_top1_stake1.00', 'R1', 'R1_101', 'bet')).toBe(
      expected
    );
  });

  it('is stable across calls', () => {
    const first = computeExperienceId('s', 'r', 'x', 'bet');
    const second = computeExperienceId('s', 'r', 'x', 'bet');

    expect(first).toBe(second);
    expect(first).toHaveLength(20);
  });

  it('distinguishes runners within a race', () => {
    expect(computeExperienceId('s', 'r', 'a', 'bet')).not.toBe(
      computeExperienceId('s', 'r', 'b', 'bet')
    );
  });
});

describe('computeContextHash', () => {
  it('string-coerces values before hashing', () => {
    expect(computeContextHash({ track: 'Flemington', distance: 1200 })).toBe(
      computeContextHash({ distance: '1200', track: 'Flemington' })
    );
  });

  it('hashes the sorted, string-coerced payload', () => {
    const expected = shortDigest('{"distance":"1400","track":"Randwick"}', 16);

    expect(computeContextHash({ track: 'Randwick', distance: 1400 })).toBe(expected);
  });

  it('keeps null distinct from the string "null"', () => {
    expect(computeContextHash({ track: null })).not.toBe(computeContextHash({ track: 'null' }));
  });
});
