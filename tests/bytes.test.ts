/**
 * fixwire — byte-span primitives
 */

import { describe, it, expect } from 'vitest';
import { SOH, indexOfByte, parseSigned, parseUnsigned, readUnsignedUntil } from '../src/index';
import { fix } from './helpers';

describe('indexOfByte', () => {
  // abcde|defghi||12233|...
  const buf = fix('abcde|defghi||12233|...');

  it('locates the first delimiter', () => {
    expect(indexOfByte(buf, SOH, 0)).toBe(5);
  });

  it('continues from an offset', () => {
    expect(indexOfByte(buf, SOH, 6)).toBe(12);
    expect(indexOfByte(buf, SOH, 13)).toBe(13);
  });

  it('ignores hits at or past the end bound', () => {
    expect(indexOfByte(buf, SOH, 6, 12)).toBe(-1);
    expect(indexOfByte(buf, SOH, 6, 13)).toBe(12);
  });

  it('returns -1 for an empty range', () => {
    expect(indexOfByte(buf, SOH, 5, 5)).toBe(-1);
  });
});

describe('readUnsignedUntil', () => {
  const buf = fix('abcde|defghi||12233|...');

  it('extracts 12233 ending at the delimiter at position 19', () => {
    expect(readUnsignedUntil(buf, 14, SOH)).toEqual({ value: 12233, end: 19 });
  });

  it('rejects an empty span', () => {
    expect(readUnsignedUntil(buf, 13, SOH)).toBeNull();
  });

  it('rejects letters before the terminator', () => {
    expect(readUnsignedUntil(buf, 6, SOH)).toBeNull();
  });

  it('rejects a missing terminator within the limit', () => {
    expect(readUnsignedUntil(buf, 14, SOH, 19)).toBeNull();
  });
});

describe('parseUnsigned / parseSigned', () => {
  const buf = fix('-042|9007199254740993|');

  it('parses digits with leading zeros', () => {
    expect(parseUnsigned(buf, 1, 4)).toBe(42);
  });

  it('accepts a leading minus only in parseSigned', () => {
    expect(parseUnsigned(buf, 0, 4)).toBeNull();
    expect(parseSigned(buf, 0, 4)).toBe(-42);
  });

  it('rejects a lone minus', () => {
    expect(parseSigned(buf, 0, 1)).toBeNull();
  });

  it('rejects values beyond the safe integer range', () => {
    expect(parseUnsigned(buf, 5, 21)).toBeNull();
  });
});
