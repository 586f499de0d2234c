/**
 * fixwire — byte-span primitives
 *
 * Bounded scans and decimal parsers over a Uint8Array. All functions take an
 * explicit exclusive `end` so no scan can run past the region the caller has
 * validated.
 */

import { DIGIT_0, DIGIT_9, MINUS } from './constants';

export function isDigit(byte: number): boolean {
  return byte >= DIGIT_0 && byte <= DIGIT_9;
}

/**
 * Offset of the first `byte` in [from, end), or -1.
 * Uses the native TypedArray search and discards hits at or past `end`.
 */
export function indexOfByte(
  buf:  Uint8Array,
  byte: number,
  from: number,
  end:  number = buf.length,
): number {
  if (from >= end) return -1;
  const at = buf.indexOf(byte, from);
  return at === -1 || at >= end ? -1 : at;
}

/** True when buf[at .. at + prefix.length) equals prefix. */
export function startsWithAt(buf: Uint8Array, at: number, prefix: Uint8Array): boolean {
  if (at < 0 || at + prefix.length > buf.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (buf[at + i] !== prefix[i]) return false;
  }
  return true;
}

/**
 * Parse [start, end) as an unsigned decimal.
 * Returns null for an empty span, a non-digit byte, or a value beyond
 * Number.MAX_SAFE_INTEGER.
 */
export function parseUnsigned(buf: Uint8Array, start: number, end: number): number | null {
  if (start >= end) return null;
  let value = 0;
  for (let i = start; i < end; i++) {
    const b = buf[i];
    if (!isDigit(b)) return null;
    value = value * 10 + (b - DIGIT_0);
  }
  return Number.isSafeInteger(value) ? value : null;
}

/** Parse [start, end) as a decimal with an optional leading '-'. */
export function parseSigned(buf: Uint8Array, start: number, end: number): number | null {
  if (start < end && buf[start] === MINUS) {
    const magnitude = parseUnsigned(buf, start + 1, end);
    return magnitude === null ? null : -magnitude;
  }
  return parseUnsigned(buf, start, end);
}

/**
 * Read an unsigned decimal starting at `start` and ending at the first
 * `terminator` byte at or before `limit`.
 *
 * Returns the value and the terminator's offset, or null when no terminator
 * is found, the digits are empty, or a non-digit precedes the terminator.
 */
export function readUnsignedUntil(
  buf:        Uint8Array,
  start:      number,
  terminator: number,
  limit:      number = buf.length,
): { value: number; end: number } | null {
  const end = indexOfByte(buf, terminator, start, limit);
  if (end === -1) return null;
  const value = parseUnsigned(buf, start, end);
  return value === null ? null : { value, end };
}

/** Offset of the first non-digit byte in [start, end), or -1 when all are digits. */
export function firstNonDigit(buf: Uint8Array, start: number, end: number): number {
  for (let i = start; i < end; i++) {
    if (!isDigit(buf[i])) return i;
  }
  return -1;
}

/** Decode an ASCII span without allocating a TextDecoder. */
export function asciiSpan(buf: Uint8Array, start: number, end: number): string {
  let out = '';
  for (let i = start; i < end; i++) out += String.fromCharCode(buf[i]);
  return out;
}
