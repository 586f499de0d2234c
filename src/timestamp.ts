/**
 * fixwire — UTCTimestamp / UTCTimeOnly spans
 *
 * The layout is chosen purely by span length:
 *
 *   17 bytes  YYYYMMDD-HH:MM:SS
 *   21 bytes  YYYYMMDD-HH:MM:SS.sss
 *    8 bytes  HH:MM:SS          (time only)
 *   12 bytes  HH:MM:SS.sss      (time only)
 *
 * Any other length, a misplaced separator, a non-digit, or an out-of-range
 * component yields null. Seconds may be 60 (leap second).
 */

import {
  COLON,
  DOT,
  MINUS,
  DATE_TIME_LENGTH,
  DATE_TIME_MILLIS_LENGTH,
  TIME_LENGTH,
  TIME_MILLIS_LENGTH,
} from './constants';
import { parseUnsigned } from './bytes';
import type { DateValue, TimeValue } from './types';

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

/** HH:MM:SS[.sss] starting at `at`, `length` bytes long. */
function readTime(buf: Uint8Array, at: number, length: number): TimeValue | null {
  if (length !== TIME_LENGTH && length !== TIME_MILLIS_LENGTH) return null;
  if (buf[at + 2] !== COLON || buf[at + 5] !== COLON) return null;

  const hour   = parseUnsigned(buf, at,     at + 2);
  const minute = parseUnsigned(buf, at + 3, at + 5);
  const second = parseUnsigned(buf, at + 6, at + 8);
  if (hour === null || minute === null || second === null) return null;
  if (hour > 23 || minute > 59 || second > 60) return null;

  let millisecond = 0;
  const hasMillis = length === TIME_MILLIS_LENGTH;
  if (hasMillis) {
    if (buf[at + 8] !== DOT) return null;
    const ms = parseUnsigned(buf, at + 9, at + 12);
    if (ms === null) return null;
    millisecond = ms;
  }

  return { hour, minute, second, millisecond, hasMillis };
}

export function parseTimestampSpan(buf: Uint8Array, start: number, end: number): DateValue | null {
  const length = end - start;
  if (length !== DATE_TIME_LENGTH && length !== DATE_TIME_MILLIS_LENGTH) return null;
  if (buf[start + 8] !== MINUS) return null;

  const year  = parseUnsigned(buf, start,     start + 4);
  const month = parseUnsigned(buf, start + 4, start + 6);
  const day   = parseUnsigned(buf, start + 6, start + 8);
  if (year === null || month === null || day === null) return null;
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return null;

  const time = readTime(buf, start + 9, length - 9);
  if (time === null) return null;

  return { year, month, day, ...time };
}

export function parseTimeSpan(buf: Uint8Array, start: number, end: number): TimeValue | null {
  return readTime(buf, start, end - start);
}

/** Milliseconds since the Unix epoch for a UTC DateValue. */
export function dateValueToEpochMillis(value: DateValue): number {
  return Date.UTC(
    value.year, value.month - 1, value.day,
    value.hour, value.minute, value.second, value.millisecond,
  );
}

const inRange = (n: number, min: number, max: number): boolean =>
  Number.isInteger(n) && n >= min && n <= max;

/** True when every component fits the UTCTimestamp layout and the calendar. */
export function isValidDateValue(value: DateValue): boolean {
  return (
    inRange(value.year, 0, 9999) &&
    inRange(value.month, 1, 12) &&
    inRange(value.day, 1, daysInMonth(value.year, value.month)) &&
    inRange(value.hour, 0, 23) &&
    inRange(value.minute, 0, 59) &&
    inRange(value.second, 0, 60) &&
    (!value.hasMillis || inRange(value.millisecond, 0, 999))
  );
}

const pad = (n: number, width: number): string => String(n).padStart(width, '0');

/** Render a DateValue in the layout its `hasMillis` flag selects. */
export function formatTimestamp(value: DateValue): string {
  const date = `${pad(value.year, 4)}${pad(value.month, 2)}${pad(value.day, 2)}`;
  const time = `${pad(value.hour, 2)}:${pad(value.minute, 2)}:${pad(value.second, 2)}`;
  return value.hasMillis
    ? `${date}-${time}.${pad(value.millisecond, 3)}`
    : `${date}-${time}`;
}
