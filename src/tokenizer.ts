/**
 * fixwire — field tokenizer
 *
 * Walks the message body [bodyStart, trailerStart) and emits one
 * FieldDescriptor per `tag=value<SOH>` field, in wire order. Nothing is
 * copied; every descriptor is a set of offsets into the caller's buffer.
 *
 * Two strategies produce identical output for well-formed input:
 *
 *   one-pass   A three-state machine that touches every byte exactly once.
 *
 *                ReadingKey ──'='──▶ ReadingValue ──SOH──▶ ReadingKey
 *                    │
 *                    └──'=' on a raw-data tag──▶ ReadingRawData
 *                                                 (count down N bytes,
 *                                                  then require SOH)
 *
 *   two-pass   Runs after structural validation (the first pass) and locates
 *              each field independently: digits up to '=', then a native
 *              indexOf() for the terminating SOH, or a jump of exactly N bytes
 *              for raw data.
 *
 * Raw data: a 'data-length' tag (RawDataLen, SecureDataLen, …) caches its
 * value for the field that immediately follows it. If that field is a 'data'
 * or 'encoded' tag it consumes exactly that many bytes, regardless of SOH or
 * '=' bytes inside; any other field discards the cached length. The declared
 * length is bounds-checked against trailerStart before it is consumed.
 */

import { EQUALS, MAX_TAG_DIGITS, SOH, DIGIT_0 } from './constants';
import { firstNonDigit, indexOfByte, isDigit, parseUnsigned } from './bytes';
import { err, ok, type Result } from './errors';
import { UNKNOWN_TAG, defaultRegistry, isRawDataTag } from './registry';
import type { FieldDescriptor, TagDescriptor, TagLookup, TokenizerStrategy } from './types';

export interface TokenizeOptions {
  readonly strategy?: TokenizerStrategy;
  readonly registry?: TagLookup;
}

/** Sentinel for "no data length cached". */
const NO_LENGTH = -1;

// ─── Shared error constructors ────────────────────────────────────────────────

function malformedTag<T>(offset: number): Result<T> {
  return err('MalformedTagNumber', `Invalid tag number byte at offset ${offset}.`, { offset });
}

function malformedLength<T>(tag: number, offset: number): Result<T> {
  return err('MalformedInteger', `Data length of tag ${tag} is not an unsigned integer.`, {
    tag, offset,
  });
}

function missingLength<T>(tag: number, offset: number): Result<T> {
  return err('MissingDataLength', `Raw data tag ${tag} has no preceding length field.`, {
    tag, offset,
  });
}

function overflow<T>(tag: number, offset: number, length: number, limit: number): Result<T> {
  return err(
    'DataLengthOverflow',
    `Tag ${tag} declares ${length} bytes of data, which runs past the trailer at ${limit}.`,
    { tag, offset, expected: limit, actual: offset + length + 1 },
  );
}

function missingTerminator<T>(tag: number, offset: number): Result<T> {
  return err('MissingDataTerminator', `Raw data of tag ${tag} is not followed by SOH.`, {
    tag, offset,
  });
}

function unterminated<T>(offset: number): Result<T> {
  return err('UnterminatedField', `Field starting at offset ${offset} has no terminating SOH.`, {
    offset,
  });
}

// ─── tokenize ─────────────────────────────────────────────────────────────────

export function tokenize(
  buf:          Uint8Array,
  bodyStart:    number,
  trailerStart: number,
  options:      TokenizeOptions = {},
): Result<FieldDescriptor[]> {
  const registry = options.registry ?? defaultRegistry;
  return options.strategy === 'two-pass'
    ? tokenizeTwoPass(buf, bodyStart, trailerStart, registry)
    : tokenizeOnePass(buf, bodyStart, trailerStart, registry);
}

// ─── one-pass ─────────────────────────────────────────────────────────────────

const READING_KEY      = 0;
const READING_VALUE    = 1;
const READING_RAW_DATA = 2;

export function tokenizeOnePass(
  buf:      Uint8Array,
  start:    number,
  end:      number,
  registry: TagLookup,
): Result<FieldDescriptor[]> {
  const fields: FieldDescriptor[] = [];

  let state       = READING_KEY;
  let key         = 0;
  let keyDigits   = 0;
  let tagStart    = start;
  let valueStart  = start;
  let descriptor: TagDescriptor = UNKNOWN_TAG;

  // data-length bookkeeping
  let isLengthTag   = false;
  let lengthValue   = 0;
  let lengthDigits  = 0;
  let cachedLength  = NO_LENGTH;
  let rawRemaining  = 0;

  for (let i = start; i < end; i++) {
    const b = buf[i];

    if (state === READING_KEY) {
      if (b === EQUALS) {
        if (keyDigits === 0) return malformedTag(i);
        descriptor = registry.lookup(key);
        valueStart = i + 1;

        if (isRawDataTag(descriptor)) {
          if (cachedLength === NO_LENGTH) return missingLength(key, valueStart);
          if (valueStart + cachedLength >= end) return overflow(key, valueStart, cachedLength, end);
          rawRemaining = cachedLength;
          state = READING_RAW_DATA;
        } else {
          cachedLength = NO_LENGTH;
          isLengthTag  = descriptor.property === 'data-length';
          lengthValue  = 0;
          lengthDigits = 0;
          state = READING_VALUE;
        }
      } else if (isDigit(b)) {
        if (++keyDigits > MAX_TAG_DIGITS) return malformedTag(i);
        key = key * 10 + (b - DIGIT_0);
      } else {
        return malformedTag(i);
      }
      continue;
    }

    if (state === READING_VALUE) {
      if (b === SOH) {
        if (isLengthTag) {
          if (lengthDigits === 0 || !Number.isSafeInteger(lengthValue)) {
            return malformedLength(key, valueStart);
          }
          cachedLength = lengthValue;
        }
        fields.push({ tagNumber: key, descriptor, tagStart, valueStart, valueEnd: i });
        state     = READING_KEY;
        key       = 0;
        keyDigits = 0;
        tagStart  = i + 1;
      } else if (isLengthTag) {
        if (!isDigit(b)) return malformedLength(key, i);
        lengthValue = lengthValue * 10 + (b - DIGIT_0);
        lengthDigits++;
      }
      continue;
    }

    // READING_RAW_DATA: payload bytes are opaque until the count runs out.
    if (rawRemaining > 0) {
      rawRemaining--;
      continue;
    }
    if (b !== SOH) return missingTerminator(key, i);
    fields.push({ tagNumber: key, descriptor, tagStart, valueStart, valueEnd: i });
    cachedLength = NO_LENGTH;
    state        = READING_KEY;
    key          = 0;
    keyDigits    = 0;
    tagStart     = i + 1;
  }

  if (state !== READING_KEY || keyDigits !== 0) return unterminated(tagStart);
  return ok(fields);
}

// ─── two-pass ─────────────────────────────────────────────────────────────────

export function tokenizeTwoPass(
  buf:      Uint8Array,
  start:    number,
  end:      number,
  registry: TagLookup,
): Result<FieldDescriptor[]> {
  const fields: FieldDescriptor[] = [];
  let cachedLength = NO_LENGTH;
  let pos = start;

  while (pos < end) {
    const tagStart = pos;

    // key: digits up to '='
    let key = 0;
    while (pos < end && isDigit(buf[pos])) {
      if (pos - tagStart >= MAX_TAG_DIGITS) return malformedTag(pos);
      key = key * 10 + (buf[pos] - DIGIT_0);
      pos++;
    }
    if (pos >= end) return unterminated(tagStart);
    if (buf[pos] !== EQUALS || pos === tagStart) return malformedTag(pos);

    const descriptor = registry.lookup(key);
    const valueStart = pos + 1;
    let   valueEnd: number;

    if (isRawDataTag(descriptor)) {
      if (cachedLength === NO_LENGTH) return missingLength(key, valueStart);
      if (valueStart + cachedLength >= end) return overflow(key, valueStart, cachedLength, end);
      valueEnd = valueStart + cachedLength;
      if (buf[valueEnd] !== SOH) return missingTerminator(key, valueEnd);
      cachedLength = NO_LENGTH;
    } else if (descriptor.property === 'data-length') {
      // digits first, so a stray byte is reported before a missing SOH
      valueEnd = firstNonDigit(buf, valueStart, end);
      if (valueEnd === -1) return unterminated(tagStart);
      if (buf[valueEnd] !== SOH) return malformedLength(key, valueEnd);
      const length = parseUnsigned(buf, valueStart, valueEnd);
      if (length === null) return malformedLength(key, valueStart);
      cachedLength = length;
    } else {
      valueEnd = indexOfByte(buf, SOH, valueStart, end);
      if (valueEnd === -1) return unterminated(tagStart);
      cachedLength = NO_LENGTH;
    }

    fields.push({ tagNumber: key, descriptor, tagStart, valueStart, valueEnd });
    pos = valueEnd + 1;
  }

  return ok(fields);
}
