/**
 * fixwire — structural validation
 *
 * validateMessage() checks the envelope of a single FIX message before any
 * field is tokenized:
 *
 *   1. "8=" at offset 0, BeginString terminated by SOH   → HeaderTagMismatch
 *   2. next field is "9=", value is an unsigned integer  → LengthTagMismatch
 *                                                          MalformedInteger
 *   3. next field is "35=", value is the MsgType         → MsgTypeTagMismatch
 *   4. last 7 bytes are "10=" + 3 digits + SOH            → TrailerTagMismatch
 *      and the MsgType SOH lies before them               → MsgTypeTagMismatch
 *   5. BodyLength == trailerStart − bodyStart             → LengthMismatch
 *   6. byte sum of [0, trailerStart) mod 256 == CheckSum  → ChecksumMismatch
 *
 * Checks run in this order and the first failure wins. Step 4 assumes the
 * fixed 3-digit trailer (see TRAILER_SIZE); a message whose checksum is
 * rendered with another width fails here rather than being re-located.
 */

import {
  SOH,
  BEGIN_STRING_PREFIX,
  BODY_LENGTH_PREFIX,
  MSG_TYPE_PREFIX,
  CHECKSUM_PREFIX,
  CHECKSUM_DIGITS,
  TRAILER_SIZE,
  TAG_BEGIN_STRING,
  TAG_BODY_LENGTH,
  TAG_CHECKSUM,
  TAG_MSG_TYPE,
} from './constants';
import { asciiSpan, indexOfByte, parseUnsigned, startsWithAt } from './bytes';
import { err, ok, type Result } from './errors';
import type { FieldSpan, ValidationInfo } from './types';

// ─── Checksum ─────────────────────────────────────────────────────────────────

/**
 * Unsigned byte sum of buf[0, end) modulo 256.
 * Uint8Array elements are already 0–255 and the accumulator is masked on
 * return, so no signed intermediate can leak into the comparison.
 */
export function computeChecksum(buf: Uint8Array, end: number = buf.length): number {
  let sum = 0;
  const stop = Math.min(end, buf.length);
  for (let i = 0; i < stop; i++) sum += buf[i];
  return sum & 0xff;
}

/** Render a checksum as exactly three ASCII digits ("007", "255"). */
export function formatChecksum(checksum: number): string {
  return String(checksum & 0xff).padStart(CHECKSUM_DIGITS, '0');
}

// ─── validateMessage ──────────────────────────────────────────────────────────

export function validateMessage(buf: Uint8Array): Result<ValidationInfo> {

  // ── 1. BeginString ─────────────────────────────────────────────────────────

  if (!startsWithAt(buf, 0, BEGIN_STRING_PREFIX)) {
    return err('HeaderTagMismatch', 'Message does not start with "8=".', {
      offset: 0, expected: '8=', actual: asciiSpan(buf, 0, Math.min(2, buf.length)),
    });
  }
  const beginValueStart = BEGIN_STRING_PREFIX.length;
  const beginEnd        = indexOfByte(buf, SOH, beginValueStart);
  if (beginEnd === -1) {
    return err('HeaderTagMismatch', 'BeginString field is not terminated by SOH.', {
      offset: 0, tag: TAG_BEGIN_STRING,
    });
  }
  const beginSpan: FieldSpan = {
    tagNumber:  TAG_BEGIN_STRING,
    tagStart:   0,
    valueStart: beginValueStart,
    valueEnd:   beginEnd,
  };

  // ── 2. BodyLength ──────────────────────────────────────────────────────────

  const lengthTagStart = beginEnd + 1;
  if (!startsWithAt(buf, lengthTagStart, BODY_LENGTH_PREFIX)) {
    return err('LengthTagMismatch', 'Second field is not BodyLength (9=).', {
      offset: lengthTagStart, expected: '9=',
      actual: asciiSpan(buf, lengthTagStart, Math.min(lengthTagStart + 2, buf.length)),
    });
  }
  const lengthValueStart = lengthTagStart + BODY_LENGTH_PREFIX.length;
  const lengthEnd        = indexOfByte(buf, SOH, lengthValueStart);
  const declaredBodyLength = lengthEnd === -1
    ? null
    : parseUnsigned(buf, lengthValueStart, lengthEnd);
  if (lengthEnd === -1 || declaredBodyLength === null) {
    return err('MalformedInteger', 'BodyLength is not an unsigned integer terminated by SOH.', {
      offset: lengthValueStart, tag: TAG_BODY_LENGTH,
    });
  }
  const lengthSpan: FieldSpan = {
    tagNumber:  TAG_BODY_LENGTH,
    tagStart:   lengthTagStart,
    valueStart: lengthValueStart,
    valueEnd:   lengthEnd,
  };
  const bodyStart = lengthEnd + 1;

  // ── 3. MsgType ─────────────────────────────────────────────────────────────

  if (!startsWithAt(buf, bodyStart, MSG_TYPE_PREFIX)) {
    return err('MsgTypeTagMismatch', 'Third field is not MsgType (35=).', {
      offset: bodyStart, expected: '35=',
      actual: asciiSpan(buf, bodyStart, Math.min(bodyStart + 3, buf.length)),
    });
  }
  const msgTypeStart = bodyStart + MSG_TYPE_PREFIX.length;
  const msgTypeEnd   = indexOfByte(buf, SOH, msgTypeStart);
  if (msgTypeEnd === -1) {
    return err('MsgTypeTagMismatch', 'MsgType field is not terminated by SOH.', {
      offset: bodyStart,
    });
  }

  // ── 4. Trailer ─────────────────────────────────────────────────────────────

  const trailerStart = buf.length - TRAILER_SIZE;
  const digitsStart  = trailerStart + CHECKSUM_PREFIX.length;
  const declaredChecksum = trailerStart < 0
    ? null
    : parseUnsigned(buf, digitsStart, digitsStart + CHECKSUM_DIGITS);
  if (
    !startsWithAt(buf, trailerStart, CHECKSUM_PREFIX) ||
    declaredChecksum === null ||
    buf[buf.length - 1] !== SOH
  ) {
    return err('TrailerTagMismatch', 'Message does not end with "10=ccc<SOH>".', {
      offset: Math.max(trailerStart, 0), expected: '10=ccc',
    });
  }
  if (msgTypeEnd >= trailerStart) {
    return err('MsgTypeTagMismatch', 'MsgType field runs into the trailer.', {
      offset: bodyStart, tag: TAG_MSG_TYPE,
    });
  }

  // ── 5. Body length ─────────────────────────────────────────────────────────

  const measuredBodyLength = trailerStart - bodyStart;
  if (declaredBodyLength !== measuredBodyLength) {
    return err(
      'LengthMismatch',
      `BodyLength declares ${declaredBodyLength} bytes; body is ${measuredBodyLength} bytes.`,
      { offset: lengthValueStart, tag: TAG_BODY_LENGTH, expected: declaredBodyLength, actual: measuredBodyLength },
    );
  }

  // ── 6. Checksum ────────────────────────────────────────────────────────────

  const computed = computeChecksum(buf, trailerStart);
  if (computed !== declaredChecksum) {
    return err(
      'ChecksumMismatch',
      `CheckSum declares ${asciiSpan(buf, digitsStart, digitsStart + CHECKSUM_DIGITS)}; ` +
      `computed ${formatChecksum(computed)}.`,
      { offset: digitsStart, tag: TAG_CHECKSUM, expected: declaredChecksum, actual: computed },
    );
  }

  return ok({
    beginString:  asciiSpan(buf, beginValueStart, beginEnd),
    msgType:      asciiSpan(buf, msgTypeStart, msgTypeEnd),
    bodyStart,
    trailerStart,
    declaredBodyLength,
    checksum:     declaredChecksum,
    headerFields: [beginSpan, lengthSpan],
    trailerField: {
      tagNumber:  TAG_CHECKSUM,
      tagStart:   trailerStart,
      valueStart: digitsStart,
      valueEnd:   buf.length - 1,
    },
  });
}
