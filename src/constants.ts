/**
 * fixwire — wire constants
 *
 * Every FIX message handled by this library has the shape:
 *
 *   8=<BeginString><SOH>
 *   9=<BodyLength><SOH>
 *   35=<MsgType><SOH>            ← body starts here
 *   { <tag>=<value><SOH> } …
 *   10=<ccc><SOH>                ← trailer; body ends just before "10="
 *
 * BodyLength counts the bytes from the first byte after the "9=" field's
 * SOH up to (not including) the "1" of "10=". CheckSum is the unsigned
 * sum of every byte before "10=", modulo 256, rendered as 3 ASCII digits.
 */

// ─── Delimiters ───────────────────────────────────────────────────────────────

export const SOH    = 0x01;
export const EQUALS = 0x3d; // '='
export const MINUS  = 0x2d; // '-'
export const DOT    = 0x2e; // '.'
export const COLON  = 0x3a; // ':'
export const SPACE  = 0x20;
export const DIGIT_0 = 0x30;
export const DIGIT_9 = 0x39;

// ─── Well-known Tags ──────────────────────────────────────────────────────────

export const TAG_BEGIN_STRING     = 8;
export const TAG_BODY_LENGTH      = 9;
export const TAG_CHECKSUM         = 10;
export const TAG_MSG_TYPE         = 35;
export const TAG_MESSAGE_ENCODING = 347;

// ─── Header / Trailer Prefixes ────────────────────────────────────────────────

/** "8=" */
export const BEGIN_STRING_PREFIX: Uint8Array = new Uint8Array([0x38, EQUALS]);
/** "9=" */
export const BODY_LENGTH_PREFIX:  Uint8Array = new Uint8Array([0x39, EQUALS]);
/** "35=" */
export const MSG_TYPE_PREFIX:     Uint8Array = new Uint8Array([0x33, 0x35, EQUALS]);
/** "10=" */
export const CHECKSUM_PREFIX:     Uint8Array = new Uint8Array([0x31, 0x30, EQUALS]);

/**
 * The trailer is assumed to be exactly "10=" + 3 digits + SOH.
 * A checksum rendered with fewer or more digits mis-locates the trailer;
 * this is a format convention, not a guarantee of every counterparty.
 */
export const CHECKSUM_DIGITS = 3;
export const TRAILER_SIZE    = CHECKSUM_PREFIX.length + CHECKSUM_DIGITS + 1; // 7

// ─── Tokenizer Limits ─────────────────────────────────────────────────────────

/** Tag numbers longer than this are rejected before they can lose precision. */
export const MAX_TAG_DIGITS = 9;

// ─── Timestamp Layouts ────────────────────────────────────────────────────────

export const DATE_TIME_LENGTH        = 17; // YYYYMMDD-HH:MM:SS
export const DATE_TIME_MILLIS_LENGTH = 21; // YYYYMMDD-HH:MM:SS.sss
export const TIME_LENGTH             = 8;  // HH:MM:SS
export const TIME_MILLIS_LENGTH      = 12; // HH:MM:SS.sss

// ─── Text ─────────────────────────────────────────────────────────────────────

export const DEFAULT_ENCODING = 'utf-8';
