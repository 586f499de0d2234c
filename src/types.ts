/**
 * fixwire — type definitions
 *
 * Field records are byte spans into the caller's buffer. Nothing is decoded
 * until a typed accessor is called; the buffer IS the message.
 */

import type { Logger } from './logger';

// ─── Tag Semantics ────────────────────────────────────────────────────────────

/**
 * Declared value type of a tag.
 *
 * float-valued FIX tags (Price, AvgPx, LastPx …) are registered as 'int' in
 * the default table. asFloat() accepts both 'int' and 'float' for that reason.
 */
export type SemanticType =
  | 'int'
  | 'float'
  | 'char'
  | 'boolean'
  | 'data'
  | 'string'
  | 'date'
  | 'time';

/**
 * Special handling a tag requires from the tokenizer or accessors.
 *
 * data-length:        value is the byte length of the next raw-data field.
 * data:               value is exactly <cached length> opaque bytes.
 * encoded:            like data, and decoded with the message text encoding.
 * repeated:           NoXxx group counter; flat enumeration only.
 * multi-value-string: space-separated list of tokens.
 */
export type TagProperty =
  | 'none'
  | 'repeated'
  | 'data-length'
  | 'data'
  | 'encoded'
  | 'multi-value-string';

export interface TagDescriptor {
  readonly key:          number;
  readonly name:         string;
  readonly semanticType: SemanticType;
  readonly property:     TagProperty;
}

// ─── Fields ───────────────────────────────────────────────────────────────────

/**
 * Byte offsets of one `tag=value<SOH>` field.
 *
 *   tagStart    first digit of the tag
 *   valueStart  first byte after '='
 *   valueEnd    offset of the terminating SOH (exclusive end of the value)
 */
export interface FieldSpan {
  readonly tagNumber:  number;
  readonly tagStart:   number;
  readonly valueStart: number;
  readonly valueEnd:   number;
}

export interface FieldDescriptor extends FieldSpan {
  readonly descriptor: TagDescriptor;
}

// ─── Validation ───────────────────────────────────────────────────────────────

export interface ValidationInfo {
  readonly beginString:        string;
  readonly msgType:            string;
  /** First byte after the BodyLength field's SOH. */
  readonly bodyStart:          number;
  /** Offset of the "1" in "10=". */
  readonly trailerStart:       number;
  readonly declaredBodyLength: number;
  readonly checksum:           number;
  readonly headerFields:       readonly [FieldSpan, FieldSpan];
  readonly trailerField:       FieldSpan;
}

// ─── Decoded Values ───────────────────────────────────────────────────────────

/** UTCTimestamp components. Always UTC; month is 1-based. */
export interface DateValue {
  readonly year:        number;
  readonly month:       number;
  readonly day:         number;
  readonly hour:        number;
  readonly minute:      number;
  readonly second:      number;
  readonly millisecond: number;
  /** True when the wire value carried a `.sss` fraction. */
  readonly hasMillis:   boolean;
}

/** UTCTimeOnly components. */
export interface TimeValue {
  readonly hour:        number;
  readonly minute:      number;
  readonly second:      number;
  readonly millisecond: number;
  readonly hasMillis:   boolean;
}

// ─── Options ──────────────────────────────────────────────────────────────────

export type TokenizerStrategy = 'one-pass' | 'two-pass';

export interface ParseOptions {
  /** Default 'one-pass'. */
  readonly strategy?: TokenizerStrategy;
  /**
   * TextDecoder label used for 'encoded' tags. When absent, tag 347
   * (MessageEncoding) is consulted, then 'utf-8'.
   */
  readonly encoding?: string;
  readonly registry?: TagLookup;
  readonly logger?:   Logger;
}

/** The only registry capability the tokenizer and accessors need. */
export interface TagLookup {
  lookup(tagNumber: number): TagDescriptor;
}

export type MessageStatus = 'empty' | 'parsed' | 'failed';
