/**
 * fixwire — FixWriter
 *
 * Builds a well-formed FIX message: the caller supplies BeginString, MsgType
 * and body fields in wire order; finish() prepends the header, measures
 * BodyLength and appends "10=ccc<SOH>".
 *
 *   const bytes = new FixWriter('FIX.4.4', 'D')
 *     .field(49, 'BUYSIDE')
 *     .field(56, 'SELLSIDE')
 *     .field(38, 100)
 *     .rawData(95, 96, payload)     // RawDataLen + RawData
 *     .finish();
 *
 * Values are validated as they are appended: a delimited value may not
 * contain SOH (only rawData() payloads may), length and data tags go through
 * rawData(), tag numbers have at most 9 digits, and the header/trailer tags
 * (8, 9, 35, 10) are owned by the writer.
 */

import {
  SOH,
  MAX_TAG_DIGITS,
  TRAILER_SIZE,
  TAG_BEGIN_STRING,
  TAG_BODY_LENGTH,
  TAG_CHECKSUM,
  TAG_MSG_TYPE,
} from './constants';
import { computeChecksum, formatChecksum } from './header';
import { defaultRegistry, isRawDataTag } from './registry';
import { formatTimestamp, isValidDateValue } from './timestamp';
import type { DateValue, TagLookup } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

export class FixWriterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FixWriterError';
  }
}

// ─── Public types ─────────────────────────────────────────────────────────────

/**
 * string     written as UTF-8
 * number     written with String(); must be finite
 * boolean    'Y' / 'N'
 * Uint8Array written verbatim; must not contain SOH
 * DateValue  UTCTimestamp, with millis when hasMillis is set
 */
export type FieldValue = string | number | boolean | Uint8Array | DateValue;

const RESERVED_TAGS: ReadonlySet<number> = new Set([
  TAG_BEGIN_STRING, TAG_BODY_LENGTH, TAG_MSG_TYPE, TAG_CHECKSUM,
]);

// Shared across all writers — TextEncoder.encode() is stateless.
const utf8Encoder = new TextEncoder();

function containsSoh(bytes: Uint8Array): boolean {
  return bytes.indexOf(SOH) !== -1;
}

function encodeValue(tag: number, value: FieldValue): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (typeof value === 'string')  return utf8Encoder.encode(value);
  if (typeof value === 'boolean') return utf8Encoder.encode(value ? 'Y' : 'N');
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new FixWriterError(`Tag ${tag}: cannot write non-finite number ${value}.`);
    }
    return utf8Encoder.encode(String(value));
  }
  if (!isValidDateValue(value)) {
    throw new FixWriterError(`Tag ${tag}: date component out of range.`);
  }
  return utf8Encoder.encode(formatTimestamp(value));
}

// ─── FixWriter ────────────────────────────────────────────────────────────────

export class FixWriter {
  private readonly chunks:   Uint8Array[] = [];
  private readonly registry: TagLookup;
  private bodyLength = 0;

  constructor(
    private readonly beginString: string,
    msgType:  string,
    registry: TagLookup = defaultRegistry,
  ) {
    if (beginString.length === 0 || msgType.length === 0) {
      throw new FixWriterError('BeginString and MsgType must be non-empty.');
    }
    if (beginString.includes('\x01') || msgType.includes('\x01')) {
      throw new FixWriterError('BeginString and MsgType may not contain SOH.');
    }
    this.registry = registry;
    this.append(TAG_MSG_TYPE, utf8Encoder.encode(msgType));
  }

  /** Append one delimited `tag=value` field. */
  field(tag: number, value: FieldValue): this {
    this.checkTag(tag);
    const descriptor = this.registry.lookup(tag);
    if (isRawDataTag(descriptor) || descriptor.property === 'data-length') {
      throw new FixWriterError(`Tag ${tag} carries raw data; write it with rawData().`);
    }
    const bytes = encodeValue(tag, value);
    if (containsSoh(bytes)) {
      throw new FixWriterError(`Tag ${tag}: value contains the SOH delimiter.`);
    }
    this.append(tag, bytes);
    return this;
  }

  /**
   * Append a length/data pair. The payload is written verbatim and may
   * contain SOH and '=' bytes.
   */
  rawData(lengthTag: number, dataTag: number, payload: Uint8Array | string): this {
    this.checkTag(lengthTag);
    this.checkTag(dataTag);
    if (this.registry.lookup(lengthTag).property !== 'data-length') {
      throw new FixWriterError(`Tag ${lengthTag} is not a data-length tag.`);
    }
    if (!isRawDataTag(this.registry.lookup(dataTag))) {
      throw new FixWriterError(`Tag ${dataTag} is not a raw data tag.`);
    }
    const bytes = typeof payload === 'string' ? utf8Encoder.encode(payload) : payload;
    this.append(lengthTag, utf8Encoder.encode(String(bytes.length)));
    this.append(dataTag, bytes);
    return this;
  }

  /** Assemble header, body and trailer into a new buffer. */
  finish(): Uint8Array {
    const header  = utf8Encoder.encode(
      `8=${this.beginString}\x019=${this.bodyLength}\x01`,
    );
    const trailerStart = header.length + this.bodyLength;
    const out = new Uint8Array(trailerStart + TRAILER_SIZE);

    out.set(header, 0);
    let at = header.length;
    for (const chunk of this.chunks) {
      out.set(chunk, at);
      at += chunk.length;
    }
    const checksum = formatChecksum(computeChecksum(out, trailerStart));
    out.set(utf8Encoder.encode(`10=${checksum}\x01`), trailerStart);
    return out;
  }

  private checkTag(tag: number): void {
    if (!Number.isInteger(tag) || tag <= 0 || tag >= 10 ** MAX_TAG_DIGITS) {
      throw new FixWriterError(`Invalid tag number ${tag}.`);
    }
    if (RESERVED_TAGS.has(tag)) {
      throw new FixWriterError(`Tag ${tag} is written by FixWriter itself.`);
    }
  }

  private append(tag: number, value: Uint8Array): void {
    const prefix = utf8Encoder.encode(`${tag}=`);
    const field  = new Uint8Array(prefix.length + value.length + 1);
    field.set(prefix, 0);
    field.set(value, prefix.length);
    field[field.length - 1] = SOH;
    this.chunks.push(field);
    this.bodyLength += field.length;
  }
}

/** One-shot form of FixWriter for fields that need no raw data. */
export function encodeMessage(
  beginString: string,
  msgType:     string,
  fields:      ReadonlyArray<readonly [number, FieldValue]>,
): Uint8Array {
  const writer = new FixWriter(beginString, msgType);
  for (const [tag, value] of fields) writer.field(tag, value);
  return writer.finish();
}
