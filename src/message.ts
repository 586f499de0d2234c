/**
 * fixwire — ParsedMessage
 *
 * Read-only lens over one FIX message held in a caller-owned Uint8Array.
 *
 * ParsedMessage:
 *   1. Validates the envelope (header tags, BodyLength, trailer, CheckSum).
 *   2. Tokenizes the body into FieldDescriptors — offsets only, no copies.
 *   3. Indexes tag → field (last occurrence wins for repeated tags).
 *   4. Decodes values on demand through typed accessors that check the
 *      tag's declared semantic type against the registry.
 *
 * Usage:
 *
 *   const msg = new ParsedMessage(bytes);
 *   const parsed = msg.parse();
 *   if (!parsed.ok) return report(parsed.error);
 *
 *   const qty  = msg.asInteger(38);    // Result<number>
 *   const sent = msg.asDate(52);       // Result<DateValue>
 *
 * The buffer must not be mutated while the message is in use. parse() may be
 * called again; it discards the previous field list rather than appending.
 * Accessors never mutate state, so once parse() has returned a parsed
 * message can be shared by any number of readers.
 */

import {
  DEFAULT_ENCODING,
  SPACE,
  TAG_MESSAGE_ENCODING,
} from './constants';
import { asciiSpan, parseSigned } from './bytes';
import { err, ok, tagNotFound, typeMismatch, type FixError, type Result } from './errors';
import { silentLogger, type Logger } from './logger';
import { defaultRegistry } from './registry';
import { parseTimeSpan, parseTimestampSpan } from './timestamp';
import { validateMessage } from './header';
import { tokenize } from './tokenizer';
import type {
  DateValue,
  FieldDescriptor,
  FieldSpan,
  MessageStatus,
  ParseOptions,
  SemanticType,
  TagLookup,
  TimeValue,
  TokenizerStrategy,
} from './types';

// ─── Module-level decoders ────────────────────────────────────────────────────

// A non-streaming TextDecoder is stateless, so one instance per label is
// shared by every message.
const utf8Decoder = new TextDecoder(DEFAULT_ENCODING);
const decoderCache = new Map<string, TextDecoder>([[DEFAULT_ENCODING, utf8Decoder]]);

function decoderFor(label: string): TextDecoder | null {
  const key = label.toLowerCase();
  const cached = decoderCache.get(key);
  if (cached !== undefined) return cached;
  try {
    const decoder = new TextDecoder(key);
    decoderCache.set(key, decoder);
    return decoder;
  } catch (e) {
    // TextDecoder throws RangeError for labels it does not support.
    if (e instanceof RangeError) return null;
    throw e;
  }
}

const FLOAT_PATTERN = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;

// ─── ParsedMessage ────────────────────────────────────────────────────────────

export class ParsedMessage implements Iterable<FieldDescriptor> {
  readonly buffer: Uint8Array;

  private readonly _strategy: TokenizerStrategy;
  private readonly _registry: TagLookup;
  private readonly _logger:   Logger;
  private readonly _configuredEncoding: string | undefined;

  private _fields:      FieldDescriptor[] = [];
  private _index        = new Map<number, number>();
  private _status:      MessageStatus = 'empty';
  private _error:       FixError | null = null;
  private _msgType      = '';
  private _beginString  = '';
  private _encoding     = DEFAULT_ENCODING;

  constructor(buffer: Uint8Array, options: ParseOptions = {}) {
    this.buffer              = buffer;
    this._strategy           = options.strategy ?? 'one-pass';
    this._registry           = options.registry ?? defaultRegistry;
    this._logger             = options.logger ?? silentLogger;
    this._configuredEncoding = options.encoding;
  }

  // ── Parse ──────────────────────────────────────────────────────────────────

  /**
   * Validate and tokenize the buffer.
   *
   * On failure the message is left with status 'failed', no fields, and the
   * FixError available from `error`. Structural failures are detected before
   * any field is tokenized.
   */
  parse(): Result<ParsedMessage> {
    this.reset();
    const buf = this.buffer;
    this._logger.debug('parse', { bytes: buf.length, strategy: this._strategy });

    const validation = validateMessage(buf);
    if (!validation.ok) return this.fail(validation.error, 'validation');
    const info = validation.value;

    const body = tokenize(buf, info.bodyStart, info.trailerStart, {
      strategy: this._strategy,
      registry: this._registry,
    });
    if (!body.ok) return this.fail(body.error, 'tokenize');

    const [beginString, bodyLength] = info.headerFields;
    const fields: FieldDescriptor[] = [this.describe(beginString), this.describe(bodyLength)];
    for (const f of body.value) fields.push(f);
    fields.push(this.describe(info.trailerField));

    this._fields = fields;
    for (let i = 0; i < fields.length; i++) this._index.set(fields[i].tagNumber, i);

    this._msgType     = info.msgType;
    this._beginString = info.beginString;
    this._encoding    = this._configuredEncoding ?? this.declaredEncoding() ?? DEFAULT_ENCODING;
    this._status      = 'parsed';

    this._logger.debug('parsed', {
      msgType: this._msgType,
      fields:  fields.length,
      bodyLength: info.declaredBodyLength,
    });
    return ok(this);
  }

  private reset(): void {
    this._fields      = [];
    this._index       = new Map();
    this._status      = 'empty';
    this._error       = null;
    this._msgType     = '';
    this._beginString = '';
    this._encoding    = DEFAULT_ENCODING;
  }

  private fail(error: FixError, stage: 'validation' | 'tokenize'): Result<ParsedMessage> {
    this._fields = [];
    this._index  = new Map();
    this._status = 'failed';
    this._error  = error;
    this._logger.warn(`${stage} failed: ${error.message}`, {
      kind:   error.kind,
      offset: error.offset,
      tag:    error.tag,
    });
    return { ok: false, error };
  }

  private describe(span: FieldSpan): FieldDescriptor {
    return { ...span, descriptor: this._registry.lookup(span.tagNumber) };
  }

  private declaredEncoding(): string | undefined {
    const f = this.getField(TAG_MESSAGE_ENCODING);
    return f === undefined ? undefined : asciiSpan(this.buffer, f.valueStart, f.valueEnd);
  }

  // ── State ──────────────────────────────────────────────────────────────────

  get status(): MessageStatus {
    return this._status;
  }

  /** The failure from the last parse(), or null. */
  get error(): FixError | null {
    return this._error;
  }

  get msgType(): string {
    return this._msgType;
  }

  get beginString(): string {
    return this._beginString;
  }

  /** TextDecoder label used for 'encoded' tags. */
  get encoding(): string {
    return this._encoding;
  }

  // ── Fields ─────────────────────────────────────────────────────────────────

  /** All fields in wire order, including 8, 9 and 10. */
  get fields(): readonly FieldDescriptor[] {
    return this._fields;
  }

  get fieldCount(): number {
    return this._fields.length;
  }

  [Symbol.iterator](): Iterator<FieldDescriptor> {
    return this._fields[Symbol.iterator]();
  }

  /** Last occurrence of `tag`, or undefined. */
  getField(tag: number): FieldDescriptor | undefined {
    const i = this._index.get(tag);
    return i === undefined ? undefined : this._fields[i];
  }

  has(tag: number): boolean {
    return this._index.has(tag);
  }

  // ── Typed accessors ────────────────────────────────────────────────────────

  private typedField(tag: number, ...accepted: SemanticType[]): Result<FieldDescriptor> {
    const f = this.getField(tag);
    if (f === undefined) return tagNotFound(tag);
    if (!accepted.includes(f.descriptor.semanticType)) {
      return typeMismatch(tag, accepted.join('|'), f.descriptor.semanticType);
    }
    return ok(f);
  }

  /** Copy of the value bytes. Any semantic type. */
  rawBytes(tag: number): Result<Uint8Array> {
    const f = this.getField(tag);
    if (f === undefined) return tagNotFound(tag);
    return ok(this.buffer.slice(f.valueStart, f.valueEnd));
  }

  /** Signed decimal integer. Requires semantic type 'int'. */
  asInteger(tag: number): Result<number> {
    const r = this.typedField(tag, 'int');
    if (!r.ok) return r;
    const f = r.value;
    const value = parseSigned(this.buffer, f.valueStart, f.valueEnd);
    if (value === null) {
      return err('MalformedInteger', `Tag ${tag} value is not an integer.`, {
        tag, offset: f.valueStart, actual: asciiSpan(this.buffer, f.valueStart, f.valueEnd),
      });
    }
    return ok(value);
  }

  /**
   * Decimal number. Accepts 'float' and also 'int', because price and
   * quantity tags are registered as 'int' in the default table.
   */
  asFloat(tag: number): Result<number> {
    const r = this.typedField(tag, 'int', 'float');
    if (!r.ok) return r;
    const f = r.value;
    const text = asciiSpan(this.buffer, f.valueStart, f.valueEnd);
    if (!FLOAT_PATTERN.test(text)) {
      return err('MalformedFloat', `Tag ${tag} value is not a decimal number.`, {
        tag, offset: f.valueStart, actual: text,
      });
    }
    return ok(Number(text));
  }

  /**
   * Text value. Requires semantic type 'string'. 'encoded' tags decode with
   * the message encoding; all others as UTF-8.
   */
  asString(tag: number): Result<string> {
    const r = this.typedField(tag, 'string');
    if (!r.ok) return r;
    const f = r.value;

    let decoder = utf8Decoder;
    if (f.descriptor.property === 'encoded') {
      const found = decoderFor(this._encoding);
      if (found === null) {
        return err('UnsupportedEncoding', `Text encoding '${this._encoding}' is not supported.`, {
          tag, actual: this._encoding,
        });
      }
      decoder = found;
    }
    return ok(decoder.decode(this.buffer.subarray(f.valueStart, f.valueEnd)));
  }

  /** Space-separated tokens of a 'multi-value-string' tag. */
  asStringList(tag: number): Result<string[]> {
    const r = this.typedField(tag, 'string');
    if (!r.ok) return r;
    const f = r.value;
    if (f.descriptor.property !== 'multi-value-string') {
      return typeMismatch(tag, 'multi-value-string', f.descriptor.semanticType);
    }
    const tokens: string[] = [];
    let start = f.valueStart;
    for (let i = f.valueStart; i <= f.valueEnd; i++) {
      if (i === f.valueEnd || this.buffer[i] === SPACE) {
        if (i > start) tokens.push(asciiSpan(this.buffer, start, i));
        start = i + 1;
      }
    }
    return ok(tokens);
  }

  /** Single-character code value, as text. Requires semantic type 'char'. */
  asChar(tag: number): Result<string> {
    const r = this.typedField(tag, 'char');
    if (!r.ok) return r;
    return ok(asciiSpan(this.buffer, r.value.valueStart, r.value.valueEnd));
  }

  /** 'Y' → true, 'N' → false. Requires semantic type 'boolean'. */
  asBoolean(tag: number): Result<boolean> {
    const r = this.typedField(tag, 'boolean');
    if (!r.ok) return r;
    const text = asciiSpan(this.buffer, r.value.valueStart, r.value.valueEnd);
    if (text === 'Y') return ok(true);
    if (text === 'N') return ok(false);
    return err('MalformedBoolean', `Tag ${tag} value is not Y or N.`, {
      tag, offset: r.value.valueStart, actual: text,
    });
  }

  /** UTCTimestamp, with or without milliseconds. Requires semantic type 'date'. */
  asDate(tag: number): Result<DateValue> {
    const r = this.typedField(tag, 'date');
    if (!r.ok) return r;
    const f = r.value;
    const value = parseTimestampSpan(this.buffer, f.valueStart, f.valueEnd);
    if (value === null) {
      return err('MalformedDate', `Tag ${tag} value is not a UTC timestamp.`, {
        tag, offset: f.valueStart, actual: asciiSpan(this.buffer, f.valueStart, f.valueEnd),
      });
    }
    return ok(value);
  }

  /** UTCTimeOnly, with or without milliseconds. Requires semantic type 'time'. */
  asTime(tag: number): Result<TimeValue> {
    const r = this.typedField(tag, 'time');
    if (!r.ok) return r;
    const f = r.value;
    const value = parseTimeSpan(this.buffer, f.valueStart, f.valueEnd);
    if (value === null) {
      return err('MalformedDate', `Tag ${tag} value is not a UTC time.`, {
        tag, offset: f.valueStart, actual: asciiSpan(this.buffer, f.valueStart, f.valueEnd),
      });
    }
    return ok(value);
  }
}

// ─── Entry point ──────────────────────────────────────────────────────────────

/** Construct and parse in one call. */
export function parseMessage(buffer: Uint8Array, options: ParseOptions = {}): Result<ParsedMessage> {
  return new ParsedMessage(buffer, options).parse();
}
