/**
 * fixwire — ParsedMessage
 *
 * Parse lifecycle, tag lookup and typed accessors over complete messages.
 * Small messages are sealed with a real BodyLength and CheckSum by
 * envelope(); the execution report comes from tests/fixtures.
 */

import { describe, it, expect } from 'vitest';
import {
  ParsedMessage,
  parseMessage,
  computeChecksum,
  formatChecksum,
  dateValueToEpochMillis,
  unwrap,
  FixError,
  FixWriter,
  UNKNOWN_TAG,
  type LogContext,
  type Logger,
  type ParseOptions,
} from '../src/index';
import { RAW_DATA_MESSAGE, bytes, fix, loadFixture } from './helpers';

// ─── helpers ─────────────────────────────────────────────────────────────────

/** Wrap a '|'-delimited body in a valid 8/9 header and 10 trailer. */
function envelope(body: string): Uint8Array {
  const bodyBytes = fix(body);
  const pre = bytes(`8=FIX.4.4|9=${bodyBytes.length}|`, bodyBytes);
  return bytes(pre, `10=${formatChecksum(computeChecksum(pre))}|`);
}

function parsed(buf: Uint8Array, options: ParseOptions = {}): ParsedMessage {
  return unwrap(parseMessage(buf, options));
}

const EXECUTION_REPORT_TAGS = [
  8, 9, 35, 34, 49, 52, 56, 1, 6, 11, 14, 15, 17, 20, 21, 22,
  31, 32, 37, 38, 39, 40, 44, 48, 54, 55, 60, 58, 10,
];

// ─── Execution report ────────────────────────────────────────────────────────

describe('execution report', () => {
  const msg = parsed(loadFixture('execution-report.fix'));

  it('reports exactly 29 fields in wire order', () => {
    expect(msg.status).toBe('parsed');
    expect(msg.fieldCount).toBe(29);
    expect([...msg].map(f => f.tagNumber)).toEqual(EXECUTION_REPORT_TAGS);
  });

  it('decodes the header', () => {
    expect(unwrap(msg.asInteger(9))).toBe(289);
    expect(unwrap(msg.asString(35))).toBe('8');
    expect(msg.msgType).toBe('8');
    expect(msg.beginString).toBe('FIX.4.4');
    expect(unwrap(msg.asString(10))).toBe('249');
  });

  it('decodes SendingTime with milliseconds', () => {
    const sent = unwrap(msg.asDate(52));
    expect(sent).toEqual({
      year: 2024, month: 3, day: 15,
      hour: 14, minute: 30, second: 5, millisecond: 123,
      hasMillis: true,
    });
    expect(dateValueToEpochMillis(sent)).toBe(Date.UTC(2024, 2, 15, 14, 30, 5, 123));
  });

  it('decodes TransactTime without milliseconds', () => {
    expect(unwrap(msg.asDate(60))).toEqual({
      year: 2024, month: 3, day: 15,
      hour: 14, minute: 30, second: 5, millisecond: 0,
      hasMillis: false,
    });
  });

  it('reads integers, floats, chars and strings', () => {
    expect(unwrap(msg.asInteger(34))).toBe(124);
    expect(unwrap(msg.asInteger(14))).toBe(300);
    expect(unwrap(msg.asFloat(44))).toBe(101.5);
    expect(unwrap(msg.asFloat(6))).toBe(101.25);
    expect(unwrap(msg.asChar(54))).toBe('1');
    expect(unwrap(msg.asString(58))).toBe('Partial fill of 300 at 101.25 USD');
  });

  it('exposes field offsets', () => {
    expect(msg.getField(52)).toMatchObject({ tagStart: 40, valueStart: 43, valueEnd: 64 });
    expect(msg.has(151)).toBe(false);
  });

  it('gives the same fields with the two-pass strategy', () => {
    const two = parsed(loadFixture('execution-report.fix'), { strategy: 'two-pass' });
    expect(two.fields).toEqual(msg.fields);
  });
});

// ─── Accessor errors ──────────────────────────────────────────────────────────

describe('accessor errors', () => {
  const msg = parsed(loadFixture('execution-report.fix'));

  it('TagNotFound for an absent tag', () => {
    const r = msg.asInteger(999);
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe('TagNotFound');
    expect(r.error.tag).toBe(999);
    expect(msg.rawBytes(999).ok).toBe(false);
  });

  it('TypeMismatch carries declared and required types', () => {
    const r = msg.asInteger(49);
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe('TypeMismatch');
    expect(r.error.expected).toBe('int');
    expect(r.error.actual).toBe('string');
  });

  it('TypeMismatch for string and date accessors on other types', () => {
    const asString = msg.asString(38);
    const asDate   = msg.asDate(34);
    expect(asString.ok ? 'ok' : asString.error.kind).toBe('TypeMismatch');
    expect(asDate.ok ? 'ok' : asDate.error.kind).toBe('TypeMismatch');
  });

  it('MalformedInteger for a decimal price read as an integer', () => {
    const r = msg.asInteger(44);
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe('MalformedInteger');
    expect(r.error.actual).toBe('101.50');
  });

  it('unwrap throws the FixError', () => {
    expect(() => unwrap(msg.asInteger(999))).toThrow(FixError);
  });

  it('accessor failures leave the message unchanged', () => {
    msg.asInteger(49);
    msg.asDate(999);
    expect(msg.status).toBe('parsed');
    expect(msg.fieldCount).toBe(29);
  });
});

// ─── Raw data ─────────────────────────────────────────────────────────────────

describe('raw data fields', () => {
  const msg = parsed(RAW_DATA_MESSAGE);

  it('counts exactly 9 fields', () => {
    expect(msg.fieldCount).toBe(9);
    expect(msg.fields.map(f => f.tagNumber)).toEqual([8, 9, 35, 49, 95, 96, 90, 91, 10]);
  });

  it('spans tag 96 by its declared length', () => {
    expect(msg.getField(96)).toMatchObject({ tagStart: 36, valueStart: 39, valueEnd: 45 });
    expect(unwrap(msg.asInteger(95))).toBe(6);
  });

  it('returns the payload bytes including SOH and =', () => {
    expect(unwrap(msg.rawBytes(96))).toEqual(new Uint8Array([0x61, 0x62, 0x01, 0x63, 0x3d, 0x64]));
    expect(unwrap(msg.rawBytes(91))).toEqual(new Uint8Array([0x01, 0x3d, 0x01, 0x39, 0x39]));
  });

  it('returns a copy', () => {
    const copy = unwrap(msg.rawBytes(96));
    copy[0] = 0x7a;
    expect(msg.buffer[39]).toBe(0x61);
  });
});

// ─── Failed parses ────────────────────────────────────────────────────────────

describe('failed parses', () => {
  it('ChecksumMismatch leaves the field list empty', () => {
    const buf = loadFixture('execution-report.fix');
    buf.set(fix('000'), 308);
    const msg = new ParsedMessage(buf);
    const r = msg.parse();
    expect(r.ok).toBe(false);
    expect(msg.status).toBe('failed');
    expect(msg.error?.kind).toBe('ChecksumMismatch');
    expect(msg.fields).toEqual([]);
  });

  it('LengthMismatch is reported before any field is tokenized', () => {
    const msg = new ParsedMessage(fix('8=FIX.4.4|9=6|35=0|10=000|'));
    const r = msg.parse();
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe('LengthMismatch');
    expect(msg.fieldCount).toBe(0);
  });

  it('a tokenizer failure fails the whole parse', () => {
    // header "8=FIX.4.4|9=10|" is 15 bytes; the 'a' sits at body offset 6
    const msg = new ParsedMessage(envelope('35=0|4a=1|'));
    const r = msg.parse();
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.kind).toBe('MalformedTagNumber');
    expect(r.error.offset).toBe(21);
    expect(msg.fields).toEqual([]);
    expect(msg.asString(35).ok).toBe(false);
  });
});

// ─── Lifecycle ────────────────────────────────────────────────────────────────

describe('lifecycle', () => {
  it('starts empty', () => {
    const msg = new ParsedMessage(RAW_DATA_MESSAGE);
    expect(msg.status).toBe('empty');
    expect(msg.fieldCount).toBe(0);
    expect(msg.error).toBeNull();
  });

  it('re-populates rather than appends on a second parse', () => {
    const msg = new ParsedMessage(loadFixture('execution-report.fix'));
    unwrap(msg.parse());
    const first = msg.fields;
    unwrap(msg.parse());
    expect(msg.fieldCount).toBe(29);
    expect(msg.fields).toEqual(first);
  });

  it('last occurrence wins for repeated tags', () => {
    const msg = parsed(envelope('35=D|453=2|448=A|448=B|'));
    expect(msg.fieldCount).toBe(7);
    expect(unwrap(msg.asString(448))).toBe('B');
    expect(msg.fields.filter(f => f.tagNumber === 448)).toHaveLength(2);
  });

  it('types unknown tags as int', () => {
    const msg = parsed(envelope('35=D|9999=abc|'));
    expect(msg.getField(9999)?.descriptor).toBe(UNKNOWN_TAG);
    const r = msg.asInteger(9999);
    expect(r.ok ? 'ok' : r.error.kind).toBe('MalformedInteger');
  });
});

// ─── Other accessors ──────────────────────────────────────────────────────────

describe('typed accessors', () => {
  it('asBoolean reads Y and N', () => {
    const msg = parsed(envelope('35=D|43=Y|97=N|141=X|'));
    expect(unwrap(msg.asBoolean(43))).toBe(true);
    expect(unwrap(msg.asBoolean(97))).toBe(false);
    const bad = msg.asBoolean(141);
    expect(bad.ok ? 'ok' : bad.error.kind).toBe('MalformedBoolean');
  });

  it('asTime reads UTCTimeOnly', () => {
    const msg = parsed(envelope('35=W|273=14:30:05.250|'));
    expect(unwrap(msg.asTime(273))).toEqual({
      hour: 14, minute: 30, second: 5, millisecond: 250, hasMillis: true,
    });
  });

  it('asStringList splits multi-value strings', () => {
    const msg = parsed(envelope('35=W|276=A B  C|58=A B|'));
    expect(unwrap(msg.asStringList(276))).toEqual(['A', 'B', 'C']);
    const plain = msg.asStringList(58);
    expect(plain.ok ? 'ok' : plain.error.kind).toBe('TypeMismatch');
  });

  it('asFloat accepts leading-dot decimals and rejects exponents', () => {
    const msg = parsed(envelope('35=D|44=-.5|99=1e5|'));
    expect(unwrap(msg.asFloat(44))).toBe(-0.5);
    const bad = msg.asFloat(99);
    expect(bad.ok ? 'ok' : bad.error.kind).toBe('MalformedFloat');
  });

  it('asFloat refuses non-numeric types', () => {
    const msg = parsed(envelope('35=D|52=20240315-14:30:05|'));
    const r = msg.asFloat(52);
    expect(r.ok ? 'ok' : r.error.kind).toBe('TypeMismatch');
  });

  it('asDate rejects impossible dates and unknown layouts', () => {
    const msg = parsed(envelope('35=D|52=20240230-10:00:00|60=2024-03-15 10:00|122=20240229-23:59:60|'));
    const feb30 = msg.asDate(52);
    const layout = msg.asDate(60);
    expect(feb30.ok ? 'ok' : feb30.error.kind).toBe('MalformedDate');
    expect(layout.ok ? 'ok' : layout.error.kind).toBe('MalformedDate');
    expect(unwrap(msg.asDate(122))).toMatchObject({ month: 2, day: 29, second: 60 });
  });
});

// ─── Encoded text ─────────────────────────────────────────────────────────────

describe('encoded text', () => {
  const latin1 = new Uint8Array([0x63, 0x61, 0x66, 0xe9]); // "café" in ISO-8859-1

  it('decodes with the MessageEncoding tag', () => {
    const buf = new FixWriter('FIX.4.4', 'B')
      .field(347, 'ISO-8859-1')
      .rawData(354, 355, latin1)
      .finish();
    const msg = parsed(buf);
    expect(msg.encoding).toBe('ISO-8859-1');
    expect(unwrap(msg.asString(355))).toBe('café');
  });

  it('falls back to UTF-8 without a declared encoding', () => {
    const buf = new FixWriter('FIX.4.4', 'B').rawData(354, 355, 'café').finish();
    const msg = parsed(buf);
    expect(msg.encoding).toBe('utf-8');
    expect(unwrap(msg.asString(355))).toBe('café');
  });

  it('prefers the configured encoding over tag 347', () => {
    const buf = new FixWriter('FIX.4.4', 'B')
      .field(347, 'UTF-8')
      .rawData(354, 355, latin1)
      .finish();
    const msg = parsed(buf, { encoding: 'iso-8859-1' });
    expect(unwrap(msg.asString(355))).toBe('café');
  });

  it('UnsupportedEncoding for an unknown label', () => {
    const buf = new FixWriter('FIX.4.4', 'B').rawData(354, 355, 'x').finish();
    const msg = parsed(buf, { encoding: 'x-no-such-encoding' });
    const r = msg.asString(355);
    expect(r.ok ? 'ok' : r.error.kind).toBe('UnsupportedEncoding');
  });
});

// ─── Logging ──────────────────────────────────────────────────────────────────

describe('logging', () => {
  function recordingLogger() {
    const events: Array<[string, string, LogContext | undefined]> = [];
    const logger: Logger = {
      debug: (message, context) => { events.push(['debug', message, context]); },
      warn:  (message, context) => { events.push(['warn', message, context]); },
    };
    return { logger, events };
  }

  it('reports a failed validation once, with its kind and offset', () => {
    const buf = loadFixture('execution-report.fix');
    buf.set(fix('000'), 308);
    const { logger, events } = recordingLogger();
    new ParsedMessage(buf, { logger }).parse();

    const warnings = events.filter(([level]) => level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0][2]).toEqual({ kind: 'ChecksumMismatch', offset: 308, tag: 10 });
  });

  it('reports the parsed message type and field count', () => {
    const { logger, events } = recordingLogger();
    new ParsedMessage(loadFixture('execution-report.fix'), { logger }).parse();
    expect(events[events.length - 1]).toEqual([
      'debug', 'parsed', { msgType: '8', fields: 29, bodyLength: 289 },
    ]);
  });
});
