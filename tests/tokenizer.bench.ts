/**
 * fixwire — tokenizer strategies under load
 *
 *   npm run bench
 */

import { bench, describe } from 'vitest';
import { FixWriter, parseMessage, tokenize, validateMessage } from '../src/index';
import { RAW_DATA_MESSAGE, loadFixture } from './helpers';

const executionReport = loadFixture('execution-report.fix');

// Many small text fields followed by a large payload full of delimiters.
const heavyWriter = new FixWriter('FIX.4.4', 'U1');
for (let i = 0; i < 200; i++) heavyWriter.field(5000 + i, `value-${i}`);
const heavyPayload = new Uint8Array(16_384);
for (let i = 0; i < heavyPayload.length; i++) heavyPayload[i] = i % 7 === 0 ? 0x01 : 0x61;
const heavyMessage = heavyWriter.rawData(95, 96, heavyPayload).finish();

const corpus: Array<[string, Uint8Array]> = [
  ['execution report', executionReport],
  ['raw data', RAW_DATA_MESSAGE],
  ['200 fields + 16 KiB payload', heavyMessage],
];

for (const [name, buf] of corpus) {
  const info = validateMessage(buf);
  if (!info.ok) throw info.error;
  const { bodyStart, trailerStart } = info.value;

  describe(`tokenize: ${name}`, () => {
    bench('one-pass', () => {
      tokenize(buf, bodyStart, trailerStart, { strategy: 'one-pass' });
    });
    bench('two-pass', () => {
      tokenize(buf, bodyStart, trailerStart, { strategy: 'two-pass' });
    });
  });

  describe(`parseMessage: ${name}`, () => {
    bench('one-pass', () => {
      parseMessage(buf, { strategy: 'one-pass' });
    });
    bench('two-pass', () => {
      parseMessage(buf, { strategy: 'two-pass' });
    });
  });
}
