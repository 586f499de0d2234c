import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const encoder = new TextEncoder();

/** ASCII text with '|' standing in for SOH → message bytes. */
export function fix(text: string): Uint8Array {
  return encoder.encode(text.replaceAll('|', '\x01'));
}

/** Concatenate byte chunks; strings are taken through fix(). */
export function bytes(...parts: Array<string | Uint8Array>): Uint8Array {
  const chunks = parts.map(p => (typeof p === 'string' ? fix(p) : p));
  const out = new Uint8Array(chunks.reduce((n, c) => n + c.length, 0));
  let at = 0;
  for (const c of chunks) {
    out.set(c, at);
    at += c.length;
  }
  return out;
}

/** Load tests/fixtures/<name>, a single '|'-delimited message on one line. */
export function loadFixture(name: string): Uint8Array {
  const path = fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
  return fix(readFileSync(path, 'latin1').replace(/\r?\n$/, ''));
}

/**
 * 8=FIX.4.4|9=45|35=U1|49=SENDER|95=6|96=ab<SOH>c=d|90=5|91=<SOH>=<SOH>99|10=037|
 *
 * Both payloads contain SOH and '='. Field offsets:
 *   8 (0, 2, 9)     9 (10, 12, 14)   35 (15, 18, 20)  49 (21, 24, 30)
 *   95 (31, 34, 35) 96 (36, 39, 45)  90 (46, 49, 50)  91 (51, 54, 59)
 *   10 (60, 63, 66)
 */
export const RAW_DATA_MESSAGE: Uint8Array = bytes(
  '8=FIX.4.4|9=45|35=U1|49=SENDER|95=6|96=ab|c=d|90=5|91=|=|99|10=037|',
);
