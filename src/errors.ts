/**
 * fixwire — error taxonomy and Result type
 *
 * Parsing and accessor operations never throw on malformed input. They
 * return a Result whose error side is a FixError: a normal Error subclass
 * carrying a machine-readable `kind` plus whatever expected / actual values
 * the failing check compared, so a caller can report the problem without
 * re-scanning the buffer.
 *
 * unwrap() converts a Result back to throw-style for callers that prefer it.
 */

import type { SemanticType } from './types';

// ─── Error Kinds ──────────────────────────────────────────────────────────────

export type FixErrorKind =
  // structural validation
  | 'HeaderTagMismatch'
  | 'LengthTagMismatch'
  | 'MsgTypeTagMismatch'
  | 'TrailerTagMismatch'
  | 'LengthMismatch'
  | 'ChecksumMismatch'
  // tokenization
  | 'MalformedTagNumber'
  | 'MalformedInteger'
  | 'DataLengthOverflow'
  | 'MissingDataTerminator'
  | 'MissingDataLength'
  | 'UnterminatedField'
  // typed access
  | 'TagNotFound'
  | 'TypeMismatch'
  | 'MalformedFloat'
  | 'MalformedBoolean'
  | 'MalformedDate'
  | 'UnsupportedEncoding';

export interface FixErrorDetails {
  /** Byte offset in the message at which the check failed. */
  readonly offset?:   number;
  readonly tag?:      number;
  readonly expected?: number | string;
  readonly actual?:   number | string;
}

export class FixError extends Error {
  readonly kind:      FixErrorKind;
  readonly offset?:   number;
  readonly tag?:      number;
  readonly expected?: number | string;
  readonly actual?:   number | string;

  constructor(kind: FixErrorKind, message: string, details: FixErrorDetails = {}) {
    super(message);
    this.name     = 'FixError';
    this.kind     = kind;
    this.offset   = details.offset;
    this.tag      = details.tag;
    this.expected = details.expected;
    this.actual   = details.actual;
  }
}

// ─── Result ───────────────────────────────────────────────────────────────────

export type Result<T> =
  | { readonly ok: true;  readonly value: T }
  | { readonly ok: false; readonly error: FixError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T>(
  kind:    FixErrorKind,
  message: string,
  details: FixErrorDetails = {},
): Result<T> {
  return { ok: false, error: new FixError(kind, message, details) };
}

/** Return the value or throw the FixError. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

// ─── Shared constructors ──────────────────────────────────────────────────────

export function tagNotFound<T>(tag: number): Result<T> {
  return err('TagNotFound', `Tag ${tag} is not present in the message.`, { tag });
}

export function typeMismatch<T>(
  tag:      number,
  expected: SemanticType | string,
  actual:   SemanticType,
): Result<T> {
  return err(
    'TypeMismatch',
    `Tag ${tag} is declared as '${actual}'; accessor requires '${expected}'.`,
    { tag, expected, actual },
  );
}
