// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  SemanticType,
  TagProperty,
  TagDescriptor,
  TagLookup,
  FieldSpan,
  FieldDescriptor,
  ValidationInfo,
  DateValue,
  TimeValue,
  TokenizerStrategy,
  ParseOptions,
  MessageStatus,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  SOH,
  EQUALS,
  TAG_BEGIN_STRING,
  TAG_BODY_LENGTH,
  TAG_CHECKSUM,
  TAG_MSG_TYPE,
  TAG_MESSAGE_ENCODING,
  TRAILER_SIZE,
  CHECKSUM_DIGITS,
  DEFAULT_ENCODING,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export { FixError, ok, err, unwrap } from './errors';
export type { FixErrorKind, FixErrorDetails, Result } from './errors';

// ─── Logging ──────────────────────────────────────────────────────────────────
export { silentLogger, createConsoleLogger } from './logger';
export type { Logger, LogLevel, LogContext } from './logger';

// ─── Bytes ────────────────────────────────────────────────────────────────────
export { indexOfByte, readUnsignedUntil, parseUnsigned, parseSigned } from './bytes';

// ─── Registry ─────────────────────────────────────────────────────────────────
export {
  TagRegistry,
  createTagRegistry,
  defaultRegistry,
  UNKNOWN_TAG,
  isUnknownTag,
  isRawDataTag,
} from './registry';
export type { TagTableEntry } from './registry';

// ─── Validation ───────────────────────────────────────────────────────────────
export { validateMessage, computeChecksum, formatChecksum } from './header';

// ─── Tokenizer ────────────────────────────────────────────────────────────────
export { tokenize, tokenizeOnePass, tokenizeTwoPass } from './tokenizer';
export type { TokenizeOptions } from './tokenizer';

// ─── Message ──────────────────────────────────────────────────────────────────
export { ParsedMessage, parseMessage } from './message';
export { dateValueToEpochMillis, formatTimestamp, isValidDateValue } from './timestamp';

// ─── Writer ───────────────────────────────────────────────────────────────────
export { FixWriter, FixWriterError, encodeMessage } from './writer';
export type { FieldValue } from './writer';
