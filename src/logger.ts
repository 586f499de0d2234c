/**
 * fixwire — diagnostic logging collaborator
 *
 * The core has no logging dependency. Callers pass a Logger through
 * ParseOptions; the parser calls it at a few fixed points (parse outcome,
 * validation failure, tokenization failure) and never from inside a byte
 * loop. The default is silent.
 */

export type LogLevel = 'debug' | 'warn' | 'silent';

export type LogContext = Readonly<Record<string, string | number | boolean | undefined>>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug:  0,
  warn:   1,
  silent: 2,
};

/**
 * Logger that writes one line per event to the console, with the context
 * object serialized as JSON after the message.
 */
export function createConsoleLogger(level: LogLevel = 'warn', prefix = 'fixwire'): Logger {
  const threshold = LEVEL_RANK[level];
  const format = (message: string, context?: LogContext): string =>
    context === undefined
      ? `[${prefix}] ${message}`
      : `[${prefix}] ${message} ${JSON.stringify(context)}`;

  return {
    debug(message, context) {
      if (threshold <= LEVEL_RANK.debug) console.debug(format(message, context));
    },
    warn(message, context) {
      if (threshold <= LEVEL_RANK.warn) console.warn(format(message, context));
    },
  };
}
