import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Log file; truncated when the logger is created */
  file: string;
  level: string;
}

/**
 * JSON logger writing to the bot's log file
 */
export function makeLogger(options: LoggerOptions): Logger {
  return pino(
    {
      level: options.level,
      base: { service: 'mime' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: ['token', '*.token', 'apiKey', '*.apiKey'], censor: '[REDACTED]' },
    },
    pino.destination({ dest: options.file, append: false, mkdir: true, sync: true }),
  );
}

/**
 * For tests - keeps the Logger type, emits nothing
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
