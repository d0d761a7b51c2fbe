/**
 * Structured JSON logger
 *
 * Entries are written to stderr so stdout stays free for the command summary.
 */

import { sanitizeRecord, sanitizeString } from './sanitize';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: Record<string, unknown>;
  readonly error?: {
    readonly name: string;
    readonly message: string;
    readonly stack?: string;
  };
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').trim().toUpperCase();
  return isLogLevel(normalized) ? normalized : 'INFO';
}

export class Logger {
  private minLevel: LogLevel;

  constructor(minLevel: LogLevel = parseLogLevel(process.env.AUTOPILOT_LOG_LEVEL)) {
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('WARN', message, context);
  }

  /**
   * Log error message; a non-Error second argument is folded into the context
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log('ERROR', message, context, {
        name: error.name,
        message: sanitizeString(error.message),
        stack: error.stack ? sanitizeString(error.stack) : undefined
      });
      return;
    }

    const merged = isRecord(error) ? { ...error, ...context } : context;
    this.log('ERROR', message, merged);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: { name: string; message: string; stack?: string }
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: sanitizeString(message),
      ...(context && { context: sanitizeRecord(context) }),
      ...(error && { error })
    };

    console.error(JSON.stringify(entry));
  }
}

export const logger = new Logger();
