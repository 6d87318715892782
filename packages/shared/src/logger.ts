/**
 * Structured Logging
 *
 * One JSON object per line, stamped with the correlation ID, document ID and
 * document role of the current context. LOG_LEVEL picks the threshold
 * (debug, info, warn, error, silent); without it debug lines are written
 * outside production only.
 */

import { getContext, getCorrelationId } from './context';

export interface LogContext {
  [key: string]: unknown;
}

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 } as const;

export type LogLevel = Exclude<keyof typeof LEVELS, 'silent'>;

function isLevelName(value: string): value is keyof typeof LEVELS {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  if (isLevelName(configured)) return LEVELS[configured];
  return process.env.NODE_ENV === 'production' ? LEVELS.info : LEVELS.debug;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVELS[level] >= threshold();
}

export function serializeError(error: unknown): LogContext | string {
  if (!(error instanceof Error)) return String(error);
  return {
    name: error.name,
    message: error.message,
    ...('code' in error && typeof error.code === 'string' ? { code: error.code } : {}),
    stack: error.stack,
  };
}

export function formatLogLine(level: LogLevel, message: string, fields?: LogContext): string {
  const context = getContext();
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    correlationId: getCorrelationId(),
    documentId: context?.documentId,
    documentRole: context?.documentRole,
    message,
    ...fields,
  });
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function write(level: LogLevel, message: string, fields?: LogContext): void {
  if (!isLevelEnabled(level)) return;
  WRITERS[level](formatLogLine(level, message, fields));
}

export const logger = {
  debug: (message: string, fields?: LogContext) => write('debug', message, fields),
  info: (message: string, fields?: LogContext) => write('info', message, fields),
  warn: (message: string, fields?: LogContext) => write('warn', message, fields),
  error: (message: string, error?: unknown, fields?: LogContext) =>
    write('error', message, error === undefined ? fields : { ...fields, error: serializeError(error) }),
};
