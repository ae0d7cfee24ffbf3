import pino, { type Logger } from 'pino';
import { getLogContext } from './log-context';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const REDACTED = '[REDACTED]';
const SECRET_FIELD_PATTERNS = [/api[-_]?key/i, /authorization/i, /secret/i, /token/i, /password/i];

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      level: process.env.LOG_LEVEL ?? 'info',
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      mixin: () => ({ ...getLogContext() })
    });
  }
  return rootLogger;
}

export function logDebug(event: string, fields?: Record<string, unknown>): void {
  writeLog('debug', event, fields);
}

export function logInfo(event: string, fields?: Record<string, unknown>): void {
  writeLog('info', event, fields);
}

export function logWarn(event: string, fields?: Record<string, unknown>): void {
  writeLog('warn', event, fields);
}

export function logError(event: string, fields?: Record<string, unknown>): void {
  writeLog('error', event, fields);
}

function writeLog(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
  const logger = getRootLogger();
  if (!logger.isLevelEnabled(level)) {
    return;
  }
  logger[level]({ event, ...sanitizeRecord(fields) }, event);
}

function sanitizeRecord(input: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (isSecretKey(key)) {
      output[key] = REDACTED;
      continue;
    }
    output[key] = sanitizeValue(value);
  }
  return output;
}

function sanitizeValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeValue(entry));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return { type: value.name, message: value.message };
  }
  if (isRecord(value)) {
    return sanitizeRecord(value);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSecretKey(key: string): boolean {
  return SECRET_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}
