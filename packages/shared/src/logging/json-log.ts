import { inspect } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimal logger surface used by framework-free helpers. Nest's `Logger` satisfies it.
 */
export interface LineLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Pipeline identifiers that tie a line to a request, a message and the review it concerns. */
export interface LogContext {
  correlationId: string;
  causationId?: string;
  messageId?: string;
  messageType?: string;
  routingKey?: string;
  queue?: string;
  reviewId?: number;
  hotelId?: number;
}

export interface LogRecord extends LogContext {
  level: LogLevel;
  service: string;
  message: string;
  metadata?: Record<string, unknown>;
  error?: unknown;
  timestamp?: string;
}

export interface LoggedError {
  name: string;
  message: string;
  code?: string | number;
  stack?: string;
  cause?: LoggedError;
}

export interface JsonLogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  metadata?: Record<string, unknown>;
  error?: LoggedError;
}

// Optional context keys in the order they are written.
const OPTIONAL_CONTEXT_KEYS = [
  'causationId',
  'messageId',
  'messageType',
  'routingKey',
  'queue',
  'reviewId',
  'hotelId',
] as const satisfies ReadonlyArray<keyof LogContext>;

const MAX_CAUSE_DEPTH = 3;

export function createJsonLogEntry(record: LogRecord): JsonLogEntry {
  const entry: JsonLogEntry = {
    timestamp: record.timestamp ?? new Date().toISOString(),
    level: record.level,
    service: record.service,
    message: record.message,
    correlationId: record.correlationId,
  };

  for (const key of OPTIONAL_CONTEXT_KEYS) {
    copyDefined(entry, record, key);
  }

  if (record.metadata && Object.keys(record.metadata).length > 0) {
    entry.metadata = record.metadata;
  }

  const error = describeLoggedError(record.error);
  if (error) {
    entry.error = error;
  }

  return entry;
}

export function jsonLogLine(record: LogRecord): string {
  return JSON.stringify(createJsonLogEntry(record));
}

/** Errors keep their driver `code` and up to three nested causes; thrown non-errors are inspected. */
export function describeLoggedError(error: unknown, depth = 0): LoggedError | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }

  if (!(error instanceof Error)) {
    return {
      name: typeof error === 'string' ? 'Error' : 'NonErrorThrown',
      message: typeof error === 'string' ? error : inspect(error, { depth: 2, breakLength: Infinity }),
    };
  }

  const described: LoggedError = { name: error.name, message: error.message };
  const code = readErrorCode(error);
  if (code !== undefined) {
    described.code = code;
  }
  if (error.stack) {
    described.stack = error.stack;
  }
  if (depth < MAX_CAUSE_DEPTH) {
    const cause = describeLoggedError(error.cause, depth + 1);
    if (cause) {
      described.cause = cause;
    }
  }

  return described;
}

function copyDefined<K extends keyof LogContext>(target: LogContext, source: LogContext, key: K): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}

function readErrorCode(error: Error): string | number | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
}
