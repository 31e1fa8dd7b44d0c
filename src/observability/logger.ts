// Structured logging
// One pino root per process; every request logs through a child bound to its requestId

import { pino } from 'pino';
import type { Bindings, DestinationStream, LogFn, Logger, LoggerOptions } from 'pino';
import { env } from '../env.js';

/**
 * The slice of a pino logger the core depends on.
 * Both a plain pino logger and Fastify's `server.log` satisfy it.
 */
export interface AppLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child(bindings: Bindings): AppLogger;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEventFields {
  durationMs?: number;
  details?: Record<string, unknown>;
}

export function buildLoggerOptions(): LoggerOptions {
  const options: LoggerOptions = {
    level: env.LOG_LEVEL,
    base: { service: 'tool-stream-orchestrator' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (env.NODE_ENV === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
}

export function createLogger(destination?: DestinationStream): Logger {
  if (destination) {
    return pino({ ...buildLoggerOptions(), transport: undefined, level: 'debug' }, destination);
  }
  return pino(buildLoggerOptions());
}

/** Writes one LogEntry: `{requestId (bound), time, level, eventType, durationMs?, details}`. */
export function logEvent(
  log: AppLogger,
  level: LogLevel,
  eventType: string,
  message: string,
  fields: LogEventFields = {},
): void {
  const entry: Record<string, unknown> = { eventType };
  if (fields.durationMs !== undefined) entry.durationMs = fields.durationMs;
  if (fields.details) entry.details = fields.details;
  log[level](entry, message);
}
