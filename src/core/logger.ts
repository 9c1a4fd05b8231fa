/**
 * Logger Module
 *
 * Configures structured logging using Pino.
 * In development, uses pino-pretty for human-readable colored output.
 * In production, outputs JSON logs for log aggregation systems.
 */

import { pino, type Logger } from 'pino';

export type { Logger };

/**
 * Creates a Pino logger
 *
 * - Development: Pretty-printed, colored output for easy reading
 * - Production and tests: plain JSON on stdout
 */
export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
  return pino({
    level,
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined
  });
}
