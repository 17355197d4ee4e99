/**
 * Structured logging for the verifier
 * @packageDocumentation
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/** Log levels accepted in job files and environment overrides */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Create a Pino logger bound to a component name
 * @param component - Component name added to every log line (e.g. `network-parser`)
 * @param level - Minimum level to emit (default: info)
 * @remarks
 * Every component of the verifier accepts an optional logger; library users
 * can pass a child of their own logger instead of calling this function.
 */
export function createLogger(component: string, level: string = 'info'): Logger {
  return pino({
    level,
    base: { component },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Logger that discards everything
 * @remarks
 * Default for components constructed without a logger.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
