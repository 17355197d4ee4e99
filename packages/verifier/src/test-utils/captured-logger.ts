/**
 * Pino logger that keeps its output in memory for assertions
 */

import pino from 'pino';
import { Logger } from '../utils/logger';

export interface CapturedLogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export interface CapturedLogger {
  logger: Logger;
  entries: CapturedLogEntry[];
  /** Messages logged at a given pino level (30 info, 40 warn, 50 error) */
  messages(level: number): string[];
}

export function createCapturedLogger(): CapturedLogger {
  const entries: CapturedLogEntry[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string): void {
        const parsed: unknown = JSON.parse(line);
        if (isLogEntry(parsed)) {
          entries.push(parsed);
        }
      },
    }
  );
  return {
    logger,
    entries,
    messages: (level) => entries.filter((entry) => entry.level === level).map((entry) => entry.msg),
  };
}

function isLogEntry(value: unknown): value is CapturedLogEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'level') === 'number' &&
    typeof Reflect.get(value, 'msg') === 'string'
  );
}
