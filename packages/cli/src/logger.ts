/**
 * CLI logger. Diagnostics go to stderr as JSON lines; stdout carries only
 * command output.
 */

import pino from 'pino';
import type { Logger } from 'pino';

const LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export function createLogger(level: string): Logger {
  return pino(
    { name: 'arbor', level: LEVELS.has(level) ? level : 'warn' },
    pino.destination(2)
  );
}
