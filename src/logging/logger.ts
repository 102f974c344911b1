/**
 * Structured logging.  Components receive a pino Logger and add their
 * own bindings with `child()`.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../config';

export type { Logger };

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: 'smart-home-bridge', level });
}

/** A logger that discards everything; the default for library use and tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
