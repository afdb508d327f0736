/**
 * Structured logging for MCP servers.
 *
 * Logs go to stderr: stdout belongs to the stdio JSON-RPC transport.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Create the process logger for a named server */
export function createLogger(name: string, level: LogLevel = 'info'): Logger {
  return pino({ name, level }, pino.destination(2));
}

/** Logger that discards everything; used by tests and embedders */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Log tool completion with outcome and duration.
 */
export function logToolComplete(
  logger: Logger,
  tool: string,
  result: 'success' | 'failure' | 'error',
  durationMs: number,
  context?: Record<string, unknown>,
): void {
  const level = result === 'success' ? 'info' : result === 'failure' ? 'warn' : 'error';
  logger[level](
    { tool, result, duration_ms: durationMs, ...context },
    `[${tool}] ${result} in ${durationMs}ms`,
  );
}
