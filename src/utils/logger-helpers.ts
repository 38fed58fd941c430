/**
 * Logger Performance Helpers
 *
 * Lazy evaluation of log context objects: the context is only built when
 * the level is enabled. Used on per-request paths (window admission, token
 * polling) where debug logging is normally off.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level (trace, debug, info, warn, error, fatal)
 * @param contextBuilder - Function that builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ pending: queue.length }), 'Entry admitted');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
