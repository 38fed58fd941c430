/**
 * Root logger factory
 *
 * Components never create loggers themselves: they take an optional pino
 * `Logger` and log with structured context. Only entry points (the
 * deployment factory, the server script) call `createLogger`.
 */

import { pino, type Logger } from 'pino';

const DEFAULT_LOG_LEVEL = process.env.PREDICTOR_GATEWAY_LOG_LEVEL ?? 'info';

export interface CreateLoggerOptions {
  /** Overrides PREDICTOR_GATEWAY_LOG_LEVEL */
  level?: string;
  /** Static bindings added to every line (e.g. deployment name) */
  bindings?: Record<string, unknown>;
}

/**
 * Create the root logger for a deployment or script.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ bindings: { deployment: 'gpt-j-6b' } });
 * logger.info({ port: 8000 }, 'HTTP server listening');
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const root = pino({ level: options.level ?? DEFAULT_LOG_LEVEL });
  return options.bindings ? root.child(options.bindings) : root;
}
