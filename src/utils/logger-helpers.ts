/**
 * Logger helpers
 *
 * Lazy evaluation of log context objects: the context is only built when
 * the level is enabled. Used on per-access paths such as the staleness check.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * @example
 * lazyLog(logger, 'debug', () => ({ name, mtimeMs }), 'Artifact is fresh');
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
