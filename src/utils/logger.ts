/**
 * Structured logging
 *
 * Every component logs through a pino child bound to its component name.
 * The root level is read from MODELS_LOG_LEVEL, falling back to `info`
 * (or `silent` when running under Vitest).
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

function defaultLevel(): LevelWithSilent {
  const envLevel = process.env.MODELS_LOG_LEVEL?.toLowerCase();
  if (isLevel(envLevel)) {
    return envLevel;
  }
  return process.env.VITEST === 'true' ? 'silent' : 'info';
}

const rootLogger: Logger = pino({ name: 'models-orchestrator', level: defaultLevel() });

/**
 * Replace the root logger level (called once the config is loaded)
 */
export function setLogLevel(level: string): void {
  if (!isLevel(level)) {
    return;
  }
  // The environment variable wins over the config file
  if (isLevel(process.env.MODELS_LOG_LEVEL?.toLowerCase())) {
    return;
  }
  rootLogger.level = level;
}

/**
 * Create a logger for a component
 *
 * @example
 * ```typescript
 * const logger = createLogger('ModelsWorker');
 * logger.info({ taskId }, 'Task started');
 * logger.error({ err: error, taskId }, 'Task failed');
 * ```
 */
export function createLogger(component: string, level?: LevelWithSilent): Logger {
  const child = rootLogger.child({ component });
  if (level) {
    child.level = level;
  }
  return child;
}
