import type { Logger as PinoLogger } from 'pino';

/**
 * Components log through pino directly, data first:
 *   logger.info({ action: 'SIT', score: 0.82 }, 'Command handled');
 *   logger.error({ err }, 'Dispenser request failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger tagged with `component`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'];
