import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's own, no wrapper.
 *
 * Data-first calls:
 *   logger.info({ created: 3 }, 'Split directories materialized');
 *   logger.warn({ err }, 'Task publication skipped');
 */
export type Logger = PinoLogger;

/**
 * Creates component loggers; injected so tests can swap in a fake.
 */
export interface ILoggerFactory {
  create(component: string): Logger;
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
