import type { Logger } from './types.js';
import { createRootLogger, parseLogLevel } from './create-logger.js';

/**
 * Logger for code that runs before the container exists (argument parsing,
 * config loading, the session-id hook). After that, inject ILoggerFactory.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(parseLogLevel(process.env['SPLITWRIGHT_LOG_LEVEL']));
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
