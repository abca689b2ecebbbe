import pino from 'pino';
import { LOG_LEVELS, type Logger, type ILoggerFactory, type LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * SPLITWRIGHT_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent. stdout carries the JSON result the agent parses.
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'silent';
}

export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // Sync to stderr (fd 2): stdout is reserved for command results.
    pino.destination({ dest: 2, sync: true })
  );
}

export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel = parseLogLevel(process.env['SPLITWRIGHT_LOG_LEVEL'])) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
