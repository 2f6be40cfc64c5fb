import pino from 'pino';
import type { DestinationStream } from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';
import { correlationMixin } from './correlation.js';

export interface LoggerFactoryOptions {
  readonly level: LogLevel;
  /** Defaults to stdout. Tests pass an in-memory stream. */
  readonly destination?: DestinationStream;
}

/**
 * Root pino logger: JSON lines, ISO timestamps, redacted secrets,
 * serialized errors under `err`, correlation id from the active request.
 */
export function createRootLogger(options: LoggerFactoryOptions): Logger {
  return pino(
    {
      level: options.level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
      mixin: correlationMixin,
    },
    options.destination ?? pino.destination({ dest: 1, sync: false })
  );
}

export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(options: LoggerFactoryOptions) {
    this._root = createRootLogger(options);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
