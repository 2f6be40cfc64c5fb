import pino from 'pino';
import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Logger for code that runs before the DI container exists: entry points
 * reporting a failed startup, config parsing. Writes synchronously to stderr
 * so a fatal line is flushed before the process exits.
 */
let bootstrapLogger: Logger | null = null;

function bootstrapLevel(): LogLevel {
  const raw = process.env['VCT_LOG_LEVEL']?.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === raw);
  return match ?? 'info';
}

export function getBootstrapLogger(): Logger {
  if (!bootstrapLogger) {
    bootstrapLogger = pino(
      {
        level: bootstrapLevel(),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }
  return bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
