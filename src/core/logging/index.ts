export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS } from './types.js';

export { PinoLoggerFactory, createRootLogger, type LoggerFactoryOptions } from './create-logger.js';

export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

export { getCorrelationId, runWithCorrelationId } from './correlation.js';

export { REDACTION_CONFIG } from './redaction.js';
