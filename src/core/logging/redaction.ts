/**
 * Paths pino replaces with `[REDACTED]`. Keys and tokens must never reach the
 * log sink, including through request headers or nested config objects.
 */
export const REDACTION_CONFIG = {
  paths: [
    'apiKey',
    'token',
    'secret',
    'password',
    'authorization',

    '*.apiKey',
    '*.token',
    '*.secret',
    '*.password',

    'config.auth.apiKey',
    'config.speech.apiKey',

    'headers.authorization',
    'headers["x-api-key"]',
    'req.headers.authorization',
    'req.headers["x-api-key"]',
  ],
  censor: '[REDACTED]',
};
