import pino, { Logger, LoggerOptions } from 'pino';

/**
 * Paths redacted from every log line
 */
const REDACTION_PATHS = [
  'signingKey',
  'auditSigningKey',
  'audit.signingKey',
  'config.audit.signingKey',
  'secret',
  'password',
  'token',
  'apiKey'
];

/**
 * Create a structured JSON logger
 *
 * The level comes from the caller, then LOG_LEVEL, then `info`.
 * Pass `level: 'silent'` in tests.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]'
    },
    serializers: {
      err: pino.stdSerializers.err
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: 'proportional-asset-ledger' },
    ...options
  });
}

export type { Logger };
