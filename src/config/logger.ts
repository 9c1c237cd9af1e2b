import pino from 'pino';

/**
 * Pino redaction paths for subscriber PII and credentials.
 *
 * Wildcards (*) match any key at that depth, so `*.email` covers
 * `{ subscriber: { email: '...' } }`.
 */
const SENSITIVE_KEYS = [
  'email',
  'displayName',
  'authorization',
  'signature',
  'secret',
  'password',
  'token',
  'tokenHash',
  'cronKey',
];

const REDACT_PATHS = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
  ...SENSITIVE_KEYS.map((key) => `*.*.${key}`),
];

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  transport:
    process.env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ component: name });
}

export type Logger = ReturnType<typeof createChildLogger>;
