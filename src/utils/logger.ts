import pino from 'pino';

/**
 * Application logger using Pino
 *
 * - Pretty printing while developing, structured JSON in production and tests
 * - Credentials are redacted wherever they appear in a log context
 */

const env = process.env.NODE_ENV;
const isPretty = env !== 'production' && env !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',

  transport: isPretty ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  redact: {
    paths: ['password', 'accessJwt', 'refreshJwt', '*.password', '*.accessJwt', '*.refreshJwt'],
    censor: '[redacted]',
  },

  base: {
    app: 'shutterpost',
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
