/**
 * Structured logging with Pino
 *
 * - Development: pretty-printed, colorized output
 * - Production: JSON lines for log aggregation
 * - Tests: silent unless LOG_LEVEL says otherwise
 * - Tokens and passwords are redacted
 */

import pino from 'pino';

const env = process.env.NODE_ENV;
const usePretty = env !== 'production' && env !== 'test';

const logger = pino({
  level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info'),
  transport: usePretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss' } }
    : undefined,
  redact: [
    'token',
    'password',
    '*.token',
    '*.password',
    'headers.authorization',
    'headers["PRIVATE-TOKEN"]',
  ],
});

/**
 * Create a child logger scoped to a module
 *
 * @example
 * const log = createLogger('registry');
 * log.info({ providers: 12 }, 'Ticket table loaded');
 */
export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}

export default logger;
