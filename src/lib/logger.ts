/**
 * Pino logger writing to stderr, pretty on a terminal and silent under test.
 * Modules take a named child from createLogger.
 */

import pino from 'pino';

const env = process.env.NODE_ENV;
const pretty = env !== 'production' && env !== 'test' && process.stderr.isTTY === true;

export const logger = pino(
  {
    level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info'),
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2,
          },
        }
      : undefined,
    redact: {
      paths: ['apiKey', 'key', 'config.apiKey', 'params.key'],
      censor: '[REDACTED]',
    },
  },
  pretty ? undefined : pino.destination(2)
);

export const createLogger = (module: string) => logger.child({ module });

export default logger;
