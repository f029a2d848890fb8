/**
 * Logging with Pino - credentials and proxy auth are redacted
 */

import pino from 'pino';

const redactPaths = [
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  'cookie',
  'headers.authorization',
  'headers.Authorization',
  'headers.cookie',
  'proxy.auth',
  '*.password',
];

const usePrettyTransport =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test' && !process.env.VITEST;

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: usePrettyTransport
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
