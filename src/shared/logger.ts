/**
 * Structured logger using Pino.
 *
 * Pretty-printed through pino-pretty in development, newline-delimited JSON
 * in production, silent while the test suite runs.
 */

import { pino, type Logger as PinoLogger } from 'pino';

const env = process.env.NODE_ENV ?? 'development';
const isTest = env === 'test' || process.env.VITEST !== undefined;
const isDev = env !== 'production' && !isTest;

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname'
        }
      }
    : undefined,
  base: {
    service: 'pr-preview-bot',
    env
  }
});

export type Logger = PinoLogger;
