import pino from 'pino';
import { env } from '../config/env';
import { correlationLogFields } from './correlation';

export const logger = pino({
  level: env.LOG_LEVEL,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
  mixin: () => correlationLogFields(),
  redact: {
    paths: ['token', 'DISCORD_TOKEN', 'database_url', 'DATABASE_URL', 'sentry_dsn', 'authorization', 'headers.authorization'],
    censor: '[REDACTED]'
  }
});

export type Logger = typeof logger;
