import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

loadDotenv();

const booleanFromString = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .default(fallback);

const optionalNonEmptyString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim();
  return normalized === '' ? undefined : normalized;
}, z.string().min(1).optional());

const optionalUrlString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim();
  return normalized === '' ? undefined : normalized;
}, z.string().url().optional());

const optionalSnowflake = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim();
  return normalized === '' ? undefined : normalized;
}, z.string().regex(/^\d{17,20}$/).optional());

const snowflakeCsv = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return [];
  }

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}, z.array(z.string().regex(/^\d{17,20}$/)));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DATABASE_URL: z.string().url(),
  DISCORD_TOKEN: optionalNonEmptyString,
  DISCORD_APP_ID: optionalNonEmptyString,
  DISCORD_GUILD_ID: optionalNonEmptyString,
  COMMAND_DEPLOY_MODE: z.enum(['global', 'guild']).default('global'),
  JUDGE_CHANNEL_ID: optionalSnowflake,
  MAINTAINER_IDS: snowflakeCsv,
  SUBMISSIONS_ENABLED: booleanFromString('true'),
  SUBMISSIONS_DIR: z.string().trim().min(1).default('./submissions'),
  EVENT_TIMEZONE: z.string().default('Europe/Berlin'),
  // Empty string disables the scheduled reconciliation.
  TOPOLOGY_RECONCILE_CRON: z.string().trim().default('*/10 * * * *'),
  SENTRY_DSN: optionalUrlString
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const flattened = parsed.error.flatten();
  throw new Error(`Invalid environment variables: ${JSON.stringify(flattened.fieldErrors)}`);
}

export const env = parsed.data;
export type Env = typeof env;

export function assertRuntimeDiscordEnv(config: Env): asserts config is Env & {
  DISCORD_TOKEN: string;
  DISCORD_APP_ID: string;
  JUDGE_CHANNEL_ID: string;
} {
  if (!config.DISCORD_TOKEN || !config.DISCORD_APP_ID) {
    throw new Error('DISCORD_TOKEN and DISCORD_APP_ID are required for runtime bot process');
  }

  if (!config.JUDGE_CHANNEL_ID) {
    throw new Error('JUDGE_CHANNEL_ID is required for runtime bot process');
  }
}
