import { Pool } from 'pg';
import { env } from '../../config/env';
import { logger } from '../../lib/logger';

export const pgPool = new Pool({
  connectionString: env.DATABASE_URL,
  ssl: env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : undefined,
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 10_000
});

pgPool.on('error', (error) => {
  logger.error({ error }, 'Idle postgres client failed');
});

export async function checkDbHealth(): Promise<boolean> {
  try {
    const result = await pgPool.query('select 1');
    return result.rowCount === 1;
  } catch (error) {
    logger.warn({ error }, 'Database health probe failed');
    return false;
  }
}
