/**
 * PostgreSQL Database Connection
 */

import { Pool } from 'pg';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { SCHEMA } from './schema.js';

let pool: Pool | null = null;

/**
 * Get the initialized database pool
 */
export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return pool;
}

/**
 * Initialize database connection pool and schema
 */
export async function initDatabase(connectionString: string = config.database.url): Promise<Pool> {
  if (pool) {
    logger.debug('Database pool already initialized');
    return pool;
  }

  const created = new Pool({
    connectionString,
    // one connection per concurrent article worker, plus the listing walk
    max: config.scraper.maxConcurrent + 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  created.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });

  // Test connection
  try {
    const client = await created.connect();
    logger.info('Database connection established');
    client.release();
  } catch (error) {
    logger.fatal({ error }, 'Failed to connect to database');
    await created.end();
    throw error;
  }

  pool = created;

  await initSchema(created);
  return created;
}

/**
 * Create tables and indexes if they do not exist
 */
async function initSchema(target: Pool): Promise<void> {
  try {
    await target.query(SCHEMA);
    logger.info('Database schema initialized');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize schema');
    throw error;
  }
}

/**
 * Close database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}
