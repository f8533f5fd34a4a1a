/**
 * PostgreSQL connection pool
 */

import pg from 'pg';
import dotenv from 'dotenv';
import { createLogger } from '../services/logging/index.js';

dotenv.config();

const { Pool } = pg;
const logger = createLogger({ module: 'db' });

/**
 * Database configuration from environment variables
 */
const dbConfig: pg.PoolConfig = {
  // Individual settings, or DATABASE_URL when provided
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  database: process.env.DB_NAME || 'advisory',
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD,
  connectionString: process.env.DATABASE_URL,

  ssl: process.env.DATABASE_URL && process.env.DB_SSL !== 'false'
    ? { rejectUnauthorized: false }
    : undefined,

  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
};

/**
 * Shared connection pool
 */
export const pool = new Pool(dbConfig);

pool.on('error', (err: Error) => {
  logger.fatal({ err }, 'Unexpected error on idle database client');
  process.exit(-1);
});

/**
 * Test database connection (startup checks and health endpoint)
 */
export async function testConnection(): Promise<boolean> {
  let client: pg.PoolClient | undefined;
  try {
    client = await pool.connect();
    await client.query('SELECT 1');
    return true;
  } catch (error) {
    logger.error({ err: error }, 'Database connection failed');
    return false;
  } finally {
    client?.release();
  }
}

export async function closePool(): Promise<void> {
  await pool.end();
  logger.info('Database pool closed');
}

export type { Pool, PoolClient, QueryResult } from 'pg';
