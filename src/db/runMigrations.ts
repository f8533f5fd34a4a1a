/**
 * Migration runner used during server startup.
 * Applies pending SQL files from ./migrations in name order.
 */

import { readFileSync, readdirSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { pool } from './connection.js';
import { createLogger, startTimer } from '../services/logging/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const logger = createLogger({ module: 'migrations' });

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    version TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

function getMigrationFiles(): string[] {
  const migrationsDir = join(__dirname, 'migrations');
  try {
    return readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();
  } catch {
    logger.warn({ migrationsDir }, 'No migrations directory found');
    return [];
  }
}

async function isMigrationApplied(version: string): Promise<boolean> {
  const result = await pool.query('SELECT version FROM schema_migrations WHERE version = $1', [version]);
  return result.rowCount !== null && result.rowCount > 0;
}

async function executeMigration(filename: string): Promise<boolean> {
  const version = filename.replace('.sql', '');
  if (await isMigrationApplied(version)) {
    logger.debug({ version }, 'Migration already applied, skipping');
    return false;
  }

  logger.info({ version }, 'Running migration');
  const sql = readFileSync(join(__dirname, 'migrations', filename), 'utf-8');
  await pool.query(sql);
  await pool.query('INSERT INTO schema_migrations (version) VALUES ($1) ON CONFLICT DO NOTHING', [version]);
  return true;
}

/**
 * Run all pending migrations. Safe to call repeatedly.
 */
export async function runMigrationsOnStartup(): Promise<{
  success: boolean;
  applied: string[];
  skipped: string[];
  error?: string;
}> {
  const applied: string[] = [];
  const skipped: string[] = [];
  const endTimer = startTimer();

  try {
    await pool.query(MIGRATIONS_TABLE);

    for (const migration of getMigrationFiles()) {
      const version = migration.replace('.sql', '');
      if (await executeMigration(migration)) {
        applied.push(version);
      } else {
        skipped.push(version);
      }
    }

    const durationMs = endTimer('migrations');
    logger.info({ applied: applied.length, skipped: skipped.length, durationMs }, 'Database schema is up to date');
    return { success: true, applied, skipped };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error({ error: errorMessage }, 'Migration failed');
    return { success: false, applied, skipped, error: errorMessage };
  }
}
