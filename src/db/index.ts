export { pool, testConnection, closePool } from './connection.js';
export { runMigrationsOnStartup } from './runMigrations.js';
export * as traceRepository from './repositories/trace-repository.js';
