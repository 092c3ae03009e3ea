import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import pino from 'pino';
import { schemaSql } from './schema.js';

// Note: .env loading is handled centrally by @caselens/config
// This package receives its database path from Settings

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export type Db = InstanceType<typeof Database>;

export const IN_MEMORY_DB = ':memory:';

export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Open (and create if needed) the SQLite database and apply the schema
 */
export function openDatabase(path: string): Db {
  if (path !== IN_MEMORY_DB) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma('foreign_keys = ON');
  if (path !== IN_MEMORY_DB) {
    db.pragma('journal_mode = WAL');
  }
  db.exec(schemaSql);

  logger.debug({ event: 'db.open', path }, 'Database opened');
  return db;
}

/**
 * Check database health
 * Runs a simple SELECT 1 query
 * @throws Error if the query fails
 */
export function checkDbConnection(db: Db): void {
  const startTime = Date.now();
  try {
    db.prepare('SELECT 1').get();
    logger.info({ event: 'db.health.ok', durationMs: Date.now() - startTime }, 'Database connection successful');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ event: 'db.health.fail', error: message }, 'Database connection failed');
    throw new Error(`Database connection check failed: ${message}`);
  }
}

export function closeDatabase(db: Db): void {
  if (db.open) {
    db.close();
    logger.debug({ event: 'db.close' }, 'Database closed');
  }
}
