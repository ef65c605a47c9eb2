/**
 * Database Connection Module
 *
 * Handles database lifecycle: initialization, migrations, and shutdown.
 *
 * @module db/connection
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';
import * as initial from './migrations/001_initial.js';

interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

const MIGRATIONS: Migration[] = [initial];

let db: Database.Database | null = null;

/**
 * Apply pending migrations, tracked in `schema_migrations`
 */
export function runMigrations(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);

  const applied = new Set(
    (database.prepare('SELECT version FROM schema_migrations').all() as Array<{ version: number }>)
      .map((row) => row.version)
  );

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.version)) continue;

    database.transaction(() => {
      migration.up(database);
      database
        .prepare('INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)')
        .run(migration.version, migration.name, new Date().toISOString());
    })();

    logger.info({ version: migration.version, name: migration.name }, 'Applied migration');
  }
}

/**
 * Initialize the database connection
 */
export function initDatabase(dbPath: string, busyTimeoutMs: number): Database.Database {
  if (db) {
    return db;
  }

  if (dbPath !== ':memory:') {
    const dbDir = dirname(dbPath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
      logger.info({ path: dbDir }, 'Created database directory');
    }
  }

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma(`busy_timeout = ${Math.max(0, Math.trunc(busyTimeoutMs))}`);
  logger.info({ path: dbPath }, 'Database connection established');

  runMigrations(db);

  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}
