/**
 * Database Client for ThreadSage
 *
 * Single source of truth for database connections.
 * All packages go through this client - no direct better-sqlite3 usage elsewhere.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import * as schema from './schema.js';
import { logger } from '../utils/logger.js';

// Re-export schema for convenience
export * from './schema.js';

export type DbClient = BetterSQLite3Database<typeof schema>;

/**
 * A drizzle client plus the raw connection it wraps
 */
export interface DbHandle {
  db: DbClient;
  raw: Database.Database;
  close(): void;
}

let shared: DbHandle | null = null;

/**
 * Get the default database path
 */
export function getDefaultDbPath(): string {
  return process.env.DATABASE_PATH || './data/threadsage.db';
}

/**
 * Open a new connection with the pragmas every connection needs.
 * ':memory:' gives a private in-process database (used by tests).
 */
export function openDatabase(path: string = getDefaultDbPath()): DbHandle {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const raw = new Database(path);

  // DELETE journal mode survives frequent restarts better than WAL
  raw.pragma('journal_mode = DELETE');
  // Wait up to 30 seconds for locks (prevents SQLITE_BUSY errors)
  raw.pragma('busy_timeout = 30000');
  raw.pragma('synchronous = FULL');

  const db = drizzle(raw, { schema });
  return {
    db,
    raw,
    close: () => raw.close(),
  };
}

/**
 * Create tables if they don't exist. Safe to run multiple times.
 */
export function initializeDb(handle: DbHandle): DbHandle {
  handle.raw.exec(`
    CREATE TABLE IF NOT EXISTS room_configs (
      room_id TEXT PRIMARY KEY,
      assistants TEXT NOT NULL DEFAULT '[]',
      custom_prompt TEXT,
      context_size INTEGER NOT NULL,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL
    )
  `);

  handle.raw.exec(`
    CREATE TABLE IF NOT EXISTS feedback_records (
      answer_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      verdict TEXT NOT NULL CHECK (verdict IN ('positive', 'negative')),
      recorded_at TEXT NOT NULL,
      PRIMARY KEY (answer_id, user_id)
    )
  `);
  handle.raw.exec(`CREATE INDEX IF NOT EXISTS idx_feedback_answer_id ON feedback_records(answer_id)`);

  return handle;
}

/**
 * Get or create the process-wide connection
 */
export function getDb(dbPath?: string): DbHandle {
  if (shared) return shared;

  const path = dbPath || getDefaultDbPath();
  shared = initializeDb(openDatabase(path));
  logger.info(`🗄️ Database ready at ${path}`);
  return shared;
}

/**
 * Close the process-wide connection
 */
export function closeDb(): void {
  if (shared) {
    shared.close();
    shared = null;
  }
}

/**
 * Check database integrity
 */
export function checkDbIntegrity(handle: DbHandle): { ok: boolean; result: string } {
  const status = String(handle.raw.pragma('integrity_check', { simple: true }) ?? 'unknown');
  const ok = status === 'ok';

  if (!ok) {
    logger.error(`🚨 Database integrity check FAILED: ${status}`);
  }

  return { ok, result: status };
}
