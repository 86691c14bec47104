/**
 * Database Connection Factory
 *
 * This module provides database connection utilities using better-sqlite3
 * with Drizzle ORM. It creates properly configured database instances with
 * WAL journaling and foreign key enforcement enabled, and the tables in
 * place.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *   const db = createDatabase(config.database.path);
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { ensureSchema } from './ddl';
import * as schema from './schema';

export const DEFAULT_DATABASE_PATH = 'dialogue-director.db';

/**
 * Creates a new Drizzle ORM database instance connected to the specified SQLite file.
 *
 * This factory function:
 * 1. Opens/creates an SQLite database file at the given path
 * 2. Switches to WAL journaling so readers don't block the writer
 * 3. Enables foreign key constraint enforcement (disabled by default in SQLite)
 * 4. Creates missing tables
 * 5. Wraps the connection with Drizzle ORM for type-safe queries
 *
 * @param dbPath - Path to the SQLite database file, or ':memory:'
 *
 * @example
 * // Testing with in-memory database
 * const testDb = createDatabase(':memory:');
 */
export function createDatabase(dbPath: string = DEFAULT_DATABASE_PATH) {
  const sqlite = new Database(dbPath);

  // WAL is not available for in-memory databases; SQLite keeps 'memory' there
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');

  ensureSchema(sqlite);

  // The schema import provides full type inference for all tables
  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 *
 * @example
 * function countEvents(database: AppDatabase) {
 *   return database.select().from(timelineEvents).all().length;
 * }
 */
export type AppDatabase = ReturnType<typeof createDatabase>;
