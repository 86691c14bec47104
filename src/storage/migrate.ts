/**
 * Database Schema Setup Script
 *
 * Creates the engine's tables in the configured SQLite database. Opening a
 * database through createDatabase() already does this; the script exists so
 * operators can prepare a database file ahead of deployment and check it.
 *
 * Usage:
 *   npm run db:migrate                              # Uses DATABASE_PATH or the default
 *   DATABASE_PATH=/path/to/db npm run db:migrate    # Custom database path
 *
 * Running it more than once is safe: every statement is IF NOT EXISTS.
 */

import { sql } from 'drizzle-orm';
import { config } from '../config';
import { createDatabase } from './db';

const dbPath = config.database.path;

console.log(`[migrate] Database path: ${dbPath}`);

try {
  const db = createDatabase(dbPath);

  const tables = db.all<{ name: string }>(
    sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`
  );

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    console.log(`  - ${table.name}`);
  }
  console.log('[migrate] Schema is up to date.');
} catch (error) {
  console.error('[migrate] Schema setup failed:', error);
  process.exit(1);
}
