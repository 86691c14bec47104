/**
 * Table DDL matching schema.ts. Applied with IF NOT EXISTS whenever a
 * database is opened, so a fresh file or ':memory:' database is ready to use
 * without a separate migration step.
 */

import type { Database } from 'better-sqlite3';

export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS timeline_events (
  session_id TEXT NOT NULL,
  seq INTEGER NOT NULL,
  event_id TEXT,
  turn_id TEXT,
  type TEXT NOT NULL,
  text TEXT NOT NULL DEFAULT '',
  question_id TEXT,
  answer TEXT,
  client_timestamp INTEGER NOT NULL,
  server_timestamp INTEGER NOT NULL,
  director_plan TEXT,
  entry_id TEXT,
  role TEXT,
  PRIMARY KEY (session_id, seq)
);

CREATE UNIQUE INDEX IF NOT EXISTS timeline_events_session_event_id_idx
  ON timeline_events (session_id, event_id);

CREATE TABLE IF NOT EXISTS session_snapshots (
  session_id TEXT PRIMARY KEY NOT NULL,
  entry_id TEXT NOT NULL,
  state TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);
`;

export function ensureSchema(sqlite: Database): void {
  sqlite.exec(SCHEMA_DDL);
}
