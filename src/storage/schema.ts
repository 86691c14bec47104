/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema definitions for SQLite. Two tables back the two store
 * contracts:
 * - Timeline Events: the append-only per-session log
 * - Session Snapshots: the current projection of each session
 *
 * All timestamps are stored as milliseconds since epoch (integer) for
 * SQLite compatibility. The DDL that creates these tables lives in ddl.ts
 * and must be kept in step with this file.
 */

import {
  sqliteTable,
  text,
  integer,
  primaryKey,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core';
import type { DirectorPlan, PacingMode } from '@/core/models';

/**
 * Timeline Events Table
 *
 * One row per recorded fact. `seq` is assigned inside the append
 * transaction as MAX(seq) + 1 for the session. The unique index on
 * (session_id, event_id) makes caller-supplied event ids idempotent; SQLite
 * allows any number of NULL event ids.
 */
export const timelineEvents = sqliteTable(
  'timeline_events',
  {
    sessionId: text('session_id').notNull(),

    // 1, 2, 3... per session
    seq: integer('seq').notNull(),

    // Optional caller-supplied idempotency key
    eventId: text('event_id'),

    turnId: text('turn_id'),

    // Open set: 'user_message', 'assistant_text', 'director_plan', ...
    type: text('type').notNull(),

    text: text('text').notNull().default(''),

    questionId: text('question_id'),

    answer: text('answer'),

    clientTimestamp: integer('client_timestamp', { mode: 'timestamp_ms' }).notNull(),

    serverTimestamp: integer('server_timestamp', { mode: 'timestamp_ms' }).notNull(),

    // Only on 'director_plan' rows
    directorPlan: text('director_plan', { mode: 'json' }).$type<DirectorPlan>(),

    // Only on 'session_started' rows
    entryId: text('entry_id'),

    // Only on 'assistant_text' rows
    role: text('role'),
  },
  (table) => [
    primaryKey({ columns: [table.sessionId, table.seq] }),
    uniqueIndex('timeline_events_session_event_id_idx').on(table.sessionId, table.eventId),
  ]
);

/**
 * Serialized form of a SessionState. JSON has no Date, so every timestamp
 * is kept as epoch milliseconds and revived by the repository.
 */
export interface SessionStateRecord {
  sessionId: string;
  entryId: string;
  domain: string;
  availableRoles: string[];
  mainObjective: string;
  act: number;
  beat: string;
  pacingMode: PacingMode;
  masteryEstimate: number;
  misconceptionTags: string[];
  outputClockSec: number;
  lastOutputAt: number | null;
  tensionLevel: number;
  cognitiveLoad: number;
  questionStack: Array<{ questionId: string; prompt: string }>;
  signals: { lastUserChars: number; lastUserLatencyMs: number };
  turns: Array<{ role: string; text: string; timestamp: number }>;
  createdAt: number;
  updatedAt: number;
}

/**
 * Session Snapshots Table
 *
 * One row per session holding the whole snapshot as JSON. Rows are
 * replaced on every save; the timeline is the source of truth.
 */
export const sessionSnapshots = sqliteTable('session_snapshots', {
  sessionId: text('session_id').primaryKey(),

  entryId: text('entry_id').notNull(),

  state: text('state', { mode: 'json' }).$type<SessionStateRecord>().notNull(),

  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

// ============================================================================
// Type Exports
// ============================================================================

export type TimelineEventRow = typeof timelineEvents.$inferSelect;
export type NewTimelineEventRow = typeof timelineEvents.$inferInsert;

export type SessionSnapshotRow = typeof sessionSnapshots.$inferSelect;
export type NewSessionSnapshotRow = typeof sessionSnapshots.$inferInsert;
