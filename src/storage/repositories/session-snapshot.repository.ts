/**
 * Session Snapshot Repository Implementation
 *
 * SQLite-backed SessionStore. The snapshot is written as one JSON column;
 * Dates are stored as epoch milliseconds and revived in mapToDomain, so a
 * read always returns a fresh object graph.
 */

import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { sessionSnapshots, type SessionStateRecord } from '../schema';
import { NotFoundError } from '@/core/errors';
import type { SessionState } from '@/core/models';
import type { SessionStore } from './base';

/**
 * Converts a snapshot to its stored JSON form.
 */
function toRecord(state: SessionState): SessionStateRecord {
  return {
    ...state,
    availableRoles: [...state.availableRoles],
    misconceptionTags: [...state.misconceptionTags],
    questionStack: state.questionStack.map((question) => ({ ...question })),
    signals: { ...state.signals },
    lastOutputAt: state.lastOutputAt ? state.lastOutputAt.getTime() : null,
    turns: state.turns.map((turn) => ({ ...turn, timestamp: turn.timestamp.getTime() })),
    createdAt: state.createdAt.getTime(),
    updatedAt: state.updatedAt.getTime(),
  };
}

/**
 * Maps a database row to a SessionState domain model.
 *
 * @param row - Raw database row from Drizzle query
 */
function mapToDomain(row: typeof sessionSnapshots.$inferSelect): SessionState {
  const record = row.state;
  return {
    ...record,
    lastOutputAt: record.lastOutputAt === null ? null : new Date(record.lastOutputAt),
    turns: record.turns.map((turn) => ({ ...turn, timestamp: new Date(turn.timestamp) })),
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
  };
}

/**
 * Repository for session snapshots.
 *
 * @example
 * ```typescript
 * const repo = new SessionSnapshotRepository(db);
 * await repo.save(state);
 * const copy = await repo.get(state.sessionId);
 * ```
 */
export class SessionSnapshotRepository implements SessionStore {
  constructor(private readonly db: AppDatabase) {}

  async get(sessionId: string): Promise<SessionState> {
    const row = this.db
      .select()
      .from(sessionSnapshots)
      .where(eq(sessionSnapshots.sessionId, sessionId))
      .get();

    if (!row) {
      throw new NotFoundError('Session', sessionId);
    }
    return mapToDomain(row);
  }

  async save(state: SessionState): Promise<void> {
    const values = {
      sessionId: state.sessionId,
      entryId: state.entryId,
      state: toRecord(state),
      updatedAt: state.updatedAt,
    };

    this.db
      .insert(sessionSnapshots)
      .values(values)
      .onConflictDoUpdate({
        target: sessionSnapshots.sessionId,
        set: { entryId: values.entryId, state: values.state, updatedAt: values.updatedAt },
      })
      .run();
  }
}
