/**
 * Timeline Repository Implementation
 *
 * SQLite-backed TimelineStore. Each append runs in one synchronous
 * better-sqlite3 transaction: the idempotency lookup, the next-seq query and
 * the insert commit together, so concurrent appends in the same process can
 * never hand out the same seq.
 */

import { and, asc, eq, max } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { timelineEvents } from '../schema';
import type { TimelineEvent, UnsequencedEvent } from '@/core/models';
import type { TimelineStore } from './base';

/**
 * Maps a database row to a TimelineEvent domain model. NULL columns become
 * absent optional fields.
 *
 * @param row - Raw database row from Drizzle query
 */
function mapToDomain(row: typeof timelineEvents.$inferSelect): TimelineEvent {
  const event: TimelineEvent = {
    seq: row.seq,
    sessionId: row.sessionId,
    type: row.type,
    text: row.text,
    // Drizzle's timestamp_ms mode already returns Date objects
    clientTimestamp: row.clientTimestamp,
    serverTimestamp: row.serverTimestamp,
  };

  if (row.eventId !== null) event.eventId = row.eventId;
  if (row.turnId !== null) event.turnId = row.turnId;
  if (row.questionId !== null) event.questionId = row.questionId;
  if (row.answer !== null) event.answer = row.answer;
  if (row.directorPlan !== null) event.directorPlan = row.directorPlan;
  if (row.entryId !== null) event.entryId = row.entryId;
  if (row.role !== null) event.role = row.role;

  return event;
}

/**
 * Repository for timeline events.
 *
 * @example
 * ```typescript
 * const repo = new TimelineRepository(createDatabase(':memory:'));
 * const seq = await repo.append('sess_abc123', event);
 * const events = await repo.list('sess_abc123');
 * ```
 */
export class TimelineRepository implements TimelineStore {
  constructor(private readonly db: AppDatabase) {}

  async append(sessionId: string, event: UnsequencedEvent): Promise<number> {
    return this.db.transaction((tx) => {
      if (event.eventId) {
        const existing = tx
          .select({ seq: timelineEvents.seq })
          .from(timelineEvents)
          .where(and(eq(timelineEvents.sessionId, sessionId), eq(timelineEvents.eventId, event.eventId)))
          .get();
        if (existing) {
          return existing.seq;
        }
      }

      const last = tx
        .select({ maxSeq: max(timelineEvents.seq) })
        .from(timelineEvents)
        .where(eq(timelineEvents.sessionId, sessionId))
        .get();
      const seq = (last?.maxSeq ?? 0) + 1;

      tx.insert(timelineEvents)
        .values({
          sessionId,
          seq,
          eventId: event.eventId || null,
          turnId: event.turnId ?? null,
          type: event.type,
          text: event.text,
          questionId: event.questionId ?? null,
          answer: event.answer ?? null,
          clientTimestamp: event.clientTimestamp,
          serverTimestamp: event.serverTimestamp,
          directorPlan: event.directorPlan ?? null,
          entryId: event.entryId ?? null,
          role: event.role ?? null,
        })
        .run();

      return seq;
    });
  }

  async list(sessionId: string): Promise<TimelineEvent[]> {
    const rows = this.db
      .select()
      .from(timelineEvents)
      .where(eq(timelineEvents.sessionId, sessionId))
      .orderBy(asc(timelineEvents.seq))
      .all();
    return rows.map(mapToDomain);
  }
}
