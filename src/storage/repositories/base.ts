/**
 * Store Contracts
 *
 * The engine depends on these two interfaces only. Each has an in-memory
 * implementation (storage/memory) and a SQLite implementation backed by
 * Drizzle ORM (storage/repositories), so business logic never knows which
 * one it is talking to.
 *
 * Both contracts hand out copies: nothing a caller does to a returned value
 * can change what is stored.
 */

import type { SessionState, TimelineEvent, UnsequencedEvent } from '@/core/models';

/**
 * Append-only, per-session event log.
 *
 * @example
 * ```typescript
 * const seq = await timeline.append('sess_1', event);      // 1
 * const again = await timeline.append('sess_1', event);    // 1 again if event.eventId is set
 * const events = await timeline.list('sess_1');            // [{ seq: 1, ... }]
 * ```
 */
export interface TimelineStore {
  /**
   * Stores an event and returns its sequence number.
   *
   * Sequence numbers start at 1 and increase by one per stored event. When
   * `event.eventId` is non-empty and was already stored for this session,
   * nothing is written and the earlier sequence number is returned.
   */
  append(sessionId: string, event: UnsequencedEvent): Promise<number>;

  /**
   * Returns every event of the session in sequence order.
   * An unknown session yields an empty list.
   */
  list(sessionId: string): Promise<TimelineEvent[]>;
}

/**
 * Keyed storage of the current session snapshot.
 */
export interface SessionStore {
  /**
   * Returns a private working copy of the snapshot.
   *
   * @throws {NotFoundError} If no snapshot exists for the id
   */
  get(sessionId: string): Promise<SessionState>;

  /**
   * Replaces the stored snapshot with a copy of `state`.
   */
  save(state: SessionState): Promise<void>;
}
