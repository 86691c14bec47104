/**
 * In-Memory Timeline Store
 *
 * Keeps every session's events in a Map. All work inside `append` and `list`
 * is synchronous, so two calls can never interleave halfway through an
 * append even though the methods are async.
 */

import type { TimelineEvent, UnsequencedEvent } from '@/core/models';
import type { TimelineStore } from '../repositories/base';

interface SessionLog {
  events: TimelineEvent[];
  /** eventId -> seq, for idempotent appends */
  seqByEventId: Map<string, number>;
}

export class InMemoryTimelineStore implements TimelineStore {
  private readonly logs = new Map<string, SessionLog>();

  async append(sessionId: string, event: UnsequencedEvent): Promise<number> {
    let log = this.logs.get(sessionId);
    if (!log) {
      log = { events: [], seqByEventId: new Map() };
      this.logs.set(sessionId, log);
    }

    if (event.eventId) {
      const existing = log.seqByEventId.get(event.eventId);
      if (existing !== undefined) {
        return existing;
      }
    }

    const seq = log.events.length + 1;
    log.events.push(structuredClone({ ...event, seq, sessionId }));
    if (event.eventId) {
      log.seqByEventId.set(event.eventId, seq);
    }
    return seq;
  }

  async list(sessionId: string): Promise<TimelineEvent[]> {
    const log = this.logs.get(sessionId);
    return log ? structuredClone(log.events) : [];
  }
}
