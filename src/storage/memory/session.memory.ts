/**
 * In-Memory Session Store
 *
 * Snapshots are deep-cloned on the way in and on the way out.
 */

import type { SessionState } from '@/core/models';
import { NotFoundError } from '@/core/errors';
import type { SessionStore } from '../repositories/base';

export class InMemorySessionStore implements SessionStore {
  private readonly snapshots = new Map<string, SessionState>();

  async get(sessionId: string): Promise<SessionState> {
    const state = this.snapshots.get(sessionId);
    if (!state) {
      throw new NotFoundError('Session', sessionId);
    }
    return structuredClone(state);
  }

  async save(state: SessionState): Promise<void> {
    this.snapshots.set(state.sessionId, structuredClone(state));
  }
}
