/**
 * Storage Module - Barrel Export
 *
 * The public API of the storage layer: the store contracts, their
 * in-memory and SQLite implementations, and the database utilities.
 *
 * Usage:
 *   import { createStores } from '@/storage';
 *   const { timeline, sessions } = createStores(config);
 */

import type { Config } from '@/config';
import { createDatabase } from './db';
import { InMemorySessionStore, InMemoryTimelineStore } from './memory';
import {
  SessionSnapshotRepository,
  TimelineRepository,
  type SessionStore,
  type TimelineStore,
} from './repositories';

export { createDatabase, DEFAULT_DATABASE_PATH } from './db';
export type { AppDatabase } from './db';
export { ensureSchema, SCHEMA_DDL } from './ddl';

export { timelineEvents, sessionSnapshots } from './schema';
export type {
  TimelineEventRow,
  NewTimelineEventRow,
  SessionSnapshotRow,
  NewSessionSnapshotRow,
  SessionStateRecord,
} from './schema';

export { InMemoryTimelineStore, InMemorySessionStore } from './memory';
export { TimelineRepository, SessionSnapshotRepository } from './repositories';
export type { TimelineStore, SessionStore } from './repositories';

export interface Stores {
  timeline: TimelineStore;
  sessions: SessionStore;
}

/**
 * Builds the stores selected by `storage.driver`.
 */
export function createStores(cfg: Pick<Config, 'storage' | 'database'>): Stores {
  if (cfg.storage.driver === 'sqlite') {
    const db = createDatabase(cfg.database.path);
    console.log(`[Storage] Using SQLite database at ${cfg.database.path}`);
    return { timeline: new TimelineRepository(db), sessions: new SessionSnapshotRepository(db) };
  }
  console.log('[Storage] Using in-memory stores');
  return { timeline: new InMemoryTimelineStore(), sessions: new InMemorySessionStore() };
}
