/**
 * Repository Layer - Barrel Export
 *
 * The SQLite implementations of the store contracts. The repository pattern
 * keeps Drizzle queries out of the engine: the Orchestrator sees only
 * TimelineStore and SessionStore.
 *
 * @example
 * ```typescript
 * import { TimelineRepository, SessionSnapshotRepository } from '@/storage/repositories';
 *
 * const db = createDatabase(config.database.path);
 * const timeline = new TimelineRepository(db);
 * const sessions = new SessionSnapshotRepository(db);
 * ```
 */

export type { TimelineStore, SessionStore } from './base';
export { TimelineRepository } from './timeline.repository';
export { SessionSnapshotRepository } from './session-snapshot.repository';
