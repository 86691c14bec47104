/**
 * Initial snapshot for a new session. Replay starts from the same seed, so
 * everything here must be derivable from the entry, the id and the start
 * time alone.
 */

import type { Entry, SessionState } from '@/core/models';

export const INITIAL_BEAT = 'cold_open';
export const INITIAL_MASTERY = 0.2;
export const INITIAL_TENSION = 2;
export const INITIAL_LOAD = 2;

export interface InitialStateParams {
  sessionId: string;
  entry: Entry;
  /** Session start time; also the initial lastOutputAt */
  now: Date;
}

export function createInitialState({ sessionId, entry, now }: InitialStateParams): SessionState {
  return {
    sessionId,
    entryId: entry.entryId,
    domain: entry.domain,
    availableRoles: [...entry.roles],
    mainObjective: entry.title,
    act: 1,
    beat: INITIAL_BEAT,
    pacingMode: 'NORMAL',
    masteryEstimate: INITIAL_MASTERY,
    misconceptionTags: [],
    outputClockSec: 0,
    lastOutputAt: now,
    tensionLevel: INITIAL_TENSION,
    cognitiveLoad: INITIAL_LOAD,
    questionStack: [],
    signals: { lastUserChars: 0, lastUserLatencyMs: 0 },
    turns: [],
    createdAt: now,
    updatedAt: now,
  };
}
