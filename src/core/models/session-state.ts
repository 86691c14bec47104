/**
 * Session Snapshot Types
 *
 * SessionState is the live projection of a session's timeline. It is only
 * ever changed by the reducer and can always be rebuilt by replaying the
 * timeline from the session_started event.
 */

/**
 * Pacing mode of the session. Only NORMAL is produced today; the other values
 * are accepted from stored snapshots.
 */
export type PacingMode = 'NORMAL' | 'SLOW' | 'FAST';

/**
 * One utterance in the conversation.
 */
export interface Turn {
  /** 'user', 'assistant', or the name of the role that spoke */
  role: string;
  text: string;
  timestamp: Date;
}

/**
 * A side question the learner raised that is parked for later.
 */
export interface BranchQuestion {
  questionId: string;
  prompt: string;
}

/**
 * Latest behavioural signals from the learner.
 */
export interface SignalsSnapshot {
  /** Character count of the last user text */
  lastUserChars: number;
  /** How long the learner took to respond, when a transport reports it */
  lastUserLatencyMs: number;
}

/**
 * The session snapshot.
 *
 * @example
 * ```typescript
 * const state: SessionState = {
 *   sessionId: 'sess_123',
 *   entryId: 'opportunity-cost',
 *   domain: 'economics',
 *   availableRoles: ['host', 'economist', 'skeptic'],
 *   mainObjective: 'Opportunity cost',
 *   act: 1,
 *   beat: 'cold_open',
 *   pacingMode: 'NORMAL',
 *   masteryEstimate: 0.2,
 *   misconceptionTags: [],
 *   outputClockSec: 0,
 *   lastOutputAt: new Date(),
 *   tensionLevel: 2,
 *   cognitiveLoad: 2,
 *   questionStack: [],
 *   signals: { lastUserChars: 0, lastUserLatencyMs: 0 },
 *   turns: [],
 *   createdAt: new Date(),
 *   updatedAt: new Date(),
 * };
 * ```
 */
export interface SessionState {
  sessionId: string;
  entryId: string;
  domain: string;
  /** Roles the Director may cast; empty means the configured defaults */
  availableRoles: string[];

  mainObjective: string;
  act: number;
  /** Current beat, updated whenever a director plan is reduced */
  beat: string;
  pacingMode: PacingMode;

  /** 0..1 */
  masteryEstimate: number;
  misconceptionTags: string[];

  /** Whole seconds since the last assistant output, never negative */
  outputClockSec: number;
  lastOutputAt: Date | null;
  /** 0..10 */
  tensionLevel: number;
  /** 0..10 */
  cognitiveLoad: number;

  /** FIFO of parked branch questions */
  questionStack: BranchQuestion[];
  signals: SignalsSnapshot;
  /** Append-only */
  turns: Turn[];

  createdAt: Date;
  updatedAt: Date;
}
