/**
 * Timeline Event Types
 *
 * A TimelineEvent is an immutable fact about a session: something the learner
 * said, something the assistant said, a decision the Director made. Events are
 * appended to the per-session timeline and never edited or removed. The
 * session snapshot is a projection of these facts (see core/reducer).
 *
 * The `type` field is deliberately open: the engine knows how to reduce the
 * types listed in KnownEventType, and any other type with text is treated as
 * user input.
 */

import type { DirectorPlan } from './director-plan';

/**
 * Event types the engine produces or reduces specially.
 */
export type KnownEventType =
  | 'user_message'
  | 'user_utterance'
  | 'assistant_text'
  | 'quiz_answer'
  | 'director_plan'
  | 'session_started'
  | 'barge_in';

/**
 * Facts only the engine records. Transports may not submit them as input.
 */
export const ENGINE_EVENT_TYPES: readonly KnownEventType[] = [
  'assistant_text',
  'director_plan',
  'session_started',
  'barge_in',
];

export function isEngineEventType(type: string): boolean {
  return ENGINE_EVENT_TYPES.some((engineType) => engineType === type);
}

/**
 * Any event type string. Known types keep autocompletion; unknown types are
 * still accepted from transports.
 */
export type EventType = KnownEventType | (string & {});

/**
 * A fact as recorded on the timeline.
 *
 * @example
 * ```typescript
 * const event: TimelineEvent = {
 *   seq: 1,
 *   sessionId: 'sess_123',
 *   eventId: 'evt-1',
 *   type: 'user_message',
 *   text: 'hello',
 *   clientTimestamp: new Date('2025-01-01T10:00:00Z'),
 *   serverTimestamp: new Date('2025-01-01T10:00:00Z'),
 * };
 * ```
 */
export interface TimelineEvent {
  /** Assigned by the timeline store: 1, 2, 3... per session */
  seq: number;
  sessionId: string;
  /** Optional caller-supplied idempotency key */
  eventId?: string;
  turnId?: string;
  type: EventType;
  text: string;
  questionId?: string;
  answer?: string;
  clientTimestamp: Date;
  /** Always assigned by the server, never trusted from clients */
  serverTimestamp: Date;
  /** Only on 'director_plan' events */
  directorPlan?: DirectorPlan;
  /** Only on 'session_started' events: the catalog entry the session was built from */
  entryId?: string;
  /** Only on 'assistant_text' events: the role that spoke */
  role?: string;
}

/**
 * An event before the timeline store has stamped it.
 */
export type UnsequencedEvent = Omit<TimelineEvent, 'seq'>;

/**
 * The event shape accepted from transports. The engine fills in everything
 * else during normalization.
 */
export interface InboundEvent {
  type?: string;
  text?: string;
  questionId?: string;
  answer?: string;
  clientTimestamp?: Date;
  eventId?: string;
  turnId?: string;
}
