/**
 * Session Reducer
 *
 * Folds timeline events into the session snapshot. The reducer is the only
 * code that changes a SessionState; everything else reads it. Reduction is
 * deterministic given (state, event, now), which is what makes replaying a
 * timeline reproduce the live snapshot.
 *
 * Dispatch by event type:
 *
 * | type             | effect                                                      |
 * |------------------|-------------------------------------------------------------|
 * | assistant_text   | push assistant turn, reset output clock, set lastOutputAt   |
 * | quiz_answer      | push user turn with the answer; clock untouched             |
 * | director_plan    | set beat, push/pop the branch question stack                |
 * | session_started  | nothing beyond updatedAt                                    |
 * | barge_in         | nothing beyond updatedAt                                    |
 * | anything else    | user text: recompute clock, record signals, push user turn  |
 *
 * Every event sets `updatedAt = now`, including events whose payload is
 * empty and otherwise ignored.
 */

import type { SessionState, TimelineEvent } from '@/core/models';

/** Role recorded on assistant turns when the event does not name one */
export const DEFAULT_ASSISTANT_ROLE = 'assistant';

/**
 * Applies one event to the snapshot.
 *
 * Mutates and returns `state`; callers pass a working copy obtained from the
 * session store.
 *
 * @param state - Working copy of the snapshot
 * @param event - The event as stored on the timeline (with its seq)
 * @param now - Server time at which the event is applied
 * @returns The same `state` object
 */
export function reduce(state: SessionState, event: TimelineEvent, now: Date): SessionState {
  switch (event.type) {
    case 'assistant_text':
      reduceAssistantText(state, event, now);
      break;
    case 'quiz_answer':
      reduceQuizAnswer(state, event, now);
      break;
    case 'director_plan':
      reduceDirectorPlan(state, event);
      break;
    case 'session_started':
    case 'barge_in':
      break;
    default:
      reduceUserText(state, event, now);
      break;
  }

  state.updatedAt = now;
  return state;
}

/**
 * Rebuilds a snapshot by folding events, in order, onto a seed state.
 * Each event is applied at its own serverTimestamp.
 *
 * @example
 * ```typescript
 * const seed = createInitialState({ sessionId, entry, now: startedAt });
 * const rebuilt = replayTimeline(seed, await timeline.list(sessionId));
 * ```
 */
export function replayTimeline(seed: SessionState, events: readonly TimelineEvent[]): SessionState {
  return events.reduce((state, event) => reduce(state, event, event.serverTimestamp), seed);
}

// ============================================================================
// Per-type reducers
// ============================================================================

function reduceAssistantText(state: SessionState, event: TimelineEvent, now: Date): void {
  if (event.text === '') return;

  state.turns.push({
    role: event.role || DEFAULT_ASSISTANT_ROLE,
    text: event.text,
    timestamp: now,
  });
  state.outputClockSec = 0;
  state.lastOutputAt = now;
}

function reduceQuizAnswer(state: SessionState, event: TimelineEvent, now: Date): void {
  if (!event.answer) return;

  state.turns.push({ role: 'user', text: event.answer, timestamp: now });
}

function reduceDirectorPlan(state: SessionState, event: TimelineEvent): void {
  const plan = event.directorPlan;
  if (!plan) return;

  state.beat = plan.nextBeat;

  if (plan.stackAction === 'push') {
    const lastUserTurn = findLastUserTurn(state);
    if (lastUserTurn) {
      state.questionStack.push({ questionId: `q_${event.seq}`, prompt: lastUserTurn.text });
    }
  } else if (plan.stackAction === 'pop') {
    state.questionStack.shift();
  }
}

function reduceUserText(state: SessionState, event: TimelineEvent, now: Date): void {
  if (event.text === '') return;

  // Recomputed from lastOutputAt, never accumulated
  if (state.lastOutputAt) {
    const elapsedMs = now.getTime() - state.lastOutputAt.getTime();
    state.outputClockSec = Math.max(0, Math.floor(elapsedMs / 1000));
  }

  state.signals.lastUserChars = event.text.length;
  state.turns.push({ role: 'user', text: event.text, timestamp: now });
}

function findLastUserTurn(state: SessionState): SessionState['turns'][number] | undefined {
  for (let i = state.turns.length - 1; i >= 0; i--) {
    if (state.turns[i].role === 'user') {
      return state.turns[i];
    }
  }
  return undefined;
}
