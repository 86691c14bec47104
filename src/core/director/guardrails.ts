/**
 * Director Guardrails
 *
 * Hard constraints applied to every plan a Director variant produces,
 * whoever wrote it. They keep the plan inside the configured beat and role
 * sets, bound the talk burst, and stop the assistant from monologuing past
 * the output-clock threshold.
 */

import type { DirectorPlan, SessionState } from '@/core/models';
import { outputActionForBeat, userMustDoForAction } from './actions';
import { isOutputBeat, resolveOutputBeat } from './beat-library';
import type { DirectorSettings } from './types';

/**
 * The roles the Director may cast for a session: the entry's roles, or the
 * configured defaults when the snapshot carries none.
 */
export function resolveRoles(state: Readonly<SessionState>, settings: DirectorSettings): string[] {
  return state.availableRoles.length > 0 ? [...state.availableRoles] : [...settings.availableRoles];
}

/**
 * The talk-burst budget for the next turn: the high-load budget while the
 * learner is overloaded or tense, the default otherwise.
 */
export function talkBurstBudget(state: Readonly<SessionState>, settings: DirectorSettings): number {
  if (state.cognitiveLoad > 7 || state.tensionLevel > 7) {
    return settings.highLoadTalkBurstSec;
  }
  return settings.defaultTalkBurstSec;
}

/**
 * Returns a corrected copy of `plan`. The names of the guardrails that
 * changed something are listed in `debug.guardrails`.
 *
 * @throws {ValidationError} If `settings` has no output beat
 *
 * @example
 * ```typescript
 * const safe = applyGuardrails({ ...plan, nextBeat: 'monologue' }, state, settings);
 * safe.nextBeat;          // 'check' (the first configured output beat)
 * safe.debug.guardrails;  // ['invalid_beat']
 * ```
 */
export function applyGuardrails(
  plan: DirectorPlan,
  state: Readonly<SessionState>,
  settings: DirectorSettings
): DirectorPlan {
  const result: DirectorPlan = { ...plan, debug: { ...plan.debug } };
  const applied: string[] = [];
  const outputBeat = resolveOutputBeat(settings.availableBeats);

  if (!settings.availableBeats.includes(result.nextBeat)) {
    console.warn(`[Director] Invalid beat '${result.nextBeat}', falling back to '${outputBeat}'`);
    result.nextBeat = outputBeat;
    applied.push('invalid_beat');
  }

  if (result.outputAction.trim() === '') {
    result.outputAction = outputActionForBeat(result.nextBeat);
    applied.push('empty_action');
  }

  const roles = resolveRoles(state, settings);
  if (!roles.includes(result.nextRole)) {
    console.warn(`[Director] Invalid role '${result.nextRole}', falling back to '${roles[0]}'`);
    result.nextRole = roles[0];
    applied.push('invalid_role');
  }

  const burst = clampTalkBurst(result.talkBurstLimitSec, talkBurstBudget(state, settings));
  if (burst !== result.talkBurstLimitSec) {
    result.talkBurstLimitSec = burst;
    applied.push('talk_burst_clamp');
  }

  // Over the threshold both the beat and the action must ask the learner for output
  if (state.outputClockSec >= settings.outputClockThresholdSec) {
    if (!isOutputBeat(result.nextBeat)) {
      result.nextBeat = outputBeat;
      result.outputAction = outputActionForBeat(outputBeat);
      applied.push('output_clock');
    } else if (!userMustDoForAction(result.outputAction)) {
      result.outputAction = outputActionForBeat(result.nextBeat);
      applied.push('output_clock');
    }
  }

  // Always follows the final action
  const mustDo = userMustDoForAction(result.outputAction);
  if (mustDo) {
    result.userMustDo = mustDo;
  } else {
    delete result.userMustDo;
  }

  if (applied.length > 0) {
    result.debug.guardrails = [...(result.debug.guardrails ?? []), ...applied];
  }
  return result;
}

function clampTalkBurst(value: number, max: number): number {
  if (!Number.isFinite(value)) return max;
  return Math.min(max, Math.max(1, Math.round(value)));
}
