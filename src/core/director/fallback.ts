/**
 * The conservative plan used whenever the decision provider cannot be
 * trusted: ask the default role to have the learner recap.
 */

import type { DirectorPlan, FallbackReason } from '@/core/models';
import { userMustDoForAction } from './actions';

export const FALLBACK_BEAT = 'check';
export const FALLBACK_ACTION = 'recap';

/**
 * Builds the fallback plan.
 *
 * @param role - The default role (first available role)
 * @param talkBurstLimitSec - The default talk-burst budget
 * @param reason - Why the provider's plan was not used
 * @param beat - The output beat to play, when 'check' is not configured
 */
export function createFallbackPlan(
  role: string,
  talkBurstLimitSec: number,
  reason: FallbackReason,
  beat: string = FALLBACK_BEAT
): DirectorPlan {
  return {
    userMindState: ['Engaged'],
    flowMode: 'RESCUE',
    intent: 'continue',
    nextBeat: beat,
    nextRole: role,
    outputAction: FALLBACK_ACTION,
    userMustDo: userMustDoForAction(FALLBACK_ACTION),
    talkBurstLimitSec,
    tensionGoal: 'maintain',
    loadGoal: 'maintain',
    stackAction: 'keep',
    contentDirection: 'Ask the learner to sum up what has been covered so far.',
    notes: `fallback plan (${reason})`,
    debug: { source: 'fallback', fallbackReason: reason },
  };
}
