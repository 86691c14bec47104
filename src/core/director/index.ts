/**
 * Director Module
 *
 * @example
 * ```typescript
 * import { createDirector } from '@/core/director';
 *
 * const director = createDirector(config.director, { llmClient });
 * const plan = await director.decide(state, event);
 * ```
 */

import type { DirectorConfig } from '@/config';
import { ValidationError } from '@/core/errors';
import { DelegatedDirector } from './delegated-director';
import { HeuristicDirector } from './heuristic-director';
import type { Director, DirectorDependencies } from './types';

/**
 * Builds the Director variant selected by `config.mode`.
 *
 * @throws {ValidationError} If the delegated mode is selected without an LLM client
 */
export function createDirector(config: DirectorConfig, deps: DirectorDependencies = {}): Director {
  const { mode, ...settings } = config;

  if (mode === 'delegated') {
    if (!deps.llmClient) {
      throw new ValidationError('The delegated director needs an LLM client (set ANTHROPIC_API_KEY)');
    }
    return new DelegatedDirector(settings, deps.llmClient);
  }
  return new HeuristicDirector(settings);
}

export type { Director, DirectorDependencies, DirectorSettings } from './types';
export { HeuristicDirector } from './heuristic-director';
export { DelegatedDirector } from './delegated-director';
export { applyGuardrails, resolveRoles, talkBurstBudget } from './guardrails';
export { createFallbackPlan, FALLBACK_ACTION, FALLBACK_BEAT } from './fallback';
export { BEAT_LIBRARY, OUTPUT_BEATS, getBeatCard, isOutputBeat, resolveOutputBeat, type BeatCard } from './beat-library';
export { outputActionForBeat, userMustDoForAction, DEFAULT_OUTPUT_ACTION } from './actions';
export {
  inferFlowMode,
  inferUserMindState,
  inferIntent,
  generateBeatCandidates,
  decideStackAction,
  goalForLevel,
  defaultContentDirection,
  userInputOf,
} from './signals';
