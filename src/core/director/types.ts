/**
 * Director Types
 *
 * The Director decides, once per turn, which role speaks next and which
 * strategy beat it plays. It is stateless: everything it needs is in the
 * snapshot, the event being answered, and the configuration it was built
 * with.
 */

import type { DirectorConfig } from '@/config';
import type { DirectorPlan, SessionState, TimelineEvent } from '@/core/models';
import type { LLMClient } from '@/llm/types';

/**
 * Settings the Director variants read. The mode itself is only consumed by
 * the factory.
 */
export type DirectorSettings = Omit<DirectorConfig, 'mode'>;

/**
 * The Director contract. Both variants resolve with a plan that already
 * passed the guardrails (or is the fallback plan); they never reject on
 * provider trouble.
 *
 * @example
 * ```typescript
 * const plan = await director.decide(state, userEvent);
 * console.log(`${plan.nextRole} plays ${plan.nextBeat} (${plan.outputAction})`);
 * ```
 */
export interface Director {
  decide(state: Readonly<SessionState>, event: Readonly<TimelineEvent>): Promise<DirectorPlan>;
}

/**
 * Collaborators the Director factory may need.
 */
export interface DirectorDependencies {
  /** Required when the mode is 'delegated' */
  llmClient?: LLMClient;
}
