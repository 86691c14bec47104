/**
 * Delegated Director
 *
 * Hands the decision to an external provider through the LLM client. The
 * provider is untrusted: a timeout, a provider error, or a reply that does
 * not validate all produce the fallback plan instead of an exception. Valid
 * replies still pass through the guardrails.
 */

import type { DirectorPlan, FallbackReason, SessionState, TimelineEvent } from '@/core/models';
import { TimeoutError, withTimeout } from '@/core/utils/timeout';
import {
  buildDirectorSystemPrompt,
  buildDirectorUserPrompt,
  parseDirectorPlanResponse,
} from '@/llm/prompts/director-plan';
import { LLMError, type LLMClient } from '@/llm/types';
import { createFallbackPlan } from './fallback';
import { resolveOutputBeat } from './beat-library';
import { applyGuardrails, resolveRoles } from './guardrails';
import { decideStackAction, userInputOf } from './signals';
import type { Director, DirectorSettings } from './types';

// Decisions should be repeatable more than creative
const DECISION_TEMPERATURE = 0.2;

export class DelegatedDirector implements Director {
  private readonly outputBeat: string;

  /**
   * @throws {ValidationError} If no output beat is configured
   */
  constructor(
    private readonly settings: DirectorSettings,
    private readonly llmClient: LLMClient
  ) {
    this.outputBeat = resolveOutputBeat(settings.availableBeats);
  }

  async decide(state: Readonly<SessionState>, event: Readonly<TimelineEvent>): Promise<DirectorPlan> {
    const roles = resolveRoles(state, this.settings);
    const userPrompt = buildDirectorUserPrompt({
      state,
      userInput: userInputOf(event),
      roles,
      beats: this.settings.availableBeats,
      outputClockThresholdSec: this.settings.outputClockThresholdSec,
    });

    let responseText: string;
    try {
      const response = await withTimeout(
        (signal) =>
          this.llmClient.complete([{ role: 'user', content: userPrompt }], {
            system: buildDirectorSystemPrompt(),
            temperature: DECISION_TEMPERATURE,
            timeoutMs: this.settings.decisionTimeoutMs,
            signal,
          }),
        this.settings.decisionTimeoutMs,
        'Director decision'
      );
      responseText = response.text;
    } catch (error) {
      const reason = classifyProviderFailure(error);
      console.warn(
        `[Director] Decision provider failed (${reason}), using fallback plan:`,
        error instanceof Error ? error.message : String(error)
      );
      return this.fallback(roles, reason);
    }

    const parsed = parseDirectorPlanResponse(responseText);
    if (!parsed.ok) {
      console.warn(`[Director] Malformed decision, using fallback plan: ${parsed.error}`);
      return this.fallback(roles, 'malformed_response');
    }

    const { stackAction, ...providerPlan } = parsed.plan;
    const plan: DirectorPlan = {
      ...providerPlan,
      stackAction: stackAction ?? decideStackAction(providerPlan.intent, state.questionStack.length),
      debug: {
        source: 'delegated',
        beatChoiceReason: providerPlan.notes || undefined,
      },
    };

    return applyGuardrails(plan, state, this.settings);
  }

  private fallback(roles: readonly string[], reason: FallbackReason): DirectorPlan {
    return createFallbackPlan(roles[0], this.settings.defaultTalkBurstSec, reason, this.outputBeat);
  }
}

function classifyProviderFailure(error: unknown): FallbackReason {
  if (error instanceof TimeoutError) return 'timeout';
  if (error instanceof LLMError && (error.type === 'timeout' || error.type === 'aborted')) {
    return 'timeout';
  }
  return 'provider_error';
}
