/**
 * Heuristic Director
 *
 * Rule-based Director. Runs the signal inference rules in order, takes the
 * first candidate beat, and rotates the speaking role across the cast.
 * Deterministic: the same snapshot and event always yield the same plan.
 */

import type { DirectorPlan, SessionState, TimelineEvent } from '@/core/models';
import { outputActionForBeat } from './actions';
import { resolveOutputBeat } from './beat-library';
import { applyGuardrails, resolveRoles, talkBurstBudget } from './guardrails';
import {
  decideStackAction,
  defaultContentDirection,
  generateBeatCandidates,
  goalForLevel,
  inferFlowMode,
  inferIntent,
  inferUserMindState,
  userInputOf,
} from './signals';
import type { Director, DirectorSettings } from './types';

export class HeuristicDirector implements Director {
  /**
   * @throws {ValidationError} If no output beat is configured
   */
  constructor(private readonly settings: DirectorSettings) {
    resolveOutputBeat(settings.availableBeats);
  }

  async decide(state: Readonly<SessionState>, event: Readonly<TimelineEvent>): Promise<DirectorPlan> {
    const userInput = userInputOf(event);

    const flowMode = inferFlowMode(state, userInput);
    const userMindState = inferUserMindState(state, userInput);
    const intent = inferIntent(userInput);
    const beatCandidates = generateBeatCandidates(
      state,
      flowMode,
      userMindState,
      this.settings.outputClockThresholdSec
    );
    const allowed = beatCandidates.filter((beat) => this.settings.availableBeats.includes(beat));

    const nextBeat = allowed.length > 0 ? allowed[0] : beatCandidates[0];
    const roles = resolveRoles(state, this.settings);
    const assistantTurns = state.turns.filter((turn) => turn.role !== 'user').length;
    const nextRole = roles[assistantTurns % roles.length];

    const plan: DirectorPlan = {
      userMindState,
      flowMode,
      intent,
      nextBeat,
      nextRole,
      outputAction: outputActionForBeat(nextBeat),
      talkBurstLimitSec: talkBurstBudget(state, this.settings),
      tensionGoal: goalForLevel(state.tensionLevel),
      loadGoal: goalForLevel(state.cognitiveLoad),
      stackAction: decideStackAction(intent, state.questionStack.length),
      contentDirection: defaultContentDirection(nextBeat, userMindState),
      notes: 'rule engine',
      debug: {
        source: 'heuristic',
        beatCandidates,
        beatChoiceReason: 'first candidate',
        roleChoiceReason: `rotation: ${assistantTurns} assistant turns over ${roles.length} roles`,
      },
    };

    return applyGuardrails(plan, state, this.settings);
  }
}
