/**
 * Director Plan Types
 *
 * A DirectorPlan is the Director's decision for the next turn: who speaks
 * (role), with which strategy (beat), doing what (output action), under which
 * constraints. Plans are not stored on their own; each one is recorded on
 * the timeline inside a 'director_plan' event.
 */

/** Learner mind-state tags the Director can infer */
export const USER_MIND_STATES = [
  'Fog',
  'Illusion',
  'Partial',
  'Aha',
  'Verify',
  'Expand',
  'Fatigue',
  'Engaged',
] as const;

export type UserMindState = (typeof USER_MIND_STATES)[number];

export const FLOW_MODES = ['FLOW', 'RESCUE'] as const;

export type FlowMode = (typeof FLOW_MODES)[number];

export const INTENTS = ['clarify', 'deepen', 'branch', 'meta', 'off_topic', 'continue'] as const;

export type Intent = (typeof INTENTS)[number];

export const GOALS = ['increase', 'decrease', 'maintain'] as const;

export type Goal = (typeof GOALS)[number];

export const STACK_ACTIONS = ['push', 'pop', 'keep'] as const;

export type StackAction = (typeof STACK_ACTIONS)[number];

/** Kinds of artifact the learner may be asked to produce */
export type UserMustDoType = 'teach_back' | 'choice' | 'example' | 'boundary' | 'transfer' | 'recap';

export interface UserMustDo {
  type: UserMustDoType;
  /** What the learner is asked to do, in plain words */
  prompt: string;
}

/** Which Director variant produced a plan */
export type PlanSource = 'heuristic' | 'delegated' | 'fallback';

export type FallbackReason = 'timeout' | 'provider_error' | 'malformed_response';

/**
 * Decision trace attached to a plan.
 */
export interface DirectorDebug {
  source: PlanSource;
  beatCandidates?: string[];
  beatChoiceReason?: string;
  roleChoiceReason?: string;
  /** Set when source is 'fallback' */
  fallbackReason?: FallbackReason;
  /** Names of guardrails that changed the plan */
  guardrails?: string[];
}

/**
 * The Director's structured decision.
 *
 * @example
 * ```typescript
 * const plan: DirectorPlan = {
 *   userMindState: ['Illusion'],
 *   flowMode: 'RESCUE',
 *   intent: 'continue',
 *   nextBeat: 'twist',
 *   nextRole: 'skeptic',
 *   outputAction: 'challenge_assumption',
 *   userMustDo: { type: 'boundary', prompt: 'Explain whether the rule still holds here.' },
 *   talkBurstLimitSec: 20,
 *   tensionGoal: 'increase',
 *   loadGoal: 'increase',
 *   stackAction: 'keep',
 *   contentDirection: 'Use a counterexample from the last answer.',
 *   notes: 'rule engine',
 *   debug: { source: 'heuristic', beatCandidates: ['twist', 'check'] },
 * };
 * ```
 */
export interface DirectorPlan {
  userMindState: UserMindState[];
  flowMode: FlowMode;
  intent: Intent;
  nextBeat: string;
  nextRole: string;
  outputAction: string;
  /** Present whenever the output action needs the learner to produce something */
  userMustDo?: UserMustDo;
  talkBurstLimitSec: number;
  tensionGoal: Goal;
  loadGoal: Goal;
  stackAction: StackAction;
  /** Rough direction for what the role should talk about this turn */
  contentDirection: string;
  notes: string;
  debug: DirectorDebug;
}
