/**
 * Core Domain Models - Barrel Export
 *
 * These types form the contract between the stores, the reducer, the
 * Director, the Actor and the Orchestrator.
 *
 * @example
 * ```typescript
 * import type { SessionState, TimelineEvent, DirectorPlan } from '@/core/models';
 * ```
 */

export type {
  KnownEventType,
  EventType,
  TimelineEvent,
  UnsequencedEvent,
  InboundEvent,
} from './event';
export { ENGINE_EVENT_TYPES, isEngineEventType } from './event';

export type {
  PacingMode,
  Turn,
  BranchQuestion,
  SignalsSnapshot,
  SessionState,
} from './session-state';

export { USER_MIND_STATES, FLOW_MODES, INTENTS, GOALS, STACK_ACTIONS } from './director-plan';
export type {
  UserMindState,
  FlowMode,
  Intent,
  Goal,
  StackAction,
  UserMustDoType,
  UserMustDo,
  PlanSource,
  FallbackReason,
  DirectorDebug,
  DirectorPlan,
} from './director-plan';

export { PROMPT_SECTION_HEADERS } from './actor-prompt';
export type {
  PromptSectionHeader,
  PromptSection,
  ActorPromptDebug,
  ActorPrompt,
  ActorContext,
} from './actor-prompt';

export type { QuizQuestion, DiagnoseSet, Entry } from './entry';
