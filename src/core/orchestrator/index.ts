export {
  Orchestrator,
  DEFAULT_ORCHESTRATOR_CONFIG,
  STUB_REPLY_TEXT,
  STUB_USER_ACTION,
  fallbackReplyText,
} from './orchestrator';
export { LlmResponseGenerator } from './generator';
export type {
  ResponseGenerator,
  GenerationRequest,
  GenerationResult,
  LlmResponseGeneratorOptions,
} from './generator';
export { normalizeEvent, DEFAULT_EVENT_TYPE } from './normalize';
export {
  createInitialState,
  INITIAL_BEAT,
  INITIAL_MASTERY,
  INITIAL_TENSION,
  INITIAL_LOAD,
  type InitialStateParams,
} from './session-factory';
export type {
  AssistantMessage,
  EventResponse,
  NeedUserAction,
  OnEventOptions,
  OpeningResult,
  OrchestratorDependencies,
  StartSessionResult,
  TurnDebug,
} from './types';
