/**
 * Orchestrator Types
 *
 * This module defines the types used by the Orchestrator:
 *
 * 1. **Responses**: what a turn returns to the transport (EventResponse).
 *
 * 2. **Configuration**: how the reply text is produced (stub or generated).
 *
 * 3. **Dependencies**: the stores, engines and collaborators injected into
 *    the Orchestrator.
 */

import type { OrchestratorConfig } from '@/config';
import type { InstructionAssembler } from '@/core/actor';
import type { EntryCatalog } from '@/core/catalog/entry-catalog';
import type { Director } from '@/core/director';
import type {
  ActorPrompt,
  DirectorPlan,
  QuizQuestion,
  SessionState,
} from '@/core/models';
import type { SessionStore, TimelineStore } from '@/storage/repositories/base';
import type { ResponseGenerator } from './generator';

/**
 * Something the learner is asked to do after hearing the reply.
 */
export interface NeedUserAction {
  type: string;
  prompt: string;
}

export interface AssistantMessage {
  text: string;
  /** The role that spoke */
  role: string;
  needUserAction?: NeedUserAction;
  /** A quiz question to show alongside the reply, when the generator produced one */
  quiz: QuizQuestion | null;
}

export interface TurnDebug {
  directorPlan: DirectorPlan;
  /** Absent in stub mode, where no instructions are assembled */
  actorPrompt?: ActorPrompt;
}

/**
 * Result of one turn.
 *
 * @example
 * ```typescript
 * const { assistant, debug } = await orchestrator.onEvent(sessionId, { text: 'hello' });
 * console.log(`[${assistant.role}] ${assistant.text}`);
 * console.log(debug.directorPlan.nextBeat);
 * ```
 */
export interface EventResponse {
  assistant: AssistantMessage;
  debug: TurnDebug;
}

export interface StartSessionResult {
  sessionId: string;
  state: SessionState;
  /** Diagnostic questions of the entry */
  diagnose: QuizQuestion[];
}

export interface OpeningResult {
  directorPlan: DirectorPlan;
  actorPrompt: ActorPrompt;
}

export interface OnEventOptions {
  /** Checked once, before anything is recorded */
  signal?: AbortSignal;
}

/**
 * Dependencies required by the Orchestrator.
 *
 * Using dependency injection makes the orchestrator testable: tests pass
 * in-memory stores, a fixed clock and a mock generator.
 */
export interface OrchestratorDependencies {
  sessions: SessionStore;
  timeline: TimelineStore;
  director: Director;
  assembler: InstructionAssembler;
  catalog: EntryCatalog;
  /** Required when config.responseMode is 'generate' */
  generator?: ResponseGenerator;
  /** Defaults to `() => new Date()` */
  clock?: () => Date;
  /** Defaults to `sess_<uuid>` */
  generateSessionId?: () => string;
}

export type { OrchestratorConfig };
