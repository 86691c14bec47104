/**
 * Orchestrator - Turn Pipeline
 *
 * The Orchestrator drives one conversational turn end to end:
 *
 *   append → reduce → persist → decide → assemble → append → reduce → persist → respond
 *
 * Every fact is appended to the timeline before the snapshot that reflects
 * it is saved, so a crash between the two is repaired by rebuildSession().
 * Turns for the same session are serialized by a keyed mutex; different
 * sessions proceed in parallel.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({
 *   sessions: new InMemorySessionStore(),
 *   timeline: new InMemoryTimelineStore(),
 *   director: createDirector(config.director),
 *   assembler: new InstructionAssembler(library, config.actor),
 *   catalog,
 * });
 *
 * const { sessionId } = await orchestrator.startSession('opportunity-cost');
 * const { assistant } = await orchestrator.onEvent(sessionId, { text: 'hello' });
 * console.log(`[${assistant.role}] ${assistant.text}`);
 * ```
 */

import { randomUUID } from 'node:crypto';
import { KeyedMutex } from '@/core/concurrency/keyed-mutex';
import {
  CancelledError,
  InternalError,
  NotFoundError,
  ValidationError,
  toStoreError,
} from '@/core/errors';
import type {
  ActorContext,
  ActorPrompt,
  DirectorPlan,
  InboundEvent,
  SessionState,
  TimelineEvent,
  UnsequencedEvent,
} from '@/core/models';
import { isEngineEventType } from '@/core/models';
import { userInputOf } from '@/core/director/signals';
import { reduce, replayTimeline } from '@/core/reducer';
import { withTimeout } from '@/core/utils/timeout';
import type { GenerationResult } from './generator';
import { normalizeEvent } from './normalize';
import { createInitialState } from './session-factory';
import type {
  AssistantMessage,
  EventResponse,
  NeedUserAction,
  OnEventOptions,
  OpeningResult,
  OrchestratorConfig,
  OrchestratorDependencies,
  StartSessionResult,
} from './types';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  responseMode: 'stub',
  generationTimeoutMs: 15000,
};

/** Reply used in stub mode, where no text is generated */
export const STUB_REPLY_TEXT =
  "Got it. Sum up your understanding in one sentence first, then we'll keep going.";

export const STUB_USER_ACTION: NeedUserAction = {
  type: 'recap',
  prompt: 'Sum it up in one sentence, using "because... so...".',
};

/** Spoken when generation fails or returns nothing */
export function fallbackReplyText(mainObjective: string): string {
  return `Let's stay with ${mainObjective}. Can you tell me, in your own words, what you make of it so far?`;
}

function generateSessionId(): string {
  return `sess_${randomUUID()}`;
}

/** What the timeline already holds for a turn whose input was recorded */
interface RecordedTurn {
  plan: DirectorPlan;
  /** Null when the reply was never recorded */
  reply: EventResponse | null;
}

interface TurnOutput {
  text: string;
  needUserAction?: NeedUserAction;
  quiz: GenerationResult['quiz'];
  actorPrompt?: ActorPrompt;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  private readonly sessions: OrchestratorDependencies['sessions'];
  private readonly timeline: OrchestratorDependencies['timeline'];
  private readonly director: OrchestratorDependencies['director'];
  private readonly assembler: OrchestratorDependencies['assembler'];
  private readonly catalog: OrchestratorDependencies['catalog'];
  private readonly generator: OrchestratorDependencies['generator'];
  private readonly clock: () => Date;
  private readonly newSessionId: () => string;

  /** Serializes turns per session */
  private readonly mutex = new KeyedMutex();

  private readonly config: OrchestratorConfig;

  /**
   * @throws {ValidationError} If generate mode is configured without a generator
   */
  constructor(deps: OrchestratorDependencies, config?: Partial<OrchestratorConfig>) {
    this.sessions = deps.sessions;
    this.timeline = deps.timeline;
    this.director = deps.director;
    this.assembler = deps.assembler;
    this.catalog = deps.catalog;
    this.generator = deps.generator;
    this.clock = deps.clock ?? (() => new Date());
    this.newSessionId = deps.generateSessionId ?? generateSessionId;

    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };

    if (this.config.responseMode === 'generate' && !this.generator) {
      throw new ValidationError('Response mode "generate" needs a response generator');
    }
  }

  // ===========================================================================
  // Turn pipeline
  // ===========================================================================

  /**
   * Processes one inbound event and returns the assistant's reply.
   *
   * A repeated eventId is not recorded twice: if the original turn finished,
   * its recorded reply is returned; otherwise the turn resumes after the
   * last recorded fact, reusing a recorded plan instead of deciding again.
   *
   * @throws {ValidationError} If the event type is one only the engine records
   * @throws {NotFoundError} If the session does not exist
   * @throws {CancelledError} If the signal was aborted before anything was recorded
   * @throws {InternalError} If a store fails
   */
  async onEvent(
    sessionId: string,
    inbound: InboundEvent,
    options: OnEventOptions = {}
  ): Promise<EventResponse> {
    if (inbound.type && isEngineEventType(inbound.type)) {
      throw new ValidationError(`Event type '${inbound.type}' is recorded by the engine and cannot be submitted`);
    }

    return this.mutex.runExclusive(sessionId, async () => {
      const state = await this.loadState(sessionId);

      if (options.signal?.aborted) {
        throw new CancelledError();
      }

      if (inbound.eventId) {
        const events = await this.listEvents(sessionId);
        const existing = events.find((event) => event.eventId === inbound.eventId);
        if (existing) {
          console.log(`[Orchestrator] Duplicate event ${inbound.eventId} for session ${sessionId}`);
          const recorded = this.recordedTurn(events, existing);
          if (recorded?.reply) {
            return recorded.reply;
          }
          return this.runTurn(state, existing, this.clock(), recorded?.plan);
        }
      }

      const now = this.clock();
      const event = await this.appendEvent(normalizeEvent(sessionId, inbound, now));
      const reduced = reduce(state, event, now);
      await this.saveState(reduced);

      return this.runTurn(reduced, event, now);
    });
  }

  /**
   * Decide, speak and record the reply to an input that is already on the
   * timeline and reflected in `state`. A `recordedPlan` is already on the
   * timeline and in `state`; the Director is not asked again.
   */
  private async runTurn(
    state: SessionState,
    input: TimelineEvent,
    now: Date,
    recordedPlan?: DirectorPlan
  ): Promise<EventResponse> {
    const turnId = input.turnId ?? `turn_${input.seq}`;

    let plan: DirectorPlan;
    let current = state;
    if (recordedPlan) {
      plan = recordedPlan;
    } else {
      plan = await this.director.decide(state, input);
      const planEvent = await this.appendEvent({
        sessionId: state.sessionId,
        turnId,
        type: 'director_plan',
        text: '',
        clientTimestamp: now,
        serverTimestamp: now,
        directorPlan: plan,
      });
      current = reduce(state, planEvent, now);
      await this.saveState(current);
    }

    const output = await this.produceOutput(current, plan, input, turnId);

    const spokenAt = this.clock();
    const textEvent = await this.appendEvent({
      sessionId: state.sessionId,
      turnId,
      type: 'assistant_text',
      text: output.text,
      role: plan.nextRole,
      clientTimestamp: spokenAt,
      serverTimestamp: spokenAt,
    });
    current = reduce(current, textEvent, spokenAt);
    await this.saveState(current);

    const assistant: AssistantMessage = { text: output.text, role: plan.nextRole, quiz: output.quiz ?? null };
    if (output.needUserAction) {
      assistant.needUserAction = output.needUserAction;
    }

    return {
      assistant,
      debug: output.actorPrompt
        ? { directorPlan: plan, actorPrompt: output.actorPrompt }
        : { directorPlan: plan },
    };
  }

  private async produceOutput(
    state: SessionState,
    plan: DirectorPlan,
    input: TimelineEvent,
    turnId: string
  ): Promise<TurnOutput> {
    if (this.config.responseMode === 'stub' || !this.generator) {
      return { text: STUB_REPLY_TEXT, needUserAction: STUB_USER_ACTION, quiz: null };
    }

    const actorPrompt = this.assembler.build(plan, this.buildContext(state, input, turnId));
    const needUserAction = plan.userMustDo
      ? { type: plan.userMustDo.type, prompt: plan.userMustDo.prompt }
      : undefined;

    const generator = this.generator;
    try {
      const result = await withTimeout(
        (signal) => generator.generate({ prompt: actorPrompt, state, signal }),
        this.config.generationTimeoutMs,
        'Response generation'
      );
      const text = result.text.trim();
      if (text) {
        return { text, needUserAction, quiz: result.quiz ?? null, actorPrompt };
      }
      console.warn(`[Orchestrator] Generator returned empty text for session ${state.sessionId}, using fallback line`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[Orchestrator] Generation failed for session ${state.sessionId}, using fallback line: ${reason}`);
    }

    return { text: fallbackReplyText(state.mainObjective), needUserAction, quiz: null, actorPrompt };
  }

  /**
   * The plan and reply recorded right after `input`. Returns null when no
   * plan was recorded, and a null reply when the turn stopped after its plan.
   */
  private recordedTurn(events: readonly TimelineEvent[], input: TimelineEvent): RecordedTurn | null {
    const [planEvent, textEvent] = events.filter((event) => event.seq > input.seq);
    if (!planEvent || planEvent.type !== 'director_plan' || !planEvent.directorPlan) {
      return null;
    }
    const plan = planEvent.directorPlan;

    if (!textEvent || textEvent.type !== 'assistant_text') {
      return { plan, reply: null };
    }

    const assistant: AssistantMessage = { text: textEvent.text, role: textEvent.role ?? plan.nextRole, quiz: null };
    const needUserAction = this.config.responseMode === 'stub' ? STUB_USER_ACTION : plan.userMustDo;
    if (needUserAction) {
      assistant.needUserAction = { type: needUserAction.type, prompt: needUserAction.prompt };
    }
    return { plan, reply: { assistant, debug: { directorPlan: plan } } };
  }

  private buildContext(state: SessionState, input: TimelineEvent, turnId: string): ActorContext {
    const entry = this.catalog.find(state.entryId);
    return {
      sessionId: state.sessionId,
      turnId,
      entryId: state.entryId,
      domain: state.domain,
      mainObjective: state.mainObjective,
      conceptName: state.mainObjective,
      metaphor: entry?.metaphor ?? '',
      lastUserText: userInputOf(input),
    };
  }

  // ===========================================================================
  // Session lifecycle
  // ===========================================================================

  /**
   * Creates a session for a catalog entry and records its start.
   *
   * @throws {NotFoundError} If the entry is not in the catalog
   */
  async startSession(entryId: string): Promise<StartSessionResult> {
    const entry = this.catalog.get(entryId);
    const sessionId = this.newSessionId();

    return this.mutex.runExclusive(sessionId, async () => {
      const now = this.clock();
      const state = createInitialState({ sessionId, entry, now });

      await this.saveState(state);
      await this.appendEvent({
        sessionId,
        type: 'session_started',
        text: '',
        entryId: entry.entryId,
        clientTimestamp: now,
        serverTimestamp: now,
      });

      console.log(`[Orchestrator] Started session ${sessionId} on '${entry.entryId}'`);
      return { sessionId, state, diagnose: entry.diagnose.questions };
    });
  }

  /**
   * @throws {NotFoundError} If the session does not exist
   */
  async getSession(sessionId: string): Promise<SessionState> {
    return this.loadState(sessionId);
  }

  /**
   * @throws {NotFoundError} If the session does not exist
   */
  async getTimeline(sessionId: string): Promise<TimelineEvent[]> {
    await this.loadState(sessionId);
    return this.listEvents(sessionId);
  }

  /**
   * Records an assistant utterance that was produced outside the turn
   * pipeline, e.g. the spoken opening line. The Director is not consulted.
   */
  async recordAssistantText(sessionId: string, text: string, role?: string): Promise<SessionState> {
    return this.mutex.runExclusive(sessionId, async () => {
      const state = await this.loadState(sessionId);
      const now = this.clock();

      const event: UnsequencedEvent = {
        sessionId,
        type: 'assistant_text',
        text,
        clientTimestamp: now,
        serverTimestamp: now,
      };
      if (role) event.role = role;

      const reduced = reduce(state, await this.appendEvent(event), now);
      await this.saveState(reduced);
      return reduced;
    });
  }

  /**
   * Records that the learner interrupted the assistant. Returns the seq of
   * the recorded fact.
   */
  async recordBargeIn(sessionId: string): Promise<number> {
    return this.mutex.runExclusive(sessionId, async () => {
      const state = await this.loadState(sessionId);
      const now = this.clock();

      const event = await this.appendEvent({
        sessionId,
        type: 'barge_in',
        text: '',
        clientTimestamp: now,
        serverTimestamp: now,
      });
      await this.saveState(reduce(state, event, now));
      return event.seq;
    });
  }

  /**
   * Plans and assembles the instructions for the session's opening line,
   * as if the learner had said nothing yet. Nothing is recorded.
   */
  async openingInstructions(sessionId: string): Promise<OpeningResult> {
    const state = await this.loadState(sessionId);
    const now = this.clock();
    const opening: TimelineEvent = {
      seq: 0,
      sessionId,
      turnId: 'turn_opening',
      type: 'user_message',
      text: '',
      clientTimestamp: now,
      serverTimestamp: now,
    };

    const directorPlan = await this.director.decide(state, opening);
    const actorPrompt = this.assembler.build(directorPlan, this.buildContext(state, opening, 'turn_opening'));
    return { directorPlan, actorPrompt };
  }

  /**
   * Rebuilds the snapshot from the timeline and saves it.
   *
   * @throws {NotFoundError} If the session has no timeline
   * @throws {InternalError} If the timeline has no session_started fact
   */
  async rebuildSession(sessionId: string): Promise<SessionState> {
    return this.mutex.runExclusive(sessionId, async () => {
      const events = await this.listEvents(sessionId);
      if (events.length === 0) {
        throw new NotFoundError('Session', sessionId);
      }

      const started = events.find((event) => event.type === 'session_started');
      if (!started?.entryId) {
        throw new InternalError(`Session '${sessionId}' has no session_started event to rebuild from`);
      }

      const entry = this.catalog.get(started.entryId);
      const seed = createInitialState({ sessionId, entry, now: started.serverTimestamp });
      const state = replayTimeline(seed, events);

      await this.saveState(state);
      console.log(`[Orchestrator] Rebuilt session ${sessionId} from ${events.length} events`);
      return state;
    });
  }

  // ===========================================================================
  // Store access
  // ===========================================================================

  private async loadState(sessionId: string): Promise<SessionState> {
    try {
      return await this.sessions.get(sessionId);
    } catch (error) {
      throw toStoreError('session load', error);
    }
  }

  private async saveState(state: SessionState): Promise<void> {
    try {
      await this.sessions.save(state);
    } catch (error) {
      throw toStoreError('session save', error);
    }
  }

  private async appendEvent(event: UnsequencedEvent): Promise<TimelineEvent> {
    try {
      const seq = await this.timeline.append(event.sessionId, event);
      return { ...event, seq };
    } catch (error) {
      throw toStoreError('timeline append', error);
    }
  }

  private async listEvents(sessionId: string): Promise<TimelineEvent[]> {
    try {
      return await this.timeline.list(sessionId);
    } catch (error) {
      throw toStoreError('timeline list', error);
    }
  }
}
