/**
 * Integration Tests: Orchestrator Turn Pipeline
 *
 * Drives the Orchestrator over real stores, the heuristic Director and the
 * Actor, with a manual clock. Expected plans follow from the initial
 * snapshot: mastery 0.2 and tension 2 make a learner who says "hello" look
 * overconfident, so the first turn is a twist played by the host.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createDirector, createFallbackPlan, type Director } from '../../src/core/director';
import { CancelledError, InternalError, NotFoundError, ValidationError } from '../../src/core/errors';
import type { DirectorPlan, SessionState, TimelineEvent, UnsequencedEvent } from '../../src/core/models';
import {
  STUB_REPLY_TEXT,
  STUB_USER_ACTION,
  fallbackReplyText,
  type GenerationRequest,
  type GenerationResult,
  type ResponseGenerator,
} from '../../src/core/orchestrator';
import { InMemoryTimelineStore } from '../../src/storage/memory';
import type { TimelineStore } from '../../src/storage/repositories';
import { createTestEngine, type TestEngine } from '../setup';
import { MockLLMClient, T0, createDirectorSettings, secondsAfter } from '../helpers';

// ============================================================================
// Test doubles
// ============================================================================

/** Heuristic Director that remembers what it was shown */
class RecordingDirector implements Director {
  readonly seen: { outputClockSec: number; input: string }[] = [];
  failNext = false;
  private readonly inner = createDirector({ mode: 'heuristic', ...createDirectorSettings() });

  async decide(state: Readonly<SessionState>, event: Readonly<TimelineEvent>): Promise<DirectorPlan> {
    this.seen.push({ outputClockSec: state.outputClockSec, input: event.text });
    if (this.failNext) {
      this.failNext = false;
      throw new Error('director crashed');
    }
    return this.inner.decide(state, event);
  }
}

class ScriptedGenerator implements ResponseGenerator {
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly respond: (request: GenerationRequest) => Promise<GenerationResult>) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    return this.respond(request);
  }
}

class FailingTimelineStore implements TimelineStore {
  private readonly inner = new InMemoryTimelineStore();
  failAppends = false;
  /** Fail appends of this event type only */
  failType: string | null = null;

  async append(sessionId: string, event: UnsequencedEvent): Promise<number> {
    if (this.failAppends || event.type === this.failType) {
      throw new Error('disk full');
    }
    return this.inner.append(sessionId, event);
  }

  async list(sessionId: string): Promise<TimelineEvent[]> {
    return this.inner.list(sessionId);
  }
}

const TWIST_DIRECTIVE = 'Find where Opportunity cost breaks, starting from taking one bus means missing the other.';

describe('Orchestrator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ==========================================================================
  // Session lifecycle
  // ==========================================================================
  describe('startSession', () => {
    it('should create the snapshot and record the start', async () => {
      const { orchestrator } = createTestEngine();

      const result = await orchestrator.startSession('test-entry');

      expect(result.sessionId).toBe('sess_test_1');
      expect(result.diagnose).toEqual([{ id: 'q-1', prompt: 'Is free time free?', options: ['Yes', 'No'] }]);
      expect(result.state).toMatchObject({
        entryId: 'test-entry',
        beat: 'cold_open',
        masteryEstimate: 0.2,
        outputClockSec: 0,
        lastOutputAt: T0,
        availableRoles: ['host', 'economist', 'skeptic'],
      });

      const timeline = await orchestrator.getTimeline('sess_test_1');
      expect(timeline).toEqual([
        {
          seq: 1,
          sessionId: 'sess_test_1',
          type: 'session_started',
          text: '',
          entryId: 'test-entry',
          clientTimestamp: T0,
          serverTimestamp: T0,
        },
      ]);
    });

    it('should reject an unknown entry', async () => {
      const { orchestrator } = createTestEngine();
      await expect(orchestrator.startSession('no-such-entry')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject reads of an unknown session', async () => {
      const { orchestrator } = createTestEngine();

      await expect(orchestrator.getSession('sess_missing')).rejects.toBeInstanceOf(NotFoundError);
      await expect(orchestrator.getTimeline('sess_missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  // ==========================================================================
  // onEvent
  // ==========================================================================
  describe('onEvent', () => {
    let engine: TestEngine;
    let director: RecordingDirector;
    let sessionId: string;

    beforeEach(async () => {
      director = new RecordingDirector();
      engine = createTestEngine({ director });
      ({ sessionId } = await engine.orchestrator.startSession('test-entry'));
    });

    it('should record input, plan and reply as one turn', async () => {
      // Arrange
      engine.clock.advance(60);

      // Act
      const response = await engine.orchestrator.onEvent(sessionId, { text: 'hello' });

      // Assert
      expect(response.assistant).toEqual({
        text: STUB_REPLY_TEXT,
        role: 'host',
        needUserAction: STUB_USER_ACTION,
        quiz: null,
      });
      expect(response.debug.directorPlan).toMatchObject({ nextBeat: 'twist', nextRole: 'host', flowMode: 'RESCUE' });
      expect(response.debug).not.toHaveProperty('actorPrompt');

      const timeline = await engine.orchestrator.getTimeline(sessionId);
      expect(timeline.map((event) => [event.seq, event.type, event.turnId])).toEqual([
        [1, 'session_started', undefined],
        [2, 'user_message', undefined],
        [3, 'director_plan', 'turn_2'],
        [4, 'assistant_text', 'turn_2'],
      ]);
      expect(timeline[2].directorPlan).toEqual(response.debug.directorPlan);
      expect(timeline[3]).toMatchObject({ role: 'host', text: STUB_REPLY_TEXT });
    });

    it('should show the Director the output clock and reset it after the reply', async () => {
      engine.clock.advance(60);

      await engine.orchestrator.onEvent(sessionId, { text: 'hello' });
      const state = await engine.orchestrator.getSession(sessionId);

      expect(director.seen).toEqual([{ outputClockSec: 60, input: 'hello' }]);
      expect(state.outputClockSec).toBe(0);
      expect(state.lastOutputAt).toEqual(secondsAfter(T0, 60));
      expect(state.beat).toBe('twist');
      expect(state.turns.map((turn) => [turn.role, turn.text])).toEqual([
        ['user', 'hello'],
        ['host', STUB_REPLY_TEXT],
      ]);
    });

    it('should force an output beat after a long silence', async () => {
      engine.clock.advance(120);

      const response = await engine.orchestrator.onEvent(sessionId, { text: 'hello' });

      expect(response.debug.directorPlan.nextBeat).toBe('check');
      expect(response.debug.directorPlan.userMustDo?.type).toBe('choice');
    });

    it('should use the caller turnId for the plan and reply', async () => {
      await engine.orchestrator.onEvent(sessionId, { text: 'hi', turnId: 'turn_custom' });

      const timeline = await engine.orchestrator.getTimeline(sessionId);
      expect(timeline.slice(1).map((event) => event.turnId)).toEqual(['turn_custom', 'turn_custom', 'turn_custom']);
    });

    it('should take quiz answers as learner input', async () => {
      await engine.orchestrator.onEvent(sessionId, { type: 'quiz_answer', questionId: 'q-1', answer: 'No' });

      const state = await engine.orchestrator.getSession(sessionId);
      expect(director.seen[0].input).toBe('');
      expect(state.turns[0]).toEqual({ role: 'user', text: 'No', timestamp: T0 });
    });

    it('should rotate the speaking role across turns', async () => {
      const first = await engine.orchestrator.onEvent(sessionId, { text: 'hello' });
      const second = await engine.orchestrator.onEvent(sessionId, { text: 'go on' });
      const third = await engine.orchestrator.onEvent(sessionId, { text: 'and then' });

      expect([first, second, third].map((r) => r.assistant.role)).toEqual(['host', 'economist', 'skeptic']);
    });

    it('should park a branch question on the stack', async () => {
      await engine.orchestrator.onEvent(sessionId, { text: 'what about interest rates' });

      const state = await engine.orchestrator.getSession(sessionId);
      expect(state.questionStack).toEqual([{ questionId: 'q_3', prompt: 'what about interest rates' }]);
    });

    // ------------------------------------------------------------------------
    // Idempotency
    // ------------------------------------------------------------------------

    it('should answer a repeated eventId from the recorded turn', async () => {
      const first = await engine.orchestrator.onEvent(sessionId, { text: 'hello', eventId: 'evt-1' });
      engine.clock.advance(10);

      const again = await engine.orchestrator.onEvent(sessionId, { text: 'hello again', eventId: 'evt-1' });

      expect(again.assistant).toEqual(first.assistant);
      expect(again.debug.directorPlan).toEqual(first.debug.directorPlan);
      expect(await engine.orchestrator.getTimeline(sessionId)).toHaveLength(4);
      expect((await engine.orchestrator.getSession(sessionId)).turns).toHaveLength(2);
      expect(director.seen).toHaveLength(1);
    });

    it('should finish an interrupted turn when its eventId is retried', async () => {
      director.failNext = true;
      await expect(engine.orchestrator.onEvent(sessionId, { text: 'hello', eventId: 'evt-2' })).rejects.toThrow(
        'director crashed'
      );

      const response = await engine.orchestrator.onEvent(sessionId, { text: 'hello', eventId: 'evt-2' });

      expect(response.assistant.text).toBe(STUB_REPLY_TEXT);
      const timeline = await engine.orchestrator.getTimeline(sessionId);
      expect(timeline.map((event) => event.type)).toEqual([
        'session_started',
        'user_message',
        'director_plan',
        'assistant_text',
      ]);
      const state = await engine.orchestrator.getSession(sessionId);
      expect(state.turns.map((turn) => turn.role)).toEqual(['user', 'host']);
    });

    it('should reuse the recorded plan when a turn stopped before its reply', async () => {
      const timeline = new FailingTimelineStore();
      const recording = new RecordingDirector();
      const interrupted = createTestEngine({ director: recording, timeline });
      const started = await interrupted.orchestrator.startSession('test-entry');
      timeline.failType = 'assistant_text';
      await expect(
        interrupted.orchestrator.onEvent(started.sessionId, { text: 'hello', eventId: 'evt-3' })
      ).rejects.toBeInstanceOf(InternalError);
      timeline.failType = null;

      const response = await interrupted.orchestrator.onEvent(started.sessionId, { text: 'hello', eventId: 'evt-3' });

      const events = await interrupted.orchestrator.getTimeline(started.sessionId);
      expect(events.map((event) => event.type)).toEqual([
        'session_started',
        'user_message',
        'director_plan',
        'assistant_text',
      ]);
      expect(recording.seen).toHaveLength(1);
      expect(response.debug.directorPlan).toEqual(events[2].directorPlan);
      expect(response.assistant).toMatchObject({ text: STUB_REPLY_TEXT, role: 'host' });
      const state = await interrupted.orchestrator.getSession(started.sessionId);
      expect(state.turns.map((turn) => turn.role)).toEqual(['user', 'host']);
    });

    it('should refuse event types only the engine records', async () => {
      await expect(
        engine.orchestrator.onEvent(sessionId, { type: 'director_plan', text: 'x' })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        engine.orchestrator.onEvent(sessionId, { type: 'assistant_text', text: 'x' })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(await engine.orchestrator.getTimeline(sessionId)).toHaveLength(1);
    });

    // ------------------------------------------------------------------------
    // Concurrency and failures
    // ------------------------------------------------------------------------

    it('should serialize concurrent turns of one session', async () => {
      await Promise.all([
        engine.orchestrator.onEvent(sessionId, { text: 'first' }),
        engine.orchestrator.onEvent(sessionId, { text: 'second' }),
      ]);

      const timeline = await engine.orchestrator.getTimeline(sessionId);
      expect(timeline.map((event) => event.type)).toEqual([
        'session_started',
        'user_message',
        'director_plan',
        'assistant_text',
        'user_message',
        'director_plan',
        'assistant_text',
      ]);
      expect(timeline.map((event) => event.seq)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    });

    it('should record nothing for a request cancelled before it started', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        engine.orchestrator.onEvent(sessionId, { text: 'hello' }, { signal: controller.signal })
      ).rejects.toBeInstanceOf(CancelledError);
      expect(await engine.orchestrator.getTimeline(sessionId)).toHaveLength(1);
    });

    it('should reject an unknown session', async () => {
      await expect(engine.orchestrator.onEvent('sess_missing', { text: 'hi' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('should surface store failures as internal errors', async () => {
    const timeline = new FailingTimelineStore();
    const { orchestrator } = createTestEngine({ timeline });
    const { sessionId } = await orchestrator.startSession('test-entry');
    timeline.failAppends = true;

    const attempt = orchestrator.onEvent(sessionId, { text: 'hello' });

    await expect(attempt).rejects.toBeInstanceOf(InternalError);
    await expect(attempt).rejects.toThrow('Store failure during timeline append: disk full');
  });

  it('should play the fallback plan when the delegated Director gets an unusable reply', async () => {
    const llmClient = new MockLLMClient().reply('not json');
    const director = createDirector({ mode: 'delegated', ...createDirectorSettings() }, { llmClient });
    const { orchestrator } = createTestEngine({ director });
    const { sessionId } = await orchestrator.startSession('test-entry');

    const response = await orchestrator.onEvent(sessionId, { text: 'hello' });

    const expected = createFallbackPlan('host', 20, 'malformed_response');
    expect(response.debug.directorPlan).toEqual(expected);
    expect(response.assistant).toMatchObject({ text: STUB_REPLY_TEXT, role: 'host' });
    const timeline = await orchestrator.getTimeline(sessionId);
    expect(timeline[2]).toMatchObject({ type: 'director_plan', directorPlan: expected });
    expect((await orchestrator.getSession(sessionId)).beat).toBe('check');
  });

  // ==========================================================================
  // Generate mode
  // ==========================================================================
  describe('generate mode', () => {
    it('should speak the generated text and expose the instructions', async () => {
      const generator = new ScriptedGenerator(async () => ({ text: '  Is the other bus really free?  ' }));
      const { orchestrator } = createTestEngine({ generator, config: { responseMode: 'generate' } });
      const { sessionId } = await orchestrator.startSession('test-entry');

      const response = await orchestrator.onEvent(sessionId, { text: 'hello' });

      expect(response.assistant).toEqual({
        text: 'Is the other bus really free?',
        role: 'host',
        needUserAction: { type: 'boundary', prompt: 'Say where the idea stops holding.' },
        quiz: null,
      });
      expect(response.debug.actorPrompt?.instructions).toContain(TWIST_DIRECTIVE);
      expect(response.debug.actorPrompt?.instructions).toContain('Last User Input: "hello"');
      expect(generator.requests[0].state.beat).toBe('twist');
    });

    it('should pass the generated quiz to the reply', async () => {
      const quiz = { id: 'quiz-1', prompt: 'Which bus do you give up?', options: ['The 8:05', 'The 8:15'] };
      const generator = new ScriptedGenerator(async () => ({ text: 'Choose one.', quiz }));
      const { orchestrator } = createTestEngine({ generator, config: { responseMode: 'generate' } });
      const { sessionId } = await orchestrator.startSession('test-entry');

      const response = await orchestrator.onEvent(sessionId, { text: 'hello' });

      expect(response.assistant.quiz).toEqual(quiz);
    });

    it('should speak the fallback line when generation fails', async () => {
      const generator = new ScriptedGenerator(async () => {
        throw new Error('provider down');
      });
      const { orchestrator } = createTestEngine({ generator, config: { responseMode: 'generate' } });
      const { sessionId } = await orchestrator.startSession('test-entry');

      const response = await orchestrator.onEvent(sessionId, { text: 'hello' });

      expect(response.assistant.text).toBe(
        "Let's stay with Opportunity cost. Can you tell me, in your own words, what you make of it so far?"
      );
      expect(response.assistant.text).toBe(fallbackReplyText('Opportunity cost'));
      const timeline = await orchestrator.getTimeline(sessionId);
      expect(timeline[3].text).toBe(response.assistant.text);
    });

    it('should speak the fallback line when generation returns nothing', async () => {
      const generator = new ScriptedGenerator(async () => ({ text: '   ' }));
      const { orchestrator } = createTestEngine({ generator, config: { responseMode: 'generate' } });
      const { sessionId } = await orchestrator.startSession('test-entry');

      const response = await orchestrator.onEvent(sessionId, { text: 'hello' });

      expect(response.assistant.text).toBe(fallbackReplyText('Opportunity cost'));
    });

    it('should stop waiting for a generator past the deadline', async () => {
      const generator = new ScriptedGenerator(
        ({ signal }) =>
          new Promise<GenerationResult>((_, reject) => {
            signal.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );
      const { orchestrator } = createTestEngine({
        generator,
        config: { responseMode: 'generate', generationTimeoutMs: 20 },
      });
      const { sessionId } = await orchestrator.startSession('test-entry');

      const response = await orchestrator.onEvent(sessionId, { text: 'hello' });

      expect(response.assistant.text).toBe(fallbackReplyText('Opportunity cost'));
      expect(generator.requests[0].signal.aborted).toBe(true);
    });

    it('should refuse generate mode without a generator', () => {
      expect(() => createTestEngine({ config: { responseMode: 'generate' } })).toThrow(ValidationError);
    });
  });

  // ==========================================================================
  // Out-of-band facts
  // ==========================================================================
  describe('recordAssistantText and recordBargeIn', () => {
    it('should record an opening line without consulting the Director', async () => {
      const director = new RecordingDirector();
      const engine = createTestEngine({ director });
      const { sessionId } = await engine.orchestrator.startSession('test-entry');
      engine.clock.advance(5);

      const state = await engine.orchestrator.recordAssistantText(sessionId, 'Welcome to the show.', 'host');

      expect(director.seen).toEqual([]);
      expect(state.turns).toEqual([{ role: 'host', text: 'Welcome to the show.', timestamp: secondsAfter(T0, 5) }]);
      expect(state.lastOutputAt).toEqual(secondsAfter(T0, 5));

      const next = await engine.orchestrator.onEvent(sessionId, { text: 'hello' });
      expect(next.assistant.role).toBe('economist');
    });

    it('should record a barge-in and return its seq', async () => {
      const { orchestrator } = createTestEngine();
      const { sessionId } = await orchestrator.startSession('test-entry');

      const seq = await orchestrator.recordBargeIn(sessionId);

      expect(seq).toBe(2);
      const timeline = await orchestrator.getTimeline(sessionId);
      expect(timeline[1].type).toBe('barge_in');
    });
  });

  // ==========================================================================
  // Opening instructions
  // ==========================================================================
  describe('openingInstructions', () => {
    it('should plan the opening without recording anything', async () => {
      const { orchestrator } = createTestEngine();
      const { sessionId } = await orchestrator.startSession('test-entry');

      const opening = await orchestrator.openingInstructions(sessionId);

      expect(opening.directorPlan.nextBeat).toBe('twist');
      expect(opening.actorPrompt.debug.turnId).toBe('turn_opening');
      expect(opening.actorPrompt.instructions).not.toContain('Last User Input');
      expect(opening.actorPrompt.instructions).toContain(TWIST_DIRECTIVE);
      expect(await orchestrator.getTimeline(sessionId)).toHaveLength(1);
    });
  });

  // ==========================================================================
  // Rebuild
  // ==========================================================================
  describe.each(['memory', 'sqlite'] as const)('rebuildSession (%s stores)', (storage) => {
    async function playSession(engine: TestEngine): Promise<string> {
      const { sessionId } = await engine.orchestrator.startSession('test-entry');
      await engine.orchestrator.recordAssistantText(sessionId, 'Welcome.', 'host');
      engine.clock.advance(30);
      await engine.orchestrator.onEvent(sessionId, { text: 'what about interest rates', eventId: 'evt-1' });
      engine.clock.advance(100);
      await engine.orchestrator.onEvent(sessionId, { text: 'ok' });
      await engine.orchestrator.recordBargeIn(sessionId);
      engine.clock.advance(15);
      await engine.orchestrator.onEvent(sessionId, { type: 'quiz_answer', questionId: 'q-1', answer: 'No' });
      return sessionId;
    }

    it('should reproduce the live snapshot from the timeline', async () => {
      const engine = createTestEngine({ storage });
      const sessionId = await playSession(engine);
      const live = await engine.orchestrator.getSession(sessionId);

      const rebuilt = await engine.orchestrator.rebuildSession(sessionId);

      expect(rebuilt).toEqual(live);
      expect(await engine.orchestrator.getSession(sessionId)).toEqual(live);
    });

    it('should repair a snapshot that fell behind its timeline', async () => {
      const engine = createTestEngine({ storage });
      const sessionId = await playSession(engine);
      const live = await engine.orchestrator.getSession(sessionId);
      await engine.sessions.save({ ...live, turns: [], beat: 'cold_open', questionStack: [] });

      const rebuilt = await engine.orchestrator.rebuildSession(sessionId);

      expect(rebuilt).toEqual(live);
    });
  });

  it('should refuse to rebuild a session without a timeline', async () => {
    const { orchestrator } = createTestEngine();
    await expect(orchestrator.rebuildSession('sess_missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should refuse to rebuild a timeline without a start fact', async () => {
    const timeline = new InMemoryTimelineStore();
    const { orchestrator } = createTestEngine({ timeline });
    await timeline.append('sess_orphan', {
      sessionId: 'sess_orphan',
      type: 'user_message',
      text: 'hello',
      clientTimestamp: T0,
      serverTimestamp: T0,
    });

    await expect(orchestrator.rebuildSession('sess_orphan')).rejects.toBeInstanceOf(InternalError);
  });
});
