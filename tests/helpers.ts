/**
 * Test Helpers Module
 *
 * Factories for test data and a scripted LLM client. These helpers reduce
 * boilerplate in tests and keep test data consistent across the suite.
 */

import type {
  DirectorPlan,
  Entry,
  SessionState,
  TimelineEvent,
  UnsequencedEvent,
} from '../src/core/models';
import type { DirectorSettings } from '../src/core/director';
import {
  LLMError,
  type LLMClient,
  type LLMConfig,
  type LLMMessage,
  type LLMResponse,
  type LLMToolCall,
} from '../src/llm/types';

// ============================================================================
// Time Utilities
// ============================================================================

/** Fixed start time used across the suite */
export const T0 = new Date('2025-03-01T10:00:00.000Z');

/**
 * Returns a date `seconds` after `base`.
 */
export function secondsAfter(base: Date, seconds: number): Date {
  return new Date(base.getTime() + seconds * 1000);
}

/**
 * A clock the test moves by hand.
 *
 * @example
 * const clock = new ManualClock(T0);
 * clock.advance(60);
 * clock.now(); // T0 + 60s
 */
export class ManualClock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advance(seconds: number): void {
    this.current = secondsAfter(this.current, seconds);
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }
}

// ============================================================================
// Fixtures
// ============================================================================

export function createTestEntry(overrides: Partial<Entry> = {}): Entry {
  return {
    entryId: 'test-entry',
    domain: 'economics',
    title: 'Opportunity cost',
    subtitle: 'What you give up',
    description: 'Every choice has a cost in the alternatives not taken.',
    keywords: ['choice', 'trade-off'],
    metaphor: 'taking one bus means missing the other',
    roles: ['host', 'economist', 'skeptic'],
    diagnose: {
      questions: [{ id: 'q-1', prompt: 'Is free time free?', options: ['Yes', 'No'] }],
    },
    ...overrides,
  };
}

export function createTestState(overrides: Partial<SessionState> = {}): SessionState {
  return {
    sessionId: 'sess_test',
    entryId: 'test-entry',
    domain: 'economics',
    availableRoles: ['host', 'economist', 'skeptic'],
    mainObjective: 'Opportunity cost',
    act: 1,
    beat: 'cold_open',
    pacingMode: 'NORMAL',
    masteryEstimate: 0.5,
    misconceptionTags: [],
    outputClockSec: 0,
    lastOutputAt: T0,
    tensionLevel: 5,
    cognitiveLoad: 5,
    questionStack: [],
    signals: { lastUserChars: 20, lastUserLatencyMs: 0 },
    turns: [],
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function createTestEvent(overrides: Partial<TimelineEvent> = {}): TimelineEvent {
  return {
    seq: 1,
    sessionId: 'sess_test',
    type: 'user_message',
    text: 'hello',
    clientTimestamp: T0,
    serverTimestamp: T0,
    ...overrides,
  };
}

export function createUnsequencedEvent(overrides: Partial<UnsequencedEvent> = {}): UnsequencedEvent {
  return {
    sessionId: 'sess_test',
    type: 'user_message',
    text: 'hello',
    clientTimestamp: T0,
    serverTimestamp: T0,
    ...overrides,
  };
}

export function createTestPlan(overrides: Partial<DirectorPlan> = {}): DirectorPlan {
  return {
    userMindState: ['Engaged'],
    flowMode: 'FLOW',
    intent: 'continue',
    nextBeat: 'check',
    nextRole: 'host',
    outputAction: 'ask_simple_question',
    userMustDo: { type: 'choice', prompt: 'Answer the quick question.' },
    talkBurstLimitSec: 20,
    tensionGoal: 'maintain',
    loadGoal: 'maintain',
    stackAction: 'keep',
    contentDirection: 'Ask one short question.',
    notes: '',
    debug: { source: 'heuristic' },
    ...overrides,
  };
}

export function createDirectorSettings(overrides: Partial<DirectorSettings> = {}): DirectorSettings {
  return {
    availableRoles: ['host', 'economist', 'skeptic'],
    availableBeats: [
      'reveal',
      'check',
      'deepen',
      'twist',
      'continue',
      'lens_shift',
      'feynman',
      'montage',
      'minigame',
      'exit_ticket',
    ],
    outputClockThresholdSec: 90,
    defaultTalkBurstSec: 20,
    highLoadTalkBurstSec: 15,
    decisionTimeoutMs: 200,
    ...overrides,
  };
}

/**
 * A provider reply in the snake_case shape the delegated Director expects.
 */
export function providerPlanJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    flow_mode: 'FLOW',
    user_mind_state: ['Engaged'],
    intent: 'continue',
    next_beat: 'deepen',
    next_role: 'economist',
    output_action: 'ask_elaboration',
    content_direction: 'Push one step further.',
    talk_burst_limit_sec: 18,
    tension_goal: 'maintain',
    load_goal: 'maintain',
    stack_action: 'keep',
    notes: 'learner is following',
    ...overrides,
  });
}

// ============================================================================
// Templates
// ============================================================================

export const HOST_TEMPLATE = `# Host

## Profile
Warm, curious moderator of the conversation.
Keeps the learner talking.

## Notes
Not part of the essence.
`;

export const CHECK_TEMPLATE = `# Check

## Prompt Template
\`\`\`
Ask one question about {concept}.
\`\`\`
`;

export const TWIST_TEMPLATE = `# Twist

## Prompt Template
\`\`\`
Find where {concept} breaks, starting from {metaphor}.
\`\`\`
`;

// ============================================================================
// LLM Mock
// ============================================================================

export interface RecordedCall {
  messages: LLMMessage[];
  config: LLMConfig | undefined;
}

type ScriptedReply = { text: string; toolCalls?: LLMToolCall[] } | { error: Error } | { hang: true };

/**
 * LLM client that answers from a queue. An empty queue repeats the last
 * scripted reply.
 *
 * @example
 * const llm = new MockLLMClient().reply(providerPlanJson()).fail(new LLMError('down', 'server_error'));
 */
export class MockLLMClient implements LLMClient {
  readonly calls: RecordedCall[] = [];
  private readonly queue: ScriptedReply[] = [];
  private last: ScriptedReply = { text: '' };

  reply(text: string, toolCalls: LLMToolCall[] = []): this {
    this.queue.push({ text, toolCalls });
    return this;
  }

  fail(error: Error = new LLMError('Provider unavailable', 'server_error')): this {
    this.queue.push({ error });
    return this;
  }

  /** Never resolves unless the request's signal aborts */
  hang(): this {
    this.queue.push({ hang: true });
    return this;
  }

  async complete(messages: string | LLMMessage[], config?: LLMConfig): Promise<LLMResponse> {
    const normalized = typeof messages === 'string' ? [{ role: 'user' as const, content: messages }] : messages;
    this.calls.push({ messages: normalized, config });

    const next = this.queue.shift() ?? this.last;
    this.last = next;

    if ('error' in next) {
      throw next.error;
    }
    if ('hang' in next) {
      return new Promise<LLMResponse>((_, reject) => {
        config?.signal?.addEventListener('abort', () => reject(new LLMError('Request aborted', 'aborted')));
      });
    }
    const toolCalls = next.toolCalls ?? [];
    return { text: next.text, usage: null, stopReason: toolCalls.length > 0 ? 'tool_use' : 'end_turn', toolCalls };
  }
}
