/**
 * Unit Tests: Actor Instruction Assembly
 *
 * Exact prompt texts are asserted: the header order, the section contents
 * and the fallback prompt are part of the contract with the generator.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  EmptyInstructionError,
  InstructionAssembler,
  PromptValidationError,
  TemplateLibrary,
  TemplateLoadError,
  TemplateNotFoundError,
  assemble,
  extractBeatDirective,
  extractRoleEssence,
  validateInstructions,
} from '../../../src/core/actor';
import type { ActorContext } from '../../../src/core/models';
import { CHECK_TEMPLATE, HOST_TEMPLATE, TWIST_TEMPLATE, createTestPlan } from '../../helpers';

function createContext(overrides: Partial<ActorContext> = {}): ActorContext {
  return {
    sessionId: 'sess_test',
    turnId: 'turn_1',
    entryId: 'test-entry',
    domain: 'economics',
    mainObjective: 'Opportunity cost',
    conceptName: 'Opportunity cost',
    metaphor: 'taking one bus means missing the other',
    lastUserText: 'hello',
    ...overrides,
  };
}

const OPTIONS = { maxPromptLength: 2000 };

describe('assemble', () => {
  it('should write the four sections in order', () => {
    const prompt = assemble(createTestPlan(), createContext(), HOST_TEMPLATE, CHECK_TEMPLATE, OPTIONS);

    expect(prompt.instructions).toBe(
      [
        '[Role Definition]',
        'Warm, curious moderator of the conversation.',
        'Keeps the learner talking.',
        '',
        '[Current Situation]',
        'User Mind State: Engaged',
        'User Intent: continue',
        'Last User Input: "hello"',
        'Main Learning Objective: Opportunity cost',
        '',
        '[Strategy & Task]',
        'Beat: check',
        'Output Action: ask_simple_question',
        'Direction: Ask one short question.',
        '',
        'Ask one question about Opportunity cost.',
        '',
        '[Constraints]',
        '- Keep your response under 20 seconds when spoken aloud.',
        '- Use short, spoken-style sentences with natural pauses.',
        '- Always end with a clear prompt for the user to respond.',
        '- Speak in a conversational, natural tone as if talking to a friend.',
      ].join('\n')
    );
    expect(prompt.sections.map((section) => section.header)).toEqual([
      '[Role Definition]',
      '[Current Situation]',
      '[Strategy & Task]',
      '[Constraints]',
    ]);
    expect(prompt.debug).toEqual({
      sessionId: 'sess_test',
      turnId: 'turn_1',
      role: 'host',
      beat: 'check',
      outputAction: 'ask_simple_question',
      talkBurstLimitSec: 20,
      userMindState: ['Engaged'],
      fallback: false,
    });
  });

  it('should omit the last input line when the learner said nothing', () => {
    const prompt = assemble(createTestPlan(), createContext({ lastUserText: '' }), HOST_TEMPLATE, CHECK_TEMPLATE, OPTIONS);

    expect(prompt.sections[1].body).toBe(
      'User Mind State: Engaged\nUser Intent: continue\nMain Learning Objective: Opportunity cost'
    );
  });

  it('should add calming and simplifying constraints when the goals say so', () => {
    const plan = createTestPlan({ tensionGoal: 'decrease', loadGoal: 'decrease' });

    const prompt = assemble(plan, createContext(), HOST_TEMPLATE, CHECK_TEMPLATE, OPTIONS);

    expect(prompt.sections[3].body.split('\n').slice(-2)).toEqual([
      '- Keep the tone relaxed and encouraging.',
      '- Simplify your explanation. Avoid complex terminology.',
    ]);
  });

  it('should reject a plan without a beat or an action', () => {
    expect(() => assemble(createTestPlan({ nextBeat: '' }), createContext(), HOST_TEMPLATE, CHECK_TEMPLATE, OPTIONS)).toThrow(
      EmptyInstructionError
    );
    expect(() =>
      assemble(createTestPlan({ outputAction: ' ' }), createContext(), HOST_TEMPLATE, CHECK_TEMPLATE, OPTIONS)
    ).toThrow(EmptyInstructionError);
  });

  it('should reject missing templates', () => {
    expect(() => assemble(createTestPlan(), createContext(), undefined, CHECK_TEMPLATE, OPTIONS)).toThrow(
      TemplateNotFoundError
    );
    expect(() => assemble(createTestPlan(), createContext(), HOST_TEMPLATE, undefined, OPTIONS)).toThrow(
      "No beat template named 'check'"
    );
  });

  it('should reject instructions over the length limit', () => {
    expect(() =>
      assemble(createTestPlan(), createContext(), HOST_TEMPLATE, CHECK_TEMPLATE, { maxPromptLength: 100 })
    ).toThrow(PromptValidationError);
  });
});

describe('extractRoleEssence', () => {
  it('should read the first lines when there is no profile section', () => {
    expect(extractRoleEssence('Doubts everything.\n\nAsks for proof.')).toBe('Doubts everything.\nAsks for proof.');
  });
});

describe('extractBeatDirective', () => {
  it('should fill in the concept and metaphor', () => {
    const directive = extractBeatDirective(
      TWIST_TEMPLATE,
      { nextBeat: 'twist', outputAction: 'challenge_assumption' },
      { conceptName: 'Sunk cost', metaphor: 'a half-watched film' }
    );

    expect(directive).toBe('Find where Sunk cost breaks, starting from a half-watched film.');
  });

  it('should fall back to a generic directive without a template block', () => {
    const directive = extractBeatDirective(
      '# Check\nJust a description.',
      { nextBeat: 'check', outputAction: 'ask_simple_question' },
      { conceptName: 'x', metaphor: '' }
    );

    expect(directive).toBe("Execute the 'check' strategy.\nAction: ask_simple_question");
  });
});

describe('validateInstructions', () => {
  it('should reject a repeated header', () => {
    const text = '[Role Definition]\na\n[Current Situation]\nb\n[Strategy & Task]\nc\n[Constraints]\nd\n[Constraints]';

    expect(() => validateInstructions(text, 2000)).toThrow('Header [Constraints] appears 2 times, expected once');
  });

  it('should reject empty instructions', () => {
    expect(() => validateInstructions('  ', 2000)).toThrow('Instructions are empty');
  });
});

describe('InstructionAssembler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const library = TemplateLibrary.fromTemplates({ host: HOST_TEMPLATE }, { check: CHECK_TEMPLATE });
  const assembler = new InstructionAssembler(library, { maxPromptLength: 2000, defaultTalkBurstSec: 20 });

  it('should assemble from the library', () => {
    const prompt = assembler.build(createTestPlan(), createContext());

    expect(prompt.debug.fallback).toBe(false);
    expect(prompt.instructions).toContain('Ask one question about Opportunity cost.');
  });

  it('should fall back when a template is missing', () => {
    const prompt = assembler.build(createTestPlan({ nextBeat: 'twist', talkBurstLimitSec: 12 }), createContext());

    expect(prompt.instructions).toBe(
      [
        '[Role Definition]',
        'You are a helpful tutor.',
        '',
        '[Current Situation]',
        'The user needs help understanding: Opportunity cost',
        '',
        '[Strategy & Task]',
        'Explain the concept simply and clearly.',
        'Ask if the user has any questions.',
        '',
        '[Constraints]',
        '- Keep your response under 20 seconds.',
        '- Use simple, everyday language.',
        '- End with a question to check understanding.',
      ].join('\n')
    );
    expect(prompt.debug).toMatchObject({
      beat: 'twist',
      talkBurstLimitSec: 20,
      fallback: true,
      fallbackReason: "No beat template named 'twist'",
    });
  });

  it('should truncate a long objective in the fallback prompt', () => {
    const prompt = assembler.build(createTestPlan({ nextRole: 'narrator' }), createContext({ mainObjective: 'x'.repeat(400) }));

    expect(prompt.sections[1].body).toBe(`The user needs help understanding: ${'x'.repeat(297)}...`);
  });

  it('should keep the fallback prompt within a small prompt limit', () => {
    const small = new InstructionAssembler(library, { maxPromptLength: 500, defaultTalkBurstSec: 20 });

    const prompt = small.build(createTestPlan({ nextRole: 'narrator' }), createContext({ mainObjective: 'x'.repeat(400) }));

    expect(prompt.sections[1].body).toBe(`The user needs help understanding: ${'x'.repeat(171)}...`);
    expect(prompt.instructions.length).toBe(500);
    expect(() => validateInstructions(prompt.instructions, 500)).not.toThrow();
  });
});

describe('TemplateLibrary', () => {
  it('should load the bundled prompt templates', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const library = await TemplateLibrary.load('./data/prompts');

    expect(library.roleNames).toEqual(['economist', 'host', 'skeptic']);
    expect(library.beatNames).toEqual([
      'check',
      'continue',
      'deepen',
      'exit_ticket',
      'feynman',
      'lens_shift',
      'minigame',
      'montage',
      'reveal',
      'twist',
    ]);
    vi.restoreAllMocks();
  });

  it('should refuse a directory that does not exist', async () => {
    await expect(TemplateLibrary.load('./data/no-such-dir')).rejects.toBeInstanceOf(TemplateLoadError);
  });

  it('should refuse an empty in-memory library', () => {
    expect(() => TemplateLibrary.fromTemplates({}, { check: CHECK_TEMPLATE })).toThrow(TemplateLoadError);
  });
});
