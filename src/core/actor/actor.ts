/**
 * Actor: Instruction Assembly
 *
 * Turns a Director plan into the bounded instruction text the speaking role
 * follows for one turn. The text always has the same four sections, in this
 * order, each introduced by its literal header:
 *
 *   [Role Definition]    who is speaking (from the role template's profile)
 *   [Current Situation]  mind state, intent, last input, objective
 *   [Strategy & Task]    beat, action, direction, beat directive
 *   [Constraints]        talk-burst budget and tone rules
 *
 * `assemble` is strict and throws on any problem. `InstructionAssembler`
 * wraps it for the turn loop: any recoverable failure yields the fallback
 * prompt, so a turn always has instructions.
 */

import {
  PROMPT_SECTION_HEADERS,
  type ActorContext,
  type ActorPrompt,
  type ActorPromptDebug,
  type DirectorPlan,
  type PromptSection,
} from '@/core/models';
import { ValidationError } from '@/core/errors';
import {
  EmptyInstructionError,
  PromptValidationError,
  TemplateNotFoundError,
} from './errors';
import type { TemplateLibrary } from './template-library';
import { findSection, parseTemplate } from './template-parser';

/** Upper bound on role essence lines */
const MAX_ESSENCE_LINES = 12;

/** Lines read from the top of a role template that has no profile section */
const HEAD_LINES_WITHOUT_PROFILE = 5;

/** Objective length kept in the fallback prompt */
const FALLBACK_OBJECTIVE_LENGTH = 300;

export interface AssembleOptions {
  maxPromptLength: number;
}

// ============================================================================
// Assembly
// ============================================================================

/**
 * Assembles and validates the instructions for one turn.
 *
 * @param roleTemplate - The role document, undefined when none exists
 * @param beatTemplate - The beat document, undefined when none exists
 * @throws {EmptyInstructionError} If the plan has no beat or no output action
 * @throws {TemplateNotFoundError} If either template is missing
 * @throws {PromptValidationError} If the result breaks the header or length rules
 *
 * @example
 * ```typescript
 * const prompt = assemble(plan, context, library.getRole(plan.nextRole), library.getBeat(plan.nextBeat), {
 *   maxPromptLength: 2000,
 * });
 * console.log(prompt.instructions);
 * ```
 */
export function assemble(
  plan: DirectorPlan,
  context: ActorContext,
  roleTemplate: string | undefined,
  beatTemplate: string | undefined,
  options: AssembleOptions
): ActorPrompt {
  if (plan.nextBeat.trim() === '') {
    throw new EmptyInstructionError('Plan has no beat');
  }
  if (plan.outputAction.trim() === '') {
    throw new EmptyInstructionError('Plan has no output action');
  }
  if (roleTemplate === undefined) {
    throw new TemplateNotFoundError('role', plan.nextRole);
  }
  if (beatTemplate === undefined) {
    throw new TemplateNotFoundError('beat', plan.nextBeat);
  }

  const sections: PromptSection[] = [
    { header: '[Role Definition]', body: extractRoleEssence(roleTemplate) },
    { header: '[Current Situation]', body: situationBody(plan, context) },
    { header: '[Strategy & Task]', body: strategyBody(plan, context, beatTemplate) },
    { header: '[Constraints]', body: constraintsBody(plan) },
  ];

  const instructions = renderSections(sections);
  validateInstructions(instructions, options.maxPromptLength);

  return {
    instructions,
    sections,
    debug: { ...baseDebug(plan, context), fallback: false },
  };
}

/**
 * The deterministic prompt used when assembly fails. It mentions only the
 * objective and the default talk-burst budget, and the objective is cut to
 * fit `maxPromptLength`, so it cannot fail itself.
 */
export function buildFallbackPrompt(
  plan: DirectorPlan,
  context: ActorContext,
  defaultTalkBurstSec: number,
  maxPromptLength: number,
  reason: string
): ActorPrompt {
  const fixedLength = renderSections(fallbackSections('', defaultTalkBurstSec)).length;
  const objectiveBudget = Math.min(FALLBACK_OBJECTIVE_LENGTH, maxPromptLength - fixedLength);
  const sections = fallbackSections(truncate(context.mainObjective, objectiveBudget), defaultTalkBurstSec);

  return {
    instructions: renderSections(sections),
    sections,
    debug: {
      ...baseDebug(plan, context),
      talkBurstLimitSec: defaultTalkBurstSec,
      fallback: true,
      fallbackReason: reason,
    },
  };
}

function fallbackSections(objective: string, talkBurstSec: number): PromptSection[] {
  return [
    { header: '[Role Definition]', body: 'You are a helpful tutor.' },
    {
      header: '[Current Situation]',
      body: `The user needs help understanding: ${objective}`,
    },
    {
      header: '[Strategy & Task]',
      body: 'Explain the concept simply and clearly.\nAsk if the user has any questions.',
    },
    {
      header: '[Constraints]',
      body: [
        `- Keep your response under ${talkBurstSec} seconds.`,
        '- Use simple, everyday language.',
        '- End with a question to check understanding.',
      ].join('\n'),
    },
  ];
}

// ============================================================================
// Template extraction
// ============================================================================

/**
 * The role's self-description: the non-heading lines of its `## Profile`
 * section, or of its first five lines when it has no profile.
 */
export function extractRoleEssence(roleTemplate: string): string {
  const profile = findSection(parseTemplate(roleTemplate), 'Profile');
  let lines = profile ? meaningfulLines(profile.lines) : [];

  if (lines.length === 0) {
    lines = meaningfulLines(roleTemplate.split(/\r?\n/).slice(0, HEAD_LINES_WITHOUT_PROFILE));
  }
  return lines.slice(0, MAX_ESSENCE_LINES).join('\n');
}

/**
 * The beat's directive: the fenced block(s) of its `## Prompt Template`
 * section with placeholders filled in, or a generic line naming the beat and
 * action.
 */
export function extractBeatDirective(
  beatTemplate: string,
  plan: Pick<DirectorPlan, 'nextBeat' | 'outputAction'>,
  context: Pick<ActorContext, 'conceptName' | 'metaphor'>
): string {
  const section = findSection(parseTemplate(beatTemplate), 'Prompt Template');
  const lines = (section?.fencedBlocks ?? [])
    .flat()
    .map((line) =>
      line.replaceAll('{concept}', context.conceptName).replaceAll('{metaphor}', context.metaphor)
    );

  if (lines.join('').trim() === '') {
    return `Execute the '${plan.nextBeat}' strategy.\nAction: ${plan.outputAction}`;
  }
  return lines.join('\n');
}

function meaningfulLines(lines: readonly string[]): string[] {
  return lines
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#') && !line.startsWith('```'));
}

// ============================================================================
// Section bodies
// ============================================================================

function situationBody(plan: DirectorPlan, context: ActorContext): string {
  const lines = [
    `User Mind State: ${plan.userMindState.join(', ')}`,
    `User Intent: ${plan.intent}`,
  ];
  if (context.lastUserText !== '') {
    lines.push(`Last User Input: "${context.lastUserText}"`);
  }
  lines.push(`Main Learning Objective: ${context.mainObjective}`);
  return lines.join('\n');
}

function strategyBody(plan: DirectorPlan, context: ActorContext, beatTemplate: string): string {
  const lines = [`Beat: ${plan.nextBeat}`, `Output Action: ${plan.outputAction}`];
  if (plan.contentDirection.trim() !== '') {
    lines.push(`Direction: ${plan.contentDirection.trim()}`);
  }
  return `${lines.join('\n')}\n\n${extractBeatDirective(beatTemplate, plan, context)}`;
}

function constraintsBody(plan: DirectorPlan): string {
  const lines = [
    `- Keep your response under ${plan.talkBurstLimitSec} seconds when spoken aloud.`,
    '- Use short, spoken-style sentences with natural pauses.',
    '- Always end with a clear prompt for the user to respond.',
    '- Speak in a conversational, natural tone as if talking to a friend.',
  ];
  if (plan.tensionGoal === 'decrease') {
    lines.push('- Keep the tone relaxed and encouraging.');
  }
  if (plan.loadGoal === 'decrease') {
    lines.push('- Simplify your explanation. Avoid complex terminology.');
  }
  return lines.join('\n');
}

function renderSections(sections: readonly PromptSection[]): string {
  return sections.map((section) => `${section.header}\n${section.body}`).join('\n\n');
}

function baseDebug(plan: DirectorPlan, context: ActorContext): Omit<ActorPromptDebug, 'fallback'> {
  return {
    sessionId: context.sessionId,
    turnId: context.turnId,
    role: plan.nextRole,
    beat: plan.nextBeat,
    outputAction: plan.outputAction,
    talkBurstLimitSec: plan.talkBurstLimitSec,
    userMindState: [...plan.userMindState],
  };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * @throws {PromptValidationError} If the text is empty, a header does not
 * appear exactly once, or the text is longer than `maxLength` characters
 */
export function validateInstructions(instructions: string, maxLength: number): void {
  if (instructions.trim() === '') {
    throw new PromptValidationError('Instructions are empty');
  }
  for (const header of PROMPT_SECTION_HEADERS) {
    const count = instructions.split(header).length - 1;
    if (count !== 1) {
      throw new PromptValidationError(`Header ${header} appears ${count} times, expected once`);
    }
  }
  if (instructions.length > maxLength) {
    throw new PromptValidationError(
      `Instructions too long: ${instructions.length} > ${maxLength} characters`
    );
  }
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.slice(0, Math.max(0, maxLength));
  return `${text.slice(0, maxLength - 3)}...`;
}

// ============================================================================
// Assembler
// ============================================================================

export interface InstructionAssemblerOptions {
  maxPromptLength: number;
  defaultTalkBurstSec: number;
}

/**
 * Looks up templates and assembles, falling back instead of throwing.
 *
 * @example
 * ```typescript
 * const assembler = new InstructionAssembler(library, {
 *   maxPromptLength: config.actor.maxPromptLength,
 *   defaultTalkBurstSec: config.director.defaultTalkBurstSec,
 * });
 * const prompt = assembler.build(plan, context);
 * if (prompt.debug.fallback) console.warn(prompt.debug.fallbackReason);
 * ```
 */
export class InstructionAssembler {
  constructor(
    private readonly library: TemplateLibrary,
    private readonly options: InstructionAssemblerOptions
  ) {}

  build(plan: DirectorPlan, context: ActorContext): ActorPrompt {
    try {
      return assemble(
        plan,
        context,
        this.library.getRole(plan.nextRole),
        this.library.getBeat(plan.nextBeat),
        { maxPromptLength: this.options.maxPromptLength }
      );
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      console.warn(`[Actor] Using fallback prompt for session ${context.sessionId}: ${error.message}`);
      return buildFallbackPrompt(
        plan,
        context,
        this.options.defaultTalkBurstSec,
        this.options.maxPromptLength,
        error.message
      );
    }
  }
}
