/**
 * Beat → output action → learner artifact mappings, shared by both Director
 * variants and the guardrails.
 */

import type { UserMustDo, UserMustDoType } from '@/core/models';

const OUTPUT_ACTION_BY_BEAT: Readonly<Record<string, string>> = {
  reveal: 'explain_with_metaphor',
  check: 'ask_simple_question',
  deepen: 'ask_elaboration',
  twist: 'challenge_assumption',
  continue: 'acknowledge_and_continue',
  lens_shift: 'reframe_perspective',
  feynman: 'ask_teach_back',
  montage: 'show_multiple_examples',
  minigame: 'engage_interactive',
  exit_ticket: 'assess_transfer',
};

export const DEFAULT_OUTPUT_ACTION = 'continue_dialogue';

const USER_MUST_DO_BY_ACTION: Readonly<Record<string, UserMustDoType>> = {
  ask_teach_back: 'teach_back',
  ask_simple_question: 'choice',
  show_multiple_examples: 'example',
  challenge_assumption: 'boundary',
  assess_transfer: 'transfer',
  recap: 'recap',
};

const USER_MUST_DO_PROMPTS: Readonly<Record<UserMustDoType, string>> = {
  teach_back: 'Explain the idea in your own words, as if teaching a friend.',
  choice: 'Answer the quick question.',
  example: 'Give an example of your own.',
  boundary: 'Say where the idea stops holding.',
  transfer: 'Apply the idea to a new situation.',
  recap: 'Sum up what we just covered in one or two sentences.',
};

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/**
 * @example
 * outputActionForBeat('twist');   // 'challenge_assumption'
 * outputActionForBeat('unknown'); // 'continue_dialogue'
 */
export function outputActionForBeat(beat: string): string {
  return lookup(OUTPUT_ACTION_BY_BEAT, beat) ?? DEFAULT_OUTPUT_ACTION;
}

/**
 * Returns what the learner must produce for an output action, or undefined
 * when the action asks for nothing in particular.
 */
export function userMustDoForAction(outputAction: string): UserMustDo | undefined {
  const type = lookup(USER_MUST_DO_BY_ACTION, outputAction);
  return type ? { type, prompt: USER_MUST_DO_PROMPTS[type] } : undefined;
}
