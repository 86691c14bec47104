/**
 * Actor Response Prompt Builder
 *
 * Turns the assembled ActorPrompt into a generation request. The
 * instructions become the system prompt; the recent conversation and the
 * cue to speak go in a single user message, so the request is valid no
 * matter which roles spoke last.
 */

import type { ActorPrompt, Turn } from '@/core/models';
import type { LLMMessage } from '../types';

/** Turns of history included in the request */
const HISTORY_TURN_COUNT = 8;

export interface ActorResponseRequest {
  system: string;
  messages: LLMMessage[];
}

/**
 * @example
 * ```typescript
 * const request = buildActorResponseRequest(prompt, state.turns);
 * const response = await client.complete(request.messages, { system: request.system });
 * ```
 */
export function buildActorResponseRequest(
  prompt: ActorPrompt,
  turns: readonly Turn[]
): ActorResponseRequest {
  const history = turns
    .slice(-HISTORY_TURN_COUNT)
    .map((turn) => `[${turn.role}]: ${turn.text}`)
    .join('\n');

  const content = `${history ? `Conversation so far:\n${history}\n\n` : ''}Speak your next line as the ${prompt.debug.role}. Reply with the words to be spoken aloud only: no stage directions, no role label, no markdown.`;

  return {
    system: prompt.instructions,
    messages: [{ role: 'user', content }],
  };
}

/**
 * Strips a leading "[role]:" or "role:" label the model sometimes adds.
 */
export function cleanSpokenText(text: string, role: string): string {
  const trimmed = text.trim();
  const labels = [`[${role}]:`, `${role}:`];
  for (const label of labels) {
    if (trimmed.toLowerCase().startsWith(label.toLowerCase())) {
      return trimmed.slice(label.length).trim();
    }
  }
  return trimmed;
}
