/**
 * LLM Prompts Module - Barrel Export
 *
 * Prompt builders for the two provider calls the engine makes:
 *
 * 1. **Director decisions**: the delegated Director asks the model for a
 *    structured plan and parses the JSON it returns.
 *
 * 2. **Actor responses**: in generate mode, the assembled instructions are
 *    turned into a request for the role's spoken line, with the optional
 *    `show_quiz` tool.
 *
 * @example
 * ```typescript
 * import { buildDirectorUserPrompt, parseDirectorPlanResponse } from '@/llm/prompts';
 *
 * const response = await client.complete(buildDirectorUserPrompt(params), {
 *   system: buildDirectorSystemPrompt(),
 * });
 * const parsed = parseDirectorPlanResponse(response.text);
 * ```
 */

export {
  buildDirectorSystemPrompt,
  buildDirectorUserPrompt,
  parseDirectorPlanResponse,
  type DirectorPromptParams,
  type ProviderPlan,
  type DirectorPlanParseResult,
} from './director-plan';

export {
  buildActorResponseRequest,
  cleanSpokenText,
  type ActorResponseRequest,
} from './actor-response';

export {
  SHOW_QUIZ_TOOL,
  SHOW_QUIZ_TOOL_NAME,
  parseQuizToolCalls,
} from './quiz-tool';
