/**
 * LLM Module - Barrel Export
 *
 * This module provides an abstraction layer over the Anthropic SDK for the
 * engine's provider calls. It includes:
 * - AnthropicClient: the LLMClient implementation used in production
 * - Type definitions for messages, configs, and responses
 * - LLMError, classifying provider failures
 * - Prompt builders for director decisions and actor responses
 *
 * @example
 * ```typescript
 * import { AnthropicClient, LLMError } from '@/llm';
 *
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * try {
 *   const response = await client.complete(
 *     [{ role: 'user', content: 'Say hello.' }],
 *     { timeoutMs: 8000 }
 *   );
 *   console.log(response.text);
 * } catch (error) {
 *   if (error instanceof LLMError && error.type === 'timeout') {
 *     // fall back
 *   }
 * }
 * ```
 */

export { AnthropicClient, type AnthropicClientOptions } from './client';

export type {
  LLMMessage,
  LLMConfig,
  LLMResponse,
  LLMClient,
  LLMErrorType,
  LLMTool,
  LLMToolCall,
} from './types';

// The error class is a value export
export { LLMError } from './types';

export {
  buildDirectorSystemPrompt,
  buildDirectorUserPrompt,
  parseDirectorPlanResponse,
  buildActorResponseRequest,
  cleanSpokenText,
  SHOW_QUIZ_TOOL,
  parseQuizToolCalls,
  type DirectorPromptParams,
  type ProviderPlan,
  type DirectorPlanParseResult,
  type ActorResponseRequest,
} from './prompts';
