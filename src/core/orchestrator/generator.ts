/**
 * Response Generation
 *
 * In 'generate' mode the Orchestrator hands the assembled instructions to a
 * ResponseGenerator to get the words the role speaks. The LLM-backed
 * generator is the production implementation; tests substitute their own.
 */

import { ExternalServiceError } from '@/core/errors';
import type { ActorPrompt, QuizQuestion, SessionState } from '@/core/models';
import { buildActorResponseRequest, cleanSpokenText } from '@/llm/prompts/actor-response';
import { SHOW_QUIZ_TOOL, parseQuizToolCalls } from '@/llm/prompts/quiz-tool';
import { LLMError, type LLMClient, type LLMResponse } from '@/llm/types';

export interface GenerationRequest {
  prompt: ActorPrompt;
  state: Readonly<SessionState>;
  /** Aborted when the orchestrator's generation deadline passes */
  signal: AbortSignal;
}

export interface GenerationResult {
  text: string;
  quiz?: QuizQuestion | null;
}

export interface ResponseGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface LlmResponseGeneratorOptions {
  maxTokens?: number;
  temperature?: number;
}

/**
 * Generates the spoken reply with the LLM client, offering the `show_quiz`
 * tool. Provider failures surface as ExternalServiceError; the Orchestrator
 * decides what to say instead.
 */
export class LlmResponseGenerator implements ResponseGenerator {
  constructor(
    private readonly llmClient: LLMClient,
    private readonly options: LlmResponseGeneratorOptions = {}
  ) {}

  async generate({ prompt, state, signal }: GenerationRequest): Promise<GenerationResult> {
    const request = buildActorResponseRequest(prompt, state.turns);

    let response: LLMResponse;
    try {
      response = await this.llmClient.complete(request.messages, {
        system: request.system,
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
        signal,
        tools: [SHOW_QUIZ_TOOL],
      });
    } catch (error) {
      if (error instanceof LLMError) {
        throw new ExternalServiceError('generator', `Response generation failed (${error.type}): ${error.message}`, error);
      }
      throw error;
    }

    return {
      text: cleanSpokenText(response.text, prompt.debug.role),
      quiz: parseQuizToolCalls(response.toolCalls),
    };
  }
}
