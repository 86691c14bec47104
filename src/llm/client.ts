/**
 * Anthropic Client Wrapper
 *
 * This module provides an abstraction layer over the Anthropic SDK.
 * It handles:
 * - API key configuration with clear error messages
 * - Per-request system prompt, tools, timeout and abort signal
 * - Error handling with typed errors
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * const response = await client.complete('Hello!', { timeoutMs: 5000 });
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  APIUserAbortError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { LLMClient, LLMMessage, LLMConfig, LLMResponse, LLMTool, LLMToolCall } from './types';
import { LLMError, type LLMErrorType } from './types';

// Default model to use for all requests (Claude Sonnet 4.5)
const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

// Default maximum tokens for responses
const DEFAULT_MAX_TOKENS = 1024;

// Default temperature for response generation
const DEFAULT_TEMPERATURE = 0.7;

/**
 * Options accepted by the AnthropicClient constructor.
 */
export interface AnthropicClientOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

type ClientDefaults = Required<Pick<LLMConfig, 'model' | 'maxTokens' | 'temperature'>>;

/**
 * Wrapper class for the Anthropic API client.
 * Provides a simplified interface for making LLM calls with
 * proper error handling.
 */
export class AnthropicClient implements LLMClient {
  /** The underlying Anthropic SDK client */
  private client: Anthropic;

  /** Default configuration for all requests */
  private defaultConfig: ClientDefaults;

  /**
   * Creates a new AnthropicClient instance.
   *
   * @throws LLMError if no API key is given
   *
   * @example
   * ```typescript
   * const client = new AnthropicClient({
   *   apiKey: config.anthropic.apiKey,
   *   model: config.anthropic.model,
   *   maxTokens: 512,
   * });
   * ```
   */
  constructor(options: AnthropicClientOptions = {}) {
    // Validate API key is present before proceeding
    if (!options.apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required.\n' +
          'Get your API key at: https://console.anthropic.com/\n' +
          'Then set it: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey: options.apiKey });

    this.defaultConfig = {
      model: options.model ?? DEFAULT_MODEL,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }

  /**
   * Makes a non-streaming API call and returns the complete response.
   *
   * @param messages - Either a single string (treated as user message) or an array of messages
   * @param config - Optional configuration to override defaults for this request
   * @returns Promise resolving to the complete response with usage info
   * @throws LLMError on API errors
   *
   * @example
   * ```typescript
   * const response = await client.complete(
   *   [{ role: 'user', content: 'What is opportunity cost?' }],
   *   { system: 'Answer in one sentence.', timeoutMs: 8000 }
   * );
   * ```
   */
  async complete(
    messages: string | LLMMessage[],
    config: LLMConfig = {}
  ): Promise<LLMResponse> {
    const formattedMessages = this.formatMessages(this.normalizeMessages(messages));
    const mergedConfig = this.mergeConfig(config);

    try {
      const response = await this.client.messages.create(
        {
          model: mergedConfig.model,
          max_tokens: mergedConfig.maxTokens,
          temperature: mergedConfig.temperature,
          system: config.system,
          messages: formattedMessages,
          tools: config.tools?.map((tool) => this.formatTool(tool)),
        },
        {
          timeout: config.timeoutMs,
          signal: config.signal,
          // Callers apply their own fallback on failure; retries would only
          // stretch the turn past its timeout
          maxRetries: 0,
        }
      );

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
        toolCalls: this.extractToolCalls(response.content),
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Normalizes input to always return an array of messages.
   */
  private normalizeMessages(input: string | LLMMessage[]): LLMMessage[] {
    if (typeof input === 'string') {
      return [{ role: 'user', content: input }];
    }
    return input;
  }

  /**
   * Converts our LLMMessage format to the SDK's MessageParam format.
   */
  private formatMessages(messages: LLMMessage[]): Anthropic.Messages.MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private formatTool(tool: LLMTool): Anthropic.Messages.Tool {
    return {
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema,
    };
  }

  private mergeConfig(config: LLMConfig): ClientDefaults {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
    };
  }

  /**
   * Extracts text content from response content blocks.
   * Handles the case where response contains multiple content blocks.
   */
  private extractText(
    content: Anthropic.Messages.ContentBlock[]
  ): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  private extractToolCalls(content: Anthropic.Messages.ContentBlock[]): LLMToolCall[] {
    return content
      .filter((block): block is Anthropic.Messages.ToolUseBlock => block.type === 'tool_use')
      .map((block) => ({ name: block.name, input: block.input }));
  }

  /**
   * Converts an API error to a typed LLMError.
   * Maps Anthropic SDK error types to our simplified error types.
   */
  private handleError(error: unknown): LLMError {
    // Handle timeout errors (must check before APIConnectionError since it extends it)
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError(
        'Request to Anthropic API timed out. Please try again.',
        'timeout',
        error
      );
    }

    if (error instanceof APIUserAbortError) {
      return new LLMError('Request to Anthropic API was aborted.', 'aborted', error);
    }

    // Handle network errors
    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        'network',
        error
      );
    }

    // Handle Anthropic SDK-specific errors
    if (error instanceof APIError) {
      return new LLMError(error.message, this.mapErrorType(error), error);
    }

    // Handle unknown errors
    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error);
  }

  /**
   * Maps an Anthropic API error to our simplified error type.
   */
  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}
