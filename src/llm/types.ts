/**
 * LLM Types and Interfaces
 *
 * This file defines the TypeScript types for the LLM client wrapper.
 * These types provide a clean abstraction over the Anthropic SDK types, so
 * the Director and the response generator depend on `LLMClient` only and
 * tests can substitute a mock.
 */

export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * A tool the model may call instead of, or alongside, answering in text.
 * `inputSchema` is the JSON Schema of the tool's input object.
 */
export interface LLMTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * A tool call made by the model. The input is unvalidated.
 */
export interface LLMToolCall {
  name: string;
  input: unknown;
}

/**
 * Per-request options. Anything left out falls back to the client's defaults.
 */
export interface LLMConfig {
  model?: string;
  maxTokens?: number;
  /** 0.0 to 1.0 */
  temperature?: number;
  /** System prompt for this request only */
  system?: string;
  /**
   * The SDK aborts the request after this many milliseconds and the client
   * raises an LLMError of type 'timeout'.
   */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Tools offered for this request only */
  tools?: LLMTool[];
}

export interface LLMResponse {
  text: string;
  /** Null when the provider reports no usage */
  usage: { inputTokens: number; outputTokens: number } | null;
  stopReason: string | null;
  /** Empty when the model called no tool */
  toolCalls: LLMToolCall[];
}

/**
 * Anything that can complete a conversation.
 *
 * @example
 * ```typescript
 * const response = await client.complete(
 *   [{ role: 'user', content: 'Pick the next beat.' }],
 *   { system: 'You are the director.', timeoutMs: 8000 }
 * );
 * ```
 */
export interface LLMClient {
  complete(messages: string | LLMMessage[], config?: LLMConfig): Promise<LLMResponse>;
}

/**
 * How a provider call failed. The Director and the generator only care
 * whether it failed, but the type is logged with the fallback.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Provider server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'aborted'          // Caller cancelled the request
  | 'unknown';         // Unexpected error

export class LLMError extends Error {
  readonly type: LLMErrorType;

  constructor(message: string, type: LLMErrorType, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LLMError';
    this.type = type;
  }
}
