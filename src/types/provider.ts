/**
 * Completion oracle types
 */

import type { ChatMessage } from './message.js';

export interface LLMRequestOptions {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  /** Aborted when the orchestrator's timeout fires */
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string | null;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  finishReason: 'stop' | 'length' | 'content_filter';
}

/**
 * Text-completion oracle.
 *
 * Fails with OracleUnavailableError; the orchestrator converts aborts after its
 * own timeout into OracleTimeoutError.
 */
export interface LLMProvider {
  name: string;
  chat(options: LLMRequestOptions): Promise<LLMResponse>;
}
