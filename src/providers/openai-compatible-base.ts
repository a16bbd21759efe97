/**
 * OpenAI-compatible chat-completions base
 *
 * Shared request, error and response handling for every provider that speaks
 * the `/chat/completions` protocol (OpenAI, Ollama's compatibility endpoint).
 * Every failure surfaces as OracleUnavailableError; retries are left to the
 * caller's collaborators.
 */

import { z } from 'zod';
import type { LLMProvider, LLMRequestOptions, LLMResponse } from '../types/provider.js';
import type { ChatMessage } from '../types/message.js';
import type { ProviderConfig } from '../types/config.js';
import { ConfigError, OracleUnavailableError, toError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

/** Message in OpenAI wire format */
export interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

const OpenAIResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }),
    finish_reason: z.string().nullable().optional(),
  })),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  }).optional(),
});

export type OpenAIResponse = z.infer<typeof OpenAIResponseSchema>;

const FINISH_REASONS: Record<string, LLMResponse['finishReason']> = {
  stop: 'stop',
  length: 'length',
  content_filter: 'content_filter',
};

export interface OpenAICompatibleOptions {
  /** Used in logs and errors */
  providerName: string;
  defaultApiBase: string;
  /** When set, a missing API key fails construction with this message */
  apiKeyMissingMessage?: string;
  extraHeaders?: Record<string, string>;
}

export abstract class OpenAICompatibleProvider implements LLMProvider {
  abstract readonly name: string;

  protected readonly apiKey: string | undefined;
  protected readonly apiBase: string;
  protected readonly extraHeaders: Record<string, string>;
  protected readonly providerName: string;
  protected readonly log: ReturnType<typeof createChildLogger>;

  constructor(config: ProviderConfig, options: OpenAICompatibleOptions) {
    this.providerName = options.providerName;
    this.log = createChildLogger(options.providerName);

    if (!config.apiKey && options.apiKeyMissingMessage) {
      throw new ConfigError(options.apiKeyMissingMessage, { provider: options.providerName });
    }

    this.apiKey = config.apiKey;
    this.apiBase = (config.apiBase || options.defaultApiBase).replace(/\/+$/, '');
    this.extraHeaders = options.extraHeaders ?? {};
  }

  async chat(options: LLMRequestOptions): Promise<LLMResponse> {
    const { model, messages, temperature = 0.7, maxTokens = 1024 } = options;

    const body = {
      model,
      messages: this.formatMessages(messages, options.systemPrompt),
      temperature,
      max_tokens: maxTokens,
    };

    this.log.debug({ model, messageCount: body.messages.length }, 'sending completion request');

    const url = `${this.apiBase}/chat/completions`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.extraHeaders,
    };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (err) {
      const error = toError(err);
      throw new OracleUnavailableError(
        this.providerName,
        `request failed: ${error.message}`,
        { url },
        { cause: error },
      );
    }

    if (!response.ok) {
      let errorBody: string;
      try {
        errorBody = await response.text();
      } catch {
        errorBody = 'unreadable error body';
      }
      throw new OracleUnavailableError(
        this.providerName,
        `API error: ${response.status} ${response.statusText}`,
        { status: response.status, body: errorBody.slice(0, 500) },
      );
    }

    let data: OpenAIResponse;
    try {
      data = OpenAIResponseSchema.parse(await response.json());
    } catch (err) {
      throw new OracleUnavailableError(
        this.providerName,
        'malformed response',
        undefined,
        { cause: toError(err) },
      );
    }

    const choice = data.choices[0];
    if (!choice) {
      throw new OracleUnavailableError(this.providerName, 'response has no choices');
    }

    const result: LLMResponse = {
      content: choice.message.content ?? null,
      usage: {
        promptTokens: data.usage?.prompt_tokens ?? 0,
        completionTokens: data.usage?.completion_tokens ?? 0,
        totalTokens: data.usage?.total_tokens ?? 0,
      },
      finishReason: FINISH_REASONS[choice.finish_reason ?? 'stop'] ?? 'stop',
    };

    this.log.debug({ finishReason: result.finishReason, tokens: result.usage.totalTokens }, 'completion received');
    return result;
  }

  /** System prompt first, then the conversation */
  protected formatMessages(messages: ChatMessage[], systemPrompt?: string): OpenAIMessage[] {
    const result: OpenAIMessage[] = [];
    if (systemPrompt) {
      result.push({ role: 'system', content: systemPrompt });
    }
    for (const msg of messages) {
      result.push({ role: msg.role, content: msg.content });
    }
    return result;
  }
}
