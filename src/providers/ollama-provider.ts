/**
 * Ollama provider
 *
 * Talks to a local Ollama server through its OpenAI-compatible endpoint.
 * No API key is needed.
 */

import type { ProviderConfig } from '../types/config.js';
import { OpenAICompatibleProvider } from './openai-compatible-base.js';

export const OLLAMA_DEFAULT_API_BASE = 'http://localhost:11434/v1';

export class OllamaProvider extends OpenAICompatibleProvider {
  readonly name = 'ollama';

  constructor(config: ProviderConfig) {
    super(config, {
      providerName: 'OllamaProvider',
      defaultApiBase: OLLAMA_DEFAULT_API_BASE,
    });
  }
}
