/**
 * OpenAI provider
 *
 * Also serves any hosted OpenAI-compatible API through `apiBase`.
 */

import type { ProviderConfig } from '../types/config.js';
import { OpenAICompatibleProvider } from './openai-compatible-base.js';

export class OpenAIProvider extends OpenAICompatibleProvider {
  readonly name = 'openai';

  constructor(config: ProviderConfig) {
    super(config, {
      providerName: 'OpenAIProvider',
      defaultApiBase: 'https://api.openai.com/v1',
      apiKeyMissingMessage: 'API key missing: set OPENAI_API_KEY or providers.openai.apiKey',
    });
  }
}
