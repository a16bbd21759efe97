/**
 * Provider factory
 *
 * Creates the completion oracle named in config.
 */

import type { LLMProvider } from '../types/provider.js';
import type { ProviderConfig } from '../types/config.js';
import { OpenAIProvider } from './openai-provider.js';
import { OllamaProvider } from './ollama-provider.js';
import { ConfigError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('ProviderFactory');

const providerConstructors: Record<string, new (config: ProviderConfig) => LLMProvider> = {
  openai: OpenAIProvider,
  ollama: OllamaProvider,
};

export function createProvider(name: string, config: ProviderConfig): LLMProvider {
  const Constructor = providerConstructors[name];
  if (!Constructor) {
    throw new ConfigError(`Unsupported provider: ${name}`, {
      provider: name,
      supported: Object.keys(providerConstructors),
    });
  }

  log.info({ provider: name }, 'creating provider');
  return new Constructor(config);
}

/** Register a provider under a new name */
export function registerProvider(
  name: string,
  constructor: new (config: ProviderConfig) => LLMProvider,
): void {
  providerConstructors[name] = constructor;
  log.info({ provider: name }, 'provider registered');
}

export function supportedProviders(): string[] {
  return Object.keys(providerConstructors);
}
