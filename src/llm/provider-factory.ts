import { LLMProvider, LLMProviderName, LLMProviderConfig } from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { logger } from '../observability/logger';

const PROVIDER_ORDER: readonly LLMProviderName[] = ['openai', 'anthropic', 'gemini'];

/**
 * Create a single LLM provider by name.
 */
export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

/**
 * Pick the classifier's provider: the preferred one if its key is set,
 * otherwise the first provider with a key. Null when none is configured.
 */
export function buildProvider(
  preferred: LLMProviderName,
  configs: Record<LLMProviderName, LLMProviderConfig>,
): LLMProvider | null {
  const log = logger.child({ component: 'provider-factory' });
  const candidates = [preferred, ...PROVIDER_ORDER.filter((p) => p !== preferred)];
  const name = candidates.find((p) => configs[p].apiKey);

  if (!name) {
    log.warn('No LLM provider configured. Set one of: OPENAI_API_KEY, ANTHROPIC_API_KEY, GEMINI_API_KEY');
    return null;
  }
  if (name !== preferred) {
    log.warn({ preferred, using: name }, 'Preferred LLM provider has no API key; falling back');
  }

  log.info({ provider: name, model: configs[name].model }, 'LLM provider initialized');
  return createProvider(name, configs[name]);
}
