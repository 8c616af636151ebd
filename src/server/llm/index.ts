/**
 * LLM provider factory.
 *
 * Environment variables:
 *   LLM_PROVIDER  - "anthropic" | "openai" | "gemini"  (default: "anthropic")
 *   LLM_MODEL     - model identifier override (default: DEFAULT_MODELS)
 *   LLM_API_KEY   - API key; when unset each SDK reads its own variable
 *                   (ANTHROPIC_API_KEY, OPENAI_API_KEY, GOOGLE_API_KEY)
 */

import { ConfigError } from '../lib/errors';
import { AnthropicProvider } from './anthropic';
import { GeminiProvider } from './gemini';
import { OpenAIProvider } from './openai';
import type { LLMProvider, LLMProviderName, LLMSettings } from './types';

export type {
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMProvider,
  LLMProviderName,
  LLMSettings,
} from './types';
export { DEFAULT_MAX_TOKENS, DEFAULT_MODELS } from './types';
export { AnthropicProvider, GeminiProvider, OpenAIProvider };

const PROVIDERS: Record<LLMProviderName, new (settings: LLMSettings) => LLMProvider> = {
  anthropic: AnthropicProvider,
  openai: OpenAIProvider,
  gemini: GeminiProvider,
};

function isProviderName(name: string): name is LLMProviderName {
  return Object.hasOwn(PROVIDERS, name);
}

/** Build a provider from explicit settings. */
export function createLLMProvider(name: string, settings: LLMSettings = {}): LLMProvider {
  if (!isProviderName(name)) {
    throw new ConfigError(
      `Unsupported LLM_PROVIDER: "${name}". Supported values: ${Object.keys(PROVIDERS).join(', ')}`,
    );
  }
  return new PROVIDERS[name](settings);
}

let cachedProvider: LLMProvider | null = null;
let cachedProviderKey: string | null = null;

/**
 * Return the provider configured by the environment.
 * The instance is cached until the relevant variables change or
 * `resetProvider()` is called.
 */
export function getLLMProvider(env: Record<string, string | undefined> = process.env): LLMProvider {
  const name = env.LLM_PROVIDER || 'anthropic';
  const settings: LLMSettings = {
    model: env.LLM_MODEL || undefined,
    apiKey: env.LLM_API_KEY || undefined,
  };
  const key = `${name}\u0000${settings.model ?? ''}\u0000${settings.apiKey ?? ''}`;

  if (cachedProvider && cachedProviderKey === key) {
    return cachedProvider;
  }

  cachedProvider = createLLMProvider(name, settings);
  cachedProviderKey = key;
  return cachedProvider;
}

export function resetProvider(): void {
  cachedProvider = null;
  cachedProviderKey = null;
}
