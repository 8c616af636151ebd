/**
 * LLM provider abstraction.
 *
 * The SQL generator talks to every backend through `LLMProvider`, so the
 * authorization pipeline never depends on a particular vendor SDK.
 */

export interface LLMCompletionRequest {
  system: string;
  userMessage: string;
  maxTokens?: number;
  /** Aborts the HTTP request when the caller goes away. */
  signal?: AbortSignal;
}

export interface LLMCompletionResponse {
  text: string;
  /** Model identifier that served the request. */
  model: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
  };
}

export interface LLMProvider {
  readonly name: LLMProviderName;

  /**
   * Send a completion request and return the model's text.
   * Throws on network, auth and rate-limit errors.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}

export type LLMProviderName = 'anthropic' | 'openai' | 'gemini';

/**
 * Models used when `LLM_MODEL` is unset. SQL replies are short and must be
 * repeatable, so mid-sized models at temperature 0 are enough.
 */
export const DEFAULT_MODELS: Readonly<Record<LLMProviderName, string>> = {
  anthropic: 'claude-sonnet-4-5',
  openai: 'gpt-4.1-mini',
  gemini: 'gemini-2.5-flash',
};

/** A single SELECT plus its explanation fits well inside this. */
export const DEFAULT_MAX_TOKENS = 1024;

/**
 * Per-provider settings. A missing `apiKey` lets the vendor SDK fall back to
 * its own environment variable (ANTHROPIC_API_KEY, OPENAI_API_KEY,
 * GOOGLE_API_KEY).
 */
export interface LLMSettings {
  model?: string;
  apiKey?: string;
  /** Sampling temperature; generation defaults to 0 for repeatable SQL. */
  temperature?: number;
}
