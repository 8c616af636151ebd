import type OpenAI from 'openai';

import { GenerationError } from '../lib/errors';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODELS,
  type LLMCompletionRequest,
  type LLMCompletionResponse,
  type LLMProvider,
  type LLMSettings,
} from './types';

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;
  private client: OpenAI | null = null;

  constructor(private readonly settings: LLMSettings = {}) {}

  private async getClient(): Promise<OpenAI> {
    if (!this.client) {
      const { default: OpenAIClient } = await import('openai');
      this.client = new OpenAIClient({ apiKey: this.settings.apiKey });
    }
    return this.client;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const client = await this.getClient();
    const model = this.settings.model || DEFAULT_MODELS.openai;
    const maxTokens = request.maxTokens ?? DEFAULT_MAX_TOKENS;

    const response = await client.chat.completions.create(
      {
        model,
        max_tokens: maxTokens,
        temperature: this.settings.temperature ?? 0,
        // The generator parses a JSON envelope, never free text.
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.userMessage },
        ],
      },
      { signal: request.signal },
    );

    const choice = response.choices[0];
    if (choice?.finish_reason === 'length') {
      throw new GenerationError(`openai: reply hit the ${maxTokens}-token limit before the SQL was complete`);
    }
    if (choice?.message?.refusal) {
      throw new GenerationError(`openai: model declined the request: ${choice.message.refusal}`);
    }

    const text = choice?.message?.content;
    if (!text) {
      throw new GenerationError(`openai: ${model} returned an empty completion`);
    }

    return {
      text,
      model,
      usage: {
        inputTokens: response.usage?.prompt_tokens,
        outputTokens: response.usage?.completion_tokens,
      },
    };
  }
}
