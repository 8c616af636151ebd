import type Anthropic from '@anthropic-ai/sdk';

import { GenerationError } from '../lib/errors';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODELS,
  type LLMCompletionRequest,
  type LLMCompletionResponse,
  type LLMProvider,
  type LLMSettings,
} from './types';

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  private client: Anthropic | null = null;

  constructor(private readonly settings: LLMSettings = {}) {}

  private async getClient(): Promise<Anthropic> {
    if (!this.client) {
      const { default: AnthropicClient } = await import('@anthropic-ai/sdk');
      this.client = new AnthropicClient({ apiKey: this.settings.apiKey });
    }
    return this.client;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const client = await this.getClient();
    const model = this.settings.model || DEFAULT_MODELS.anthropic;
    const maxTokens = request.maxTokens ?? DEFAULT_MAX_TOKENS;

    const message = await client.messages.create(
      {
        model,
        max_tokens: maxTokens,
        temperature: this.settings.temperature ?? 0,
        system: request.system,
        messages: [{ role: 'user', content: request.userMessage }],
      },
      { signal: request.signal },
    );

    // A cut-off reply may still parse as a shorter, different statement.
    if (message.stop_reason === 'max_tokens') {
      throw new GenerationError(`anthropic: reply hit the ${maxTokens}-token limit before the SQL was complete`);
    }

    const text = message.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('');
    if (!text.trim()) {
      throw new GenerationError(`anthropic: ${model} replied without a text block`);
    }

    return {
      text,
      model,
      usage: {
        inputTokens: message.usage?.input_tokens,
        outputTokens: message.usage?.output_tokens,
      },
    };
  }
}
