import type { GoogleGenAI } from '@google/genai';

import { GenerationError } from '../lib/errors';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODELS,
  type LLMCompletionRequest,
  type LLMCompletionResponse,
  type LLMProvider,
  type LLMSettings,
} from './types';

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  private ai: GoogleGenAI | null = null;

  constructor(private readonly settings: LLMSettings = {}) {}

  private async getAI(): Promise<GoogleGenAI> {
    if (!this.ai) {
      const { GoogleGenAI: GenAIClient } = await import('@google/genai');
      this.ai = new GenAIClient({ apiKey: this.settings.apiKey });
    }
    return this.ai;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const ai = await this.getAI();
    const model = this.settings.model || DEFAULT_MODELS.gemini;
    const maxTokens = request.maxTokens ?? DEFAULT_MAX_TOKENS;

    const response = await ai.models.generateContent({
      model,
      config: {
        maxOutputTokens: maxTokens,
        temperature: this.settings.temperature ?? 0,
        responseMimeType: 'application/json',
        systemInstruction: request.system,
        abortSignal: request.signal,
      },
      contents: request.userMessage,
    });

    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new GenerationError(`gemini: question blocked by safety filter (${blockReason})`);
    }
    const finishReason: string | undefined = response.candidates?.[0]?.finishReason;
    if (finishReason === 'MAX_TOKENS') {
      throw new GenerationError(`gemini: reply hit the ${maxTokens}-token limit before the SQL was complete`);
    }

    const text = response.text;
    if (!text) {
      throw new GenerationError(`gemini: ${model} returned no text part`);
    }

    return {
      text,
      model,
      usage: {
        inputTokens: response.usageMetadata?.promptTokenCount,
        outputTokens: response.usageMetadata?.candidatesTokenCount,
      },
    };
  }
}
