/**
 * @fileoverview OpenAI-compatible Chat Completions backend.
 * POST <baseUrl>/v1/chat/completions with the prompt as a single user message.
 *
 * @module stepgraph/providers/openai
 */

import { z } from 'zod';
import { GenerationError, type GenerationBackend, type GenerationOptions } from './base.js';

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable(),
    }),
  })).min(1),
});

export interface OpenAICompatibleConfig {
  readonly baseUrl?: string;
  readonly apiKey?: string | undefined;
}

export class OpenAICompatibleBackend implements GenerationBackend {
  readonly name = 'openai';
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;

  constructor(config: OpenAICompatibleConfig = {}) {
    this.baseUrl = (config.baseUrl ?? 'https://api.openai.com').replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  async generate(prompt: string, model: string, options: GenerationOptions): Promise<string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    const res = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      }),
    });

    if (!res.ok) {
      const errBody = await res.text().catch(() => '');
      throw new GenerationError(this.name, `OpenAI API error ${res.status}: ${errBody}`, res.status);
    }

    const parsed = ChatCompletionSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new GenerationError(this.name, 'OpenAI API returned an unexpected body');
    }
    return parsed.data.choices[0]?.message.content ?? '';
  }
}
