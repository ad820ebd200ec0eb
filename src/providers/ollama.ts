/**
 * @fileoverview Ollama backend.
 * POST <baseUrl>/api/generate with streaming disabled.
 *
 * @module stepgraph/providers/ollama
 */

import { z } from 'zod';
import { GenerationError, type GenerationBackend, type GenerationOptions } from './base.js';

const OllamaResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
});

export interface OllamaBackendConfig {
  readonly baseUrl?: string;
}

export class OllamaBackend implements GenerationBackend {
  readonly name = 'ollama';
  private readonly baseUrl: string;

  constructor(config: OllamaBackendConfig = {}) {
    this.baseUrl = (config.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
  }

  async generate(prompt: string, model: string, options: GenerationOptions): Promise<string> {
    const res = await fetch(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model,
        prompt,
        stream: false,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens,
        },
      }),
    });

    if (!res.ok) {
      const errBody = await res.text().catch(() => '');
      throw new GenerationError(this.name, `Ollama API error ${res.status}: ${errBody}`, res.status);
    }

    const parsed = OllamaResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new GenerationError(this.name, 'Ollama API returned an unexpected body');
    }
    return parsed.data.response;
  }
}
