/**
 * @fileoverview Provider exports and model-prefix routing.
 */

export * from './base.js';
export * from './ollama.js';
export * from './openai.js';

import type { GenerationBackend, GenerationOptions } from './base.js';
import { OllamaBackend } from './ollama.js';
import { OpenAICompatibleBackend } from './openai.js';
import type { EngineSettings } from '../config/schema.js';

/**
 * Dispatches on the model identifier: `ollama/<model>` goes to Ollama with
 * the prefix removed, everything else to the OpenAI-compatible backend.
 */
export class RoutingBackend implements GenerationBackend {
  readonly name = 'routing';

  constructor(
    private readonly ollama: GenerationBackend,
    private readonly openai: GenerationBackend,
  ) {}

  generate(prompt: string, model: string, options: GenerationOptions): Promise<string> {
    if (model.startsWith('ollama/')) {
      return this.ollama.generate(prompt, model.slice('ollama/'.length), options);
    }
    return this.openai.generate(prompt, model, options);
  }
}

/**
 * Create the default backend for the given settings.
 */
export function createBackend(
  settings: Pick<EngineSettings, 'ollamaUrl' | 'openaiUrl' | 'openaiApiKey'>,
): GenerationBackend {
  return new RoutingBackend(
    new OllamaBackend({ baseUrl: settings.ollamaUrl }),
    new OpenAICompatibleBackend({ baseUrl: settings.openaiUrl, apiKey: settings.openaiApiKey }),
  );
}
