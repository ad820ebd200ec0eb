/**
 * @fileoverview Generation backend contract.
 *
 * The engine treats text generation as an opaque `prompt -> text` call.
 * {@link generateText} wraps a backend call for a running step: it records
 * the call in the run's trace and turns failures into ordinary text so a
 * broken backend degrades an answer instead of aborting the run.
 *
 * @module stepgraph/providers
 */

import type { Logger } from '../observability/logger.js';
import type { TraceRecorder } from '../observability/trace-recorder.js';
import { errorMessage } from '../types/errors.js';

export interface GenerationOptions {
  readonly temperature: number;
  readonly maxTokens: number;
}

export const DEFAULT_GENERATION_OPTIONS: Readonly<GenerationOptions> = {
  temperature: 0.1,
  maxTokens: 500,
} as const;

export interface GenerationBackend {
  readonly name: string;
  /**
   * @throws GenerationError (or any error) when the call fails
   */
  generate(prompt: string, model: string, options: GenerationOptions): Promise<string>;
}

export class GenerationError extends Error {
  constructor(
    readonly backend: string,
    message: string,
    readonly status: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export interface GenerateTextRequest {
  readonly backend: GenerationBackend;
  readonly prompt: string;
  readonly model: string;
  readonly options: GenerationOptions;
  readonly trace?: TraceRecorder | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Calls the backend and returns its trimmed text, or
 * `Error: LLM call failed: <message>` when the call fails.
 */
export async function generateText(request: GenerateTextRequest): Promise<string> {
  const { backend, prompt, model, options, trace, logger } = request;
  const started = Date.now();

  logger?.debug('Calling generation backend', { backend: backend.name, model, promptLength: prompt.length });

  try {
    const response = (await backend.generate(prompt, model, options)).trim();
    trace?.recordGeneration({
      model,
      prompt,
      promptLength: prompt.length,
      response,
      responseLength: response.length,
      error: null,
      durationMs: Date.now() - started,
    });
    return response;
  } catch (error) {
    const message = `LLM call failed: ${errorMessage(error)}`;
    logger?.warn('Generation backend failed', { backend: backend.name, model, error: message });
    trace?.recordGeneration({
      model,
      prompt,
      promptLength: prompt.length,
      response: null,
      responseLength: null,
      error: message,
      durationMs: Date.now() - started,
    });
    return `Error: ${message}`;
  }
}
