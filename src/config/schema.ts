/**
 * @fileoverview Schemas for module configuration files and engine settings.
 *
 * @module stepgraph/config/schema
 */

import { z } from 'zod';
import { Severity } from '../types/core.types.js';

export const ModuleSettingsSchema = z.object({
  tunables: z.record(z.unknown()).default({}),
  configurables: z.record(z.unknown()).default({}),
}).passthrough();

/**
 * Keyed by module reference: `name`, `name@version` or `name:version`.
 */
export const ConfigurationSchema = z.record(ModuleSettingsSchema);

export type ModuleSettings = z.infer<typeof ModuleSettingsSchema>;
export type Configuration = z.infer<typeof ConfigurationSchema>;

/**
 * Structural form accepted wherever configuration is read, so callers can
 * pass plain object literals without running them through the schema.
 */
export interface SettingsOverrides {
  readonly tunables?: Readonly<Record<string, unknown>>;
  readonly configurables?: Readonly<Record<string, unknown>>;
}

export type ConfigurationLike = Readonly<Record<string, SettingsOverrides>>;

export const EngineSettingsSchema = z.object({
  /** Hard bound on continuation/delegation hops per run */
  maxIterations: z.number().int().positive().default(5),
  /** How many delegated runs may nest below the top-level run */
  maxDepth: z.number().int().positive().default(8),
  defaultModel: z.string().min(1).default('ollama/llama3.2:3b'),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().positive().default(500),
  /** Directory for trace files; null disables file traces */
  traceDir: z.string().nullable().default('.'),
  configPath: z.string().default('modules.yaml'),
  resolution: z.enum(['strict', 'legacy-scan']).default('strict'),
  logLevel: z.nativeEnum(Severity).default(Severity.INFO),
  ollamaUrl: z.string().url().default('http://localhost:11434'),
  openaiUrl: z.string().url().default('https://api.openai.com'),
  openaiApiKey: z.string().optional(),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;
