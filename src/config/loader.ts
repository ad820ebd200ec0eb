/**
 * @fileoverview Loading of module configuration files and engine settings.
 *
 * Module configuration is YAML keyed by module reference:
 *
 * ```yaml
 * stepgraph/react@0.1.0:
 *   tunables:
 *     react_prompt: You are a helpful assistant.
 *   configurables:
 *     tool_list: [stepgraph/calculator]
 * ```
 *
 * @module stepgraph/config/loader
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYAML } from 'yaml';
import { parseSeverity } from '../observability/logger.js';
import {
  ConfigurationSchema,
  EngineSettingsSchema,
  type Configuration,
  type EngineSettings,
  type EngineSettingsInput,
} from './schema.js';

export class ConfigurationFileError extends Error {
  constructor(readonly path: string, message: string, options?: ErrorOptions) {
    super(`Invalid configuration in ${path}: ${message}`, options);
    this.name = 'ConfigurationFileError';
  }
}

/**
 * Parses YAML (or JSON, which is valid YAML) configuration text.
 */
export function parseConfiguration(text: string, source: string = '<inline>'): Configuration {
  let data: unknown;
  try {
    data = parseYAML(text);
  } catch (error) {
    throw new ConfigurationFileError(source, error instanceof Error ? error.message : String(error), { cause: error });
  }
  // An empty document parses to null
  const result = ConfigurationSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new ConfigurationFileError(source, issues);
  }
  return result.data;
}

/**
 * Reads a configuration file. A file that does not exist yields an empty
 * configuration.
 */
export async function loadConfiguration(path: string): Promise<Configuration> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }
  return parseConfiguration(text, path);
}

const ENV_PREFIX = 'STEPGRAPH_';

/**
 * Builds engine settings from defaults, then `STEPGRAPH_*` environment
 * variables, then explicit overrides.
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EngineSettingsInput = {},
): EngineSettings {
  const fromEnv: EngineSettingsInput = {};
  const read = (key: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${key}`];
    return value === undefined || value === '' ? undefined : value;
  };

  const maxIterations = read('MAX_ITERATIONS');
  if (maxIterations !== undefined) fromEnv.maxIterations = Number(maxIterations);
  const maxDepth = read('MAX_DEPTH');
  if (maxDepth !== undefined) fromEnv.maxDepth = Number(maxDepth);
  const model = read('MODEL');
  if (model !== undefined) fromEnv.defaultModel = model;
  const temperature = read('TEMPERATURE');
  if (temperature !== undefined) fromEnv.temperature = Number(temperature);
  const maxTokens = read('MAX_TOKENS');
  if (maxTokens !== undefined) fromEnv.maxTokens = Number(maxTokens);
  const traceDir = read('TRACE_DIR');
  if (traceDir !== undefined) fromEnv.traceDir = traceDir === 'off' ? null : traceDir;
  const configPath = read('CONFIG');
  if (configPath !== undefined) fromEnv.configPath = configPath;
  const resolution = read('RESOLUTION');
  if (resolution === 'strict' || resolution === 'legacy-scan') fromEnv.resolution = resolution;
  const logLevel = read('LOG_LEVEL');
  if (logLevel !== undefined) fromEnv.logLevel = parseSeverity(logLevel);
  const ollamaUrl = read('OLLAMA_URL');
  if (ollamaUrl !== undefined) fromEnv.ollamaUrl = ollamaUrl;
  const openaiUrl = read('OPENAI_URL');
  if (openaiUrl !== undefined) fromEnv.openaiUrl = openaiUrl;
  const apiKey = read('OPENAI_API_KEY') ?? env['OPENAI_API_KEY'];
  if (apiKey !== undefined && apiKey !== '') fromEnv.openaiApiKey = apiKey;

  return EngineSettingsSchema.parse({ ...fromEnv, ...overrides });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
