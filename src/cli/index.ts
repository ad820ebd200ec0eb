#!/usr/bin/env node
/**
 * @fileoverview stepgraph CLI
 *
 * Usage:
 *   stepgraph run <module> --input <text> [options]
 *   stepgraph list
 *   stepgraph --help
 */

import { loadConfiguration, loadSettings } from '../config/loader.js';
import type { EngineSettingsInput } from '../config/schema.js';
import { ExecutionEngine } from '../engine/execution-engine.js';
import { registerBuiltinModules } from '../modules/index.js';
import { ConsoleTransport, Logger } from '../observability/logger.js';
import { FileTraceSink, NullTraceSink } from '../observability/trace-recorder.js';
import { createBackend } from '../providers/index.js';
import { ModuleRegistry } from '../registry/module-registry.js';
import { Severity } from '../types/core.types.js';
import { CLIUsageError, parseArgs, type CLIConfig } from './args.js';

const VERSION = '0.1.0';

/**
 * Print help message.
 */
function printHelp(): void {
  console.log(`
stepgraph - run step-graph modules

USAGE:
  stepgraph <command> [options]

COMMANDS:
  run <module>     Run a module against an input
  list             List registered modules
  help             Show this help message
  version          Show version

RUN OPTIONS:
  -i, --input <text>            Input passed to the module's start step
  -c, --config <path>           Module configuration file (default: modules.yaml)
  -n, --max-iterations <n>      Continue/delegate hops allowed per run (default: 5)
  -m, --model <id>              Generation model, e.g. ollama/llama3.2:3b
  -t, --tunable <key=value>     Override a tunable of the module
  --configurable <key=value>    Override a configurable (value read as YAML)
  --trace-dir <path>            Directory for trace files (default: .)
  --no-trace                    Do not write trace files
  --verbose                     Log at debug level

ENVIRONMENT:
  STEPGRAPH_MODEL, STEPGRAPH_MAX_ITERATIONS, STEPGRAPH_MAX_DEPTH, STEPGRAPH_TRACE_DIR,
  STEPGRAPH_CONFIG, STEPGRAPH_RESOLUTION, STEPGRAPH_LOG_LEVEL,
  STEPGRAPH_OLLAMA_URL, STEPGRAPH_OPENAI_URL, OPENAI_API_KEY

EXAMPLES:
  stepgraph run stepgraph/calculator --input "sqrt(16) + 1"
  stepgraph run stepgraph/react --input "What is 12 * 7?" \\
    --configurable "tool_list=[stepgraph/calculator]"
`);
}

/**
 * Print version.
 */
function printVersion(): void {
  console.log(`stepgraph v${VERSION}`);
}

function listModules(registry: ModuleRegistry): void {
  const modules = registry.list();
  for (const module of modules) {
    console.log(`  ${module.versionedName}`);
    console.log(`     ${module.description}`);
    if (module.tunables.length > 0) console.log(`     Tunables: ${module.tunables.join(', ')}`);
    if (module.configurables.length > 0) console.log(`     Configurables: ${module.configurables.join(', ')}`);
    console.log('');
  }
  console.log(`Total: ${modules.length} modules`);
}

/**
 * Run a module and print its response to stdout.
 *
 * @returns process exit code
 */
async function runModule(config: CLIConfig, registry: ModuleRegistry): Promise<number> {
  const overrides: EngineSettingsInput = {};
  if (config.maxIterations !== undefined) overrides.maxIterations = config.maxIterations;
  if (config.model !== undefined) overrides.defaultModel = config.model;
  if (config.configPath !== undefined) overrides.configPath = config.configPath;
  if (config.traceDir !== undefined) overrides.traceDir = config.traceDir;
  if (config.verbose) overrides.logLevel = Severity.DEBUG;

  const settings = loadSettings(process.env, overrides);
  const logger = new Logger({ minLevel: settings.logLevel, transports: [new ConsoleTransport()] });
  const configuration = await loadConfiguration(settings.configPath);

  const engine = new ExecutionEngine({
    registry,
    configuration,
    resolution: settings.resolution,
    backend: createBackend(settings),
    sink: settings.traceDir === null ? new NullTraceSink() : new FileTraceSink(settings.traceDir),
    logger,
    maxIterations: settings.maxIterations,
    maxDepth: settings.maxDepth,
    defaultModel: settings.defaultModel,
    generation: { temperature: settings.temperature, maxTokens: settings.maxTokens },
  });

  const result = await engine.run(config.module ?? '', config.input ?? '', {
    overrides: { tunables: config.tunables, configurables: config.configurables },
  });

  console.log(result.text);
  return result.success ? 0 : 1;
}

/**
 * Main entry point.
 */
async function main(): Promise<number> {
  const config = parseArgs(process.argv.slice(2));
  const registry = registerBuiltinModules(new ModuleRegistry());

  switch (config.command) {
    case 'run':
      return runModule(config, registry);

    case 'list':
      listModules(registry);
      return 0;

    case 'version':
      printVersion();
      return 0;

    case 'help':
    default:
      printHelp();
      return 0;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof CLIUsageError) {
      console.error(`${error.message}\nRun 'stepgraph help' for usage.`);
      process.exitCode = 2;
      return;
    }
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
