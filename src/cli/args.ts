/**
 * @fileoverview Command line parsing for the stepgraph CLI.
 *
 * @module stepgraph/cli/args
 */

import { parse as parseYAML } from 'yaml';

export type CLICommand = 'run' | 'list' | 'help' | 'version';

export interface CLIConfig {
  command: CLICommand;
  module: string | undefined;
  input: string | undefined;
  configPath: string | undefined;
  maxIterations: number | undefined;
  model: string | undefined;
  traceDir: string | null | undefined;
  tunables: Record<string, unknown>;
  configurables: Record<string, unknown>;
  verbose: boolean;
}

export class CLIUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIUsageError';
  }
}

/**
 * Splits `key=value`. Configurable values are read as YAML so that lists
 * can be passed inline (`tool_list=[stepgraph/calculator]`); tunables stay
 * plain strings.
 */
export function parseAssignment(raw: string, asYAML: boolean): [string, unknown] {
  const eq = raw.indexOf('=');
  if (eq <= 0) {
    throw new CLIUsageError(`Expected key=value, got '${raw}'`);
  }
  const key = raw.slice(0, eq).trim();
  const value = raw.slice(eq + 1);
  if (!asYAML) {
    return [key, value];
  }
  try {
    return [key, parseYAML(value)];
  } catch {
    // Not valid YAML; keep the text as given
    return [key, value];
  }
}

/**
 * Parse command line arguments.
 */
export function parseArgs(args: ReadonlyArray<string>): CLIConfig {
  const config: CLIConfig = {
    command: 'help',
    module: undefined,
    input: undefined,
    configPath: undefined,
    maxIterations: undefined,
    model: undefined,
    traceDir: undefined,
    tunables: {},
    configurables: {},
    verbose: false,
  };
  const positional: string[] = [];

  const valueFor = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined) {
      throw new CLIUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';

    switch (arg) {
      case 'run':
        config.command = 'run';
        break;

      case 'list':
      case 'modules':
        config.command = 'list';
        break;

      case '-h':
      case '--help':
      case 'help':
        config.command = 'help';
        break;

      case '-v':
      case '--version':
      case 'version':
        config.command = 'version';
        break;

      case '-i':
      case '--input':
        config.input = valueFor(arg, ++i);
        break;

      case '-c':
      case '--config':
        config.configPath = valueFor(arg, ++i);
        break;

      case '-n':
      case '--max-iterations': {
        const raw = valueFor(arg, ++i);
        const value = Number(raw);
        if (!Number.isInteger(value) || value <= 0) {
          throw new CLIUsageError(`--max-iterations must be a positive integer, got '${raw}'`);
        }
        config.maxIterations = value;
        break;
      }

      case '-m':
      case '--model':
        config.model = valueFor(arg, ++i);
        break;

      case '--trace-dir':
        config.traceDir = valueFor(arg, ++i);
        break;

      case '--no-trace':
        config.traceDir = null;
        break;

      case '-t':
      case '--tunable': {
        const [key, value] = parseAssignment(valueFor(arg, ++i), false);
        config.tunables[key] = value;
        break;
      }

      case '--configurable': {
        const [key, value] = parseAssignment(valueFor(arg, ++i), true);
        config.configurables[key] = value;
        break;
      }

      case '--verbose':
        config.verbose = true;
        break;

      default:
        if (arg.startsWith('-')) {
          throw new CLIUsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }

    i++;
  }

  if (config.command === 'run') {
    config.module = positional[0];
    // `stepgraph run <module> <input>` is accepted as well as --input
    if (config.input === undefined && positional.length > 1) {
      config.input = positional.slice(1).join(' ');
    }
    if (config.module === undefined) {
      throw new CLIUsageError('run requires a module reference');
    }
  }

  return config;
}
