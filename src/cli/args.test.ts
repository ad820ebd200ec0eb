/**
 * @fileoverview Unit tests for CLI argument parsing
 */

import { describe, it, expect } from 'vitest';
import { CLIUsageError, parseArgs, parseAssignment } from './args.js';

describe('parseArgs', () => {
  it('should default to help', () => {
    expect(parseArgs([]).command).toBe('help');
  });

  it('should parse a run with options', () => {
    const config = parseArgs([
      'run', 'stepgraph/react',
      '--input', 'What is 2+2?',
      '--config', 'custom.yaml',
      '--max-iterations', '8',
      '--model', 'ollama/test',
      '--tunable', 'react_prompt=Be brief. Use tools.',
      '--configurable', 'tool_list=[stepgraph/calculator]',
      '--no-trace',
    ]);

    expect(config).toEqual({
      command: 'run',
      module: 'stepgraph/react',
      input: 'What is 2+2?',
      configPath: 'custom.yaml',
      maxIterations: 8,
      model: 'ollama/test',
      traceDir: null,
      tunables: { react_prompt: 'Be brief. Use tools.' },
      configurables: { tool_list: ['stepgraph/calculator'] },
      verbose: false,
    });
  });

  it('should take trailing positionals as the input', () => {
    const config = parseArgs(['run', 'stepgraph/calculator', '1', '+', '2']);
    expect(config.input).toBe('1 + 2');
  });

  it('should recognize list and version', () => {
    expect(parseArgs(['list']).command).toBe('list');
    expect(parseArgs(['--version']).command).toBe('version');
  });

  it('should reject a run without a module', () => {
    expect(() => parseArgs(['run'])).toThrow('run requires a module reference');
  });

  it('should reject a bad iteration bound', () => {
    expect(() => parseArgs(['run', 'm', '-n', '0'])).toThrow(
      "--max-iterations must be a positive integer, got '0'",
    );
  });

  it('should reject unknown options and missing values', () => {
    expect(() => parseArgs(['run', 'm', '--bogus'])).toThrow(CLIUsageError);
    expect(() => parseArgs(['run', 'm', '--input'])).toThrow('Missing value for --input');
  });
});

describe('parseAssignment', () => {
  it('should split on the first equals sign', () => {
    expect(parseAssignment('prompt=a=b', false)).toEqual(['prompt', 'a=b']);
  });

  it('should read configurable values as YAML', () => {
    expect(parseAssignment('limit=3', true)).toEqual(['limit', 3]);
    expect(parseAssignment('name=calc', true)).toEqual(['name', 'calc']);
  });

  it('should require a key', () => {
    expect(() => parseAssignment('=x', false)).toThrow("Expected key=value, got '=x'");
  });
});
