/**
 * @fileoverview Unit tests for the ReAct module
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { z } from 'zod';
import { ExecutionEngine } from '../../engine/execution-engine.js';
import { ModuleRegistry } from '../../registry/module-registry.js';
import { defineModule, defineStep, respond } from '../../registry/define.js';
import { Logger, MemoryTransport } from '../../observability/logger.js';
import { MemoryTraceSink } from '../../observability/trace-recorder.js';
import type { GenerationBackend, GenerationOptions } from '../../providers/base.js';
import type { ConfigurationLike } from '../../config/schema.js';
import { createCalculatorModule } from '../calculator/calculator-module.js';
import { ReasoningContext } from './reasoning-context.js';
import {
  DEFAULT_REACT_ANSWER,
  buildReactPrompt,
  createReactModule,
  describeTools,
  type ReactModuleOptions,
} from './react-module.js';

type GenerateFn = (prompt: string, model: string, options: GenerationOptions) => Promise<string>;

const CALCULATOR_LINE = `stepgraph/calculator: ${createCalculatorModule().longDescription}`;

const CONFIGURATION: ConfigurationLike = {
  'stepgraph/react@0.1.0': {
    tunables: { react_prompt: 'You are a test assistant.' },
    configurables: { tool_list: ['stepgraph/calculator'] },
  },
};

describe('ReAct module', () => {
  let registry: ModuleRegistry;
  let generate: Mock<GenerateFn>;
  let logs: MemoryTransport;

  function setup(options: ReactModuleOptions = {}): void {
    registry = new ModuleRegistry();
    registry.register(createReactModule(options));
    registry.register(createCalculatorModule());
  }

  function createEngine(configuration: ConfigurationLike = CONFIGURATION): ExecutionEngine {
    const backend: GenerationBackend = { name: 'scripted', generate };
    return new ExecutionEngine({
      registry,
      configuration,
      backend,
      sink: new MemoryTraceSink(),
      logger: new Logger({ transports: [logs] }),
    });
  }

  beforeEach(() => {
    generate = vi.fn<GenerateFn>();
    logs = new MemoryTransport();
    setup();
  });

  it('should answer directly with a final answer', async () => {
    generate.mockResolvedValueOnce('Thought: easy\nFinal Answer: Paris');

    const result = await createEngine().run('stepgraph/react', 'Capital of France?');

    expect(result.text).toBe('Paris');
    expect(result.success).toBe(true);
    expect(result.iterations).toBe(1);
    expect(result.trace.steps.filter(s => s.kind === 'enter').map(s => s.stepName)).toEqual([
      'react_starter',
      'react_step',
    ]);
  });

  it('should build the first prompt from the tunable, the tools and the context', async () => {
    generate.mockResolvedValueOnce('Final Answer: 4');

    await createEngine().run('stepgraph/react', 'What is 2+2?');

    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0]?.[0]).toBe(
      `You are a test assistant.\n\nAvailable tools:\n${CALCULATOR_LINE}\n\nUser question: What is 2+2?\n\nResponse:`,
    );
    expect(generate.mock.calls[0]?.[1]).toBe('ollama/llama3.2:3b');
    expect(generate.mock.calls[0]?.[2]).toEqual({ temperature: 0.1, maxTokens: 500 });
  });

  it('should delegate to a tool and continue with its observation', async () => {
    const firstReply = 'Thought: I should calculate.\nAction: stepgraph/calculator\nAction Input: 2+2';
    generate
      .mockResolvedValueOnce(firstReply)
      .mockResolvedValueOnce('Thought: I have it.\nFinal Answer: 4');

    const result = await createEngine().run('stepgraph/react', 'What is 2+2?');

    expect(result.text).toBe('4');
    expect(result.iterations).toBe(3);
    expect(result.trace.delegations).toHaveLength(1);
    expect(result.trace.delegations[0]?.input).toBe('2+2');
    expect(result.trace.delegations[0]?.output).toBe('4');
    expect(generate.mock.calls[1]?.[0]).toBe(
      `You are a test assistant.\n\nAvailable tools:\n${CALCULATOR_LINE}\n\n` +
      `User question: What is 2+2?\n\nPrevious reasoning:\n${firstReply}\n\n` +
      'Observation: 4\n\nContinue reasoning:\n\nResponse:',
    );
  });

  it('should allow two tool calls within the default bound', async () => {
    generate
      .mockResolvedValueOnce('Action: stepgraph/calculator\nAction Input: 2*3')
      .mockResolvedValueOnce('Action: stepgraph/calculator\nAction Input: 6+1')
      .mockResolvedValueOnce('Final Answer: 7');

    const result = await createEngine().run('stepgraph/react', 'Compute (2*3)+1');

    expect(result.text).toBe('7');
    expect(result.iterations).toBe(5);
  });

  it('should stop at the iteration bound when the model keeps acting', async () => {
    generate.mockResolvedValue('Action: stepgraph/calculator\nAction Input: 1+1');

    const result = await createEngine().run('stepgraph/react', 'Loop forever');

    expect(result.success).toBe(false);
    expect(result.text).toBe('Maximum iterations (5) exceeded in module stepgraph/react');
    expect(generate).toHaveBeenCalledTimes(3);
  });

  it('should replace the observation with an empty tool result', async () => {
    registry.register(defineModule({
      name: 'test/blank',
      version: '1.0.0',
      description: 'Returns an empty string',
      steps: [defineStep({ name: 'blank', input: z.string(), run: () => respond('') })],
      startStep: 'blank',
    }));
    const firstReply = 'Action: stepgraph/calculator\nAction Input: 1+1';
    const secondReply = 'Action: test/blank\nAction Input: x';
    generate
      .mockResolvedValueOnce(firstReply)
      .mockResolvedValueOnce(secondReply)
      .mockResolvedValueOnce('Final Answer: done');

    const result = await createEngine().run('stepgraph/react', 'Q');

    expect(result.text).toBe('done');
    expect(generate.mock.calls[2]?.[0]).toBe(
      `You are a test assistant.\n\nAvailable tools:\n${CALCULATOR_LINE}\n\n` +
      `User question: Q\n\nPrevious reasoning:\n${firstReply}\n${secondReply}\n\nResponse:`,
    );
  });

  it('should answer with the thought when there is neither action nor answer', async () => {
    generate.mockResolvedValueOnce('Thought: I am unsure');

    expect((await createEngine().run('stepgraph/react', 'Hmm?')).text).toBe('I am unsure');
  });

  it('should give the default answer for an empty reply', async () => {
    generate.mockResolvedValueOnce('   ');

    const result = await createEngine().run('stepgraph/react', 'Hmm?');
    expect(result.text).toBe(DEFAULT_REACT_ANSWER);
    expect(result.success).toBe(true);
  });

  it('should give the default answer when the backend fails', async () => {
    generate.mockRejectedValueOnce(new Error('connection refused'));

    const result = await createEngine().run('stepgraph/react', 'Hmm?');

    expect(result.text).toBe(DEFAULT_REACT_ANSWER);
    expect(result.trace.generationCalls[0]?.error).toBe('LLM call failed: connection refused');
  });

  it('should report an action that names no module', async () => {
    generate.mockResolvedValueOnce('Action: search\nAction Input: weather');

    const result = await createEngine().run('stepgraph/react', 'Weather?');
    expect(result.text).toBe("No module found to handle action 'search'");
  });

  it('should use the configured response pattern', async () => {
    generate.mockResolvedValueOnce('ANSWER: 42');

    const result = await createEngine({
      'stepgraph/react': { configurables: { response_pattern: 'ANSWER: (?<final_answer>.+)' } },
    }).run('stepgraph/react', 'Meaning?');

    expect(result.text).toBe('42');
  });

  it('should use the default prompt and no tools without configuration', async () => {
    generate.mockResolvedValueOnce('Final Answer: ok');

    await createEngine({}).run('stepgraph/react', 'Hi');

    expect(generate.mock.calls[0]?.[0]).toBe(
      'Default react_prompt\n\nAvailable tools:\nNo tools available.\n\nUser question: Hi\n\nResponse:',
    );
  });

  it('should use the module model option', async () => {
    setup({ model: 'test-model' });
    generate.mockResolvedValueOnce('Final Answer: ok');

    await createEngine().run('stepgraph/react', 'Hi');

    expect(generate.mock.calls[0]?.[1]).toBe('test-model');
  });

  it('should ignore a tool_list that is not a list of names', async () => {
    generate.mockResolvedValueOnce('Final Answer: ok');

    await createEngine({ 'stepgraph/react': { configurables: { tool_list: 'stepgraph/calculator' } } })
      .run('stepgraph/react', 'Hi');

    expect(generate.mock.calls[0]?.[0]).toContain('Available tools:\nNo tools available.\n');
    expect(logs.getEntries().map(e => e.message)).toContain('tool_list is not a list of module names; using no tools');
  });
});

describe('describeTools', () => {
  it('should list resolvable tools and skip the rest', () => {
    const registry = new ModuleRegistry();
    registry.register(createCalculatorModule());

    expect(describeTools(['stepgraph/calculator', 'test/missing'], registry)).toBe(CALCULATOR_LINE);
    expect(describeTools(['test/missing'], registry)).toBe('No tools available.');
  });
});

describe('buildReactPrompt', () => {
  it('should lay out prompt, tools and context', () => {
    const context = new ReasoningContext('q');
    expect(buildReactPrompt('P', 'T', context)).toBe('P\n\nAvailable tools:\nT\n\nUser question: q\n\nResponse:');
  });
});
