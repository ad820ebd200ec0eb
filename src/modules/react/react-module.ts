/**
 * @fileoverview ReAct module: reason, act through another module, observe,
 * repeat.
 *
 * `react_starter` wraps the query in a {@link ReasoningContext} and hands
 * over to `react_step`. Each `react_step` prompts the model with the
 * context so far, records the raw reply, and then either answers, delegates
 * to the tool module the model named (asking for the result back), or
 * answers with its last thought.
 *
 * @module stepgraph/modules/react
 */

import { z } from 'zod';
import { stringifyContent } from '../../types/core.types.js';
import type { Module, ModuleLookup, StepContext, StepOutcome } from '../../types/module.types.js';
import { continueWith, defineModule, defineStep, delegate, respond } from '../../registry/define.js';
import { ResponseExtractor } from '../../extraction/response-extractor.js';
import { ReasoningContext } from './reasoning-context.js';

export const REACT_MODULE_NAME = 'stepgraph/react';
export const REACT_MODULE_VERSION = '0.1.0';
export const DEFAULT_REACT_ANSWER = "I'm not sure how to help with that.";

const ToolListSchema = z.array(z.string());

const ReactStepInputSchema = z.object({
  context: z.instanceof(ReasoningContext),
  observation: z.string().nullable().optional(),
});

export type ReactStepInput = z.infer<typeof ReactStepInputSchema>;

export interface ReactModuleOptions {
  /** Model for this module's generation calls; the engine default otherwise */
  readonly model?: string;
}

/**
 * Formats `name: long description` lines for the tools that resolve,
 * skipping (and logging) the ones that do not.
 */
export function describeTools(tools: ReadonlyArray<string>, modules: ModuleLookup, context?: StepContext): string {
  const lines: string[] = [];
  for (const tool of tools) {
    const details = modules.describe(tool);
    if (details === null) {
      context?.logger.warn('Configured tool is not registered', { tool });
      continue;
    }
    lines.push(`${details.displayName}: ${details.longDescription}`);
  }
  return lines.length > 0 ? lines.join('\n') : 'No tools available.';
}

export function buildReactPrompt(basePrompt: string, toolsText: string, context: ReasoningContext): string {
  return `${basePrompt}

Available tools:
${toolsText}

${context.render()}

Response:`;
}

function readToolList(context: StepContext): string[] {
  const parsed = ToolListSchema.safeParse(context.config.configurable('tool_list'));
  if (!parsed.success) {
    context.logger.warn('tool_list is not a list of module names; using no tools');
    return [];
  }
  return parsed.data;
}

function readPattern(context: StepContext): string | null {
  const pattern = context.config.configurable('response_pattern');
  return typeof pattern === 'string' && pattern.trim() !== '' ? pattern : null;
}

/**
 * One reasoning cycle.
 */
export async function reactStep(
  input: ReactStepInput,
  context: StepContext,
  options: ReactModuleOptions = {},
): Promise<StepOutcome> {
  const reasoning = input.context;
  if (input.observation !== null && input.observation !== undefined) {
    reasoning.setObservation(input.observation);
  }

  const toolsText = describeTools(readToolList(context), context.modules, context);
  const basePrompt = stringifyContent(context.config.tunable('react_prompt')());
  const prompt = buildReactPrompt(basePrompt, toolsText, reasoning);

  const reply = await context.generate(prompt, options.model === undefined ? {} : { model: options.model });
  reasoning.addReasoning(reply);

  const parsed = new ResponseExtractor({ pattern: readPattern(context) }).extract(reply);
  context.logger.debug('Parsed reasoning reply', {
    strategy: parsed.strategy,
    action: parsed.action,
    hasFinalAnswer: parsed.finalAnswer !== null,
  });

  if (parsed.finalAnswer !== null) {
    return respond(parsed.finalAnswer);
  }
  if (parsed.action !== null && parsed.actionInput !== null) {
    return delegate(parsed.action, parsed.actionInput, { context: reasoning });
  }
  return respond(parsed.thought || DEFAULT_REACT_ANSWER);
}

export function createReactModule(options: ReactModuleOptions = {}): Module {
  return defineModule({
    name: REACT_MODULE_NAME,
    version: REACT_MODULE_VERSION,
    description: 'ReAct framework',
    longDescription:
      "Answers a question or request by reasoning step by step and calling other modules as tools. " +
      'The input is free text; the quality of the answer depends on the tools configured in tool_list.',
    steps: [
      defineStep({
        name: 'react_starter',
        description: 'Creates the reasoning context for a query',
        input: z.string(),
        run: (query) => continueWith('react_step', { context: new ReasoningContext(query), observation: null }),
      }),
      defineStep({
        name: 'react_step',
        description: 'Runs one reason/act cycle',
        input: ReactStepInputSchema,
        run: (input, context) => reactStep(input, context, options),
      }),
    ],
    startStep: 'react_starter',
    reentryStep: 'react_step',
    tunables: ['react_prompt'],
    configurables: ['tool_list', 'response_pattern'],
  });
}
