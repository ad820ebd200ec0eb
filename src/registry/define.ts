/**
 * @fileoverview Builders for modules, steps and step outcomes.
 *
 * @module stepgraph/registry/define
 */

import { z } from 'zod';
import { StepInputError } from '../types/errors.js';
import type {
  Continuation,
  ContinueOutcome,
  DelegateOutcome,
  Module,
  ResponseOutcome,
  StepDefinition,
  StepHandler,
} from '../types/module.types.js';

export interface StepSpec<TInput> {
  readonly name: string;
  readonly description?: string;
  /** Declared input type; checked before the handler runs */
  readonly input: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  /** Declared type of `respond` content produced by this step */
  readonly output?: z.ZodTypeAny;
  readonly run: StepHandler<TInput>;
}

/**
 * Wraps a typed handler so it can sit in a module's step table.
 *
 * @example
 * ```typescript
 * const shout = defineStep({
 *   name: 'shout',
 *   input: z.string(),
 *   run: (text) => respond(text.toUpperCase()),
 * });
 * ```
 */
export function defineStep<TInput>(spec: StepSpec<TInput>): StepDefinition {
  return {
    name: spec.name,
    description: spec.description ?? '',
    inputSchema: spec.input,
    outputSchema: spec.output ?? null,
    invoke: async (input, context) => {
      const parsed = spec.input.safeParse(input);
      if (!parsed.success) {
        throw new StepInputError(spec.name, formatIssues(parsed.error), context.module.name);
      }
      return spec.run(parsed.data, context);
    },
  };
}

export interface ModuleSpec {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly longDescription?: string;
  readonly steps: ReadonlyArray<StepDefinition>;
  /** Entry step; a module without one cannot be run */
  readonly startStep?: string | null;
  readonly reentryStep?: string | null;
  readonly tunables?: ReadonlyArray<string>;
  readonly configurables?: ReadonlyArray<string>;
}

/**
 * Builds an immutable module. Duplicate step names are rejected; the start
 * and re-entry steps are not checked here so that a misconfigured module
 * still reaches the engine, which reports the problem as a response.
 */
export function defineModule(spec: ModuleSpec): Module {
  const steps = new Map<string, StepDefinition>();
  for (const step of spec.steps) {
    if (steps.has(step.name)) {
      throw new Error(`Duplicate step '${step.name}' in module ${spec.name}`);
    }
    steps.set(step.name, step);
  }

  return Object.freeze({
    name: spec.name,
    version: spec.version,
    versionedName: `${spec.name}:${spec.version}`,
    description: spec.description,
    longDescription: spec.longDescription ?? spec.description,
    steps,
    startStep: spec.startStep ?? null,
    reentryStep: spec.reentryStep ?? null,
    tunables: Object.freeze([...(spec.tunables ?? [])]),
    configurables: Object.freeze([...(spec.configurables ?? [])]),
  });
}

// ============ Outcome constructors ============

export function respond(content: unknown): ResponseOutcome {
  return { kind: 'response', content };
}

export function continueWith(targetStep: string, input: unknown): ContinueOutcome {
  return { kind: 'continue', targetStep, input };
}

export function delegate(targetAction: string, payload: unknown, continuation?: Continuation): DelegateOutcome {
  return continuation === undefined
    ? { kind: 'delegate', targetAction, input: { payload } }
    : { kind: 'delegate', targetAction, input: { payload, continuation } };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
