/**
 * @fileoverview Module, step and outcome vocabulary.
 *
 * A module is a named, versioned table of steps with one entry step. Each
 * step turns an input into a {@link StepOutcome}, which tells the engine
 * whether to stop, move to another step of the same module, or hand the
 * work to a different module.
 *
 * @module stepgraph/types/module
 */

import { z } from 'zod';
import type { UniqueId } from './core.types.js';
import type { Logger } from '../observability/logger.js';
import type { TraceRecorder } from '../observability/trace-recorder.js';

// ============ Step outcomes ============

export const ResponseOutcomeSchema = z.object({
  kind: z.literal('response'),
  content: z.unknown(),
}).strict();

export const ContinueOutcomeSchema = z.object({
  kind: z.literal('continue'),
  targetStep: z.string().min(1),
  input: z.unknown(),
}).strict();

export const ContinuationSchema = z.object({
  /** Opaque state the delegating step wants back, e.g. a reasoning context */
  context: z.unknown(),
  /** Step to resume into; the module's re-entry step when omitted */
  resumeStep: z.string().min(1).optional(),
}).strict();

export const DelegationInputSchema = z.object({
  payload: z.unknown(),
  continuation: ContinuationSchema.optional(),
}).strict();

export const DelegateOutcomeSchema = z.object({
  kind: z.literal('delegate'),
  targetAction: z.string().min(1),
  input: DelegationInputSchema,
}).strict();

const OutcomeVariantsSchema = z.discriminatedUnion('kind', [
  ResponseOutcomeSchema,
  ContinueOutcomeSchema,
  DelegateOutcomeSchema,
]);

function payloadKey(outcome: z.infer<typeof OutcomeVariantsSchema>): { present: boolean; path: string[] } {
  switch (outcome.kind) {
    case 'response':
      return { present: 'content' in outcome, path: ['content'] };
    case 'continue':
      return { present: 'input' in outcome, path: ['input'] };
    case 'delegate':
      return { present: 'payload' in outcome.input, path: ['input', 'payload'] };
  }
}

/**
 * Exactly one of the three variants; `.strict()` rejects objects that carry
 * fields of more than one, and the refinement rejects one without its payload
 * key (an explicit `undefined` still counts as present).
 */
export const StepOutcomeSchema = OutcomeVariantsSchema.superRefine((outcome, ctx) => {
  const key = payloadKey(outcome);
  if (!key.present) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: key.path, message: 'Outcome has no payload' });
  }
});

export type ResponseOutcome = z.infer<typeof ResponseOutcomeSchema>;
export type ContinueOutcome = z.infer<typeof ContinueOutcomeSchema>;
export type Continuation = z.infer<typeof ContinuationSchema>;
export type DelegationInput = z.infer<typeof DelegationInputSchema>;
export type DelegateOutcome = z.infer<typeof DelegateOutcomeSchema>;
export type StepOutcome = z.infer<typeof StepOutcomeSchema>;

/**
 * Input handed to a module's re-entry step after a delegation that carried
 * a continuation.
 */
export interface ResumeInput {
  readonly context: unknown;
  readonly observation: string;
}

// ============ Configuration ============

/**
 * Read access to the tunables and configurables visible to one module.
 */
export interface ConfigView {
  /** Returns a provider so the value is read when the step needs it */
  tunable(name: string): () => unknown;
  configurable(name: string): unknown;
}

// ============ Generation ============

export interface GenerateOptions {
  /** Model identifier, e.g. `ollama/llama3.2:3b` */
  readonly model?: string;
  readonly temperature?: number;
  readonly maxTokens?: number;
}

// ============ Modules ============

/**
 * Everything a step can reach while it runs. Passed explicitly on every
 * invocation; nothing is read from module-level state.
 */
export interface StepContext {
  readonly runId: UniqueId;
  readonly module: Module;
  readonly trace: TraceRecorder;
  readonly config: ConfigView;
  readonly modules: ModuleLookup;
  readonly logger: Logger;
  /** Calls the generation backend; failures come back as `Error: ...` text */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export type StepHandler<TInput> = (
  input: TInput,
  context: StepContext,
) => StepOutcome | Promise<StepOutcome>;

/**
 * A step as stored in a module: input already erased to `unknown` and
 * checked against the declared schema inside `invoke`.
 */
export interface StepDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodTypeAny;
  readonly outputSchema: z.ZodTypeAny | null;
  invoke(input: unknown, context: StepContext): Promise<StepOutcome>;
}

export interface Module {
  readonly name: string;
  readonly version: string;
  /** `name:version` */
  readonly versionedName: string;
  readonly description: string;
  readonly longDescription: string;
  readonly steps: ReadonlyMap<string, StepDefinition>;
  readonly startStep: string | null;
  /** Step a delegation with continuation resumes into */
  readonly reentryStep: string | null;
  readonly tunables: ReadonlyArray<string>;
  readonly configurables: ReadonlyArray<string>;
}

/**
 * Display information for a module used as a delegate target.
 */
export interface ModuleDetails {
  readonly name: string;
  readonly versionedName: string;
  readonly displayName: string;
  readonly description: string;
  readonly longDescription: string;
  readonly steps: ReadonlyArray<string>;
  readonly startStep: string | null;
}

export type ModuleLookupResult =
  | { readonly found: true; readonly module: Module }
  | { readonly found: false; readonly ref: string };

export interface ModuleLookup {
  find(ref: string): ModuleLookupResult;
  describe(ref: string): ModuleDetails | null;
}

// ============ Extraction ============

/**
 * Structured intent pulled out of free-form model output.
 */
export interface ExtractedResponse {
  readonly thought: string;
  readonly action: string | null;
  readonly actionInput: string | null;
  readonly finalAnswer: string | null;
  /** Which parser produced the fields */
  readonly strategy: 'pattern' | 'fallback';
}
