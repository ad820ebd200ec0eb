/**
 * @fileoverview Execution Engine - interprets a module's step graph.
 *
 * A run invokes the module's start step and then follows the outcomes it
 * returns:
 *
 * ```
 *   start step ──► continue ──► step of the same module ──┐
 *        │            ▲                                   │
 *        │            └───────────── (next outcome) ◄─────┘
 *        ├──► delegate ──► fresh run of another module
 *        │        ├─ with continuation: continue into the re-entry step
 *        │        └─ without: the delegated result is the response
 *        └──► response (run ends)
 * ```
 *
 * The number of continue/delegate hops per run is bounded. Every failure a
 * module can cause (missing steps, unknown actions, invalid outcomes, the
 * bound itself, a step that throws) ends the run with a response whose
 * content is the error message; `run` does not throw for them. Each run,
 * including each delegated one, gets its own trace which is finalized and
 * handed to the trace sink on every exit path.
 *
 * @module stepgraph/engine/execution-engine
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId } from '../types/core.types.js';
import { createUniqueId, stringifyContent } from '../types/core.types.js';
import { ConfigurationError, EngineError, errorMessage } from '../types/errors.js';
import {
  StepOutcomeSchema,
  type ConfigView,
  type Continuation,
  type ContinueOutcome,
  type GenerateOptions,
  type Module,
  type ResponseOutcome,
  type ResumeInput,
  type StepContext,
  type StepOutcome,
} from '../types/module.types.js';
import { continueWith, respond } from '../registry/define.js';
import type { ModuleRegistry } from '../registry/module-registry.js';
import { ConfigurationResolver, type ResolutionMode } from '../config/resolver.js';
import { EngineSettingsSchema, type ConfigurationLike, type SettingsOverrides } from '../config/schema.js';
import { Logger } from '../observability/logger.js';
import { NullTraceSink, TraceRecorder, type RunTrace, type TraceSink } from '../observability/trace-recorder.js';
import {
  DEFAULT_GENERATION_OPTIONS,
  generateText,
  type GenerationBackend,
  type GenerationOptions,
} from '../providers/base.js';
import { createBackend } from '../providers/index.js';

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_MAX_DEPTH = 8;

export interface EngineEvents {
  'run:start': (runId: UniqueId, module: Module, depth: number) => void;
  'step:enter': (runId: UniqueId, module: Module, stepName: string) => void;
  'step:exit': (runId: UniqueId, module: Module, stepName: string, outcome: StepOutcome) => void;
  'delegation': (runId: UniqueId, action: string, target: Module, output: string) => void;
  'run:complete': (result: RunResult) => void;
}

export interface ExecutionEngineConfig {
  readonly registry: ModuleRegistry;
  readonly configuration?: ConfigurationLike;
  readonly resolution?: ResolutionMode;
  readonly backend?: GenerationBackend;
  readonly sink?: TraceSink;
  readonly logger?: Logger;
  /** Continue/delegate hops allowed per run; finite and positive */
  readonly maxIterations?: number;
  /** Delegated runs allowed to nest below the top-level run */
  readonly maxDepth?: number;
  readonly defaultModel?: string;
  readonly generation?: Partial<GenerationOptions>;
}

export interface RunOptions {
  /** Tunables/configurables for the top-level module, ahead of the configuration */
  readonly overrides?: SettingsOverrides;
}

export interface RunResult {
  readonly runId: UniqueId;
  readonly module: string;
  readonly response: ResponseOutcome;
  /** Response content in string form */
  readonly text: string;
  readonly success: boolean;
  readonly error: EngineError | null;
  /** Continue/delegate hops taken */
  readonly iterations: number;
  readonly trace: RunTrace;
}

type StepResult =
  | { readonly ok: true; readonly outcome: StepOutcome }
  | { readonly ok: false; readonly error: EngineError };

interface DriveResult {
  readonly response: ResponseOutcome;
  readonly error: EngineError | null;
  readonly iterations: number;
}

interface RunScope {
  readonly runId: UniqueId;
  readonly module: Module;
  readonly trace: TraceRecorder;
  readonly logger: Logger;
  readonly context: StepContext;
  readonly depth: number;
}

/**
 * Builds the outcome that hands a delegated result back to the module that
 * asked for it. The observation is the result's string form.
 */
export function resumeAfterDelegation(
  module: Module,
  continuation: Continuation,
  result: unknown,
): ContinueOutcome | ConfigurationError {
  const resumeStep = continuation.resumeStep ?? module.reentryStep;
  if (resumeStep === null) {
    return new ConfigurationError(
      'NO_REENTRY_STEP',
      `Module ${module.name} has no re-entry step for continuation`,
      module.name,
    );
  }
  const input: ResumeInput = { context: continuation.context, observation: stringifyContent(result) };
  return continueWith(resumeStep, input);
}

/**
 * @example
 * ```typescript
 * const engine = new ExecutionEngine({ registry, configuration, backend });
 * const result = await engine.run('stepgraph/react', 'What is 2 + 2?');
 * console.log(result.text);
 * ```
 */
export class ExecutionEngine extends EventEmitter<EngineEvents> {
  private readonly registry: ModuleRegistry;
  private readonly resolver: ConfigurationResolver;
  private readonly backend: GenerationBackend;
  private readonly sink: TraceSink;
  private readonly logger: Logger;
  private readonly maxIterations: number;
  private readonly maxDepth: number;
  private readonly defaultModel: string;
  private readonly generation: GenerationOptions;

  constructor(config: ExecutionEngineConfig) {
    super();
    const defaults = EngineSettingsSchema.parse({});
    this.registry = config.registry;
    this.resolver = new ConfigurationResolver(config.configuration ?? {}, config.resolution ?? 'strict');
    this.backend = config.backend ?? createBackend(defaults);
    this.sink = config.sink ?? new NullTraceSink();
    this.logger = (config.logger ?? new Logger()).child({ module: 'engine' });
    this.maxIterations = EngineSettingsSchema.shape.maxIterations.parse(config.maxIterations ?? DEFAULT_MAX_ITERATIONS);
    this.maxDepth = EngineSettingsSchema.shape.maxDepth.parse(config.maxDepth ?? DEFAULT_MAX_DEPTH);
    this.defaultModel = config.defaultModel ?? defaults.defaultModel;
    this.generation = { ...DEFAULT_GENERATION_OPTIONS, ...config.generation };
  }

  getMaxIterations(): number {
    return this.maxIterations;
  }

  getMaxDepth(): number {
    return this.maxDepth;
  }

  /**
   * Runs a module (or a registered module reference) against `input`.
   * Always resolves with a response; failures are reported in its content.
   */
  async run(target: Module | string, input: unknown, options: RunOptions = {}): Promise<RunResult> {
    this.registry.seal();

    if (typeof target === 'string') {
      const found = this.registry.find(target);
      if (!found.found) {
        return this.rejectUnknownModule(target, input);
      }
      return this.execute(found.module, input, options.overrides ?? {}, 0);
    }
    return this.execute(target, input, options.overrides ?? {}, 0);
  }

  // ============ Run lifecycle ============

  private async execute(
    module: Module,
    input: unknown,
    overrides: SettingsOverrides,
    depth: number,
  ): Promise<RunResult> {
    const runId = createUniqueId(uuidv4());
    const trace = new TraceRecorder(module, stringifyContent(input));
    const logger = this.logger.child({ runId });
    const scope: RunScope = {
      runId,
      module,
      trace,
      logger,
      depth,
      context: this.createStepContext(runId, module, trace, logger, this.resolver.forModule(module, overrides)),
    };

    logger.info('Run started', { module: module.versionedName, depth });
    this.emit('run:start', runId, module, depth);

    let driven: DriveResult;
    try {
      driven = await this.drive(scope, input);
    } catch (error) {
      // Anything escaping drive() is an engine bug; the run still gets a response
      const failure = new EngineError('STEP_FAILED', `Run of ${module.name} failed: ${errorMessage(error)}`, module.name, { cause: error });
      logger.error('Run aborted', { module: module.versionedName }, error);
      driven = { response: respond(failure.message), error: failure, iterations: 0 };
    }

    return this.complete(scope, driven);
  }

  private async drive(scope: RunScope, input: unknown): Promise<DriveResult> {
    const { module, trace } = scope;

    const startStep = module.startStep;
    if (startStep === null || !module.steps.has(startStep)) {
      const message = startStep === null
        ? `No start step defined for module ${module.name}`
        : `Start step '${startStep}' is not registered in module ${module.name}`;
      const error = new ConfigurationError('NO_START_STEP', message, module.name);
      trace.recordStep({ kind: 'error', stepName: startStep ?? '<none>', module: module.name, error: message });
      return this.fail(error, 0);
    }

    const first = await this.invokeStep(scope, startStep, input);
    if (!first.ok) return this.fail(first.error, 0);

    let outcome = first.outcome;
    let iterations = 0;

    while (outcome.kind !== 'response') {
      if (iterations >= this.maxIterations) {
        const error = new EngineError(
          'ITERATION_LIMIT',
          `Maximum iterations (${this.maxIterations}) exceeded in module ${module.name}`,
          module.name,
        );
        scope.logger.warn('Iteration bound reached', { module: module.versionedName, pending: outcome.kind });
        return this.fail(error, iterations);
      }
      iterations++;

      if (outcome.kind === 'continue') {
        if (!module.steps.has(outcome.targetStep)) {
          const message = `Step '${outcome.targetStep}' not found in module ${module.name}`;
          trace.recordStep({ kind: 'error', stepName: outcome.targetStep, module: module.name, error: message });
          return this.fail(new ConfigurationError('STEP_NOT_FOUND', message, module.name), iterations);
        }
        const next = await this.invokeStep(scope, outcome.targetStep, outcome.input);
        if (!next.ok) return this.fail(next.error, iterations);
        outcome = next.outcome;
        continue;
      }

      // delegate
      const target = this.registry.find(outcome.targetAction);
      if (!target.found) {
        const message = `No module found to handle action '${outcome.targetAction}'`;
        trace.recordStep({ kind: 'error', stepName: outcome.targetAction, module: module.name, error: message });
        return this.fail(new ConfigurationError('ACTION_NOT_FOUND', message, module.name), iterations);
      }

      if (scope.depth >= this.maxDepth) {
        const message = `Maximum delegation depth (${this.maxDepth}) exceeded in module ${module.name}`;
        trace.recordStep({ kind: 'error', stepName: outcome.targetAction, module: module.name, error: message });
        scope.logger.warn('Delegation depth reached', { module: module.versionedName, depth: scope.depth });
        return this.fail(new EngineError('DELEGATION_DEPTH', message, module.name), iterations);
      }

      const { payload, continuation } = outcome.input;
      const child = await this.execute(target.module, payload, {}, scope.depth + 1);
      trace.recordDelegation({
        action: outcome.targetAction,
        targetModule: target.module.versionedName,
        input: stringifyContent(payload),
        output: child.text,
        childTraceId: child.trace.traceId,
      });
      this.emit('delegation', scope.runId, outcome.targetAction, target.module, child.text);

      if (continuation === undefined) {
        return { response: respond(child.response.content), error: child.error, iterations };
      }

      const resumed = resumeAfterDelegation(module, continuation, child.response.content);
      if (resumed instanceof ConfigurationError) {
        trace.recordStep({ kind: 'error', stepName: '<resume>', module: module.name, error: resumed.message });
        return this.fail(resumed, iterations);
      }
      outcome = resumed;
    }

    return { response: outcome, error: null, iterations };
  }

  private async invokeStep(scope: RunScope, stepName: string, input: unknown): Promise<StepResult> {
    const { module, trace, logger } = scope;
    const step = module.steps.get(stepName);
    if (step === undefined) {
      return { ok: false, error: new ConfigurationError('STEP_NOT_FOUND', `Step '${stepName}' not found in module ${module.name}`, module.name) };
    }

    trace.recordStep({ kind: 'enter', stepName, module: module.name, input: stringifyContent(input) });
    logger.debug('Entering step', { module: module.versionedName, step: stepName });
    this.emit('step:enter', scope.runId, module, stepName);

    let raw: unknown;
    try {
      raw = await step.invoke(input, scope.context);
    } catch (error) {
      const failure = error instanceof EngineError
        ? error
        : new EngineError('STEP_FAILED', `Step '${stepName}' failed: ${errorMessage(error)}`, module.name, { cause: error });
      trace.recordStep({ kind: 'error', stepName, module: module.name, error: failure.message });
      logger.warn('Step failed', { module: module.versionedName, step: stepName, code: failure.code });
      return { ok: false, error: failure };
    }

    const parsed = StepOutcomeSchema.safeParse(raw);
    if (!parsed.success) {
      const message = `Step '${stepName}' returned an invalid outcome`;
      trace.recordStep({ kind: 'error', stepName, module: module.name, error: message });
      return { ok: false, error: new EngineError('INVALID_OUTCOME', message, module.name, { cause: parsed.error }) };
    }
    const outcome = parsed.data;

    if (outcome.kind === 'response' && step.outputSchema !== null) {
      const checked = step.outputSchema.safeParse(outcome.content);
      if (!checked.success) {
        const message = `Step '${stepName}' produced output that does not match its declared type`;
        trace.recordStep({ kind: 'error', stepName, module: module.name, error: message });
        return { ok: false, error: new EngineError('INVALID_OUTPUT', message, module.name, { cause: checked.error }) };
      }
    }

    trace.recordStep({
      kind: 'exit',
      stepName,
      module: module.name,
      outcome: outcome.kind,
      ...describeOutcome(outcome),
    });
    this.emit('step:exit', scope.runId, module, stepName, outcome);
    return { ok: true, outcome };
  }

  private complete(scope: RunScope, driven: DriveResult): RunResult {
    const text = stringifyContent(driven.response.content);
    const success = driven.error === null;
    const record = scope.trace.finalize(success, text);
    this.persist(record, scope.logger);

    const result: RunResult = {
      runId: scope.runId,
      module: scope.module.versionedName,
      response: driven.response,
      text,
      success,
      error: driven.error,
      iterations: driven.iterations,
      trace: record,
    };

    if (success) {
      scope.logger.info('Run finished', { module: scope.module.versionedName, iterations: driven.iterations });
    } else {
      scope.logger.warn('Run finished with error', { module: scope.module.versionedName, error: text });
    }
    this.emit('run:complete', result);
    return result;
  }

  private rejectUnknownModule(ref: string, input: unknown): RunResult {
    const placeholder: Module = {
      name: ref,
      version: '',
      versionedName: ref,
      description: '',
      longDescription: '',
      steps: new Map(),
      startStep: null,
      reentryStep: null,
      tunables: [],
      configurables: [],
    };
    const runId = createUniqueId(uuidv4());
    const trace = new TraceRecorder(placeholder, stringifyContent(input));
    const logger = this.logger.child({ runId });
    const error = new ConfigurationError('MODULE_NOT_FOUND', `Module ${ref} not found`, ref);
    trace.recordStep({ kind: 'error', stepName: '<lookup>', module: ref, error: error.message });

    const scope: RunScope = {
      runId,
      module: placeholder,
      trace,
      logger,
      depth: 0,
      context: this.createStepContext(runId, placeholder, trace, logger, this.resolver.forModule(placeholder)),
    };
    return this.complete(scope, this.fail(error, 0));
  }

  /**
   * Hands the trace to the sink without waiting for it.
   */
  private persist(trace: RunTrace, logger: Logger): void {
    const meta = { traceId: trace.traceId, sink: this.sink.name };
    const failed = (error: unknown): void => {
      logger.error('Failed to persist trace', meta, error);
    };
    try {
      this.sink.persist(trace)
        .then(() => logger.debug('Trace persisted', meta))
        .catch(failed);
    } catch (error) {
      failed(error);
    }
  }

  private fail(error: EngineError, iterations: number): DriveResult {
    return { response: respond(error.message), error, iterations };
  }

  private createStepContext(
    runId: UniqueId,
    module: Module,
    trace: TraceRecorder,
    logger: Logger,
    config: ConfigView,
  ): StepContext {
    return {
      runId,
      module,
      trace,
      config,
      modules: this.registry,
      logger: logger.child({ module: module.name }),
      generate: (prompt: string, options: GenerateOptions = {}) => generateText({
        backend: this.backend,
        prompt,
        model: options.model ?? this.defaultModel,
        options: {
          temperature: options.temperature ?? this.generation.temperature,
          maxTokens: options.maxTokens ?? this.generation.maxTokens,
        },
        trace,
        logger,
      }),
    };
  }
}

function describeOutcome(outcome: StepOutcome): { target?: string; output?: string } {
  switch (outcome.kind) {
    case 'response':
      return { output: stringifyContent(outcome.content) };
    case 'continue':
      return { target: outcome.targetStep };
    case 'delegate':
      return { target: outcome.targetAction };
  }
}
