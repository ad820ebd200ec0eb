/**
 * @fileoverview Trace Recorder - append-only record of one module run.
 *
 * A trace holds three ordered logs: step events, generation calls and
 * delegations to other modules. It is created when a run starts and
 * finalized on every exit path, after which it is handed to a
 * {@link TraceSink}.
 *
 * @module stepgraph/observability/trace-recorder
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { createTimestamp, createUniqueId } from '../types/core.types.js';

export type StepEventKind = 'enter' | 'exit' | 'error';

export interface StepEvent {
  readonly timestamp: Timestamp;
  readonly kind: StepEventKind;
  readonly stepName: string;
  readonly module: string;
  readonly input?: string;
  /** Outcome kind on exit */
  readonly outcome?: string;
  /** Step or action named by a continue/delegate outcome */
  readonly target?: string;
  readonly output?: string;
  readonly error?: string;
}

export interface GenerationEvent {
  readonly timestamp: Timestamp;
  readonly model: string;
  readonly prompt: string;
  readonly promptLength: number;
  readonly response: string | null;
  readonly responseLength: number | null;
  readonly error: string | null;
  readonly durationMs: number;
}

export interface DelegationEvent {
  readonly timestamp: Timestamp;
  readonly action: string;
  readonly targetModule: string;
  readonly input: string;
  readonly output: string;
  /** Trace ID of the delegated run */
  readonly childTraceId: UniqueId;
}

export interface RunTrace {
  readonly traceId: UniqueId;
  readonly moduleName: string;
  readonly moduleVersion: string;
  readonly input: string;
  readonly startedAt: Timestamp;
  readonly endedAt: Timestamp | null;
  readonly success: boolean | null;
  readonly output: string | null;
  readonly steps: ReadonlyArray<StepEvent>;
  readonly generationCalls: ReadonlyArray<GenerationEvent>;
  readonly delegations: ReadonlyArray<DelegationEvent>;
}

type Timeless<T> = Omit<T, 'timestamp'>;

/**
 * Records the events of a single run.
 *
 * @example
 * ```typescript
 * const trace = new TraceRecorder({ name: 'stepgraph/react', version: '0.1.0' }, 'What is 2+2?');
 * trace.recordStep({ kind: 'enter', stepName: 'react_starter', module: 'stepgraph/react' });
 * const record = trace.finalize(true, '4');
 * ```
 */
export class TraceRecorder {
  private readonly traceId: UniqueId;
  private readonly startedAt: Timestamp;
  private readonly steps: StepEvent[] = [];
  private readonly generationCalls: GenerationEvent[] = [];
  private readonly delegations: DelegationEvent[] = [];
  private final: { endedAt: Timestamp; success: boolean; output: string } | null = null;

  constructor(
    private readonly module: { readonly name: string; readonly version: string },
    private readonly input: string,
  ) {
    this.traceId = createUniqueId(uuidv4());
    this.startedAt = createTimestamp();
  }

  getTraceId(): UniqueId {
    return this.traceId;
  }

  isFinalized(): boolean {
    return this.final !== null;
  }

  recordStep(event: Timeless<StepEvent>): void {
    this.steps.push({ timestamp: createTimestamp(), ...event });
  }

  recordGeneration(event: Timeless<GenerationEvent>): void {
    this.generationCalls.push({ timestamp: createTimestamp(), ...event });
  }

  recordDelegation(event: Timeless<DelegationEvent>): void {
    this.delegations.push({ timestamp: createTimestamp(), ...event });
  }

  /**
   * Stamps the end time and final output. Later calls keep the first result.
   */
  finalize(success: boolean, output: string): RunTrace {
    if (this.final === null) {
      this.final = { endedAt: createTimestamp(), success, output };
    }
    return this.snapshot();
  }

  snapshot(): RunTrace {
    return {
      traceId: this.traceId,
      moduleName: this.module.name,
      moduleVersion: this.module.version,
      input: this.input,
      startedAt: this.startedAt,
      endedAt: this.final?.endedAt ?? null,
      success: this.final?.success ?? null,
      output: this.final?.output ?? null,
      steps: [...this.steps],
      generationCalls: [...this.generationCalls],
      delegations: [...this.delegations],
    };
  }
}

/**
 * Destination for finished traces.
 */
export interface TraceSink {
  readonly name: string;
  persist(trace: RunTrace): Promise<void>;
}

/**
 * Writes each trace as pretty-printed JSON named
 * `trace_<id>_<YYYYMMDD_HHMMSS>.json`.
 */
export class FileTraceSink implements TraceSink {
  readonly name = 'file';

  constructor(private readonly directory: string) {}

  fileNameFor(trace: RunTrace): string {
    return `trace_${trace.traceId}_${formatFileTime(trace.startedAt)}.json`;
  }

  async persist(trace: RunTrace): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const body = {
      ...trace,
      startTime: new Date(trace.startedAt).toISOString(),
      endTime: trace.endedAt === null ? null : new Date(trace.endedAt).toISOString(),
    };
    await writeFile(join(this.directory, this.fileNameFor(trace)), JSON.stringify(body, null, 2), 'utf-8');
  }
}

export class MemoryTraceSink implements TraceSink {
  readonly name = 'memory';

  private readonly traces: RunTrace[] = [];

  persist(trace: RunTrace): Promise<void> {
    this.traces.push(trace);
    return Promise.resolve();
  }

  getTraces(): ReadonlyArray<RunTrace> {
    return [...this.traces];
  }

  findByModule(moduleName: string): ReadonlyArray<RunTrace> {
    return this.traces.filter(t => t.moduleName === moduleName);
  }
}

export class NullTraceSink implements TraceSink {
  readonly name = 'null';

  persist(): Promise<void> {
    return Promise.resolve();
  }
}

function formatFileTime(timestamp: Timestamp): string {
  const d = new Date(timestamp);
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}
