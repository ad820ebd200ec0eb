/**
 * @fileoverview Observability module public exports.
 *
 * @module stepgraph/observability
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  parseSeverity,
  type LogEntry,
  type LogError,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';

export {
  TraceRecorder,
  FileTraceSink,
  MemoryTraceSink,
  NullTraceSink,
  type RunTrace,
  type StepEvent,
  type StepEventKind,
  type GenerationEvent,
  type DelegationEvent,
  type TraceSink,
} from './trace-recorder.js';
