/**
 * @fileoverview Structured, leveled logger.
 *
 * Entries are plain JSON-serializable records carrying the emitting module
 * and, inside a run, the run ID so that logs from nested delegations can be
 * told apart.
 *
 * @module stepgraph/observability/logger
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;
  /** Component that generated the log, e.g. `engine` */
  readonly module: string;
  readonly runId: UniqueId | null;
  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
}

export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  readonly code: string | undefined;
}

export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  readonly minLevel: Severity;
  readonly module: string;
  readonly transports: ReadonlyArray<LogTransport>;
  readonly runId?: UniqueId | undefined;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

/**
 * Parses a level name case-insensitively, falling back to INFO.
 */
export function parseSeverity(value: string | undefined): Severity {
  const upper = value?.toUpperCase();
  switch (upper) {
    case 'DEBUG': return Severity.DEBUG;
    case 'WARN':
    case 'WARNING': return Severity.WARN;
    case 'ERROR': return Severity.ERROR;
    case 'FATAL': return Severity.FATAL;
    default: return Severity.INFO;
  }
}

/**
 * Writes to stderr so that a CLI run's answer on stdout stays clean.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  constructor(private readonly useColors: boolean = process.stderr.isTTY === true) {}

  write(entry: LogEntry): void {
    const time = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);
    const prefix = this.useColors
      ? `\x1b[90m${time}\x1b[0m ${LEVEL_COLORS[entry.level]}${level}\x1b[0m \x1b[36m[${entry.module}]\x1b[0m`
      : `${time} ${level} [${entry.module}]`;
    const data = Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
    const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : '';

    process.stderr.write(`${prefix} ${entry.message}${data}${error}\n`);
  }
}

const LEVEL_COLORS: Record<Severity, string> = {
  DEBUG: '\x1b[90m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
};

/**
 * Keeps entries in memory; used by tests and for post-run inspection.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];

  constructor(private readonly maxEntries: number = 1000) {}

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }

  findByRunId(runId: UniqueId): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.runId === runId);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * @example
 * ```typescript
 * const logger = createLogger('engine', { minLevel: Severity.DEBUG });
 * logger.info('Run started', { module: 'stepgraph/react' });
 * logger.error('Trace persistence failed', { traceId }, error);
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const transports = config.transports && config.transports.length > 0
      ? config.transports
      : [new ConsoleTransport()];
    this.config = {
      minLevel: config.minLevel ?? Severity.INFO,
      module: config.module ?? 'stepgraph',
      transports,
      runId: config.runId,
    };
  }

  /**
   * Creates a logger sharing this one's transports and level.
   */
  child(context: { module?: string; runId?: UniqueId }): Logger {
    return new Logger({
      ...this.config,
      module: context.module ?? this.config.module,
      runId: context.runId ?? this.config.runId,
    });
  }

  get level(): Severity {
    return this.config.minLevel;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.WARN, message, data);
  }

  error(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.FATAL, message, data, error);
  }

  private log(level: Severity, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (SEVERITY_ORDER[level] < SEVERITY_ORDER[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      runId: this.config.runId ?? null,
      data: data ?? {},
      error: error === undefined ? null : formatError(error),
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        process.stderr.write(`Logger transport '${transport.name}' failed: ${String(transportError)}\n`);
      }
    }
  }
}

function formatError(error: unknown): LogError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { name: error.name, message: error.message, stack: error.stack, code };
  }
  return { name: 'Error', message: String(error), stack: undefined, code: undefined };
}

/**
 * Creates a logger for a specific component.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}
