/**
 * @fileoverview Core primitives shared by every part of the stepgraph runtime.
 *
 * Identifiers and timestamps are branded so that a raw string or number
 * cannot be passed where a run ID or a recorded instant is expected.
 *
 * @module stepgraph/types/core
 */

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Severity levels for logging and error reporting.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp, defaulting to the current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}

/**
 * Renders a value the way it is shown to a model or written into a trace:
 * strings pass through, everything else is JSON-encoded where possible.
 */
export function stringifyContent(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  try {
    const encoded = JSON.stringify(value);
    return encoded ?? String(value);
  } catch {
    return String(value);
  }
}
