/**
 * @fileoverview Error taxonomy for module execution.
 *
 * The engine never lets these escape a run: each one is converted into a
 * terminal response whose content is the error message. The error object
 * itself stays available on the run result for callers that want the code.
 *
 * @module stepgraph/types/errors
 */

/**
 * Machine-readable failure codes.
 */
export type EngineErrorCode =
  | 'NO_START_STEP'
  | 'STEP_NOT_FOUND'
  | 'ACTION_NOT_FOUND'
  | 'MODULE_NOT_FOUND'
  | 'NO_REENTRY_STEP'
  | 'ITERATION_LIMIT'
  | 'DELEGATION_DEPTH'
  | 'INVALID_INPUT'
  | 'INVALID_OUTCOME'
  | 'INVALID_OUTPUT'
  | 'STEP_FAILED';

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly moduleName: string | null;

  constructor(code: EngineErrorCode, message: string, moduleName: string | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
    this.moduleName = moduleName;
  }
}

/**
 * Raised for problems in how a module or its configuration is put together:
 * a missing start step, an unknown step or action, no re-entry step.
 */
export class ConfigurationError extends EngineError {
  constructor(code: EngineErrorCode, message: string, moduleName: string | null = null) {
    super(code, message, moduleName);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown by a step wrapper when the input does not satisfy the step's schema.
 */
export class StepInputError extends EngineError {
  readonly stepName: string;

  constructor(stepName: string, issues: string, moduleName: string | null = null) {
    super('INVALID_INPUT', `Invalid input for step '${stepName}': ${issues}`, moduleName);
    this.name = 'StepInputError';
    this.stepName = stepName;
  }
}

/**
 * Formats an unknown thrown value into a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
