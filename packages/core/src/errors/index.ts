import { DepdotErrorCode } from './codes.js';

// Re-export for consumers
export { DepdotErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Base error class for all depdot errors
 */
export class DepdotError extends Error {
  constructor(
    message: string,
    public readonly code: DepdotErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = false,
  ) {
    super(message);
    this.name = 'DepdotError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for machine-readable diagnostics
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

/**
 * Dedent requested with no outstanding indent level.
 */
export class InvalidIndentStateError extends DepdotError {
  constructor(message = 'Cannot dedent below zero', context?: Record<string, unknown>) {
    super(message, DepdotErrorCode.INVALID_INDENT_STATE, context, 'critical');
    this.name = 'InvalidIndentStateError';
  }
}

/**
 * Write attempted on an emitter whose sink was released.
 */
export class EmitterClosedError extends DepdotError {
  constructor(message = 'Cannot write to a closed emitter') {
    super(message, DepdotErrorCode.EMITTER_CLOSED, undefined, 'critical');
    this.name = 'EmitterClosedError';
  }
}

/**
 * Style popped from an empty style stack.
 */
export class StyleStackError extends DepdotError {
  constructor(scope: 'node' | 'edge') {
    super(
      `Cannot pop ${scope} style: style stack is empty`,
      DepdotErrorCode.STYLE_STACK_EMPTY,
      { scope },
      'critical',
    );
    this.name = 'StyleStackError';
  }
}

/**
 * A dependency-listing line that does not follow `name:[deps]`.
 */
export class MalformedInputLineError extends DepdotError {
  constructor(
    message: string,
    public readonly lineNumber: number,
    public readonly line: string,
  ) {
    super(
      `Line ${lineNumber}: ${message}`,
      DepdotErrorCode.MALFORMED_INPUT_LINE,
      { lineNumber, line },
      'high',
    );
    this.name = 'MalformedInputLineError';
  }
}

/**
 * The dependency-listing source could not be run or read.
 */
export class SourceError extends DepdotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, DepdotErrorCode.SOURCE_FAILED, context, 'high');
    this.name = 'SourceError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation)
 */
export class ConfigError extends DepdotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, DepdotErrorCode.CONFIG_INVALID, context, 'medium', true);
    this.name = 'ConfigError';
  }
}

/**
 * Type guard to check if an error is a DepdotError
 */
export function isDepdotError(error: unknown): error is DepdotError {
  return error instanceof DepdotError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract stack trace from unknown error type
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }
  return undefined;
}
