/**
 * Error codes for all depdot errors.
 * Used to identify error types programmatically.
 */
export enum DepdotErrorCode {
  // Emitter
  INVALID_INDENT_STATE = 'INVALID_INDENT_STATE',
  EMITTER_CLOSED = 'EMITTER_CLOSED',

  // Graph model
  STYLE_STACK_EMPTY = 'STYLE_STACK_EMPTY',

  // Input
  MALFORMED_INPUT_LINE = 'MALFORMED_INPUT_LINE',
  SOURCE_FAILED = 'SOURCE_FAILED',

  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
