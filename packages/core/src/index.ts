/**
 * @depdot/core - dependency listing to Graphviz DOT
 *
 * This is the public API for:
 * - @depdot/cli (the `depdot` command)
 * - Third-party integrations
 *
 * @example
 * ```typescript
 * import { renderDependencyGraph } from '@depdot/core';
 *
 * const dot = renderDependencyGraph('app:lib\nlib:\n', {
 *   graphAttributes: { rankdir: 'LR' },
 * });
 * ```
 */

// =============================================================================
// GRAPH MODEL
// =============================================================================

export * from './dot/index.js';

// =============================================================================
// DEPENDENCY LISTINGS
// =============================================================================

export * from './deps/index.js';

// =============================================================================
// ERRORS
// =============================================================================

export {
  DepdotError,
  DepdotErrorCode,
  InvalidIndentStateError,
  EmitterClosedError,
  StyleStackError,
  MalformedInputLineError,
  SourceError,
  ConfigError,
  isDepdotError,
  getErrorMessage,
  getErrorStack,
} from './errors/index.js';
export type { ErrorSeverity } from './errors/index.js';

// =============================================================================
// UTILITIES
// =============================================================================

export type { Logger } from './logger.js';
export { silentLogger, createStderrLogger } from './logger.js';
export type { Result } from './utils/result.js';
export { Ok, Err, isOk, isErr, unwrap } from './utils/result.js';
