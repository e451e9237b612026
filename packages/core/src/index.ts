// @sluice/core entry point
//
// Public API:
// - Sluice / createSluice: the facade that owns a tree and publishes events.
// - DispatchNode, PathBuilder, path(), Combinator: building the dispatch tree.
// - Filter, Outcome helpers and the builtin filters.
// - runAnd / runOr / runCatch for embedding the traversal directly.

export { Sluice, createSluice, type CreateSluiceParams, type UncaughtHandler } from './api.js';

// Filters and outcomes
export { Filter, isFilter } from './core/filter.js';
export {
  createContext,
  isolate,
  mergeContext,
  withError,
  hasError,
  isReservedKey,
  RESERVED_KEYS,
  type Context,
  type ReservedKey,
} from './core/context.js';
export {
  Continue,
  NoMatch,
  Failure,
  proceed,
  noMatch,
  failure,
  isContinue,
  isNoMatch,
  isFailure,
  isOutcome,
  type Outcome,
  type ContextDelta,
} from './types/outcome.js';
export * from './filters/index.js';

// Tree
export { CowCell, type Cloneable } from './tree/cow-cell.js';
export { DispatchNode } from './tree/dispatch-node.js';
export { EdgeMap } from './tree/edge-map.js';
export { PathBuilder, path } from './tree/path-builder.js';
export { renderTree } from './tree/render.js';
export {
  Combinator,
  COMBINATORS,
  isCombinator,
  type Edge,
  type PathStep,
} from './tree/types.js';

// Dispatch
export { ErrorStack } from './dispatch/error-stack.js';
export {
  dispatch,
  runAnd,
  runOr,
  runCatch,
  createDispatchRun,
  type DispatchRun,
} from './dispatch/run.js';

// Errors
export { ErrorCode, type Severity, getDefaultSeverity } from './errors/codes.js';
export {
  ErrorPresenter,
  type LogErrorView,
  type ProductionView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  SluiceError,
  PathError,
  ReservedContextKeyError,
  InvalidOutcomeError,
  SchemaFilterError,
  ConfigError,
  isSluiceError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';

// Options, metrics, tracing
export {
  resolveOptions,
  DEFAULT_OPTIONS,
  type SluiceOptions,
  type ResolvedOptions,
  type ReservedKeyPolicy,
  type MetricsOptions,
  type LogWriter,
} from './types/options.js';
export {
  MetricsCollector,
  type MetricsSnapshot,
  type MetricsCollectorOptions,
} from './util/metrics.js';
export { createDebugLogger, NOOP_LOGGER, type DebugLogger } from './util/debug.js';
export type { EventSchema } from './util/validator-cache.js';
