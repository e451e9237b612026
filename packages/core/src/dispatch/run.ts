import {
  createContext,
  isolate,
  mergeContext,
  reservedKeysIn,
  withError,
  type Context,
} from '../core/context.js';
import type { Filter } from '../core/filter.js';
import { UnitFilter } from '../filters/unit.js';
import type { DispatchNode } from '../tree/dispatch-node.js';
import type { EdgeMap } from '../tree/edge-map.js';
import { Combinator, type Edge } from '../tree/types.js';
import {
  InvalidOutcomeError,
  ReservedContextKeyError,
} from '../types/errors.js';
import {
  DEFAULT_OPTIONS,
  type ResolvedOptions,
} from '../types/options.js';
import {
  failure,
  isOutcome,
  type Outcome,
} from '../types/outcome.js';
import { createDebugLogger, type DebugLogger } from '../util/debug.js';
import { MetricsCollector } from '../util/metrics.js';
import { ErrorStack } from './error-stack.js';

/**
 * State shared by every branch of one publish.
 */
export interface DispatchRun {
  readonly caught: ErrorStack;
  readonly options: ResolvedOptions;
  readonly metrics: MetricsCollector;
  readonly logger: DebugLogger;
}

export function createDispatchRun(
  parts: Partial<DispatchRun> = {}
): DispatchRun {
  const options = parts.options ?? DEFAULT_OPTIONS;
  return {
    caught: parts.caught ?? new ErrorStack(),
    options,
    metrics:
      parts.metrics ?? new MetricsCollector({ enabled: options.metrics.enabled }),
    logger: parts.logger ?? createDebugLogger(options),
  };
}

const ROOT_FILTER = new UnitFilter();

/**
 * Walk `tree` for one event. Resolves once every reachable branch has
 * finished; failures that were not retracted stay on `run.caught`.
 */
export async function dispatch(
  tree: DispatchNode,
  event: unknown,
  run: DispatchRun
): Promise<void> {
  await fanOut(run, [runAnd(tree, ROOT_FILTER, createContext(event), run)]);
}

/**
 * Evaluate the edge filter that led to `node`, then fan out by outcome:
 * - Continue: AND children (evaluated) and OR children (skipped) get the merged context
 * - NoMatch: only OR children are evaluated, each with an isolated copy
 * - Failure: the error is pushed, every child runs with `error` in context,
 *   and if the node declares any CATCH edge the last stack entry is popped
 *   once the CATCH branches finish, whether or not they matched
 */
export async function runAnd(
  node: DispatchNode,
  filter: Filter,
  ctx: Context,
  run: DispatchRun,
  depth = 0
): Promise<void> {
  const outcome = await evaluate(filter, ctx, run, depth);
  const next = depth + 1;

  switch (outcome._tag) {
    case 'Continue': {
      const merged = mergeContext(ctx, outcome.delta);
      await fanOut(run, [
        ...mapEdges(node.edges(Combinator.AND), (edge) =>
          runAnd(edge.cell.view(), edge.filter, merged, run, next)
        ),
        ...mapEdges(node.edges(Combinator.OR), (edge) =>
          runOr(edge.cell.view(), merged, run, next)
        ),
      ]);
      return;
    }
    case 'NoMatch': {
      await fanOut(
        run,
        mapEdges(node.edges(Combinator.OR), (edge) =>
          runAnd(edge.cell.view(), edge.filter, isolate(ctx), run, next)
        )
      );
      return;
    }
    case 'Failure': {
      run.caught.push(outcome.error);
      run.logger.pushed(depth, run.caught.size);
      const errCtx = withError(ctx, outcome.error);

      const rest = fanOut(run, [
        ...mapEdges(node.edges(Combinator.AND), (edge) =>
          runAnd(edge.cell.view(), edge.filter, errCtx, run, next)
        ),
        ...mapEdges(node.edges(Combinator.OR), (edge) =>
          runOr(edge.cell.view(), errCtx, run, next)
        ),
      ]);

      const catches = node.edges(Combinator.CATCH);
      if (catches.size > 0) {
        await fanOut(
          run,
          mapEdges(catches, (edge) =>
            runAnd(edge.cell.view(), edge.filter, errCtx, run, next)
          )
        );
        run.caught.pop();
        run.metrics.addSuppressed();
        run.logger.popped(depth, run.caught.size);
      }
      await rest;
      return;
    }
  }
}

/**
 * Entered through an OR edge on the success side: the node's own filter is
 * skipped and its AND children are evaluated with isolated copies.
 */
export async function runOr(
  node: DispatchNode,
  ctx: Context,
  run: DispatchRun,
  depth = 0
): Promise<void> {
  await fanOut(
    run,
    mapEdges(node.edges(Combinator.AND), (edge) =>
      runAnd(edge.cell.view(), edge.filter, isolate(ctx), run, depth + 1)
    )
  );
}

/**
 * Skip this node and its AND/OR descendants without evaluating them, while
 * keeping CATCH edges further down reachable.
 */
export async function runCatch(
  node: DispatchNode,
  ctx: Context,
  run: DispatchRun,
  depth = 0
): Promise<void> {
  const next = depth + 1;
  await fanOut(run, [
    ...mapEdges(node.edges(Combinator.AND), (edge) =>
      runCatch(edge.cell.view(), isolate(ctx), run, next)
    ),
    ...mapEdges(node.edges(Combinator.OR), (edge) =>
      runCatch(edge.cell.view(), isolate(ctx), run, next)
    ),
    ...mapEdges(node.edges(Combinator.CATCH), (edge) =>
      runAnd(edge.cell.view(), edge.filter, isolate(ctx), run, next)
    ),
  ]);
}

async function evaluate(
  filter: Filter,
  ctx: Context,
  run: DispatchRun,
  depth: number
): Promise<Outcome> {
  let outcome: Outcome;
  try {
    const result: unknown = await filter.evaluate(isolate(ctx));
    outcome = isOutcome(result)
      ? result
      : failure(new InvalidOutcomeError({ filter: filter.key, value: result }));
  } catch (error) {
    outcome = failure(error);
  }

  if (outcome._tag === 'Continue' && run.options.reservedKeyPolicy === 'fail') {
    const keys = reservedKeysIn(outcome.delta);
    if (keys.length > 0) {
      outcome = failure(new ReservedContextKeyError({ filter: filter.key, keys }));
    }
  }

  run.metrics.recordOutcome(outcome);
  run.logger.outcome(depth, filter.describe(), outcome);
  return outcome;
}

function mapEdges(
  edges: EdgeMap,
  fn: (edge: Edge) => Promise<void>
): Array<Promise<void>> {
  return [...edges].map(fn);
}

/**
 * Join sibling branches. A branch never rejects on a filter failure; anything
 * else that escapes one (a throwing trace writer, say) is recorded as a
 * failure instead of reaching the caller.
 */
async function fanOut(
  run: DispatchRun,
  branches: Array<Promise<void>>
): Promise<void> {
  await Promise.all(
    branches.map((branch) =>
      branch.catch((error: unknown) => {
        run.caught.push(error);
      })
    )
  );
}
