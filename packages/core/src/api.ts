import { ErrorStack } from './dispatch/error-stack.js';
import { dispatch, type DispatchRun } from './dispatch/run.js';
import { DispatchNode } from './tree/dispatch-node.js';
import type { PathBuilder } from './tree/path-builder.js';
import {
  resolveOptions,
  type ResolvedOptions,
  type SluiceOptions,
} from './types/options.js';
import { createDebugLogger, type DebugLogger } from './util/debug.js';
import { MetricsCollector, type MetricsSnapshot } from './util/metrics.js';

export type UncaughtHandler = (error: unknown) => void | Promise<void>;

/**
 * Facade owning one dispatch tree and an optional sink for failures no CATCH
 * edge retracted.
 *
 * Register every path before publishing, or between publishes: the tree must
 * not change while a publish is in flight.
 */
export class Sluice {
  public readonly options: ResolvedOptions;
  readonly #metrics: MetricsCollector;
  readonly #logger: DebugLogger;

  /**
   * @throws {ConfigError} When options are invalid
   */
  constructor(
    public readonly tree: DispatchNode = new DispatchNode(),
    private readonly onUncaught?: UncaughtHandler,
    options: SluiceOptions = {}
  ) {
    this.options = resolveOptions(options);
    this.#metrics = new MetricsCollector({
      enabled: this.options.metrics.enabled,
    });
    this.#logger = createDebugLogger(this.options);
  }

  /**
   * Dispatch one event through the tree. Resolves after every branch has
   * finished and, when a sink is set, after it has been awaited once per
   * uncaught failure, most recent first. A sink that throws rejects this
   * promise and the remaining failures are not delivered.
   */
  async publish(event: unknown): Promise<void> {
    const run: DispatchRun = {
      caught: new ErrorStack(),
      options: this.options,
      metrics: this.#metrics,
      logger: this.#logger,
    };

    this.#logger.publish(event);
    const finish = this.#metrics.beginDispatch();
    try {
      await dispatch(this.tree, event, run);
    } finally {
      finish();
    }

    const uncaught = run.caught.drainNewestFirst();
    this.#metrics.addUncaught(uncaught.length);
    this.#logger.done(uncaught.length);

    for (const error of uncaught) {
      this.#logger.uncaught(error);
      if (this.onUncaught) {
        await this.onUncaught(error);
      }
    }
  }

  /** Add the builder's path to this facade's tree. */
  register(builder: PathBuilder): this {
    builder.end(this.tree);
    return this;
  }

  metrics(): MetricsSnapshot {
    return this.#metrics.snapshotMetrics();
  }
}

export interface CreateSluiceParams {
  tree?: DispatchNode;
  onUncaught?: UncaughtHandler;
  options?: SluiceOptions;
}

export function createSluice(params: CreateSluiceParams = {}): Sluice {
  return new Sluice(params.tree, params.onUncaught, params.options);
}
