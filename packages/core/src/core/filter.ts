import type { Context } from './context.js';
import type { Outcome } from '../types/outcome.js';
import { structuralKey } from '../util/struct-key.js';

/**
 * # Filter
 *
 * The unit of computation on a dispatch path. Given a context, a filter
 * continues (optionally adding keys), does not match, or fails.
 *
 * Filters are value objects: two filters are equal when they have the same
 * `kind` and structurally equal `fields()`. Within one node and combinator the
 * tree keeps at most one edge per equal filter, so equal filters must behave
 * identically; the engine relies on it without checking.
 *
 * Failing can be done by returning `failure(err)`, by throwing, or by
 * rejecting; the engine handles the three the same way.
 */
export abstract class Filter {
  abstract readonly kind: string;

  #key: string | undefined;

  /**
   * The constructor arguments that define this filter's identity.
   */
  protected abstract fields(): readonly unknown[];

  abstract evaluate(ctx: Context): Outcome | Promise<Outcome>;

  get key(): string {
    if (this.#key === undefined) {
      this.#key = structuralKey(this.kind, this.fields());
    }
    return this.#key;
  }

  equals(other: Filter): boolean {
    return this === other || this.key === other.key;
  }

  /** Short label for traces and tree outlines. */
  describe(): string {
    return this.kind;
  }
}

export function isFilter(value: unknown): value is Filter {
  return value instanceof Filter;
}
