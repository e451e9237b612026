import type { Context } from '../core/context.js';
import { Filter } from '../core/filter.js';
import type { Outcome } from '../types/outcome.js';

export type FilterFunction = (ctx: Context) => Outcome | Promise<Outcome>;

/**
 * Delegates to a user function with the filter contract. Two FuncFilters
 * are equal only when they wrap the same function object.
 */
export class FuncFilter extends Filter {
  readonly kind = 'FuncFilter';

  constructor(public readonly fn: FilterFunction) {
    super();
  }

  protected fields(): readonly unknown[] {
    return [this.fn];
  }

  evaluate(ctx: Context): Outcome | Promise<Outcome> {
    return this.fn(ctx);
  }

  override describe(): string {
    return `FuncFilter(${this.fn.name || 'anonymous'})`;
  }
}

export function func(fn: FilterFunction): FuncFilter {
  return new FuncFilter(fn);
}
