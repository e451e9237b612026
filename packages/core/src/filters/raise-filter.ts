import { hasError, type Context } from '../core/context.js';
import { Filter } from '../core/filter.js';
import { failure, noMatch, type Outcome } from '../types/outcome.js';

/**
 * Fails again with the error in context; no match when there is none.
 * Put under the OR side of a CATCH edge to re-raise what the catch rejected.
 */
export class RaiseFilter extends Filter {
  readonly kind = 'RaiseFilter';

  protected fields(): readonly unknown[] {
    return [];
  }

  evaluate(ctx: Context): Outcome {
    return hasError(ctx) ? failure(ctx.error) : noMatch();
  }
}

export function raise(): RaiseFilter {
  return new RaiseFilter();
}
