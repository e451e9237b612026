import type { Context } from '../core/context.js';
import { Filter } from '../core/filter.js';
import { proceed, type Outcome } from '../types/outcome.js';

/**
 * Always continues with an empty delta. Used as the root edge of every
 * publish.
 */
export class UnitFilter extends Filter {
  readonly kind = 'UnitFilter';

  protected fields(): readonly unknown[] {
    return [];
  }

  evaluate(_ctx: Context): Outcome {
    return proceed();
  }
}

export function unit(): UnitFilter {
  return new UnitFilter();
}
