import { hasError, type Context } from '../core/context.js';
import { Filter } from '../core/filter.js';
import { noMatch, proceed, type Outcome } from '../types/outcome.js';
import { isInstanceOf, type EventType } from './type-filter.js';

/**
 * Continues when the context carries an error that is an instance of
 * `target`. Meant for CATCH edges.
 */
export class ErrorTypeFilter extends Filter {
  readonly kind = 'ErrorTypeFilter';

  constructor(public readonly target: EventType) {
    super();
  }

  protected fields(): readonly unknown[] {
    return [this.target];
  }

  evaluate(ctx: Context): Outcome {
    return hasError(ctx) && isInstanceOf(ctx.error, this.target)
      ? proceed()
      : noMatch();
  }

  override describe(): string {
    return `ErrorTypeFilter(${this.target.name})`;
  }
}

export function errorIs(target: EventType): ErrorTypeFilter {
  return new ErrorTypeFilter(target);
}
