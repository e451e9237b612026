import type { Context } from '../core/context.js';
import { Filter } from '../core/filter.js';
import { noMatch, proceed, type Outcome } from '../types/outcome.js';

export type ContextPredicate = (ctx: Context) => boolean;

export class PredicateFilter extends Filter {
  readonly kind = 'PredicateFilter';

  constructor(public readonly predicate: ContextPredicate) {
    super();
  }

  protected fields(): readonly unknown[] {
    return [this.predicate];
  }

  evaluate(ctx: Context): Outcome {
    return this.predicate(ctx) ? proceed() : noMatch();
  }

  override describe(): string {
    return `PredicateFilter(${this.predicate.name || 'anonymous'})`;
  }
}

export function predicate(fn: ContextPredicate): PredicateFilter {
  return new PredicateFilter(fn);
}
