import type { Context } from '../core/context.js';
import { Filter } from '../core/filter.js';
import { noMatch, proceed, type Outcome } from '../types/outcome.js';

/**
 * Anything usable on the right of `instanceof`, plus the wrapper
 * constructors of the primitive types.
 */
export type EventType =
  | (abstract new (...args: never[]) => unknown)
  | BigIntConstructor
  | SymbolConstructor;

const PRIMITIVE_TYPEOF = new Map<EventType, string>([
  [String, 'string'],
  [Number, 'number'],
  [Boolean, 'boolean'],
  [BigInt, 'bigint'],
  [Symbol, 'symbol'],
]);

/**
 * `typeIs(String)` matches `"x"` as well as `new String("x")`.
 */
export function isInstanceOf(value: unknown, target: EventType): boolean {
  const primitive = PRIMITIVE_TYPEOF.get(target);
  if (primitive !== undefined && typeof value === primitive) {
    return true;
  }
  return value instanceof target;
}

/**
 * Continues when the event is an instance of `target`.
 */
export class TypeFilter extends Filter {
  readonly kind = 'TypeFilter';

  constructor(public readonly target: EventType) {
    super();
  }

  protected fields(): readonly unknown[] {
    return [this.target];
  }

  evaluate(ctx: Context): Outcome {
    return isInstanceOf(ctx.event, this.target) ? proceed() : noMatch();
  }

  override describe(): string {
    return `TypeFilter(${this.target.name})`;
  }
}

export function typeIs(target: EventType): TypeFilter {
  return new TypeFilter(target);
}
