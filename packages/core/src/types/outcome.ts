/**
 * Outcome of evaluating a filter against a context.
 * Three variants: the path continues (with a context delta), the filter does
 * not match, or the filter failed with an opaque error value.
 */

export type ContextDelta = Readonly<Record<string, unknown>>;

export type Outcome = Continue | NoMatch | Failure;

/**
 * The path continues; `delta` is merged into the context for the children.
 */
export class Continue {
  readonly _tag = 'Continue' as const;

  constructor(public readonly delta: ContextDelta = {}) {}
}

/**
 * The filter did not match. Expected control flow, not an error.
 */
export class NoMatch {
  readonly _tag = 'NoMatch' as const;
}

/**
 * The filter failed. `error` is kept as-is, never wrapped.
 */
export class Failure {
  readonly _tag = 'Failure' as const;

  constructor(public readonly error: unknown) {}
}

const NO_MATCH = new NoMatch();

export function proceed(delta: ContextDelta = {}): Continue {
  return new Continue(delta);
}

export function noMatch(): NoMatch {
  return NO_MATCH;
}

export function failure(error: unknown): Failure {
  return new Failure(error);
}

export function isContinue(outcome: Outcome): outcome is Continue {
  return outcome._tag === 'Continue';
}

export function isNoMatch(outcome: Outcome): outcome is NoMatch {
  return outcome._tag === 'NoMatch';
}

export function isFailure(outcome: Outcome): outcome is Failure {
  return outcome._tag === 'Failure';
}

/**
 * Narrow an arbitrary value returned by user code to an Outcome.
 */
export function isOutcome(value: unknown): value is Outcome {
  return (
    value instanceof Continue ||
    value instanceof NoMatch ||
    value instanceof Failure
  );
}
