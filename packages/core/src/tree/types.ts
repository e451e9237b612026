import type { Filter } from '../core/filter.js';
import type { CowCell } from './cow-cell.js';
import type { DispatchNode } from './dispatch-node.js';

/**
 * Edge kind: how a child is reached relative to its parent's outcome.
 */
export enum Combinator {
  AND = 'and',
  OR = 'or',
  CATCH = 'catch',
}

export const COMBINATORS: readonly Combinator[] = [
  Combinator.AND,
  Combinator.OR,
  Combinator.CATCH,
];

export function isCombinator(value: unknown): value is Combinator {
  return COMBINATORS.some((combinator) => combinator === value);
}

export interface Edge {
  readonly filter: Filter;
  readonly cell: CowCell<DispatchNode>;
}

/**
 * One step of a dispatch path. When `subtree` is given and the edge does not
 * exist yet, the subtree is attached shared instead of a fresh empty node.
 */
export interface PathStep {
  readonly combinator: Combinator;
  readonly filter: Filter;
  readonly subtree?: DispatchNode;
}
