import type { Filter } from '../core/filter.js';
import { DispatchNode } from './dispatch-node.js';
import { Combinator, type PathStep } from './types.js';

/**
 * Fluent builder for dispatch paths.
 *
 * Builders are immutable, so a shared prefix can be kept in a variable and
 * finished in several ways:
 *
 * ```ts
 * const messages = path().and(typeIs(Message));
 * messages.and(func(onMessage)).end(tree);
 * messages.and(func(audit)).catch(errorIs(TypeError)).and(func(report)).end(tree);
 * ```
 */
export class PathBuilder {
  constructor(private readonly accumulated: readonly PathStep[] = []) {}

  op(combinator: Combinator, filter: Filter, subtree?: DispatchNode): PathBuilder {
    const step: PathStep = subtree ? { combinator, filter, subtree } : { combinator, filter };
    return new PathBuilder([...this.accumulated, step]);
  }

  and(filter: Filter, subtree?: DispatchNode): PathBuilder {
    return this.op(Combinator.AND, filter, subtree);
  }

  or(filter: Filter, subtree?: DispatchNode): PathBuilder {
    return this.op(Combinator.OR, filter, subtree);
  }

  catch(filter: Filter, subtree?: DispatchNode): PathBuilder {
    return this.op(Combinator.CATCH, filter, subtree);
  }

  steps(): readonly PathStep[] {
    return this.accumulated;
  }

  /**
   * Materialize the path into `tree` (a new empty tree by default).
   */
  end(tree: DispatchNode = new DispatchNode()): DispatchNode {
    return tree.extend(this.accumulated);
  }
}

export function path(): PathBuilder {
  return new PathBuilder();
}
