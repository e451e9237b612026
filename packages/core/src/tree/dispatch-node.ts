import { isFilter } from '../core/filter.js';
import { ErrorCode } from '../errors/codes.js';
import { PathError } from '../types/errors.js';
import { CowCell, type Cloneable } from './cow-cell.js';
import { EdgeMap } from './edge-map.js';
import { Combinator, isCombinator, type PathStep } from './types.js';

/**
 * # DispatchNode
 *
 * A node of the dispatch tree. Each node holds one edge map per combinator;
 * every root-to-leaf sequence of edges is a dispatch path.
 *
 * Descendants may be shared between several parents (a pre-built subtree
 * attached under two paths). Sharing is tracked by the CowCell on each edge:
 * `extend` clones a shared node before writing into it, so one path growing
 * never changes what another path sees.
 *
 * Nodes are only mutated through `extend`. Concurrent `extend` calls, or an
 * `extend` while a publish is walking the same tree, are not supported.
 */
export class DispatchNode implements Cloneable<DispatchNode> {
  private ands = new EdgeMap();
  private ors = new EdgeMap();
  private catches = new EdgeMap();

  edges(combinator: Combinator): EdgeMap {
    switch (combinator) {
      case Combinator.AND:
        return this.ands;
      case Combinator.OR:
        return this.ors;
      case Combinator.CATCH:
        return this.catches;
    }
  }

  isEmpty(): boolean {
    return this.ands.size === 0 && this.ors.size === 0 && this.catches.size === 0;
  }

  /**
   * Fresh node whose children are shared with this one.
   */
  clone(): DispatchNode {
    const node = new DispatchNode();
    node.ands = this.ands.clone();
    node.ors = this.ors.clone();
    node.catches = this.catches.clone();
    return node;
  }

  /**
   * Add a dispatch path below this node and return this node.
   *
   * Existing edges are followed (cloning shared nodes on the way); missing
   * ones are created. Extending twice with the same (combinator, filter)
   * sequence creates no new nodes, and a subtree given for an edge that
   * already exists is ignored.
   *
   * @throws {PathError} When a step is malformed
   */
  extend(path: Iterable<PathStep>): DispatchNode {
    let cursor = CowCell.owned<DispatchNode>(this);
    let index = 0;
    for (const step of path) {
      assertStep(step, index);
      const children = cursor.view().edges(step.combinator);
      const existing = children.get(step.filter);
      if (existing) {
        const cell = existing.cell.makeMutable();
        if (cell !== existing.cell) {
          children.set(step.filter, cell);
        }
        cursor = cell;
      } else {
        const cell = step.subtree
          ? CowCell.shared(step.subtree)
          : CowCell.owned(new DispatchNode());
        children.set(step.filter, cell);
        cursor = cell;
      }
      index++;
    }
    return this;
  }

  /**
   * Number of distinct node objects reachable from this node, itself included.
   */
  countNodes(): number {
    const seen = new Set<DispatchNode>();
    const stack: DispatchNode[] = [this];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node || seen.has(node)) continue;
      seen.add(node);
      for (const map of [node.ands, node.ors, node.catches]) {
        for (const edge of map) {
          stack.push(edge.cell.view());
        }
      }
    }
    return seen.size;
  }
}

function assertStep(step: PathStep, index: number): void {
  if (!isCombinator(step.combinator)) {
    throw new PathError({
      message: `Unknown combinator at step ${index}: ${String(step.combinator)}`,
      errorCode: ErrorCode.INVALID_COMBINATOR,
      context: { step: index, combinator: String(step.combinator) },
    });
  }
  if (!isFilter(step.filter)) {
    throw new PathError({
      message: `Step ${index} does not carry a Filter`,
      errorCode: ErrorCode.INVALID_PATH_FILTER,
      context: { step: index, combinator: step.combinator },
    });
  }
  if (step.subtree !== undefined && !(step.subtree instanceof DispatchNode)) {
    throw new PathError({
      message: `Step ${index} subtree is not a DispatchNode`,
      errorCode: ErrorCode.INVALID_PATH_SUBTREE,
      context: { step: index, combinator: step.combinator, filter: step.filter.key },
    });
  }
}
