import type { DispatchNode } from './dispatch-node.js';
import { COMBINATORS } from './types.js';

/**
 * Indented outline of a tree, one edge per line:
 *
 * ```text
 * and TypeFilter(String)
 *   and FuncFilter(record)
 *   catch ErrorTypeFilter(TypeError) (shared)
 * ```
 *
 * `(shared)` marks an edge whose cell does not own its node.
 */
export function renderTree(root: DispatchNode): string {
  const lines: string[] = [];
  const walk = (node: DispatchNode, depth: number): void => {
    for (const combinator of COMBINATORS) {
      for (const edge of node.edges(combinator)) {
        const shared = edge.cell.owned ? '' : ' (shared)';
        lines.push(
          `${'  '.repeat(depth)}${combinator} ${edge.filter.describe()}${shared}`
        );
        walk(edge.cell.view(), depth + 1);
      }
    }
  };
  walk(root, 0);
  return lines.join('\n');
}
