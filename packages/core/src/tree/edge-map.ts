import type { Filter } from '../core/filter.js';
import type { CowCell } from './cow-cell.js';
import type { DispatchNode } from './dispatch-node.js';
import type { Edge } from './types.js';

/**
 * Filter → child cell map keyed by the filter's structural key.
 * Iteration follows insertion order.
 */
export class EdgeMap implements Iterable<Edge> {
  readonly #edges = new Map<string, Edge>();

  get size(): number {
    return this.#edges.size;
  }

  has(filter: Filter): boolean {
    return this.#edges.has(filter.key);
  }

  get(filter: Filter): Edge | undefined {
    return this.#edges.get(filter.key);
  }

  /**
   * Point the edge for `filter` at `cell`. An existing edge keeps the filter
   * instance it was registered with.
   */
  set(filter: Filter, cell: CowCell<DispatchNode>): void {
    const existing = this.#edges.get(filter.key);
    this.#edges.set(filter.key, { filter: existing?.filter ?? filter, cell });
  }

  [Symbol.iterator](): Iterator<Edge> {
    return this.#edges.values();
  }

  /** Copy of the map whose cells are all shared views. */
  clone(): EdgeMap {
    const copy = new EdgeMap();
    for (const [key, edge] of this.#edges) {
      copy.#edges.set(key, { filter: edge.filter, cell: edge.cell.shareView() });
    }
    return copy;
  }
}
