/**
 * Failures recorded during one publish, oldest first.
 *
 * Every branch of the fan-out holds the same stack. Pushes and pops are
 * synchronous, so on the event loop they never interleave.
 */
export class ErrorStack {
  readonly #entries: unknown[] = [];

  get size(): number {
    return this.#entries.length;
  }

  push(error: unknown): void {
    this.#entries.push(error);
  }

  /** Retract the most recent entry; no-op on an empty stack. */
  pop(): void {
    this.#entries.pop();
  }

  toArray(): unknown[] {
    return [...this.#entries];
  }

  /** Remove and return every entry, most recent first. */
  drainNewestFirst(): unknown[] {
    const drained = this.#entries.splice(0).reverse();
    return drained;
  }
}
