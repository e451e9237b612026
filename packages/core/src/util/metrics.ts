import { performance } from 'node:perf_hooks';

import type { Outcome } from '../types/outcome.js';

export interface MetricsSnapshot {
  publishes: number;
  evaluations: number;
  continues: number;
  noMatches: number;
  failures: number;
  suppressed: number;
  uncaught: number;
  dispatchMs: number;
  lastDispatchMs: number;
}

const DEFAULT_COUNTERS: MetricsSnapshot = {
  publishes: 0,
  evaluations: 0,
  continues: 0,
  noMatches: 0,
  failures: 0,
  suppressed: 0,
  uncaught: 0,
  dispatchMs: 0,
  lastDispatchMs: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

/**
 * Dispatch counters for one facade. Concurrent publishes share the
 * collector; every update is a synchronous increment.
 */
export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start timing one publish; call the returned function when it completes.
   */
  public beginDispatch(): () => void {
    if (!this.enabled) {
      return () => undefined;
    }
    this.snapshot.publishes += 1;
    const startedAt = this.now();
    return () => {
      const duration = this.now() - startedAt;
      const safeDuration = Number.isFinite(duration) ? Math.max(0, duration) : 0;
      this.snapshot.dispatchMs += safeDuration;
      this.snapshot.lastDispatchMs = safeDuration;
    };
  }

  public recordOutcome(outcome: Outcome): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.evaluations += 1;
    switch (outcome._tag) {
      case 'Continue':
        this.snapshot.continues += 1;
        break;
      case 'NoMatch':
        this.snapshot.noMatches += 1;
        break;
      case 'Failure':
        this.snapshot.failures += 1;
        break;
    }
  }

  public addSuppressed(): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.suppressed += 1;
  }

  public addUncaught(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.uncaught += count;
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }

  public reset(): void {
    this.snapshot = { ...DEFAULT_COUNTERS };
  }
}
