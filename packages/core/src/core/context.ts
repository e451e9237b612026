import type { ContextDelta } from '../types/outcome.js';

/**
 * The mapping threaded along a dispatch path. `event` is set once when a
 * publish starts; `error` is present only while a failure propagates.
 */
export interface Context {
  readonly event: unknown;
  readonly error?: unknown;
  readonly [key: string]: unknown;
}

export const RESERVED_KEYS = ['event', 'error'] as const;

export type ReservedKey = (typeof RESERVED_KEYS)[number];

export function isReservedKey(key: string): key is ReservedKey {
  return key === 'event' || key === 'error';
}

export function createContext(event: unknown): Context {
  return { event };
}

/** A fresh shallow copy; writes to it never reach the original. */
export function isolate(ctx: Context): Context {
  return { ...ctx };
}

export function hasError(ctx: Context): boolean {
  return Object.prototype.hasOwnProperty.call(ctx, 'error');
}

/**
 * Names of reserved keys a delta tries to set.
 */
export function reservedKeysIn(delta: ContextDelta): string[] {
  return Object.keys(delta).filter(isReservedKey);
}

/**
 * Right-merge a filter delta into a context; reserved keys in the delta are
 * ignored. Callers decide beforehand whether such a delta is acceptable.
 */
export function mergeContext(ctx: Context, delta: ContextDelta): Context {
  const merged: Record<string, unknown> = { ...ctx };
  for (const [key, value] of Object.entries(delta)) {
    if (isReservedKey(key)) continue;
    merged[key] = value;
  }
  return { ...merged, event: ctx.event };
}

export function withError(ctx: Context, error: unknown): Context {
  return { ...ctx, error };
}
