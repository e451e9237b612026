import { describe, expect, it } from 'vitest';

import {
  createContext,
  hasError,
  isReservedKey,
  isolate,
  mergeContext,
  reservedKeysIn,
  withError,
} from '../context';

describe('context', () => {
  it('is seeded with the event only', () => {
    expect(createContext('e')).toEqual({ event: 'e' });
    expect(hasError(createContext('e'))).toBe(false);
  });

  it('isolate returns a copy', () => {
    const ctx = createContext('e');
    const copy = isolate(ctx);
    Reflect.set(copy, 'k', 1);

    expect(copy).not.toBe(ctx);
    expect(ctx).toEqual({ event: 'e' });
  });

  it('knows the reserved keys', () => {
    expect(isReservedKey('event')).toBe(true);
    expect(isReservedKey('error')).toBe(true);
    expect(isReservedKey('user')).toBe(false);
    expect(reservedKeysIn({ user: 1, error: 2, event: 3 })).toEqual(['error', 'event']);
  });

  it('mergeContext right-merges and skips reserved keys', () => {
    const ctx = { event: 'e', a: 1, b: 2 };

    expect(mergeContext(ctx, { b: 3, c: 4, event: 'x', error: 'y' })).toEqual({
      event: 'e',
      a: 1,
      b: 3,
      c: 4,
    });
    expect(ctx).toEqual({ event: 'e', a: 1, b: 2 });
  });

  it('mergeContext keeps an error already in context', () => {
    const boom = new Error('boom');

    expect(mergeContext(withError(createContext('e'), boom), { k: 1 })).toEqual({
      event: 'e',
      error: boom,
      k: 1,
    });
  });

  it('hasError is true even for an undefined error value', () => {
    expect(hasError(withError(createContext('e'), undefined))).toBe(true);
  });
});
