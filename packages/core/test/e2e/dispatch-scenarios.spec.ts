import { describe, expect, it } from 'vitest';

import {
  DispatchNode,
  createSluice,
  errorIs,
  func,
  path,
  predicate,
  proceed,
  raise,
  renderTree,
  typeIs,
  type Context,
} from '../../src/index.js';

class RuntimeError extends Error {}
class ValueError extends Error {}

function endpoint(ctx: Context): never {
  if (ctx.event !== 'test') {
    throw new ValueError('not test');
  }
  throw new RuntimeError('test');
}

describe('end-to-end dispatch', () => {
  it('reaches a handler through the AND edge or the OR fallback', async () => {
    const seen: unknown[] = [];
    const recordHandler = func(function record(ctx) {
      seen.push(ctx.event);
      return proceed();
    });
    const sluice = createSluice();
    sluice.register(path().and(typeIs(String)).or(typeIs(Number)).and(recordHandler));

    await sluice.publish('x');
    await sluice.publish(42);
    await sluice.publish([]);

    expect(seen).toEqual(['x', 42]);
    expect(renderTree(sluice.tree)).toBe(
      ['and TypeFilter(String)', '  or TypeFilter(Number)', '    and FuncFilter(record)'].join(
        '\n'
      )
    );
  });

  it('stops at a failed AND filter', async () => {
    const seen: unknown[] = [];
    const sluice = createSluice();
    sluice.register(
      path()
        .and(typeIs(String))
        .and(
          func((ctx) => {
            seen.push(ctx.event);
            return proceed();
          })
        )
    );

    await sluice.publish('test');
    await sluice.publish(123);

    expect(seen).toEqual(['test']);
  });

  describe('CATCH edges', () => {
    function catchingTree(caught: unknown[]) {
      return path()
        .and(typeIs(String))
        .and(func(endpoint))
        .catch(errorIs(RuntimeError))
        .and(
          func((ctx) => {
            caught.push(ctx.error);
            return proceed();
          })
        );
    }

    it('hands a matching error to the catch handler and suppresses it', async () => {
      const caught: unknown[] = [];
      const uncaught: unknown[] = [];
      const sluice = createSluice({ onUncaught: (error) => void uncaught.push(error) });
      sluice.register(catchingTree(caught));

      await sluice.publish('test');

      expect(caught).toHaveLength(1);
      expect(caught[0]).toBeInstanceOf(RuntimeError);
      expect(uncaught).toEqual([]);
      expect(sluice.metrics()).toMatchObject({ suppressed: 1, uncaught: 0 });
    });

    it('suppresses an error the CATCH filter rejected', async () => {
      const caught: unknown[] = [];
      const uncaught: unknown[] = [];
      const sluice = createSluice({ onUncaught: (error) => void uncaught.push(error) });
      sluice.register(catchingTree(caught));

      await sluice.publish('not test');

      expect(caught).toEqual([]);
      expect(uncaught).toEqual([]);
    });

    it('does not evaluate anything past a type mismatch', async () => {
      const caught: unknown[] = [];
      const sluice = createSluice();
      sluice.register(catchingTree(caught));

      await sluice.publish(123);

      expect(caught).toEqual([]);
      expect(sluice.metrics().failures).toBe(0);
    });

    it('re-raises what the catch rejected through an OR RaiseFilter', async () => {
      const uncaught: unknown[] = [];
      const sluice = createSluice({ onUncaught: (error) => void uncaught.push(error) });
      sluice.register(
        path()
          .and(typeIs(String))
          .and(func(endpoint))
          .catch(predicate((ctx) => ctx.error instanceof ValueError))
          .or(raise())
      );

      await sluice.publish('test');
      expect(uncaught).toHaveLength(1);
      expect(uncaught[0]).toBeInstanceOf(RuntimeError);

      uncaught.length = 0;
      await sluice.publish(123);
      await sluice.publish('not test');
      expect(uncaught).toEqual([]);
    });
  });

  it('routes events of several types through independent paths', async () => {
    const flags = new Set<string>();
    const sink: unknown[] = [];
    const sluice = createSluice({ onUncaught: (error) => void sink.push(error) });
    sluice.register(
      path()
        .and(typeIs(String))
        .and(
          func(() => {
            flags.add('str');
            return proceed();
          })
        )
    );
    sluice.register(
      path()
        .and(typeIs(Number))
        .and(
          func(() => {
            flags.add('int');
            return proceed();
          })
        )
    );
    sluice.register(
      path()
        .and(typeIs(Array))
        .or(typeIs(Object))
        .and(
          func(() => {
            flags.add('list_or_dict');
            return proceed();
          })
        )
    );

    await sluice.publish('test');
    expect([...flags]).toEqual(['str']);
    await sluice.publish(123);
    expect([...flags]).toEqual(['str', 'int']);
    await sluice.publish({});
    expect([...flags]).toEqual(['str', 'int', 'list_or_dict']);
    expect(sink).toEqual([]);
  });

  it('runs sibling branches concurrently', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const order: string[] = [];
    const sluice = createSluice();
    sluice.register(
      path().and(
        func(async () => {
          await gate;
          order.push('waiter');
          return proceed();
        })
      )
    );
    sluice.register(
      path().and(
        func(async () => {
          order.push('releaser');
          release();
          return proceed();
        })
      )
    );

    await sluice.publish('go');

    expect(order).toEqual(['releaser', 'waiter']);
  });

  it('runs a shared subtree once for every path that reaches it', async () => {
    const seen: unknown[] = [];
    const handlers = path()
      .and(
        func((ctx) => {
          seen.push(ctx.event);
          return proceed();
        })
      )
      .end();
    const sluice = createSluice();
    sluice.register(path().and(typeIs(String), handlers));
    sluice.register(path().and(predicate(() => true), handlers));

    await sluice.publish('x');

    expect(seen).toEqual(['x', 'x']);
    expect(sluice.tree.countNodes()).toBe(3);
  });

  it('shares a handler subtree between paths until one of them grows', async () => {
    const seen: string[] = [];
    const handlers = path()
      .and(
        func(function audit(ctx) {
          seen.push(`audit:${String(ctx.event)}`);
          return proceed();
        })
      )
      .end();
    const tree = new DispatchNode();
    path().and(typeIs(String), handlers).end(tree);
    path().and(typeIs(Number), handlers).end(tree);

    expect(tree.countNodes()).toBe(3);

    path()
      .and(typeIs(Number))
      .and(
        func(function bill(ctx) {
          seen.push(`bill:${String(ctx.event)}`);
          return proceed();
        })
      )
      .end(tree);

    const sluice = createSluice({ tree });
    await sluice.publish('a');
    await sluice.publish(1);

    expect(seen).toEqual(['audit:a', 'audit:1', 'bill:1']);
    expect(renderTree(handlers)).toBe('and FuncFilter(audit)');
    expect(renderTree(tree).split('\n')).toEqual([
      'and TypeFilter(String) (shared)',
      '  and FuncFilter(audit)',
      'and TypeFilter(Number)',
      '  and FuncFilter(audit) (shared)',
      '  and FuncFilter(bill)',
    ]);
  });
});
