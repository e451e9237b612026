import { describe, expect, it } from 'vitest';

import { DispatchNode } from '../dispatch-node';
import { Combinator, type PathStep } from '../types';
import { ErrorCode } from '../../errors/codes';
import { PathError } from '../../types/errors';
import { typeIs } from '../../filters/type-filter';
import { unit } from '../../filters/unit';
import type { Filter } from '../../core/filter';

function childOf(node: DispatchNode, combinator: Combinator, filter: Filter): DispatchNode {
  const edge = node.edges(combinator).get(filter);
  if (!edge) {
    throw new Error(`missing ${combinator} edge ${filter.key}`);
  }
  return edge.cell.view();
}

describe('DispatchNode', () => {
  it('starts empty', () => {
    const root = new DispatchNode();

    expect(root.isEmpty()).toBe(true);
    expect(root.countNodes()).toBe(1);
  });

  it('extend creates one node per new step and returns the same root', () => {
    const root = new DispatchNode();
    const steps: PathStep[] = [
      { combinator: Combinator.AND, filter: typeIs(String) },
      { combinator: Combinator.OR, filter: typeIs(Number) },
      { combinator: Combinator.CATCH, filter: unit() },
    ];

    const result = root.extend(steps);

    expect(result).toBe(root);
    expect(root.countNodes()).toBe(4);
    const a = childOf(root, Combinator.AND, typeIs(String));
    const b = childOf(a, Combinator.OR, typeIs(Number));
    const c = childOf(b, Combinator.CATCH, unit());
    expect(c.isEmpty()).toBe(true);
  });

  it('reuses the edge of a structurally equal filter', () => {
    const root = new DispatchNode();
    root.extend([{ combinator: Combinator.AND, filter: typeIs(String) }]);
    root.extend([
      { combinator: Combinator.AND, filter: typeIs(String) },
      { combinator: Combinator.AND, filter: typeIs(Number) },
    ]);

    expect(root.edges(Combinator.AND).size).toBe(1);
    expect(root.countNodes()).toBe(3);
  });

  it('keeps separate edges for equal filters under different combinators', () => {
    const root = new DispatchNode();
    root.extend([{ combinator: Combinator.AND, filter: typeIs(String) }]);
    root.extend([{ combinator: Combinator.OR, filter: typeIs(String) }]);

    expect(root.edges(Combinator.AND).size).toBe(1);
    expect(root.edges(Combinator.OR).size).toBe(1);
    expect(root.countNodes()).toBe(3);
  });

  it('attaches a pre-built subtree shared', () => {
    const subtree = new DispatchNode().extend([
      { combinator: Combinator.AND, filter: typeIs(Boolean) },
    ]);
    const root = new DispatchNode();
    root.extend([{ combinator: Combinator.AND, filter: typeIs(String), subtree }]);

    const edge = root.edges(Combinator.AND).get(typeIs(String));
    expect(edge?.cell.owned).toBe(false);
    expect(edge?.cell.view()).toBe(subtree);
  });

  it('ignores a subtree given for an edge that already exists', () => {
    const root = new DispatchNode();
    root.extend([{ combinator: Combinator.AND, filter: typeIs(String) }]);
    const first = childOf(root, Combinator.AND, typeIs(String));

    const late = new DispatchNode().extend([
      { combinator: Combinator.AND, filter: typeIs(Boolean) },
    ]);
    root.extend([{ combinator: Combinator.AND, filter: typeIs(String), subtree: late }]);

    expect(childOf(root, Combinator.AND, typeIs(String))).toBe(first);
    expect(first.isEmpty()).toBe(true);
  });

  it('clones a shared node before extending through it', () => {
    const subtree = new DispatchNode().extend([
      { combinator: Combinator.AND, filter: typeIs(Boolean) },
    ]);
    const root = new DispatchNode();
    root.extend([{ combinator: Combinator.AND, filter: typeIs(String), subtree }]);
    root.extend([{ combinator: Combinator.AND, filter: typeIs(Number), subtree }]);

    root.extend([
      { combinator: Combinator.AND, filter: typeIs(String) },
      { combinator: Combinator.AND, filter: typeIs(Date) },
    ]);

    const viaString = childOf(root, Combinator.AND, typeIs(String));
    const viaNumber = childOf(root, Combinator.AND, typeIs(Number));
    expect(viaString).not.toBe(subtree);
    expect(viaNumber).toBe(subtree);
    expect(viaString.edges(Combinator.AND).size).toBe(2);
    expect(subtree.edges(Combinator.AND).size).toBe(1);
    expect(root.edges(Combinator.AND).get(typeIs(String))?.cell.owned).toBe(true);
    // the clone still shares the grandchild
    expect(childOf(viaString, Combinator.AND, typeIs(Boolean))).toBe(
      childOf(subtree, Combinator.AND, typeIs(Boolean))
    );
  });

  it('clone copies the edge maps with shared cells', () => {
    const root = new DispatchNode().extend([
      { combinator: Combinator.AND, filter: typeIs(String) },
    ]);

    const copy = root.clone();

    expect(copy).not.toBe(root);
    const original = root.edges(Combinator.AND).get(typeIs(String));
    const copied = copy.edges(Combinator.AND).get(typeIs(String));
    expect(copied?.cell.owned).toBe(false);
    expect(copied?.cell.view()).toBe(original?.cell.view());
    expect(original?.cell.owned).toBe(true);
  });

  it('counts a node shared by two parents once', () => {
    const subtree = new DispatchNode();
    const root = new DispatchNode();
    root.extend([{ combinator: Combinator.AND, filter: typeIs(String), subtree }]);
    root.extend([{ combinator: Combinator.OR, filter: typeIs(String), subtree }]);

    expect(root.countNodes()).toBe(2);
  });

  it('rejects an unknown combinator and reports the step index', () => {
    const root = new DispatchNode();
    const bad: PathStep = { combinator: Combinator.AND, filter: unit() };
    Reflect.set(bad, 'combinator', 'xor');

    const error = catchError(() =>
      root.extend([{ combinator: Combinator.AND, filter: typeIs(String) }, bad])
    );

    expect(error).toBeInstanceOf(PathError);
    expect(error).toMatchObject({
      errorCode: ErrorCode.INVALID_COMBINATOR,
      message: 'Unknown combinator at step 1: xor',
      context: { step: 1, combinator: 'xor' },
    });
  });

  it('rejects a step without a Filter', () => {
    const bad: PathStep = { combinator: Combinator.AND, filter: unit() };
    Reflect.set(bad, 'filter', () => true);

    const error = catchError(() => new DispatchNode().extend([bad]));

    expect(error).toBeInstanceOf(PathError);
    expect(error).toMatchObject({
      errorCode: ErrorCode.INVALID_PATH_FILTER,
      message: 'Step 0 does not carry a Filter',
    });
  });

  it('rejects a subtree that is not a DispatchNode', () => {
    const bad: PathStep = { combinator: Combinator.AND, filter: unit() };
    Reflect.set(bad, 'subtree', {});

    const error = catchError(() => new DispatchNode().extend([bad]));

    expect(error).toBeInstanceOf(PathError);
    expect(error).toMatchObject({
      errorCode: ErrorCode.INVALID_PATH_SUBTREE,
      message: 'Step 0 subtree is not a DispatchNode',
    });
  });
});

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a throw');
}
