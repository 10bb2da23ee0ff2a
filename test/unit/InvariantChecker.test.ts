import { describe, it, expect } from 'vitest';
import { NodeArena, NIL } from '../../src/tree/NodeArena';
import { InvariantChecker } from '../../src/tree/InvariantChecker';
import { RebalanceEngine } from '../../src/tree/RebalanceEngine';
import { defaultIsLessThan } from '../../src/common/Ordering';
import { buildRightChain, makeNode, nth } from '../helpers/shape';

function setup(alpha = 0.6) {
  const arena = new NodeArena<number>();
  const engine = new RebalanceEngine(arena, alpha);
  const checker = new InvariantChecker(arena, defaultIsLessThan, (size) => engine.alphaDeepHeight(size));
  return { arena, checker };
}

describe('InvariantChecker', () => {
  it('reports an empty subtree', () => {
    const { checker } = setup();
    expect(checker.check(NIL)).toEqual({
      size: 0,
      height: -1,
      isBST: true,
      balanced: true,
      min: undefined,
      max: undefined,
    });
  });

  it('accepts a balanced search tree', () => {
    const { arena, checker } = setup();
    const root = makeNode(arena, 5, makeNode(arena, 3, makeNode(arena, 1)), makeNode(arena, 8));

    expect(checker.check(root)).toEqual({
      size: 4,
      height: 2,
      isBST: true,
      balanced: true,
      min: 1,
      max: 8,
    });
  });

  it('catches an ordering violation below the immediate children', () => {
    const { arena, checker } = setup();
    // 6 sits in the left subtree of 5
    const root = makeNode(arena, 5, makeNode(arena, 3, makeNode(arena, 1), makeNode(arena, 6)), makeNode(arena, 8));

    const report = checker.check(root);

    expect(report.isBST).toBe(false);
    expect(checker.check(arena.left(root)).isBST).toBe(true);
  });

  it('catches equal keys', () => {
    const { arena, checker } = setup();
    const root = makeNode(arena, 4, NIL, makeNode(arena, 4));
    expect(checker.check(root).isBST).toBe(false);
  });

  it('allows a chain up to alphaDeepHeight(size) + 1', () => {
    const { arena, checker } = setup(0.6);
    // Five nodes, height 4, alphaDeepHeight(5) = 3
    const chain = buildRightChain(arena, [1, 2, 3, 4, 5]);

    const report = checker.check(nth(chain, 0));

    expect(report.height).toBe(4);
    expect(report.balanced).toBe(true);
  });

  it('flags a chain taller than alphaDeepHeight(size) + 1', () => {
    const { arena, checker } = setup(0.6);
    // Six nodes, height 5, alphaDeepHeight(6) = 3
    const chain = buildRightChain(arena, [1, 2, 3, 4, 5, 6]);

    const report = checker.check(nth(chain, 0));

    expect(report.height).toBe(5);
    expect(report.balanced).toBe(false);
    expect(report.isBST).toBe(true);
  });
});
