import { LessThan, TreeKey } from '../common/Types';
import { NodeArena, NodeId, NIL } from './NodeArena';

/**
 * Facts about one subtree gathered by a post-order pass.
 */
export interface SubtreeReport<K> {
  size: number;
  /** -1 for an empty subtree */
  height: number;
  isBST: boolean;
  /** height <= alphaDeepHeight(size) + 1 for this subtree */
  balanced: boolean;
  /** Smallest and largest key, undefined when empty */
  min: K | undefined;
  max: K | undefined;
}

export class InvariantChecker<K extends TreeKey> {
  private readonly arena: NodeArena<K>;
  private readonly isLessThan: LessThan<K>;
  private readonly alphaDeepHeight: (size: number) => number;

  constructor(
    arena: NodeArena<K>,
    isLessThan: LessThan<K>,
    alphaDeepHeight: (size: number) => number
  ) {
    this.arena = arena;
    this.isLessThan = isLessThan;
    this.alphaDeepHeight = alphaDeepHeight;
  }

  check(node: NodeId): SubtreeReport<K> {
    if (node === NIL) {
      return { size: 0, height: -1, isBST: true, balanced: true, min: undefined, max: undefined };
    }

    const left = this.check(this.arena.left(node));
    const right = this.check(this.arena.right(node));
    const key = this.arena.key(node);

    // Whole-subtree ordering: everything on the left is below key, everything on the right above
    let isBST = left.isBST && right.isBST;
    if (left.max !== undefined) isBST = isBST && this.isLessThan(left.max, key);
    if (right.min !== undefined) isBST = isBST && this.isLessThan(key, right.min);

    const size = left.size + right.size + 1;
    const height = Math.max(left.height, right.height) + 1;

    return {
      size,
      height,
      isBST,
      balanced: height <= this.alphaDeepHeight(size) + 1,
      min: left.min !== undefined ? left.min : key,
      max: right.max !== undefined ? right.max : key,
    };
  }
}
