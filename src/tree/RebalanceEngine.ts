/**
 * RebalanceEngine - scapegoat detection and weight-balanced reconstruction
 *
 * Scapegoat selection and FLATTEN / BUILD-TREE follow Galperin and Rivest,
 * "Scapegoat Trees" (1993). No balance data is kept per node: subtree sizes
 * are recounted while walking up the insertion path.
 */

import { TreeCorruptionError } from '../common/Errors';
import { TreeKey } from '../common/Types';
import { NodeArena, NodeId, NIL } from './NodeArena';

export interface Scapegoat {
  /** Root of the subtree to rebuild */
  readonly node: NodeId;
  /** Parent of node, NIL when node is the tree root */
  readonly parent: NodeId;
  /** Exact number of nodes under node */
  readonly size: number;
}

export class RebalanceEngine<K extends TreeKey> {
  private readonly arena: NodeArena<K>;
  private readonly logInverseAlpha: number;

  constructor(arena: NodeArena<K>, alpha: number) {
    this.arena = arena;
    this.logInverseAlpha = Math.log(1 / alpha);
  }

  /**
   * floor(log_{1/alpha}(size)): the largest height a subtree of this size
   * may have while still counting as alpha-height balanced.
   */
  alphaDeepHeight(size: number): number {
    if (size < 1) return 0;
    return Math.floor(Math.log(size) / this.logInverseAlpha);
  }

  /**
   * Time complexity: O(size of subtree)
   */
  subtreeSize(node: NodeId): number {
    if (node === NIL) return 0;
    return 1 + this.subtreeSize(this.arena.left(node)) + this.subtreeSize(this.arena.right(node));
  }

  /**
   * Walks up the insertion path (deepest ancestor last in the array, NIL at
   * index 0) and returns the first ancestor n_i with i > alphaDeepHeight(size(n_i)).
   * The stack is consumed.
   *
   * Precondition: the path holds the sentinel and at least one ancestor.
   */
  findScapegoat(insertionPath: NodeId[]): Scapegoat {
    let curr = this.pop(insertionPath);
    let parent = this.pop(insertionPath);

    let currSize = this.subtreeSize(curr);
    let currIndex = 1;

    while (parent !== NIL) {
      if (currIndex > this.alphaDeepHeight(currSize)) {
        break;
      }

      // Count only the sibling subtree; curr's nodes are already in currSize
      const sibling = this.arena.left(parent) === curr
        ? this.arena.right(parent)
        : this.arena.left(parent);
      currSize += 1 + this.subtreeSize(sibling);

      curr = parent;
      parent = this.pop(insertionPath);
      currIndex++;
    }

    return { node: curr, parent, size: currSize };
  }

  /**
   * Rebuild the subtree rooted at subtreeRoot (holding exactly size nodes)
   * into a 1/2-weight-balanced tree and return its new root. The caller
   * rewires the result into the former parent slot.
   *
   * Time complexity: O(size)
   * Space complexity: O(height of the subtree)
   */
  rebuildSubtree(subtreeRoot: NodeId, size: number): NodeId {
    if (subtreeRoot === NIL) return NIL;

    // Terminates the flattened list; after buildTree its left child is the new root
    const dummy = this.arena.allocate(this.arena.key(subtreeRoot));
    try {
      const head = this.flatten(subtreeRoot, dummy);
      this.buildTree(size, head);
      return this.arena.left(dummy);
    } finally {
      this.arena.release(dummy);
    }
  }

  /**
   * FLATTEN(x, y): turn the tree rooted at treeRoot into a list linked by
   * right children, prepend it to listHead and return the new head.
   * Left children are left stale until buildTree rewrites them.
   */
  flatten(treeRoot: NodeId, listHead: NodeId): NodeId {
    if (treeRoot === NIL) return listHead;

    this.arena.setRight(treeRoot, this.flatten(this.arena.right(treeRoot), listHead));
    return this.flatten(this.arena.left(treeRoot), treeRoot);
  }

  /**
   * BUILD-TREE(n, x): build a balanced tree from the first treeSize nodes of
   * the list starting at listHead. Returns the (treeSize + 1)-th list node,
   * whose left child is the root of the built tree.
   *
   * Precondition: the list holds at least treeSize + 1 nodes.
   */
  buildTree(treeSize: number, listHead: NodeId): NodeId {
    if (treeSize === 0) {
      this.arena.setLeft(listHead, NIL);
      return listHead;
    }

    const half = (treeSize - 1) / 2;

    const firstHalf = this.buildTree(Math.ceil(half), listHead);
    const secondHalf = this.buildTree(Math.floor(half), this.arena.right(firstHalf));

    this.arena.setRight(firstHalf, this.arena.left(secondHalf));
    this.arena.setLeft(secondHalf, firstHalf);
    return secondHalf;
  }

  private pop(path: NodeId[]): NodeId {
    const top = path.pop();
    if (top === undefined) {
      throw new TreeCorruptionError('insertion path exhausted before reaching the root');
    }
    return top;
  }
}
