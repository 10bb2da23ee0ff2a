/**
 * ScapegoatTree - ordered set kept balanced by occasional subtree rebuilds
 *
 * No heights, colors or sizes are stored per node. Instead:
 * - an insertion deeper than alphaDeepHeight(size) finds a weight-imbalanced
 *   ancestor (the scapegoat) and rebuilds its subtree;
 * - a removal that leaves size <= alpha * maxSize rebuilds the whole tree.
 *
 * search is O(log n); insert and remove are amortized O(log n), worst-case O(n).
 */

import { assertValidAlpha } from '../common/Config';
import { defaultIsLessThan } from '../common/Ordering';
import {
  LessThan,
  RebuildListener,
  RebuildTrigger,
  TreeKey,
  TreeStats,
  TreeVisitor,
  ChildSide,
} from '../common/Types';
import { IOrderedSet } from '../interfaces/OrderedSet';
import { NodeArena, NodeId, NIL } from './NodeArena';
import { RebalanceEngine, Scapegoat } from './RebalanceEngine';
import { DeletionEngine } from './DeletionEngine';
import { InvariantChecker } from './InvariantChecker';
import { TreeDebugPrinter } from './TreeDebugPrinter';

export interface ScapegoatTreeDependencies {
  onRebuild?: RebuildListener | undefined;
}

interface PendingVisit {
  node: NodeId;
  depth: number;
  side: ChildSide;
}

export class ScapegoatTree<K extends TreeKey> implements IOrderedSet<K> {
  readonly alpha: number;

  private readonly isLessThan: LessThan<K>;
  private readonly onRebuild: RebuildListener | undefined;

  private readonly arena: NodeArena<K>;
  private readonly rebalancer: RebalanceEngine<K>;
  private readonly deleter: DeletionEngine<K>;
  private readonly checker: InvariantChecker<K>;

  private root: NodeId = NIL;
  private count: number = 0;
  private maxCount: number = 0;
  private rebuilds: number = 0;

  /**
   * Whether the next two-child removal takes the in-order successor (true)
   * or predecessor (false). Flipped after every such removal.
   */
  private replaceWithSucc: boolean = true;

  /**
   * @param alpha - Balance factor in (0.5, 1); smaller means flatter trees and more rebuilds
   * @param isLessThan - Strict ordering over keys, natural order when omitted
   * @throws InvalidAlphaError when alpha is out of range
   */
  constructor(
    alpha: number,
    isLessThan: LessThan<K> = defaultIsLessThan,
    dependencies?: ScapegoatTreeDependencies
  ) {
    assertValidAlpha(alpha);
    this.alpha = alpha;
    this.isLessThan = isLessThan;
    this.onRebuild = dependencies?.onRebuild;

    this.arena = new NodeArena<K>();
    this.rebalancer = new RebalanceEngine(this.arena, alpha);
    this.deleter = new DeletionEngine(this.arena);
    this.checker = new InvariantChecker(
      this.arena,
      isLessThan,
      (size) => this.rebalancer.alphaDeepHeight(size)
    );
  }

  /**
   * Number of keys currently stored
   */
  get size(): number {
    return this.count;
  }

  /**
   * Largest size seen since the last rebuild of the whole tree
   */
  get maxSize(): number {
    return this.maxCount;
  }

  /**
   * Time complexity: O(log n)
   */
  search(key: K): boolean {
    let curr = this.root;
    while (curr !== NIL) {
      const currKey = this.arena.key(curr);
      if (this.isLessThan(key, currKey)) {
        curr = this.arena.left(curr);
      } else if (this.isLessThan(currKey, key)) {
        curr = this.arena.right(curr);
      } else {
        return true;
      }
    }
    return false;
  }

  /**
   * Insert key. Returns false, leaving the tree untouched, if it is already present.
   * Time complexity: amortized O(log n), worst-case O(n)
   */
  insert(key: K): boolean {
    // Ancestors of the new node, root first; NIL stands for the root's parent
    const insertionPath: NodeId[] = [NIL];

    let prev = NIL;
    let curr = this.root;
    while (curr !== NIL) {
      insertionPath.push(curr);
      prev = curr;

      const currKey = this.arena.key(curr);
      if (this.isLessThan(key, currKey)) {
        curr = this.arena.left(curr);
      } else if (this.isLessThan(currKey, key)) {
        curr = this.arena.right(curr);
      } else {
        return false;
      }
    }

    const node = this.arena.allocate(key);
    if (prev === NIL) {
      this.root = node;
    } else if (this.isLessThan(key, this.arena.key(prev))) {
      this.arena.setLeft(prev, node);
    } else {
      this.arena.setRight(prev, node);
    }

    this.count++;
    if (this.count > this.maxCount) this.maxCount = this.count;

    const insertionHeight = insertionPath.length - 1;
    if (insertionHeight >= 1 && insertionHeight > this.rebalancer.alphaDeepHeight(this.count)) {
      const scapegoat = this.rebalancer.findScapegoat(insertionPath);
      this.rebuild(scapegoat, 'insert');
    }

    return true;
  }

  /**
   * Remove key. Returns false, leaving the tree untouched, if it is absent.
   * Time complexity: amortized O(log n), worst-case O(n)
   */
  remove(key: K): boolean {
    let prev = NIL;
    let curr = this.root;

    while (true) {
      if (curr === NIL) return false;

      const currKey = this.arena.key(curr);
      const keyLess = this.isLessThan(key, currKey);
      const keyGreater = this.isLessThan(currKey, key);
      if (!keyLess && !keyGreater) break;

      prev = curr;
      curr = keyLess ? this.arena.left(curr) : this.arena.right(curr);
    }

    if (this.arena.left(curr) !== NIL && this.arena.right(curr) !== NIL) {
      this.deleter.removeWithTwoChildren(curr, this.replaceWithSucc);
      this.replaceWithSucc = !this.replaceWithSucc;
    } else {
      const child = this.deleter.removeWithAtMostOneChild(curr, prev);
      if (prev === NIL) this.root = child;
    }

    this.count--;
    if (this.count <= this.alpha * this.maxCount) {
      this.rebuild({ node: this.root, parent: NIL, size: this.count }, 'remove');
    }

    return true;
  }

  /**
   * True iff size >= alpha * maxSize, the tree is loosely alpha-height
   * balanced, keys are in BST order and the node count matches size.
   * Time complexity: O(n)
   */
  verify(): boolean {
    const report = this.checker.check(this.root);
    return this.count >= this.alpha * this.maxCount
      && report.balanced
      && report.isBST
      && report.size === this.count;
  }

  /**
   * Height of the tree, -1 when empty
   * Time complexity: O(n)
   */
  height(): number {
    return this.checker.check(this.root).height;
  }

  /**
   * Release every node at once.
   */
  clear(): void {
    this.arena.reset();
    this.root = NIL;
    this.count = 0;
    this.maxCount = 0;
    this.replaceWithSucc = true;
  }

  /**
   * Pre-order walk for diagnostics. Absent children are reported with a
   * null node so the shape can be reproduced. Iterative, so degenerate
   * shapes cannot exhaust the call stack.
   */
  traverse(visitor: TreeVisitor<K>): void {
    const pending: PendingVisit[] = [{ node: this.root, depth: 0, side: 'root' }];

    for (let visit = pending.pop(); visit !== undefined; visit = pending.pop()) {
      const { node, depth, side } = visit;
      if (node === NIL) {
        visitor({ node: null, depth, side });
        continue;
      }

      visitor({ node: { id: node, key: this.arena.key(node) }, depth, side });
      pending.push({ node: this.arena.right(node), depth: depth + 1, side: 'right' });
      pending.push({ node: this.arena.left(node), depth: depth + 1, side: 'left' });
    }
  }

  /**
   * Write a pre-order dump of the tree, for debugging.
   */
  printDebugInfo(out: NodeJS.WritableStream = process.stdout): void {
    new TreeDebugPrinter<K>().print(this, out);
  }

  getStats(): TreeStats {
    return {
      size: this.count,
      maxSize: this.maxCount,
      alpha: this.alpha,
      height: this.height(),
      rebuildCount: this.rebuilds,
      nodeCapacity: this.arena.capacity,
    };
  }

  private rebuild(scapegoat: Scapegoat, trigger: RebuildTrigger): void {
    const rebuilt = this.rebalancer.rebuildSubtree(scapegoat.node, scapegoat.size);
    const wholeTree = scapegoat.parent === NIL;

    if (wholeTree) {
      this.root = rebuilt;
      this.maxCount = this.count;
    } else if (this.arena.left(scapegoat.parent) === scapegoat.node) {
      this.arena.setLeft(scapegoat.parent, rebuilt);
    } else {
      this.arena.setRight(scapegoat.parent, rebuilt);
    }

    this.rebuilds++;
    this.onRebuild?.({
      trigger,
      subtreeSize: scapegoat.size,
      wholeTree,
      treeSize: this.count,
    });
  }
}
