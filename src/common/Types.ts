/**
 * Common type definitions shared by the tree, its engines and the service layer.
 */

/**
 * Any value except `undefined` can be stored as a key.
 */
export type TreeKey = NonNullable<unknown> | null;

/**
 * Strict-less-than predicate. Must describe a strict total order: two keys
 * where neither is less than the other are the same key.
 */
export type LessThan<K> = (lhs: K, rhs: K) => boolean;

/**
 * Three-way comparison: negative, zero or positive.
 */
export type Comparator<K> = (a: K, b: K) => number;

export type RebuildTrigger = 'insert' | 'remove';

export interface RebuildEvent {
  readonly trigger: RebuildTrigger;
  /** Number of nodes in the rebuilt subtree */
  readonly subtreeSize: number;
  /** True when the scapegoat was the root */
  readonly wholeTree: boolean;
  readonly treeSize: number;
}

export type RebuildListener = (event: RebuildEvent) => void;

export interface TreeStats {
  size: number;
  maxSize: number;
  alpha: number;
  height: number;
  rebuildCount: number;
  /** Arena slots, live or free. Includes the slot a rebuild borrows for its list terminator. */
  nodeCapacity: number;
}

export type ChildSide = 'root' | 'left' | 'right';

export interface VisitedNode<K> {
  readonly id: number;
  readonly key: K;
}

export interface TraversalEntry<K> {
  /** null for an absent child slot */
  readonly node: VisitedNode<K> | null;
  readonly depth: number;
  readonly side: ChildSide;
}

export type TreeVisitor<K> = (entry: TraversalEntry<K>) => void;
