/**
 * NodeArena - index-addressed storage for tree nodes
 *
 * Each node is a slot in three parallel columns (key, left, right). Child
 * relations hold slot indices, with NIL standing for "no node". Released
 * slots go on a free list and are handed out again by allocate().
 *
 * The tree never copies nodes between slots: rebuilds only rewrite the
 * left/right columns, so a key stays in the slot it was inserted into
 * (except when a two-child removal overwrites it).
 */

import { TreeCorruptionError } from '../common/Errors';
import { TreeKey } from '../common/Types';

export type NodeId = number;

export const NIL: NodeId = -1;

export class NodeArena<K extends TreeKey> {
  private keys: Array<K | undefined> = [];
  private lefts: NodeId[] = [];
  private rights: NodeId[] = [];
  private freeSlots: NodeId[] = [];
  private liveCount: number = 0;

  /**
   * Number of allocated nodes
   */
  get size(): number {
    return this.liveCount;
  }

  /**
   * Number of slots, live or free
   */
  get capacity(): number {
    return this.keys.length;
  }

  /**
   * Create a leaf holding the given key
   * Time complexity: O(1) amortized
   */
  allocate(key: K): NodeId {
    const reused = this.freeSlots.pop();
    let id: NodeId;

    if (reused !== undefined) {
      id = reused;
      this.keys[id] = key;
      this.lefts[id] = NIL;
      this.rights[id] = NIL;
    } else {
      id = this.keys.length;
      this.keys.push(key);
      this.lefts.push(NIL);
      this.rights.push(NIL);
    }

    this.liveCount++;
    return id;
  }

  release(id: NodeId): void {
    this.checkLive(id);
    this.keys[id] = undefined;
    this.lefts[id] = NIL;
    this.rights[id] = NIL;
    this.freeSlots.push(id);
    this.liveCount--;
  }

  /**
   * Drop every node at once.
   */
  reset(): void {
    this.keys = [];
    this.lefts = [];
    this.rights = [];
    this.freeSlots = [];
    this.liveCount = 0;
  }

  isLive(id: NodeId): boolean {
    return id >= 0 && id < this.keys.length && this.keys[id] !== undefined;
  }

  key(id: NodeId): K {
    const key = this.keys[id];
    if (key === undefined) {
      throw new TreeCorruptionError(`node ${id} is not allocated`);
    }
    return key;
  }

  setKey(id: NodeId, key: K): void {
    this.checkLive(id);
    this.keys[id] = key;
  }

  left(id: NodeId): NodeId {
    return this.read(this.lefts, id);
  }

  right(id: NodeId): NodeId {
    return this.read(this.rights, id);
  }

  setLeft(id: NodeId, child: NodeId): void {
    this.checkLive(id);
    this.lefts[id] = child;
  }

  setRight(id: NodeId, child: NodeId): void {
    this.checkLive(id);
    this.rights[id] = child;
  }

  private read(column: NodeId[], id: NodeId): NodeId {
    this.checkLive(id);
    const value = column[id];
    if (value === undefined) {
      throw new TreeCorruptionError(`node ${id} has no child slot`);
    }
    return value;
  }

  private checkLive(id: NodeId): void {
    if (!this.isLive(id)) {
      throw new TreeCorruptionError(`node ${id} is not allocated`);
    }
  }
}
