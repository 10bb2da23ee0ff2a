/**
 * DeletionEngine - splices nodes out of the tree
 *
 * Two-child nodes keep their slot and take the key of their in-order
 * successor or predecessor, which is released instead. Which one is used
 * is decided by the caller and should alternate between calls, so that
 * repeated removals do not skew the tree towards one side.
 */

import { TreeKey } from '../common/Types';
import { NodeArena, NodeId, NIL } from './NodeArena';

export class DeletionEngine<K extends TreeKey> {
  private readonly arena: NodeArena<K>;

  constructor(arena: NodeArena<K>) {
    this.arena = arena;
  }

  /**
   * Remove the key held by a node with two children.
   * The node stays in place; the successor/predecessor slot is released.
   */
  removeWithTwoChildren(node: NodeId, useSuccessor: boolean): void {
    const replacement = useSuccessor
      ? this.detachSuccessor(node)
      : this.detachPredecessor(node);

    this.arena.setKey(node, this.arena.key(replacement));
    this.arena.release(replacement);
  }

  /**
   * Remove a node with at most one child, replacing it by that child.
   * Returns the replacement so the caller can update the root slot when
   * parent is NIL.
   */
  removeWithAtMostOneChild(node: NodeId, parent: NodeId): NodeId {
    const left = this.arena.left(node);
    const child = left !== NIL ? left : this.arena.right(node);

    if (parent !== NIL) {
      if (this.arena.left(parent) === node) {
        this.arena.setLeft(parent, child);
      } else {
        this.arena.setRight(parent, child);
      }
    }

    this.arena.release(node);
    return child;
  }

  /**
   * Unlink the minimum of node's right subtree (it has no left child).
   */
  private detachSuccessor(node: NodeId): NodeId {
    let prev = node;
    let curr = this.arena.right(node);

    if (this.arena.left(curr) === NIL) {
      this.arena.setRight(node, this.arena.right(curr));
      return curr;
    }

    while (this.arena.left(curr) !== NIL) {
      prev = curr;
      curr = this.arena.left(curr);
    }
    this.arena.setLeft(prev, this.arena.right(curr));
    return curr;
  }

  /**
   * Unlink the maximum of node's left subtree (it has no right child).
   */
  private detachPredecessor(node: NodeId): NodeId {
    let prev = node;
    let curr = this.arena.left(node);

    if (this.arena.right(curr) === NIL) {
      this.arena.setLeft(node, this.arena.left(curr));
      return curr;
    }

    while (this.arena.right(curr) !== NIL) {
      prev = curr;
      curr = this.arena.right(curr);
    }
    this.arena.setRight(prev, this.arena.left(curr));
    return curr;
  }
}
