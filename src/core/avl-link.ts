import type { Direction } from '../types/tree.js';

export const LEFT: Direction = false;
export const RIGHT: Direction = true;

/**
 * Link record embedded in every element that can be stored in an
 * IntrusiveAvlTree. The tree threads these together; it never allocates
 * wrapper nodes of its own.
 *
 * An element joins several trees by carrying one link per tree, each with its
 * own tag:
 *
 *   class Order {
 *     readonly byPrice = new AvlLink<Order, 'price'>(this, 'price');
 *     readonly byId = new AvlLink<Order, 'id'>(this, 'id');
 *   }
 *
 * A link with no owner is an origin sentinel: the parent of a tree's root
 * and the end-of-sequence marker for cursors.
 */
export class AvlLink<T, Tag extends string = string> {
  parent: AvlLink<T, Tag> | null = null;   // null only for an origin or an unlinked link
  left: AvlLink<T, Tag> | null = null;
  right: AvlLink<T, Tag> | null = null;
  balance = 0;                             // height(right) - height(left)

  /**
   * @param owner - The element embedding this link, or null for an origin
   * @param tag - Identity of the tree family this link participates in
   */
  constructor(readonly owner: T | null, readonly tag: Tag) {}

  getChild(direction: Direction): AvlLink<T, Tag> | null {
    return direction ? this.right : this.left;
  }

  setChild(direction: Direction, link: AvlLink<T, Tag> | null): void {
    if (direction) {
      this.right = link;
    } else {
      this.left = link;
    }
  }

  getParent(): AvlLink<T, Tag> | null {
    return this.parent;
  }

  /** True iff this link is exactly the `direction` child of its parent. */
  isChild(direction: Direction): boolean {
    return this.parent !== null && this.parent.getChild(direction) === this;
  }

  /**
   * True iff the parent is absent. Holds for a tree's origin, and also for an
   * element link that is not currently in any tree.
   */
  isOrigin(): boolean {
    return this.parent === null;
  }

  isLinked(): boolean {
    return this.owner !== null && this.parent !== null;
  }

  /** Returns the link to the freshly constructed state. */
  reset(): void {
    this.parent = null;
    this.left = null;
    this.right = null;
    this.balance = 0;
  }
}
