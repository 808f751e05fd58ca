import type { Direction } from '../types/tree.js';
import { PreconditionError } from '../utils/error-utils.js';
import type { AvlLink } from './avl-link.js';
import { nextInOrder, prevInOrder } from './traversal.js';

/**
 * Bidirectional cursor over an IntrusiveAvlTree.
 *
 * Wraps a link, or nothing for a default cursor. A cursor positioned at
 * end() wraps the tree's origin: it still `hasValue()`, but has no element to
 * dereference. Stepping back from end() reaches the last element.
 *
 * Cursors stay valid across insertions and across erasure of any element other
 * than the one they point at.
 */
export class AvlCursor<T, Tag extends string = string> {
  private current: AvlLink<T, Tag> | null;

  constructor(link: AvlLink<T, Tag> | null = null) {
    this.current = link;
  }

  /** The wrapped link; null for a default cursor. */
  get link(): AvlLink<T, Tag> | null {
    return this.current;
  }

  /** False only for a default (never positioned) cursor. */
  hasValue(): boolean {
    return this.current !== null;
  }

  /**
   * The element under the cursor.
   * @throws PreconditionError when the cursor is default or at end()
   */
  get value(): T {
    const link = this.current;
    if (link === null) {
      throw new PreconditionError('Cannot dereference a default cursor');
    }
    if (link.owner === null) {
      throw new PreconditionError('Cannot dereference the end() cursor');
    }
    return link.owner;
  }

  /** Pre-increment: moves to the in-order successor and returns this cursor. */
  increment(): this {
    if (this.current !== null) {
      this.current = nextInOrder(this.current);
    }
    return this;
  }

  /** Pre-decrement: moves to the in-order predecessor and returns this cursor. */
  decrement(): this {
    if (this.current !== null) {
      this.current = prevInOrder(this.current);
    }
    return this;
  }

  /** Post-increment: moves forward and returns a cursor at the previous position. */
  postIncrement(): AvlCursor<T, Tag> {
    const previous = this.clone();
    this.increment();
    return previous;
  }

  postDecrement(): AvlCursor<T, Tag> {
    const previous = this.clone();
    this.decrement();
    return previous;
  }

  equals(other: AvlCursor<T, Tag>): boolean {
    return this.current === other.current;
  }

  clone(): AvlCursor<T, Tag> {
    return new AvlCursor(this.current);
  }

  /**
   * Balance factor of the element under the cursor (for diagnostics).
   * @throws PreconditionError when the cursor is default or at end()
   */
  getBalanceFactor(): number {
    return this.elementLink().balance;
  }

  /**
   * Cursor on the element's child in the given direction; a default cursor
   * when there is none.
   */
  getChild(direction: Direction): AvlCursor<T, Tag> {
    return new AvlCursor(this.elementLink().getChild(direction));
  }

  private elementLink(): AvlLink<T, Tag> {
    const link = this.current;
    if (link === null || link.owner === null) {
      throw new PreconditionError('Cursor does not point at an element');
    }
    return link;
  }
}
