import type { Logger } from 'pino';
import type {
  Comparator,
  Factory,
  FindOrInsertResult,
  LessFn,
  LinkSelector,
} from '../types/tree.js';
import { InvariantViolationError, PreconditionError, getErrorMessage } from '../utils/error-utils.js';
import { AvlCursor } from './avl-cursor.js';
import { AvlLink, LEFT, RIGHT } from './avl-link.js';
import { verifyTree } from './invariants.js';
import { rebalanceAfterErase, rebalanceAfterInsert } from './rebalancer.js';
import { extremum, nextInOrder, prevInOrder } from './traversal.js';

export interface IntrusiveAvlTreeOptions<T> {
  logger?: Logger;                    // traces inserts, erases and rotations
  verify?: boolean;                   // full structural check after every mutation
  order?: (a: T, b: T) => number;     // element order checked by `verify`
}

/**
 * The non-mutating surface of an IntrusiveAvlTree.
 */
export interface ReadonlyIntrusiveAvlTree<T, Tag extends string = string> extends Iterable<T> {
  readonly tag: Tag;
  isEmpty(): boolean;
  getSize(): number;
  begin(): AvlCursor<T, Tag>;
  end(): AvlCursor<T, Tag>;
  find(comparator: Comparator<T>): AvlCursor<T, Tag>;
  findElement(comparator: Comparator<T>): T | null;
  contains(element: T): boolean;
  findMin(): T | null;
  findMax(): T | null;
  inOrderTraversal(): IterableIterator<T>;
  reverseOrderTraversal(): IterableIterator<T>;
}

/**
 * Intrusive AVL tree.
 *
 * Elements embed their own AvlLink, selected by `linkOf`; the tree threads
 * those links together and never allocates nodes or owns elements. Removing an
 * element only resets its link.
 *
 * Keys are never stored: every search takes a tri-state comparator of the
 * sought key against an element, so one tree can be probed by whatever key
 * shape the caller has at hand.
 *
 * Key properties:
 * - Every element's balance factor is -1, 0 or +1 between operations
 * - In-order traversal is strictly increasing, no duplicates
 * - Erasing an element leaves cursors on every other element valid
 *
 * Not safe for concurrent use; callers serialize access.
 */
export class IntrusiveAvlTree<T, Tag extends string = string> implements ReadonlyIntrusiveAvlTree<T, Tag> {
  private readonly origin: AvlLink<T, Tag>;   // origin.left is the root
  private size = 0;
  private readonly logger: Logger | undefined;
  private readonly verify: boolean;
  private readonly order: ((a: T, b: T) => number) | undefined;

  /**
   * @param tag - Identity of the links this tree threads; must match every element's link
   * @param linkOf - Selects the element's link for this tree
   */
  constructor(
    readonly tag: Tag,
    private readonly linkOf: LinkSelector<T, Tag>,
    options: IntrusiveAvlTreeOptions<T> = {}
  ) {
    this.origin = new AvlLink<T, Tag>(null, tag);
    this.logger = options.logger;
    this.verify = options.verify ?? false;
    this.order = options.order;
  }

  /**
   * Builds a tree from a sequence ordered by `less`. Later elements equivalent
   * to an earlier one are dropped (first occurrence wins).
   */
  static from<T, Tag extends string>(
    tag: Tag,
    linkOf: LinkSelector<T, Tag>,
    values: Iterable<T>,
    less: LessFn<T>,
    options: IntrusiveAvlTreeOptions<T> = {}
  ): IntrusiveAvlTree<T, Tag> {
    const tree = new IntrusiveAvlTree<T, Tag>(tag, linkOf, options);
    tree.assign(values, less);
    return tree;
  }

  /**
   * Links every value of the sequence, adapting `less` to a tri-state
   * comparator. Equivalence (neither sorts before the other) counts as a
   * match, so duplicates keep the element already present.
   * @returns Number of elements actually linked
   */
  assign(values: Iterable<T>, less: LessFn<T>): number {
    let linked = 0;
    for (const value of values) {
      const { inserted } = this.findOrInsert(
        element => (less(value, element) ? -1 : less(element, value) ? 1 : 0),
        () => value
      );
      if (inserted) linked++;
    }
    return linked;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  getSize(): number {
    return this.size;
  }

  /** Cursor on the smallest element, or end() when empty. */
  begin(): AvlCursor<T, Tag> {
    return new AvlCursor(extremum(this.origin, LEFT));
  }

  end(): AvlCursor<T, Tag> {
    return new AvlCursor(this.origin);
  }

  /**
   * Descends from the root: left on a negative comparison, right on a
   * positive one.
   * @returns Cursor on the matching element, or end() when there is none
   */
  find(comparator: Comparator<T>): AvlCursor<T, Tag> {
    return new AvlCursor(this.findLink(comparator) ?? this.origin);
  }

  findElement(comparator: Comparator<T>): T | null {
    return this.findLink(comparator)?.owner ?? null;
  }

  /** True when `element`'s link for this tree is threaded into this tree. */
  contains(element: T): boolean {
    return this.owns(this.linkOf(element));
  }

  /**
   * Finds the element matching `comparator` or, on a miss, links the element
   * produced by `factory` at the position the search ended.
   *
   * The factory runs at most once and only on a miss. Returning null or
   * undefined from it rejects the insertion and leaves the tree untouched.
   *
   * @throws PreconditionError if the produced element's link is already in a
   *   tree or carries a different tag
   */
  findOrInsert(comparator: Comparator<T>, factory: Factory<T>): FindOrInsertResult<T, Tag> {
    let parent = this.origin;
    let direction = LEFT;
    let current = this.origin.left;

    while (current !== null) {
      const owner = current.owner;
      if (owner === null) {
        throw new InvariantViolationError('Origin link reachable below the root');
      }
      const cmp = comparator(owner);
      if (cmp === 0) {
        return { position: new AvlCursor(current), inserted: false };
      }
      parent = current;
      direction = cmp > 0;
      current = current.getChild(direction);
    }

    const element = factory();
    if (element === null || element === undefined) {
      return { position: this.end(), inserted: false };
    }

    const link = this.linkOf(element);
    if (link.tag !== this.tag) {
      throw new PreconditionError(`Link tagged '${link.tag}' cannot join a tree of '${this.tag}' links`);
    }
    if (link.owner === null || link.parent !== null || link.left !== null || link.right !== null) {
      throw new PreconditionError('Element is already linked into a tree');
    }

    link.parent = parent;
    link.balance = 0;
    parent.setChild(direction, link);
    this.size++;

    rebalanceAfterInsert(link, this.logger);
    this.logger?.trace({ size: this.size }, 'AVL insert');
    this.checkInvariants('findOrInsert');

    return { position: new AvlCursor(link), inserted: true };
  }

  /**
   * Unlinks an element, given directly or by cursor. The element itself is
   * untouched apart from its link being reset.
   * @returns Cursor on the in-order successor of the erased element
   * @throws PreconditionError for a default or end() cursor, or an element
   *   that is not in this tree
   */
  erase(target: AvlCursor<T, Tag> | T): AvlCursor<T, Tag> {
    const link = target instanceof AvlCursor ? target.link : this.linkOf(target);
    if (link === null) {
      throw new PreconditionError('Cannot erase through a default cursor');
    }
    if (link === this.origin) {
      throw new PreconditionError('Cannot erase end()');
    }
    if (!this.owns(link)) {
      throw new PreconditionError('Element is not linked into this tree');
    }

    // Positions are swapped rather than values moved, so the successor link
    // computed here is still the successor once `link` is gone.
    const next = nextInOrder(link);
    this.unlink(link);

    this.logger?.trace({ size: this.size }, 'AVL erase');
    this.checkInvariants('erase');
    return new AvlCursor(next);
  }

  /** Unlinks every element, resetting each link. */
  clear(): void {
    const pending: AvlLink<T, Tag>[] = [];
    if (this.origin.left !== null) pending.push(this.origin.left);

    let link = pending.pop();
    while (link !== undefined) {
      if (link.left !== null) pending.push(link.left);
      if (link.right !== null) pending.push(link.right);
      link.reset();
      link = pending.pop();
    }

    this.origin.left = null;
    this.size = 0;
  }

  findMin(): T | null {
    return this.origin.left === null ? null : extremum(this.origin.left, LEFT).owner;
  }

  findMax(): T | null {
    return this.origin.left === null ? null : extremum(this.origin.left, RIGHT).owner;
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.inOrderTraversal();
  }

  /**
   * Elements in ascending order. The successor is taken before each element
   * is yielded, so the consumer may erase the element it was just given.
   */
  *inOrderTraversal(): IterableIterator<T> {
    let link = extremum(this.origin, LEFT);
    while (link !== this.origin) {
      const next = nextInOrder(link);
      if (link.owner !== null) yield link.owner;
      link = next;
    }
  }

  *reverseOrderTraversal(): IterableIterator<T> {
    let link = prevInOrder(this.origin);
    while (link !== this.origin) {
      const previous = prevInOrder(link);
      if (link.owner !== null) yield link.owner;
      link = previous;
    }
  }

  private findLink(comparator: Comparator<T>): AvlLink<T, Tag> | null {
    let current = this.origin.left;
    while (current !== null) {
      const owner = current.owner;
      if (owner === null) return null;
      const cmp = comparator(owner);
      if (cmp === 0) return current;
      current = current.getChild(cmp > 0);
    }
    return null;
  }

  // Walks parents up to an origin; O(height).
  private owns(link: AvlLink<T, Tag>): boolean {
    if (link.owner === null) return false;
    let current = link;
    while (current.parent !== null) {
      current = current.parent;
    }
    return current === this.origin;
  }

  private unlink(link: AvlLink<T, Tag>): void {
    const left = link.left;
    const right = link.right;
    if (left !== null && right !== null) {
      this.swapWithSuccessor(link, left, right);
    }

    // `link` now has at most one child.
    const parent = link.parent;
    if (parent === null) {
      throw new InvariantViolationError('Linked element lost its parent');
    }
    const side = link.isChild(RIGHT);
    const child = link.left ?? link.right;

    parent.setChild(side, child);
    if (child !== null) child.parent = parent;

    link.reset();
    this.size--;

    rebalanceAfterErase(parent, side, this.logger);
  }

  /**
   * Exchanges the tree positions (links and balance factors, not elements) of
   * a two-child node and its in-order successor. Afterwards `node` sits where
   * the successor was and has no left child.
   */
  private swapWithSuccessor(node: AvlLink<T, Tag>, left: AvlLink<T, Tag>, right: AvlLink<T, Tag>): void {
    const successor = extremum(right, LEFT);
    const parent = node.parent;
    const successorParent = successor.parent;
    if (parent === null || successorParent === null) {
      throw new InvariantViolationError('Linked element lost its parent');
    }
    const side = node.isChild(RIGHT);
    const successorRight = successor.right;

    const balance = node.balance;
    node.balance = successor.balance;
    successor.balance = balance;

    parent.setChild(side, successor);
    successor.parent = parent;
    successor.left = left;
    left.parent = successor;

    if (successor === right) {
      successor.right = node;
      node.parent = successor;
    } else {
      successor.right = right;
      right.parent = successor;
      successorParent.left = node;
      node.parent = successorParent;
    }

    node.left = null;
    node.right = successorRight;
    if (successorRight !== null) successorRight.parent = node;
  }

  private checkInvariants(operation: string): void {
    if (!this.verify) return;
    try {
      verifyTree(this, this.order);
    } catch (error) {
      this.logger?.error({ operation, reason: getErrorMessage(error) }, 'AVL invariant violated');
      throw error;
    }
  }
}
