import { InvariantViolationError } from '../utils/error-utils.js';
import type { AvlLink } from './avl-link.js';
import type { ReadonlyIntrusiveAvlTree } from './intrusive-avl-tree.js';

interface Walk<T, Tag extends string> {
  tag: Tag;
  count: number;
  origin: AvlLink<T, Tag>;
}

// Returns the subtree height, checking each link on the way back up.
function measure<T, Tag extends string>(
  link: AvlLink<T, Tag> | null,
  expectedParent: AvlLink<T, Tag>,
  walk: Walk<T, Tag>
): number {
  if (link === null) return 0;
  if (link.parent !== expectedParent) {
    throw new InvariantViolationError('Child link does not point back at its parent');
  }
  if (link.owner === null || link === walk.origin) {
    throw new InvariantViolationError('Ownerless link found below the root');
  }
  if (link.tag !== walk.tag) {
    throw new InvariantViolationError(`Link tagged '${link.tag}' found in a tree of '${walk.tag}' links`);
  }

  const leftHeight = measure(link.left, link, walk);
  const rightHeight = measure(link.right, link, walk);
  const expected = rightHeight - leftHeight;

  if (link.balance !== expected) {
    throw new InvariantViolationError(
      `Balance factor ${link.balance} recorded where subtree heights give ${expected}`
    );
  }
  if (expected > 1 || expected < -1) {
    throw new InvariantViolationError(`Subtree heights differ by ${expected}`);
  }

  walk.count++;
  return 1 + Math.max(leftHeight, rightHeight);
}

/**
 * Full structural check of a tree: origin shape, parent back-references,
 * exact balance factors within the AVL bound, the size counter and, when
 * `order` is given, strictly increasing in-order elements.
 *
 * O(n); meant for tests and for the `verify` tree option.
 *
 * @returns Height of the tree (0 when empty)
 * @throws InvariantViolationError describing the first inconsistency found
 */
export function verifyTree<T, Tag extends string>(
  tree: ReadonlyIntrusiveAvlTree<T, Tag>,
  order?: (a: T, b: T) => number
): number {
  const origin = tree.end().link;
  if (origin === null || origin.owner !== null) {
    throw new InvariantViolationError('end() does not point at an origin');
  }
  if (origin.parent !== null || origin.right !== null) {
    throw new InvariantViolationError('Origin may only reference the root');
  }

  const walk: Walk<T, Tag> = { tag: tree.tag, count: 0, origin };
  const height = measure(origin.left, origin, walk);

  if (walk.count !== tree.getSize()) {
    throw new InvariantViolationError(`Size is ${tree.getSize()} but ${walk.count} elements are linked`);
  }

  if (order) {
    let previous: { element: T } | null = null;
    for (const element of tree) {
      if (previous !== null && order(previous.element, element) >= 0) {
        throw new InvariantViolationError('In-order traversal is not strictly increasing');
      }
      previous = { element };
    }
  }

  return height;
}
