import type { Direction } from '../types/tree.js';
import { AvlLink, LEFT, RIGHT } from './avl-link.js';

/**
 * Descends from `link` via `direction` until there is no further child.
 * LEFT yields the leftmost descendant, RIGHT the rightmost.
 */
export function extremum<T, Tag extends string>(link: AvlLink<T, Tag>, direction: Direction): AvlLink<T, Tag> {
  let current = link;
  let child = current.getChild(direction);
  while (child !== null) {
    current = child;
    child = current.getChild(direction);
  }
  return current;
}

// One in-order step towards `direction`: the extremum of the child subtree on
// that side, or else the first ancestor reached from its other side.
function step<T, Tag extends string>(link: AvlLink<T, Tag>, direction: Direction): AvlLink<T, Tag> {
  const child = link.getChild(direction);
  if (child !== null) {
    return extremum(child, !direction);
  }

  let current = link;
  let parent = current.parent;
  while (parent !== null && parent.getChild(direction) === current) {
    current = parent;
    parent = current.parent;
  }
  // Every linked element has a chain of parents ending at the origin, so
  // parent is only null here when `link` is an empty origin or unlinked.
  return parent ?? current;
}

/**
 * In-order successor. Saturates at the origin: the successor of the last
 * element is the origin, and the origin's successor is itself.
 */
export function nextInOrder<T, Tag extends string>(link: AvlLink<T, Tag>): AvlLink<T, Tag> {
  if (link.isOrigin()) return link;
  return step(link, RIGHT);
}

/**
 * In-order predecessor. From the origin this is the rightmost element of the
 * tree (so stepping back from end() reaches the last element); from the first
 * element it is the origin.
 */
export function prevInOrder<T, Tag extends string>(link: AvlLink<T, Tag>): AvlLink<T, Tag> {
  return step(link, LEFT);
}
