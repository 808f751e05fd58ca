import type { Logger } from 'pino';
import type { Direction } from '../types/tree.js';
import { InvariantViolationError } from '../utils/error-utils.js';
import { AvlLink, RIGHT } from './avl-link.js';

/**
 * AVL rebalancing over intrusive links.
 *
 * Balance factors are maintained incrementally (right height minus left
 * height) and never recomputed from subtree heights. Rotations only relink
 * the three links involved and adjust the two balance factors that change;
 * element contents are never touched.
 */

/**
 * Rotates `node` towards `direction`: its child on the opposite side takes its
 * place and `node` becomes that child's `direction` child.
 * LEFT lifts the right child, RIGHT lifts the left child.
 * @returns The link now occupying `node`'s former position
 */
export function rotate<T, Tag extends string>(node: AvlLink<T, Tag>, direction: Direction): AvlLink<T, Tag> {
  const pivot = node.getChild(!direction);
  if (pivot === null) {
    throw new InvariantViolationError('Rotation requires a child on the rising side');
  }
  const parent = node.parent;
  if (parent === null) {
    throw new InvariantViolationError('Cannot rotate an origin or unlinked link');
  }

  const side = node.isChild(RIGHT);
  const inner = pivot.getChild(direction);

  node.setChild(!direction, inner);
  if (inner !== null) inner.parent = node;

  pivot.setChild(direction, node);
  node.parent = pivot;

  parent.setChild(side, pivot);
  pivot.parent = parent;

  // Exact balance update for arbitrary prior factors (including the
  // transient +2/-2 seen mid double rotation).
  const a = node.balance;
  const b = pivot.balance;
  if (direction === RIGHT) {
    node.balance = a + 1 - Math.min(b, 0);
    pivot.balance = b + 1 + Math.max(node.balance, 0);
  } else {
    node.balance = a - 1 - Math.max(b, 0);
    pivot.balance = b - 1 + Math.min(node.balance, 0);
  }

  return pivot;
}

/**
 * Repairs a node whose balance factor has reached +2 or -2.
 *
 * Single rotation when the heavy child is level or leans the same way as
 * `node`; otherwise the heavy child is first rotated the other way (double
 * rotation).
 * @returns The new root of the repaired subtree
 */
export function restoreBalance<T, Tag extends string>(node: AvlLink<T, Tag>, logger?: Logger): AvlLink<T, Tag> {
  const heavy: Direction = node.balance > 0;
  const child = node.getChild(heavy);
  if (child === null) {
    throw new InvariantViolationError(`Balance factor ${node.balance} with no child on the heavy side`);
  }

  const leansAway = heavy ? child.balance < 0 : child.balance > 0;
  if (leansAway) {
    rotate(child, heavy);
  }
  const top = rotate(node, !heavy);

  logger?.trace({ rotation: leansAway ? 'double' : 'single', balance: top.balance }, 'AVL rotation');
  return top;
}

function isUnbalanced(balance: number): boolean {
  return balance > 1 || balance < -1;
}

/**
 * Walks up from a freshly linked leaf. Stops at the first node whose balance
 * returns to 0 (subtree height unchanged) or after a rotation, which always
 * restores the pre-insert height.
 */
export function rebalanceAfterInsert<T, Tag extends string>(link: AvlLink<T, Tag>, logger?: Logger): void {
  let child = link;
  let node = link.parent;

  while (node !== null && !node.isOrigin()) {
    node.balance += child.isChild(RIGHT) ? 1 : -1;

    if (node.balance === 0) return;
    if (isUnbalanced(node.balance)) {
      restoreBalance(node, logger);
      return;
    }

    child = node;
    node = node.parent;
  }
}

/**
 * Walks up from the parent of a removed slot, `shrunk` naming the side whose
 * height dropped by one. A node going from 0 to +1/-1 keeps its height and
 * ends the walk; a rotation ends it only when the rotated subtree kept its
 * height (new top not level). Otherwise the decrease propagates.
 */
export function rebalanceAfterErase<T, Tag extends string>(
  start: AvlLink<T, Tag>,
  shrunk: Direction,
  logger?: Logger
): void {
  let node = start;
  let direction = shrunk;

  while (!node.isOrigin()) {
    node.balance += direction ? -1 : 1;

    let top = node;
    if (isUnbalanced(node.balance)) {
      top = restoreBalance(node, logger);
      if (top.balance !== 0) return;
    } else if (node.balance !== 0) {
      return;
    }

    const parent = top.parent;
    if (parent === null) return;
    direction = top.isChild(RIGHT);
    node = parent;
  }
}
