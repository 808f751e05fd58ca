import type { AvlLink } from '../core/avl-link.js';
import type { AvlCursor } from '../core/avl-cursor.js';

/** false = left, true = right */
export type Direction = boolean;

/**
 * Tri-state comparison of the sought key against a stored element:
 * negative if the key sorts before the element, zero on a match, positive after.
 */
export type Comparator<T> = (element: T) => number;

/** Strict weak ordering used by bulk construction (`a < b`). */
export type LessFn<T> = (a: T, b: T) => boolean;

/** Produces the element to link on a miss; null/undefined rejects the insertion. */
export type Factory<T> = () => T | null | undefined;

/** Maps an element to the link it embeds for one particular tree. */
export type LinkSelector<T, Tag extends string> = (element: T) => AvlLink<T, Tag>;

export interface FindOrInsertResult<T, Tag extends string> {
  position: AvlCursor<T, Tag>;  // existing or newly linked element; end() when rejected
  inserted: boolean;
}
