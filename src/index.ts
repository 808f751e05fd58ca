export { AvlLink, LEFT, RIGHT } from './core/avl-link.js';
export { AvlCursor } from './core/avl-cursor.js';
export {
  IntrusiveAvlTree,
  type IntrusiveAvlTreeOptions,
  type ReadonlyIntrusiveAvlTree,
} from './core/intrusive-avl-tree.js';
export { extremum, nextInOrder, prevInOrder } from './core/traversal.js';
export { verifyTree } from './core/invariants.js';
export { toGraphviz } from './core/graphviz.js';
export type {
  Comparator,
  Direction,
  Factory,
  FindOrInsertResult,
  LessFn,
  LinkSelector,
} from './types/tree.js';
export {
  AvlTreeError,
  InvariantViolationError,
  PreconditionError,
  getErrorMessage,
  type AvlTreeErrorCode,
} from './utils/error-utils.js';
export { loadConfig, type AppConfig } from './config.js';
export { createLogger } from './utils/logger.js';
