/**
 * Error types raised by the tree and a helper for logging caught values
 */

export type AvlTreeErrorCode = 'PRECONDITION' | 'INVARIANT';

export class AvlTreeError extends Error {
  readonly code: AvlTreeErrorCode;

  constructor(code: AvlTreeErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised at the point a caller breaks an operation's contract:
 * dereferencing a default or end cursor, linking an element that is already
 * linked, erasing an element that belongs to another tree.
 */
export class PreconditionError extends AvlTreeError {
  constructor(message: string) {
    super('PRECONDITION', message);
  }
}

/** Raised by structural verification when the link graph is inconsistent. */
export class InvariantViolationError extends AvlTreeError {
  constructor(message: string) {
    super('INVARIANT', message);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
