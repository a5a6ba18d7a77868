import type { IndexPath } from './index-path';

export type TreeSelectionErrorReason = 'invalid-operation' | 'out-of-range';

/** Raised synchronously by the selection model for misuse it cannot coerce. */
export class TreeSelectionError extends Error {
  readonly reason: TreeSelectionErrorReason;
  readonly path?: IndexPath;

  constructor(reason: TreeSelectionErrorReason, message: string, path?: IndexPath) {
    super(message);
    this.name = 'TreeSelectionError';
    this.reason = reason;
    this.path = path;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
