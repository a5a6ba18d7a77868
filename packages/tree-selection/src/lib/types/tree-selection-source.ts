import type { Observable } from 'rxjs';

import { IndexPath } from './index-path';

/** A splice of one child list in the source tree. */
export interface TreeStructuralChange<T> {
  parentPath: IndexPath;
  /** First child index affected by the splice. */
  index: number;
  /** Positive for insertions, negative for removals. */
  delta: number;
  /** Items taken out of the tree when `delta` is negative. */
  removedItems?: readonly T[];
}

/** Contract the selection model consumes from the tree it tracks. */
export interface TreeSelectionSource<T> {
  /** Number of children under `path`; 0 for leaves and unknown paths. */
  childCountAt(path: IndexPath): number;
  childrenAt(path: IndexPath): readonly T[] | undefined;
  /** Throws `TreeSelectionError` (`out-of-range`) for unresolvable paths. */
  itemAt(path: IndexPath): T;
  /**
   * Children of an item that may no longer be in the tree. Lets removed
   * selected descendants be reported; without it only directly removed items
   * are.
   */
  childrenOf?(item: T): readonly T[] | undefined;
  /**
   * Structural changes, delivered synchronously after the source has been
   * mutated.
   */
  readonly changes$?: Observable<TreeStructuralChange<T>>;
}
