import { IndexPath } from '../types/index-path';
import type { TreeSelectionNode } from './selection-node';

/** Per-child state of a selection node. Absent indexes are not selected. */
export type SelectionEntry =
  | { readonly kind: 'selected' }
  | { readonly kind: 'node'; readonly node: TreeSelectionNode };

/** What a selection node needs to know about the live source tree. */
export interface SelectionNodeOwner {
  childCountAt(path: IndexPath): number;
}

export interface SelectionRecorder {
  recordSelected(path: IndexPath): void;
  recordDeselected(path: IndexPath): void;
}

export interface ShiftResult {
  /**
   * Pre-splice paths of every selected item removed with the spliced children,
   * descendants included, in document order.
   */
  lostPaths: IndexPath[];
}
