import { IndexPath, IndexPathRange } from './index-path';

/** One committed batch. Item lists are resolved on first access. */
export interface TreeSelectionChangedEvent<T> {
  deselectedIndexes: readonly IndexPathRange[];
  selectedIndexes: readonly IndexPathRange[];
  /** Items of `deselectedIndexes`, plus selected items the source removed. */
  readonly deselectedItems: readonly T[];
  readonly selectedItems: readonly T[];
}

export type TreeSelectionProperty = 'selectedIndex' | 'anchorIndex';

export interface TreeSelectionPropertyChange {
  property: TreeSelectionProperty;
  oldValue: IndexPath;
  newValue: IndexPath;
}

export interface TreeIndexesChangedEvent {
  parentPath: IndexPath;
  startIndex: number;
  delta: number;
}
