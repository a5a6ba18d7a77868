import { IndexPath, IndexPathRange } from '../types/index-path';
import { TreeSelectionChangedEvent } from '../types/tree-selection-events';
import { TreeSelectionSource } from '../types/tree-selection-source';

/** Items covered by sibling ranges, in range order. */
export function resolveRangeItems<T>(
  source: TreeSelectionSource<T> | null,
  ranges: readonly IndexPathRange[],
): T[] {
  if (!source) {
    return [];
  }

  const items: T[] = [];
  for (const range of ranges) {
    const parent = range.start.parent();
    const first = range.start.leaf();
    const last = range.end.leaf();
    const children = parent ? source.childrenAt(parent) : undefined;
    if (children && first !== undefined && last !== undefined) {
      items.push(...children.slice(first, last + 1));
    }
  }
  return items;
}

/**
 * Item that was at `path` before `removedItems` were spliced out at `index`
 * under `parentPath`. Descendants are reached through `childrenOf`.
 */
export function resolveRemovedItem<T>(
  source: TreeSelectionSource<T> | null,
  parentPath: IndexPath,
  index: number,
  removedItems: readonly T[],
  path: IndexPath,
): T | undefined {
  const depth = parentPath.size;
  const removedIndex = path.at(depth);
  if (removedIndex === undefined || removedIndex < index) {
    return undefined;
  }

  let item = removedItems.at(removedIndex - index);
  for (const childIndex of path.toArray().slice(depth + 1)) {
    if (item === undefined) {
      return undefined;
    }
    item = source?.childrenOf?.(item)?.at(childIndex);
  }
  return item;
}

export function createSelectionChangedEvent<T>(
  source: TreeSelectionSource<T> | null,
  deselectedIndexes: readonly IndexPathRange[],
  selectedIndexes: readonly IndexPathRange[],
  lostItems: readonly T[],
): TreeSelectionChangedEvent<T> {
  let deselectedItems: readonly T[] | undefined;
  let selectedItems: readonly T[] | undefined;

  return {
    deselectedIndexes,
    selectedIndexes,
    get deselectedItems(): readonly T[] {
      deselectedItems ??= [...resolveRangeItems(source, deselectedIndexes), ...lostItems];
      return deselectedItems;
    },
    get selectedItems(): readonly T[] {
      selectedItems ??= resolveRangeItems(source, selectedIndexes);
      return selectedItems;
    },
  };
}
