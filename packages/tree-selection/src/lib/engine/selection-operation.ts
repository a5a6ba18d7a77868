import { IndexPath, IndexPathRange } from '../types/index-path';
import { indexPathKey, shiftIndexPath, toIndexPathRanges } from '../utils/index-path-utils';
import { SelectionRecorder } from './types';

/**
 * Net effect of one batch. A path selected and deselected again within the
 * same batch cancels out.
 */
export class SelectionOperation<T> implements SelectionRecorder {
  updateCount = 0;
  anchorIndex: IndexPath;
  selectedIndex: IndexPath;

  /**
   * Deselected items whose paths no longer address them, such as items the
   * source removed while the batch was open.
   */
  readonly lostItems: T[] = [];

  private lostCount = 0;
  private selected = new Map<string, IndexPath>();
  private deselected = new Map<string, IndexPath>();

  constructor(
    readonly previousAnchorIndex: IndexPath,
    readonly previousSelectedIndex: IndexPath,
  ) {
    this.anchorIndex = previousAnchorIndex;
    this.selectedIndex = previousSelectedIndex;
  }

  get hasChanges(): boolean {
    return this.selected.size > 0 || this.deselected.size > 0 || this.lostCount > 0;
  }

  /** Records a selected item that left the tree; `item` is omitted when unresolvable. */
  recordLost(item: T | undefined): void {
    this.lostCount += 1;
    if (item !== undefined) {
      this.lostItems.push(item);
    }
  }

  /**
   * Turns pending deselections into lost items resolved now, before the
   * paths stop addressing them.
   */
  settleDeselected(resolve: (path: IndexPath) => T | undefined): void {
    for (const path of this.deselected.values()) {
      this.recordLost(resolve(path));
    }
    this.deselected.clear();
  }

  recordSelected(path: IndexPath): void {
    const key = indexPathKey(path);
    if (!this.deselected.delete(key)) {
      this.selected.set(key, path);
    }
  }

  recordDeselected(path: IndexPath): void {
    const key = indexPathKey(path);
    if (!this.selected.delete(key)) {
      this.deselected.set(key, path);
    }
  }

  isPendingSelected(path: IndexPath): boolean {
    return this.selected.has(indexPathKey(path));
  }

  selectedRanges(): IndexPathRange[] {
    return toIndexPathRanges(this.selected.values());
  }

  deselectedRanges(): IndexPathRange[] {
    return toIndexPathRanges(this.deselected.values());
  }

  /**
   * Re-indexes pending paths after a splice. Paths deselected earlier in the
   * batch whose items are now gone become lost items, resolved through
   * `resolveRemoved` when given.
   */
  shift(
    parentPath: IndexPath,
    index: number,
    delta: number,
    resolveRemoved?: (path: IndexPath) => T | undefined,
  ): void {
    this.selected = shiftPaths(this.selected, parentPath, index, delta);
    this.deselected = shiftPaths(this.deselected, parentPath, index, delta, (path) =>
      this.recordLost(resolveRemoved?.(path)),
    );

    this.anchorIndex = shiftIndexPath(this.anchorIndex, parentPath, index, delta) ?? IndexPath.EMPTY;
    this.selectedIndex =
      shiftIndexPath(this.selectedIndex, parentPath, index, delta) ?? IndexPath.EMPTY;
  }
}

function shiftPaths(
  paths: Map<string, IndexPath>,
  parentPath: IndexPath,
  index: number,
  delta: number,
  onRemoved?: (path: IndexPath) => void,
): Map<string, IndexPath> {
  const shifted = new Map<string, IndexPath>();

  for (const path of paths.values()) {
    const next = shiftIndexPath(path, parentPath, index, delta);
    if (next) {
      shifted.set(indexPathKey(next), next);
    } else {
      onRemoved?.(path);
    }
  }

  return shifted;
}
