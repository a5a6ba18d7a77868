import { Observable, Subject, Subscription } from 'rxjs';

import { IndexPath } from '../types/index-path';
import {
  DEFAULT_TREE_SELECTION_CONFIG,
  TreeSelectionConfig,
} from '../types/tree-selection-config';
import { TreeSelectionError } from '../types/tree-selection-errors';
import {
  TreeIndexesChangedEvent,
  TreeSelectionChangedEvent,
  TreeSelectionProperty,
  TreeSelectionPropertyChange,
} from '../types/tree-selection-events';
import { TreeSelectionSource, TreeStructuralChange } from '../types/tree-selection-source';
import { orderRange, shiftIndexPath } from '../utils/index-path-utils';
import { createSelectionChangedEvent, resolveRemovedItem } from './selection-changed';
import { TreeSelectionNode } from './selection-node';
import { SelectionOperation } from './selection-operation';
import { SelectionNodeOwner } from './types';

/** Scoped batch; `dispose()` ends it and is safe to call more than once. */
export class TreeSelectionBatch<T> {
  private disposed = false;

  constructor(private readonly owner: TreeSelectionModel<T>) {
    owner.beginBatchUpdate();
  }

  dispose(): void {
    if (!this.disposed) {
      this.disposed = true;
      this.owner.endBatchUpdate();
    }
  }
}

export class TreeSelectionModel<T> implements SelectionNodeOwner {
  private readonly root = new TreeSelectionNode(this);
  private treeSource: TreeSelectionSource<T> | null = null;
  private sourceSubscription: Subscription | null = null;
  private committedAnchor = IndexPath.EMPTY;
  private committedSelected = IndexPath.EMPTY;
  private operation: SelectionOperation<T> | null = null;
  private config: TreeSelectionConfig = { ...DEFAULT_TREE_SELECTION_CONFIG };

  private readonly selectionChangedSubject = new Subject<TreeSelectionChangedEvent<T>>();
  private readonly propertyChangedSubject = new Subject<TreeSelectionPropertyChange>();
  private readonly indexesChangedSubject = new Subject<TreeIndexesChangedEvent>();
  private readonly lostSelectionSubject = new Subject<void>();

  /** One event per committed batch with a net effect. */
  readonly selectionChanged$: Observable<TreeSelectionChangedEvent<T>> =
    this.selectionChangedSubject.asObservable();
  readonly propertyChanged$: Observable<TreeSelectionPropertyChange> =
    this.propertyChangedSubject.asObservable();
  readonly indexesChanged$: Observable<TreeIndexesChangedEvent> =
    this.indexesChangedSubject.asObservable();
  /** The selected item was removed from the source and nothing else is selected. */
  readonly lostSelection$: Observable<void> = this.lostSelectionSubject.asObservable();

  constructor(source?: TreeSelectionSource<T> | null, config?: Partial<TreeSelectionConfig>) {
    this.configure(config);
    this.source = source ?? null;
  }

  configure(config?: Partial<TreeSelectionConfig>): void {
    if (config?.singleSelect !== undefined) {
      this.config = { ...this.config, singleSelect: config.singleSelect };
    }
  }

  get singleSelect(): boolean {
    return this.config.singleSelect;
  }

  set singleSelect(value: boolean) {
    this.configure({ singleSelect: value });
  }

  get source(): TreeSelectionSource<T> | null {
    return this.treeSource;
  }

  /** Replacing the source drops the current selection and anchor. */
  set source(value: TreeSelectionSource<T> | null) {
    if (value === this.treeSource) {
      return;
    }

    const previous = this.treeSource;
    if (previous) {
      this.runInBatch(() => {
        this.clear();
        this.openOperation().anchorIndex = IndexPath.EMPTY;
      });
      // An enclosing batch commits after the swap; settle its deselections
      // against the source their paths belong to.
      this.operation?.settleDeselected((path) => previous.itemAt(path));
    }

    this.sourceSubscription?.unsubscribe();
    this.treeSource = value;
    this.sourceSubscription =
      value?.changes$?.subscribe((change: TreeStructuralChange<T>) =>
        this.onSourceStructuralChange(
          change.parentPath,
          change.index,
          change.delta,
          change.removedItems,
        ),
      ) ?? null;
  }

  get selectedIndex(): IndexPath {
    return this.committedSelected;
  }

  /** Replaces the whole selection with `value`; the empty path clears it. */
  set selectedIndex(value: IndexPath) {
    this.runInBatch(() => {
      this.clear();
      if (!value.isEmpty) {
        this.select(value);
      }
    });
  }

  get anchorIndex(): IndexPath {
    return this.committedAnchor;
  }

  set anchorIndex(value: IndexPath) {
    this.runInBatch(() => {
      this.openOperation().anchorIndex = value;
    });
  }

  get selectedItem(): T | undefined {
    if (!this.treeSource || this.committedSelected.isEmpty) {
      return undefined;
    }
    return this.getItemAt(this.committedSelected);
  }

  get selectedIndexes(): readonly IndexPath[] {
    return Array.from(this.root.selectedIndexes());
  }

  get selectedItems(): readonly T[] {
    return this.selectedIndexes.map((path) => this.getItemAt(path));
  }

  get count(): number {
    return this.root.selectedCount;
  }

  childCountAt(path: IndexPath): number {
    return this.treeSource?.childCountAt(path) ?? 0;
  }

  batchUpdate(): TreeSelectionBatch<T> {
    return new TreeSelectionBatch(this);
  }

  /** Runs `fn` inside a batch that is closed on every exit path. */
  runInBatch<R>(fn: () => R): R {
    const batch = this.batchUpdate();
    try {
      return fn();
    } finally {
      batch.dispose();
    }
  }

  beginBatchUpdate(): void {
    this.operation ??= new SelectionOperation<T>(this.committedAnchor, this.committedSelected);
    this.operation.updateCount += 1;
  }

  endBatchUpdate(): void {
    const operation = this.operation;
    if (!operation || operation.updateCount === 0) {
      throw new TreeSelectionError('invalid-operation', 'No batch update in progress.');
    }

    operation.updateCount -= 1;
    if (operation.updateCount === 0) {
      this.commitOperation(operation);
    }
  }

  select(path: IndexPath): void {
    this.applySelectRange(path, path, true);
  }

  selectRange(start: IndexPath, end: IndexPath): void {
    this.applySelectRange(start, end, false);
  }

  selectAll(): void {
    if (this.config.singleSelect) {
      throw new TreeSelectionError('invalid-operation', 'Cannot select all with single selection.');
    }

    this.runInBatch(() => {
      const operation = this.openOperation();
      this.root.selectAll(operation);

      const first = this.root.coerceIndex(IndexPath.of(0));
      if (operation.selectedIndex.isEmpty) {
        operation.selectedIndex = first;
      }
      if (operation.anchorIndex.isEmpty) {
        operation.anchorIndex = first;
      }
    });
  }

  deselect(path: IndexPath): void {
    this.deselectRange(path, path);
  }

  deselectRange(start: IndexPath, end: IndexPath): void {
    if (start.isEmpty || end.isEmpty) {
      return;
    }

    const range = orderRange(start, end);
    this.runInBatch(() => {
      this.root.deselect(this.openOperation(), range.start, range.end);
      this.updateSelectedAfterDeselect();
    });
  }

  clear(): void {
    this.runInBatch(() => {
      this.root.deselect(this.openOperation());
      this.updateSelectedAfterDeselect();
    });
  }

  isSelected(path: IndexPath): boolean {
    return this.root.isSelected(path);
  }

  /** Throws `out-of-range` when `path` does not address an item of the source. */
  getItemAt(path: IndexPath): T {
    if (path.isEmpty) {
      throw new TreeSelectionError('out-of-range', 'The empty path has no item.', path);
    }
    if (!this.treeSource) {
      throw new TreeSelectionError('invalid-operation', 'Cannot get an item without a source.', path);
    }
    return this.treeSource.itemAt(path);
  }

  /**
   * Re-indexes the selection after `shiftDelta` children were inserted
   * (positive) or removed (negative) at `shiftIndex` under `parentPath`.
   */
  onSourceStructuralChange(
    parentPath: IndexPath,
    shiftIndex: number,
    shiftDelta: number,
    removedItems: readonly T[] = [],
  ): void {
    if (shiftDelta === 0) {
      return;
    }

    let lostSelection = false;

    this.runInBatch(() => {
      const operation = this.openOperation();
      const hadSelectedIndex = !operation.selectedIndex.isEmpty;
      const result = this.root.shift(parentPath, shiftIndex, shiftDelta);
      const resolveRemoved = (path: IndexPath): T | undefined =>
        resolveRemovedItem(this.treeSource, parentPath, shiftIndex, removedItems, path);

      for (const path of result.lostPaths) {
        if (!operation.isPendingSelected(path)) {
          operation.recordLost(resolveRemoved(path));
        }
      }

      operation.shift(parentPath, shiftIndex, shiftDelta, resolveRemoved);
      this.shiftCommitted(parentPath, shiftIndex, shiftDelta);

      if (hadSelectedIndex && operation.selectedIndex.isEmpty) {
        operation.selectedIndex = this.firstSelectedIndex();
        lostSelection = operation.selectedIndex.isEmpty;
      }

      this.indexesChangedSubject.next({
        parentPath,
        startIndex: shiftIndex,
        delta: shiftDelta,
      });
    });

    if (lostSelection) {
      this.lostSelectionSubject.next();
    }
  }

  dispose(): void {
    this.sourceSubscription?.unsubscribe();
    this.sourceSubscription = null;
    this.selectionChangedSubject.complete();
    this.propertyChangedSubject.complete();
    this.indexesChangedSubject.complete();
    this.lostSelectionSubject.complete();
  }

  private applySelectRange(start: IndexPath, end: IndexPath, forceSelectedIndex: boolean): void {
    if (this.config.singleSelect && !start.equals(end)) {
      throw new TreeSelectionError(
        'invalid-operation',
        'Cannot select range with single selection.',
        end,
      );
    }

    const anchor = this.root.coerceIndex(start);
    const target = this.root.coerceIndex(end);
    if (anchor.isEmpty || target.isEmpty) {
      return;
    }

    const range = orderRange(anchor, target);

    this.runInBatch(() => {
      const operation = this.openOperation();

      if (this.config.singleSelect) {
        this.root.deselect(operation);
      }

      this.root.select(range.start, range.end, operation);

      if (forceSelectedIndex || this.config.singleSelect || operation.selectedIndex.isEmpty) {
        operation.selectedIndex = anchor;
      }
      operation.anchorIndex = anchor;
    });
  }

  private updateSelectedAfterDeselect(): void {
    const operation = this.openOperation();
    if (!operation.selectedIndex.isEmpty && !this.root.isSelected(operation.selectedIndex)) {
      operation.selectedIndex = this.firstSelectedIndex();
    }
  }

  private firstSelectedIndex(): IndexPath {
    const first = this.root.selectedIndexes().next();
    return first.done ? IndexPath.EMPTY : first.value;
  }

  /**
   * Keeps the committed paths addressing their items while a batch is open.
   * Observers hear about the move when the batch commits.
   */
  private shiftCommitted(parentPath: IndexPath, index: number, delta: number): void {
    this.committedSelected =
      shiftIndexPath(this.committedSelected, parentPath, index, delta) ?? IndexPath.EMPTY;
    this.committedAnchor =
      shiftIndexPath(this.committedAnchor, parentPath, index, delta) ?? IndexPath.EMPTY;
  }

  private openOperation(): SelectionOperation<T> {
    if (!this.operation) {
      throw new TreeSelectionError('invalid-operation', 'No batch update in progress.');
    }
    return this.operation;
  }

  private commitOperation(operation: SelectionOperation<T>): void {
    const oldAnchor = operation.previousAnchorIndex;
    const oldSelected = operation.previousSelectedIndex;

    this.committedSelected = operation.selectedIndex;
    this.committedAnchor = operation.anchorIndex;
    this.operation = null;

    if (operation.hasChanges && this.selectionChangedSubject.observed) {
      this.selectionChangedSubject.next(
        createSelectionChangedEvent(
          this.treeSource,
          operation.deselectedRanges(),
          operation.selectedRanges(),
          [...operation.lostItems],
        ),
      );
    }

    if (!oldSelected.equals(this.committedSelected)) {
      this.raisePropertyChanged('selectedIndex', oldSelected, this.committedSelected);
    }
    if (!oldAnchor.equals(this.committedAnchor)) {
      this.raisePropertyChanged('anchorIndex', oldAnchor, this.committedAnchor);
    }
  }

  private raisePropertyChanged(
    property: TreeSelectionProperty,
    oldValue: IndexPath,
    newValue: IndexPath,
  ): void {
    this.propertyChangedSubject.next({ property, oldValue, newValue });
  }
}
