import { IndexPath } from '../types/index-path';
import { SelectionEntry, SelectionNodeOwner, SelectionRecorder, ShiftResult } from './types';

/**
 * Relative range bound inside a node. `null` leaves the bound open; otherwise
 * the child indexes from this node down to the endpoint.
 */
type RangeBound = readonly number[] | null;

const SELECTED_ENTRY: SelectionEntry = { kind: 'selected' };

/**
 * Sparse mirror of one source node. Each child index maps to a `selected`
 * marker, a nested node (when something below that child is selected), or
 * nothing. Nodes keep no path of their own: callers pass it down, so
 * re-indexing a parent never has to touch its descendants.
 */
export class TreeSelectionNode {
  /** Whether the item this node mirrors is itself selected. */
  selected = false;

  /** Selected items strictly below this node. */
  selectedCount = 0;

  private readonly entries = new Map<number, SelectionEntry>();

  constructor(private readonly owner: SelectionNodeOwner) {}

  /**
   * Clamps each level of `path` into the live child range of the source.
   * Returns the empty path when a level on the way has no children.
   */
  coerceIndex(path: IndexPath, nodePath: IndexPath = IndexPath.EMPTY): IndexPath {
    if (path.size <= nodePath.size) {
      return IndexPath.EMPTY;
    }

    let current = nodePath;
    for (let depth = nodePath.size; depth < path.size; depth += 1) {
      const count = this.owner.childCountAt(current);
      if (count === 0) {
        return IndexPath.EMPTY;
      }
      current = current.child(Math.min(path.at(depth) ?? 0, count - 1));
    }

    return current;
  }

  tryGetNode(
    path: IndexPath,
    depth: number,
    materialize: boolean,
    nodePath: IndexPath = IndexPath.EMPTY,
  ): TreeSelectionNode | undefined {
    const index = path.at(depth);
    if (index === undefined) {
      return this;
    }

    const entry = this.entries.get(index);
    if (entry?.kind === 'node') {
      return entry.node.tryGetNode(path, depth + 1, materialize, nodePath.child(index));
    }

    if (!materialize || index >= this.owner.childCountAt(nodePath)) {
      return undefined;
    }

    return this.materialize(index).tryGetNode(
      path,
      depth + 1,
      materialize,
      nodePath.child(index),
    );
  }

  /** Selects `start..end` (document order) below this node. */
  select(start: IndexPath, end: IndexPath, recorder: SelectionRecorder): number {
    return this.selectRange(start.toArray(), end.toArray(), IndexPath.EMPTY, recorder);
  }

  selectAll(recorder: SelectionRecorder): number {
    return this.selectRange(null, null, IndexPath.EMPTY, recorder);
  }

  /** Deselects `start..end`, or everything when no endpoints are given. */
  deselect(recorder: SelectionRecorder, start?: IndexPath, end?: IndexPath): number {
    return this.deselectRange(
      start ? start.toArray() : null,
      end ? end.toArray() : null,
      IndexPath.EMPTY,
      recorder,
    );
  }

  isSelected(path: IndexPath, depth = 0): boolean {
    const index = path.at(depth);
    if (index === undefined) {
      return false;
    }

    const entry = this.entries.get(index);
    if (!entry) {
      return false;
    }

    if (depth === path.size - 1) {
      return entry.kind === 'selected' || entry.node.selected;
    }

    return entry.kind === 'node' && entry.node.isSelected(path, depth + 1);
  }

  /** Selected paths below this node in document order. */
  *selectedIndexes(nodePath: IndexPath = IndexPath.EMPTY): Generator<IndexPath> {
    for (const index of this.sortedKeys()) {
      const entry = this.entries.get(index);
      const path = nodePath.child(index);

      if (entry?.kind === 'selected') {
        yield path;
      } else if (entry?.kind === 'node') {
        if (entry.node.selected) {
          yield path;
        }
        yield* entry.node.selectedIndexes(path);
      }
    }
  }

  /**
   * Re-keys the children of the node mirroring `parentPath` after a splice in
   * the source. Removed children take their selection with them.
   */
  shift(parentPath: IndexPath, index: number, delta: number, depth = 0): ShiftResult {
    const childIndex = parentPath.at(depth);
    if (childIndex === undefined) {
      return this.shiftEntries(parentPath, index, delta);
    }

    const entry = this.entries.get(childIndex);
    if (entry?.kind !== 'node') {
      return { lostPaths: [] };
    }

    const result = entry.node.shift(parentPath, index, delta, depth + 1);
    this.selectedCount -= result.lostPaths.length;
    this.normalize(childIndex);
    return result;
  }

  private selectRange(
    lo: RangeBound,
    hi: RangeBound,
    nodePath: IndexPath,
    recorder: SelectionRecorder,
  ): number {
    const count = this.owner.childCountAt(nodePath);
    if (count === 0) {
      return 0;
    }

    const first = lo ? Math.min(lo[0], count - 1) : 0;
    const last = hi ? Math.min(hi[0], count - 1) : count - 1;
    if (first > last) {
      return 0;
    }

    let added = 0;
    if (first === last) {
      added += this.selectChild(first, startBelow(lo), endBelow(hi), nodePath, recorder);
    } else {
      added += this.selectChild(first, startBelow(lo), null, nodePath, recorder);
      for (let index = first + 1; index < last; index += 1) {
        added += this.selectChild(index, null, null, nodePath, recorder);
      }
      added += this.selectChild(last, null, endBelow(hi), nodePath, recorder);
    }

    this.selectedCount += added;
    return added;
  }

  /**
   * `lo === null` includes the child's own item; `hi` of `[]` stops at the
   * item, `null` runs through the child's whole subtree.
   */
  private selectChild(
    index: number,
    lo: RangeBound,
    hi: RangeBound,
    nodePath: IndexPath,
    recorder: SelectionRecorder,
  ): number {
    const childPath = nodePath.child(index);
    let added = 0;

    if (lo === null) {
      added += this.selectItem(index, childPath, recorder);
    }

    if (hi?.length !== 0 && this.owner.childCountAt(childPath) > 0) {
      const node = this.materialize(index);
      added += node.selectRange(lo, hi, childPath, recorder);
      this.normalize(index);
    }

    return added;
  }

  private selectItem(index: number, path: IndexPath, recorder: SelectionRecorder): number {
    const entry = this.entries.get(index);

    if (!entry) {
      this.entries.set(index, SELECTED_ENTRY);
    } else if (entry.kind === 'node' && !entry.node.selected) {
      entry.node.selected = true;
    } else {
      return 0;
    }

    recorder.recordSelected(path);
    return 1;
  }

  private deselectRange(
    lo: RangeBound,
    hi: RangeBound,
    nodePath: IndexPath,
    recorder: SelectionRecorder,
  ): number {
    const first = lo ? lo[0] : 0;
    const last = hi ? hi[0] : Number.POSITIVE_INFINITY;
    let removed = 0;

    for (const index of this.sortedKeys()) {
      if (index < first || index > last) {
        continue;
      }

      removed += this.deselectChild(
        index,
        index === first ? startBelow(lo) : null,
        index === last ? endBelow(hi) : null,
        nodePath,
        recorder,
      );
    }

    this.selectedCount -= removed;
    return removed;
  }

  private deselectChild(
    index: number,
    lo: RangeBound,
    hi: RangeBound,
    nodePath: IndexPath,
    recorder: SelectionRecorder,
  ): number {
    const childPath = nodePath.child(index);
    let removed = 0;

    if (lo === null) {
      removed += this.deselectItem(index, childPath, recorder);
    }

    const entry = this.entries.get(index);
    if (hi?.length !== 0 && entry?.kind === 'node') {
      removed += entry.node.deselectRange(lo, hi, childPath, recorder);
    }

    this.normalize(index);
    return removed;
  }

  private deselectItem(index: number, path: IndexPath, recorder: SelectionRecorder): number {
    const entry = this.entries.get(index);

    if (entry?.kind === 'selected') {
      this.entries.delete(index);
    } else if (entry?.kind === 'node' && entry.node.selected) {
      entry.node.selected = false;
    } else {
      return 0;
    }

    recorder.recordDeselected(path);
    return 1;
  }

  private shiftEntries(nodePath: IndexPath, index: number, delta: number): ShiftResult {
    const shifted = new Map<number, SelectionEntry>();
    const lostPaths: IndexPath[] = [];

    for (const key of this.sortedKeys()) {
      const entry = this.entries.get(key);
      if (!entry) {
        continue;
      }

      if (key < index) {
        shifted.set(key, entry);
      } else if (delta < 0 && key < index - delta) {
        const childPath = nodePath.child(key);
        if (entry.kind === 'selected' || entry.node.selected) {
          lostPaths.push(childPath);
        }
        if (entry.kind === 'node') {
          lostPaths.push(...entry.node.selectedIndexes(childPath));
        }
      } else {
        shifted.set(key + delta, entry);
      }
    }

    this.entries.clear();
    shifted.forEach((entry, key) => this.entries.set(key, entry));
    this.selectedCount -= lostPaths.length;

    return { lostPaths };
  }

  private materialize(index: number): TreeSelectionNode {
    const entry = this.entries.get(index);
    if (entry?.kind === 'node') {
      return entry.node;
    }

    const node = new TreeSelectionNode(this.owner);
    node.selected = entry?.kind === 'selected';
    this.entries.set(index, { kind: 'node', node });
    return node;
  }

  /** Collapses or prunes a nested node that has nothing selected below it. */
  private normalize(index: number): void {
    const entry = this.entries.get(index);
    if (entry?.kind !== 'node' || entry.node.selectedCount > 0) {
      return;
    }

    if (entry.node.selected) {
      this.entries.set(index, SELECTED_ENTRY);
    } else {
      this.entries.delete(index);
    }
  }

  private sortedKeys(): number[] {
    return Array.from(this.entries.keys()).sort((a, b) => a - b);
  }
}

/** Start bound for the child the range starts in; `null` includes the child itself. */
function startBelow(bound: RangeBound): RangeBound {
  return bound && bound.length > 1 ? bound.slice(1) : null;
}

/** End bound for the child the range ends in; `[]` stops at the child itself. */
function endBelow(bound: RangeBound): RangeBound {
  return bound ? bound.slice(1) : null;
}
