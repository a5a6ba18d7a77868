import { TreeSelectionError } from './tree-selection-errors';

/**
 * Immutable address of a node in a tree: the child index at each level,
 * starting from the root. The empty path denotes the root / "no selection".
 */
export class IndexPath {
  static readonly EMPTY = new IndexPath([]);

  private readonly indexes: readonly number[];

  constructor(indexes: number | readonly number[] = []) {
    const values = typeof indexes === 'number' ? [indexes] : indexes;

    for (const index of values) {
      if (!Number.isInteger(index) || index < 0) {
        throw new TreeSelectionError(
          'out-of-range',
          `Invalid index ${index} in index path.`,
        );
      }
    }

    this.indexes = Object.freeze([...values]);
  }

  static of(...indexes: number[]): IndexPath {
    return indexes.length === 0 ? IndexPath.EMPTY : new IndexPath(indexes);
  }

  get size(): number {
    return this.indexes.length;
  }

  get isEmpty(): boolean {
    return this.indexes.length === 0;
  }

  at(depth: number): number | undefined {
    return this.indexes[depth];
  }

  /** The containing path, or `undefined` for the empty path. */
  parent(): IndexPath | undefined {
    if (this.isEmpty) {
      return undefined;
    }
    return IndexPath.of(...this.indexes.slice(0, -1));
  }

  /** Index within the parent, or `undefined` for the empty path. */
  leaf(): number | undefined {
    return this.indexes[this.indexes.length - 1];
  }

  child(index: number): IndexPath {
    return new IndexPath([...this.indexes, index]);
  }

  withIndexAt(depth: number, index: number): IndexPath {
    const next = [...this.indexes];
    next[depth] = index;
    return new IndexPath(next);
  }

  /** Strict prefix test. */
  isAncestorOf(other: IndexPath): boolean {
    if (this.size >= other.size) {
      return false;
    }
    return this.indexes.every((index, depth) => other.indexes[depth] === index);
  }

  equals(other: IndexPath): boolean {
    return (
      this.size === other.size &&
      this.indexes.every((index, depth) => other.indexes[depth] === index)
    );
  }

  /** Depth-first document order: an ancestor sorts before its descendants. */
  compareTo(other: IndexPath): number {
    const shared = Math.min(this.size, other.size);
    for (let depth = 0; depth < shared; depth += 1) {
      const diff = this.indexes[depth] - other.indexes[depth];
      if (diff !== 0) {
        return diff;
      }
    }
    return this.size - other.size;
  }

  toArray(): number[] {
    return [...this.indexes];
  }

  toString(): string {
    return `[${this.indexes.join(',')}]`;
  }
}

/** Unordered pair of paths denoting a selection span. */
export interface IndexPathRange {
  start: IndexPath;
  end: IndexPath;
}
