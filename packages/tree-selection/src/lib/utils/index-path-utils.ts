import { IndexPath, IndexPathRange } from '../types/index-path';

export function compareIndexPaths(a: IndexPath, b: IndexPath): number {
  return a.compareTo(b);
}

/** Returns the endpoints of a range in document order. */
export function orderRange(start: IndexPath, end: IndexPath): IndexPathRange {
  return start.compareTo(end) <= 0 ? { start, end } : { start: end, end: start };
}

/**
 * Groups paths into sibling runs: paths sharing a parent with consecutive
 * leaf indexes collapse into one range. Runs are ordered by parent, then leaf.
 */
export function toIndexPathRanges(paths: Iterable<IndexPath>): IndexPathRange[] {
  const sorted = Array.from(paths).sort(compareBySibling);
  const ranges: IndexPathRange[] = [];
  let current: IndexPathRange | null = null;

  for (const path of sorted) {
    if (current && extendsRun(current.end, path)) {
      current.end = path;
      continue;
    }

    current = { start: path, end: path };
    ranges.push(current);
  }

  return ranges;
}

/** Expands a sibling range produced by `toIndexPathRanges`. */
export function indexPathsInRange(range: IndexPathRange): IndexPath[] {
  const parent = range.start.parent();
  const first = range.start.leaf();
  const last = range.end.leaf();
  if (!parent || first === undefined || last === undefined) {
    return [];
  }

  const paths: IndexPath[] = [];
  for (let index = first; index <= last; index += 1) {
    paths.push(parent.child(index));
  }
  return paths;
}

export function indexPathKey(path: IndexPath): string {
  return path.toString();
}

/**
 * Re-indexes `path` after `delta` children were inserted (or removed) at
 * `index` under `parentPath`. Returns `null` when the path was removed.
 */
export function shiftIndexPath(
  path: IndexPath,
  parentPath: IndexPath,
  index: number,
  delta: number,
): IndexPath | null {
  if (!parentPath.isAncestorOf(path)) {
    return path;
  }

  const depth = parentPath.size;
  const current = path.at(depth);
  if (current === undefined || current < index) {
    return path;
  }

  if (delta < 0 && current < index - delta) {
    return null;
  }

  return path.withIndexAt(depth, current + delta);
}

function compareBySibling(a: IndexPath, b: IndexPath): number {
  const parentA = a.parent() ?? IndexPath.EMPTY;
  const parentB = b.parent() ?? IndexPath.EMPTY;
  return parentA.compareTo(parentB) || (a.leaf() ?? -1) - (b.leaf() ?? -1);
}

function extendsRun(last: IndexPath, next: IndexPath): boolean {
  const lastLeaf = last.leaf();
  const nextLeaf = next.leaf();
  const lastParent = last.parent();
  const nextParent = next.parent();

  return (
    lastLeaf !== undefined &&
    nextLeaf === lastLeaf + 1 &&
    lastParent !== undefined &&
    nextParent !== undefined &&
    lastParent.equals(nextParent)
  );
}
