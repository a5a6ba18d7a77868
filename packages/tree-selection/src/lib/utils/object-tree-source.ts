import { Subject } from 'rxjs';

import { IndexPath } from '../types/index-path';
import { TreeSelectionError } from '../types/tree-selection-errors';
import { TreeSelectionSource, TreeStructuralChange } from '../types/tree-selection-source';

/**
 * Selection source over plain nested objects. Children are read from
 * `children` when first addressed; `insert` and `remove` splice the child
 * lists and publish the change on `changes$`.
 */
export class ObjectTreeSource<T extends { children?: T[] }> implements TreeSelectionSource<T> {
  private readonly changesSubject = new Subject<TreeStructuralChange<T>>();

  readonly changes$ = this.changesSubject.asObservable();

  constructor(private readonly roots: T[]) {}

  childrenAt(path: IndexPath): readonly T[] | undefined {
    return this.childListAt(path);
  }

  childCountAt(path: IndexPath): number {
    return this.childListAt(path)?.length ?? 0;
  }

  childrenOf(item: T): readonly T[] | undefined {
    return item.children;
  }

  itemAt(path: IndexPath): T {
    const parent = path.parent();
    const leaf = path.leaf();
    const children = parent ? this.childListAt(parent) : undefined;

    if (!children || leaf === undefined || leaf >= children.length) {
      throw new TreeSelectionError('out-of-range', `No item at ${path.toString()}.`, path);
    }

    return children[leaf];
  }

  insert(parentPath: IndexPath, index: number, ...items: T[]): void {
    const children = this.childListAt(parentPath, true);
    if (!children) {
      throw new TreeSelectionError(
        'out-of-range',
        `No item at ${parentPath.toString()}.`,
        parentPath,
      );
    }

    const at = Math.max(0, Math.min(index, children.length));
    children.splice(at, 0, ...items);

    if (items.length > 0) {
      this.changesSubject.next({ parentPath, index: at, delta: items.length });
    }
  }

  remove(parentPath: IndexPath, index: number, count = 1): T[] {
    const children = this.childListAt(parentPath);
    if (!children || index < 0 || index + count > children.length) {
      throw new TreeSelectionError(
        'out-of-range',
        `Cannot remove ${count} item(s) at ${index} under ${parentPath.toString()}.`,
        parentPath,
      );
    }

    const removedItems = children.splice(index, count);

    if (removedItems.length > 0) {
      this.changesSubject.next({
        parentPath,
        index,
        delta: -removedItems.length,
        removedItems,
      });
    }

    return removedItems;
  }

  private childListAt(path: IndexPath, create = false): T[] | undefined {
    let children: T[] | undefined = this.roots;

    for (let depth = 0; depth < path.size; depth += 1) {
      const index = path.at(depth);
      const item: T | undefined = index === undefined ? undefined : children?.[index];
      if (!item) {
        return undefined;
      }
      if (create && depth === path.size - 1 && !item.children) {
        item.children = [];
      }
      children = item.children;
    }

    return children;
  }
}
