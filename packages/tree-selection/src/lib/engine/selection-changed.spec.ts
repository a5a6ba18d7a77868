import { IndexPath } from '../types/index-path';
import { ObjectTreeSource } from '../utils/object-tree-source';
import { createSelectionChangedEvent, resolveRemovedItem } from './selection-changed';

type Node = { name: string; children?: Node[] };

const path = (...indexes: number[]) => IndexPath.of(...indexes);

describe('selection changed helpers', () => {
  let source: ObjectTreeSource<Node>;

  beforeEach(() => {
    source = new ObjectTreeSource<Node>([
      { name: 'a', children: [{ name: 'a0' }, { name: 'a1', children: [{ name: 'a10' }] }] },
      { name: 'b', children: [{ name: 'b0' }] },
    ]);
  });

  describe('resolveRemovedItem', () => {
    it('resolves removed items and their descendants', () => {
      const removed = source.remove(path(0), 0, 2);

      const names = [path(0, 0), path(0, 1), path(0, 1, 0)].map(
        (removedPath) => resolveRemovedItem(source, path(0), 0, removed, removedPath)?.name,
      );

      expect(names).toEqual(['a0', 'a1', 'a10']);
    });

    it('reaches descendants only through the source', () => {
      const removed = source.remove(IndexPath.EMPTY, 0);

      expect(resolveRemovedItem(null, IndexPath.EMPTY, 0, removed, path(0))?.name).toBe('a');
      expect(resolveRemovedItem(null, IndexPath.EMPTY, 0, removed, path(0, 1))).toBeUndefined();
    });

    it('ignores paths before the splice', () => {
      const removed = source.remove(IndexPath.EMPTY, 1);

      expect(resolveRemovedItem(source, IndexPath.EMPTY, 1, removed, path(0, 0))).toBeUndefined();
    });
  });

  describe('createSelectionChangedEvent', () => {
    it('resolves ranges lazily and appends lost items to the deselected ones', () => {
      const event = createSelectionChangedEvent<Node>(
        source,
        [{ start: path(0, 0), end: path(0, 1) }],
        [{ start: path(1), end: path(1) }],
        [{ name: 'gone' }],
      );

      source.remove(path(0), 0);

      expect(event.deselectedItems.map((node) => node.name)).toEqual(['a1', 'gone']);
      expect(event.selectedItems.map((node) => node.name)).toEqual(['b']);
      expect(event.deselectedItems).toBe(event.deselectedItems);
    });
  });
});
