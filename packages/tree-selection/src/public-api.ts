/*
 * Public API Surface of tree-selection
 */

// =================== TYPES ===================
export * from './lib/types/index-path';
export * from './lib/types/tree-selection-config';
export * from './lib/types/tree-selection-errors';
export * from './lib/types/tree-selection-events';
export * from './lib/types/tree-selection-source';

// =================== ENGINE ===================
export { TreeSelectionBatch, TreeSelectionModel } from './lib/engine/tree-selection-model';
export { TreeSelectionNode } from './lib/engine/selection-node';
export { SelectionOperation } from './lib/engine/selection-operation';
export type { SelectionEntry, SelectionNodeOwner, SelectionRecorder, ShiftResult } from './lib/engine/types';

// =================== UTILITIES ===================
export * from './lib/utils/index-path-utils';
export { ObjectTreeSource } from './lib/utils/object-tree-source';
