export interface TreeSelectionConfig {
  /** Reject range selection with differing endpoints. */
  singleSelect: boolean;
}

export const DEFAULT_TREE_SELECTION_CONFIG: Readonly<TreeSelectionConfig> = Object.freeze({
  singleSelect: true,
});
