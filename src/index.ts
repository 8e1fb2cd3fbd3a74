/**
 * stratlayout - layout engine for stratigraphic diagrams
 */

export * from './types.js';
export * from './layout/index.js';
export { StratTreeModel } from './tree-view.js';
export type { MoveDirection, TreeNode, TreeRow } from './tree-view.js';
export { columnStats, parseStratTable, validateTable } from './data/table.js';
export type { ColumnStats, ParseTableOptions } from './data/table.js';
