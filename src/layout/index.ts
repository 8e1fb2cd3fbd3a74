/**
 * Layout Module Entry Point
 *
 * Usage:
 *   import { stratplot } from './layout/index.js';
 *
 *   const diagram = stratplot(table, { groupFunc, percentages: ['Pollen'] });
 *   diagram.grouper('Pollen')?.hide('Pinus');
 *
 * Pipeline steps:
 *   1. classifyColumns()  → ColumnClassification
 *   2. buildDataset()     → BuiltDataset
 *   3. resolveGroups()    → GroupPlan[]
 *   4. placeGroups()      → StratGrouper[]
 *   5. emitStratResult()  → Panel[]
 */

// Re-export everything from pipeline
export * from './pipeline/index.js';

export { StratDiagram, StratLayoutEngine, stratplot } from './diagram.js';
export { PanelRegistry } from './panel-registry.js';
export type { RegistryListener } from './panel-registry.js';
export { DecorationLayer, GroupBarAnnotator, computeGroupBar } from './group-bar.js';
export type {
    BracketDecoration,
    Decoration,
    GroupBar,
    GroupBarParams,
    LabelDecoration
} from './group-bar.js';
export * from './groupers/index.js';
export * from './geometry.js';
export { defaultPlotKind, defaultStyle, formatLabel, mergeStyle, wrapText } from './styles.js';
