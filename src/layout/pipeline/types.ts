/**
 * Layout Pipeline Types
 * Type definitions for the stratigraphic layout pipeline.
 */

import type {
    Bounds,
    GroupFunc,
    GroupKey,
    GrouperKind,
    PanelStyle,
    StratConfig,
    StratTable
} from '../../types.js';
import type { GrouperContext, StratGrouper } from '../groupers/grouper.js';

// ==================== OPTIONS ====================

/**
 * Caller options of one stratplot() call. Unknown names in any of the lists
 * are ignored.
 */
export interface StratOptions {
    groupFunc?: GroupFunc;
    /** Per-group style overrides */
    formatoptions?: Record<GroupKey, Partial<PanelStyle>>;
    /** Envelope of the whole diagram; defaults to the subplot parameters */
    bounds?: Bounds;
    percentages?: GroupKey[];
    exclude?: string[];
    /** Group -> fraction of the envelope width */
    widths?: Record<GroupKey, number>;
    calculatePercentages?: boolean;
    /** Columns or groups forming the normalisation denominator */
    percentageBase?: string[];
    threshold?: number;
    minPercentage?: number;
    truncHeight?: number;
    allInOne?: GroupKey[];
    stacked?: GroupKey[];
    /** true sums every group */
    summed?: boolean | GroupKey[];
    /** true draws every group with bars */
    useBars?: boolean | GroupKey | GroupKey[];
    subgroups?: Record<GroupKey, GroupKey[]>;
    config?: Partial<StratConfig>;
}

// ==================== STEP 1: CLASSIFY COLUMNS ====================

export interface ClassifyInput {
    table: StratTable;
    groupFunc: GroupFunc;
    subgroups: Record<GroupKey, GroupKey[]>;
}

/**
 * Ordered column -> group assignment.
 */
export interface ColumnClassification {
    /** Group -> member columns, first-occurrence order */
    groups: Map<GroupKey, string[]>;
    /** Column -> main group (after subgroup remapping) */
    columnGroup: Map<string, GroupKey>;
    /** Column -> raw classifier key */
    columnSubgroup: Map<string, GroupKey>;
}

// ==================== STEP 2: BUILD DATASET ====================

export interface VariableAttrs {
    group: GroupKey;
    subgroup: GroupKey;
    longName?: string;
}

export interface Variable {
    name: string;
    values: number[];
    attrs: VariableAttrs;
}

/**
 * Dataset backing the panels: the index plus one variable per column
 * (normalised where requested) and the synthesised sums.
 */
export interface StratDataset {
    index: number[];
    indexName: string;
    variables: Map<string, Variable>;
    /** Group -> member variables, including the Summed group */
    groups: Map<GroupKey, string[]>;
    /** Grouper variant of each placed group */
    kinds: Map<GroupKey, GrouperKind>;
}

export interface BuildDatasetInput {
    table: StratTable;
    classification: ColumnClassification;
    indexName: string;
    percentages: GroupKey[];
    calculatePercentages: boolean;
    percentageBase: string[];
    exclude: string[];
    threshold: number;
    summed: boolean | GroupKey[];
}

export interface BuiltDataset {
    dataset: StratDataset;
    /** Variables that get a panel (or a series) */
    plotVariables: Set<string>;
    /** Variables dropped by exclusion or threshold */
    dropped: string[];
}

// ==================== STEP 3: RESOLVE GROUPS ====================

export interface ResolveGroupsInput {
    built: BuiltDataset;
    percentages: GroupKey[];
    allInOne: GroupKey[];
    stacked: GroupKey[];
    widths: Record<GroupKey, number>;
    useBars: boolean | GroupKey | GroupKey[];
}

/**
 * One group that survived filtering, ready to be placed.
 */
export interface GroupPlan {
    group: GroupKey;
    kind: GrouperKind;
    variables: string[];
    widthFraction: number;
    useBars: boolean;
}

// ==================== STEP 4: PLACE GROUPS ====================

export interface PlaceGroupsInput {
    plans: GroupPlan[];
    context: GrouperContext;
    /** Envelope of the whole diagram */
    envelope: Bounds;
    config: StratConfig;
    formatoptions: Record<GroupKey, Partial<PanelStyle>>;
}

// ==================== STEP 5: EMIT RESULT ====================

export interface EmitInput {
    groupers: StratGrouper[];
    envelope: Bounds;
    config: StratConfig;
    indexName: string;
}

// ==================== RESULT ====================

/**
 * Input of one pipeline run: the table plus the caller's options.
 */
export interface PipelineInput {
    table: StratTable;
    options: StratOptions;
    context: Omit<GrouperContext, 'dataset'>;
}

export interface PipelineResult {
    groupers: StratGrouper[];
    dataset: StratDataset;
    diagnostics: LayoutDiagnostics;
}

export interface LayoutDiagnostics {
    totalColumns: number;
    plottedVariables: number;
    droppedVariables: string[];
    totalGroups: number;
    validationPassed: boolean;
    errors: string[];
}

export interface ValidationResult {
    passed: boolean;
    errors: string[];
}
