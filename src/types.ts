/**
 * Stratlayout - Type Definitions
 * Branded types for panel IDs, table input, panel geometry and configuration
 */

// ==================== BRANDED TYPES ====================

/** Branded type for Panel IDs - handles into the PanelRegistry */
export type PanelId = string & { readonly __brand: 'PanelId' };

/** Helper to create a PanelId from string */
export function toPanelId(id: string): PanelId {
    return id as PanelId;
}

/** Group key returned by the classification function */
export type GroupKey = string;

/** Catch-all group used when no classification function is given */
export const NOGROUP: GroupKey = 'nogroup';

/** Group that receives the synthesised row-wise sums */
export const SUMMED_GROUP: GroupKey = 'Summed';

// ==================== INPUT TABLE ====================

/**
 * Tabular input: one ordered index (depth, age, time...) and named numeric
 * columns of the same length.
 */
export interface StratTable {
    index: number[];
    indexName?: string;
    columns: string[];
    data: Record<string, number[]>;
}

/** Classification function: column name -> group (or subgroup) key */
export type GroupFunc = (column: string) => GroupKey;

// ==================== GEOMETRY ====================

/** Rectangle in figure-fraction coordinates (origin bottom-left) */
export interface Bounds {
    x0: number;
    y0: number;
    width: number;
    height: number;
}

export interface Point {
    x: number;
    y: number;
}

/** Figure size in pixels, used to convert between fractions and pixels */
export interface FigureSize {
    widthPx: number;
    heightPx: number;
}

// ==================== PANELS ====================

export type GrouperKind = 'default' | 'percentages' | 'all_in_one' | 'stacked';

/** Rendering directive for one series */
export type PlotKind = 'line' | 'area' | 'bar' | 'stacked';

export type AxisSide = 'left' | 'right' | 'top' | 'bottom';

export type LineStyle = 'solid' | 'dashed' | 'dotted';

/** Upper x-limit may be a number or 'rounded' (nice value above the data max) */
export type XLimit = [number, number | 'rounded'];

/** Group bar directive: bar offset as a fraction of the panel height, plus label template */
export interface GroupBarSetting {
    height: number;
    label: string;
}

/**
 * Style directives handed to the renderer together with the panel rectangle.
 * Combined panels (all_in_one, stacked) carry one plot kind per series in
 * `plot`; null marks a hidden series.
 */
export interface PanelStyle {
    plot: PlotKind | null | Array<PlotKind | null>;
    xlim: XLimit | null;
    xticks: number[] | null;
    yticksVisible: boolean;
    ylabel: string | null;
    title: string | null;
    titleWrap: number;
    legend: boolean;
    axisLineStyle: Partial<Record<AxisSide, LineStyle>>;
    grouper: GroupBarSetting | null;
    groupBarAngle: number;
}

/** Role of a panel inside its share set (null when detached) */
export interface ShareLink {
    anchor: PanelId;
    role: 'anchor' | 'member';
}

/**
 * Panel - the geometric unit for one variable (or several for combined groups).
 * Owned by the PanelRegistry; groupers only hold its id.
 */
export interface Panel {
    id: PanelId;
    group: GroupKey;
    subgroup: GroupKey;
    variables: string[];
    bounds: Bounds;
    visible: boolean;
    xlim: [number, number];
    /** Diagram-wide vertical axis the panel is tied to (null for the axis owner) */
    sharey: PanelId | null;
    yInverted: boolean;
    share: ShareLink | null;
    style: PanelStyle;
}

// ==================== CONFIGURATION ====================

export interface SubplotParams {
    left: number;
    bottom: number;
    right: number;
    top: number;
}

export interface StratConfig {
    subplot: SubplotParams;
    figure: FigureSize;
    threshold: number;         // Min max-value for keeping a percentage column
    minPercentage: number;     // Floor of the x-range of percentage panels
    truncHeight: number;       // Fraction of the envelope height reserved for group bars
    groupBarAngle: number;     // Degrees
    indexLabel: string;        // Fallback name of the index
    dividerStyle: LineStyle;   // Style of inter-group seams
}

export const DEFAULT_STRAT_CONFIG: StratConfig = {
    subplot: { left: 0.125, bottom: 0.11, right: 0.9, top: 0.88 },
    figure: { widthPx: 640, heightPx: 480 },
    threshold: 0.01,
    minPercentage: 20,
    truncHeight: 0.3,
    groupBarAngle: 45,
    indexLabel: 'y',
    dividerStyle: 'dotted'
};

/** Merge caller overrides into the defaults */
export function resolveConfig(overrides: Partial<StratConfig> = {}): StratConfig {
    return {
        ...DEFAULT_STRAT_CONFIG,
        ...overrides,
        subplot: { ...DEFAULT_STRAT_CONFIG.subplot, ...overrides.subplot },
        figure: { ...DEFAULT_STRAT_CONFIG.figure, ...overrides.figure }
    };
}
