/**
 * StratGrouper - layout owner of one group of panels
 *
 * Holds the group's envelope and the ordered ids of its panels (the panels
 * themselves live in the PanelRegistry). Subclasses change the allocation
 * rule (percentages) or combine all variables into one panel (all-in-one,
 * stacked).
 *
 * Every mutation (show, hide, reorder, resize) leaves geometry, share sets
 * and group bars consistent before it returns, and runs inside one registry
 * batch so listeners observe a single change.
 */

import { extent, nice } from 'd3';
import {
    Bounds,
    FigureSize,
    GroupKey,
    GrouperKind,
    Panel,
    PanelId,
    PanelStyle
} from '../../types.js';
import { ColumnStats, columnStats } from '../../data/table.js';
import { DecorationLayer, GroupBar, GroupBarAnnotator } from '../group-bar.js';
import { PanelRegistry } from '../panel-registry.js';
import { StratDataset } from '../pipeline/types.js';
import { defaultStyle, formatLabel, mergeStyle } from '../styles.js';

const DEFAULT_GROUP_BAR_LABEL = '%(group)s';

/**
 * Shared state of one diagram, handed to each grouper.
 */
export interface GrouperContext {
    registry: PanelRegistry;
    decorations: DecorationLayer;
    dataset: StratDataset;
    figure: () => FigureSize;
}

export interface GrouperInit {
    context: GrouperContext;
    group: GroupKey;
    bounds: Bounds;
    variables: string[];
    style?: Partial<PanelStyle>;
    useBars?: boolean;
    groupBarAngle: number;
    /** Panel owning the diagram-wide vertical axis, null if this group creates it */
    sharey: PanelId | null;
}

/**
 * Panels of one subgroup that share a vertical scale and one group bar.
 */
export interface ShareSet {
    subgroup: GroupKey;
    anchor: PanelId;
    members: PanelId[];
}

export interface VariableSummary extends ColumnStats {
    name: string;
    subgroup: GroupKey;
    visible: boolean;
}

/** Nice upper limit at or above `value` */
export function roundedMax(value: number): number {
    if (!(value > 0)) return 0;
    return nice(0, value, 10)[1];
}

function cloneStyle(style: PanelStyle): PanelStyle {
    return {
        ...style,
        plot: Array.isArray(style.plot) ? [...style.plot] : style.plot,
        xlim: style.xlim ? [style.xlim[0], style.xlim[1]] : null,
        xticks: style.xticks ? [...style.xticks] : null,
        axisLineStyle: { ...style.axisLineStyle },
        grouper: style.grouper ? { ...style.grouper } : null
    };
}

export abstract class StratGrouper {
    readonly group: GroupKey;
    readonly useBars: boolean;
    bounds: Bounds;

    /** Group bar offset as a fraction of the panel height, null while disabled */
    groupBarHeight: number | null = null;

    protected readonly context: GrouperContext;
    protected readonly style: PanelStyle;
    protected panelIds: PanelId[];

    private annotators = new Map<GroupKey, GroupBarAnnotator>();

    constructor(init: GrouperInit) {
        this.context = init.context;
        this.group = init.group;
        this.bounds = { ...init.bounds };
        this.useBars = init.useBars ?? false;
        this.style = mergeStyle(
            defaultStyle(this.variant(), this.useBars, init.groupBarAngle),
            init.style
        );
        this.groupBarHeight = this.style.grouper?.height ?? null;
        this.panelIds = this.createPanels(init.variables, init.sharey);
        this.syncShareSets();
        this.resize();
    }

    // ==================== ACCESSORS ====================

    get kind(): GrouperKind {
        return this.variant();
    }

    /** Live panels in plotting order; removed panels are skipped */
    get panels(): Panel[] {
        return this.context.registry.resolve(this.panelIds);
    }

    get visiblePanels(): Panel[] {
        return this.panels.filter(p => p.visible);
    }

    /** Variable names in plotting order */
    get members(): string[] {
        return this.panels.map(p => p.variables[0]);
    }

    get figure(): FigureSize {
        return this.context.figure();
    }

    get groupBars(): GroupBar[] {
        const bars: GroupBar[] = [];
        for (const annotator of this.annotators.values()) {
            if (annotator.bar) bars.push(annotator.bar);
        }
        return bars;
    }

    isVisible(name: string): boolean {
        return this.findPanel(name)?.visible ?? false;
    }

    /** Mean/min/max per member, for tree views */
    summary(): VariableSummary[] {
        const { variables } = this.context.dataset;
        const result: VariableSummary[] = [];
        for (const name of this.members) {
            const variable = variables.get(name);
            if (!variable) continue;
            result.push({
                name,
                subgroup: variable.attrs.subgroup,
                visible: this.isVisible(name),
                ...columnStats(variable.values)
            });
        }
        return result;
    }

    /**
     * Share sets derived from the panels' current links, in plotting order.
     */
    shareSets(): ShareSet[] {
        const sets = new Map<GroupKey, ShareSet>();
        for (const panel of this.panels) {
            if (!panel.share) continue;
            if (panel.share.role === 'anchor') {
                sets.set(panel.subgroup, { subgroup: panel.subgroup, anchor: panel.id, members: [] });
            } else {
                sets.get(panel.subgroup)?.members.push(panel.id);
            }
        }
        return Array.from(sets.values());
    }

    // ==================== MUTATIONS ====================

    /**
     * Recompute the rectangles of the visible panels, optionally for a new
     * envelope. Nothing happens without visible panels.
     */
    resize(bounds?: Bounds): void {
        const visible = this.visiblePanels;
        if (visible.length === 0) return;
        if (bounds) {
            this.bounds = { ...bounds };
        }

        this.context.registry.batch(() => {
            this.allocate(visible);
            this.context.registry.touch();
        });
        this.refreshGroupBars();
    }

    hide(name: string): void {
        const panel = this.findPanel(name);
        if (!panel || !panel.visible) return;

        this.context.registry.batch(() => {
            panel.visible = false;
            this.reflow();
        });
    }

    show(name: string): void {
        const panel = this.findPanel(name);
        if (!panel || panel.visible) return;

        this.context.registry.batch(() => {
            panel.visible = true;
            this.reflow();
        });
    }

    /**
     * Put the members in the order of `names`. Names that are not members are
     * ignored; members that are not named keep their relative order at the end.
     */
    reorder(names: string[]): void {
        const panels = this.panels;
        if (panels.length === 0) return;
        const byName = new Map(panels.map(p => [p.variables[0], p] as const));
        const ordered: Panel[] = [];
        const ignored: string[] = [];

        for (const name of names) {
            const panel = byName.get(name);
            if (!panel || ordered.includes(panel)) {
                ignored.push(name);
                continue;
            }
            ordered.push(panel);
        }
        const appended = panels.filter(p => !ordered.includes(p));
        warnPartialReorder(this.group, ignored, appended.map(p => p.variables[0]));

        this.context.registry.batch(() => {
            this.panelIds = [...ordered, ...appended].map(p => p.id);
            this.reflow();
        });
    }

    /**
     * Enable the group bars with the given height (fraction of the panel
     * height) or redraw them with the current one.
     */
    groupPlots(height?: number): void {
        const h = height ?? this.groupBarHeight;
        if (h === null) return;

        this.groupBarHeight = h;
        for (const panel of this.panels) {
            panel.style.grouper = {
                height: h,
                label: panel.style.grouper?.label ?? DEFAULT_GROUP_BAR_LABEL
            };
        }
        this.context.registry.touch();
        this.refreshGroupBars();
    }

    /**
     * Recompute every group bar from the current geometry and figure size.
     * Called after each layout change and on figure resize notifications.
     */
    refreshGroupBars(): void {
        const height = this.groupBarHeight;
        if (height === null) return;

        const { registry } = this.context;
        const live = new Set<GroupKey>();
        for (const set of this.shareSets()) {
            const anchor = registry.get(set.anchor);
            if (!anchor) continue;

            const boxes = [anchor, ...registry.resolve(set.members)].map(p => p.bounds);
            const template = anchor.style.grouper?.label ?? DEFAULT_GROUP_BAR_LABEL;
            this.annotatorFor(set.subgroup).update({
                boxes,
                height,
                angle: anchor.style.groupBarAngle,
                label: formatLabel(template, { group: set.subgroup, name: anchor.variables[0] }),
                figure: this.figure
            });
            live.add(set.subgroup);
        }

        for (const [subgroup, annotator] of this.annotators) {
            if (!live.has(subgroup)) annotator.remove();
        }
    }

    removeGroupBars(): void {
        for (const annotator of this.annotators.values()) {
            annotator.remove();
        }
    }

    // ==================== INTERNALS ====================

    /** Equal split of the envelope width among the given panels */
    protected allocate(panels: Panel[]): void {
        const w = this.bounds.width / panels.length;
        let x0 = this.bounds.x0;
        for (const panel of panels) {
            panel.bounds = { x0, y0: this.bounds.y0, width: w, height: this.bounds.height };
            x0 += w;
        }
    }

    /** Full update after a structural change */
    protected reflow(): void {
        this.syncShareSets();
        this.resize();
        this.groupPlots();
        this.context.registry.touch();
    }

    /**
     * Rebuild all share sets at once: per subgroup the first visible panel is
     * the anchor, the other visible panels are members, hidden panels are
     * detached.
     */
    protected syncShareSets(): void {
        const anchors = new Map<GroupKey, PanelId>();
        for (const panel of this.panels) {
            if (!panel.visible) {
                panel.share = null;
                continue;
            }
            const anchor = anchors.get(panel.subgroup);
            if (anchor === undefined) {
                anchors.set(panel.subgroup, panel.id);
                panel.share = { anchor: panel.id, role: 'anchor' };
            } else {
                panel.share = { anchor, role: 'member' };
            }
        }
    }

    /** Grouper tag, also read while the constructor runs */
    protected abstract variant(): GrouperKind;

    protected findPanel(name: string): Panel | undefined {
        return this.panels.find(p => p.variables[0] === name);
    }

    /** One panel per variable */
    protected createPanels(variables: string[], sharey: PanelId | null): PanelId[] {
        const ids: PanelId[] = [];
        let axisOwner = sharey;
        for (const name of variables) {
            const id = this.addPanel([name], this.subgroupOf(name), axisOwner);
            axisOwner = axisOwner ?? id;
            ids.push(id);
        }
        return ids;
    }

    protected addPanel(variables: string[], subgroup: GroupKey, sharey: PanelId | null): PanelId {
        const { registry } = this.context;
        const id = registry.nextId(this.group);
        registry.add({
            id,
            group: this.group,
            subgroup,
            variables,
            bounds: { ...this.bounds },
            visible: true,
            xlim: this.computeXlim(variables),
            sharey,
            yInverted: false,
            share: null,
            style: cloneStyle(this.style)
        });
        return id;
    }

    protected subgroupOf(name: string): GroupKey {
        return this.context.dataset.variables.get(name)?.attrs.subgroup ?? this.group;
    }

    protected valuesOf(name: string): number[] {
        return this.context.dataset.variables.get(name)?.values ?? [];
    }

    /** Data range of the variables, or the style's limits where given */
    protected computeXlim(variables: string[]): [number, number] {
        const values = variables.flatMap(name => this.valuesOf(name));
        return this.applyStyleXlim(this.dataExtent(values));
    }

    protected dataExtent(values: number[]): [number, number] {
        const [lo, hi] = extent(values);
        return lo === undefined || hi === undefined ? [0, 1] : [lo, hi];
    }

    protected applyStyleXlim([lo, hi]: [number, number]): [number, number] {
        const limit = this.style.xlim;
        if (!limit) return [lo, hi];
        const upper = limit[1] === 'rounded' ? roundedMax(hi) : limit[1];
        return [limit[0], upper];
    }

    private annotatorFor(subgroup: GroupKey): GroupBarAnnotator {
        let annotator = this.annotators.get(subgroup);
        if (!annotator) {
            annotator = new GroupBarAnnotator(this.context.decorations, `${this.group}/${subgroup}`);
            this.annotators.set(subgroup, annotator);
        }
        return annotator;
    }
}

export function warnPartialReorder(group: GroupKey, ignored: string[], appended: string[]): void {
    if (ignored.length === 0 && appended.length === 0) return;
    const parts: string[] = [];
    if (ignored.length > 0) parts.push(`ignored [${ignored.join(', ')}]`);
    if (appended.length > 0) parts.push(`appended [${appended.join(', ')}]`);
    console.warn(`Reorder of group "${group}": ${parts.join('; ')}`);
}
