/**
 * StratDiagram - one laid-out stratigraphic diagram
 *
 * Owns the panel registry, the decoration layer and the figure size. The
 * renderer reads `panels` and `decorations`, subscribes to changes and calls
 * resizeFigure() when its canvas changes size.
 */

import { FigureSize, GroupKey, Panel, StratTable, resolveConfig } from '../types.js';
import { assertFigureSize } from './geometry.js';
import { Decoration, DecorationLayer, GroupBar } from './group-bar.js';
import { StratGrouper } from './groupers/grouper.js';
import { formatLabel, wrapText } from './styles.js';
import { PanelRegistry, RegistryListener } from './panel-registry.js';
import { runStratPipeline, validateStratLayout } from './pipeline/index.js';
import {
    LayoutDiagnostics,
    PipelineResult,
    StratDataset,
    StratOptions,
    ValidationResult
} from './pipeline/types.js';

export class StratDiagram {
    readonly registry = new PanelRegistry();
    readonly decorations = new DecorationLayer();

    private figureSize: FigureSize;
    private readonly result: PipelineResult;

    constructor(table: StratTable, options: StratOptions = {}) {
        const figure = resolveConfig(options.config).figure;
        assertFigureSize(figure);
        this.figureSize = { ...figure };

        this.result = runStratPipeline({
            table,
            options,
            context: {
                registry: this.registry,
                decorations: this.decorations,
                figure: () => this.figureSize
            }
        });
    }

    get groupers(): StratGrouper[] {
        return [...this.result.groupers];
    }

    /** Live panels in plotting order, empty once closed */
    get panels(): Panel[] {
        return this.result.groupers.flatMap(g => g.panels);
    }

    get dataset(): StratDataset {
        return this.result.dataset;
    }

    get groupBars(): GroupBar[] {
        return this.result.groupers.flatMap(g => g.groupBars);
    }

    get decorationItems(): Decoration[] {
        return this.decorations.all();
    }

    /** Diagnostics of the initial layout */
    get diagnostics(): LayoutDiagnostics {
        return this.result.diagnostics;
    }

    get figure(): FigureSize {
        return { ...this.figureSize };
    }

    get closed(): boolean {
        return this.registry.isClosed();
    }

    grouper(group: GroupKey): StratGrouper | undefined {
        return this.result.groupers.find(g => g.group === group);
    }

    /**
     * Title text of a panel: the style's template filled with the group and
     * the (long) name of its first variable, wrapped after `titleWrap`
     * characters.
     */
    panelTitle(panel: Panel): string | null {
        const { title, titleWrap } = panel.style;
        if (title === null) return null;

        const name = panel.variables[0] ?? '';
        const variable = this.result.dataset.variables.get(name);
        const text = formatLabel(title, {
            name: variable?.attrs.longName ?? name,
            group: panel.group
        });
        return wrapText(text, titleWrap);
    }

    /** Re-check the layout invariants against the current geometry */
    validate(): ValidationResult {
        return validateStratLayout(this.result.groupers);
    }

    /**
     * Figure resize notification. Group bars depend on the pixel size of the
     * figure and are recomputed for every grouper.
     */
    resizeFigure(size: FigureSize): void {
        assertFigureSize(size);
        this.figureSize = { ...size };
        if (this.closed) return;

        this.registry.batch(() => {
            for (const grouper of this.result.groupers) {
                grouper.refreshGroupBars();
            }
            this.registry.touch();
        });
    }

    subscribe(listener: RegistryListener): () => void {
        return this.registry.subscribe(listener);
    }

    /**
     * Drop all panels and decorations. Groupers stay reachable but every
     * operation on them is a no-op afterwards.
     */
    close(): void {
        if (this.closed) return;
        for (const grouper of this.result.groupers) {
            grouper.removeGroupBars();
        }
        this.decorations.clear();
        this.registry.close();
    }
}

/**
 * Layout engine entry point.
 */
export class StratLayoutEngine {
    layout(table: StratTable, options: StratOptions = {}): StratDiagram {
        return new StratDiagram(table, options);
    }
}

/**
 * Lay out `table` as a stratigraphic diagram.
 */
export function stratplot(table: StratTable, options: StratOptions = {}): StratDiagram {
    return new StratLayoutEngine().layout(table, options);
}
