/**
 * AllInOneGrouper - every variable of the group overlaid in one panel
 *
 * Visibility is per series: hiding a variable sets its entry of the panel's
 * plot-kind array to null and leaves the panel geometry untouched.
 */

import { GrouperKind, Panel, PanelId, PlotKind } from '../../types.js';
import { defaultPlotKind } from '../styles.js';
import { StratGrouper, warnPartialReorder } from './grouper.js';

export class AllInOneGrouper extends StratGrouper {
    protected variant(): GrouperKind {
        return 'all_in_one';
    }

    /** The single combined panel, undefined once the diagram is closed */
    get panel(): Panel | undefined {
        return this.panels[0];
    }

    get members(): string[] {
        return this.panel ? [...this.panel.variables] : [];
    }

    isVisible(name: string): boolean {
        const panel = this.panel;
        if (!panel) return false;
        const i = panel.variables.indexOf(name);
        return i >= 0 && this.seriesPlots(panel)[i] !== null;
    }

    hide(name: string): void {
        this.setSeriesVisible(name, false);
    }

    show(name: string): void {
        this.setSeriesVisible(name, true);
    }

    /**
     * Reorder the series in place; each series keeps its visibility.
     */
    reorder(names: string[]): void {
        const panel = this.panel;
        if (!panel) return;

        const current = panel.variables;
        const visible = new Map(current.map(name => [name, this.isVisible(name)] as const));
        const ordered: string[] = [];
        const ignored: string[] = [];
        for (const name of names) {
            if (!visible.has(name) || ordered.includes(name)) {
                ignored.push(name);
                continue;
            }
            ordered.push(name);
        }
        const appended = current.filter(name => !ordered.includes(name));
        warnPartialReorder(this.group, ignored, appended);

        const variables = [...ordered, ...appended];
        panel.variables = variables;
        panel.style.plot = variables.map(name => (visible.get(name) ? this.seriesKind() : null));
        this.context.registry.touch();
    }

    /** Combined panels carry the group name in their title, not a group bar */
    groupPlots(): void {
        return;
    }

    protected createPanels(variables: string[], sharey: PanelId | null): PanelId[] {
        const id = this.addPanel([...variables], this.group, sharey);
        const panel = this.context.registry.get(id);
        if (panel) {
            panel.style.plot = variables.map(() => this.seriesKind());
        }
        return [id];
    }

    protected seriesKind(): PlotKind {
        return defaultPlotKind(this.kind, this.useBars);
    }

    private seriesPlots(panel: Panel): Array<PlotKind | null> {
        const plot = panel.style.plot;
        return Array.isArray(plot) ? [...plot] : panel.variables.map(() => plot);
    }

    private setSeriesVisible(name: string, visible: boolean): void {
        const panel = this.panel;
        if (!panel) return;
        const i = panel.variables.indexOf(name);
        if (i < 0) return;

        const plots = this.seriesPlots(panel);
        if ((plots[i] !== null) === visible) return;

        plots[i] = visible ? this.seriesKind() : null;
        panel.style.plot = plots;
        this.context.registry.touch();
    }
}
