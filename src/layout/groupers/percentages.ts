/**
 * PercentageGrouper - one area (or bar) panel per variable
 *
 * Every panel's x-axis runs from 0 to a rounded maximum, and the panels split
 * the group width in proportion to those ranges:
 *
 *   width_i = W * range_i / sum(range_j over visible j)
 *
 * so one percent has the same horizontal extent in every panel of the group.
 */

import { GrouperKind, Panel } from '../../types.js';
import { StratGrouper } from './grouper.js';

export class PercentageGrouper extends StratGrouper {
    protected variant(): GrouperKind {
        return 'percentages';
    }

    /**
     * Raise the x-range of every panel whose maximum lies below `floor` to
     * [0, floor] and reflow the group if any range changed. Wider panels are
     * left as they are.
     *
     * @returns true if at least one panel was clamped
     */
    applyMinimumRange(floor: number): boolean {
        let changed = false;
        for (const panel of this.panels) {
            if (panel.xlim[1] < floor) {
                panel.xlim = [0, floor];
                changed = true;
            }
        }
        if (changed) {
            this.resize();
        }
        return changed;
    }

    protected allocate(panels: Panel[]): void {
        const ranges = panels.map(p => p.xlim[1] - p.xlim[0]);
        const total = ranges.reduce((acc, r) => acc + r, 0);
        // Degenerate ranges (all-zero columns without a floor)
        if (!(total > 0)) {
            super.allocate(panels);
            return;
        }

        let x0 = this.bounds.x0;
        panels.forEach((panel, i) => {
            const w = this.bounds.width * ranges[i] / total;
            panel.bounds = { x0, y0: this.bounds.y0, width: w, height: this.bounds.height };
            x0 += w;
        });
    }
}
