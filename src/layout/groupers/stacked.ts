/**
 * StackedGrouper - one panel with the group's variables stacked cumulatively
 */

import { GrouperKind } from '../../types.js';
import { AllInOneGrouper } from './all-in-one.js';

export class StackedGrouper extends AllInOneGrouper {
    protected variant(): GrouperKind {
        return 'stacked';
    }

    /** The stack starts at 0 and ends at the largest row total */
    protected computeXlim(variables: string[]): [number, number] {
        const columns = variables.map(name => this.valuesOf(name));
        const rows = Math.max(0, ...columns.map(c => c.length));
        const totals: number[] = [];
        for (let i = 0; i < rows; i++) {
            totals.push(columns.reduce((acc, c) => acc + (Number.isFinite(c[i]) ? c[i] : 0), 0));
        }
        const [, hi] = this.dataExtent(totals);
        return this.applyStyleXlim([0, Math.max(hi, 0)]);
    }
}
