/**
 * Step 2: Build Dataset
 *
 * Turns the classified table into the dataset the panels are bound to.
 * - Row-normalises percentage groups to 100
 * - Synthesises the summed variables of the Summed group
 * - Decides which variables get plotted (exclusion, threshold)
 */

import { max, sum } from 'd3';
import { GroupKey, SUMMED_GROUP } from '../../types.js';
import { BuildDatasetInput, BuiltDataset, StratDataset, Variable } from './types.js';

/**
 * Build the dataset and the set of plotted variables.
 */
export function buildDataset(input: BuildDatasetInput): BuiltDataset {
    const {
        table,
        classification,
        indexName,
        percentages,
        calculatePercentages,
        percentageBase,
        exclude,
        threshold,
        summed
    } = input;

    const variables = new Map<string, Variable>();
    for (const column of table.columns) {
        const group = classification.columnGroup.get(column);
        if (group === undefined) continue;
        variables.set(column, {
            name: column,
            values: [...table.data[column]],
            attrs: { group, subgroup: classification.columnSubgroup.get(column) ?? group }
        });
    }

    const groups = new Map<GroupKey, string[]>();
    for (const [group, members] of classification.groups) {
        groups.set(group, [...members]);
    }

    const dataset: StratDataset = {
        index: [...table.index],
        indexName,
        variables,
        groups,
        kinds: new Map()
    };

    const percentGroups = unique(percentages).filter(g => groups.has(g));
    if (calculatePercentages) {
        const base = resolvePercentageBase(percentageBase, groups, variables);
        const totals = new Map(
            percentGroups.map(group => {
                const members = groups.get(group) ?? [];
                return [group, rowTotals(table.data, base.length > 0 ? base : members, dataset.index.length)] as const;
            })
        );
        for (const [group, groupTotals] of totals) {
            normalizeRows(variables, groups.get(group) ?? [], groupTotals);
        }
    }

    addSummedVariables(dataset, summedGroups(summed, groups));

    const excluded = new Set(exclude);
    const percentSet = new Set(percentGroups);
    const plotVariables = new Set<string>();
    const dropped: string[] = [];
    for (const variable of variables.values()) {
        const { group } = variable.attrs;
        const keep =
            !excluded.has(variable.name) &&
            !excluded.has(group) &&
            (!percentSet.has(group) || (max(variable.values) ?? -Infinity) > threshold);
        if (keep) {
            plotVariables.add(variable.name);
        } else {
            dropped.push(variable.name);
        }
    }

    return { dataset, plotVariables, dropped };
}

/**
 * Columns forming the normalisation denominator. Group names expand to their
 * members; unknown names are ignored.
 */
export function resolvePercentageBase(
    names: string[],
    groups: Map<GroupKey, string[]>,
    variables: Map<string, Variable>
): string[] {
    const columns: string[] = [];
    for (const name of names) {
        const members = groups.get(name) ?? (variables.has(name) ? [name] : []);
        for (const member of members) {
            if (!columns.includes(member)) columns.push(member);
        }
    }
    return columns;
}

/**
 * Row totals of `columns` in the untouched table data.
 */
export function rowTotals(data: Record<string, number[]>, columns: string[], rows: number): number[] {
    const columnValues = columns.map(name => data[name] ?? []);
    const totals: number[] = [];
    for (let i = 0; i < rows; i++) {
        totals.push(sum(columnValues, values => values[i]));
    }
    return totals;
}

/**
 * Rescale every row of `members` to percent of its row total. A row whose
 * total is 0 becomes 0.
 */
export function normalizeRows(variables: Map<string, Variable>, members: string[], totals: number[]): void {
    for (const name of members) {
        const variable = variables.get(name);
        if (!variable) continue;
        variable.values = variable.values.map((v, i) => (totals[i] === 0 ? 0 : (v / totals[i]) * 100));
    }
}

function summedGroups(summed: boolean | GroupKey[], groups: Map<GroupKey, string[]>): GroupKey[] {
    if (summed === true) return Array.from(groups.keys());
    if (summed === false) return [];
    return unique(summed).filter(g => groups.has(g));
}

/**
 * One row-wise sum per listed group, collected in the Summed group. The sum is
 * named after its group, or `<group>_sum`, `<group>_sum_2`, ... when taken.
 */
function addSummedVariables(dataset: StratDataset, groups: GroupKey[]): void {
    if (groups.length === 0) return;

    const { variables } = dataset;
    const names: string[] = [];
    for (const group of groups) {
        const members = (dataset.groups.get(group) ?? [])
            .map(name => variables.get(name)?.values ?? []);
        const values = dataset.index.map((_, i) => sum(members, column => column[i]));
        const name = freeName(group, variables);
        variables.set(name, {
            name,
            values,
            attrs: { group: SUMMED_GROUP, subgroup: SUMMED_GROUP, longName: `Sum of ${group}` }
        });
        names.push(name);
    }
    dataset.groups.set(SUMMED_GROUP, [...(dataset.groups.get(SUMMED_GROUP) ?? []), ...names]);
}

function freeName(group: GroupKey, variables: Map<string, Variable>): string {
    if (!variables.has(group)) return group;
    let name = `${group}_sum`;
    for (let n = 2; variables.has(name); n++) {
        name = `${group}_sum_${n}`;
    }
    return name;
}

function unique<T>(items: T[]): T[] {
    return Array.from(new Set(items));
}
