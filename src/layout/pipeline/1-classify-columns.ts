/**
 * Step 1: Classify Columns
 *
 * Assigns every table column to a group with the caller's classification
 * function.
 *
 * Rules:
 * - Groups appear in the order of their first column
 * - Columns keep their table order inside a group
 * - A key listed as a subgroup is rewritten to its parent group; the raw key
 *   stays on the column as its subgroup
 */

import { GroupKey, NOGROUP } from '../../types.js';
import { ClassifyInput, ColumnClassification } from './types.js';

/** Default classification: everything in one catch-all group */
export const catchAll = (): GroupKey => NOGROUP;

export function classifyColumns(input: ClassifyInput): ColumnClassification {
    const { table, groupFunc, subgroups } = input;
    const parents = invertSubgroups(subgroups);

    const groups = new Map<GroupKey, string[]>();
    const columnGroup = new Map<string, GroupKey>();
    const columnSubgroup = new Map<string, GroupKey>();

    for (const column of table.columns) {
        const key = groupFunc(column);
        const group = parents.get(key) ?? key;

        let members = groups.get(group);
        if (!members) {
            members = [];
            groups.set(group, members);
        }
        members.push(column);
        columnGroup.set(column, group);
        columnSubgroup.set(column, key);
    }

    return { groups, columnGroup, columnSubgroup };
}

/**
 * Subgroup -> parent group. A subgroup listed under several groups belongs to
 * the first one.
 */
export function invertSubgroups(subgroups: Record<GroupKey, GroupKey[]>): Map<GroupKey, GroupKey> {
    const parents = new Map<GroupKey, GroupKey>();
    for (const [group, children] of Object.entries(subgroups)) {
        for (const child of children) {
            if (!parents.has(child)) parents.set(child, group);
        }
    }
    return parents;
}
