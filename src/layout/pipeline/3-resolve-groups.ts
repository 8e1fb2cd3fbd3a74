/**
 * Step 3: Resolve Groups
 *
 * Picks the grouper variant and the width of every group that still has
 * something to plot.
 *
 * Rules:
 * - Variant precedence: all_in_one > stacked > percentages > default
 * - The Summed group is stacked unless listed as all_in_one
 * - Groups without plotted variables are omitted
 * - Missing widths are an equal split among the non-percentage groups
 */

import { GroupKey, GrouperKind, SUMMED_GROUP } from '../../types.js';
import { GroupPlan, ResolveGroupsInput } from './types.js';

export function resolveGroups(input: ResolveGroupsInput): GroupPlan[] {
    const { built, percentages, allInOne, stacked, widths, useBars } = input;
    const { dataset, plotVariables } = built;

    const candidates: Array<{ group: GroupKey; variables: string[]; kind: GrouperKind }> = [];
    for (const [group, members] of dataset.groups) {
        const variables = members.filter(name => plotVariables.has(name));
        if (variables.length === 0) continue;
        candidates.push({
            group,
            variables,
            kind: resolveKind(group, { percentages, allInOne, stacked })
        });
    }

    const nonPercentage = candidates.filter(c => c.kind !== 'percentages').length;
    const defaultWidth = 1 / (nonPercentage || 1);
    const bars = barGroups(useBars, candidates.map(c => c.group));

    return candidates.map(({ group, variables, kind }) => {
        dataset.kinds.set(group, kind);
        return {
            group,
            kind,
            variables,
            widthFraction: widths[group] ?? defaultWidth,
            useBars: bars.has(group)
        };
    });
}

export function resolveKind(
    group: GroupKey,
    lists: { percentages: GroupKey[]; allInOne: GroupKey[]; stacked: GroupKey[] }
): GrouperKind {
    if (lists.allInOne.includes(group)) return 'all_in_one';
    if (lists.stacked.includes(group) || group === SUMMED_GROUP) return 'stacked';
    if (lists.percentages.includes(group)) return 'percentages';
    return 'default';
}

/** `true` selects every group, a string a single one */
function barGroups(useBars: boolean | GroupKey | GroupKey[], groups: GroupKey[]): Set<GroupKey> {
    if (useBars === true) return new Set(groups);
    if (useBars === false) return new Set();
    return new Set(typeof useBars === 'string' ? [useBars] : useBars);
}
