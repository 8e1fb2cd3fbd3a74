/**
 * Tree view model
 *
 * Headless state of a visibility tree: one node per grouper, one row per
 * variable with its visibility, move buttons and summary statistics. A UI
 * toolkit renders the rows and forwards checkbox and arrow clicks here.
 */

import { GroupKey, GrouperKind } from './types.js';
import { StratGrouper } from './layout/groupers/grouper.js';

export type MoveDirection = 'up' | 'down';

export interface TreeRow {
    name: string;
    visible: boolean;
    canMoveUp: boolean;
    canMoveDown: boolean;
    mean: string;
    min: string;
    max: string;
    /** Only set when it differs from the group */
    subgroup?: GroupKey;
}

export interface TreeNode {
    group: GroupKey;
    kind: GrouperKind;
    rows: TreeRow[];
}

function formatStat(value: number): string {
    return value.toFixed(3);
}

export class StratTreeModel {
    private readonly groupers: Map<GroupKey, StratGrouper>;

    constructor(groupers: StratGrouper[]) {
        this.groupers = new Map(groupers.map(g => [g.group, g] as const));
    }

    nodes(): TreeNode[] {
        return Array.from(this.groupers.values()).map(buildNode);
    }

    node(group: GroupKey): TreeNode | undefined {
        const grouper = this.groupers.get(group);
        return grouper ? buildNode(grouper) : undefined;
    }

    /**
     * Checkbox toggle.
     * @returns false if the group is unknown
     */
    setVisible(group: GroupKey, name: string, visible: boolean): boolean {
        const grouper = this.groupers.get(group);
        if (!grouper) return false;
        if (visible) {
            grouper.show(name);
        } else {
            grouper.hide(name);
        }
        return true;
    }

    /**
     * Move the selected rows of a group one step up or down. If any selected
     * row is already at that end, nothing moves.
     *
     * @returns true if the group was reordered
     */
    moveSelected(group: GroupKey, names: string[], direction: MoveDirection): boolean {
        const grouper = this.groupers.get(group);
        if (!grouper) return false;

        const order = grouper.members;
        const selected = Array.from(new Set(names.filter(n => order.includes(n))))
            .map(name => order.indexOf(name))
            .sort((a, b) => (direction === 'up' ? a - b : b - a));
        if (selected.length === 0) return false;

        const last = order.length - 1;
        const blocked = selected.some(i => (direction === 'up' ? i === 0 : i === last));
        if (blocked) return false;

        const step = direction === 'up' ? -1 : 1;
        const next = [...order];
        for (const current of selected) {
            const name = order[current];
            const from = next.indexOf(name);
            next[from] = next[from + step];
            next[from + step] = name;
        }
        grouper.reorder(next);
        return true;
    }
}

function buildNode(grouper: StratGrouper): TreeNode {
    const summary = grouper.summary();
    const last = summary.length - 1;
    return {
        group: grouper.group,
        kind: grouper.kind,
        rows: summary.map((item, i) => {
            const row: TreeRow = {
                name: item.name,
                visible: item.visible,
                canMoveUp: i > 0,
                canMoveDown: i < last,
                mean: formatStat(item.mean),
                min: formatStat(item.min),
                max: formatStat(item.max)
            };
            if (item.subgroup !== grouper.group) row.subgroup = item.subgroup;
            return row;
        })
    };
}
