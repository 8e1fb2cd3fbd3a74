/**
 * Layout Validation
 *
 * Checks layout invariants:
 * 1. Default and percentage groups exactly fill their width, left to right
 * 2. Percentage panels are as wide as their x-range share
 * 3. No two visible panels overlap
 * 4. Every subgroup with visible panels has one anchor; hidden panels are detached
 */

import { Panel } from '../../types.js';
import { nearlyEqual, right } from '../geometry.js';
import { StratGrouper } from '../groupers/grouper.js';
import { ValidationResult } from './types.js';

const TOLERANCE = 1e-9;

/**
 * Validate the current geometry of all groupers.
 */
export function validateStratLayout(groupers: StratGrouper[]): ValidationResult {
    const errors: string[] = [];

    for (const grouper of groupers) {
        if (grouper.kind === 'default' || grouper.kind === 'percentages') {
            errors.push(...checkWidthConservation(grouper));
        }
        if (grouper.kind === 'percentages') {
            errors.push(...checkProportionality(grouper));
        }
        errors.push(...checkShareSets(grouper));
    }

    errors.push(...checkOverlaps(groupers.flatMap(g => g.visiblePanels)));

    return {
        passed: errors.length === 0,
        errors
    };
}

/**
 * Visible panels must tile the group's envelope without gaps.
 */
function checkWidthConservation(grouper: StratGrouper): string[] {
    const visible = grouper.visiblePanels;
    if (visible.length === 0) return [];

    const errors: string[] = [];
    const total = visible.reduce((acc, p) => acc + p.bounds.width, 0);
    if (!nearlyEqual(total, grouper.bounds.width, TOLERANCE)) {
        errors.push(`Group ${grouper.group}: panel widths sum to ${total}, expected ${grouper.bounds.width}`);
    }

    let x = grouper.bounds.x0;
    for (const panel of visible) {
        if (!nearlyEqual(panel.bounds.x0, x, TOLERANCE)) {
            errors.push(`Group ${grouper.group}: panel ${panel.id} starts at ${panel.bounds.x0}, expected ${x}`);
        }
        x = right(panel.bounds);
    }
    return errors;
}

function checkProportionality(grouper: StratGrouper): string[] {
    const visible = grouper.visiblePanels;
    const ranges = visible.map(p => p.xlim[1] - p.xlim[0]);
    const totalRange = ranges.reduce((acc, r) => acc + r, 0);
    const totalWidth = grouper.bounds.width;
    if (!(totalRange > 0) || !(totalWidth > 0)) return [];

    const errors: string[] = [];
    visible.forEach((panel, i) => {
        const expected = ranges[i] / totalRange;
        const actual = panel.bounds.width / totalWidth;
        if (!nearlyEqual(actual, expected, 1e-6)) {
            errors.push(`Group ${grouper.group}: panel ${panel.id} has width share ${actual}, expected ${expected}`);
        }
    });
    return errors;
}

function checkShareSets(grouper: StratGrouper): string[] {
    const errors: string[] = [];
    const anchors = new Map<string, Panel>();

    for (const panel of grouper.panels) {
        if (!panel.visible) {
            if (panel.share) errors.push(`Hidden panel ${panel.id} is still in a share set`);
            continue;
        }
        const anchor = anchors.get(panel.subgroup);
        if (!anchor) {
            anchors.set(panel.subgroup, panel);
            if (panel.share?.role !== 'anchor' || panel.share.anchor !== panel.id) {
                errors.push(`Panel ${panel.id} should anchor subgroup ${panel.subgroup}`);
            }
        } else if (panel.share?.role !== 'member' || panel.share.anchor !== anchor.id) {
            errors.push(`Panel ${panel.id} should share the scale of ${anchor.id}`);
        }
    }
    return errors;
}

function checkOverlaps(panels: Panel[]): string[] {
    const errors: string[] = [];
    const sorted = [...panels].sort((a, b) => a.bounds.x0 - b.bounds.x0);
    for (let i = 1; i < sorted.length; i++) {
        const prev = sorted[i - 1];
        const curr = sorted[i];
        if (curr.bounds.x0 < right(prev.bounds) - TOLERANCE) {
            errors.push(`Panel overlap: ${prev.id} and ${curr.id}`);
        }
    }
    return errors;
}
