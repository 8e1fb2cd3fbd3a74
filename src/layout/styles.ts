/**
 * Per-variant default styles
 *
 * A fresh style struct is built for every grouper and merged with the
 * caller's per-group overrides; the caller's value wins.
 */

import { GrouperKind, PanelStyle, PlotKind } from '../types.js';

const PERCENTAGE_TICKS = [10, 30, 50, 70, 90];

function baseStyle(groupBarAngle: number): PanelStyle {
    return {
        plot: 'line',
        xlim: null,
        xticks: null,
        yticksVisible: false,
        ylabel: null,
        title: '%(name)s',
        titleWrap: 15,
        legend: false,
        axisLineStyle: {},
        grouper: null,
        groupBarAngle
    };
}

/** Plot kind a variant uses for one visible series */
export function defaultPlotKind(kind: GrouperKind, useBars: boolean): PlotKind {
    if (kind === 'stacked') return 'stacked';
    if (useBars) return 'bar';
    return kind === 'percentages' ? 'area' : 'line';
}

export function defaultStyle(kind: GrouperKind, useBars: boolean, groupBarAngle: number): PanelStyle {
    const style = baseStyle(groupBarAngle);
    style.plot = defaultPlotKind(kind, useBars);

    switch (kind) {
        case 'default':
            break;
        case 'percentages':
            style.xlim = [0, 'rounded'];
            style.xticks = [...PERCENTAGE_TICKS];
            break;
        case 'all_in_one':
        case 'stacked':
            style.title = '%(group)s';
            style.legend = true;
            break;
    }
    return style;
}

export function mergeStyle(defaults: PanelStyle, overrides: Partial<PanelStyle> = {}): PanelStyle {
    return {
        ...defaults,
        ...overrides,
        axisLineStyle: { ...defaults.axisLineStyle, ...overrides.axisLineStyle }
    };
}

// ==================== LABELS ====================

/**
 * Substitute `%(key)s` placeholders. Unknown keys are left untouched.
 */
export function formatLabel(template: string, attrs: Record<string, string | undefined>): string {
    return template.replace(/%\((\w+)\)s/g, (match, key: string) => attrs[key] ?? match);
}

/**
 * Greedy word wrap after `width` characters; 0 disables wrapping.
 */
export function wrapText(text: string, width: number): string {
    if (width <= 0) return text;

    const lines: string[] = [];
    let current = '';
    for (const word of text.split(/\s+/).filter(w => w.length > 0)) {
        if (current.length === 0) {
            current = word;
        } else if (current.length + 1 + word.length <= width) {
            current += ` ${word}`;
        } else {
            lines.push(current);
            current = word;
        }
    }
    if (current.length > 0) lines.push(current);
    return lines.join('\n');
}
