/**
 * Default styles and label formatting
 */

import { describe, it, expect } from 'vitest';
import { defaultPlotKind, defaultStyle, formatLabel, mergeStyle, wrapText } from '../styles.js';
import { roundedMax } from '../groupers/grouper.js';

describe('defaultStyle', () => {
    it('gives percentage panels a rounded 0-based range', () => {
        const style = defaultStyle('percentages', false, 45);
        expect(style.plot).toBe('area');
        expect(style.xlim).toEqual([0, 'rounded']);
        expect(style.xticks).toEqual([10, 30, 50, 70, 90]);
    });

    it('titles combined panels with the group and shows a legend', () => {
        const style = defaultStyle('all_in_one', false, 45);
        expect(style.title).toBe('%(group)s');
        expect(style.legend).toBe(true);
    });

    it('switches to bars, except for stacks', () => {
        expect(defaultPlotKind('default', true)).toBe('bar');
        expect(defaultPlotKind('percentages', true)).toBe('bar');
        expect(defaultPlotKind('stacked', true)).toBe('stacked');
        expect(defaultPlotKind('default', false)).toBe('line');
    });

    it('builds a fresh struct per call', () => {
        const first = defaultStyle('percentages', false, 45);
        first.xticks?.push(100);
        expect(defaultStyle('percentages', false, 45).xticks).toEqual([10, 30, 50, 70, 90]);
    });
});

describe('mergeStyle', () => {
    it('lets the caller win and merges axis line styles', () => {
        const defaults = defaultStyle('default', false, 45);
        defaults.axisLineStyle = { left: 'dotted' };
        const merged = mergeStyle(defaults, { title: 'Depth', axisLineStyle: { right: 'dashed' } });

        expect(merged.title).toBe('Depth');
        expect(merged.plot).toBe('line');
        expect(merged.axisLineStyle).toEqual({ left: 'dotted', right: 'dashed' });
    });
});

describe('labels', () => {
    it('fills known placeholders only', () => {
        expect(formatLabel('%(group)s / %(name)s', { group: 'Trees' })).toBe('Trees / %(name)s');
    });

    it('wraps titles greedily', () => {
        expect(wrapText('Sum of Trees and Shrubs', 10)).toBe('Sum of\nTrees and\nShrubs');
        expect(wrapText('Sum of Trees', 0)).toBe('Sum of Trees');
    });

    it('rounds range maxima up to nice values', () => {
        expect(roundedMax(33)).toBe(35);
        expect(roundedMax(69)).toBe(70);
        expect(roundedMax(42)).toBe(45);
        expect(roundedMax(0)).toBe(0);
    });
});
