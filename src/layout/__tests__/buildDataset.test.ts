/**
 * Step 2: normalisation, sums, exclusion and threshold
 */

import { describe, it, expect } from 'vitest';
import { loadFixture, byLetter, byTaxon } from './helpers/loadFixture.js';
import { runPipeline } from './helpers/runPipeline.js';
import { StratTable } from '../../types.js';

const twoColumns: StratTable = {
    index: [0, 1],
    columns: ['p', 'q'],
    data: { p: [1, 2], q: [3, 2] }
};

function valuesOf(built: ReturnType<typeof runPipeline>['built'], name: string): number[] {
    const variable = built.dataset.variables.get(name);
    if (!variable) throw new Error(`missing variable ${name}`);
    return variable.values;
}

describe('percentage normalisation', () => {
    it('rescales every row of a percentage group to 100', () => {
        const { built } = runPipeline(twoColumns, { percentages: ['nogroup'] });

        expect(valuesOf(built, 'p')).toEqual([25, 50]);
        expect(valuesOf(built, 'q')).toEqual([75, 50]);
    });

    it('keeps rows that already sum to 100', () => {
        const { built } = runPipeline(loadFixture('strat-basic'), {
            groupFunc: byLetter,
            percentages: ['2']
        });

        for (let row = 0; row < 3; row++) {
            const total = ['d', 'e', 'f'].reduce((acc, name) => acc + valuesOf(built, name)[row], 0);
            expect(total).toBeCloseTo(100, 9);
        }
        valuesOf(built, 'd').forEach((v, i) => expect(v).toBeCloseTo([33, 24, 28][i], 9));
        expect(valuesOf(built, 'a')).toEqual([1, 1, 1]);
    });

    it('holds zero-sum rows at 0', () => {
        const { built } = runPipeline(loadFixture('strat-counts'), {
            groupFunc: byTaxon,
            subgroups: { Pollen: ['Trees', 'Herbs'] },
            percentages: ['Pollen']
        });

        expect(valuesOf(built, 'Pinus')[2]).toBe(0);
        expect(valuesOf(built, 'Cyperaceae')[2]).toBe(0);
    });

    it('restricts the denominator to the percentage base', () => {
        const table: StratTable = {
            index: [0],
            columns: ['p', 'q', 'r'],
            data: { p: [10], q: [30], r: [60] }
        };
        const { built } = runPipeline(table, {
            percentages: ['nogroup'],
            percentageBase: ['p', 'q', 'unknown']
        });

        expect(valuesOf(built, 'p')).toEqual([25]);
        expect(valuesOf(built, 'q')).toEqual([75]);
        expect(valuesOf(built, 'r')).toEqual([150]);
    });

    it('takes every denominator from the raw values when groups share a base', () => {
        const table: StratTable = {
            index: [0],
            columns: ['x', 'y'],
            data: { x: [10], y: [10] }
        };
        const { built } = runPipeline(table, {
            groupFunc: name => (name === 'x' ? 'A' : 'B'),
            percentages: ['A', 'B'],
            percentageBase: ['A', 'B']
        });

        expect(valuesOf(built, 'x')).toEqual([50]);
        expect(valuesOf(built, 'y')).toEqual([50]);
    });

    it('leaves values alone without calculatePercentages', () => {
        const { built } = runPipeline(twoColumns, {
            percentages: ['nogroup'],
            calculatePercentages: false
        });
        expect(valuesOf(built, 'p')).toEqual([1, 2]);
    });

    it('ignores unknown percentage groups', () => {
        const { built } = runPipeline(twoColumns, { percentages: ['missing'] });
        expect(valuesOf(built, 'p')).toEqual([1, 2]);
    });
});

describe('threshold', () => {
    it('drops percentage columns that never exceed it', () => {
        const { built } = runPipeline(loadFixture('strat-counts'), {
            groupFunc: byTaxon,
            subgroups: { Pollen: ['Trees', 'Herbs'] },
            percentages: ['Pollen']
        });

        expect(built.dropped).toEqual(['Quercus']);
        expect(built.plotVariables.has('Pinus')).toBe(true);
        expect(built.plotVariables.has('Charcoal')).toBe(true);
        expect(built.dataset.variables.has('Quercus')).toBe(true);
    });

    it('keeps them with a lower threshold', () => {
        const { built } = runPipeline(loadFixture('strat-counts'), {
            groupFunc: byTaxon,
            subgroups: { Pollen: ['Trees', 'Herbs'] },
            percentages: ['Pollen'],
            threshold: 0.001
        });
        expect(built.dropped).toEqual([]);
    });

    it('does not apply to other groups', () => {
        const { built } = runPipeline(twoColumns, { threshold: 1000 });
        expect(built.dropped).toEqual([]);
    });
});

describe('exclusion', () => {
    it('drops named columns and whole groups', () => {
        const { built } = runPipeline(loadFixture('strat-basic'), {
            groupFunc: byLetter,
            exclude: ['b', '2', 'nothing']
        });

        expect(Array.from(built.plotVariables)).toEqual(['a', 'c']);
        expect(built.dropped).toEqual(['b', 'd', 'e', 'f']);
    });
});

describe('summed variables', () => {
    it('sums every group into the Summed group', () => {
        const { built } = runPipeline(loadFixture('strat-basic'), {
            groupFunc: byLetter,
            summed: true
        });

        expect(built.dataset.groups.get('Summed')).toEqual(['1', '2']);
        expect(valuesOf(built, '1')).toEqual([4, 5, 5]);
        expect(valuesOf(built, '2')).toEqual([100, 100, 100]);

        const attrs = built.dataset.variables.get('1')?.attrs;
        expect(attrs).toEqual({ group: 'Summed', subgroup: 'Summed', longName: 'Sum of 1' });
        expect(built.plotVariables.has('2')).toBe(true);
    });

    it('renames a sum that collides with a column', () => {
        const table: StratTable = {
            index: [0, 1],
            columns: ['x', 'y'],
            data: { x: [1, 2], y: [3, 4] }
        };
        const { built } = runPipeline(table, { groupFunc: () => 'x', summed: ['x'] });

        expect(built.dataset.groups.get('Summed')).toEqual(['x_sum']);
        expect(valuesOf(built, 'x_sum')).toEqual([4, 6]);
        expect(valuesOf(built, 'x')).toEqual([1, 2]);
    });

    it('keeps an existing column that already carries the renamed sum', () => {
        const table: StratTable = {
            index: [0],
            columns: ['g', 'g_sum', 'z'],
            data: { g: [1], g_sum: [7], z: [2] }
        };
        const { built } = runPipeline(table, {
            groupFunc: name => (name === 'z' ? 'g' : 'other'),
            summed: ['g']
        });

        expect(valuesOf(built, 'g_sum')).toEqual([7]);
        expect(built.dataset.variables.get('g_sum')?.attrs.group).toBe('other');
        expect(valuesOf(built, 'g_sum_2')).toEqual([2]);
        expect(built.dataset.groups.get('Summed')).toEqual(['g_sum_2']);
        expect(built.dataset.groups.get('other')).toEqual(['g', 'g_sum']);
    });

    it('ignores unknown groups', () => {
        const { built } = runPipeline(twoColumns, { summed: ['missing'] });
        expect(built.dataset.groups.has('Summed')).toBe(false);
    });
});
