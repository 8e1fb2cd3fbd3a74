/**
 * Tree view model: rows, visibility toggles and moves
 */

import { describe, it, expect } from 'vitest';
import { loadFixture, byLetter, byTaxon } from '../layout/__tests__/helpers/loadFixture.js';
import { stratplot } from '../layout/diagram.js';
import { StratTreeModel } from '../tree-view.js';

function setup() {
    const diagram = stratplot(loadFixture('strat-basic'), {
        groupFunc: byLetter,
        widths: { '1': 0.5, '2': 0.5 }
    });
    return { diagram, model: new StratTreeModel(diagram.groupers) };
}

describe('StratTreeModel', () => {
    it('lists one node per group with formatted statistics', () => {
        const { model } = setup();
        const [one] = model.nodes();

        expect(model.nodes().map(n => n.group)).toEqual(['1', '2']);
        expect(one.kind).toBe('default');
        expect(one.rows.map(r => r.name)).toEqual(['a', 'b', 'c']);
        expect(one.rows[1]).toEqual({
            name: 'b',
            visible: true,
            canMoveUp: true,
            canMoveDown: true,
            mean: '1.333',
            min: '1.000',
            max: '2.000'
        });
        expect(one.rows[0].canMoveUp).toBe(false);
        expect(one.rows[2].canMoveDown).toBe(false);
    });

    it('shows the subgroup when it differs from the group', () => {
        const diagram = stratplot(loadFixture('strat-counts'), {
            groupFunc: byTaxon,
            subgroups: { Pollen: ['Trees', 'Herbs'] },
            percentages: ['Pollen'],
            widths: { Pollen: 0.7, Charcoal: 0.3 }
        });
        const model = new StratTreeModel(diagram.groupers);

        expect(model.node('Pollen')?.rows.map(r => r.subgroup)).toEqual(['Trees', 'Trees', 'Herbs', 'Herbs']);
        expect(model.node('Charcoal')?.rows[0].subgroup).toBeUndefined();
    });

    it('forwards checkbox toggles to the grouper', () => {
        const { diagram, model } = setup();

        expect(model.setVisible('1', 'b', false)).toBe(true);
        expect(diagram.grouper('1')?.isVisible('b')).toBe(false);
        expect(model.node('1')?.rows[1].visible).toBe(false);

        model.setVisible('1', 'b', true);
        expect(diagram.grouper('1')?.isVisible('b')).toBe(true);
        expect(model.setVisible('missing', 'b', false)).toBe(false);
    });

    it('moves a selected row up', () => {
        const { diagram, model } = setup();

        expect(model.moveSelected('1', ['c'], 'up')).toBe(true);
        expect(diagram.grouper('1')?.members).toEqual(['a', 'c', 'b']);
    });

    it('moves adjacent rows down together', () => {
        const { diagram, model } = setup();

        expect(model.moveSelected('1', ['a', 'b'], 'down')).toBe(true);
        expect(diagram.grouper('1')?.members).toEqual(['c', 'a', 'b']);
    });

    it('rejects a move blocked at the end', () => {
        const { diagram, model } = setup();

        expect(model.moveSelected('1', ['a', 'b'], 'up')).toBe(false);
        expect(model.moveSelected('1', ['c'], 'down')).toBe(false);
        expect(model.moveSelected('1', ['zzz'], 'down')).toBe(false);
        expect(diagram.grouper('1')?.members).toEqual(['a', 'b', 'c']);
    });

    it('keeps a hidden row hidden when it moves', () => {
        const { diagram, model } = setup();
        model.setVisible('1', 'b', false);
        model.moveSelected('1', ['b'], 'up');

        const grouper = diagram.grouper('1');
        expect(grouper?.members).toEqual(['b', 'a', 'c']);
        expect(grouper?.isVisible('b')).toBe(false);
        expect(diagram.validate().passed).toBe(true);
    });
});
