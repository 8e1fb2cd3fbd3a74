/**
 * Group bar geometry and decoration bookkeeping
 */

import { describe, it, expect } from 'vitest';
import { DecorationLayer, GroupBarAnnotator, GroupBarParams, computeGroupBar } from '../group-bar.js';

const FIGURE = { widthPx: 640, heightPx: 480 };

function params(overrides: Partial<GroupBarParams> = {}): GroupBarParams {
    return {
        boxes: [
            { x0: 0.1, y0: 0.1, width: 0.2, height: 0.5 },
            { x0: 0.3, y0: 0.1, width: 0.3, height: 0.5 }
        ],
        height: 0.2,
        angle: 90,
        label: 'Trees',
        figure: FIGURE,
        ...overrides
    };
}

describe('computeGroupBar', () => {
    it('spans the boxes with a vertical connector at 90 degrees', () => {
        const bar = computeGroupBar(params());
        expect(bar).not.toBeNull();
        if (!bar) return;

        expect(bar.x0).toBe(0.1);
        expect(bar.x1).toBeCloseTo(0.6, 12);
        expect(bar.top).toBeCloseTo(0.6, 12);
        expect(bar.offset).toBeCloseTo(0.1, 12);
        expect(bar.offsetPx).toBeCloseTo(48, 9);
        expect(bar.arm).toBeCloseTo(48, 9);
        expect(bar.run).toBe(0);

        const ys = bar.path.map(p => p.y);
        expect(ys[0]).toBeCloseTo(0.6, 12);
        expect(ys[1]).toBeCloseTo(0.7, 12);
        expect(ys[2]).toBeCloseTo(0.7, 12);
        expect(ys[3]).toBeCloseTo(0.6, 12);
        expect(bar.labelPosition.x).toBeCloseTo(0.35, 12);
        expect(bar.labelPosition.y).toBeCloseTo(0.7, 12);
    });

    it('shifts the bar right by the arm run at 45 degrees', () => {
        const bar = computeGroupBar(params({ angle: 45 }));
        if (!bar) throw new Error('expected a bar');

        expect(bar.arm).toBeCloseTo(67.882251, 5);
        expect(bar.run).toBeCloseTo(0.075, 9);
        expect(bar.path[1].x).toBeCloseTo(0.175, 9);
        expect(bar.path[2].x).toBeCloseTo(0.675, 9);
        expect(bar.labelPosition.x).toBeCloseTo(0.425, 9);
    });

    it('measures the offset on the first box but tops out on the highest', () => {
        const bar = computeGroupBar(
            params({
                boxes: [
                    { x0: 0.1, y0: 0.1, width: 0.2, height: 0.5 },
                    { x0: 0.3, y0: 0.1, width: 0.2, height: 0.6 }
                ]
            })
        );
        if (!bar) throw new Error('expected a bar');

        expect(bar.top).toBeCloseTo(0.7, 12);
        expect(bar.offset).toBeCloseTo(0.1, 12);
    });

    it('returns null without boxes', () => {
        expect(computeGroupBar(params({ boxes: [] }))).toBeNull();
    });
});

describe('GroupBarAnnotator', () => {
    it('keeps exactly one label and one bracket across updates', () => {
        const layer = new DecorationLayer();
        const annotator = new GroupBarAnnotator(layer, 'Pollen/Trees');

        annotator.update(params());
        annotator.update(params({ angle: 45 }));
        annotator.update(params({ label: 'Shrubs' }));

        expect(layer.size).toBe(2);
        const kinds = layer.all().map(d => d.kind).sort();
        expect(kinds).toEqual(['bracket', 'label']);

        const label = layer.all().find(d => d.kind === 'label');
        expect(label?.kind === 'label' && label.text).toBe('Shrubs');
        expect(label?.kind === 'label' && label.background).toBe('white');
        expect(layer.all().every(d => d.owner === 'Pollen/Trees')).toBe(true);
    });

    it('removes both artifacts together', () => {
        const layer = new DecorationLayer();
        const annotator = new GroupBarAnnotator(layer, 'g');
        annotator.update(params());
        annotator.remove();

        expect(layer.size).toBe(0);
        expect(annotator.bar).toBeNull();
    });

    it('leaves nothing behind for an empty share set', () => {
        const layer = new DecorationLayer();
        const annotator = new GroupBarAnnotator(layer, 'g');
        annotator.update(params());
        expect(annotator.update(params({ boxes: [] }))).toBeNull();
        expect(layer.size).toBe(0);
    });
});
