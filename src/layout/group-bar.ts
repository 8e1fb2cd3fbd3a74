/**
 * Group bars
 *
 * A group bar is a bracket drawn above a set of panels plus a label on it.
 * The bracket climbs from the panels' top edge with two parallel arms at the
 * configured angle and joins them with a horizontal bar:
 *
 *        (x0+run, top+offset) ________ (x1+run, top+offset)
 *                           /        /
 *              (x0, top)   /        /  (x1, top)
 *
 * The offset is configured as a fraction of the anchor panel's height, so the
 * pixel length of the arms depends on the figure size and must be recomputed
 * whenever the figure is resized.
 */

import { Bounds, FigureSize, Point } from '../types.js';
import {
    armLength,
    armRun,
    figureDeltaToPixels,
    panelFractionToFigure,
    pixelDeltaToFigure,
    right,
    top
} from './geometry.js';

// ==================== DECORATIONS ====================

export interface LabelDecoration {
    id: string;
    kind: 'label';
    owner: string;
    text: string;
    position: Point;
    background: string;
}

export interface BracketDecoration {
    id: string;
    kind: 'bracket';
    owner: string;
    path: Point[];
    angle: number;
    arm: number;
}

export type Decoration = LabelDecoration | BracketDecoration;

/**
 * Figure-level artifacts that are not panels. The renderer draws whatever is
 * in the layer.
 */
export class DecorationLayer {
    private items = new Map<string, Decoration>();
    private counter = 0;

    nextId(kind: Decoration['kind']): string {
        this.counter += 1;
        return `${kind}-${this.counter}`;
    }

    add(decoration: Decoration): void {
        this.items.set(decoration.id, decoration);
    }

    remove(id: string): boolean {
        return this.items.delete(id);
    }

    get(id: string): Decoration | undefined {
        return this.items.get(id);
    }

    all(): Decoration[] {
        return Array.from(this.items.values());
    }

    get size(): number {
        return this.items.size;
    }

    clear(): void {
        this.items.clear();
    }
}

// ==================== GEOMETRY ====================

export interface GroupBarParams {
    /** Rectangles of the share set, anchor first */
    boxes: Bounds[];
    /** Bar offset as a fraction of the anchor panel's height */
    height: number;
    angle: number;
    label: string;
    figure: FigureSize;
}

export interface GroupBar {
    label: string;
    x0: number;
    x1: number;
    top: number;
    /** Bar offset above `top`, figure fraction */
    offset: number;
    offsetPx: number;
    angle: number;
    /** Arm length in pixels */
    arm: number;
    /** Horizontal run of an arm, figure fraction */
    run: number;
    path: Point[];
    labelPosition: Point;
}

export function computeGroupBar(params: GroupBarParams): GroupBar | null {
    const { boxes, height, angle, label, figure } = params;
    if (boxes.length === 0) return null;

    const x0 = Math.min(...boxes.map(b => b.x0));
    const x1 = Math.max(...boxes.map(right));
    const barTop = Math.max(...boxes.map(top));

    const offset = panelFractionToFigure(height, boxes[0]);
    const offsetPx = figureDeltaToPixels(offset, figure);
    const arm = armLength(offsetPx, angle);
    const run = pixelDeltaToFigure(armRun(offsetPx, angle), figure);
    const barY = barTop + offset;

    return {
        label,
        x0,
        x1,
        top: barTop,
        offset,
        offsetPx,
        angle,
        arm,
        run,
        path: [
            { x: x0, y: barTop },
            { x: x0 + run, y: barY },
            { x: x1 + run, y: barY },
            { x: x1, y: barTop }
        ],
        labelPosition: { x: (x0 + x1) / 2 + run, y: barY }
    };
}

// ==================== ANNOTATOR ====================

/**
 * Owns the label and bracket of one group bar inside a DecorationLayer.
 * Both artifacts are always removed together before a recomputation.
 */
export class GroupBarAnnotator {
    private labelId: string | null = null;
    private bracketId: string | null = null;
    private current: GroupBar | null = null;

    constructor(
        private readonly layer: DecorationLayer,
        readonly owner: string
    ) {}

    get bar(): GroupBar | null {
        return this.current;
    }

    update(params: GroupBarParams): GroupBar | null {
        this.remove();
        const bar = computeGroupBar(params);
        if (!bar) return null;

        const labelId = this.layer.nextId('label');
        const bracketId = this.layer.nextId('bracket');
        this.layer.add({
            id: labelId,
            kind: 'label',
            owner: this.owner,
            text: bar.label,
            position: bar.labelPosition,
            background: 'white'
        });
        this.layer.add({
            id: bracketId,
            kind: 'bracket',
            owner: this.owner,
            path: bar.path,
            angle: bar.angle,
            arm: bar.arm
        });

        this.labelId = labelId;
        this.bracketId = bracketId;
        this.current = bar;
        return bar;
    }

    remove(): void {
        if (this.labelId !== null) {
            this.layer.remove(this.labelId);
            this.labelId = null;
        }
        if (this.bracketId !== null) {
            this.layer.remove(this.bracketId);
            this.bracketId = null;
        }
        this.current = null;
    }
}
