/**
 * Geometry helpers
 *
 * Conversions between figure-fraction and pixel coordinates, plus the
 * trigonometry used to place group-bar brackets.
 * Figure fractions have their origin at the bottom-left corner.
 */

import { Bounds, FigureSize, Point } from '../types.js';

const EPSILON = 1e-9;

export function nearlyEqual(a: number, b: number, eps = EPSILON): boolean {
    return Math.abs(a - b) <= eps;
}

export function right(bounds: Bounds): number {
    return bounds.x0 + bounds.width;
}

export function top(bounds: Bounds): number {
    return bounds.y0 + bounds.height;
}

export function boundsFromExtents(x0: number, y0: number, x1: number, y1: number): Bounds {
    return { x0, y0, width: x1 - x0, height: y1 - y0 };
}

export function assertFigureSize(figure: FigureSize): void {
    if (!(figure.widthPx > 0) || !(figure.heightPx > 0)) {
        throw new Error(`Invalid figure size: ${figure.widthPx}x${figure.heightPx}px`);
    }
}

// ==================== TRANSFORMS ====================

export function figureToPixels(point: Point, figure: FigureSize): Point {
    return { x: point.x * figure.widthPx, y: point.y * figure.heightPx };
}

export function pixelsToFigure(point: Point, figure: FigureSize): Point {
    return { x: point.x / figure.widthPx, y: point.y / figure.heightPx };
}

/** Vertical figure-fraction delta -> pixels */
export function figureDeltaToPixels(dy: number, figure: FigureSize): number {
    const from = figureToPixels({ x: 0, y: 0 }, figure);
    const to = figureToPixels({ x: 0, y: dy }, figure);
    return to.y - from.y;
}

/** Horizontal pixel delta -> figure fraction */
export function pixelDeltaToFigure(dx: number, figure: FigureSize): number {
    return pixelsToFigure({ x: dx, y: 0 }, figure).x;
}

/**
 * A fraction of a panel's own height, expressed in figure-fraction units.
 * Panels of different heights map the same local fraction to different
 * figure distances.
 */
export function panelFractionToFigure(fraction: number, bounds: Bounds): number {
    return fraction * bounds.height;
}

// ==================== ANGLES ====================

export function toRadians(degrees: number): number {
    return degrees * Math.PI / 180;
}

/** Length of a bracket arm that climbs `offsetPx` at the given angle */
export function armLength(offsetPx: number, angle: number): number {
    return offsetPx / Math.sin(toRadians(angle));
}

/** Horizontal run of that arm; a vertical arm has none */
export function armRun(offsetPx: number, angle: number): number {
    if (nearlyEqual(angle % 180, 90)) return 0;
    return offsetPx / Math.tan(toRadians(angle));
}
