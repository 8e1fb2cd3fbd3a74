/**
 * Step 5: Emit Result
 *
 * Final touches on the placed panels:
 * - The shared vertical axis is inverted (index grows downwards)
 * - The first panel shows the y tick labels and the index name
 * - Panel edges that are not on the outer edge of the diagram get a divider
 */

import { Panel } from '../../types.js';
import { nearlyEqual, right } from '../geometry.js';
import { EmitInput } from './types.js';

/**
 * Apply the diagram-wide styles and return the flat panel list in plotting
 * order.
 */
export function emitStratResult(input: EmitInput): Panel[] {
    const { groupers, envelope, config, indexName } = input;
    const panels = groupers.flatMap(g => g.panels);
    if (panels.length === 0) return panels;

    const x0 = envelope.x0;
    const x1 = right(envelope);

    for (const panel of panels) {
        panel.yInverted = true;

        const edges = { ...panel.style.axisLineStyle };
        if (!nearlyEqual(panel.bounds.x0, x0)) edges.left = config.dividerStyle;
        if (!nearlyEqual(right(panel.bounds), x1)) edges.right = config.dividerStyle;
        panel.style.axisLineStyle = edges;
    }

    const first = panels[0];
    first.style.yticksVisible = true;
    first.style.ylabel = indexName;

    return panels;
}
