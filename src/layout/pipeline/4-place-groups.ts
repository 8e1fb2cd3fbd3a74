/**
 * Step 4: Place Groups
 *
 * Constructs one grouper per plan, left to right inside the envelope.
 * - Panels get the envelope height minus the share reserved for group bars
 * - Percentage groups get their x-range floor and are reflowed if it applied
 * - Every group except the catch-all one gets group bars
 * - The first panel of the diagram owns the shared vertical axis
 *
 * Everything runs inside one registry batch, so listeners see a single change.
 */

import { NOGROUP, PanelId } from '../../types.js';
import { createGrouper } from '../groupers/index.js';
import { StratGrouper } from '../groupers/grouper.js';
import { PercentageGrouper } from '../groupers/percentages.js';
import { PlaceGroupsInput } from './types.js';

export function placeGroups(input: PlaceGroupsInput): StratGrouper[] {
    const { plans, context, envelope, config, formatoptions } = input;

    const height = envelope.height * (1 - config.truncHeight);
    const groupers: StratGrouper[] = [];

    context.registry.batch(() => {
        let x = envelope.x0;
        let axisOwner: PanelId | null = null;

        for (const plan of plans) {
            const width = plan.widthFraction * envelope.width;
            const grouper = createGrouper(plan.kind, {
                context,
                group: plan.group,
                bounds: { x0: x, y0: envelope.y0, width, height },
                variables: plan.variables,
                style: formatoptions[plan.group],
                useBars: plan.useBars,
                groupBarAngle: config.groupBarAngle,
                sharey: axisOwner
            });

            if (grouper instanceof PercentageGrouper) {
                grouper.applyMinimumRange(config.minPercentage);
            }
            if (plan.group !== NOGROUP && height > 0) {
                grouper.groupPlots(config.truncHeight / height);
            }

            axisOwner = axisOwner ?? grouper.panels[0]?.id ?? null;
            x += width;
            groupers.push(grouper);
        }
    });

    return groupers;
}
