/**
 * Grouper variants, keyed by their tag
 */

import { GrouperKind } from '../../types.js';
import { AllInOneGrouper } from './all-in-one.js';
import { DefaultGrouper } from './default.js';
import { GrouperInit, StratGrouper } from './grouper.js';
import { PercentageGrouper } from './percentages.js';
import { StackedGrouper } from './stacked.js';

export type GrouperFactory = (init: GrouperInit) => StratGrouper;

export const STRAT_GROUPERS: Record<GrouperKind, GrouperFactory> = {
    default: init => new DefaultGrouper(init),
    percentages: init => new PercentageGrouper(init),
    all_in_one: init => new AllInOneGrouper(init),
    stacked: init => new StackedGrouper(init)
};

export function createGrouper(kind: string, init: GrouperInit): StratGrouper {
    if (!isGrouperKind(kind)) {
        throw new Error(`Unknown grouper kind "${kind}"`);
    }
    return STRAT_GROUPERS[kind](init);
}

export function isGrouperKind(kind: string): kind is GrouperKind {
    return Object.prototype.hasOwnProperty.call(STRAT_GROUPERS, kind);
}

export { StratGrouper, roundedMax, warnPartialReorder } from './grouper.js';
export type { GrouperContext, GrouperInit, ShareSet, VariableSummary } from './grouper.js';
export { DefaultGrouper } from './default.js';
export { PercentageGrouper } from './percentages.js';
export { AllInOneGrouper } from './all-in-one.js';
export { StackedGrouper } from './stacked.js';
