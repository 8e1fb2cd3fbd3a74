/**
 * Layout Pipeline - Main Orchestrator
 *
 * Combines the pipeline steps into a single stratigraphic layout.
 *
 * Pipeline:
 * 1. classifyColumns()  → ColumnClassification
 * 2. buildDataset()     → BuiltDataset
 * 3. resolveGroups()    → GroupPlan[]
 * 4. placeGroups()      → StratGrouper[]
 * 5. emitStratResult()  → Panel[]
 */

// Re-export types
export * from './types.js';

// Re-export individual steps
export { classifyColumns, invertSubgroups, catchAll } from './1-classify-columns.js';
export { buildDataset, normalizeRows, resolvePercentageBase, rowTotals } from './2-build-dataset.js';
export { resolveGroups, resolveKind } from './3-resolve-groups.js';
export { placeGroups } from './4-place-groups.js';
export { emitStratResult } from './5-emit-result.js';
export { validateStratLayout } from './validation.js';

import { Bounds, StratConfig, SubplotParams, resolveConfig } from '../../types.js';
import { validateTable } from '../../data/table.js';
import { boundsFromExtents } from '../geometry.js';
import { GrouperContext } from '../groupers/grouper.js';
import { PipelineInput, PipelineResult, StratOptions } from './types.js';

import { classifyColumns, catchAll } from './1-classify-columns.js';
import { buildDataset } from './2-build-dataset.js';
import { resolveGroups } from './3-resolve-groups.js';
import { placeGroups } from './4-place-groups.js';
import { emitStratResult } from './5-emit-result.js';
import { validateStratLayout } from './validation.js';

/**
 * Run the complete layout pipeline. Panels and decorations are created in
 * the registry and layer of `input.context`; listeners of the registry are
 * notified once, after the last step.
 */
export function runStratPipeline(input: PipelineInput): PipelineResult {
    const { table, options } = input;
    validateTable(table);

    const config = effectiveConfig(options.config, options);
    const indexName = table.indexName ?? config.indexLabel;
    const percentages = options.percentages ?? [];

    // Step 1: Classify columns
    const classification = classifyColumns({
        table,
        groupFunc: options.groupFunc ?? catchAll,
        subgroups: options.subgroups ?? {}
    });

    // Step 2: Build dataset
    const built = buildDataset({
        table,
        classification,
        indexName,
        percentages,
        calculatePercentages: options.calculatePercentages ?? true,
        percentageBase: options.percentageBase ?? [],
        exclude: options.exclude ?? [],
        threshold: config.threshold,
        summed: options.summed ?? false
    });

    // Step 3: Resolve variants and widths
    const plans = resolveGroups({
        built,
        percentages,
        allInOne: options.allInOne ?? [],
        stacked: options.stacked ?? [],
        widths: options.widths ?? {},
        useBars: options.useBars ?? false
    });

    const envelope = options.bounds ?? subplotEnvelope(config.subplot);
    const context: GrouperContext = { ...input.context, dataset: built.dataset };

    // Steps 4-5 in one batch
    const groupers = context.registry.batch(() => {
        const groupers = placeGroups({
            plans,
            context,
            envelope,
            config,
            formatoptions: options.formatoptions ?? {}
        });
        emitStratResult({ groupers, envelope, config, indexName });
        return groupers;
    });

    const validation = validateStratLayout(groupers);

    return {
        groupers,
        dataset: built.dataset,
        diagnostics: {
            totalColumns: table.columns.length,
            plottedVariables: built.plotVariables.size,
            droppedVariables: built.dropped,
            totalGroups: groupers.length,
            validationPassed: validation.passed,
            errors: validation.errors
        }
    };
}

/** Top-level options win over the same settings in `config` */
function effectiveConfig(
    overrides: Partial<StratConfig> | undefined,
    options: StratOptions
): StratConfig {
    const config = resolveConfig(overrides);
    return {
        ...config,
        threshold: options.threshold ?? config.threshold,
        minPercentage: options.minPercentage ?? config.minPercentage,
        truncHeight: options.truncHeight ?? config.truncHeight
    };
}

export function subplotEnvelope(subplot: SubplotParams): Bounds {
    return boundsFromExtents(subplot.left, subplot.bottom, subplot.right, subplot.top);
}
