/**
 * Layout Pipeline - Main Orchestrator
 *
 * Combines all 6 pipeline steps into a single layout computation.
 *
 * Pipeline:
 * 1. groupRecords()     → GroupedModel
 * 2. planRows()         → RowPlannedModel
 * 3. planPage()         → PagePlan
 * 4. placeSections()    → PlacedModel
 * 5. composeSections()  → ComposedModel
 * 6. assembleScene()    → Scene
 */

// Re-export types
export * from './types.js';
export * from './debug-types.js';

// Re-export individual steps
export { groupRecords, orderSections } from './1-group-records.js';
export {
    planRows,
    countRows,
    countRegularRows,
    countOffsetRows,
    offsetRowBoundaries
} from './2-plan-rows.js';
export { planPage, planMerge } from './3-plan-page.js';
export {
    placeSections,
    placeSection,
    placeCards,
    advanceCardPointer,
    headLabel,
    headLabelPosition,
    type CardPointer
} from './4-place-sections.js';
export {
    composeSections,
    composeCard,
    cardGeometry,
    resolveCardStyle,
    initials,
    type CardGeometry
} from './5-compose-cards.js';
export { assembleScene } from './6-assemble-scene.js';
export { validateLayout, rectanglesOverlap } from './validation.js';

import { GridConfig, RecordFields } from '../../types.js';
import {
    LayoutDiagnostics,
    LayoutEngine,
    LayoutResult,
    PipelineInput,
    PlacedModel
} from './types.js';
import {
    DEBUG_STEP_NAMES,
    DebugOptions,
    DebugPipelineResult,
    DebugSnapshot,
    DebugStep
} from './debug-types.js';

import { groupRecords } from './1-group-records.js';
import { planRows } from './2-plan-rows.js';
import { planPage } from './3-plan-page.js';
import { placeSections } from './4-place-sections.js';
import { composeSections } from './5-compose-cards.js';
import { assembleScene } from './6-assemble-scene.js';
import { validateLayout } from './validation.js';

/**
 * Run the complete layout pipeline.
 *
 * Throws a CardGridError on invalid input; never returns a partial scene.
 */
export function runCardGridPipeline<T>(input: PipelineInput<T>): LayoutResult<T> {
    const { records, fields, config } = input;

    // Step 1: Group records
    const grouped = groupRecords({
        records,
        fields,
        order: config.sectionOrder,
        direction: config.sectionOrderDirection
    });

    // Step 2: Plan rows
    const planned = planRows({
        grouped,
        elementsPerRow: config.elementsPerRow,
        flowMode: config.flowMode
    });

    // Step 3: Plan page (merge validation happens here)
    const page = planPage({ planned, config });

    // Step 4: Place sections
    const placed = placeSections({ page, config });

    // Step 5: Compose cards
    const composed = composeSections({ placed, fields, config });

    // Step 6: Assemble scene
    const scene = assembleScene({ composed, config });

    const validation = validateLayout(placed);

    return {
        scene,
        placed,
        diagnostics: buildDiagnostics(placed, composed.placeholderCount, validation.passed, validation.errors)
    };
}

function buildDiagnostics<T>(
    placed: PlacedModel<T>,
    placeholderImages: number,
    validationPassed: boolean,
    errors: string[]
): LayoutDiagnostics {
    const { page } = placed;
    return {
        totalRecords: page.planned.grouped.elements.length,
        totalSections: page.planned.sections.length,
        totalRows: page.totalRows,
        headCount: page.headCount,
        mergedSections: page.merge?.sections ?? [],
        placeholderImages,
        validationPassed,
        errors
    };
}

/**
 * Run the layout pipeline with debug snapshots at each step.
 * Stops at the specified target step.
 */
export function runCardGridPipelineWithDebug<T>(
    input: PipelineInput<T>,
    debugOptions: DebugOptions
): DebugPipelineResult<T> {
    const { records, fields, config } = input;
    const { step: targetStep } = debugOptions;
    const snapshots: DebugSnapshot<T>[] = [];

    // Helper to create a snapshot
    const createSnapshot = (step: DebugStep, state: Partial<DebugSnapshot<T>>): DebugSnapshot<T> => ({
        step,
        stepName: DEBUG_STEP_NAMES[step],
        grouped: state.grouped ?? null,
        planned: state.planned ?? null,
        page: state.page ?? null,
        placed: state.placed ?? null,
        composed: state.composed ?? null,
        scene: state.scene ?? null,
        validation: state.placed ? validateLayout(state.placed) : null
    });

    const grouped = groupRecords({
        records,
        fields,
        order: config.sectionOrder,
        direction: config.sectionOrderDirection
    });
    snapshots.push(createSnapshot(1, { grouped }));
    if (targetStep === 1) return { snapshots, scene: null };

    const planned = planRows({
        grouped,
        elementsPerRow: config.elementsPerRow,
        flowMode: config.flowMode
    });
    snapshots.push(createSnapshot(2, { grouped, planned }));
    if (targetStep === 2) return { snapshots, scene: null };

    const page = planPage({ planned, config });
    snapshots.push(createSnapshot(3, { grouped, planned, page }));
    if (targetStep === 3) return { snapshots, scene: null };

    const placed = placeSections({ page, config });
    snapshots.push(createSnapshot(4, { grouped, planned, page, placed }));
    if (targetStep === 4) return { snapshots, scene: null };

    const composed = composeSections({ placed, fields, config });
    snapshots.push(createSnapshot(5, { grouped, planned, page, placed, composed }));
    if (targetStep === 5) return { snapshots, scene: null };

    const scene = assembleScene({ composed, config });
    snapshots.push(createSnapshot(6, { grouped, planned, page, placed, composed, scene }));

    return { snapshots, scene };
}

/**
 * CardGridLayoutEngine - binds a resolved configuration for repeated layouts.
 */
export class CardGridLayoutEngine implements LayoutEngine {
    constructor(private readonly config: GridConfig) {}

    layout<T>(records: readonly T[], fields: RecordFields<T>): LayoutResult<T> {
        return runCardGridPipeline({ records, fields, config: this.config });
    }
}
