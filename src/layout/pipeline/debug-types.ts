/**
 * Debug Types for Layout Pipeline
 *
 * Type definitions for the debug mode that stops the pipeline after a
 * chosen step and exposes every intermediate model.
 */

import { Scene } from '../../scene.js';
import {
    ComposedModel,
    GroupedModel,
    PagePlan,
    PlacedModel,
    RowPlannedModel,
    ValidationResult
} from './types.js';

// ==================== DEBUG OPTIONS ====================

/** Valid debug steps (1-6) */
export type DebugStep = 1 | 2 | 3 | 4 | 5 | 6;

export interface DebugOptions {
    step: DebugStep;
}

/** Step names for display */
export const DEBUG_STEP_NAMES: Record<DebugStep, string> = {
    1: 'Group Records',
    2: 'Plan Rows',
    3: 'Plan Page',
    4: 'Place Sections',
    5: 'Compose Cards',
    6: 'Assemble Scene'
};

// ==================== DEBUG SNAPSHOT ====================

/**
 * State of the pipeline after one step. Models of later steps are null.
 */
export interface DebugSnapshot<T> {
    step: DebugStep;
    stepName: string;
    grouped: GroupedModel<T> | null;
    planned: RowPlannedModel<T> | null;
    page: PagePlan<T> | null;
    placed: PlacedModel<T> | null;
    composed: ComposedModel<T> | null;
    scene: Scene | null;
    validation: ValidationResult | null;  // From step 4 on
}

export interface DebugPipelineResult<T> {
    snapshots: DebugSnapshot<T>[];
    scene: Scene | null;                  // Only when the target step is 6
}
