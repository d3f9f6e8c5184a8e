/**
 * Layout Pipeline Types
 * Complete type definitions for the 6-step card grid pipeline.
 */

import {
    Box,
    FlowMode,
    FontStyle,
    GridConfig,
    HeadOrientation,
    ImageRef,
    Position,
    RecordFields,
    Rect,
    SectionName,
    SectionOrderPolicy,
    Size,
    SortDirection,
    TextAnchor,
    TitlePosition
} from '../../types.js';
import { GroupNode, Scene } from '../../scene.js';

// ==================== STEP 1: GROUP RECORDS ====================

/**
 * Input for groupRecords step.
 */
export interface GroupRecordsInput<T> {
    records: readonly T[];
    fields: Pick<RecordFields<T>, 'sectionKey' | 'rowIndex'>;
    order: SectionOrderPolicy;
    direction: SortDirection;
}

/**
 * Per-section subtotal before row planning.
 */
export interface SectionSummary {
    name: SectionName;
    elementCount: number;
    firstIndex: number;          // Lowest row index in the section (tie-break)
}

/**
 * OrderedElement - one record attached to its section.
 */
export interface OrderedElement<T> {
    record: T;
    section: SectionName;
    sourceIndex: number;         // Original row index (secondary sort key)
    indexInSection: number;      // 0-based position inside the section
}

/**
 * GroupedModel - sections in display order, elements sorted by
 * (section order, source index).
 */
export interface GroupedModel<T> {
    sections: readonly SectionSummary[];
    elements: readonly OrderedElement<T>[];
    elementsBySection: ReadonlyMap<SectionName, readonly OrderedElement<T>[]>;
}

// ==================== STEP 2: PLAN ROWS ====================

/**
 * Input for planRows step.
 */
export interface PlanRowsInput<T> {
    grouped: GroupedModel<T>;
    elementsPerRow: number;
    flowMode: FlowMode;
}

/**
 * Section - summary with its planned row count.
 */
export interface Section extends SectionSummary {
    rowCount: number;
    rowBoundaries: readonly number[] | null;  // Cumulative element count per row ('offset' only)
}

export interface RowPlannedModel<T> {
    grouped: GroupedModel<T>;
    sections: readonly Section[];
    elementsPerRow: number;
    flowMode: FlowMode;
}

// ==================== STEP 3: PLAN PAGE ====================

/**
 * Input for planPage step.
 */
export interface PlanPageInput<T> {
    planned: RowPlannedModel<T>;
    config: GridConfig;
}

/**
 * MergePlan - validated merge set and its effect on the row total.
 */
export interface MergePlan {
    sections: readonly SectionName[];
    elementCount: number;
    rowsBefore: number;          // Sum of the merged sections' own row counts
    rowsAfter: number;           // Rows of the shared row block
}

/**
 * PagePlan - page-level dimensions derived from the planned sections.
 */
export interface PagePlan<T> {
    planned: RowPlannedModel<T>;
    orientation: HeadOrientation;
    totalRows: number;
    headCount: number;
    headSize: number;
    cardWidth: number;
    cardHeight: number;
    margin: Box;
    drawingArea: Size;           // Inner area, origin after margins
    page: Size;
    merge: MergePlan | null;
}

// ==================== STEP 4: PLACE SECTIONS ====================

/**
 * Input for placeSections step.
 */
export interface PlaceSectionsInput<T> {
    page: PagePlan<T>;
    config: GridConfig;
}

/** Next free position in drawing-area coordinates */
export type Cursor = Position;

export interface HeadLabel {
    text: string;
    x: number;
    y: number;
    color: string;
}

/**
 * CardSlot - rectangle reserved for one record.
 */
export interface CardSlot<T> {
    element: OrderedElement<T>;
    rect: Rect;
    row: number;                 // 0-based row within the section body
}

export interface PlacedSection<T> {
    section: Section;
    head: Rect;
    label: HeadLabel;
    body: Rect;
    cards: readonly CardSlot<T>[];
    merged: boolean;             // Shares its row with the next merged section
}

/**
 * PlacedModel - exact geometry for every head, body and card.
 */
export interface PlacedModel<T> {
    page: PagePlan<T>;
    sections: readonly PlacedSection<T>[];
}

// ==================== STEP 5: COMPOSE SECTIONS ====================

/**
 * Input for composeSections step.
 */
export interface ComposeInput<T> {
    placed: PlacedModel<T>;
    fields: RecordFields<T>;
    config: GridConfig;
}

/** Field values shown on one card */
export interface CardFields {
    title: string;
    subtitle: string;
    image: ImageRef | null;
}

export interface ResolvedTextStyle {
    size: number;
    weight: number;
    style: FontStyle;
    color: string;
}

/**
 * CardStyle - card styling with every colour resolved for one section.
 */
export interface CardStyle {
    fontFamily: string;
    titlePosition: TitlePosition;
    textAnchor: TextAnchor;
    title: ResolvedTextStyle;
    subtitle: ResolvedTextStyle;
    backgroundColor: string;
    margin: Box;
    circlePadding: Box;
    circleStrokeColor: string;
    circleStrokeWidth: number;
    placeholderColor: string;
}

export interface ComposedModel<T> {
    placed: PlacedModel<T>;
    sectionGroups: readonly GroupNode[];
    placeholderCount: number;    // Cards drawn without an image
}

// ==================== STEP 6: ASSEMBLE SCENE ====================

/**
 * Input for assembleScene step.
 */
export interface AssembleInput<T> {
    composed: ComposedModel<T>;
    config: GridConfig;
}

// ==================== RESULT ====================

/**
 * LayoutDiagnostics - summary of a layout computation.
 */
export interface LayoutDiagnostics {
    totalRecords: number;
    totalSections: number;
    totalRows: number;
    headCount: number;
    mergedSections: readonly SectionName[];
    placeholderImages: number;
    validationPassed: boolean;
    errors: string[];
}

/**
 * LayoutResult - final output of the layout pipeline.
 */
export interface LayoutResult<T> {
    scene: Scene;
    placed: PlacedModel<T>;
    diagnostics: LayoutDiagnostics;
}

/**
 * ValidationResult for checking layout invariants.
 */
export interface ValidationResult {
    passed: boolean;
    errors: string[];
}

// ==================== PIPELINE ORCHESTRATION ====================

export interface PipelineInput<T> {
    records: readonly T[];
    fields: RecordFields<T>;
    config: GridConfig;
}

export interface LayoutEngine {
    layout<T>(records: readonly T[], fields: RecordFields<T>): LayoutResult<T>;
}
