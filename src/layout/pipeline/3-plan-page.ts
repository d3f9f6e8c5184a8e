/**
 * Step 3: Plan Page
 *
 * Page-level setup for the grid layout engine:
 * - validates the merge set (top orientation only)
 * - counts rows and section heads, collapsing merged sections onto one row
 * - derives drawing-area, page and card dimensions
 *
 * Every merge failure is raised here, before any geometry exists.
 */

import { SectionName } from '../../types.js';
import {
    InvalidConfigError,
    InvalidGeometryError,
    MergeOrderMismatchError,
    MergeOverflowError
} from '../../errors.js';
import { countRegularRows } from './2-plan-rows.js';
import { MergePlan, PagePlan, PlanPageInput, Section } from './types.js';

/**
 * Compute page dimensions for planned sections.
 */
export function planPage<T>(input: PlanPageInput<T>): PagePlan<T> {
    const { planned, config } = input;
    const { sections, elementsPerRow } = planned;
    const orientation = config.headOrientation;

    if (orientation === 'left' && config.mergeSections.length > 0) {
        throw new InvalidConfigError(['mergeSections: Sections can only be merged when headOrientation is "top"']);
    }

    for (const [key, value] of [['cardHeight', config.cardHeight], ['headSize', config.headSize]] as const) {
        if (!Number.isFinite(value) || value <= 0) {
            throw new InvalidConfigError([`${key}: must be a positive number, got ${value}`]);
        }
    }

    let totalRows = sections.reduce((sum, s) => sum + s.rowCount, 0);
    let headCount = sections.length;

    const merge = config.mergeSections.length > 0
        ? planMerge(sections, config.mergeSections, elementsPerRow)
        : null;

    if (merge) {
        totalRows = totalRows - merge.rowsBefore + merge.rowsAfter;
        headCount = headCount - merge.sections.length + 1;
    }

    const margin = config.pageMargin;
    const drawingWidth = config.pageWidth - margin.left - margin.right;
    if (drawingWidth <= 0) {
        throw new InvalidGeometryError(
            `Page width ${config.pageWidth} leaves no drawing area inside margins ` +
            `(left ${margin.left}, right ${margin.right})`
        );
    }

    const leftHeadWidth = orientation === 'left' ? config.headSize : 0;
    const bodyWidth = drawingWidth - leftHeadWidth;
    if (bodyWidth <= 0) {
        throw new InvalidGeometryError(
            `Section head width ${config.headSize} leaves no room for cards in a drawing area ${drawingWidth} wide`
        );
    }

    const drawingHeight = orientation === 'left'
        ? totalRows * config.cardHeight
        : totalRows * config.cardHeight + headCount * config.headSize;

    return {
        planned,
        orientation,
        totalRows,
        headCount,
        headSize: config.headSize,
        cardWidth: bodyWidth / elementsPerRow,
        cardHeight: config.cardHeight,
        margin,
        drawingArea: { width: drawingWidth, height: drawingHeight },
        page: {
            width: config.pageWidth,
            height: drawingHeight + margin.top + margin.bottom
        },
        merge
    };
}

/**
 * Validate a merge set against the ordered sections.
 *
 * The named sections must fit on one row together, all exist and sit next
 * to each other in the section order exactly as listed.
 */
export function planMerge(
    sections: readonly Section[],
    mergeSections: readonly SectionName[],
    elementsPerRow: number
): MergePlan {
    const wanted = new Set<SectionName>(mergeSections);
    const positions: number[] = [];
    const found: SectionName[] = [];

    sections.forEach((section, index) => {
        if (wanted.has(section.name)) {
            positions.push(index);
            found.push(section.name);
        }
    });

    const merged = sections.filter(s => wanted.has(s.name));
    const elementCount = merged.reduce((sum, s) => sum + s.elementCount, 0);

    if (elementCount > elementsPerRow) {
        throw new MergeOverflowError(elementCount, elementsPerRow);
    }

    const sameOrder = found.length === mergeSections.length &&
        found.every((name, i) => name === mergeSections[i]);
    const consecutive = positions.every((pos, i) => i === 0 || pos === positions[i - 1] + 1);

    if (!sameOrder || !consecutive) {
        throw new MergeOrderMismatchError(mergeSections, found);
    }

    return {
        sections: found,
        elementCount,
        rowsBefore: merged.reduce((sum, s) => sum + s.rowCount, 0),
        rowsAfter: countRegularRows(elementCount, elementsPerRow)
    };
}
