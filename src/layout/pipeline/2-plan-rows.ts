/**
 * Step 2: Plan Rows
 *
 * Computes how many rows each section body needs.
 *
 * Flow modes:
 * - regular: every row holds `n` elements, the last row may be partial
 * - offset:  rows alternate between `n` and `n - 1` elements (honeycomb),
 *            a repeating two-row cycle of `2n - 1` elements
 */

import { FlowMode } from '../../types.js';
import { InvalidConfigError } from '../../errors.js';
import { PlanRowsInput, RowPlannedModel, Section } from './types.js';

/**
 * Plan rows for every grouped section.
 */
export function planRows<T>(input: PlanRowsInput<T>): RowPlannedModel<T> {
    const { grouped, elementsPerRow, flowMode } = input;

    assertElementsPerRow(elementsPerRow);

    const sections: Section[] = grouped.sections.map(summary => ({
        ...summary,
        rowCount: countRows(summary.elementCount, elementsPerRow, flowMode),
        rowBoundaries: flowMode === 'offset'
            ? offsetRowBoundaries(summary.elementCount, elementsPerRow)
            : null
    }));

    return { grouped, sections, elementsPerRow, flowMode };
}

export function countRows(elements: number, elementsPerRow: number, flowMode: FlowMode): number {
    return flowMode === 'offset'
        ? countOffsetRows(elements, elementsPerRow)
        : countRegularRows(elements, elementsPerRow);
}

export function countRegularRows(elements: number, elementsPerRow: number): number {
    return Math.ceil(elements / elementsPerRow);
}

/**
 * Rows needed when odd rows hold `n` elements and even rows `n - 1`.
 * With n = 1 both rows of a cycle hold one element.
 */
export function countOffsetRows(elements: number, elementsPerRow: number): number {
    if (elementsPerRow === 1) return elements;

    const cycle = 2 * elementsPerRow - 1;
    const fullCycles = Math.floor(elements / cycle);
    const remainder = elements - fullCycles * cycle;

    if (remainder === 0) return 2 * fullCycles;
    if (remainder <= elementsPerRow) return 2 * fullCycles + 1;
    return 2 * fullCycles + 2;
}

/**
 * Cumulative element count at the end of each offset row:
 * n, n + (n - 1), n + (n - 1) + n, ...
 *
 * Extended until the last term covers `elements`; always at least one term.
 */
export function offsetRowBoundaries(elements: number, elementsPerRow: number): number[] {
    assertElementsPerRow(elementsPerRow);

    const shortRow = Math.max(1, elementsPerRow - 1);
    const boundaries = [elementsPerRow];

    while (boundaries[boundaries.length - 1] < elements) {
        const last = boundaries[boundaries.length - 1];
        const step = boundaries.length % 2 === 1 ? shortRow : elementsPerRow;
        boundaries.push(last + step);
    }

    return boundaries;
}

function assertElementsPerRow(elementsPerRow: number): void {
    if (!Number.isInteger(elementsPerRow) || elementsPerRow <= 0) {
        throw new InvalidConfigError([`elementsPerRow: must be a positive integer, got ${elementsPerRow}`]);
    }
}
