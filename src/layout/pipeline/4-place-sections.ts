/**
 * Step 4: Place Sections
 *
 * Walks the sections in order and computes the head, body and card
 * rectangles of each. Positions are in drawing-area coordinates.
 *
 * A Cursor marks the next free position. It is an immutable value passed
 * into each step and returned from it, never shared state:
 * - after a section: y moves below the body, x returns to 0
 * - after a merged section (top orientation, not the last of the merge
 *   set): y stays on the shared row, x moves past the cards just placed
 */

import { Box, GridConfig, Position, Rect, SectionName, VerticalAlign } from '../../types.js';
import { resolveColor } from '../../color.js';
import {
    CardSlot,
    Cursor,
    HeadLabel,
    OrderedElement,
    PagePlan,
    PlaceSectionsInput,
    PlacedModel,
    PlacedSection,
    Section
} from './types.js';

/**
 * Place every section and card on the page.
 */
export function placeSections<T>(input: PlaceSectionsInput<T>): PlacedModel<T> {
    const { page, config } = input;
    const { planned } = page;
    const sharedRow = sharedRowSections(page);

    let cursor: Cursor = { x: 0, y: 0 };
    const sections: PlacedSection<T>[] = [];

    for (const section of planned.sections) {
        const elements = planned.grouped.elementsBySection.get(section.name) ?? [];
        const step = placeSection(section, elements, cursor, page, config, sharedRow.has(section.name));
        sections.push(step.placed);
        cursor = step.next;
    }

    return { page, sections };
}

/**
 * Sections that hand the current row on to the next section:
 * every merged section except the last one of the merge set.
 */
function sharedRowSections<T>(page: PagePlan<T>): Set<SectionName> {
    if (!page.merge) return new Set();
    return new Set(page.merge.sections.slice(0, -1));
}

interface SectionStep<T> {
    placed: PlacedSection<T>;
    next: Cursor;
}

/**
 * Place one section starting at the cursor.
 */
export function placeSection<T>(
    section: Section,
    elements: readonly OrderedElement<T>[],
    cursor: Cursor,
    page: PagePlan<T>,
    config: GridConfig,
    sharesRow: boolean
): SectionStep<T> {
    const drawWidth = page.drawingArea.width;
    const bodyHeight = section.rowCount * page.cardHeight;

    // Left heads span the body height; top heads span the remaining width
    const head: Rect = page.orientation === 'left'
        ? { x: cursor.x, y: cursor.y, width: page.headSize, height: bodyHeight }
        : { x: cursor.x, y: cursor.y, width: drawWidth - cursor.x, height: page.headSize };

    const bodyOrigin: Position = page.orientation === 'left'
        ? { x: cursor.x + page.headSize, y: cursor.y }
        : { x: cursor.x, y: cursor.y + page.headSize };

    const body: Rect = {
        x: bodyOrigin.x,
        y: bodyOrigin.y,
        width: drawWidth - bodyOrigin.x,
        height: bodyHeight
    };

    const cards = placeCards(elements, section, bodyOrigin, page);

    const next: Cursor = sharesRow
        ? { x: cursor.x + cards.length * page.cardWidth, y: cursor.y }
        : { x: 0, y: body.y + body.height };

    return {
        placed: {
            section,
            head,
            label: headLabel(section, head, config),
            body,
            cards,
            merged: sharesRow
        },
        next
    };
}

// ==================== CARDS ====================

/** Position of the next card within a section body */
export interface CardPointer {
    x: number;
    y: number;
    row: number;
}

/**
 * Lay out a section's cards row by row from the body origin.
 */
export function placeCards<T>(
    elements: readonly OrderedElement<T>[],
    section: Section,
    origin: Position,
    page: PagePlan<T>
): CardSlot<T>[] {
    const slots: CardSlot<T>[] = [];
    let pointer: CardPointer = { x: origin.x, y: origin.y, row: 0 };

    elements.forEach((element, index) => {
        slots.push({
            element,
            rect: { x: pointer.x, y: pointer.y, width: page.cardWidth, height: page.cardHeight },
            row: pointer.row
        });
        pointer = advanceCardPointer(pointer, index + 1, origin.x, section.rowBoundaries, page);
    });

    return slots;
}

/**
 * Move the pointer past the card just placed.
 *
 * Regular flow wraps after every elementsPerRow-th card. Offset flow wraps at
 * each row boundary: after an even-indexed row (0-based) the next row starts
 * half a card in, after an odd-indexed row it starts flush.
 */
export function advanceCardPointer<T>(
    pointer: CardPointer,
    placedCount: number,
    rowStartX: number,
    rowBoundaries: readonly number[] | null,
    page: Pick<PagePlan<T>, 'cardWidth' | 'cardHeight' | 'planned'>
): CardPointer {
    const { cardWidth, cardHeight } = page;
    const { elementsPerRow } = page.planned;

    if (rowBoundaries === null) {
        if (placedCount % elementsPerRow === 0) {
            return { x: rowStartX, y: pointer.y + cardHeight, row: pointer.row + 1 };
        }
        return { ...pointer, x: pointer.x + cardWidth };
    }

    const boundary = rowBoundaries.indexOf(placedCount);
    if (boundary === -1) {
        return { ...pointer, x: pointer.x + cardWidth };
    }

    // One card per row has nothing to offset against
    const indent = boundary % 2 === 0 && elementsPerRow > 1 ? cardWidth / 2 : 0;
    return { x: rowStartX + indent, y: pointer.y + cardHeight, row: pointer.row + 1 };
}

// ==================== SECTION HEADS ====================

/**
 * Head label text, position and colour.
 */
export function headLabel(section: Section, head: Rect, config: GridConfig): HeadLabel {
    const { sectionHead } = config;
    const position = headLabelPosition(head, sectionHead.verticalAlign, sectionHead.padding, sectionHead.textSize);

    return {
        text: sectionHead.showTotals ? `${section.name}: ${section.elementCount}` : section.name,
        x: position.x,
        y: position.y,
        color: resolveColor(sectionHead.textColor, section.name)
    };
}

/**
 * Baseline position of a head label inside its box.
 */
export function headLabelPosition(
    head: Rect,
    align: VerticalAlign,
    padding: Box,
    textSize: number
): Position {
    const x = head.x + padding.left;
    switch (align) {
        case 'top':
            return { x, y: head.y + padding.top + textSize };
        case 'center':
            return { x, y: head.y + padding.top + (head.height + textSize) / 2 - padding.bottom };
        case 'bottom':
            return { x, y: head.y + head.height - padding.bottom };
    }
}
