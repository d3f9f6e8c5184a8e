/**
 * Layout Validation
 *
 * Checks layout invariants on placed geometry:
 * 1. No card overlap
 * 2. Every card lies inside the drawing area
 * 3. Every card lies inside its section body
 */

import { Rect, Size } from '../../types.js';
import { PlacedModel, ValidationResult } from './types.js';

/** Tolerance for floating point card widths */
const EPSILON = 1e-6;

/**
 * Validate placed geometry.
 */
export function validateLayout<T>(placed: PlacedModel<T>): ValidationResult {
    const errors: string[] = [];

    // 1. Check for card overlaps
    errors.push(...checkCardOverlaps(placed));

    // 2. Check drawing-area bounds
    errors.push(...checkBounds(placed, placed.page.drawingArea));

    // 3. Check cards stay in their section body
    errors.push(...checkBodies(placed));

    return {
        passed: errors.length === 0,
        errors
    };
}

interface LabeledRect {
    id: string;
    rect: Rect;
}

function allCards<T>(placed: PlacedModel<T>): LabeledRect[] {
    return placed.sections.flatMap(s =>
        s.cards.map(card => ({
            id: `${s.section.name}#${card.element.indexInSection}`,
            rect: card.rect
        }))
    );
}

/**
 * Check for overlapping cards.
 */
function checkCardOverlaps<T>(placed: PlacedModel<T>): string[] {
    const errors: string[] = [];
    const cards = allCards(placed);

    for (let i = 0; i < cards.length; i++) {
        for (let j = i + 1; j < cards.length; j++) {
            if (rectanglesOverlap(cards[i].rect, cards[j].rect)) {
                errors.push(`Card overlap: ${cards[i].id} and ${cards[j].id}`);
            }
        }
    }

    return errors;
}

/**
 * Check if two rectangles share any area (touching edges do not count).
 */
export function rectanglesOverlap(a: Rect, b: Rect): boolean {
    if (a.x + a.width <= b.x + EPSILON) return false;  // a is left of b
    if (b.x + b.width <= a.x + EPSILON) return false;  // b is left of a
    if (a.y + a.height <= b.y + EPSILON) return false; // a is above b
    if (b.y + b.height <= a.y + EPSILON) return false; // b is above a

    return true;
}

function contains(outer: Rect, inner: Rect): boolean {
    return inner.x >= outer.x - EPSILON &&
        inner.y >= outer.y - EPSILON &&
        inner.x + inner.width <= outer.x + outer.width + EPSILON &&
        inner.y + inner.height <= outer.y + outer.height + EPSILON;
}

function checkBounds<T>(placed: PlacedModel<T>, area: Size): string[] {
    const bounds: Rect = { x: 0, y: 0, width: area.width, height: area.height };
    return allCards(placed)
        .filter(card => !contains(bounds, card.rect))
        .map(card =>
            `Card ${card.id} outside drawing area: x=${card.rect.x}, y=${card.rect.y}`
        );
}

function checkBodies<T>(placed: PlacedModel<T>): string[] {
    const errors: string[] = [];
    for (const s of placed.sections) {
        for (const card of s.cards) {
            if (!contains(s.body, card.rect)) {
                errors.push(`Card ${s.section.name}#${card.element.indexInSection} outside its section body`);
            }
        }
    }
    return errors;
}
