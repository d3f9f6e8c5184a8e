/**
 * Geometry assertions shared by layout tests.
 */

import { expect } from 'vitest';
import { Rect } from '../../../types.js';
import { PlacedModel, rectanglesOverlap } from '../../pipeline/index.js';

/** [x, y] of every card, section by section */
export function cardOrigins<T>(placed: PlacedModel<T>): [number, number][] {
    return placed.sections.flatMap(s => s.cards.map(c => [c.rect.x, c.rect.y] as [number, number]));
}

/**
 * Assert that no two cards share any area.
 */
export function assertNoCardOverlap<T>(placed: PlacedModel<T>): void {
    const rects: Rect[] = placed.sections.flatMap(s => s.cards.map(c => c.rect));
    for (let i = 0; i < rects.length; i++) {
        for (let j = i + 1; j < rects.length; j++) {
            if (rectanglesOverlap(rects[i], rects[j])) {
                throw new Error(
                    `Cards overlap: (${rects[i].x}, ${rects[i].y}) and (${rects[j].x}, ${rects[j].y})`
                );
            }
        }
    }
}

/**
 * Assert that every card, head and body lies inside the drawing area.
 */
export function assertInsideDrawingArea<T>(placed: PlacedModel<T>): void {
    const { width, height } = placed.page.drawingArea;
    const rects: Rect[] = placed.sections.flatMap(s => [s.head, s.body, ...s.cards.map(c => c.rect)]);
    for (const r of rects) {
        expect(r.x).toBeGreaterThanOrEqual(0);
        expect(r.y).toBeGreaterThanOrEqual(0);
        expect(r.x + r.width).toBeLessThanOrEqual(width + 1e-6);
        expect(r.y + r.height).toBeLessThanOrEqual(height + 1e-6);
    }
}
