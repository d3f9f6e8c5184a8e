/**
 * Step 6: Assemble Scene
 *
 * Final step: wraps the section groups in the drawing area (translated by the
 * page margins) under a page-sized background, and declares the font once.
 */

import { GroupNode, Scene } from '../../scene.js';
import { AssembleInput } from './types.js';

export function assembleScene<T>(input: AssembleInput<T>): Scene {
    const { composed, config } = input;
    const { page } = composed.placed;

    const drawingArea: GroupNode = {
        kind: 'group',
        id: 'drawing-area',
        translate: { x: page.margin.left, y: page.margin.top },
        children: composed.sectionGroups
    };

    return {
        width: page.page.width,
        height: page.page.height,
        fonts: [{ family: config.fontFamily }],
        root: {
            kind: 'group',
            id: 'page',
            children: [
                {
                    kind: 'rect',
                    x: 0,
                    y: 0,
                    width: page.page.width,
                    height: page.page.height,
                    fill: config.pageBackgroundColor
                },
                drawingArea
            ]
        }
    };
}
