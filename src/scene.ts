/**
 * Abstract Scene Tree
 *
 * Renderer-neutral description of the finished graphic. Every node has exactly
 * one parent; groups own their children and may translate them.
 */

import { DominantBaseline, FontStyle, ImageRef, Position, TextAnchor } from './types.js';

// ==================== NODES ====================

export interface RectNode {
    readonly kind: 'rect';
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
    readonly fill: string;
    readonly stroke?: string;
    readonly strokeWidth?: number;
}

export interface CircleNode {
    readonly kind: 'circle';
    readonly cx: number;
    readonly cy: number;
    readonly r: number;
    readonly fill: string;
    readonly stroke?: string;
    readonly strokeWidth?: number;
}

/** Circular clip region */
export interface CircleClip {
    readonly cx: number;
    readonly cy: number;
    readonly r: number;
}

/**
 * Image scaled into its box and clipped to a circle.
 */
export interface ClippedImageNode {
    readonly kind: 'clipped-image';
    readonly href: ImageRef;
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
    readonly clip: CircleClip;
}

export interface TextNode {
    readonly kind: 'text';
    readonly text: string;
    readonly x: number;
    readonly y: number;
    readonly fontSize: number;
    readonly fontWeight: number;
    readonly fontFamily: string;
    readonly fontStyle: FontStyle;
    readonly fill: string;
    readonly textAnchor: TextAnchor;
    readonly dominantBaseline: DominantBaseline;
}

export interface GroupNode {
    readonly kind: 'group';
    readonly id?: string;
    readonly translate?: Position;
    readonly children: readonly SceneNode[];
}

export type SceneNode = RectNode | CircleNode | ClippedImageNode | TextNode | GroupNode;

export type SceneNodeKind = SceneNode['kind'];

// ==================== SCENE ====================

/** Font family declared once for the whole scene */
export interface FontResource {
    readonly family: string;
}

export interface Scene {
    readonly width: number;
    readonly height: number;
    readonly fonts: readonly FontResource[];
    readonly root: GroupNode;
}

// ==================== TRAVERSAL ====================

/**
 * Depth-first walk over a subtree, parents before children.
 */
export function* walkScene(node: SceneNode): Generator<SceneNode> {
    yield node;
    if (node.kind === 'group') {
        for (const child of node.children) {
            yield* walkScene(child);
        }
    }
}

/**
 * Collect all nodes of one kind beneath (and including) a node.
 */
export function collectNodes<K extends SceneNodeKind>(
    node: SceneNode,
    kind: K
): Extract<SceneNode, { kind: K }>[] {
    const found: Extract<SceneNode, { kind: K }>[] = [];
    for (const n of walkScene(node)) {
        if (isKind(n, kind)) found.push(n);
    }
    return found;
}

function isKind<K extends SceneNodeKind>(node: SceneNode, kind: K): node is Extract<SceneNode, { kind: K }> {
    return node.kind === kind;
}
