/**
 * Reference SVG renderer.
 *
 * Serializes a scene to an SVG string, keeping every coordinate of the
 * scene. Deterministic: clip path ids follow document order.
 * Image hrefs and fonts are written as references; nothing is fetched.
 */

import { FontResource, Scene, SceneNode, TextNode } from '../scene.js';

export interface SvgOptions {
    /** CSS declaring a font; defaults to a Google Fonts import */
    fontCss?: (font: FontResource) => string;
}

interface RenderContext {
    lines: string[];
    nextClipId: number;
}

const INDENT = '  ';

export function renderSvg(scene: Scene, options: SvgOptions = {}): string {
    const fontCss = options.fontCss ?? googleFontImport;
    const ctx: RenderContext = { lines: [], nextClipId: 0 };
    const { lines } = ctx;

    lines.push(
        `<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(scene.width)}" height="${fmt(scene.height)}" ` +
        `viewBox="0 0 ${fmt(scene.width)} ${fmt(scene.height)}">`
    );

    if (scene.fonts.length > 0) {
        lines.push(`${INDENT}<defs>`);
        lines.push(`${INDENT}${INDENT}<style>`);
        for (const font of scene.fonts) {
            lines.push(`${INDENT.repeat(3)}${escapeText(fontCss(font))}`);
        }
        lines.push(`${INDENT}${INDENT}</style>`);
        lines.push(`${INDENT}</defs>`);
    }

    renderNode(scene.root, 1, ctx);
    lines.push('</svg>');

    return lines.join('\n');
}

export function googleFontImport(font: FontResource): string {
    const family = encodeURIComponent(font.family).replace(/%20/g, '+');
    return `@import url('https://fonts.googleapis.com/css2?family=${family}');`;
}

function renderNode(node: SceneNode, depth: number, ctx: RenderContext): void {
    const pad = INDENT.repeat(depth);
    const { lines } = ctx;

    switch (node.kind) {
        case 'group': {
            const attrs = attributes({
                id: node.id,
                transform: node.translate ? `translate(${fmt(node.translate.x)},${fmt(node.translate.y)})` : undefined
            });
            lines.push(`${pad}<g${attrs}>`);
            for (const child of node.children) {
                renderNode(child, depth + 1, ctx);
            }
            lines.push(`${pad}</g>`);
            return;
        }
        case 'rect':
            lines.push(`${pad}<rect${attributes({
                x: node.x,
                y: node.y,
                width: node.width,
                height: node.height,
                fill: node.fill,
                stroke: node.stroke,
                'stroke-width': node.strokeWidth
            })}/>`);
            return;
        case 'circle':
            lines.push(`${pad}<circle${attributes({
                cx: node.cx,
                cy: node.cy,
                r: node.r,
                fill: node.fill,
                stroke: node.stroke,
                'stroke-width': node.strokeWidth
            })}/>`);
            return;
        case 'clipped-image': {
            const clipId = `clip-${ctx.nextClipId++}`;
            const { clip } = node;
            lines.push(`${pad}<clipPath id="${clipId}">`);
            lines.push(`${pad}${INDENT}<circle${attributes({ cx: clip.cx, cy: clip.cy, r: clip.r })}/>`);
            lines.push(`${pad}</clipPath>`);
            lines.push(`${pad}<image${attributes({
                href: node.href,
                x: node.x,
                y: node.y,
                width: node.width,
                height: node.height,
                preserveAspectRatio: 'xMidYMid slice',
                'clip-path': `url(#${clipId})`
            })}/>`);
            return;
        }
        case 'text':
            lines.push(`${pad}${renderText(node)}`);
            return;
    }
}

/**
 * Text element; embedded newlines become stacked tspans.
 */
function renderText(node: TextNode): string {
    const attrs = attributes({
        x: node.x,
        y: node.y,
        'font-family': node.fontFamily,
        'font-size': node.fontSize,
        'font-weight': node.fontWeight,
        'font-style': node.fontStyle === 'normal' ? undefined : node.fontStyle,
        fill: node.fill,
        'text-anchor': node.textAnchor,
        'dominant-baseline': node.dominantBaseline === 'auto' ? undefined : node.dominantBaseline
    });

    const textLines = node.text.split('\n');
    if (textLines.length === 1) {
        return `<text${attrs}>${escapeText(node.text)}</text>`;
    }

    const spans = textLines.map((line, i) =>
        `<tspan x="${fmt(node.x)}"${i === 0 ? '' : ' dy="1.2em"'}>${escapeText(line)}</tspan>`
    );
    return `<text${attrs}>${spans.join('')}</text>`;
}

type AttributeValue = string | number | undefined;

/** Serialize attributes in insertion order, skipping undefined values */
function attributes(attrs: Record<string, AttributeValue>): string {
    let out = '';
    for (const [name, value] of Object.entries(attrs)) {
        if (value === undefined) continue;
        const text = typeof value === 'number' ? fmt(value) : escapeXml(value);
        out += ` ${name}="${text}"`;
    }
    return out;
}

/** Number with at most 4 decimals, no trailing zeros */
export function fmt(value: number): string {
    if (Number.isInteger(value)) return String(value);
    return String(Number(value.toFixed(4)));
}

/** Escape character data (element content) */
export function escapeText(str: string): string {
    return str.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Escape an attribute value */
export function escapeXml(str: string): string {
    return escapeText(str).replace(/"/g, '&quot;').replace(/'/g, '&apos;');
}
