/**
 * Step 5: Compose Cards
 *
 * Turns placed geometry into scene subtrees: one group per section holding
 * the head box, the head label and a card group per record.
 *
 * Card anatomy (title position 'bottom'):
 *
 *   +---------------------+
 *   |      margin.top     |
 *   |     (  circle  )    |  <- portrait clipped to the circle
 *   |        Title        |
 *   |      Subtitle       |
 *   +---------------------+
 *
 * With title position 'top' the two text rows come first and the circle
 * fills the space beneath them.
 */

import { GridConfig, Rect, SectionName } from '../../types.js';
import { resolveColor } from '../../color.js';
import { InvalidGeometryError } from '../../errors.js';
import { GroupNode, SceneNode, TextNode } from '../../scene.js';
import {
    CardFields,
    CardStyle,
    ComposeInput,
    ComposedModel,
    PlacedSection
} from './types.js';

/**
 * Compose scene groups for all placed sections.
 */
export function composeSections<T>(input: ComposeInput<T>): ComposedModel<T> {
    const { placed, fields, config } = input;
    let placeholderCount = 0;

    const sectionGroups = placed.sections.map((placedSection, sectionIndex) => {
        const style = resolveCardStyle(config, placedSection.section.name);
        const children: SceneNode[] = [...composeHead(placedSection, config)];

        for (const slot of placedSection.cards) {
            const cardFields: CardFields = {
                title: fields.title(slot.element.record),
                subtitle: fields.subtitle(slot.element.record),
                image: fields.image(slot.element.record)
            };
            if (cardFields.image === null) placeholderCount++;
            children.push(composeCard(slot.rect, cardFields, style, `card-${sectionIndex}-${slot.element.indexInSection}`));
        }

        const group: GroupNode = { kind: 'group', id: `section-${sectionIndex}`, children };
        return group;
    });

    return { placed, sectionGroups, placeholderCount };
}

/**
 * Head box and label for one section.
 */
function composeHead<T>(placedSection: PlacedSection<T>, config: GridConfig): SceneNode[] {
    const { head, label } = placedSection;
    const { sectionHead } = config;

    return [
        {
            kind: 'rect',
            x: head.x,
            y: head.y,
            width: head.width,
            height: head.height,
            fill: sectionHead.backgroundColor
        },
        {
            kind: 'text',
            text: label.text,
            x: label.x,
            y: label.y,
            fontSize: sectionHead.textSize,
            fontWeight: sectionHead.textWeight,
            fontFamily: config.fontFamily,
            fontStyle: 'normal',
            fill: label.color,
            textAnchor: 'start',
            dominantBaseline: 'auto'
        }
    ];
}

/**
 * Card styling with colours resolved for one section.
 */
export function resolveCardStyle(config: GridConfig, section: SectionName): CardStyle {
    const { card } = config;
    return {
        fontFamily: config.fontFamily,
        titlePosition: card.titlePosition,
        textAnchor: card.textAnchor,
        title: { ...card.title, color: resolveColor(card.title.color, section) },
        subtitle: { ...card.subtitle, color: resolveColor(card.subtitle.color, section) },
        backgroundColor: card.backgroundColor,
        margin: card.margin,
        circlePadding: card.circlePadding,
        circleStrokeColor: resolveColor(card.circleStroke.color, section),
        circleStrokeWidth: card.circleStroke.width,
        placeholderColor: card.placeholderColor
    };
}

// ==================== CARD GEOMETRY ====================

export interface CardGeometry {
    radius: number;
    cx: number;
    cy: number;
    textX: number;
    titleY: number;
    subtitleY: number;
    baseline: 'hanging' | 'auto';
}

/**
 * Circle and text positions inside a card box.
 *
 * The radius is bounded by the width left after margins and padding, and by
 * the height left after margins, padding and both text rows.
 *
 * @throws InvalidGeometryError when the radius is not positive
 */
export function cardGeometry(rect: Rect, style: CardStyle): CardGeometry {
    const { margin, circlePadding: pad } = style;
    const textHeight = style.title.size + style.subtitle.size;

    const radius = Math.min(
        (rect.width - margin.left - margin.right - pad.left - pad.right) / 2,
        (rect.height - margin.top - margin.bottom - pad.top - pad.bottom - textHeight) / 2
    );

    if (!(radius > 0)) {
        throw new InvalidGeometryError(
            `Card ${rect.width}x${rect.height} is too small for its text and portrait ` +
            `(circle radius ${radius})`
        );
    }

    const textX = anchorX(rect, style);
    const cx = rect.x + rect.width / 2;

    if (style.titlePosition === 'top') {
        return {
            radius,
            cx,
            cy: rect.y + margin.top + textHeight + pad.top + radius,
            textX,
            titleY: rect.y + margin.top,
            subtitleY: rect.y + margin.top + style.title.size,
            baseline: 'hanging'
        };
    }

    return {
        radius,
        cx,
        cy: rect.y + margin.top + pad.top + radius,
        textX,
        titleY: rect.y + rect.height - margin.bottom - style.subtitle.size,
        subtitleY: rect.y + rect.height - margin.bottom,
        baseline: 'auto'
    };
}

/** Shared x of both text rows for the configured anchor */
function anchorX(rect: Rect, style: CardStyle): number {
    switch (style.textAnchor) {
        case 'start':
            return rect.x + style.margin.left;
        case 'middle':
            return rect.x + rect.width / 2;
        case 'end':
            return rect.x + rect.width - style.margin.right;
    }
}

// ==================== CARD ====================

/**
 * Compose the scene subtree for one card.
 *
 * Without an image the portrait is replaced by a disc in the placeholder
 * colour carrying the title's initials.
 */
export function composeCard(rect: Rect, fields: CardFields, style: CardStyle, id?: string): GroupNode {
    const geometry = cardGeometry(rect, style);
    const { radius, cx, cy } = geometry;

    const children: SceneNode[] = [
        {
            kind: 'rect',
            x: rect.x,
            y: rect.y,
            width: rect.width,
            height: rect.height,
            fill: style.backgroundColor
        },
        {
            kind: 'circle',
            cx,
            cy,
            r: radius,
            fill: fields.image === null ? style.placeholderColor : style.circleStrokeColor,
            stroke: style.circleStrokeColor,
            strokeWidth: style.circleStrokeWidth
        }
    ];

    if (fields.image !== null) {
        children.push({
            kind: 'clipped-image',
            href: fields.image,
            x: cx - radius,
            y: cy - radius,
            width: 2 * radius,
            height: 2 * radius,
            clip: { cx, cy, r: radius }
        });
    } else {
        const text = initials(fields.title);
        if (text !== '') {
            children.push({
                kind: 'text',
                text,
                x: cx,
                y: cy,
                fontSize: radius * 0.8,
                fontWeight: 600,
                fontFamily: style.fontFamily,
                fontStyle: 'normal',
                fill: style.title.color,
                textAnchor: 'middle',
                dominantBaseline: 'central'
            });
        }
    }

    children.push(
        cardText(fields.title, geometry.textX, geometry.titleY, geometry.baseline, style, 'title'),
        cardText(fields.subtitle, geometry.textX, geometry.subtitleY, geometry.baseline, style, 'subtitle')
    );

    return id === undefined
        ? { kind: 'group', children }
        : { kind: 'group', id, children };
}

function cardText(
    text: string,
    x: number,
    y: number,
    baseline: CardGeometry['baseline'],
    style: CardStyle,
    role: 'title' | 'subtitle'
): TextNode {
    const textStyle = style[role];
    return {
        kind: 'text',
        text,
        x,
        y,
        fontSize: textStyle.size,
        fontWeight: textStyle.weight,
        fontFamily: style.fontFamily,
        fontStyle: textStyle.style,
        fill: textStyle.color,
        textAnchor: style.textAnchor,
        dominantBaseline: baseline
    };
}

/** First letters of up to two words, upper-cased */
export function initials(title: string): string {
    return title
        .trim()
        .split(/\s+/)
        .filter(word => word.length > 0)
        .slice(0, 2)
        .map(word => word.charAt(0).toUpperCase())
        .join('');
}
