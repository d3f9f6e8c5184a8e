/**
 * Card Grid - Type Definitions
 * Branded section names, geometry values and the configuration model.
 */

// ==================== BRANDED TYPES ====================

/** Branded type for section names - prevents mixing with titles or other strings */
export type SectionName = string & { readonly __brand: 'SectionName' };

/** Helper to create a SectionName from string */
export function toSectionName(name: string): SectionName {
    return name as SectionName;
}

/** Reference to a portrait image, resolved by the renderer (path, URL or data URI) */
export type ImageRef = string;

// ==================== GEOMETRY ====================

export interface Position {
    readonly x: number;
    readonly y: number;
}

export interface Size {
    readonly width: number;
    readonly height: number;
}

/** Axis-aligned rectangle; immutable once computed */
export interface Rect extends Position, Size {}

/** Four-sided inset (margins, paddings) */
export interface Box {
    readonly top: number;
    readonly right: number;
    readonly bottom: number;
    readonly left: number;
}

// ==================== RECORDS ====================

/**
 * Accessors for the four semantic fields of a caller-owned record.
 * The record itself stays opaque to the layout engine.
 */
export interface RecordFields<T> {
    sectionKey(record: T): string | null | undefined;
    title(record: T): string;
    subtitle(record: T): string;
    image(record: T): ImageRef | null;
    /** Original row index; defaults to the record's position in the list */
    rowIndex?(record: T): number;
}

// ==================== LAYOUT OPTIONS ====================

export type FlowMode = 'regular' | 'offset';

export type HeadOrientation = 'left' | 'top';

export type SortDirection = 'ascending' | 'descending';

/** 'name' and 'count' sort; an explicit list must name every section exactly once */
export type SectionOrderPolicy = 'name' | 'count' | readonly SectionName[];

export type VerticalAlign = 'top' | 'center' | 'bottom';

export type TextAnchor = 'start' | 'middle' | 'end';

export type TitlePosition = 'top' | 'bottom';

export type FontStyle = 'normal' | 'italic' | 'oblique';

export type DominantBaseline = 'hanging' | 'auto' | 'central';

/**
 * Colour that may vary per section.
 */
export type ColorSource =
    | { readonly kind: 'uniform'; readonly color: string }
    | { readonly kind: 'by-key'; readonly colors: Readonly<Record<string, string>>; readonly fallback: string };

export interface TextStyle {
    readonly size: number;
    readonly weight: number;
    readonly style: FontStyle;
    readonly color: ColorSource;
}

export interface SectionHeadConfig {
    readonly verticalAlign: VerticalAlign;
    readonly textSize: number;
    readonly textWeight: number;
    readonly textColor: ColorSource;
    readonly backgroundColor: string;
    readonly padding: Box;
    readonly showTotals: boolean;        // Label reads "<name>: <count>"
}

export interface CircleStrokeConfig {
    readonly color: ColorSource;
    readonly width: number;
}

export interface CardConfig {
    readonly titlePosition: TitlePosition;
    readonly textAnchor: TextAnchor;
    readonly title: TextStyle;
    readonly subtitle: TextStyle;
    readonly backgroundColor: string;
    readonly margin: Box;
    readonly circlePadding: Box;
    readonly circleStroke: CircleStrokeConfig;
    readonly placeholderColor: string;   // Disc fill when a record has no image
}

/**
 * GridConfig - fully resolved configuration. Build one with parseGridConfig().
 */
export interface GridConfig {
    readonly pageWidth: number;
    readonly pageMargin: Box;
    readonly pageBackgroundColor: string;
    readonly fontFamily: string;
    readonly elementsPerRow: number;
    readonly flowMode: FlowMode;
    readonly sectionOrder: SectionOrderPolicy;
    readonly sectionOrderDirection: SortDirection;  // Ignored for an explicit list
    readonly headOrientation: HeadOrientation;
    readonly headSize: number;                      // Width when 'left', height when 'top'
    readonly cardHeight: number;
    readonly mergeSections: readonly SectionName[]; // 'top' orientation only
    readonly sectionHead: SectionHeadConfig;
    readonly card: CardConfig;
}
