/**
 * Grid configuration schema.
 *
 * Config literals are validated once, at construction time: unknown keys are
 * rejected, omitted keys take the defaults below.
 */

import { z } from 'zod';
import { GridConfig, toSectionName } from './types.js';
import { InvalidConfigError } from './errors.js';

// ─── Building blocks ─────────────────────────────────────

const zColor = z.string().min(1, 'Colour must not be empty');

const zNonNegative = z.number().finite().nonnegative();

const zPositive = z.number().finite().positive();

function boxSchema(inset: number) {
    return z
        .object({
            top: zNonNegative.default(inset),
            right: zNonNegative.default(inset),
            bottom: zNonNegative.default(inset),
            left: zNonNegative.default(inset),
        })
        .strict()
        .default({});
}

/** A colour string, or a per-section lookup with a fallback */
export const ColorSourceSchema = z.union([
    zColor.transform(color => ({ kind: 'uniform' as const, color })),
    z
        .object({
            byKey: z.record(zColor),
            fallback: zColor.default('black'),
        })
        .strict()
        .transform(({ byKey, fallback }) => ({ kind: 'by-key' as const, colors: byKey, fallback })),
]);

function textStyleSchema(size: number) {
    return z
        .object({
            size: zPositive.default(size),
            weight: z.number().int().min(1).max(1000).default(400),
            style: z.enum(['normal', 'italic', 'oblique']).default('normal'),
            color: ColorSourceSchema.default('black'),
        })
        .strict()
        .default({});
}

// ─── Grid config ─────────────────────────────────────────

const SectionHeadSchema = z
    .object({
        verticalAlign: z.enum(['top', 'center', 'bottom']).default('top'),
        textSize: zPositive.default(20),
        textWeight: z.number().int().min(1).max(1000).default(600),
        textColor: ColorSourceSchema.default('black'),
        backgroundColor: zColor.default('white'),
        padding: boxSchema(5),
        showTotals: z.boolean().default(false),
    })
    .strict()
    .default({});

const CardSchema = z
    .object({
        titlePosition: z.enum(['top', 'bottom']).default('bottom'),
        textAnchor: z.enum(['start', 'middle', 'end']).default('middle'),
        title: textStyleSchema(10),
        subtitle: textStyleSchema(8),
        backgroundColor: zColor.default('white'),
        margin: boxSchema(2),
        circlePadding: boxSchema(2),
        circleStroke: z
            .object({
                color: ColorSourceSchema.default('black'),
                width: zNonNegative.default(2),
            })
            .strict()
            .default({}),
        placeholderColor: zColor.default('#c1c5c8'),
    })
    .strict()
    .default({});

export const GridConfigSchema = z
    .object({
        pageWidth: zPositive.default(800),
        pageMargin: boxSchema(10),
        pageBackgroundColor: zColor.default('white'),
        fontFamily: z.string().min(1).default('Open Sans'),
        elementsPerRow: z.number().int().positive().default(5),
        flowMode: z.enum(['regular', 'offset']).default('regular'),
        sectionOrder: z
            .union([
                z.literal('name'),
                z.literal('count'),
                z.array(z.string().min(1)).transform(names => names.map(toSectionName)),
            ])
            .default('count'),
        sectionOrderDirection: z.enum(['ascending', 'descending']).default('descending'),
        headOrientation: z.enum(['left', 'top']).default('top'),
        headSize: zPositive.default(35),
        cardHeight: zPositive.default(100),
        mergeSections: z
            .array(z.string().min(1))
            .default([])
            .transform(names => names.map(toSectionName)),
        sectionHead: SectionHeadSchema,
        card: CardSchema,
    })
    .strict()
    .superRefine((config, ctx) => {
        if (config.headOrientation === 'left' && config.mergeSections.length > 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['mergeSections'],
                message: 'Sections can only be merged when headOrientation is "top"',
            });
        }
        const seen = new Set<string>();
        for (const name of config.mergeSections) {
            if (seen.has(name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['mergeSections'],
                    message: `Section "${name}" is listed more than once`,
                });
            }
            seen.add(name);
        }
    });

/** Config literal as written by a caller: every key optional */
export type GridConfigInput = z.input<typeof GridConfigSchema>;

/**
 * Validate a configuration literal and apply defaults.
 * @throws InvalidConfigError listing every issue found
 */
export function parseGridConfig(input: unknown = {}): GridConfig {
    const result = GridConfigSchema.safeParse(input);
    if (!result.success) {
        throw new InvalidConfigError(formatIssues(result.error));
    }
    return result.data;
}

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
}

export const DEFAULT_GRID_CONFIG: GridConfig = parseGridConfig({});
