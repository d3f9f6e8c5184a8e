/**
 * Layout errors.
 *
 * Every failure is derived purely from the input records and configuration,
 * and is raised before any scene is returned.
 */

export type CardGridErrorKind =
    | 'MissingSectionKey'
    | 'SectionOrderMismatch'
    | 'MergeOverflow'
    | 'MergeOrderMismatch'
    | 'InvalidGeometry'
    | 'InvalidConfig';

export abstract class CardGridError extends Error {
    abstract readonly kind: CardGridErrorKind;
}

/** Records whose section key is null, undefined or empty */
export class MissingSectionKeyError extends CardGridError {
    readonly kind = 'MissingSectionKey';

    constructor(readonly recordIndices: readonly number[]) {
        super(
            `Missing section key in ${recordIndices.length} record(s) at index ` +
            recordIndices.slice(0, 10).join(', ') +
            (recordIndices.length > 10 ? `, ... and ${recordIndices.length - 10} more` : '')
        );
        this.name = 'MissingSectionKeyError';
    }
}

export class SectionOrderMismatchError extends CardGridError {
    readonly kind = 'SectionOrderMismatch';

    constructor(
        readonly missingFromPolicy: readonly string[],
        readonly missingFromData: readonly string[],
        readonly duplicated: readonly string[] = []
    ) {
        const parts: string[] = [];
        if (missingFromPolicy.length > 0) {
            parts.push(`sections not found in order list: ${formatNames(missingFromPolicy)}`);
        }
        if (missingFromData.length > 0) {
            parts.push(`order list entries not found in data: ${formatNames(missingFromData)}`);
        }
        if (duplicated.length > 0) {
            parts.push(`order list entries given more than once: ${formatNames(duplicated)}`);
        }
        super(`Section order does not match the data; ${parts.join('; ')}`);
        this.name = 'SectionOrderMismatchError';
    }
}

export class MergeOverflowError extends CardGridError {
    readonly kind = 'MergeOverflow';

    constructor(readonly mergedElements: number, readonly elementsPerRow: number) {
        super(
            'Sections to merge must fit onto a single row: merged sections have ' +
            `${mergedElements} elements, but elementsPerRow is ${elementsPerRow}`
        );
        this.name = 'MergeOverflowError';
    }
}

export class MergeOrderMismatchError extends CardGridError {
    readonly kind = 'MergeOrderMismatch';

    constructor(readonly expected: readonly string[], readonly found: readonly string[]) {
        super(
            `Sections to merge must be consecutive and in data order: expected ${formatNames(expected)}, ` +
            `found ${formatNames(found)}`
        );
        this.name = 'MergeOrderMismatchError';
    }
}

export class InvalidGeometryError extends CardGridError {
    readonly kind = 'InvalidGeometry';

    constructor(message: string) {
        super(message);
        this.name = 'InvalidGeometryError';
    }
}

export class InvalidConfigError extends CardGridError {
    readonly kind = 'InvalidConfig';

    constructor(readonly issues: readonly string[]) {
        super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
        this.name = 'InvalidConfigError';
    }
}

/**
 * Narrow an unknown value to a CardGridError, optionally of one kind.
 */
export function isCardGridError(value: unknown, kind?: CardGridErrorKind): value is CardGridError {
    if (!(value instanceof CardGridError)) return false;
    return kind === undefined || value.kind === kind;
}

function formatNames(names: readonly string[]): string {
    return `[${names.map(n => JSON.stringify(n)).join(', ')}]`;
}
