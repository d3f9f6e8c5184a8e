/**
 * Step 1: Group Records
 *
 * Partitions records into sections by their section key, orders the sections
 * by the configured policy and sorts elements by (section order, row index).
 *
 * Ties (equal names cannot occur, equal counts can) are broken by the lowest
 * row index in each section, so repeated calls on the same table agree.
 */

import { SectionName, SectionOrderPolicy, SortDirection, toSectionName } from '../../types.js';
import { MissingSectionKeyError, SectionOrderMismatchError } from '../../errors.js';
import { GroupRecordsInput, GroupedModel, OrderedElement, SectionSummary } from './types.js';

interface KeyedRecord<T> {
    record: T;
    section: SectionName;
    sourceIndex: number;
}

/**
 * Group records into ordered sections.
 */
export function groupRecords<T>(input: GroupRecordsInput<T>): GroupedModel<T> {
    const { records, fields, order, direction } = input;

    // Resolve keys, collecting every record without one
    const keyed: KeyedRecord<T>[] = [];
    const missing: number[] = [];

    records.forEach((record, position) => {
        const key = fields.sectionKey(record);
        if (key === null || key === undefined || key === '') {
            missing.push(position);
            return;
        }
        keyed.push({
            record,
            section: toSectionName(key),
            sourceIndex: fields.rowIndex?.(record) ?? position
        });
    });

    if (missing.length > 0) {
        throw new MissingSectionKeyError(missing);
    }

    // Secondary key: original row index
    keyed.sort((a, b) => a.sourceIndex - b.sourceIndex);

    // Subtotals in first-appearance order
    const bySection = new Map<SectionName, KeyedRecord<T>[]>();
    for (const item of keyed) {
        const bucket = bySection.get(item.section);
        if (bucket) {
            bucket.push(item);
        } else {
            bySection.set(item.section, [item]);
        }
    }

    const summaries: SectionSummary[] = [];
    for (const [name, bucket] of bySection) {
        summaries.push({
            name,
            elementCount: bucket.length,
            firstIndex: bucket[0].sourceIndex
        });
    }

    const sections = orderSections(summaries, order, direction);

    // Elements follow the section order
    const elements: OrderedElement<T>[] = [];
    const elementsBySection = new Map<SectionName, OrderedElement<T>[]>();

    for (const section of sections) {
        const bucket = bySection.get(section.name) ?? [];
        const sectionElements = bucket.map((item, indexInSection) => ({
            record: item.record,
            section: item.section,
            sourceIndex: item.sourceIndex,
            indexInSection
        }));
        elementsBySection.set(section.name, sectionElements);
        elements.push(...sectionElements);
    }

    return { sections, elements, elementsBySection };
}

/**
 * Apply a section order policy to subtotals given in first-appearance order.
 * Array.prototype.sort is stable, so ties keep first-appearance order.
 */
export function orderSections(
    summaries: readonly SectionSummary[],
    order: SectionOrderPolicy,
    direction: SortDirection
): SectionSummary[] {
    if (order === 'name' || order === 'count') {
        const sign = direction === 'ascending' ? 1 : -1;
        const compare = order === 'name'
            ? (a: SectionSummary, b: SectionSummary) => compareNames(a.name, b.name)
            : (a: SectionSummary, b: SectionSummary) => a.elementCount - b.elementCount;
        return [...summaries].sort((a, b) => sign * compare(a, b));
    }

    return applyExplicitOrder(summaries, order);
}

/**
 * Explicit order: the list and the data must name the same sections, once each.
 */
function applyExplicitOrder(
    summaries: readonly SectionSummary[],
    order: readonly SectionName[]
): SectionSummary[] {
    const byName = new Map<SectionName, SectionSummary>();
    for (const summary of summaries) {
        byName.set(summary.name, summary);
    }

    const seen = new Set<SectionName>();
    const duplicated: SectionName[] = [];
    const missingFromData: SectionName[] = [];

    for (const name of order) {
        if (seen.has(name)) {
            if (!duplicated.includes(name)) duplicated.push(name);
            continue;
        }
        seen.add(name);
        if (!byName.has(name)) missingFromData.push(name);
    }

    const missingFromPolicy = summaries
        .map(s => s.name)
        .filter(name => !seen.has(name));

    if (missingFromPolicy.length > 0 || missingFromData.length > 0 || duplicated.length > 0) {
        throw new SectionOrderMismatchError(missingFromPolicy, missingFromData, duplicated);
    }

    const ordered: SectionSummary[] = [];
    for (const name of order) {
        const summary = byName.get(name);
        if (summary) ordered.push(summary);
    }
    return ordered;
}

/** Code-point comparison; independent of the host locale */
function compareNames(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
