/**
 * Step 1 (groupRecords) Tests
 */

import { describe, it, expect } from 'vitest';
import { groupRecords, orderSections, SectionSummary } from '../pipeline/index.js';
import { MissingSectionKeyError, SectionOrderMismatchError } from '../../errors.js';
import { SectionOrderPolicy, SortDirection, toSectionName } from '../../types.js';
import { TEST_FIELDS, TestRecord } from './helpers/records.js';

function record(id: number, section: string | null): TestRecord {
    return { id, section, title: `R${id}`, subtitle: '', image: null };
}

/** A B A C B A  →  A: 3 (first 0), B: 2 (first 1), C: 1 (first 3) */
const INTERLEAVED = [
    record(0, 'A'),
    record(1, 'B'),
    record(2, 'A'),
    record(3, 'C'),
    record(4, 'B'),
    record(5, 'A')
];

function group(
    records: readonly TestRecord[],
    order: SectionOrderPolicy = 'count',
    direction: SortDirection = 'descending'
) {
    return groupRecords({ records, fields: TEST_FIELDS, order, direction });
}

describe('groupRecords', () => {
    it('collects subtotals per section', () => {
        const grouped = group(INTERLEAVED);

        expect(grouped.sections.map(s => [s.name, s.elementCount, s.firstIndex])).toEqual([
            ['A', 3, 0],
            ['B', 2, 1],
            ['C', 1, 3]
        ]);
    });

    it('orders elements by section, then by row index', () => {
        const grouped = group(INTERLEAVED);

        expect(grouped.elements.map(e => e.sourceIndex)).toEqual([0, 2, 5, 1, 4, 3]);
        expect(grouped.elements.map(e => e.indexInSection)).toEqual([0, 1, 2, 0, 1, 0]);
    });

    it('indexes elements by section', () => {
        const grouped = group(INTERLEAVED);

        const b = grouped.elementsBySection.get(toSectionName('B')) ?? [];
        expect(b.map(e => e.record.id)).toEqual([1, 4]);
    });

    it('sorts by count ascending', () => {
        const grouped = group(INTERLEAVED, 'count', 'ascending');
        expect(grouped.sections.map(s => s.name)).toEqual(['C', 'B', 'A']);
    });

    it('sorts by name in both directions', () => {
        const records = [record(0, 'beta'), record(1, 'Alpha'), record(2, 'alpha')];

        expect(group(records, 'name', 'ascending').sections.map(s => s.name))
            .toEqual(['Alpha', 'alpha', 'beta']);
        expect(group(records, 'name', 'descending').sections.map(s => s.name))
            .toEqual(['beta', 'alpha', 'Alpha']);
    });

    it('breaks count ties by first appearance', () => {
        const records = [record(0, 'X'), record(1, 'Y'), record(2, 'Z'), record(3, 'Y')];
        const grouped = group(records);

        // Y has 2; X and Z tie on 1, X appears first
        expect(grouped.sections.map(s => s.name)).toEqual(['Y', 'X', 'Z']);
    });

    it('follows an explicit order', () => {
        const grouped = group(INTERLEAVED, ['C', 'A', 'B'].map(toSectionName));

        expect(grouped.sections.map(s => s.name)).toEqual(['C', 'A', 'B']);
        expect(grouped.elements.map(e => e.sourceIndex)).toEqual([3, 0, 2, 5, 1, 4]);
    });

    it('uses a row index accessor when given', () => {
        // Shuffled input; ids carry the original order
        const shuffled = [INTERLEAVED[5], INTERLEAVED[3], INTERLEAVED[0], INTERLEAVED[4], INTERLEAVED[1], INTERLEAVED[2]];
        const grouped = groupRecords({
            records: shuffled,
            fields: { ...TEST_FIELDS, rowIndex: r => r.id },
            order: 'count',
            direction: 'descending'
        });

        expect(grouped.sections.map(s => [s.name, s.firstIndex])).toEqual([['A', 0], ['B', 1], ['C', 3]]);
        expect(grouped.elements.map(e => e.record.id)).toEqual([0, 2, 5, 1, 4, 3]);
    });

    it('returns no sections for no records', () => {
        const grouped = group([]);
        expect(grouped.sections).toEqual([]);
        expect(grouped.elements).toEqual([]);
    });

    it('rejects records without a section key', () => {
        const records = [record(0, 'A'), record(1, null), record(2, ''), record(3, 'B')];

        try {
            group(records);
            expect.unreachable('groupRecords should throw');
        } catch (e) {
            expect(e).toBeInstanceOf(MissingSectionKeyError);
            if (e instanceof MissingSectionKeyError) {
                expect(e.kind).toBe('MissingSectionKey');
                expect(e.recordIndices).toEqual([1, 2]);
            }
        }
    });
});

describe('orderSections', () => {
    const summaries: SectionSummary[] = [
        { name: toSectionName('A'), elementCount: 3, firstIndex: 0 },
        { name: toSectionName('B'), elementCount: 2, firstIndex: 1 }
    ];

    it('reports sections missing from the order list', () => {
        expect(() => orderSections(summaries, [toSectionName('A')], 'descending'))
            .toThrow(SectionOrderMismatchError);
    });

    it('reports every kind of mismatch', () => {
        const order = ['A', 'Q', 'A'].map(toSectionName);
        try {
            orderSections(summaries, order, 'descending');
            expect.unreachable('orderSections should throw');
        } catch (e) {
            expect(e).toBeInstanceOf(SectionOrderMismatchError);
            if (e instanceof SectionOrderMismatchError) {
                expect(e.missingFromPolicy).toEqual(['B']);
                expect(e.missingFromData).toEqual(['Q']);
                expect(e.duplicated).toEqual(['A']);
            }
        }
    });

    it('does not reorder the input array', () => {
        orderSections(summaries, 'count', 'ascending');
        expect(summaries.map(s => s.name)).toEqual(['A', 'B']);
    });
});
