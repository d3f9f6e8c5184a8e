import { describe, it, expect } from 'vitest';
import { cellText, layoutTable, parseTableColumns, tableFields, TableRow } from '../table.js';
import { parseGridConfig } from '../config.js';
import { InvalidConfigError } from '../errors.js';
import { FIXTURE_COLUMNS, loadFixture } from '../layout/__tests__/helpers/loadFixture.js';

describe('cellText', () => {
    it.each([
        [null, ''],
        [undefined, ''],
        ['Ada', 'Ada'],
        [42, '42'],
        [true, 'true'],
        [['a', 1], '["a",1]']
    ])('%j → %j', (value, expected) => {
        expect(cellText(value)).toBe(expected);
    });
});

describe('parseTableColumns', () => {
    it('accepts the required columns', () => {
        expect(parseTableColumns({ section: 'party', title: 'name', subtitle: 'ward' }))
            .toEqual({ section: 'party', title: 'name', subtitle: 'ward' });
    });

    it('rejects a missing column', () => {
        expect(() => parseTableColumns({ section: 'party', title: 'name' })).toThrow(InvalidConfigError);
    });
});

describe('tableFields', () => {
    const row: TableRow = { party: 'Greens', name: 'Ada Quill', ward: 7, photo: '  ', id: 3 };

    it('reads cells as text', () => {
        const fields = tableFields({ section: 'party', title: 'name', subtitle: 'ward' });

        expect(fields.sectionKey(row)).toBe('Greens');
        expect(fields.title(row)).toBe('Ada Quill');
        expect(fields.subtitle(row)).toBe('7');
        expect(fields.image(row)).toBeNull();
        expect(fields.rowIndex).toBeUndefined();
    });

    it('treats a blank image cell as missing', () => {
        const fields = tableFields({ section: 'party', title: 'name', subtitle: 'ward', image: 'photo' });
        expect(fields.image(row)).toBeNull();
        expect(fields.image({ ...row, photo: 'ada.png' })).toBe('ada.png');
    });

    it('returns null for a missing section cell', () => {
        const fields = tableFields({ section: 'party', title: 'name', subtitle: 'ward' });
        expect(fields.sectionKey({ name: 'Ben' })).toBeNull();
    });

    it('reads the row index column', () => {
        const fields = tableFields({ section: 'party', title: 'name', subtitle: 'ward', rowIndex: 'id' });
        expect(fields.rowIndex?.(row)).toBe(3);
        expect(() => fields.rowIndex?.({ ...row, id: '3' })).toThrow(InvalidConfigError);
    });
});

describe('layoutTable', () => {
    it('lays out a fixture in one call', () => {
        const result = layoutTable(loadFixture('two-sections'), FIXTURE_COLUMNS, parseGridConfig({
            pageWidth: 520,
            headSize: 30,
            sectionHead: { showTotals: true }
        }));

        expect(result.placed.sections.map(s => s.label.text)).toEqual(['A: 7', 'B: 5']);
        expect(result.diagnostics.placeholderImages).toBe(1);
        expect(result.scene.height).toBe(380);
    });
});
