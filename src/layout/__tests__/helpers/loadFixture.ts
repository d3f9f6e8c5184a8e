/**
 * Load test fixtures from the test/ directory.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { TableRow } from '../../../table.js';

const FixtureSchema = z.array(z.record(z.unknown()));

/**
 * Load a JSON table fixture by name (without .json extension).
 */
export function loadFixture(name: string): TableRow[] {
    const fixturePath = join(process.cwd(), 'test', `${name}.json`);
    const content = readFileSync(fixturePath, 'utf-8');
    return FixtureSchema.parse(JSON.parse(content));
}

/** Column mapping used by every fixture in test/ */
export const FIXTURE_COLUMNS = {
    section: 'team',
    title: 'name',
    subtitle: 'role',
    image: 'photo',
    rowIndex: 'id'
} as const;
