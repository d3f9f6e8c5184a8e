#!/usr/bin/env npx tsx
/**
 * Render a card grid from a JSON table.
 *
 * Usage:
 *   npm run render -- ./table.json ./options.json [./out.svg]
 *
 * table.json   - array of row objects
 * options.json - { "columns": { "section": ..., "title": ..., "subtitle": ..., "image"?: ... },
 *                  "layout": { ...grid config } }
 *
 * Without an output path the SVG is written next to the table file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parseGridConfig, formatIssues } from '../src/config.js';
import { InvalidConfigError, isCardGridError } from '../src/errors.js';
import { layoutTable, parseTableColumns, TableRow } from '../src/table.js';
import { renderSvg } from '../src/render/svg.js';

const OptionsFileSchema = z
    .object({
        columns: z.unknown(),
        layout: z.unknown().optional(),
    })
    .strict();

const TableFileSchema = z.array(z.record(z.unknown()));

function readJson(filePath: string): unknown {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function loadTable(filePath: string): TableRow[] {
    const result = TableFileSchema.safeParse(readJson(filePath));
    if (!result.success) {
        throw new InvalidConfigError(formatIssues(result.error).map(issue => `table ${issue}`));
    }
    return result.data;
}

function main(): void {
    const [tablePath, optionsPath, outArg] = process.argv.slice(2);

    if (!tablePath || !optionsPath) {
        console.error('Usage: npm run render -- <table.json> <options.json> [out.svg]');
        process.exit(1);
    }

    const options = OptionsFileSchema.safeParse(readJson(optionsPath));
    if (!options.success) {
        throw new InvalidConfigError(formatIssues(options.error));
    }

    const columns = parseTableColumns(options.data.columns);
    const config = parseGridConfig(options.data.layout ?? {});
    const rows = loadTable(tablePath);

    console.log(`Laying out ${rows.length} rows from ${tablePath}`);

    const result = layoutTable(rows, columns, config);
    const { diagnostics } = result;

    console.log(
        `  ${diagnostics.totalSections} sections, ${diagnostics.totalRows} rows, ` +
        `page ${result.scene.width}x${result.scene.height}`
    );
    if (diagnostics.placeholderImages > 0) {
        console.log(`  ${diagnostics.placeholderImages} card(s) drawn with a placeholder portrait`);
    }
    if (!diagnostics.validationPassed) {
        console.error('  Layout validation failed:');
        for (const error of diagnostics.errors) {
            console.error(`    - ${error}`);
        }
    }

    const outPath = outArg ?? path.join(
        path.dirname(tablePath),
        `${path.basename(tablePath, path.extname(tablePath))}.svg`
    );
    fs.writeFileSync(outPath, renderSvg(result.scene), 'utf-8');
    console.log(`Wrote ${outPath}`);
}

try {
    main();
} catch (error) {
    if (isCardGridError(error)) {
        console.error(`${error.kind}: ${error.message}`);
    } else {
        console.error(error);
    }
    process.exit(1);
}
