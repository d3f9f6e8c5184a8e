/**
 * card-grid public API
 */

export * from './types.js';
export * from './errors.js';
export * from './scene.js';
export { resolveColor, uniformColor, colorByKey } from './color.js';
export {
    parseGridConfig,
    formatIssues,
    GridConfigSchema,
    ColorSourceSchema,
    DEFAULT_GRID_CONFIG,
    type GridConfigInput
} from './config.js';
export {
    tableFields,
    layoutTable,
    parseTableColumns,
    cellText,
    TableColumnsSchema,
    type TableColumns,
    type TableRow
} from './table.js';
export { renderSvg, googleFontImport, type SvgOptions } from './render/svg.js';
export * from './layout/index.js';
