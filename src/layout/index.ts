/**
 * Layout Module Entry Point
 *
 * Provides a clean API for computing card grid layouts.
 * Uses a modular 6-step pipeline architecture.
 *
 * Usage:
 *   import { runCardGridPipeline } from './layout/index.js';
 *   import { parseGridConfig } from './config.js';
 *
 *   const result = runCardGridPipeline({ records, fields, config: parseGridConfig(literal) });
 *
 * Pipeline steps:
 *   1. groupRecords()     → GroupedModel
 *   2. planRows()         → RowPlannedModel
 *   3. planPage()         → PagePlan
 *   4. placeSections()    → PlacedModel
 *   5. composeSections()  → ComposedModel
 *   6. assembleScene()    → Scene
 */

export * from './pipeline/index.js';
