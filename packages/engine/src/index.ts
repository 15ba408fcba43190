/**
 * @stowplan/engine
 *
 * Container loading engine and its supporting utilities:
 * - Item catalog parsing with unit conversion
 * - First-fit 3D packing with six-way rotation
 * - Geometry validation of finished plans
 * - Packing reports and renderer colour maps
 */

// Types - pure type definitions only
export * from './types';

// Parser - item catalog parsing
export * from './parser';

// Solver - packing engine, anchors, validation
export * from './solver';

// Export - reports and colour maps
export * from './export';
