/**
 * @stowplan/engine - Export Module
 *
 * Packing reports and renderer colour maps.
 */

export * from './packingReport';
export * from './colorMap';
