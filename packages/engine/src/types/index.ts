/**
 * @stowplan/engine - Type Definitions
 */

export * from './packingTypes';
export * from './catalogTypes';
