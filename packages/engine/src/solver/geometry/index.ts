/**
 * Geometry Module - Barrel Export
 * Box primitives shared by the engine and the validation pipeline
 */

export * from './types';
export * from './boxMath';
export * from './validation';
