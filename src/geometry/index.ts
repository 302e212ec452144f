/**
 * Geometry Module Index
 *
 * Exports geometry types, containment tests and bounds
 */

export * from './types.js';
export * from './containment.js';
export * from './bounds.js';
