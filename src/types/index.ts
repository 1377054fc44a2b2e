/**
 * Type exports
 */

export * from './symbols.js';
export * from './summary.js';
