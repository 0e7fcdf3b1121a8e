/**
 * Declaration model exports.
 */

export * from './registry';
export * from './schema';
export * from './scoped-events';
export * from './validator';
