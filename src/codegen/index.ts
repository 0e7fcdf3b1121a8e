/**
 * Code generation exports.
 */

export * from './engine';
export * from './naming';
export * from './perfetto-header';
export * from './types';
export * from './utrace-header';
export * from './utrace-source';
