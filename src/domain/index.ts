/**
 * Domain model exports.
 */

export * from './errors';
export * from './provenance';
export * from './tracepoint';
