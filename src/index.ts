/**
 * Tracegen: tracepoint declarations to driver instrumentation code.
 *
 * Public exports for programmatic use. The `tracegen` binary lives in
 * ./cli/main.
 */

export * from './domain';
export * from './dsl';
export * from './codegen';
export * from './config';
export * from './definitions/tu-tracepoints';
export * from './logger';
export * from './cli/args';
export * from './cli/main';
