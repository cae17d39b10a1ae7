// Imperative shell
export * from './client.js';
export * from './circuit-breaker.js';
export * from './rate-limiter.js';
export * from './connection-slots.js';
export * from './config.js';
export * from './errors.js';
export * from './list-query.js';
export * from './pagination.js';
export type * from './types.js';

// Instrumentation
export * from './instrumentation.js';

// Functional core (for advanced usage and testing)
export * from './core/index.js';
