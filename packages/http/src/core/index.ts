// Functional core exports
// Pure functions for request-execution logic

export * from './circuit-breaker.js';
export * from './error-classifier.js';
export * from './http-utils.js';
export * from './rate-limit.js';
export * from './retry-policy.js';
export * from './types.js';
