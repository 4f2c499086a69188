// Functional core exports
// Pure functions for breaker and backoff logic

export * from './backoff.js';
export * from './circuit-breaker.js';
export * from './types.js';
