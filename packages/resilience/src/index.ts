// Resilience primitives for async operations
export * from './circuit-breaker.js';
export * from './retry-policy.js';
export * from './timeout-handler.js';
export * from './registry.js';
export * from './compose.js';
export * from './config.js';
export * from './errors.js';
export * from './effects.js';

// Export pure functional core functions
export * from './core/index.js';
