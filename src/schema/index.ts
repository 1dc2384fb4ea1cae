// Re-export value-level types

export * from './arity.js';
export * from './value-types.js';
export * from './config.js';
