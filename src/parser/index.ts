// Re-export parser

export * from './context.js';
export * from './diagnostics.js';
export * from './engine.js';
