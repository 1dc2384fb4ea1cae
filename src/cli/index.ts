// Re-export the runner and its collaborators

export * from './exit-codes.js';
export * from './help.js';
export * from './output.js';
export * from './run.js';
