// Re-export declaration model

export * from './errors.js';
export * from './parameter.js';
export * from './option.js';
export * from './flag.js';
export * from './argument.js';
export * from './command.js';
