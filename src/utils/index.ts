// Re-export utilities

export { debugLog, isDebugMode } from './debug.js';
export { findClosestName, levenshteinDistance } from './suggest.js';
