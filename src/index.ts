/**
 * argtree - declarative command trees and an argv parser for them
 */

export * from './schema/index.js';
export * from './model/index.js';
export * from './parser/index.js';
export * from './cli/index.js';
export { debugLog, isDebugMode, findClosestName } from './utils/index.js';
export * from './strings/index.js';
