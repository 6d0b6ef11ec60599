/**
 * Services Layer Export
 * @module services
 */

export * from './perception.js';
export * from './memory.js';
export * from './trace.js';
export * from './conversation-engine.js';
