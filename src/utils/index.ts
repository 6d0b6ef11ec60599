/**
 * Utility Functions Export
 * @module utils
 */

export * from './hash.js';
export * from './logger.js';
export * from './serial-queue.js';
