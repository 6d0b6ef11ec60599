/**
 * Cortex Chat - conversation from spreading activation
 *
 * @module cortex-chat
 * @version 1.0.0
 */

// Types
export * from './types/index.js';

// Graph, dynamics, goals, motor
export * from './core/index.js';

// Lexicon and definition loaders
export { Lexicon } from './language/lexicon.js';
export { parseGraph, loadGraph } from './loaders/graph-loader.js';
export { parseLexicon, loadLexicon } from './loaders/lexicon-loader.js';

// Storage
export * from './storage/index.js';

// Events
export * from './events/index.js';

// Services
export * from './services/index.js';

// API
export * from './api/index.js';

// Configuration
export * from './config.js';

// Utilities
export * from './utils/index.js';
