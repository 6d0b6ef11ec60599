/**
 * Core Module Export
 * @module core
 *
 * Graph model, dynamics engine, goal arbitration and motor generator.
 */

export * from './errors.js';
export * from './brain-node.js';
export * from './brain-edge.js';
export * from './brain-graph.js';
export * from './dynamics.js';
export * from './goals.js';
export * from './rng.js';
export * from './motor.js';
