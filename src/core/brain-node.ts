/**
 * Brain Node - a labeled unit of activation
 * @module core/brain-node
 */

import { isNodeCategory, type NodeCategory, type NodeDefinition } from '../types/index.js';
import { InvalidCategoryError } from './errors.js';

export const DEFAULT_BASELINE = 0.0;
export const DEFAULT_DECAY = 0.05;
export const DEFAULT_THRESHOLD = 0.3;

/**
 * A node in the brain graph.
 *
 * `activation` is the only field the dynamics engine mutates. It sits in
 * [0,1] at the end of every step but may leave that range mid-step.
 */
export class BrainNode {
  readonly id: string;
  readonly category: NodeCategory;
  readonly label: string;
  readonly baseline: number;
  readonly decay: number;
  readonly threshold: number;
  /** Opaque attachment, ignored by every algorithm */
  readonly metadata: Record<string, string>;
  activation: number;

  constructor(def: NodeDefinition) {
    if (!isNodeCategory(def.category)) {
      throw new InvalidCategoryError(def.category);
    }
    this.id = def.id;
    this.category = def.category;
    this.label = def.label;
    this.baseline = def.baseline ?? DEFAULT_BASELINE;
    this.decay = def.decay ?? DEFAULT_DECAY;
    this.threshold = def.threshold ?? DEFAULT_THRESHOLD;
    this.metadata = { ...def.metadata };
    this.activation = this.baseline;
  }

  reset(): void {
    this.activation = this.baseline;
  }

  clamp(): void {
    this.activation = Math.max(0, Math.min(1, this.activation));
  }

  isFiring(): boolean {
    return this.activation >= this.threshold;
  }

  toString(): string {
    return `Node(${this.id}, ${this.category}, act=${this.activation.toFixed(3)})`;
  }
}
