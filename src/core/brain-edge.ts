/**
 * Brain Edge - a directed, typed, weighted connection
 * @module core/brain-edge
 */

import { isEdgeType, type EdgeDefinition, type EdgeType } from '../types/index.js';
import { InvalidEdgeTypeError, WeightRangeError } from './errors.js';

export const DEFAULT_EDGE_WEIGHT = 0.5;

export class BrainEdge {
  readonly sourceId: string;
  readonly targetId: string;
  readonly type: EdgeType;
  readonly weight: number;
  /** Running sum of |spread| pushed through this edge in the current run */
  contribution: number = 0;

  constructor(def: EdgeDefinition) {
    if (!isEdgeType(def.type)) {
      throw new InvalidEdgeTypeError(def.type);
    }
    const weight = def.weight ?? DEFAULT_EDGE_WEIGHT;
    if (!(weight >= -1 && weight <= 1)) {
      throw new WeightRangeError(weight);
    }
    this.sourceId = def.sourceId;
    this.targetId = def.targetId;
    this.type = def.type;
    this.weight = weight;
  }

  toString(): string {
    return `Edge(${this.sourceId}->${this.targetId}, ${this.type}, w=${this.weight.toFixed(3)})`;
  }
}
