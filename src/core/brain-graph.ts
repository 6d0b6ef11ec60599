/**
 * Brain Graph - node/edge container with adjacency indices
 * @module core/brain-graph
 */

import type { EdgeType, NodeCategory } from '../types/index.js';
import type { BrainNode } from './brain-node.js';
import type { BrainEdge } from './brain-edge.js';
import { DanglingReferenceError, DuplicateIdentifierError } from './errors.js';

/**
 * Brain Graph
 *
 * Nodes and edges keep insertion order, which every tie-break in the
 * simulation relies on. Each node also gets a compact integer index at
 * insertion time so the dynamics engine can work on flat arrays.
 *
 * @example
 * ```typescript
 * const graph = new BrainGraph();
 * graph.addNode(new BrainNode({ id: 'c_rain', category: 'concept', label: 'Rain' }));
 * graph.addNode(new BrainNode({ id: 'goal_inform', category: 'goal', label: 'Inform' }));
 * graph.addEdge(new BrainEdge({ sourceId: 'goal_inform', targetId: 'c_rain', type: 'excitatory', weight: 0.4 }));
 * graph.validate(); // []
 * ```
 */
export class BrainGraph {
  private nodeList: BrainNode[] = [];
  private edgeList: BrainEdge[] = [];
  private indexById: Map<string, number> = new Map();
  private outgoing: Map<string, BrainEdge[]> = new Map();
  private incoming: Map<string, BrainEdge[]> = new Map();

  /**
   * Insert a node
   * @throws {DuplicateIdentifierError} If the id is already present
   */
  addNode(node: BrainNode): void {
    if (this.indexById.has(node.id)) {
      throw new DuplicateIdentifierError(node.id);
    }
    this.indexById.set(node.id, this.nodeList.length);
    this.nodeList.push(node);
    this.outgoing.set(node.id, []);
    this.incoming.set(node.id, []);
  }

  /**
   * Insert an edge
   * @throws {DanglingReferenceError} If either endpoint is absent
   */
  addEdge(edge: BrainEdge): void {
    const out = this.outgoing.get(edge.sourceId);
    if (!out) {
      throw new DanglingReferenceError('source', edge.sourceId);
    }
    const inc = this.incoming.get(edge.targetId);
    if (!inc) {
      throw new DanglingReferenceError('target', edge.targetId);
    }
    this.edgeList.push(edge);
    out.push(edge);
    inc.push(edge);
  }

  get nodes(): readonly BrainNode[] {
    return this.nodeList;
  }

  get edges(): readonly BrainEdge[] {
    return this.edgeList;
  }

  get size(): number {
    return this.nodeList.length;
  }

  getNode(id: string): BrainNode | undefined {
    const index = this.indexById.get(id);
    return index === undefined ? undefined : this.nodeList[index];
  }

  hasNode(id: string): boolean {
    return this.indexById.has(id);
  }

  /**
   * Compact index of a node, or -1 when absent
   */
  indexOf(id: string): number {
    return this.indexById.get(id) ?? -1;
  }

  getOutgoing(id: string): readonly BrainEdge[] {
    return this.outgoing.get(id) ?? [];
  }

  getIncoming(id: string): readonly BrainEdge[] {
    return this.incoming.get(id) ?? [];
  }

  nodesByCategory(category: NodeCategory): BrainNode[] {
    return this.nodeList.filter(n => n.category === category);
  }

  resetActivations(): void {
    for (const node of this.nodeList) {
      node.reset();
    }
  }

  resetContributions(): void {
    for (const edge of this.edgeList) {
      edge.contribution = 0;
    }
  }

  /**
   * Structural problems, in discovery order. Never throws.
   */
  validate(): string[] {
    const problems: string[] = [];
    for (const edge of this.edgeList) {
      if (!this.indexById.has(edge.sourceId)) {
        problems.push(`Edge references missing source: ${edge.sourceId}`);
      }
      if (!this.indexById.has(edge.targetId)) {
        problems.push(`Edge references missing target: ${edge.targetId}`);
      }
    }
    if (this.nodesByCategory('goal').length === 0) {
      problems.push('No goal nodes defined in graph');
    }
    return problems;
  }

  categoryCounts(): Record<NodeCategory, number> {
    const counts: Record<NodeCategory, number> = {
      concept: 0, topic: 0, emotion: 0, goal: 0, motor: 0, lexeme: 0,
    };
    for (const node of this.nodeList) {
      counts[node.category]++;
    }
    return counts;
  }

  edgeTypeCounts(): Partial<Record<EdgeType, number>> {
    const counts: Partial<Record<EdgeType, number>> = {};
    for (const edge of this.edgeList) {
      counts[edge.type] = (counts[edge.type] ?? 0) + 1;
    }
    return counts;
  }

  summary(): string {
    return `${this.nodeList.length} nodes, ${this.edgeList.length} edges`;
  }
}
