/**
 * Dynamics Engine - fixed-step spreading activation
 *
 * Per step, strictly in this order:
 *   1. decay toward baseline
 *   2. spread along edges from firing sources (deltas applied after all edges)
 *   3. rank-based competition within each node category
 *   4. clamp to [0,1]
 *   5. record the top firing nodes
 *
 * Edge contributions accumulate |spread| for credit assignment.
 *
 * @module core/dynamics
 */

import {
  NODE_CATEGORIES,
  type ActivationMap,
  type ContributingEdge,
  type DynamicsConfig,
  type DynamicsResult,
  type FiringNode,
  type Modulators,
  type StepRecord,
} from '../types/index.js';
import type { BrainGraph } from './brain-graph.js';
import { coreLogger } from '../utils/logger.js';

const logger = coreLogger.child('dynamics');

export const STEP_RECORD_SIZE = 8;
export const TOP_EDGE_COUNT = 10;
export const CAUSAL_SCALE = 0.8;
export const DEFAULT_CURIOSITY = 0.5;

export const DEFAULT_DYNAMICS_CONFIG: Readonly<DynamicsConfig> = Object.freeze({
  steps: 20,
  inhibitionStrength: 0.15,
  competitionWithinCategory: true,
});

/**
 * Fresh default modulator mapping. Callers own the returned object.
 */
export function createDefaultModulators(): Modulators {
  return { curiosity: 0.5, calm: 0.5, urgency: 0.3 };
}

/**
 * Flat per-run view of the graph, indexed by the graph's compact node index
 */
interface Arena {
  activation: Float64Array;
  baseline: Float64Array;
  decay: Float64Array;
  threshold: Float64Array;
  edgeSource: Int32Array;
  edgeTarget: Int32Array;
  edgeWeight: Float64Array;
  /** type transform factor applied after source * weight */
  edgeScale: Float64Array;
  edgeInhibitory: Uint8Array;
  contribution: Float64Array;
  categoryMembers: number[][];
}

function buildArena(graph: BrainGraph, curiosity: number): Arena {
  const nodes = graph.nodes;
  const edges = graph.edges;
  const n = nodes.length;
  const m = edges.length;

  const arena: Arena = {
    activation: new Float64Array(n),
    baseline: new Float64Array(n),
    decay: new Float64Array(n),
    threshold: new Float64Array(n),
    edgeSource: new Int32Array(m),
    edgeTarget: new Int32Array(m),
    edgeWeight: new Float64Array(m),
    edgeScale: new Float64Array(m),
    edgeInhibitory: new Uint8Array(m),
    contribution: new Float64Array(m),
    categoryMembers: NODE_CATEGORIES.map((): number[] => []),
  };

  nodes.forEach((node, i) => {
    arena.activation[i] = node.activation;
    arena.baseline[i] = node.baseline;
    arena.decay[i] = node.decay;
    arena.threshold[i] = node.threshold;
    arena.categoryMembers[NODE_CATEGORIES.indexOf(node.category)].push(i);
  });

  const associativeScale = 0.5 + curiosity * 0.5;
  edges.forEach((edge, e) => {
    arena.edgeSource[e] = graph.indexOf(edge.sourceId);
    arena.edgeTarget[e] = graph.indexOf(edge.targetId);
    arena.edgeWeight[e] = edge.weight;
    arena.edgeScale[e] = 1;
    switch (edge.type) {
      case 'inhibitory':
        arena.edgeInhibitory[e] = 1;
        break;
      case 'associative':
        arena.edgeScale[e] = associativeScale;
        break;
      case 'causal':
        arena.edgeScale[e] = CAUSAL_SCALE;
        break;
      default:
        break;
    }
  });

  return arena;
}

function decayStep(arena: Arena): void {
  const { activation, baseline, decay } = arena;
  for (let i = 0; i < activation.length; i++) {
    activation[i] += (baseline[i] - activation[i]) * decay[i];
  }
}

/**
 * Source activations are read before any delta of this step is applied.
 */
function spreadStep(arena: Arena, deltas: Float64Array): void {
  const { activation, threshold, edgeSource, edgeTarget, edgeWeight, edgeScale, edgeInhibitory, contribution } = arena;
  deltas.fill(0);
  for (let e = 0; e < edgeSource.length; e++) {
    const s = edgeSource[e];
    if (activation[s] < threshold[s]) continue;
    let spread = activation[s] * edgeWeight[e];
    if (edgeInhibitory[e] === 1) {
      spread = -Math.abs(spread);
    } else if (edgeScale[e] !== 1) {
      spread *= edgeScale[e];
    }
    deltas[edgeTarget[e]] += spread;
    contribution[e] += Math.abs(spread);
  }
  for (let i = 0; i < activation.length; i++) {
    activation[i] += deltas[i];
  }
}

/**
 * Ranks on pre-clamp activation; the leader of each category is untouched.
 */
function competitionStep(arena: Arena, inhibitionStrength: number): void {
  const { activation, threshold } = arena;
  for (const members of arena.categoryMembers) {
    if (members.length <= 1) continue;
    const firing = members.filter(i => activation[i] >= threshold[i]);
    if (firing.length <= 1) continue;
    firing.sort((a, b) => activation[b] - activation[a]);
    for (let rank = 1; rank < firing.length; rank++) {
      activation[firing[rank]] -= inhibitionStrength * (rank / firing.length);
    }
  }
}

function clampStep(arena: Arena): void {
  const { activation } = arena;
  for (let i = 0; i < activation.length; i++) {
    activation[i] = Math.max(0, Math.min(1, activation[i]));
  }
}

function recordStep(arena: Arena, graph: BrainGraph, step: number): StepRecord {
  const { activation, threshold } = arena;
  const firing: FiringNode[] = [];
  graph.nodes.forEach((node, i) => {
    if (activation[i] >= threshold[i]) {
      firing.push({ id: node.id, activation: activation[i] });
    }
  });
  firing.sort((a, b) => b.activation - a.activation);
  return { step, topFiring: firing.slice(0, STEP_RECORD_SIZE) };
}

/**
 * Run the activation-spreading simulation.
 *
 * Resets activations and contributions, adds each injection to its node
 * (capped at 1, unknown ids ignored), then iterates `config.steps` times.
 * The settled state is written back to the graph's nodes and edges.
 *
 * @param injections - node id -> additive activation
 * @param modulators - session modulators; `curiosity` scales associative spread
 */
export function runDynamics(
  graph: BrainGraph,
  injections: ActivationMap,
  config: DynamicsConfig = DEFAULT_DYNAMICS_CONFIG,
  modulators: Modulators = createDefaultModulators()
): DynamicsResult {
  const done = logger.time('dynamics run');

  graph.resetActivations();
  graph.resetContributions();

  for (const [id, amount] of Object.entries(injections)) {
    const node = graph.getNode(id);
    if (node) {
      node.activation = Math.min(1, node.activation + amount);
    }
  }

  const curiosity = modulators.curiosity ?? DEFAULT_CURIOSITY;
  const arena = buildArena(graph, curiosity);
  const deltas = new Float64Array(arena.activation.length);
  const steps: StepRecord[] = [];

  for (let step = 0; step < config.steps; step++) {
    decayStep(arena);
    spreadStep(arena, deltas);
    if (config.competitionWithinCategory) {
      competitionStep(arena, config.inhibitionStrength);
    }
    clampStep(arena);
    steps.push(recordStep(arena, graph, step));
  }

  const finalActivations: Record<string, number> = Object.fromEntries(
    graph.nodes.map((node, i): [string, number] => {
      node.activation = arena.activation[i];
      return [node.id, node.activation];
    })
  );
  graph.edges.forEach((edge, e) => {
    edge.contribution = arena.contribution[e];
  });

  const topContributingEdges: ContributingEdge[] = [...graph.edges]
    .sort((a, b) => b.contribution - a.contribution)
    .slice(0, TOP_EDGE_COUNT)
    .map(edge => ({
      sourceId: edge.sourceId,
      targetId: edge.targetId,
      type: edge.type,
      contribution: edge.contribution,
    }));

  done();
  logger.debug('dynamics settled', {
    steps: config.steps,
    firing: steps.length > 0 ? steps[steps.length - 1].topFiring.length : 0,
  });

  return { steps, finalActivations, topContributingEdges };
}
