/**
 * Goal Arbitration - pick the dominant intent from the settled graph
 * @module core/goals
 */

import type { GoalCandidate, GoalResult } from '../types/index.js';
import type { BrainGraph } from './brain-graph.js';

/**
 * Rank goal nodes by activation (ties keep graph order) and select the top.
 *
 * The leader is selected even when it is not firing, so a turn always has
 * an intent. With no goal nodes the selection is null and the caller
 * substitutes its own default.
 */
export function selectGoal(graph: BrainGraph): GoalResult {
  const candidates: GoalCandidate[] = graph
    .nodesByCategory('goal')
    .map(node => ({ id: node.id, activation: node.activation }))
    .sort((a, b) => b.activation - a.activation);

  if (candidates.length === 0) {
    return { candidates, selectedGoal: null, selectedActivation: 0 };
  }

  return {
    candidates,
    selectedGoal: candidates[0].id,
    selectedActivation: candidates[0].activation,
  };
}
