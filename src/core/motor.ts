/**
 * Motor Generator - settled activation to an ordered word sequence
 *
 * No templates: candidates come from firing nodes through the vocabulary,
 * and a part-of-speech transition table decides which tags may follow.
 *
 * @module core/motor
 */

import type {
  MotorOptions,
  MotorResult,
  NodeCategory,
  PartOfSpeech,
  VocabularyLookup,
  WordCandidate,
} from '../types/index.js';
import type { BrainGraph } from './brain-graph.js';
import type { BrainNode } from './brain-node.js';
import type { Rng } from './rng.js';
import { coreLogger } from '../utils/logger.js';

const logger = coreLogger.child('motor');

export const START = 'START';
export const END = 'END';
export const FALLBACK_UTTERANCE = 'i am processing';
export const DEFAULT_MAX_WORDS = 15;

export const MAX_SOURCE_CONCEPTS = 25;
export const RECENT_WINDOW = 20;
export const CONCEPT_SCORE_FACTOR = 0.6;
export const MOTOR_SCORE_FACTOR = 0.5;
export const REPETITION_PENALTY = 0.3;
export const TOP_TIER_RATIO = 0.85;
export const DIVERSITY_DECAY = 0.5;

/** Given the current tag, which tags may follow */
export const POS_TRANSITIONS: Readonly<Record<string, readonly PartOfSpeech[]>> = Object.freeze({
  START: ['noun', 'adj', 'det', 'pronoun', 'interjection', 'verb', 'adverb'],
  det: ['noun', 'adj'],
  adj: ['noun', 'adj', 'conjunction'],
  noun: ['verb', 'conjunction', 'prep', 'noun', 'adj', 'END'],
  pronoun: ['verb', 'adverb'],
  verb: ['noun', 'adj', 'det', 'adverb', 'prep', 'pronoun', 'END'],
  adverb: ['verb', 'adj', 'adverb', 'END'],
  prep: ['noun', 'det', 'adj', 'pronoun'],
  conjunction: ['noun', 'det', 'adj', 'verb', 'pronoun'],
  interjection: ['noun', 'det', 'pronoun', 'verb', 'END'],
});

/** Used for a tag the table does not know */
export const UNKNOWN_TAG_TRANSITIONS: readonly PartOfSpeech[] = ['noun', 'verb', 'adj'];

export const GOAL_AFFINITY_BOOST: Readonly<Record<string, number>> = Object.freeze({
  goal_inform: 0.3,
  goal_greet: 0.4,
  goal_describe: 0.3,
  goal_farewell: 0.4,
  goal_clarify: 0.2,
});

export const DEFAULT_GOAL_AFFINITY = 0.1;

const CONCEPTUAL: ReadonlySet<NodeCategory> = new Set(['concept', 'topic', 'emotion']);
const ARTICULATORY: ReadonlySet<NodeCategory> = new Set(['motor', 'lexeme']);

export function allowedAfter(pos: PartOfSpeech): readonly PartOfSpeech[] {
  return Object.hasOwn(POS_TRANSITIONS, pos) ? POS_TRANSITIONS[pos] : UNKNOWN_TAG_TRANSITIONS;
}

export function goalAffinityBoost(goalId: string): number {
  return Object.hasOwn(GOAL_AFFINITY_BOOST, goalId) ? GOAL_AFFINITY_BOOST[goalId] : DEFAULT_GOAL_AFFINITY;
}

/**
 * Firing concept/topic/emotion nodes, concepts first, then by activation
 */
function rankConceptualSources(graph: BrainGraph): BrainNode[] {
  return graph.nodes
    .filter(node => CONCEPTUAL.has(node.category) && node.isFiring())
    .map(node => ({ node, priority: node.category === 'concept' ? 1.0 : 0.5 }))
    .sort((a, b) => b.priority - a.priority || b.node.activation - a.node.activation)
    .slice(0, MAX_SOURCE_CONCEPTS)
    .map(entry => entry.node);
}

function buildCandidates(
  graph: BrainGraph,
  vocabulary: VocabularyLookup,
  goalId: string,
  recent: ReadonlySet<string>
): WordCandidate[] {
  const candidates: WordCandidate[] = [];
  const goalNode = graph.getNode(goalId);
  const boost = goalAffinityBoost(goalId);

  for (const source of rankConceptualSources(graph)) {
    const goalEdge = goalNode
      ? graph.getOutgoing(goalNode.id).find(edge => edge.targetId === source.id)
      : undefined;

    for (const word of vocabulary.wordsForConcept(source.id)) {
      const entry = vocabulary.lookup(word);
      if (!entry) continue;

      let score = source.activation * CONCEPT_SCORE_FACTOR;
      if (goalEdge) {
        score += boost * Math.abs(goalEdge.weight);
      }
      if (recent.has(word)) {
        score *= REPETITION_PENALTY;
      }

      candidates.push({
        word,
        sourceId: source.id,
        activation: source.activation,
        pos: entry.pos,
        score,
        reason: `concept=${source.id} act=${source.activation.toFixed(2)} goal_match=${goalId}`,
      });
    }
  }

  for (const source of graph.nodes) {
    if (!ARTICULATORY.has(source.category) || !source.isFiring()) continue;

    for (const word of vocabulary.wordsForConcept(source.id)) {
      const entry = vocabulary.lookup(word);
      if (!entry) continue;

      let score = source.activation * MOTOR_SCORE_FACTOR;
      if (recent.has(word)) {
        score *= REPETITION_PENALTY;
      }

      candidates.push({
        word,
        sourceId: source.id,
        activation: source.activation,
        pos: entry.pos,
        score,
        reason: `motor/lexeme node=${source.id}`,
      });
    }
  }

  return candidates;
}

/**
 * Walk the transition table, choosing one candidate per position.
 *
 * Among eligible candidates, those scoring at least 85% of the best form a
 * tier; the pick within a tier is the only use of the random source.
 */
function assemble(
  candidates: WordCandidate[],
  rng: Rng,
  maxWords: number
): WordCandidate[] {
  const selected: WordCandidate[] = [];
  const used = new Set<string>();
  let state: PartOfSpeech = START;

  while (selected.length < maxWords) {
    const allowed = allowedAfter(state);
    let eligible = candidates.filter(c => allowed.includes(c.pos) && !used.has(c.word));
    if (eligible.length === 0) {
      eligible = candidates.filter(c => !used.has(c.word));
      if (eligible.length === 0) break;
    }

    eligible.sort((a, b) => b.score - a.score);
    const cutoff = eligible[0].score * TOP_TIER_RATIO;
    const tier = eligible.filter(c => c.score >= cutoff);
    const chosen = tier.length > 1 ? tier[rng.between(0, tier.length - 1)] : tier[0];

    selected.push({ ...chosen });
    used.add(chosen.word);
    state = chosen.pos;

    if (state === END || selected.length >= maxWords) break;

    for (const c of candidates) {
      if (c.sourceId === chosen.sourceId) {
        c.score *= DIVERSITY_DECAY;
      }
    }
  }

  return selected;
}

/**
 * Generate an utterance from the settled graph.
 *
 * @param goalId - the arbitrated goal; its outgoing edges boost the nodes they reach
 * @param rng - session-owned random source, advanced only on tier ties
 */
export function generateResponse(
  graph: BrainGraph,
  vocabulary: VocabularyLookup,
  goalId: string,
  rng: Rng,
  options: MotorOptions = {}
): MotorResult {
  const maxWords = options.maxWords ?? DEFAULT_MAX_WORDS;
  const recent = new Set((options.recentWords ?? []).slice(-RECENT_WINDOW));

  const candidates = buildCandidates(graph, vocabulary, goalId, recent);
  if (candidates.length === 0) {
    logger.debug('no candidates, using fallback utterance', { goalId });
    return { candidatesConsidered: [], selectedWords: [], finalText: FALLBACK_UTTERANCE };
  }

  const candidatesConsidered = candidates
    .map(c => ({ ...c }))
    .sort((a, b) => b.score - a.score);

  const selectedWords = assemble(candidates, rng, maxWords);
  logger.debug('utterance assembled', {
    goalId,
    candidates: candidates.length,
    words: selectedWords.length,
  });

  return {
    candidatesConsidered,
    selectedWords,
    finalText: selectedWords.map(w => w.word).join(' '),
  };
}
