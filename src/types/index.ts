/**
 * Cortex Chat TypeScript Type Definitions
 * @module cortex-types
 * @version 1.0.0
 */

// ============================================================================
// Enums (as string literal types for easier use)
// ============================================================================

/** Node categories, in the order competition visits them */
export const NODE_CATEGORIES = ['concept', 'topic', 'emotion', 'goal', 'motor', 'lexeme'] as const;

/** Category tag of a brain node */
export type NodeCategory = (typeof NODE_CATEGORIES)[number];

/** Edge types */
export const EDGE_TYPES = ['excitatory', 'inhibitory', 'associative', 'causal'] as const;

/** Type tag of a directed edge */
export type EdgeType = (typeof EDGE_TYPES)[number];

/**
 * Part-of-speech tag. Lexicon files may carry tags outside the transition
 * table, so this stays an open string.
 */
export type PartOfSpeech = string;

export function isNodeCategory(value: string): value is NodeCategory {
  return NODE_CATEGORIES.some(category => category === value);
}

export function isEdgeType(value: string): value is EdgeType {
  return EDGE_TYPES.some(type => type === value);
}

// ============================================================================
// Graph Types
// ============================================================================

/** Construction input for a node */
export interface NodeDefinition {
  id: string;
  category: NodeCategory | string;
  label: string;
  baseline?: number;
  decay?: number;
  threshold?: number;
  metadata?: Record<string, string>;
}

/** Construction input for an edge */
export interface EdgeDefinition {
  sourceId: string;
  targetId: string;
  type: EdgeType | string;
  weight?: number;
}

// ============================================================================
// Dynamics Types
// ============================================================================

/** Named session parameters, nominal range [0,1] */
export type Modulators = Record<string, number>;

/** Initial activation injections, node id -> additive amount */
export type ActivationMap = Record<string, number>;

/** Dynamics run configuration */
export interface DynamicsConfig {
  steps: number;
  inhibitionStrength: number;
  competitionWithinCategory: boolean;
}

/** A node that was firing at the end of a step */
export interface FiringNode {
  id: string;
  activation: number;
}

/** Observability record for one simulation step */
export interface StepRecord {
  step: number;
  topFiring: FiringNode[];
}

/** Edge credit-assignment entry */
export interface ContributingEdge {
  sourceId: string;
  targetId: string;
  type: EdgeType;
  contribution: number;
}

/** Output of a dynamics run */
export interface DynamicsResult {
  steps: StepRecord[];
  finalActivations: Record<string, number>;
  topContributingEdges: ContributingEdge[];
}

// ============================================================================
// Goal Types
// ============================================================================

export interface GoalCandidate {
  id: string;
  activation: number;
}

export interface GoalResult {
  candidates: GoalCandidate[];
  selectedGoal: string | null;
  selectedActivation: number;
}

// ============================================================================
// Language Types
// ============================================================================

/** A lexicon record: word or multi-word phrase */
export interface LexiconEntry {
  id: string;
  text: string;
  conceptIds: string[];
  pos: PartOfSpeech;
}

/** Vocabulary capability consumed by the motor generator */
export interface VocabularyLookup {
  wordsForConcept(conceptId: string): readonly string[];
  lookup(form: string): LexiconEntry | undefined;
}

/** A scored surface form tied to the node that produced it */
export interface WordCandidate {
  word: string;
  sourceId: string;
  activation: number;
  pos: PartOfSpeech;
  score: number;
  reason: string;
}

/** Output of a generation call */
export interface MotorResult {
  candidatesConsidered: WordCandidate[];
  selectedWords: WordCandidate[];
  finalText: string;
}

/** Options for a generation call */
export interface MotorOptions {
  recentWords?: readonly string[];
  maxWords?: number;
}

// ============================================================================
// Perception & Memory Types
// ============================================================================

export interface TextMatch {
  text: string;
  conceptIds: string[];
}

export interface PerceptionResult {
  rawInput: string;
  tokens: string[];
  matchedPhrases: TextMatch[];
  matchedWords: TextMatch[];
  activatedConcepts: ActivationMap;
  synonymMappings: Record<string, string>;
  removedStopwords: string[];
}

/** One stored conversational turn */
export interface Episode {
  id: string;
  turn: number;
  userText: string;
  systemText: string;
  concepts: string[];
  goal: string;
  createdAt: string;
}

/** Persistence capability for episodes */
export interface IEpisodeStore {
  init(): Promise<void>;
  close(): Promise<void>;
  append(episode: Episode): Promise<void>;
  loadAll(): Promise<Episode[]>;
  clear(): Promise<void>;
  count(): Promise<number>;
}
