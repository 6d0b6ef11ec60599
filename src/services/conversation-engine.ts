/**
 * Conversation Engine - one turn from text in to text out
 *
 * Pipeline per turn:
 * 1. Perception: text -> concept activations
 * 2. Memory: recall boosts from related episodes
 * 3. Dynamics: spread, compete and settle
 * 4. Goal arbitration
 * 5. Motor generation
 * 6. Bookkeeping: recent words, memory, modulators, events, persistence
 *
 * Steps 1-6 run synchronously; only the optional episode append awaits.
 *
 * @module services/conversation-engine
 */

import * as fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import type {
  ActivationMap,
  DynamicsConfig,
  DynamicsResult,
  GoalResult,
  IEpisodeStore,
  Modulators,
  MotorResult,
  NodeCategory,
  PerceptionResult,
} from '../types/index.js';
import type { BrainGraph } from '../core/brain-graph.js';
import { DEFAULT_DYNAMICS_CONFIG, runDynamics } from '../core/dynamics.js';
import { selectGoal } from '../core/goals.js';
import { generateResponse } from '../core/motor.js';
import { createRng, type Rng } from '../core/rng.js';
import type { Lexicon } from '../language/lexicon.js';
import { parseGraph } from '../loaders/graph-loader.js';
import { parseLexicon } from '../loaders/lexicon-loader.js';
import { EventBus, type EngineEventMap, type EngineEventType } from '../events/event-bus.js';
import { hashText, shortDigest, snapshotDigest } from '../utils/hash.js';
import { servicesLogger } from '../utils/logger.js';
import { InputProcessor } from './perception.js';
import { ConversationMemory } from './memory.js';
import { TRACE_CANDIDATE_LIMIT, createTrace, type Trace } from './trace.js';

const logger = servicesLogger.child('engine');
const SOURCE = 'conversation-engine';

export const DEFAULT_SEED = 42;
export const DEFAULT_RECENT_WORD_LIMIT = 30;
export const DEFAULT_GOAL = 'goal_inform';

/**
 * Starting modulators of a session. Separate from the dynamics fallback
 * (`createDefaultModulators`), which only fills in a missing curiosity.
 */
export function createSessionModulators(): Modulators {
  return { curiosity: 0.5, calm: 0.6, urgency: 0.3 };
}

export interface ConversationEngineOptions {
  seed?: number;
  dynamics?: Partial<DynamicsConfig>;
  modulators?: Modulators;
  recentWordLimit?: number;
  defaultGoal?: string;
  eventBus?: EventBus;
  episodeStore?: IEpisodeStore;
  /** SHA3 digests of the definition files, shown in the startup summary */
  sourceDigests?: { graph: string; lexicon: string };
}

export interface TurnResult {
  response: string;
  trace: Trace;
  elapsedMs: number;
  turn: number;
}

export interface EngineProfile {
  sessionId: string;
  turns: number;
  episodes: number;
  seed: number;
  modulators: Modulators;
  recentWords: number;
}

const REPORT_CATEGORIES: readonly NodeCategory[] = ['concept', 'topic', 'emotion', 'goal', 'motor', 'lexeme'];

export class ConversationEngine {
  readonly graph: BrainGraph;
  readonly lexicon: Lexicon;
  readonly memory: ConversationMemory;
  readonly eventBus: EventBus;
  readonly sessionId: string = uuidv4();
  debugMode: boolean = false;

  private perception: InputProcessor;
  private dynamicsConfig: DynamicsConfig;
  private currentModulators: Modulators;
  private rng: Rng;
  private currentSeed: number;
  private recentWords: string[] = [];
  private recentWordLimit: number;
  private defaultGoal: string;
  private episodeStore?: IEpisodeStore;
  private sourceDigests?: { graph: string; lexicon: string };
  private turnCounter: number = 0;

  constructor(graph: BrainGraph, lexicon: Lexicon, options: ConversationEngineOptions = {}) {
    this.graph = graph;
    this.lexicon = lexicon;
    this.perception = new InputProcessor(lexicon);
    this.memory = new ConversationMemory();
    this.eventBus = options.eventBus ?? new EventBus();
    this.dynamicsConfig = { ...DEFAULT_DYNAMICS_CONFIG, ...options.dynamics };
    this.currentModulators = { ...(options.modulators ?? createSessionModulators()) };
    this.currentSeed = options.seed ?? DEFAULT_SEED;
    this.rng = createRng(this.currentSeed);
    this.recentWordLimit = options.recentWordLimit ?? DEFAULT_RECENT_WORD_LIMIT;
    this.defaultGoal = options.defaultGoal ?? DEFAULT_GOAL;
    this.episodeStore = options.episodeStore;
    this.sourceDigests = options.sourceDigests;
  }

  /**
   * Load both definition files and build an engine.
   * Throws GraphLoadError / LexiconLoadError with the collected problems.
   */
  static async fromFiles(
    graphPath: string,
    lexiconPath: string,
    options: ConversationEngineOptions = {}
  ): Promise<ConversationEngine> {
    const [graphText, lexiconText] = await Promise.all([
      fs.readFile(graphPath, 'utf-8'),
      fs.readFile(lexiconPath, 'utf-8'),
    ]);
    const graph = parseGraph(graphText);
    const lexicon = parseLexicon(lexiconText);
    return new ConversationEngine(graph, lexicon, {
      ...options,
      sourceDigests: { graph: hashText(graphText), lexicon: hashText(lexiconText) },
    });
  }

  /**
   * Restore turn history from the episode store, when one is attached
   */
  async init(): Promise<void> {
    if (this.episodeStore) {
      await this.episodeStore.init();
      const episodes = await this.episodeStore.loadAll();
      this.memory.restore(episodes);
      this.turnCounter = this.memory.turns;
      logger.info('memory restored', { episodes: episodes.length, turn: this.turnCounter });
    }
    this.eventBus.publish('engine:ready', SOURCE, { sessionId: this.sessionId });
  }

  async close(): Promise<void> {
    await this.episodeStore?.close();
  }

  get seed(): number {
    return this.currentSeed;
  }

  get turnCount(): number {
    return this.turnCounter;
  }

  get modulators(): Modulators {
    return { ...this.currentModulators };
  }

  get dynamics(): Readonly<DynamicsConfig> {
    return this.dynamicsConfig;
  }

  /**
   * Replace the random source with a fresh one for this seed. Memory and
   * recent words are kept.
   */
  setSeed(seed: number): void {
    this.currentSeed = seed;
    this.rng = createRng(seed);
    this.eventBus.publish('session:reseeded', SOURCE, { seed });
  }

  async processInput(text: string): Promise<TurnResult> {
    const start = performance.now();
    this.turnCounter++;
    const turn = this.turnCounter;
    const correlationId = `${this.sessionId}:${turn}`;
    const publish = <K extends EngineEventType>(type: K, payload: EngineEventMap[K]) =>
      this.eventBus.publish(type, SOURCE, payload, correlationId);

    publish('turn:started', { turn, text });
    const trace = createTrace();

    const perception = this.perception.process(text);
    trace.inputMapping = [...perception.matchedWords, ...perception.matchedPhrases];
    trace.initialActivations = { ...perception.activatedConcepts };
    trace.modulators = { ...this.currentModulators };

    const concepts = Object.keys(perception.activatedConcepts);
    const boost = this.memory.memoryBoost(concepts);
    trace.memoryEffects = { ...boost };

    const merged = new Map(Object.entries(perception.activatedConcepts));
    for (const [conceptId, amount] of Object.entries(boost)) {
      merged.set(conceptId, (merged.get(conceptId) ?? 0) + amount);
    }
    const injections: ActivationMap = Object.fromEntries(merged);

    const dynamics: DynamicsResult = runDynamics(
      this.graph,
      injections,
      this.dynamicsConfig,
      this.currentModulators
    );
    trace.steps = dynamics.steps;
    trace.topEdges = dynamics.topContributingEdges;
    trace.snapshotDigest = snapshotDigest(dynamics.finalActivations);
    publish('dynamics:settled', {
      turn,
      steps: dynamics.steps.length,
      digest: trace.snapshotDigest,
    });

    const goal: GoalResult = selectGoal(this.graph);
    const goalId = goal.selectedGoal ?? this.defaultGoal;
    trace.selectedGoal = goalId;
    trace.goalCandidates = goal.candidates;
    publish('goal:selected', { turn, goal: goalId, activation: goal.selectedActivation });

    const motor: MotorResult = generateResponse(this.graph, this.lexicon, goalId, this.rng, {
      recentWords: this.recentWords,
    });
    trace.languageCandidates = motor.candidatesConsidered.slice(0, TRACE_CANDIDATE_LIMIT);
    trace.languageSelected = motor.selectedWords;
    trace.finalWords = motor.selectedWords.map(w => w.word);
    publish('motor:generated', {
      turn,
      words: trace.finalWords,
      candidates: motor.candidatesConsidered.length,
    });

    this.rememberWords(trace.finalWords);
    const episode = this.memory.storeTurn(text, motor.finalText, concepts, goalId);
    this.updateModulators(perception);

    const elapsedMs = performance.now() - start;
    publish('turn:completed', {
      turn,
      response: motor.finalText,
      goal: goalId,
      elapsedMs,
    });
    logger.debug('turn processed', { turn, goal: goalId, words: trace.finalWords.length, elapsedMs });

    if (this.episodeStore) {
      await this.episodeStore.append(episode);
      publish('memory:persisted', { turn, episodeId: episode.id });
    }

    return { response: motor.finalText, trace, elapsedMs, turn };
  }

  private rememberWords(words: readonly string[]): void {
    this.recentWords.push(...words);
    if (this.recentWords.length > this.recentWordLimit) {
      this.recentWords = this.recentWords.slice(-this.recentWordLimit);
    }
  }

  /**
   * Questions raise curiosity; everything else lets it and urgency drift down
   */
  private updateModulators(perception: PerceptionResult): void {
    const mods = this.currentModulators;
    const fallback = createSessionModulators();
    const curiosity = mods.curiosity ?? fallback.curiosity;
    const urgency = mods.urgency ?? fallback.urgency;

    mods.curiosity = perception.rawInput.includes('?')
      ? Math.min(1, curiosity + 0.1)
      : Math.max(0.2, curiosity - 0.05);
    mods.urgency = Math.max(0.1, urgency - 0.02);
  }

  startupSummary(): string {
    const lines = [
      'Cortex Chat',
      'Mode: CPU-only | Deterministic',
      `Brain loaded: ${this.graph.summary()}`,
      `Lexicon loaded: ${this.lexicon.summary()}`,
    ];
    if (this.sourceDigests) {
      lines.push(
        `Definitions: graph ${shortDigest(this.sourceDigests.graph)} | lexicon ${shortDigest(this.sourceDigests.lexicon)}`
      );
    }
    if (this.turnCounter > 0) {
      lines.push(`Restored turns: ${this.turnCounter}`);
    }
    lines.push(`Seed: ${this.currentSeed}`);
    lines.push("Type 'exit' to quit.");
    return lines.join('\n');
  }

  showBrain(): string {
    const categories = this.graph.categoryCounts();
    const lines = [`Brain: ${this.graph.summary()}`, 'Node types:'];
    for (const category of REPORT_CATEGORIES) {
      lines.push(`  ${category}: ${categories[category]}`);
    }
    lines.push('Edge types:');
    for (const [type, count] of Object.entries(this.graph.edgeTypeCounts())) {
      lines.push(`  ${type}: ${count}`);
    }
    return lines.join('\n');
  }

  profile(): EngineProfile {
    return {
      sessionId: this.sessionId,
      turns: this.turnCounter,
      episodes: this.memory.episodes.length,
      seed: this.currentSeed,
      modulators: this.modulators,
      recentWords: this.recentWords.length,
    };
  }
}
