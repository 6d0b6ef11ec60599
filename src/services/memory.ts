/**
 * Conversation Memory - short-term turns and relevance-scored episodes
 * @module services/memory
 */

import { v4 as uuidv4 } from 'uuid';
import type { ActivationMap, Episode } from '../types/index.js';

export const RECALL_BOOST = 0.15;
export const RECALL_BOOST_CAP = 0.4;
export const RECENCY_WEIGHT = 0.3;

export interface ConversationMemoryOptions {
  shortTermCapacity?: number;
  episodicCapacity?: number;
}

export interface ShortTermTurn {
  userText: string;
  systemText: string;
}

/**
 * Bounded turn history with overlap-based recall.
 *
 * Recalled episodes feed back as small activation boosts for their
 * concepts on the next turn.
 */
export class ConversationMemory {
  readonly shortTermCapacity: number;
  readonly episodicCapacity: number;
  private shortTerm: ShortTermTurn[] = [];
  private episodeList: Episode[] = [];
  private turnCounter: number = 0;

  constructor(options: ConversationMemoryOptions = {}) {
    this.shortTermCapacity = options.shortTermCapacity ?? 5;
    this.episodicCapacity = options.episodicCapacity ?? 50;
  }

  get turns(): number {
    return this.turnCounter;
  }

  get episodes(): readonly Episode[] {
    return this.episodeList;
  }

  get recentTurns(): readonly ShortTermTurn[] {
    return this.shortTerm;
  }

  storeTurn(userText: string, systemText: string, concepts: string[], goal: string): Episode {
    this.turnCounter++;

    this.shortTerm.push({ userText, systemText });
    if (this.shortTerm.length > this.shortTermCapacity) {
      this.shortTerm.shift();
    }

    const episode: Episode = {
      id: uuidv4(),
      turn: this.turnCounter,
      userText,
      systemText,
      concepts: [...concepts],
      goal,
      createdAt: new Date().toISOString(),
    };
    this.episodeList.push(episode);
    if (this.episodeList.length > this.episodicCapacity) {
      this.episodeList.shift();
    }

    return episode;
  }

  /**
   * Rehydrate from persisted episodes (turn order). Short-term turns are
   * rebuilt from the newest episodes.
   */
  restore(episodes: readonly Episode[]): void {
    const ordered = [...episodes].sort((a, b) => a.turn - b.turn);
    this.episodeList = ordered.slice(-this.episodicCapacity);
    this.shortTerm = ordered
      .slice(-this.shortTermCapacity)
      .map(ep => ({ userText: ep.userText, systemText: ep.systemText }));
    this.turnCounter = ordered.reduce((max, ep) => Math.max(max, ep.turn), 0);
  }

  /**
   * Episodes sharing at least one concept, best first.
   * Score: shared concept count + recency * 0.3
   */
  retrieveRelevant(concepts: readonly string[], topK: number = 3): Episode[] {
    if (this.episodeList.length === 0 || concepts.length === 0) {
      return [];
    }

    const wanted = new Set(concepts);
    const scored: Array<{ score: number; episode: Episode }> = [];
    for (const episode of this.episodeList) {
      const overlap = new Set(episode.concepts.filter(c => wanted.has(c))).size;
      if (overlap === 0) continue;
      const recency = episode.turn / Math.max(1, this.turnCounter);
      scored.push({ score: overlap + recency * RECENCY_WEIGHT, episode });
    }

    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map(s => s.episode);
  }

  /** Concepts of the last three episodes, oldest first */
  recentConcepts(): string[] {
    return this.episodeList.slice(-3).flatMap(ep => ep.concepts);
  }

  memoryBoost(concepts: readonly string[]): ActivationMap {
    const boosts = new Map<string, number>();
    for (const episode of this.retrieveRelevant(concepts)) {
      for (const conceptId of episode.concepts) {
        boosts.set(conceptId, (boosts.get(conceptId) ?? 0) + RECALL_BOOST);
      }
    }
    return Object.fromEntries(
      [...boosts].map(([conceptId, amount]): [string, number] => [conceptId, Math.min(RECALL_BOOST_CAP, amount)])
    );
  }
}
