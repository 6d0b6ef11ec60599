/**
 * Episode Store - LevelDB persistence for conversation turns
 *
 * Only turn history is persisted. Graph activation is rebuilt from the
 * definition files on every start.
 *
 * @module storage/episode-store
 */

import { Level } from 'level';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { Episode, IEpisodeStore } from '../types/index.js';
import { storageLogger } from '../utils/logger.js';

const logger = storageLogger.child('episodes');

export interface EpisodeStoreOptions {
  dataDir: string;
}

const EPISODE_PREFIX = 'episode:';
const TURN_KEY_WIDTH = 10;

/** Zero-padded so lexicographic key order is turn order */
export function episodeKey(turn: number): string {
  return `${EPISODE_PREFIX}${String(turn).padStart(TURN_KEY_WIDTH, '0')}`;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

/**
 * Decode a stored record; null when the shape does not match
 */
export function parseEpisode(raw: string): Episode | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null) return null;

  const record: Record<string, unknown> = { ...value };
  const { id, turn, userText, systemText, concepts, goal, createdAt } = record;
  if (
    typeof id !== 'string' ||
    typeof turn !== 'number' ||
    typeof userText !== 'string' ||
    typeof systemText !== 'string' ||
    !isStringArray(concepts) ||
    typeof goal !== 'string' ||
    typeof createdAt !== 'string'
  ) {
    return null;
  }
  return { id, turn, userText, systemText, concepts, goal, createdAt };
}

export class EpisodeStore implements IEpisodeStore {
  private db: Level<string, string>;
  private dataDir: string;
  private initialized: boolean = false;

  constructor(options: EpisodeStoreOptions) {
    this.dataDir = options.dataDir;
    this.db = new Level(path.join(this.dataDir, 'episodes'), {
      valueEncoding: 'utf8',
    });
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    await fs.mkdir(this.dataDir, { recursive: true });
    await this.db.open();
    this.initialized = true;
  }

  async close(): Promise<void> {
    if (!this.initialized) return;
    await this.db.close();
    this.initialized = false;
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Episode store not initialized');
    }
  }

  async append(episode: Episode): Promise<void> {
    this.ensureInitialized();
    await this.db.put(episodeKey(episode.turn), JSON.stringify(episode));
  }

  /**
   * All stored episodes in turn order. Undecodable records are skipped.
   */
  async loadAll(): Promise<Episode[]> {
    this.ensureInitialized();
    const episodes: Episode[] = [];
    let skipped = 0;

    for await (const raw of this.db.values({ gte: EPISODE_PREFIX, lt: `${EPISODE_PREFIX}\xff` })) {
      const episode = parseEpisode(raw);
      if (episode) {
        episodes.push(episode);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      logger.warn('skipped undecodable episodes', { skipped });
    }
    return episodes;
  }

  async count(): Promise<number> {
    this.ensureInitialized();
    let total = 0;
    for await (const _key of this.db.keys({ gte: EPISODE_PREFIX, lt: `${EPISODE_PREFIX}\xff` })) {
      total++;
    }
    return total;
  }

  async clear(): Promise<void> {
    this.ensureInitialized();
    await this.db.clear({ gte: EPISODE_PREFIX, lt: `${EPISODE_PREFIX}\xff` });
  }
}
