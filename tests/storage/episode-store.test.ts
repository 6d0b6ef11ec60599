/**
 * Episode Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EpisodeStore, episodeKey, parseEpisode } from '../../src/storage/episode-store.js';
import type { Episode } from '../../src/types/index.js';
import { safeRemoveDir } from '../fixtures.js';

const TEST_DIR = './test-data/episode-store';

function episode(turn: number, concepts: string[] = ['c_rain']): Episode {
  return {
    id: `ep-${turn}`,
    turn,
    userText: `user ${turn}`,
    systemText: `system ${turn}`,
    concepts,
    goal: 'goal_inform',
    createdAt: '2024-01-01T00:00:00.000Z',
  };
}

describe('episodeKey', () => {
  it('should zero-pad turns so keys sort numerically', () => {
    expect(episodeKey(7)).toBe('episode:0000000007');
    expect(episodeKey(10) > episodeKey(9)).toBe(true);
  });
});

describe('parseEpisode', () => {
  it('should decode a stored episode', () => {
    expect(parseEpisode(JSON.stringify(episode(3)))).toEqual(episode(3));
  });

  it('should reject malformed records', () => {
    expect(parseEpisode('not json')).toBeNull();
    expect(parseEpisode('42')).toBeNull();
    expect(parseEpisode(JSON.stringify({ ...episode(1), concepts: [1, 2] }))).toBeNull();
    expect(parseEpisode(JSON.stringify({ ...episode(1), turn: '1' }))).toBeNull();
  });
});

describe('EpisodeStore', () => {
  let store: EpisodeStore;

  beforeEach(async () => {
    await safeRemoveDir(TEST_DIR);
    store = new EpisodeStore({ dataDir: TEST_DIR });
    await store.init();
  });

  afterEach(async () => {
    await store.close();
    await safeRemoveDir(TEST_DIR);
  });

  it('should load episodes in turn order', async () => {
    await store.append(episode(10));
    await store.append(episode(2));
    await store.append(episode(9));

    const loaded = await store.loadAll();

    expect(loaded.map(e => e.turn)).toEqual([2, 9, 10]);
    expect(loaded[0]).toEqual(episode(2));
    expect(await store.count()).toBe(3);
  });

  it('should survive a reopen', async () => {
    await store.append(episode(1, ['c_sun']));
    await store.close();

    store = new EpisodeStore({ dataDir: TEST_DIR });
    await store.init();

    expect(await store.loadAll()).toEqual([episode(1, ['c_sun'])]);
  });

  it('should clear all episodes', async () => {
    await store.append(episode(1));
    await store.clear();
    expect(await store.count()).toBe(0);
  });

  it('should refuse use before init', async () => {
    const fresh = new EpisodeStore({ dataDir: `${TEST_DIR}-unopened` });
    await expect(fresh.loadAll()).rejects.toThrow('Episode store not initialized');
  });
});
