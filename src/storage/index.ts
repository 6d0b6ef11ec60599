/**
 * Storage Layer Export
 *
 * LevelDB persistence for turn history
 *
 * @module storage
 */

export { EpisodeStore, episodeKey, parseEpisode } from './episode-store.js';
export type { EpisodeStoreOptions } from './episode-store.js';
