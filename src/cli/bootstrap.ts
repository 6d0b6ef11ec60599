/**
 * Engine bootstrap shared by the CLI commands and the chat API
 */

import * as path from 'path';
import type { CommandConfig } from './types.js';
import { ConversationEngine } from '../services/conversation-engine.js';
import { EpisodeStore } from '../storage/episode-store.js';

export async function createEngine(config: CommandConfig): Promise<ConversationEngine> {
  const engine = await ConversationEngine.fromFiles(
    path.resolve(config.graphPath),
    path.resolve(config.lexiconPath),
    {
      seed: config.seed,
      dynamics: {
        steps: config.steps,
        inhibitionStrength: config.inhibitionStrength,
        competitionWithinCategory: config.competitionWithinCategory,
      },
      episodeStore: config.persist ? new EpisodeStore({ dataDir: config.dataDir }) : undefined,
    }
  );
  engine.debugMode = config.debug;
  await engine.init();
  return engine;
}
