/**
 * Brain Command - graph and lexicon report
 */

import type { CommandConfig, CommandResult } from '../types.js';
import type { ConversationEngine } from '../../services/conversation-engine.js';
import { formatHeader } from '../utils/helpers.js';

export function cmdBrain(config: CommandConfig, engine: ConversationEngine): CommandResult {
  const { graph, lexicon } = engine;

  if (config.json) {
    return {
      success: true,
      data: {
        summary: graph.summary(),
        categories: graph.categoryCounts(),
        edgeTypes: graph.edgeTypeCounts(),
        lexicon: {
          words: lexicon.wordCount,
          phrases: lexicon.phraseCount,
          synonyms: lexicon.synonymCount,
          stopwords: lexicon.stopwordCount,
        },
      },
    };
  }

  let output = formatHeader('Brain Report');
  output += engine.showBrain() + '\n';
  output += `Lexicon: ${lexicon.summary()}\n`;
  output += `  words: ${lexicon.wordCount}\n`;
  output += `  phrases: ${lexicon.phraseCount}\n`;
  output += `  synonyms: ${lexicon.synonymCount}\n`;
  output += `  stopwords: ${lexicon.stopwordCount}`;
  return { success: true, data: output };
}
