/**
 * Perception - user text to concept activations
 *
 * Phrase matching (longest first) runs before tokenization, so a phrase
 * claims its words before they are looked up individually.
 *
 * @module services/perception
 */

import type { PerceptionResult } from '../types/index.js';
import type { Lexicon } from '../language/lexicon.js';

export const PHRASE_WEIGHT = 0.8;
export const WORD_WEIGHT = 0.7;

const PUNCTUATION = /[^\p{L}\p{N}_\s]/gu;

export class InputProcessor {
  private lexicon: Lexicon;
  private phrases: string[];

  constructor(lexicon: Lexicon) {
    this.lexicon = lexicon;
    this.phrases = lexicon.sortedPhrases();
  }

  process(rawInput: string): PerceptionResult {
    const result: PerceptionResult = {
      rawInput,
      tokens: [],
      matchedPhrases: [],
      matchedWords: [],
      activatedConcepts: {},
      synonymMappings: {},
      removedStopwords: [],
    };
    const concepts = new Map<string, number>();
    const synonyms = new Map<string, string>();
    const add = (conceptId: string, amount: number) => {
      concepts.set(conceptId, (concepts.get(conceptId) ?? 0) + amount);
    };

    let remaining = rawInput.toLowerCase().trim().replace(PUNCTUATION, '');

    for (const phrase of this.phrases) {
      if (!remaining.includes(phrase)) continue;
      const entry = this.lexicon.lookupPhrase(phrase);
      if (!entry) continue;
      result.matchedPhrases.push({ text: phrase, conceptIds: entry.conceptIds });
      for (const conceptId of entry.conceptIds) {
        add(conceptId, PHRASE_WEIGHT);
      }
      remaining = remaining.replaceAll(phrase, ' ');
    }

    for (const raw of remaining.split(/\s+/).filter(Boolean)) {
      const token = this.lexicon.resolve(raw);
      if (token !== raw) {
        synonyms.set(raw, token);
      }

      if (this.lexicon.isStopword(token)) {
        result.removedStopwords.push(token);
        continue;
      }
      result.tokens.push(token);

      const entry = this.lexicon.lookupWord(token);
      if (entry) {
        result.matchedWords.push({ text: token, conceptIds: entry.conceptIds });
        for (const conceptId of entry.conceptIds) {
          add(conceptId, WORD_WEIGHT);
        }
      }
    }

    result.synonymMappings = Object.fromEntries(synonyms);
    result.activatedConcepts = Object.fromEntries(
      [...concepts].map(([conceptId, amount]): [string, number] => [conceptId, Math.min(1, amount)])
    );

    return result;
  }
}
