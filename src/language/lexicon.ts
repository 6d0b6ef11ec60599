/**
 * Lexicon - words, phrases, synonyms and stopwords
 * @module language/lexicon
 */

import type { LexiconEntry, VocabularyLookup } from '../types/index.js';

/**
 * In-memory vocabulary.
 *
 * A word or phrase is registered under every concept it names, in the
 * order records were added; `wordsForConcept` returns that order.
 */
export class Lexicon implements VocabularyLookup {
  private words: Map<string, LexiconEntry> = new Map();
  private phrases: Map<string, LexiconEntry> = new Map();
  private synonyms: Map<string, string> = new Map();
  private stopwords: Set<string> = new Set();
  private conceptToForms: Map<string, string[]> = new Map();

  addWord(entry: LexiconEntry): void {
    this.words.set(entry.text, entry);
    this.index(entry);
  }

  addPhrase(entry: LexiconEntry): void {
    this.phrases.set(entry.text, entry);
    this.index(entry);
  }

  addSynonym(synonym: string, canonical: string): void {
    this.synonyms.set(synonym, canonical);
  }

  addStopword(word: string): void {
    this.stopwords.add(word);
  }

  private index(entry: LexiconEntry): void {
    for (const conceptId of entry.conceptIds) {
      const forms = this.conceptToForms.get(conceptId);
      if (forms) {
        forms.push(entry.text);
      } else {
        this.conceptToForms.set(conceptId, [entry.text]);
      }
    }
  }

  /** Canonical form of a synonym, or the word itself */
  resolve(word: string): string {
    return this.synonyms.get(word) ?? word;
  }

  isStopword(word: string): boolean {
    return this.stopwords.has(word);
  }

  lookupWord(word: string): LexiconEntry | undefined {
    return this.words.get(word);
  }

  lookupPhrase(phrase: string): LexiconEntry | undefined {
    return this.phrases.get(phrase);
  }

  lookup(form: string): LexiconEntry | undefined {
    return this.lookupWord(form) ?? this.lookupPhrase(form);
  }

  wordsForConcept(conceptId: string): readonly string[] {
    return this.conceptToForms.get(conceptId) ?? [];
  }

  /** Phrases longest first, for greedy matching */
  sortedPhrases(): string[] {
    return [...this.phrases.keys()].sort((a, b) => b.length - a.length);
  }

  get wordCount(): number {
    return this.words.size;
  }

  get phraseCount(): number {
    return this.phrases.size;
  }

  get synonymCount(): number {
    return this.synonyms.size;
  }

  get stopwordCount(): number {
    return this.stopwords.size;
  }

  summary(): string {
    return `${this.words.size + this.phrases.size} entries`;
  }
}
