/**
 * Lexicon Loader - builds a Lexicon from a `.brain` definition
 *
 * Records:
 *   WORD|id|text|concept,concept|pos
 *   PHRASE|id|text|concept,concept|pos
 *   SYNONYM|synonym|canonical
 *   STOP|word
 *
 * @module loaders/lexicon-loader
 */

import * as fs from 'fs/promises';
import { Lexicon } from '../language/lexicon.js';
import { LexiconLoadError } from '../core/errors.js';
import { describeError, parseIdList, readRecords } from './records.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('loaders:lexicon');

const MIN_FIELDS: Readonly<Record<string, number>> = {
  WORD: 5,
  PHRASE: 5,
  SYNONYM: 3,
  STOP: 2,
};

/**
 * Parse lexicon definition text. Word, phrase, synonym and stopword texts
 * are lowercased.
 *
 * @throws {LexiconLoadError} With every diagnostic, if any record failed
 */
export function parseLexicon(text: string): Lexicon {
  const lexicon = new Lexicon();
  const problems: string[] = [];

  for (const record of readRecords(text)) {
    const at = `Line ${record.lineNumber}`;
    const required = Object.hasOwn(MIN_FIELDS, record.kind) ? MIN_FIELDS[record.kind] : undefined;

    if (required === undefined) {
      problems.push(`${at}: Unknown record type '${record.kind}'`);
      continue;
    }
    const fieldCount = record.fields.length + 1;
    if (fieldCount < required) {
      problems.push(`${at}: ${record.kind} record needs ${required} fields, got ${fieldCount}`);
      continue;
    }

    try {
      const f = record.fields;
      switch (record.kind) {
        case 'WORD':
          lexicon.addWord({ id: f[0], text: f[1].toLowerCase(), conceptIds: parseIdList(f[2]), pos: f[3] });
          break;
        case 'PHRASE':
          lexicon.addPhrase({ id: f[0], text: f[1].toLowerCase(), conceptIds: parseIdList(f[2]), pos: f[3] });
          break;
        case 'SYNONYM':
          lexicon.addSynonym(f[0].toLowerCase(), f[1].toLowerCase());
          break;
        default:
          lexicon.addStopword(f[0].toLowerCase());
      }
    } catch (err) {
      problems.push(`${at}: Parse error: ${describeError(err)}`);
    }
  }

  if (problems.length > 0) {
    throw new LexiconLoadError(problems);
  }

  logger.debug('lexicon parsed', {
    words: lexicon.wordCount,
    phrases: lexicon.phraseCount,
    synonyms: lexicon.synonymCount,
    stopwords: lexicon.stopwordCount,
  });
  return lexicon;
}

/**
 * Read and parse a lexicon definition file
 */
export async function loadLexicon(filePath: string): Promise<Lexicon> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parseLexicon(text);
}
