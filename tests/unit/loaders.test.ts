/**
 * Definition Loader Tests
 */

import { describe, it, expect } from 'vitest';
import { parseGraph, loadGraph } from '../../src/loaders/graph-loader.js';
import { parseLexicon, loadLexicon } from '../../src/loaders/lexicon-loader.js';
import { readRecords, parseNumber, parseIdList } from '../../src/loaders/records.js';
import { GraphLoadError, LexiconLoadError } from '../../src/core/errors.js';
import { GRAPH_PATH, LEXICON_PATH } from '../fixtures.js';

function graphProblems(text: string): string[] {
  try {
    parseGraph(text);
  } catch (err) {
    if (err instanceof GraphLoadError) return err.problems;
    throw err;
  }
  return [];
}

function lexiconProblems(text: string): string[] {
  try {
    parseLexicon(text);
  } catch (err) {
    if (err instanceof LexiconLoadError) return err.problems;
    throw err;
  }
  return [];
}

describe('records', () => {
  it('should skip blank lines and comments and keep line numbers', () => {
    const records = readRecords('# header\n\nN | a | concept \r\n  # note\nE|a|b');
    expect(records).toEqual([
      { lineNumber: 3, kind: 'N', fields: ['a', 'concept'] },
      { lineNumber: 5, kind: 'E', fields: ['a', 'b'] },
    ]);
  });

  it('should reject empty and non-numeric numbers', () => {
    expect(parseNumber('0.25', 'weight')).toBe(0.25);
    expect(() => parseNumber('', 'weight')).toThrow("weight '' is not a number");
    expect(() => parseNumber('abc', 'decay')).toThrow("decay 'abc' is not a number");
  });

  it('should split id lists and drop empty items', () => {
    expect(parseIdList('c_a, c_b,,')).toEqual(['c_a', 'c_b']);
  });
});

describe('parseGraph', () => {
  const VALID = [
    '# tiny graph',
    'N|goal_inform|goal|Inform|0.05|0.05|0.3',
    'E|goal_inform|c_rain|excitatory|0.4',
    'N|c_rain|concept|Rain|0|0.05|0.3',
  ].join('\n');

  it('should build nodes and allow edges to reference later nodes', () => {
    const graph = parseGraph(VALID);

    expect(graph.size).toBe(2);
    expect(graph.edges).toHaveLength(1);
    expect(graph.getNode('goal_inform')?.baseline).toBe(0.05);
    expect(graph.getOutgoing('goal_inform')[0].targetId).toBe('c_rain');
  });

  it('should collect every problem in one error', () => {
    const problems = graphProblems([
      'N|goal_a|goal|A|0|0.05|0.3',
      'N|c_short|concept',
      'N|c_bad|feeling|Bad|0|0.05|0.3',
      'N|c_nan|concept|NaN|x|0.05|0.3',
      'X|what',
      'E|goal_a|c_missing|excitatory|0.5',
      'E|goal_a|goal_a|sideways|0.5',
      'E|goal_a|goal_a|causal|2',
    ].join('\n'));

    expect(problems).toEqual([
      'Line 2: NODE record needs 7 fields, got 3',
      "Line 3: Parse error: Invalid node category 'feeling'",
      "Line 4: Parse error: baseline 'x' is not a number",
      "Line 5: Unknown record type 'X'",
      "Line 6: Edge error: Edge target 'c_missing' not found in graph",
      "Line 7: Edge error: Invalid edge type 'sideways'",
      'Line 8: Edge error: Weight 2 out of range [-1, 1]',
    ]);
  });

  it('should report duplicate node ids', () => {
    const problems = graphProblems('N|goal_a|goal|A|0|0.05|0.3\nN|goal_a|goal|A|0|0.05|0.3');
    expect(problems).toEqual(['Line 2: Parse error: Duplicate node id: goal_a']);
  });

  it('should require at least one goal node', () => {
    expect(graphProblems('N|c_a|concept|A|0|0.05|0.3')).toEqual(['No goal nodes defined in graph']);
  });

  it('should load the bundled graph', async () => {
    const graph = await loadGraph(GRAPH_PATH);
    expect(graph.nodesByCategory('goal').length).toBeGreaterThan(0);
    expect(graph.validate()).toEqual([]);
  });
});

describe('parseLexicon', () => {
  it('should lowercase texts and index concepts', () => {
    const lexicon = parseLexicon([
      'WORD|w1|Rain|c_rain,c_weather|noun',
      'PHRASE|p1|Good Morning|c_greeting|interjection',
      'SYNONYM|Drizzle|RAIN',
      'STOP|The',
    ].join('\n'));

    expect(lexicon.lookupWord('rain')?.conceptIds).toEqual(['c_rain', 'c_weather']);
    expect(lexicon.lookupPhrase('good morning')?.pos).toBe('interjection');
    expect(lexicon.resolve('drizzle')).toBe('rain');
    expect(lexicon.isStopword('the')).toBe(true);
    expect(lexicon.wordsForConcept('c_weather')).toEqual(['rain']);
    expect(lexicon.summary()).toBe('2 entries');
  });

  it('should collect short and unknown records', () => {
    const problems = lexiconProblems('WORD|w1|rain\nSYNONYM|a\nSTOP|ok\nNOPE|x');
    expect(problems).toEqual([
      'Line 1: WORD record needs 5 fields, got 3',
      'Line 2: SYNONYM record needs 3 fields, got 2',
      "Line 4: Unknown record type 'NOPE'",
    ]);
  });

  it('should load the bundled lexicon', async () => {
    const lexicon = await loadLexicon(LEXICON_PATH);
    expect(lexicon.wordCount).toBeGreaterThan(0);
    expect(lexicon.isStopword('the')).toBe(true);
  });
});
