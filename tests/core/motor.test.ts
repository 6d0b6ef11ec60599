/**
 * Motor Generator Tests
 */

import { describe, it, expect } from 'vitest';
import {
  FALLBACK_UTTERANCE,
  allowedAfter,
  generateResponse,
  goalAffinityBoost,
} from '../../src/core/motor.js';
import { createRng } from '../../src/core/rng.js';
import type { BrainGraph } from '../../src/core/brain-graph.js';
import { Lexicon } from '../../src/language/lexicon.js';
import type { EdgeDefinition, NodeDefinition } from '../../src/types/index.js';
import { buildGraph } from '../fixtures.js';

function lexicon(entries: Array<[string, string, string]>): Lexicon {
  const lex = new Lexicon();
  entries.forEach(([text, conceptId, pos], i) => {
    lex.addWord({ id: `w${i}`, text, conceptIds: [conceptId], pos });
  });
  return lex;
}

function activate(graph: BrainGraph, activations: Record<string, number>): BrainGraph {
  for (const [id, value] of Object.entries(activations)) {
    const node = graph.getNode(id);
    if (node) node.activation = value;
  }
  return graph;
}

const WEATHER_NODES: NodeDefinition[] = [
  { id: 'c_rain', category: 'concept', label: 'Rain' },
  { id: 'c_cold', category: 'concept', label: 'Cold' },
  { id: 'c_fall', category: 'concept', label: 'Fall' },
];

const WEATHER_WORDS: Array<[string, string, string]> = [
  ['rain', 'c_rain', 'noun'],
  ['cold', 'c_cold', 'adj'],
  ['falls', 'c_fall', 'verb'],
];

function weatherGraph(extraNodes: NodeDefinition[] = [], edges: EdgeDefinition[] = []): BrainGraph {
  return activate(buildGraph([...WEATHER_NODES, ...extraNodes], edges), {
    c_rain: 0.9,
    c_cold: 0.5,
    c_fall: 0.4,
  });
}

describe('generateResponse', () => {
  it('should order words through the transition table', () => {
    const result = generateResponse(weatherGraph(), lexicon(WEATHER_WORDS), 'goal_inform', createRng(42));

    expect(result.finalText).toBe('rain cold falls');
    expect(result.selectedWords.map(w => w.pos)).toEqual(['noun', 'adj', 'verb']);
    expect(result.candidatesConsidered.map(c => c.word)).toEqual(['rain', 'cold', 'falls']);
    expect(result.candidatesConsidered[0].score).toBeCloseTo(0.54, 10);
    expect(result.candidatesConsidered[1].score).toBeCloseTo(0.3, 10);
    expect(result.candidatesConsidered[2].score).toBeCloseTo(0.24, 10);
  });

  it('should boost concepts the selected goal points at', () => {
    const graph = weatherGraph(
      [{ id: 'goal_greet', category: 'goal', label: 'Greet' }],
      [{ sourceId: 'goal_greet', targetId: 'c_cold', type: 'excitatory', weight: 0.5 }]
    );

    const result = generateResponse(graph, lexicon(WEATHER_WORDS), 'goal_greet', createRng(42));
    const cold = result.candidatesConsidered.find(c => c.word === 'cold');

    expect(cold?.score).toBeCloseTo(0.5, 10);
    expect(cold?.reason).toBe('concept=c_cold act=0.50 goal_match=goal_greet');
  });

  it('should penalize recently spoken words', () => {
    const result = generateResponse(weatherGraph(), lexicon(WEATHER_WORDS), 'goal_inform', createRng(42), {
      recentWords: ['rain'],
    });
    const rain = result.candidatesConsidered.find(c => c.word === 'rain');

    expect(rain?.score).toBeCloseTo(0.162, 10);
    expect(result.candidatesConsidered[0].word).toBe('cold');
  });

  it('should draw candidates from firing motor nodes', () => {
    const graph = activate(
      buildGraph([...WEATHER_NODES, { id: 'm_self', category: 'motor', label: 'Self' }]),
      { m_self: 0.6 }
    );
    const lex = lexicon([...WEATHER_WORDS, ['i', 'm_self', 'pronoun']]);

    const result = generateResponse(graph, lex, 'goal_inform', createRng(42));

    expect(result.candidatesConsidered).toHaveLength(1);
    expect(result.candidatesConsidered[0]).toMatchObject({
      word: 'i',
      sourceId: 'm_self',
      pos: 'pronoun',
      reason: 'motor/lexeme node=m_self',
    });
    expect(result.candidatesConsidered[0].score).toBeCloseTo(0.3, 10);
    expect(result.finalText).toBe('i');
  });

  it('should stop at maxWords', () => {
    const result = generateResponse(weatherGraph(), lexicon(WEATHER_WORDS), 'goal_inform', createRng(42), {
      maxWords: 1,
    });
    expect(result.finalText).toBe('rain');
  });

  it('should stop at a multi-word limit', () => {
    const result = generateResponse(weatherGraph(), lexicon(WEATHER_WORDS), 'goal_inform', createRng(42), {
      maxWords: 2,
    });

    expect(result.finalText).toBe('rain cold');
    expect(result.selectedWords.map(w => w.pos)).toEqual(['noun', 'adj']);
  });

  it('should halve the other words of a node once one of them is spoken', () => {
    const graph = activate(
      buildGraph([
        { id: 'a', category: 'concept', label: 'A' },
        { id: 'b', category: 'concept', label: 'B' },
      ]),
      { a: 1.0, b: 0.8 }
    );
    const lex = lexicon([['a1', 'a', 'noun'], ['a2', 'a', 'noun'], ['b1', 'b', 'noun']]);

    const result = generateResponse(graph, lex, 'goal_inform', createRng(1), { maxWords: 2 });

    expect(result.selectedWords.map(w => w.sourceId)).toEqual(['a', 'b']);
    expect(result.finalText).toMatch(/^a[12] b1$/);
    expect(result.candidatesConsidered.map(c => c.score)).toEqual([
      expect.closeTo(0.6, 10),
      expect.closeTo(0.6, 10),
      expect.closeTo(0.48, 10),
    ]);
  });

  it('should draw words from at most 25 conceptual nodes, strongest first', () => {
    const nodes: NodeDefinition[] = [];
    const activations: Record<string, number> = {};
    const words: Array<[string, string, string]> = [];
    for (let i = 0; i < 30; i++) {
      const id = `c${String(i).padStart(2, '0')}`;
      nodes.push({ id, category: 'concept', label: id });
      activations[id] = 0.9 - i * 0.01;
      words.push([`w${id}`, id, 'noun']);
    }

    const result = generateResponse(activate(buildGraph(nodes), activations), lexicon(words), 'goal_inform', createRng(42), {
      maxWords: 1,
    });

    expect(result.candidatesConsidered).toHaveLength(25);
    expect(result.candidatesConsidered.map(c => c.sourceId)).toEqual(nodes.slice(0, 25).map(n => n.id));
  });

  it('should rank concept nodes ahead of topics and emotions before the cap', () => {
    const nodes: NodeDefinition[] = [
      { id: 't_hot', category: 'topic', label: 'Hot' },
      { id: 'e_glad', category: 'emotion', label: 'Glad' },
    ];
    const activations: Record<string, number> = { t_hot: 1.0, e_glad: 0.95 };
    const words: Array<[string, string, string]> = [['topic', 't_hot', 'noun'], ['glad', 'e_glad', 'adj']];
    for (let i = 0; i < 25; i++) {
      const id = `c${String(i).padStart(2, '0')}`;
      nodes.push({ id, category: 'concept', label: id });
      activations[id] = 0.5;
      words.push([`w${id}`, id, 'noun']);
    }

    const result = generateResponse(activate(buildGraph(nodes), activations), lexicon(words), 'goal_inform', createRng(42), {
      maxWords: 1,
    });
    const sources = result.candidatesConsidered.map(c => c.sourceId);

    expect(sources).toHaveLength(25);
    expect(sources).not.toContain('t_hot');
    expect(sources).not.toContain('e_glad');
  });

  it('should stop after an END-tagged word', () => {
    const graph = activate(
      buildGraph([...WEATHER_NODES, { id: 'c_stop', category: 'concept', label: 'Stop' }]),
      { c_rain: 0.9, c_stop: 0.45, c_fall: 0.35 }
    );
    const lex = lexicon([...WEATHER_WORDS, ['stop', 'c_stop', 'END']]);

    const result = generateResponse(graph, lex, 'goal_inform', createRng(42));

    expect(result.finalText).toBe('rain stop');
  });

  it('should fall back when nothing fires', () => {
    const graph = buildGraph(WEATHER_NODES);
    const result = generateResponse(graph, lexicon(WEATHER_WORDS), 'goal_inform', createRng(42));

    expect(result).toEqual({ candidatesConsidered: [], selectedWords: [], finalText: FALLBACK_UTTERANCE });
  });

  it('should be deterministic for the same seed', () => {
    const graph = () => weatherGraph(
      [{ id: 'goal_greet', category: 'goal', label: 'Greet' }],
      [{ sourceId: 'goal_greet', targetId: 'c_cold', type: 'excitatory', weight: 0.5 }]
    );

    const first = generateResponse(graph(), lexicon(WEATHER_WORDS), 'goal_greet', createRng(7));
    const second = generateResponse(graph(), lexicon(WEATHER_WORDS), 'goal_greet', createRng(7));

    expect(second.finalText).toBe(first.finalText);
  });
});

describe('transition helpers', () => {
  it('should allow nouns, verbs and adjectives after an unknown tag', () => {
    expect(allowedAfter('numeral')).toEqual(['noun', 'verb', 'adj']);
  });

  it('should allow END after a noun', () => {
    expect(allowedAfter('noun')).toContain('END');
  });

  it('should use the default affinity for unknown goals', () => {
    expect(goalAffinityBoost('goal_greet')).toBe(0.4);
    expect(goalAffinityBoost('goal_unknown')).toBe(0.1);
  });
});
