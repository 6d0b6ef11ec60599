/**
 * Graph Loader - builds a BrainGraph from a `.brain` definition
 *
 * Records:
 *   N|id|category|label|baseline|decay|threshold
 *   E|source|target|type|weight
 *
 * @module loaders/graph-loader
 */

import * as fs from 'fs/promises';
import { BrainGraph } from '../core/brain-graph.js';
import { BrainNode } from '../core/brain-node.js';
import { BrainEdge } from '../core/brain-edge.js';
import { GraphLoadError } from '../core/errors.js';
import { describeError, parseNumber, readRecords, type DefinitionRecord } from './records.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('loaders:graph');

/**
 * Parse graph definition text.
 *
 * Nodes are inserted as they are read; edges are inserted after every node,
 * so an edge may name a node declared further down. Each failing record adds
 * one diagnostic and loading continues, followed by the graph's structural
 * validation.
 *
 * @throws {GraphLoadError} With every diagnostic, if any record failed
 */
export function parseGraph(text: string): BrainGraph {
  const graph = new BrainGraph();
  const problems: string[] = [];
  const pendingEdges: DefinitionRecord[] = [];

  for (const record of readRecords(text)) {
    const at = `Line ${record.lineNumber}`;
    const fieldCount = record.fields.length + 1;

    switch (record.kind) {
      case 'N': {
        if (fieldCount < 7) {
          problems.push(`${at}: NODE record needs 7 fields, got ${fieldCount}`);
          break;
        }
        try {
          const [id, category, label, baseline, decay, threshold] = record.fields;
          graph.addNode(new BrainNode({
            id,
            category,
            label,
            baseline: parseNumber(baseline, 'baseline'),
            decay: parseNumber(decay, 'decay'),
            threshold: parseNumber(threshold, 'threshold'),
          }));
        } catch (err) {
          problems.push(`${at}: Parse error: ${describeError(err)}`);
        }
        break;
      }

      case 'E': {
        if (fieldCount < 5) {
          problems.push(`${at}: EDGE record needs 5 fields, got ${fieldCount}`);
          break;
        }
        pendingEdges.push(record);
        break;
      }

      default:
        problems.push(`${at}: Unknown record type '${record.kind}'`);
    }
  }

  for (const record of pendingEdges) {
    try {
      const [sourceId, targetId, type, weight] = record.fields;
      graph.addEdge(new BrainEdge({
        sourceId,
        targetId,
        type,
        weight: parseNumber(weight, 'weight'),
      }));
    } catch (err) {
      problems.push(`Line ${record.lineNumber}: Edge error: ${describeError(err)}`);
    }
  }

  problems.push(...graph.validate());

  if (problems.length > 0) {
    throw new GraphLoadError(problems);
  }

  logger.debug('graph parsed', { nodes: graph.size, edges: graph.edges.length });
  return graph;
}

/**
 * Read and parse a graph definition file
 */
export async function loadGraph(filePath: string): Promise<BrainGraph> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parseGraph(text);
}
