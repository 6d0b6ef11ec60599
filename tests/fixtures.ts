/**
 * Shared test helpers
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { BrainGraph } from '../src/core/brain-graph.js';
import { BrainNode } from '../src/core/brain-node.js';
import { BrainEdge } from '../src/core/brain-edge.js';
import type { EdgeDefinition, NodeDefinition } from '../src/types/index.js';

const here = path.dirname(fileURLToPath(import.meta.url));

export const DATA_DIR = path.resolve(here, '..', 'data');
export const GRAPH_PATH = path.join(DATA_DIR, 'graph.brain');
export const LEXICON_PATH = path.join(DATA_DIR, 'lexicon.brain');

/**
 * Build a graph from plain specs
 */
export function buildGraph(nodes: NodeDefinition[], edges: EdgeDefinition[] = []): BrainGraph {
  const graph = new BrainGraph();
  for (const def of nodes) {
    graph.addNode(new BrainNode(def));
  }
  for (const def of edges) {
    graph.addEdge(new BrainEdge(def));
  }
  return graph;
}

/**
 * Safe directory removal with retry for Windows EBUSY errors
 */
export async function safeRemoveDir(dir: string, maxRetries = 3): Promise<void> {
  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      await fs.rm(dir, { recursive: true, force: true });
      return;
    } catch (err: unknown) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code === 'EBUSY' && attempt < maxRetries - 1) {
        await new Promise(resolve => setTimeout(resolve, 100 * Math.pow(2, attempt)));
      } else if (code === 'ENOENT') {
        return;
      } else {
        throw err;
      }
    }
  }
}
