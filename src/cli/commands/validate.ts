/**
 * Validate Command - load both definition files and report every problem
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { CommandConfig, CommandResult } from '../types.js';
import { GraphLoadError, LexiconLoadError } from '../../core/errors.js';
import { parseGraph } from '../../loaders/graph-loader.js';
import { parseLexicon } from '../../loaders/lexicon-loader.js';
import { describeError } from '../../loaders/records.js';
import { hashText, shortDigest } from '../../utils/hash.js';
import { formatHeader } from '../utils/helpers.js';

interface FileReport {
  file: string;
  ok: boolean;
  summary?: string;
  digest?: string;
  problems: string[];
}

async function checkFile(
  filePath: string,
  parse: (text: string) => { summary(): string }
): Promise<FileReport> {
  const file = path.resolve(filePath);
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error: unknown) {
    return { file, ok: false, problems: [`Cannot read file: ${describeError(error)}`] };
  }

  try {
    const loaded = parse(text);
    return { file, ok: true, summary: loaded.summary(), digest: hashText(text), problems: [] };
  } catch (error: unknown) {
    if (error instanceof GraphLoadError || error instanceof LexiconLoadError) {
      return { file, ok: false, problems: error.problems };
    }
    throw error;
  }
}

export async function cmdValidate(config: CommandConfig): Promise<CommandResult> {
  const graph = await checkFile(config.graphPath, parseGraph);
  const lexicon = await checkFile(config.lexiconPath, parseLexicon);
  const success = graph.ok && lexicon.ok;

  if (config.json) {
    return success
      ? { success, data: { graph, lexicon } }
      : { success, data: { graph, lexicon }, error: 'Definition files have problems' };
  }

  let output = formatHeader('Validation');
  for (const [label, report] of [['Graph', graph], ['Lexicon', lexicon]] as const) {
    if (report.ok) {
      output += `  ${label} OK: ${report.summary} (${shortDigest(report.digest ?? '')})\n`;
    } else {
      output += `  ${label} FAILED: ${report.file}\n`;
      for (const problem of report.problems) {
        output += `    - ${problem}\n`;
      }
    }
  }

  return success
    ? { success, data: output.trimEnd() }
    : { success, error: output.trimEnd() };
}
