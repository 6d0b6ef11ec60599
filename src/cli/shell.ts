/**
 * Interactive chat shell
 *
 * Line commands: exit, debug, showbrain, profile, seed <n>. Anything else
 * is a conversation turn.
 *
 * @module cli/shell
 */

import * as readline from 'readline';
import type { ConversationEngine } from '../services/conversation-engine.js';
import { formatCompact, formatFull } from '../services/trace.js';
import { formatElapsed } from './utils/helpers.js';
import { isValidSeed } from './utils/validators.js';

export const PROMPT = 'You: ';
export const GOODBYE = 'Goodbye!';

export interface ShellReply {
  output: string;
  exit: boolean;
}

export class ChatShell {
  private engine: ConversationEngine;

  constructor(engine: ConversationEngine) {
    this.engine = engine;
  }

  async handleLine(line: string): Promise<ShellReply> {
    const input = line.trim();
    if (!input) {
      return { output: '', exit: false };
    }

    const cmd = input.toLowerCase();

    if (cmd === 'exit' || cmd === 'quit') {
      return { output: GOODBYE, exit: true };
    }

    if (cmd === 'debug') {
      this.engine.debugMode = !this.engine.debugMode;
      return { output: `Debug mode: ${this.engine.debugMode ? 'ON' : 'OFF'}`, exit: false };
    }

    if (cmd === 'showbrain') {
      return { output: this.engine.showBrain(), exit: false };
    }

    if (cmd === 'profile') {
      const profile = this.engine.profile();
      const mods = Object.entries(profile.modulators)
        .map(([k, v]) => `${k}=${v.toFixed(2)}`)
        .join(', ');
      return {
        output: [
          `Turns: ${profile.turns}`,
          `Memory episodes: ${profile.episodes}`,
          `Seed: ${profile.seed}`,
          `Modulators: ${mods}`,
        ].join('\n'),
        exit: false,
      };
    }

    if (cmd === 'seed' || cmd.startsWith('seed ')) {
      const result = isValidSeed(cmd.split(/\s+/)[1], 'seed');
      if (!result.valid) {
        return { output: 'Usage: seed <number>', exit: false };
      }
      this.engine.setSeed(result.value);
      return { output: `Seed set to ${result.value}`, exit: false };
    }

    const turn = await this.engine.processInput(input);
    const parts = [`\nBot: ${turn.response}`, formatCompact(turn.trace)];
    if (this.engine.debugMode) {
      parts.push(formatFull(turn.trace));
    }
    parts.push(`${formatElapsed(turn.elapsedMs)}\n`);
    return { output: parts.join('\n'), exit: false };
  }

  /**
   * Read lines until `exit` or end of input
   */
  async run(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ): Promise<void> {
    const rl = readline.createInterface({ input, output, terminal: false });
    output.write(`${this.engine.startupSummary()}\n\n`);
    output.write(PROMPT);

    try {
      for await (const line of rl) {
        const reply = await this.handleLine(line);
        if (reply.output) {
          output.write(`${reply.output}\n`);
        }
        if (reply.exit) {
          return;
        }
        output.write(PROMPT);
      }
      output.write(`\n${GOODBYE}\n`);
    } finally {
      rl.close();
    }
  }
}
