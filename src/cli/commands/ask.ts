/**
 * Ask Command - one turn, response plus thought trace
 */

import type { CommandConfig, CommandResult } from '../types.js';
import type { ConversationEngine } from '../../services/conversation-engine.js';
import { formatCompact, formatFull } from '../../services/trace.js';
import { formatElapsed } from '../utils/helpers.js';
import { missingArgError } from '../utils/validators.js';

export async function cmdAsk(
  args: string[],
  config: CommandConfig,
  engine: ConversationEngine
): Promise<CommandResult> {
  const text = args.join(' ').trim();
  if (!text) {
    return missingArgError('text', 'cortex ask <text...>');
  }

  const result = await engine.processInput(text);

  if (config.json) {
    return {
      success: true,
      data: {
        response: result.response,
        turn: result.turn,
        goal: result.trace.selectedGoal,
        words: result.trace.finalWords,
        elapsedMs: result.elapsedMs,
        trace: result.trace,
      },
    };
  }

  const parts = [`Bot: ${result.response}`, formatCompact(result.trace)];
  if (engine.debugMode) {
    parts.push(formatFull(result.trace));
  }
  parts.push(formatElapsed(result.elapsedMs));
  return { success: true, data: parts.join('\n') };
}
