/**
 * CLI Helpers - output formatting shared by commands and the shell
 */

import type { CommandResult, CommandConfig } from '../types.js';

/**
 * Section header used by the text reports
 */
export function formatHeader(title: string): string {
  return `${title}:\n${'='.repeat(60)}\n`;
}

export function formatElapsed(ms: number): string {
  return `  [${ms.toFixed(1)}ms]`;
}

/**
 * Render a command result as text (JSON in --json mode)
 */
export function renderResult(result: CommandResult, config: Pick<CommandConfig, 'json'>): string {
  if (config.json) {
    return JSON.stringify(result, null, 2);
  }
  if (!result.success) {
    return `Error: ${result.error ?? 'unknown error'}`;
  }
  if (typeof result.data === 'string') {
    return result.data;
  }
  return result.data ? JSON.stringify(result.data, null, 2) : '';
}

/**
 * Print a command result based on config (JSON or human-readable)
 */
export function formatOutput(result: CommandResult, config: Pick<CommandConfig, 'json'>): void {
  const text = renderResult(result, config);
  if (result.success || config.json) {
    console.log(text);
  } else {
    console.error(text);
  }
}
