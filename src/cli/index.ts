/**
 * CLI module
 * @module cli
 */

export type { CommandConfig, CommandResult } from './types.js';
export { createEngine } from './bootstrap.js';
export { ChatShell, PROMPT, GOODBYE, type ShellReply } from './shell.js';
export * from './commands/index.js';
export * from './utils/index.js';
