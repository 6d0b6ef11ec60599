/**
 * CLI Types - Shared type definitions for CLI commands
 */

/**
 * Configuration for CLI commands, merged from flags and environment
 */
export interface CommandConfig {
  json: boolean;
  debug: boolean;
  persist: boolean;
  graphPath: string;
  lexiconPath: string;
  seed: number;
  steps: number;
  inhibitionStrength: number;
  competitionWithinCategory: boolean;
  dataDir: string;
  port: number;
}

/**
 * Result returned by CLI commands
 */
export interface CommandResult {
  success: boolean;
  data?: string | object;
  error?: string;
}
