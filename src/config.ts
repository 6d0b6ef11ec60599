/**
 * Runtime configuration from environment variables
 * @module config
 */

import { LogLevel, parseLogLevel } from './utils/logger.js';

export interface CortexConfig {
  graphPath: string;
  lexiconPath: string;
  seed: number;
  steps: number;
  inhibitionStrength: number;
  competitionWithinCategory: boolean;
  dataDir: string;
  port: number;
  logLevel: LogLevel;
}

export interface LoadedConfig {
  config: CortexConfig;
  /** One entry per variable that was set but could not be used */
  warnings: string[];
}

export const DEFAULT_CONFIG: Readonly<CortexConfig> = Object.freeze({
  graphPath: 'data/graph.brain',
  lexiconPath: 'data/lexicon.brain',
  seed: 42,
  steps: 20,
  inhibitionStrength: 0.15,
  competitionWithinCategory: true,
  dataDir: './data/state',
  port: 3000,
  logLevel: LogLevel.INFO,
});

type Env = Readonly<Record<string, string | undefined>>;

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

export function loadConfig(env: Env = process.env): LoadedConfig {
  const warnings: string[] = [];

  const integer = (name: string, fallback: number, min: number): number => {
    const raw = env[name];
    if (!present(raw)) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      warnings.push(`${name}='${raw}' is not an integer >= ${min}, using ${fallback}`);
      return fallback;
    }
    return value;
  };

  const fraction = (name: string, fallback: number): number => {
    const raw = env[name];
    if (!present(raw)) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      warnings.push(`${name}='${raw}' is not a number in [0, 1], using ${fallback}`);
      return fallback;
    }
    return value;
  };

  const flag = (name: string, fallback: boolean): boolean => {
    const raw = env[name];
    if (!present(raw)) return fallback;
    switch (raw.trim().toLowerCase()) {
      case 'true':
      case '1':
      case 'yes':
        return true;
      case 'false':
      case '0':
      case 'no':
        return false;
      default:
        warnings.push(`${name}='${raw}' is not a boolean, using ${fallback}`);
        return fallback;
    }
  };

  const text = (name: string, fallback: string): string => {
    const raw = env[name];
    return present(raw) ? raw.trim() : fallback;
  };

  let logLevel = DEFAULT_CONFIG.logLevel;
  const rawLevel = env.CORTEX_LOG_LEVEL;
  if (present(rawLevel)) {
    const parsed = parseLogLevel(rawLevel);
    if (parsed === undefined) {
      warnings.push(`CORTEX_LOG_LEVEL='${rawLevel}' is not a log level, using info`);
    } else {
      logLevel = parsed;
    }
  }

  const config: CortexConfig = {
    graphPath: text('CORTEX_GRAPH_PATH', DEFAULT_CONFIG.graphPath),
    lexiconPath: text('CORTEX_LEXICON_PATH', DEFAULT_CONFIG.lexiconPath),
    seed: integer('CORTEX_SEED', DEFAULT_CONFIG.seed, 0),
    steps: integer('CORTEX_STEPS', DEFAULT_CONFIG.steps, 0),
    inhibitionStrength: fraction('CORTEX_INHIBITION', DEFAULT_CONFIG.inhibitionStrength),
    competitionWithinCategory: flag('CORTEX_COMPETITION', DEFAULT_CONFIG.competitionWithinCategory),
    dataDir: text('CORTEX_DATA_DIR', DEFAULT_CONFIG.dataDir),
    port: integer('CORTEX_PORT', DEFAULT_CONFIG.port, 0),
    logLevel,
  };

  return { config, warnings };
}
