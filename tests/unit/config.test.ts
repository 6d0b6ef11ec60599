/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../../src/config.js';
import { LogLevel } from '../../src/utils/logger.js';

describe('loadConfig', () => {
  it('should return defaults for an empty environment', () => {
    const { config, warnings } = loadConfig({});
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([]);
  });

  it('should read every variable', () => {
    const { config, warnings } = loadConfig({
      CORTEX_GRAPH_PATH: ' ./g.brain ',
      CORTEX_LEXICON_PATH: './l.brain',
      CORTEX_SEED: '7',
      CORTEX_STEPS: '5',
      CORTEX_INHIBITION: '0.5',
      CORTEX_COMPETITION: 'no',
      CORTEX_DATA_DIR: '/tmp/cortex',
      CORTEX_PORT: '0',
      CORTEX_LOG_LEVEL: 'debug',
    });

    expect(warnings).toEqual([]);
    expect(config).toEqual({
      graphPath: './g.brain',
      lexiconPath: './l.brain',
      seed: 7,
      steps: 5,
      inhibitionStrength: 0.5,
      competitionWithinCategory: false,
      dataDir: '/tmp/cortex',
      port: 0,
      logLevel: LogLevel.DEBUG,
    });
  });

  it('should treat blank values as unset', () => {
    const { config, warnings } = loadConfig({ CORTEX_SEED: '  ', CORTEX_GRAPH_PATH: '' });
    expect(config.seed).toBe(42);
    expect(config.graphPath).toBe('data/graph.brain');
    expect(warnings).toEqual([]);
  });

  it('should fall back with a warning for unusable values', () => {
    const { config, warnings } = loadConfig({
      CORTEX_SEED: '-1',
      CORTEX_STEPS: '2.5',
      CORTEX_INHIBITION: '1.5',
      CORTEX_COMPETITION: 'maybe',
      CORTEX_LOG_LEVEL: 'loud',
    });

    expect(config.seed).toBe(42);
    expect(config.steps).toBe(20);
    expect(config.inhibitionStrength).toBe(0.15);
    expect(config.competitionWithinCategory).toBe(true);
    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(warnings).toEqual([
      "CORTEX_LOG_LEVEL='loud' is not a log level, using info",
      "CORTEX_SEED='-1' is not an integer >= 0, using 42",
      "CORTEX_STEPS='2.5' is not an integer >= 0, using 20",
      "CORTEX_INHIBITION='1.5' is not a number in [0, 1], using 0.15",
      "CORTEX_COMPETITION='maybe' is not a boolean, using true",
    ]);
  });
});
