#!/usr/bin/env node
/**
 * Cortex CLI - chat with a spreading-activation brain
 *
 * Definition files and defaults come from CORTEX_* environment variables
 * (or .env); flags override them.
 */

import { parseArgs } from 'node:util';
import * as dotenv from 'dotenv';
import { loadConfig } from '../src/config.js';
import type { CommandConfig, CommandResult } from '../src/cli/types.js';
import { createEngine } from '../src/cli/bootstrap.js';
import { cmdAsk, cmdBrain, cmdValidate } from '../src/cli/commands/index.js';
import { ChatShell } from '../src/cli/shell.js';
import { formatOutput } from '../src/cli/utils/helpers.js';
import {
  check,
  isValidPort,
  isValidSeed,
  isValidStepCount,
  validationError,
  type ValidationError,
} from '../src/cli/utils/validators.js';
import { ChatServer } from '../src/api/chat-server.js';
import { cliLogger, configureLogger, LogLevel } from '../src/utils/logger.js';

dotenv.config();

const VERSION = '1.0.0';

const HELP = `
Cortex Chat v${VERSION}
Deterministic conversation from spreading activation over a concept graph

Usage: cortex [command] [options]

Commands:
  chat                  Interactive shell (default)
  ask <text...>         Process one turn and print the response with its trace
  brain                 Graph and lexicon report
  validate              Load both definition files and list every problem
  serve                 Start the HTTP chat API

Shell commands:
  exit                  Leave the shell
  debug                 Toggle the full thought trace
  showbrain             Graph statistics
  profile               Turn count, memory, seed and modulators
  seed <n>              Reseed the random source

Options:
  -h, --help            Show this help message
  -v, --version         Show version number
  -g, --graph           Graph definition file (default: data/graph.brain)
  -l, --lexicon         Lexicon definition file (default: data/lexicon.brain)
  -s, --seed            Random seed (default: 42)
  --steps               Dynamics steps per turn (default: 20)
  -d, --data-dir        Episode store directory (default: ./data/state)
  -p, --port            API port for serve (default: 3000)
  --persist             Keep turn history in the episode store
  --debug               Start with the full thought trace enabled
  --json                Output as JSON

Environment Variables:
  CORTEX_GRAPH_PATH, CORTEX_LEXICON_PATH, CORTEX_SEED, CORTEX_STEPS,
  CORTEX_INHIBITION, CORTEX_COMPETITION, CORTEX_DATA_DIR, CORTEX_PORT,
  CORTEX_LOG_LEVEL

Examples:
  cortex
  cortex ask "hello, how is the weather today?"
  cortex validate --graph ./my.graph.brain
  cortex serve -p 4000 --persist
`;

// ============== Config ==============

function parseConfig(): { command: string; args: string[]; config: CommandConfig } {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
      graph: { type: 'string', short: 'g' },
      lexicon: { type: 'string', short: 'l' },
      seed: { type: 'string', short: 's' },
      steps: { type: 'string' },
      'data-dir': { type: 'string', short: 'd' },
      port: { type: 'string', short: 'p' },
      persist: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (values.version) {
    console.log(VERSION);
    process.exit(0);
  }

  const { config: env, warnings } = loadConfig(process.env);
  configureLogger({ level: values.json ? Math.max(env.logLevel, LogLevel.WARN) : env.logLevel });
  for (const warning of warnings) {
    cliLogger.warn(warning);
  }

  const errors: ValidationError[] = [];
  const seed = values.seed === undefined ? env.seed : check(isValidSeed, values.seed, 'seed', errors);
  const steps = values.steps === undefined ? env.steps : check(isValidStepCount, values.steps, 'steps', errors);
  const port = values.port === undefined ? env.port : check(isValidPort, values.port, 'port', errors);

  if (seed === undefined || steps === undefined || port === undefined) {
    exitWith(validationError(errors), values.json ?? false);
  }

  return {
    command: positionals[0] ?? 'chat',
    args: positionals.slice(1),
    config: {
      json: values.json ?? false,
      debug: values.debug ?? false,
      persist: values.persist ?? false,
      graphPath: values.graph ?? env.graphPath,
      lexiconPath: values.lexicon ?? env.lexiconPath,
      seed,
      steps,
      inhibitionStrength: env.inhibitionStrength,
      competitionWithinCategory: env.competitionWithinCategory,
      dataDir: values['data-dir'] ?? env.dataDir,
      port,
    },
  };
}

function exitWith(result: CommandResult, json: boolean): never {
  formatOutput(result, { json });
  process.exit(result.success ? 0 : 1);
}

// ============== Commands ==============

async function cmdChat(config: CommandConfig): Promise<void> {
  const engine = await createEngine(config);
  try {
    await new ChatShell(engine).run();
  } finally {
    await engine.close();
  }
}

async function cmdServe(config: CommandConfig): Promise<void> {
  const engine = await createEngine(config);
  const server = new ChatServer({ engine, port: config.port });

  const shutdown = async () => {
    console.log('\nShutting down chat API...');
    await server.stop();
    await engine.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  const port = await server.start();
  console.log(`Cortex chat API running at http://127.0.0.1:${port}`);
  console.log('Press Ctrl+C to stop\n');
}

// ============== Main Dispatcher ==============

async function main() {
  const { command, args, config } = parseConfig();

  switch (command) {
    case 'chat':
      await cmdChat(config);
      break;

    case 'ask': {
      const engine = await createEngine(config);
      let result: CommandResult;
      try {
        result = await cmdAsk(args, config, engine);
      } finally {
        await engine.close();
      }
      exitWith(result, config.json);
    }

    case 'brain': {
      const engine = await createEngine(config);
      const result = cmdBrain(config, engine);
      await engine.close();
      exitWith(result, config.json);
    }

    case 'validate':
      exitWith(await cmdValidate(config), config.json);

    case 'serve':
      await cmdServe(config);
      break;

    case 'help':
    default:
      console.log(HELP);
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error('Error:', message);
  process.exit(1);
});
