/**
 * Chat Server - small Express API over one conversation engine
 *
 * Turns are serialized through a queue: the engine owns mutable graph
 * activation and a single random source.
 *
 * @module api/chat-server
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import http from 'http';
import type { ConversationEngine } from '../services/conversation-engine.js';
import { SerialTaskQueue, QueueFullError } from '../utils/serial-queue.js';
import { apiLogger } from '../utils/logger.js';

const logger = apiLogger.child('chat');

export const MAX_INPUT_LENGTH = 2000;

export interface ChatServerOptions {
  engine: ConversationEngine;
  port?: number;
  host?: string;
}

export interface ChatReply {
  response: string;
  turn: number;
  goal: string;
  words: string[];
  elapsedMs: number;
}

/** Raised for request bodies that fail validation; mapped to 400 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

function readField(body: unknown, field: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.getOwnPropertyDescriptor(body, field)?.value;
}

export class ChatServer {
  private app: Express;
  private server: http.Server | null = null;
  private engine: ConversationEngine;
  private port: number;
  private host: string;
  private turns = new SerialTaskQueue(50);
  private startTime: number = Date.now();

  constructor(options: ChatServerOptions) {
    this.engine = options.engine;
    this.port = options.port ?? 3000;
    this.host = options.host ?? '127.0.0.1';

    this.app = express();
    this.app.use(express.json({ limit: '64kb' }));
    this.app.use(cors({
      origin: (origin, callback) => {
        // Same-origin (no header) and localhost only
        if (!origin || origin.startsWith('http://localhost:') || origin.startsWith('http://127.0.0.1:')) {
          callback(null, true);
        } else {
          callback(new Error('Origin not allowed'));
        }
      },
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type'],
    }));

    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupRoutes(): void {
    const api = express.Router();

    api.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        uptime: Math.floor((Date.now() - this.startTime) / 1000),
        turns: this.engine.turnCount,
        seed: this.engine.seed,
      });
    });

    api.get('/brain', (_req: Request, res: Response) => {
      res.json({
        summary: this.engine.graph.summary(),
        categories: this.engine.graph.categoryCounts(),
        edgeTypes: this.engine.graph.edgeTypeCounts(),
        lexicon: {
          words: this.engine.lexicon.wordCount,
          phrases: this.engine.lexicon.phraseCount,
          synonyms: this.engine.lexicon.synonymCount,
          stopwords: this.engine.lexicon.stopwordCount,
        },
      });
    });

    api.post('/chat', (req: Request, res: Response, next: NextFunction) => {
      const text = readField(req.body, 'text');
      if (typeof text !== 'string' || text.trim() === '') {
        next(new BadRequestError('text is required'));
        return;
      }
      if (text.length > MAX_INPUT_LENGTH) {
        next(new BadRequestError(`text exceeds ${MAX_INPUT_LENGTH} characters`));
        return;
      }

      this.turns
        .run(() => this.engine.processInput(text), 'chat turn')
        .then(result => {
          const reply: ChatReply = {
            response: result.response,
            turn: result.turn,
            goal: result.trace.selectedGoal,
            words: result.trace.finalWords,
            elapsedMs: result.elapsedMs,
          };
          res.json(reply);
        })
        .catch(next);
    });

    api.post('/seed', (req: Request, res: Response, next: NextFunction) => {
      const seed = readField(req.body, 'seed');
      if (typeof seed !== 'number' || !Number.isInteger(seed) || seed < 0) {
        next(new BadRequestError('seed must be a non-negative integer'));
        return;
      }
      this.turns
        .run(async () => this.engine.setSeed(seed), 'reseed')
        .then(() => res.json({ seed: this.engine.seed }))
        .catch(next);
    });

    this.app.use('/api', api);
  }

  private setupErrorHandling(): void {
    this.app.use('/api/', (_req: Request, res: Response) => {
      res.status(404).json({
        error: 'Not Found',
        message: 'The requested API endpoint does not exist.',
      });
    });

    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof BadRequestError || err instanceof SyntaxError) {
        res.status(400).json({ error: 'Bad Request', message: err.message });
        return;
      }
      if (err instanceof QueueFullError) {
        res.status(503).json({ error: 'Service Unavailable', message: 'Too many pending turns.' });
        return;
      }

      logger.error('request failed', { error: err.message });
      res.status(500).json({
        error: 'Internal Server Error',
        message: 'An unexpected error occurred. Check server logs for details.',
      });
    });
  }

  /**
   * Start listening; resolves with the bound port (useful with port 0)
   */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        const address = server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : this.port;
        logger.info('chat API listening', { url: `http://${this.host}:${bound}` });
        resolve(bound);
      });
      this.server = server;

      server.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE') {
          reject(new Error(
            `Port ${this.port} is already in use.\n` +
            `  Try a different port: cortex serve --port ${this.port + 1}`
          ));
        } else {
          reject(err);
        }
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    logger.info('chat API stopped');
  }

  /**
   * Express application instance (useful for testing)
   */
  getApp(): Express {
    return this.app;
  }
}
