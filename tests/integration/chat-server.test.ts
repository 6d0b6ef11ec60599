/**
 * Integration Tests - Chat API
 *
 * The server listens on an OS-assigned local port for each test file.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ChatServer, MAX_INPUT_LENGTH } from '../../src/api/chat-server.js';
import { ConversationEngine } from '../../src/services/conversation-engine.js';
import { configureLogger, resetLogger, LogLevel } from '../../src/utils/logger.js';
import { GRAPH_PATH, LEXICON_PATH } from '../fixtures.js';

async function readBody(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  return typeof body === 'object' && body !== null ? { ...body } : {};
}

describe('ChatServer', () => {
  let server: ChatServer;
  let engine: ConversationEngine;
  let baseUrl: string;

  beforeAll(async () => {
    configureLogger({ level: LogLevel.SILENT });
    engine = await ConversationEngine.fromFiles(GRAPH_PATH, LEXICON_PATH);
    await engine.init();
    server = new ChatServer({ engine, port: 0 });
    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}/api`;
  });

  afterAll(async () => {
    await server.stop();
    await engine.close();
    resetLogger();
  });

  const post = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  it('should report health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', seed: 42 });
  });

  it('should describe the brain', async () => {
    const res = await fetch(`${baseUrl}/brain`);
    const body = await readBody(res);
    expect(body).toMatchObject({
      categories: { concept: 30, topic: 4, emotion: 4, goal: 5, motor: 5, lexeme: 4 },
    });
  });

  it('should answer a chat turn', async () => {
    const res = await post('/chat', { text: 'hello, how is the weather?' });
    expect(res.status).toBe(200);

    const body = await readBody(res);
    expect(typeof body.response).toBe('string');
    expect(body.goal).toMatch(/^goal_/);
    expect(Array.isArray(body.words)).toBe(true);
    expect(body.turn).toBe(engine.turnCount);
  });

  it('should serialize concurrent turns', async () => {
    const before = engine.turnCount;
    const replies = await Promise.all([post('/chat', { text: 'rain' }), post('/chat', { text: 'sun' })]);
    const turns = await Promise.all(replies.map(async r => (await readBody(r)).turn));

    expect(turns).toHaveLength(2);
    expect(turns).toContain(before + 1);
    expect(turns).toContain(before + 2);
  });

  it('should reject missing or oversized text', async () => {
    const missing = await post('/chat', {});
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: 'Bad Request', message: 'text is required' });

    const long = await post('/chat', { text: 'a'.repeat(MAX_INPUT_LENGTH + 1) });
    expect(long.status).toBe(400);
  });

  it('should reject malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"text":',
    });
    expect(res.status).toBe(400);
  });

  it('should reseed the session', async () => {
    const ok = await post('/seed', { seed: 7 });
    expect(await ok.json()).toEqual({ seed: 7 });
    expect(engine.seed).toBe(7);

    const bad = await post('/seed', { seed: -3 });
    expect(bad.status).toBe(400);
  });

  it('should return JSON for unknown endpoints', async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: 'Not Found' });
  });
});
