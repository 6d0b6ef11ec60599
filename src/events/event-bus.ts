/**
 * Engine Events - turn lifecycle notifications
 *
 * The conversation engine announces each pipeline stage here, so the
 * shell, the chat API and tests can follow a turn from outside. Every
 * event type has one payload shape, checked at the publish site.
 *
 * @module events/event-bus
 */

import { EventEmitter } from 'events';

export interface EngineEventMap {
  'engine:ready': { sessionId: string };
  'turn:started': { turn: number; text: string };
  'dynamics:settled': { turn: number; steps: number; digest: string };
  'goal:selected': { turn: number; goal: string; activation: number };
  'motor:generated': { turn: number; words: string[]; candidates: number };
  'turn:completed': { turn: number; response: string; goal: string; elapsedMs: number };
  'memory:persisted': { turn: number; episodeId: string };
  'session:reseeded': { seed: number };
}

export type EngineEventType = keyof EngineEventMap;

export interface EngineEvent<K extends EngineEventType = EngineEventType> {
  type: K;
  /** ISO 8601 */
  at: string;
  source: string;
  /** `<sessionId>:<turn>` for the events of one turn */
  correlationId?: string;
  payload: EngineEventMap[K];
}

export type EngineEventListener<K extends EngineEventType = EngineEventType> = (event: EngineEvent<K>) => void;

export interface HistoryFilter {
  types?: readonly EngineEventType[];
  source?: string;
  correlationId?: string;
}

export interface EventBusOptions {
  /** Events kept for `history()`; 0 keeps none (default: 500) */
  maxHistory?: number;
}

const ANY = 'any';

/**
 * @example
 * ```typescript
 * const bus = new EventBus();
 * bus.subscribe('goal:selected', (event) => console.log(event.payload.goal));
 * bus.publish('goal:selected', 'engine', { turn: 1, goal: 'goal_greet', activation: 0.6 });
 * ```
 */
export class EventBus extends EventEmitter {
  private readonly capacity: number;
  private retained: EngineEvent[] = [];

  constructor(options: EventBusOptions = {}) {
    super();
    this.capacity = Math.max(0, options.maxHistory ?? 500);
    this.setMaxListeners(50);
  }

  publish<K extends EngineEventType>(
    type: K,
    source: string,
    payload: EngineEventMap[K],
    correlationId?: string
  ): EngineEvent<K> {
    const event: EngineEvent<K> = { type, at: new Date().toISOString(), source, correlationId, payload };

    if (this.capacity > 0) {
      this.retained.push(event);
      if (this.retained.length > this.capacity) {
        this.retained.shift();
      }
    }

    this.emit(type, event);
    this.emit(ANY, event);
    return event;
  }

  /**
   * Listen for one event type; returns the unsubscribe function
   */
  subscribe<K extends EngineEventType>(type: K, listener: EngineEventListener<K>): () => void {
    this.on(type, listener);
    return () => this.off(type, listener);
  }

  /**
   * Listen for every event
   */
  subscribeAll(listener: EngineEventListener): () => void {
    this.on(ANY, listener);
    return () => this.off(ANY, listener);
  }

  /**
   * Retained events, oldest first
   */
  history(filter: HistoryFilter = {}): EngineEvent[] {
    const { types, source, correlationId } = filter;
    return this.retained.filter(event =>
      (types === undefined || types.includes(event.type)) &&
      (source === undefined || event.source === source) &&
      (correlationId === undefined || event.correlationId === correlationId)
    );
  }

  clearHistory(): void {
    this.retained = [];
  }
}
