/**
 * Events module - turn lifecycle notifications
 * @module events
 */

export {
  EventBus,
  type EngineEventMap,
  type EngineEventType,
  type EngineEvent,
  type EngineEventListener,
  type HistoryFilter,
  type EventBusOptions,
} from './event-bus.js';
