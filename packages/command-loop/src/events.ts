/**
 * Event system for chat sessions.
 *
 * Every step of a turn emits a typed event. Events are delivered to the host
 * application via the EventEmitter.
 */

/**
 * Discriminator tags for session events.
 */
export type EventKind =
  | "TURN_START"
  | "REQUEST_SENT"
  | "CONTENT_DELTA"
  | "FUNCTION_CALL_START"
  | "FUNCTION_CALL_END"
  | "TURN_END"
  | "ROUND_LIMIT"
  | "ERROR";

/**
 * Payload carried by each event kind.
 */
export interface EventDataMap {
  TURN_START: { prompt: string };
  REQUEST_SENT: { round: number; messages: number; functions: number };
  CONTENT_DELTA: { delta: string };
  FUNCTION_CALL_START: { name: string; arguments: Record<string, string> };
  FUNCTION_CALL_END: { name: string; result?: string };
  TURN_END: { content: string; rounds: number };
  ROUND_LIMIT: { rounds: number };
  ERROR: { error: unknown };
}

/**
 * A single event emitted by a chat session.
 */
export interface SessionEvent<K extends EventKind = EventKind> {
  kind: K;
  timestamp: number;
  data: EventDataMap[K];
}

type EventHandler<K extends EventKind = EventKind> = (
  event: SessionEvent<K>,
) => void;

/**
 * Simple synchronous event emitter for session events.
 */
export class EventEmitter {
  private _handlers: Map<EventKind, EventHandler[]> = new Map();
  private _anyHandlers: EventHandler[] = [];

  /**
   * Subscribe to a specific event kind.
   */
  on<K extends EventKind>(kind: K, handler: EventHandler<K>): void {
    let handlers = this._handlers.get(kind);
    if (!handlers) {
      handlers = [];
      this._handlers.set(kind, handlers);
    }
    handlers.push((event) => {
      if (isKind(event, kind)) handler(event);
    });
  }

  /**
   * Subscribe to all events.
   */
  onAny(handler: EventHandler): void {
    this._anyHandlers.push(handler);
  }

  /**
   * Emit an event to all matching subscribers.
   */
  emit<K extends EventKind>(kind: K, data: EventDataMap[K]): void {
    const event: SessionEvent<K> = { kind, timestamp: Date.now(), data };
    // Specific handlers
    const handlers = this._handlers.get(kind);
    if (handlers) {
      for (const handler of handlers) {
        handler(event);
      }
    }
    // Any-handlers
    for (const handler of this._anyHandlers) {
      handler(event);
    }
  }

  /**
   * Remove all event listeners.
   */
  removeAllListeners(): void {
    this._handlers.clear();
    this._anyHandlers = [];
  }
}

function isKind<K extends EventKind>(
  event: SessionEvent,
  kind: K,
): event is SessionEvent<K> {
  return event.kind === kind;
}
