/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - keeps a bounded in-memory history
 *
 * The filesystem publishes what it does here; observers (the logger, the CLI)
 * subscribe. Listener failures never reach the emitter.
 */

import { ulid } from "ulid";

export type WriteBufferStrategyName = "none" | "simple" | "async" | "boundedQueue";

export interface FsEventMap {
  FsOperationEvent: {
    operation: string;
    path: string;
    durationMs: number;
    ok: boolean;
    error?: string;
  };
  RootChangeEvent: {
    rootId: string;
    path?: string;
  };
  UploadEvent: {
    path: string;
    nodeId: string;
    strategy: WriteBufferStrategyName;
    bytes: number;
    ok: boolean;
    error?: string;
  };
  CacheEvent: {
    action: "evict" | "clear";
    path: string;
    entries: number;
  };
}

export type EventType = keyof FsEventMap;

export interface EventEnvelope<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: number;
  payload: FsEventMap[K];
  meta?: Record<string, unknown>;
}

type Listener<K extends EventType> = (evt: EventEnvelope<K>) => void;
type AnyListener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number; // Maximum number of events in memory
  historyRetentionPolicy?: "truncate" | "circular"; // How to handle overflow
}

export class EventBus {
  private listeners: { [K in EventType]: Set<Listener<K>> } = {
    FsOperationEvent: new Set(),
    RootChangeEvent: new Set(),
    UploadEvent: new Set(),
    CacheEvent: new Set(),
  };
  private anyListeners: Set<AnyListener> = new Set();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 1000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on<K extends EventType>(type: K, listener: Listener<K>): void {
    this.listeners[type].add(listener);
  }

  off<K extends EventType>(type: K, listener: Listener<K>): void {
    this.listeners[type].delete(listener);
  }

  onAny(listener: AnyListener): void {
    this.anyListeners.add(listener);
  }

  offAny(listener: AnyListener): void {
    this.anyListeners.delete(listener);
  }

  emit<K extends EventType>(type: K, payload: FsEventMap[K], meta?: Record<string, unknown>): EventEnvelope<K> {
    const envelope: EventEnvelope<K> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };

    this.record(envelope);

    for (const l of this.listeners[type]) {
      try {
        l(envelope);
      } catch (e) {
        console.error(`[EventBus] Listener error for ${type}:`, e);
      }
    }

    for (const l of this.anyListeners) {
      try {
        l(envelope);
      } catch (e) {
        console.error(`[EventBus] Listener error (any):`, e);
      }
    }

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory<K extends EventType>(options: { since?: number; limit?: number; type: K }): EventEnvelope<K>[];
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[];
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;

    const since = options?.since;
    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    const type = options?.type;
    if (type) {
      filtered = filtered.filter((e) => e.type === type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }

  clearHistory(): void {
    this.history = [];
  }

  private record<K extends EventType>(envelope: EventEnvelope<K>): void {
    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      if (this.config.historyRetentionPolicy === "truncate") {
        const excess = this.history.length - this.config.maxHistorySize;
        this.history.splice(0, excess);
      } else {
        this.history.shift();
      }
    }
  }
}
