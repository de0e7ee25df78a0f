/**
 * Typed, ordered conduit between the connection and its consumers
 * (simulation engine, telegram log, console logger, HTTP API).
 *
 * Events are queued on publish and delivered in order on a microtask, so a
 * listener reacting to one event (e.g. queueing a reply) never re-enters the
 * code that produced it. `purge()` drops whatever has not been delivered yet.
 */

import type { Telegram } from "./telegram.js";

export type ConnectionStatus = "connecting" | "connected" | "disconnected" | "error";
export type ErrorKind = "validation" | "connect" | "stream" | "overflow";
export type Handshake = "" | "REQ" | "ACK";

interface EventBase {
  /** Epoch of the session that produced the event, 0 outside any session. */
  session: number;
  at: Date;
}

export interface StatusEvent extends EventBase {
  type: "status";
  status: ConnectionStatus;
}

export interface RecvEvent extends EventBase {
  type: "recv";
  telegram: Telegram;
  outcome: "parsed" | "recovered";
  issues: string[];
  bytes: Buffer;
}

export interface SentEvent extends EventBase {
  type: "sent";
  telegram: Telegram;
  bytes: Buffer;
  handshake: Handshake;
}

export interface ErrorEvent extends EventBase {
  type: "error";
  kind: ErrorKind;
  message: string;
}

export type DeviceEvent = StatusEvent | RecvEvent | SentEvent | ErrorEvent;
export type DeviceEventType = DeviceEvent["type"];
export type DeviceEventMap = {
  [K in DeviceEventType]: Extract<DeviceEvent, { type: K }>;
};

export type EventListener<T extends DeviceEventType> = (event: DeviceEventMap[T]) => void;
export type AnyEventListener = (event: DeviceEvent) => void;

export class EventChannel {
  private readonly queue: DeviceEvent[] = [];
  private readonly listeners = new Map<DeviceEventType, Set<AnyEventListener>>();
  private readonly wildcard = new Set<AnyEventListener>();
  private flushScheduled = false;
  private flushing = false;

  publish(event: DeviceEvent): void {
    this.queue.push(event);
    if (!this.flushScheduled) {
      this.flushScheduled = true;
      queueMicrotask(() => this.flush());
    }
  }

  /** Delivers every pending event now. Safe to call re-entrantly. */
  flush(): void {
    this.flushScheduled = false;
    if (this.flushing) return;
    this.flushing = true;
    try {
      let event = this.queue.shift();
      while (event) {
        this.deliver(event);
        event = this.queue.shift();
      }
    } finally {
      this.flushing = false;
    }
  }

  /** Drops undelivered events. Returns how many were dropped. */
  purge(): number {
    const dropped = this.queue.length;
    this.queue.length = 0;
    return dropped;
  }

  get pending(): number {
    return this.queue.length;
  }

  on<T extends DeviceEventType>(eventType: T, listener: EventListener<T>): () => void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    const wrapped = narrow(eventType, listener);
    set.add(wrapped);
    return () => {
      set.delete(wrapped);
    };
  }

  once<T extends DeviceEventType>(eventType: T, listener: EventListener<T>): () => void {
    const off = this.on(eventType, (event) => {
      off();
      listener(event);
    });
    return off;
  }

  subscribe(listener: AnyEventListener): () => void {
    this.wildcard.add(listener);
    return () => {
      this.wildcard.delete(listener);
    };
  }

  private deliver(event: DeviceEvent): void {
    const targets = [...(this.listeners.get(event.type) ?? []), ...this.wildcard];
    for (const listener of targets) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[✗] Listener failed on "${event.type}" event:`, err);
      }
    }
  }
}

function narrow<T extends DeviceEventType>(eventType: T, listener: EventListener<T>): AnyEventListener {
  return (event) => {
    if (isEventOf(eventType, event)) listener(event);
  };
}

function isEventOf<T extends DeviceEventType>(eventType: T, event: DeviceEvent): event is DeviceEventMap[T] {
  return event.type === eventType;
}

// ── Event constructors ───────────────────────────────────────────────────────

export function statusEvent(session: number, status: ConnectionStatus): StatusEvent {
  return { type: "status", status, session, at: new Date() };
}

export function errorEvent(session: number, kind: ErrorKind, message: string): ErrorEvent {
  return { type: "error", kind, message, session, at: new Date() };
}
