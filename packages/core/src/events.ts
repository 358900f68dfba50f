// EventBus: typed pub/sub for progress reporting around a session

import type { InvocationRequest, InvocationResult, Logger } from "./types";
import type { CrawlwiseError } from "./types";
import type { SessionState, TurnInput } from "./session-loop";

export interface CrawlwiseEvents {
  "session:state": { from: SessionState; to: SessionState };
  "turn:started": { turn: number; input: TurnInput };
  "turn:answered": { turn: number; text: string; invocations: number; durationMs: number };
  "turn:failed": { turn: number; error: CrawlwiseError };
  "capability:calling": { request: InvocationRequest };
  "capability:result": { result: InvocationResult; durationMs: number };
}

export type EventName = keyof CrawlwiseEvents;

export type Listener<K extends EventName> = (data: CrawlwiseEvents[K]) => void | Promise<void>;

export interface EventBus {
  /** Fire-and-forget emit. Listener errors are caught and logged, never block the caller. */
  emit<K extends EventName>(event: K, data: CrawlwiseEvents[K]): void;
  on<K extends EventName>(event: K, listener: Listener<K>): void;
  off<K extends EventName>(event: K, listener: Listener<K>): void;
}

type ListenerTable = { [K in EventName]?: Set<Listener<K>> };

export class SimpleEventBus implements EventBus {
  private readonly listeners: ListenerTable = {};
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "EventBus" });
  }

  emit<K extends EventName>(event: K, data: CrawlwiseEvents[K]): void {
    const listeners: Set<Listener<K>> | undefined = this.listeners[event];
    if (!listeners) return;

    for (const listener of listeners) {
      try {
        const result = listener(data);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error("Async listener error (fire-and-forget)", {
              event,
              error: String(error),
            });
          });
        }
      } catch (error) {
        this.logger.error("Sync listener error", { event, error: String(error) });
      }
    }
  }

  on<K extends EventName>(event: K, listener: Listener<K>): void {
    const existing: Set<Listener<K>> | undefined = this.listeners[event];
    if (existing) {
      existing.add(listener);
      return;
    }
    const created = new Set<Listener<K>>([listener]);
    const table: { [P in K]?: Set<Listener<P>> } = this.listeners;
    table[event] = created;
  }

  off<K extends EventName>(event: K, listener: Listener<K>): void {
    const listeners: Set<Listener<K>> | undefined = this.listeners[event];
    listeners?.delete(listener);
  }
}
