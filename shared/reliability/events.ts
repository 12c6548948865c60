import { createLogger } from "../telemetry/logger";

export type ReliabilityEvent =
  | {
      type: "cache:hit";
      timestamp: number;
      key: string;
    }
  | {
      type: "cache:miss";
      timestamp: number;
      key: string;
      expired: boolean;
    }
  | {
      type: "cache:evicted";
      timestamp: number;
      key: string;
      size: number;
    }
  | {
      type: "storage:fault";
      timestamp: number;
      storageKey: string;
      operation: "read" | "write";
      reason: string;
    }
  | {
      type: "outbox:queued";
      timestamp: number;
      path: string;
      pending: number;
      persisted: boolean;
    }
  | {
      type: "outbox:sweep";
      timestamp: number;
      attempted: number;
      delivered: number;
      remaining: number;
    }
  | {
      type: "network:state";
      timestamp: number;
      online: boolean;
      reason?: string;
    }
  | {
      type: "gateway:rejected";
      timestamp: number;
      method: "GET" | "POST";
      path: string;
      httpStatus: number;
      reason: string;
    }
  | {
      type: "gateway:unreachable";
      timestamp: number;
      method: "GET" | "POST";
      path: string;
      reason: string;
    }
  | {
      type: "photo:compressed";
      timestamp: number;
      width: number;
      height: number;
      quality: number;
      bytes: number;
      withinBudget: boolean;
    }
  | {
      type: "photo:rejected";
      timestamp: number;
      reason: string;
    };

type Listener = (event: ReliabilityEvent) => void;

const logger = createLogger("reliability");

const listeners = new Set<Listener>();
let events: ReliabilityEvent[] = [];

const MAX_EVENT_AGE_MS = 60 * 60 * 1000; // keep one hour of history

function prune(now: number): void {
  const cutoff = now - MAX_EVENT_AGE_MS;
  events = events.filter((event) => event.timestamp >= cutoff);
}

export function emitReliabilityEvent(event: ReliabilityEvent): void {
  events.push(event);
  prune(Date.now());
  listeners.forEach((listener) => {
    try {
      listener(event);
    } catch (error) {
      logger.warn("reliability listener failed", {
        type: event.type,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  });
}

export function subscribeReliabilityEvents(listener: Listener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function recentReliabilityEvents(windowMs: number): ReliabilityEvent[] {
  const now = Date.now();
  prune(now);
  const cutoff = now - Math.max(0, windowMs);
  return events
    .filter((event) => event.timestamp >= cutoff)
    .map((event) => ({ ...event }));
}

export function __resetReliabilityEventsForTests(): void {
  events = [];
  listeners.clear();
}
