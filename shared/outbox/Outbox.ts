import type { StorageBackend } from "../core/pstore";
import { emitReliabilityEvent } from "../reliability/events";
import { createLogger } from "../telemetry/logger";

export type OutboxBody = Record<string, unknown>;

export type OutboxItem = {
  path: string;
  body: OutboxBody;
  ts: number;
};

export type DeliveryResult =
  | { status: "delivered" }
  | { status: "kept"; reason: string };

export type OutboxSender = (item: OutboxItem) => Promise<DeliveryResult>;

export type OutboxState = {
  pending: number;
  draining: boolean;
  lastSweepAt: number | null;
  lastDelivered: number;
  lastError: string | null;
};

type ScanOutboxOptions = {
  storageKey?: string;
  sender?: OutboxSender;
  now?: () => number;
};

export const OUTBOX_KEY = "scan.outbox.v1";

const DEFAULT_STATE: OutboxState = {
  pending: 0,
  draining: false,
  lastSweepAt: null,
  lastDelivered: 0,
  lastError: null,
};

const logger = createLogger("outbox");

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function toOutboxItem(value: unknown): OutboxItem | null {
  if (!isRecord(value) || typeof value.path !== "string" || !isRecord(value.body)) {
    return null;
  }
  const ts = Number(value.ts);
  return { path: value.path, body: value.body, ts: Number.isFinite(ts) ? ts : 0 };
}

function renderError(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === "string" && error.trim()) {
    return error.trim();
  }
  return "outbox-error";
}

/**
 * Persisted FIFO of submissions that could not reach the server. Items are
 * retried on every sweep until the server acknowledges them; there is no
 * attempt cap and no backoff.
 */
export class ScanOutbox {
  private readonly storageKey: string;
  private readonly now: () => number;
  private readonly listeners = new Set<() => void>();
  private sender: OutboxSender | null;
  private mutex: Promise<void> = Promise.resolve();
  private drainingPromise: Promise<OutboxItem[]> | null = null;
  private state: OutboxState = { ...DEFAULT_STATE };

  constructor(
    private readonly storage: StorageBackend,
    options: ScanOutboxOptions = {},
  ) {
    this.storageKey = options.storageKey ?? OUTBOX_KEY;
    this.now = options.now ?? (() => Date.now());
    this.sender = options.sender ?? null;
  }

  setSender(sender: OutboxSender | null): void {
    this.sender = sender;
  }

  /** Returns the new queue length, or 0 when the item could not be persisted. */
  async push(item: { path: string; body: OutboxBody }): Promise<number> {
    const stamped: OutboxItem = { path: item.path, body: { ...item.body }, ts: this.now() };
    const pending = await this.withLock(async () => {
      try {
        const items = await this.load();
        const updated = items.concat(stamped);
        await this.save(updated);
        return updated.length;
      } catch (error) {
        logger.warn("outbox push not persisted", { path: item.path, reason: renderError(error) });
        return 0;
      }
    });
    emitReliabilityEvent({
      type: "outbox:queued",
      timestamp: stamped.ts,
      path: stamped.path,
      pending,
      persisted: pending > 0,
    });
    return pending;
  }

  async items(): Promise<OutboxItem[]> {
    return this.withLock(async () => {
      try {
        return await this.load();
      } catch (error) {
        logger.warn("outbox read failed", { reason: renderError(error) });
        return [];
      }
    });
  }

  async size(): Promise<number> {
    return (await this.items()).length;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSnapshot(): OutboxState {
    return { ...this.state };
  }

  /** Runs one sweep; concurrent callers share it. Never rejects. */
  async drain(): Promise<OutboxItem[]> {
    if (this.drainingPromise) {
      return this.drainingPromise;
    }
    this.drainingPromise = this.runDrain();
    try {
      return await this.drainingPromise;
    } finally {
      this.drainingPromise = null;
    }
  }

  private async runDrain(): Promise<OutboxItem[]> {
    this.updateState({ draining: true });
    let snapshot: OutboxItem[] = [];
    const kept: OutboxItem[] = [];
    let lastError: string | null = null;
    try {
      snapshot = await this.items();
      for (const item of snapshot) {
        const result = await this.deliver(item);
        if (result.status !== "delivered") {
          kept.push(item);
          lastError = result.reason;
        }
      }
      const remaining = await this.withLock(async () => {
        let current: OutboxItem[] = [];
        try {
          current = await this.load();
        } catch (error) {
          logger.warn("outbox reload before overwrite failed", { reason: renderError(error) });
        }
        // anything pushed while the sweep was in flight sits past the snapshot
        const updated = kept.concat(current.slice(snapshot.length));
        try {
          await this.save(updated);
        } catch (error) {
          lastError = renderError(error);
          logger.warn("outbox overwrite failed", { reason: lastError });
          return current;
        }
        return updated;
      });
      const delivered = snapshot.length - kept.length;
      if (snapshot.length) {
        logger.info("outbox sweep finished", {
          attempted: snapshot.length,
          delivered,
          remaining: remaining.length,
        });
        emitReliabilityEvent({
          type: "outbox:sweep",
          timestamp: this.now(),
          attempted: snapshot.length,
          delivered,
          remaining: remaining.length,
        });
      }
      this.updateState({ lastSweepAt: this.now(), lastDelivered: delivered, lastError });
      return remaining;
    } finally {
      this.updateState({ draining: false });
    }
  }

  private async deliver(item: OutboxItem): Promise<DeliveryResult> {
    if (!this.sender) {
      return { status: "kept", reason: "no sender registered" };
    }
    try {
      return await this.sender(item);
    } catch (error) {
      return { status: "kept", reason: renderError(error) };
    }
  }

  private async load(): Promise<OutboxItem[]> {
    const raw = await this.storage.getItem(this.storageKey);
    if (!raw) {
      this.updateState({ pending: 0 });
      return [];
    }
    const parsed: unknown = JSON.parse(raw);
    const items = Array.isArray(parsed)
      ? parsed.map(toOutboxItem).filter((item): item is OutboxItem => item !== null)
      : [];
    this.updateState({ pending: items.length });
    return items;
  }

  private async save(items: OutboxItem[]): Promise<void> {
    if (items.length === 0) {
      await this.storage.removeItem(this.storageKey);
    } else {
      await this.storage.setItem(this.storageKey, JSON.stringify(items));
    }
    this.updateState({ pending: items.length });
  }

  private updateState(patch: Partial<OutboxState>): void {
    this.state = { ...this.state, ...patch };
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (error) {
        logger.warn("outbox listener failed", { reason: renderError(error) });
      }
    }
  }

  private async withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.mutex.then(task, task);
    this.mutex = run
      .then(() => undefined)
      .catch(() => undefined);
    return run;
  }
}
