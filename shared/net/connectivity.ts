import type { OutboxItem, ScanOutbox } from "../outbox/Outbox";
import { emitReliabilityEvent } from "../reliability/events";
import { createLogger } from "../telemetry/logger";
import type { HealthStatus } from "./gateway";

export interface ConnectivityEventTarget {
  addEventListener(type: "online" | "offline", listener: () => void): void;
  removeEventListener(type: "online" | "offline", listener: () => void): void;
}

export type ConnectivityState = {
  online: boolean;
  lastProbe: HealthStatus | null;
  lastProbeAt: number | null;
};

type ConnectivityOptions = {
  outbox: ScanOutbox;
  probe?: () => Promise<HealthStatus>;
  initialOnline?: boolean;
  now?: () => number;
};

const logger = createLogger("net/connectivity");

/**
 * Tracks whether the server is reachable. Coming back online is the only
 * automatic trigger for an outbox sweep; there is no polling timer.
 */
export class ConnectivityMonitor {
  private readonly outbox: ScanOutbox;
  private readonly now: () => number;
  private readonly listeners = new Set<() => void>();
  private probeImpl: (() => Promise<HealthStatus>) | null;
  private state: ConnectivityState;

  constructor(options: ConnectivityOptions) {
    this.outbox = options.outbox;
    this.now = options.now ?? (() => Date.now());
    this.probeImpl = options.probe ?? null;
    this.state = {
      online: options.initialOnline ?? true,
      lastProbe: null,
      lastProbeAt: null,
    };
  }

  setProbe(probe: (() => Promise<HealthStatus>) | null): void {
    this.probeImpl = probe;
  }

  isOnline(): boolean {
    return this.state.online;
  }

  /** Returns the sweep started by an offline-to-online transition, if any. */
  setOnline(online: boolean, reason?: string): Promise<OutboxItem[]> | null {
    const wasOnline = this.state.online;
    if (wasOnline === online) {
      return null;
    }
    this.updateState({ online });
    logger.info(online ? "connection restored" : "connection lost", reason ? { reason } : undefined);
    emitReliabilityEvent({
      type: "network:state",
      timestamp: this.now(),
      online,
      ...(reason ? { reason } : {}),
    });
    return online ? this.outbox.drain() : null;
  }

  attach(target: ConnectivityEventTarget): () => void {
    const handleOnline = () => {
      void this.setOnline(true, "event");
    };
    const handleOffline = () => {
      void this.setOnline(false, "event");
    };
    target.addEventListener("online", handleOnline);
    target.addEventListener("offline", handleOffline);
    return () => {
      target.removeEventListener("online", handleOnline);
      target.removeEventListener("offline", handleOffline);
    };
  }

  async probe(): Promise<HealthStatus> {
    if (!this.probeImpl) {
      return this.state.online ? "online" : "offline";
    }
    const status = await this.probeImpl();
    this.updateState({ lastProbe: status, lastProbeAt: this.now() });
    if (status === "offline") {
      void this.setOnline(false, "probe");
    } else {
      const sweep = this.setOnline(true, "probe");
      if (sweep) {
        await sweep;
      }
    }
    return status;
  }

  /** Explicit sweep requested by the user. */
  async syncNow(): Promise<OutboxItem[]> {
    return this.outbox.drain();
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSnapshot(): ConnectivityState {
    return { ...this.state };
  }

  private updateState(patch: Partial<ConnectivityState>): void {
    this.state = { ...this.state, ...patch };
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (error) {
        logger.warn("connectivity listener failed", {
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
