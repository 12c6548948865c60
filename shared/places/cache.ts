import { DEFAULT_CACHE_MAX_KEYS, DEFAULT_CACHE_TTL_MS } from "../config";
import type { StorageBackend } from "../core/pstore";
import { emitReliabilityEvent } from "../reliability/events";
import { createLogger } from "../telemetry/logger";
import { normalizeCacheKey, toPlaceRecord, type PlaceRecord } from "./types";

export type PlaceCacheConfig = {
  ttlMs: number;
  maxKeys: number;
  storageKey: string;
  clock: () => number;
};

export type CacheEntry = { data: PlaceRecord; ts: number };

/** Persisted layout: entries by normalized key plus their insertion order. */
export type CacheSnapshot = {
  items: Record<string, CacheEntry>;
  order: string[];
};

export const PLACE_CACHE_KEY = "scan.place.cache.v1";

const logger = createLogger("places/cache");

function createEmptySnapshot(): CacheSnapshot {
  return { items: {}, order: [] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseSnapshot(raw: string): CacheSnapshot {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    return createEmptySnapshot();
  }
  const items: Record<string, CacheEntry> = {};
  if (isRecord(parsed.items)) {
    for (const [key, value] of Object.entries(parsed.items)) {
      if (!isRecord(value)) {
        continue;
      }
      const data = toPlaceRecord(value.data);
      const ts = Number(value.ts);
      if (!data || !Number.isFinite(ts)) {
        continue;
      }
      items[key] = { data, ts };
    }
  }
  const order: string[] = [];
  const seen = new Set<string>();
  if (Array.isArray(parsed.order)) {
    for (const key of parsed.order) {
      if (typeof key === "string" && Object.hasOwn(items, key) && !seen.has(key)) {
        seen.add(key);
        order.push(key);
      }
    }
  }
  // keys missing from the sequence go to the back, oldest first
  const orphans = Object.keys(items)
    .filter((key) => !seen.has(key))
    .sort((a, b) => items[a].ts - items[b].ts);
  return { items, order: order.concat(orphans) };
}

/**
 * Keys one record is written under: the lookup key, its numeric id and its
 * code, skipping duplicates. Never more than three.
 */
export function cacheAliases(key: string | number, record: PlaceRecord): string[] {
  const aliases: string[] = [];
  const primary = normalizeCacheKey(key);
  if (primary) {
    aliases.push(primary);
  }
  const numericId = String(record.place_cod);
  if (!aliases.includes(numericId)) {
    aliases.push(numericId);
  }
  const code = normalizeCacheKey(record.place_name);
  if (code && !aliases.includes(code)) {
    aliases.push(code);
  }
  return aliases;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PlaceCache {
  private readonly config: PlaceCacheConfig;

  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly storage: StorageBackend,
    cfg: Partial<PlaceCacheConfig> = {},
  ) {
    this.config = {
      ttlMs: cfg.ttlMs && cfg.ttlMs > 0 ? cfg.ttlMs : DEFAULT_CACHE_TTL_MS,
      maxKeys: cfg.maxKeys && cfg.maxKeys > 0 ? Math.floor(cfg.maxKeys) : DEFAULT_CACHE_MAX_KEYS,
      storageKey: cfg.storageKey ?? PLACE_CACHE_KEY,
      clock: cfg.clock ?? Date.now,
    };
  }

  private runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn);
    this.queue = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private reportFault(operation: "read" | "write", error: unknown): void {
    const reason = describeError(error);
    logger.warn(`place cache ${operation} failed`, { storageKey: this.config.storageKey, reason });
    emitReliabilityEvent({
      type: "storage:fault",
      timestamp: this.config.clock(),
      storageKey: this.config.storageKey,
      operation,
      reason,
    });
  }

  private evict(snapshot: CacheSnapshot): void {
    while (snapshot.order.length > this.config.maxKeys) {
      const oldest = snapshot.order.shift();
      if (oldest === undefined) {
        break;
      }
      delete snapshot.items[oldest];
      emitReliabilityEvent({
        type: "cache:evicted",
        timestamp: this.config.clock(),
        key: oldest,
        size: snapshot.order.length,
      });
    }
  }

  /**
   * Reads the persisted store, or `null` when the backend itself failed.
   * A corrupt blob reads as empty so that the next write replaces it.
   */
  private async read(): Promise<CacheSnapshot | null> {
    let raw: string | null;
    try {
      raw = await this.storage.getItem(this.config.storageKey);
    } catch (error) {
      this.reportFault("read", error);
      return null;
    }
    if (!raw) {
      return createEmptySnapshot();
    }
    try {
      return parseSnapshot(raw);
    } catch (error) {
      this.reportFault("read", error);
      return createEmptySnapshot();
    }
  }

  /** Reads the persisted store. Unreadable or corrupt data loads as empty. */
  async load(): Promise<CacheSnapshot> {
    return (await this.read()) ?? createEmptySnapshot();
  }

  async save(snapshot: CacheSnapshot): Promise<void> {
    await this.storage.setItem(this.config.storageKey, JSON.stringify(snapshot));
  }

  async get(key: string | number): Promise<PlaceRecord | undefined> {
    return this.runExclusive(async () => {
      const normalized = normalizeCacheKey(key);
      const snapshot = await this.load();
      const entry = snapshot.items[normalized];
      const timestamp = this.config.clock();
      if (!entry) {
        emitReliabilityEvent({ type: "cache:miss", timestamp, key: normalized, expired: false });
        return undefined;
      }
      if (timestamp - entry.ts > this.config.ttlMs) {
        emitReliabilityEvent({ type: "cache:miss", timestamp, key: normalized, expired: true });
        return undefined;
      }
      emitReliabilityEvent({ type: "cache:hit", timestamp, key: normalized });
      return entry.data;
    });
  }

  async set(key: string | number, record: PlaceRecord): Promise<void> {
    await this.runExclusive(async () => {
      try {
        const snapshot = await this.read();
        if (!snapshot) {
          // saving now would overwrite entries that could not be read
          return;
        }
        const ts = this.config.clock();
        for (const alias of cacheAliases(key, record)) {
          snapshot.items[alias] = { data: record, ts };
          if (!snapshot.order.includes(alias)) {
            snapshot.order.push(alias);
          }
          this.evict(snapshot);
        }
        await this.save(snapshot);
      } catch (error) {
        this.reportFault("write", error);
      }
    });
  }

  async keys(): Promise<string[]> {
    return this.runExclusive(async () => (await this.load()).order.slice());
  }

  async clear(): Promise<void> {
    await this.runExclusive(async () => {
      try {
        await this.storage.removeItem(this.config.storageKey);
      } catch (error) {
        this.reportFault("write", error);
      }
    });
  }
}
