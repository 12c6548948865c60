import { createStore, del, get, set } from "idb-keyval";

export interface StorageBackend {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
}

export interface WebStorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export type MemoryStorage = StorageBackend & { readonly store: Map<string, string> };

interface GlobalWithStorage {
  localStorage?: WebStorageLike;
  indexedDB?: unknown;
}

const DEFAULT_IDB_NAME = "scan-resilience";
const DEFAULT_IDB_STORE = "kv";

export function createMemoryStorage(): MemoryStorage {
  const store = new Map<string, string>();
  return {
    store,
    async getItem(key: string): Promise<string | null> {
      return store.get(key) ?? null;
    },
    async setItem(key: string, value: string): Promise<void> {
      store.set(key, value);
    },
    async removeItem(key: string): Promise<void> {
      store.delete(key);
    },
  };
}

/**
 * Wraps a synchronous Web Storage area. Write failures such as quota errors
 * are rethrown so that callers can decide whether the data was kept.
 */
export function createWebStorage(candidate: WebStorageLike): StorageBackend {
  return {
    async getItem(key: string): Promise<string | null> {
      return candidate.getItem(key);
    },
    async setItem(key: string, value: string): Promise<void> {
      candidate.setItem(key, value);
    },
    async removeItem(key: string): Promise<void> {
      candidate.removeItem(key);
    },
  };
}

export function createIdbStorage(
  dbName: string = DEFAULT_IDB_NAME,
  storeName: string = DEFAULT_IDB_STORE,
): StorageBackend {
  const store = createStore(dbName, storeName);
  return {
    async getItem(key: string): Promise<string | null> {
      const value = await get<unknown>(key, store);
      return typeof value === "string" ? value : null;
    },
    async setItem(key: string, value: string): Promise<void> {
      await set(key, value, store);
    },
    async removeItem(key: string): Promise<void> {
      await del(key, store);
    },
  };
}

function getGlobal(): GlobalWithStorage {
  return globalThis as GlobalWithStorage;
}

export function resolveDefaultStorage(): StorageBackend {
  const globalObject = getGlobal();
  const webStorage = globalObject.localStorage;
  if (
    webStorage &&
    typeof webStorage.getItem === "function" &&
    typeof webStorage.setItem === "function" &&
    typeof webStorage.removeItem === "function"
  ) {
    return createWebStorage(webStorage);
  }
  if (globalObject.indexedDB) {
    return createIdbStorage();
  }
  return createMemoryStorage();
}
