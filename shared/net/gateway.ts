import axios, { type AxiosInstance } from "axios";

import type { OutboxBody, OutboxItem, DeliveryResult, ScanOutbox } from "../outbox/Outbox";
import type { PlaceCache } from "../places/cache";
import { toPlaceRecord, type PlaceRecord } from "../places/types";
import { emitReliabilityEvent } from "../reliability/events";
import { createLogger } from "../telemetry/logger";

export type ReadResult =
  | { status: "ok"; data: PlaceRecord; fromCache: boolean }
  | { status: "rejected"; httpStatus: number; error: string }
  | { status: "unreachable"; error: string };

export type WriteResult =
  | { status: "ok"; httpStatus: number; data: unknown }
  | { status: "rejected"; httpStatus: number; error: string }
  | { status: "unreachable"; error: string }
  | { status: "queued"; pending: number; persisted: boolean };

export type HealthStatus = "online" | "degraded" | "offline";

export type HttpClientOptions = {
  apiBase: string;
  apiKey?: string;
};

export type GatewayOptions = {
  cache: PlaceCache;
  outbox: ScanOutbox;
  http: AxiosInstance;
  resilientPaths?: string[];
  isOnline?: () => boolean;
  healthPath?: string;
};

type Method = "GET" | "POST";

type SendOutcome =
  | { kind: "response"; status: number; data: unknown }
  | { kind: "transport"; error: string };

export const SCAN_COMPLETE_PATH = "/api/scan/complete";
export const HEALTH_PATH = "/api/health";

const logger = createLogger("net/gateway");

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function hasErrorField(data: unknown): boolean {
  return isRecord(data) && data.error !== undefined && data.error !== null && data.error !== "";
}

function renderError(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === "string" && error.trim()) {
    return error.trim();
  }
  return "network-error";
}

function describeRejection(status: number, data: unknown): string {
  if (isRecord(data) && typeof data.error === "string" && data.error.trim()) {
    return data.error.trim();
  }
  return `Request failed (${status})`;
}

function isAccepted(outcome: { status: number; data: unknown }): boolean {
  return outcome.status >= 200 && outcome.status < 300 && !hasErrorField(outcome.data);
}

function stripQuery(path: string): string {
  const index = path.search(/[?#]/);
  return index === -1 ? path : path.slice(0, index);
}

/** Return default headers incl. x-api-key if present. */
export const withAuth = (apiKey: string | undefined, extra: Record<string, string> = {}) => ({
  ...(apiKey ? { "x-api-key": apiKey } : {}),
  ...extra,
});

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.apiBase,
    withCredentials: true,
    headers: withAuth(options.apiKey, { "Content-Type": "application/json" }),
  });
}

/**
 * Single entry point for network calls. Reads go through the place cache;
 * writes to resilient endpoints fall back to the outbox when the server
 * cannot be reached at all. HTTP-level rejections are never queued.
 */
export class RequestGateway {
  private readonly cache: PlaceCache;
  private readonly outbox: ScanOutbox;
  private readonly http: AxiosInstance;
  private readonly resilientPaths: string[];
  private readonly isOnline: () => boolean;
  private readonly healthPath: string;

  constructor(options: GatewayOptions) {
    this.cache = options.cache;
    this.outbox = options.outbox;
    this.http = options.http;
    this.resilientPaths = options.resilientPaths ?? [SCAN_COMPLETE_PATH];
    this.isOnline = options.isOnline ?? (() => true);
    this.healthPath = options.healthPath ?? HEALTH_PATH;
  }

  isResilient(path: string): boolean {
    const bare = stripQuery(path);
    return this.resilientPaths.some((prefix) => bare === prefix || bare.startsWith(`${prefix}/`));
  }

  async read(path: string, cacheKey: string, options: { skipCache?: boolean } = {}): Promise<ReadResult> {
    if (!options.skipCache) {
      const cached = await this.cache.get(cacheKey);
      if (cached) {
        return { status: "ok", data: cached, fromCache: true };
      }
    }

    const outcome = await this.send("GET", path);
    if (outcome.kind === "transport") {
      this.reportUnreachable("GET", path, outcome.error);
      return { status: "unreachable", error: outcome.error };
    }
    if (!isAccepted(outcome)) {
      return this.reject("GET", path, outcome.status, describeRejection(outcome.status, outcome.data));
    }
    const record = toPlaceRecord(outcome.data);
    if (!record) {
      return this.reject("GET", path, outcome.status, "Malformed place record");
    }
    await this.cache.set(cacheKey, record);
    return { status: "ok", data: record, fromCache: false };
  }

  async write(path: string, body: OutboxBody): Promise<WriteResult> {
    const resilient = this.isResilient(path);
    if (resilient && !this.isOnline()) {
      return this.enqueue(path, body, "offline");
    }

    const outcome = await this.send("POST", path, body);
    if (outcome.kind === "transport") {
      if (resilient) {
        return this.enqueue(path, body, outcome.error);
      }
      this.reportUnreachable("POST", path, outcome.error);
      return { status: "unreachable", error: outcome.error };
    }
    if (!isAccepted(outcome)) {
      return this.reject("POST", path, outcome.status, describeRejection(outcome.status, outcome.data));
    }
    return { status: "ok", httpStatus: outcome.status, data: outcome.data };
  }

  /** Outbox sender: delivered only on a 2xx without an error field. */
  async replay(item: OutboxItem): Promise<DeliveryResult> {
    const outcome = await this.send("POST", item.path, item.body);
    if (outcome.kind === "transport") {
      return { status: "kept", reason: outcome.error };
    }
    if (!isAccepted(outcome)) {
      return { status: "kept", reason: describeRejection(outcome.status, outcome.data) };
    }
    return { status: "delivered" };
  }

  async health(): Promise<HealthStatus> {
    const outcome = await this.send("GET", this.healthPath);
    if (outcome.kind === "transport") {
      return "offline";
    }
    return isAccepted(outcome) && isRecord(outcome.data) && outcome.data.ok === true
      ? "online"
      : "degraded";
  }

  private async send(method: Method, path: string, body?: OutboxBody): Promise<SendOutcome> {
    try {
      const response = await this.http.request<unknown>({
        method,
        url: path,
        data: body,
        validateStatus: () => true,
      });
      return { kind: "response", status: response.status, data: response.data };
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        return { kind: "response", status: error.response.status, data: error.response.data };
      }
      return { kind: "transport", error: renderError(error) };
    }
  }

  private async enqueue(path: string, body: OutboxBody, cause: string): Promise<WriteResult> {
    const pending = await this.outbox.push({ path, body });
    logger.info("submission queued for replay", { path, cause, pending });
    return { status: "queued", pending, persisted: pending > 0 };
  }

  private reject(method: Method, path: string, httpStatus: number, error: string) {
    logger.warn("request rejected", { method, path, httpStatus, error });
    emitReliabilityEvent({
      type: "gateway:rejected",
      timestamp: Date.now(),
      method,
      path,
      httpStatus,
      reason: error,
    });
    return { status: "rejected" as const, httpStatus, error };
  }

  private reportUnreachable(method: Method, path: string, error: string): void {
    logger.warn("server unreachable", { method, path, error });
    emitReliabilityEvent({
      type: "gateway:unreachable",
      timestamp: Date.now(),
      method,
      path,
      reason: error,
    });
  }
}
