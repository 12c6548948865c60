import type { AxiosInstance } from "axios";

import { loadConfig, type ScanConfig } from "../config";
import { resolveDefaultStorage, type StorageBackend } from "../core/pstore";
import { PhotoAttachments, type AttachmentBatchResult, type PhotoCompressor } from "../media/attachments";
import { compressPhoto, type PhotoDecoder, type PhotoInput } from "../media/compress";
import { createSharpDecoder } from "../media/sharpDecoder";
import { ConnectivityMonitor, type ConnectivityEventTarget } from "../net/connectivity";
import {
  createHttpClient,
  RequestGateway,
  SCAN_COMPLETE_PATH,
  type HealthStatus,
  type ReadResult,
  type WriteResult,
} from "../net/gateway";
import { ScanOutbox, type OutboxItem } from "../outbox/Outbox";
import { PlaceCache } from "../places/cache";
import { normalizePlaceCode } from "../places/types";
import { createLogger, setLogLevel } from "../telemetry/logger";
import { buildScanPayload, type PayloadIssue } from "./payload";
import { isScanAck, type ScanDraft } from "./types";

export type LookupResult = ReadResult | { status: "invalid" };

export type SubmitResult =
  | WriteResult
  | { status: "invalid"; issue: PayloadIssue; message: string };

export type ScanClientParts = {
  cache: PlaceCache;
  outbox: ScanOutbox;
  gateway: RequestGateway;
  monitor: ConnectivityMonitor;
  attachments: PhotoAttachments;
};

export type CreateScanClientOptions = {
  config?: Partial<ScanConfig>;
  storage?: StorageBackend;
  http?: AxiosInstance;
  decoder?: PhotoDecoder;
  /** Host that fires `online`/`offline` events, e.g. `window`. */
  events?: ConnectivityEventTarget;
  initialOnline?: boolean;
};

const PLACE_PATH = "/api/place/";

const logger = createLogger("scan/client");

export class ScanClient {
  readonly cache: PlaceCache;
  readonly outbox: ScanOutbox;
  readonly gateway: RequestGateway;
  readonly monitor: ConnectivityMonitor;
  readonly attachments: PhotoAttachments;

  private detach: (() => void) | null = null;

  constructor(parts: ScanClientParts) {
    this.cache = parts.cache;
    this.outbox = parts.outbox;
    this.gateway = parts.gateway;
    this.monitor = parts.monitor;
    this.attachments = parts.attachments;
  }

  async lookupPlace(raw: string, options: { skipCache?: boolean } = {}): Promise<LookupResult> {
    const code = normalizePlaceCode(raw);
    if (!code) {
      return { status: "invalid" };
    }
    return this.gateway.read(`${PLACE_PATH}${encodeURIComponent(code)}`, code, options);
  }

  attachPhotos(inputs: PhotoInput[]): Promise<AttachmentBatchResult> {
    return this.attachments.add(inputs);
  }

  async submitScan(draft: ScanDraft): Promise<SubmitResult> {
    await this.attachments.whenIdle();
    const built = buildScanPayload(draft, this.attachments.dataUrls());
    if (!built.ok) {
      return { status: "invalid", issue: built.issue, message: built.message };
    }

    const result = await this.gateway.write(SCAN_COMPLETE_PATH, built.payload);
    if (result.status === "ok" && !(isScanAck(result.data) && result.data.success)) {
      logger.warn("scan not acknowledged", { httpStatus: result.httpStatus });
      return { status: "rejected", httpStatus: result.httpStatus, error: "Scan was not saved" };
    }
    if (result.status === "ok" || result.status === "queued") {
      this.attachments.clear();
    }
    return result;
  }

  syncNow(): Promise<OutboxItem[]> {
    return this.monitor.syncNow();
  }

  checkHealth(): Promise<HealthStatus> {
    return this.monitor.probe();
  }

  attach(target: ConnectivityEventTarget): void {
    this.detach?.();
    this.detach = this.monitor.attach(target);
  }

  dispose(): void {
    this.detach?.();
    this.detach = null;
  }
}

export function createScanClient(options: CreateScanClientOptions = {}): ScanClient {
  const config: ScanConfig = { ...loadConfig(), ...options.config };
  setLogLevel(config.logLevel);
  const storage = options.storage ?? resolveDefaultStorage();

  const cache = new PlaceCache(storage, { ttlMs: config.cacheTtlMs, maxKeys: config.cacheMaxKeys });
  const outbox = new ScanOutbox(storage);
  const monitor = new ConnectivityMonitor({ outbox, initialOnline: options.initialOnline });
  const gateway = new RequestGateway({
    cache,
    outbox,
    http: options.http ?? createHttpClient({ apiBase: config.apiBase, apiKey: config.apiKey }),
    isOnline: () => monitor.isOnline(),
  });
  outbox.setSender((item) => gateway.replay(item));
  monitor.setProbe(() => gateway.health());

  const decoder = options.decoder ?? createSharpDecoder();
  const compress: PhotoCompressor = (input) =>
    compressPhoto(input, decoder, {
      maxDimension: config.photoMaxDimension,
      initialQuality: config.photoQuality,
      qualityStep: config.photoQualityStep,
      qualityFloor: config.photoQualityFloor,
      maxBytes: config.photoMaxBytes,
    });

  const client = new ScanClient({
    cache,
    outbox,
    gateway,
    monitor,
    attachments: new PhotoAttachments(compress),
  });
  if (options.events) {
    client.attach(options.events);
  }
  return client;
}
