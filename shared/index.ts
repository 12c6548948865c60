export { loadConfig, type LogLevel, type ScanConfig } from "./config";
export {
  createIdbStorage,
  createMemoryStorage,
  createWebStorage,
  resolveDefaultStorage,
  type StorageBackend,
} from "./core/pstore";
export { PhotoAttachments, type AttachmentsState } from "./media/attachments";
export {
  compressPhoto,
  fitWithin,
  ImageDecodeError,
  qualityLadder,
  type CompressedPhoto,
  type CompressOptions,
  type PhotoDecoder,
} from "./media/compress";
export { createSharpDecoder } from "./media/sharpDecoder";
export { ConnectivityMonitor, type ConnectivityState } from "./net/connectivity";
export {
  createHttpClient,
  RequestGateway,
  type HealthStatus,
  type ReadResult,
  type WriteResult,
} from "./net/gateway";
export { ScanOutbox, type OutboxItem, type OutboxState } from "./outbox/Outbox";
export { PlaceCache, cacheAliases } from "./places/cache";
export { normalizePlaceCode, type PlaceRecord } from "./places/types";
export {
  recentReliabilityEvents,
  subscribeReliabilityEvents,
  type ReliabilityEvent,
} from "./reliability/events";
export { createLogger, setLogLevel, setLogSink } from "./telemetry/logger";
export { createScanClient, ScanClient, type LookupResult, type SubmitResult } from "./scan/client";
export { buildScanPayload, composeDiscrepancyReason } from "./scan/payload";
export { REASONS_BY_STATUS, type ScanDraft, type ScanPayload, type ScanStatus } from "./scan/types";
