type GlobalWithOverrides = typeof globalThis & {
  SCAN_API_BASE?: string;
  SCAN_API_KEY?: string;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type ScanConfig = {
  apiBase: string;
  apiKey?: string;
  cacheTtlMs: number;
  cacheMaxKeys: number;
  photoMaxDimension: number;
  photoQuality: number;
  photoQualityStep: number;
  photoQualityFloor: number;
  photoMaxBytes: number;
  logLevel: LogLevel;
};

const DEFAULT_BASE = "http://localhost:8000";

export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1_000;
export const DEFAULT_CACHE_MAX_KEYS = 500;
export const DEFAULT_PHOTO_MAX_DIMENSION = 1280;
export const DEFAULT_PHOTO_QUALITY = 0.82;
export const DEFAULT_PHOTO_QUALITY_STEP = 0.1;
export const DEFAULT_PHOTO_QUALITY_FLOOR = 0.5;
// request bodies are capped at 4.5 MB, so one photo gets ~3 MB of it
export const DEFAULT_PHOTO_MAX_BYTES = 3 * 1024 * 1024;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function readEnv(key: string): string | undefined {
  if (typeof process === "undefined") {
    return undefined;
  }
  const value = process.env[key];
  return value && value.trim() ? value.trim() : undefined;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parsePositive(value: string | undefined, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}

function resolveApiBase(): string {
  const globalObject = globalThis as GlobalWithOverrides;
  const base = globalObject.SCAN_API_BASE ?? readEnv("SCAN_API_BASE") ?? DEFAULT_BASE;
  return base.trim().replace(/\/$/, "");
}

function resolveApiKey(): string | undefined {
  const globalObject = globalThis as GlobalWithOverrides;
  return globalObject.SCAN_API_KEY ?? readEnv("SCAN_API_KEY");
}

export function loadConfig(): ScanConfig {
  return {
    apiBase: resolveApiBase(),
    apiKey: resolveApiKey(),
    cacheTtlMs: parsePositive(readEnv("SCAN_CACHE_TTL_MS"), DEFAULT_CACHE_TTL_MS),
    cacheMaxKeys: Math.floor(parsePositive(readEnv("SCAN_CACHE_MAX_KEYS"), DEFAULT_CACHE_MAX_KEYS)),
    photoMaxDimension: Math.floor(
      parsePositive(readEnv("SCAN_PHOTO_MAX_DIMENSION"), DEFAULT_PHOTO_MAX_DIMENSION),
    ),
    photoQuality: parsePositive(readEnv("SCAN_PHOTO_QUALITY"), DEFAULT_PHOTO_QUALITY),
    photoQualityStep: parsePositive(readEnv("SCAN_PHOTO_QUALITY_STEP"), DEFAULT_PHOTO_QUALITY_STEP),
    photoQualityFloor: parsePositive(
      readEnv("SCAN_PHOTO_QUALITY_FLOOR"),
      DEFAULT_PHOTO_QUALITY_FLOOR,
    ),
    photoMaxBytes: parsePositive(readEnv("SCAN_PHOTO_MAX_BYTES"), DEFAULT_PHOTO_MAX_BYTES),
    logLevel: parseLogLevel(readEnv("SCAN_LOG_LEVEL")),
  };
}
