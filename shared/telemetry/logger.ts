import { loadConfig, type LogLevel } from "../config";

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  ts: number;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry, line: string) => void;

export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

// photos travel as multi-megabyte data URLs and badges identify workers
const REDACTED_KEYS = new Set(["photo", "photos", "dataUrl", "badge"]);

const consoleSink: LogSink = (entry, line) => {
  switch (entry.level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.info(line);
  }
};

let sink: LogSink = consoleSink;
let threshold: LogLevel | null = null;

function currentThreshold(): LogLevel {
  if (!threshold) {
    threshold = loadConfig().logLevel;
  }
  return threshold;
}

function describeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function redactSensitive(entry: LogEntry): LogEntry {
  const clone: LogEntry = { ...entry };
  if (clone.data) {
    const data: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(clone.data)) {
      data[key] = REDACTED_KEYS.has(key) ? "[redacted]" : describeValue(value);
    }
    clone.data = data;
  }
  return clone;
}

export function formatLog(entry: LogEntry): string {
  return JSON.stringify(redactSensitive(entry));
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentThreshold()]) {
      return;
    }
    const entry: LogEntry = { level, scope, message, ts: Date.now(), ...(data ? { data } : {}) };
    const line = formatLog(entry);
    try {
      sink(entry, line);
    } catch (error) {
      if (sink !== consoleSink) {
        consoleSink(entry, line);
        console.error(`log sink failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  };
  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}

export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

export function setLogLevel(level: LogLevel | null): void {
  threshold = level;
}
