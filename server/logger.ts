export type LogLevel = "debug" | "info" | "warn" | "error";

const DEFAULT_SOURCE = "srs";
const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function resolveMinimumLevel(): LogLevel {
  const requested = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  if (requested === "debug" || requested === "info" || requested === "warn" || requested === "error") {
    return requested;
  }
  return process.env.NODE_ENV === "test" ? "warn" : "info";
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[resolveMinimumLevel()];
}

function formatTimestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

function formatLogLine(message: string, source: string): string {
  return `${formatTimestamp()} [${source}] ${message}`;
}

export function log(message: string, source: string = DEFAULT_SOURCE): void {
  if (!isEnabled("info")) return;
  console.log(formatLogLine(message, source));
}

function normaliseError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }

  if (typeof error === "object") {
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }

  return String(error);
}

export interface StructuredLogEntry {
  event: string;
  level?: LogLevel;
  source?: string;
  message?: string;
  data?: Record<string, unknown>;
  error?: unknown;
}

const writers: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function logStructured(entry: StructuredLogEntry): void {
  const { event, level = "info", source = DEFAULT_SOURCE, message, data, error } = entry;
  if (!isEnabled(level)) return;

  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    source,
    event,
  };

  if (message) {
    payload.message = message;
  }

  if (data) {
    payload.data = data;
  }

  if (error !== undefined) {
    payload.error = normaliseError(error);
  }

  writers[level](JSON.stringify(payload));
}

export function logError(error: unknown, source: string = DEFAULT_SOURCE): void {
  console.error(formatLogLine(normaliseError(error), source));
}
