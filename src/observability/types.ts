export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogFields {
  url?: string;
  mode?: string;
  current?: number;
  total?: number;
  [key: string]: unknown;
}

export type MetricCounterName = "pages_fetched" | "cache_hits" | "fetch_failed" | "rows_emitted" | "files_saved";

export type MetricTimerName = "page_fetch_ms";
