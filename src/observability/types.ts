export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

/** Lower rank is more severe; a logger emits levels ranked at or below its threshold. */
export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export interface LogFields {
  url?: string;
  stage?: string;
  method?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_discovered"
  | "scrape_ok"
  | "scrape_failed"
  | "parse_ok"
  | "parse_failed"
  | "summarize_ok"
  | "summarize_failed"
  | "pages_composed";

export type MetricTimerName = "fetch_ms" | "parse_ms" | "summarize_ms";
