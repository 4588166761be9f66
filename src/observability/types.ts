export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogFields {
  doi?: string;
  source?: string;
  parser?: string;
  slot?: number;
  [key: string]: unknown;
}

export const METRIC_COUNTER_NAMES = [
  "passes",
  "fetch_attempts",
  "fetch_ok",
  "fetch_failed",
  "parse_ok",
  "parse_failed",
  "ingest_ok",
  "exhausted",
  "reconcile_fixes",
  "lease_conflicts",
  "pass_errors",
] as const;
export type MetricCounterName = (typeof METRIC_COUNTER_NAMES)[number];

export const METRIC_TIMER_NAMES = ["fetch_ms", "parse_ms", "pass_ms"] as const;
export type MetricTimerName = (typeof METRIC_TIMER_NAMES)[number];
