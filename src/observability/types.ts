export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export interface LogFields {
  identifier?: string;
  attempt?: number;
  path?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "items_selected"
  | "fetch_ok"
  | "fetch_skipped"
  | "fetch_failed"
  | "fetch_retries"
  | "checkpoints_saved"
  | "extract_ok"
  | "extract_skipped";

export type MetricTimerName = "fetch_ms" | "extract_ms";
