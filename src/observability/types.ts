export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogFields {
  source?: string;
  documentId?: string;
  url?: string;
  attachmentUrl?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "records_new"
  | "records_duplicate"
  | "records_out_of_window"
  | "records_failed"
  | "harvesters_ok"
  | "harvesters_failed";

export type MetricTimerName = "harvester_ms" | "cycle_ms";
