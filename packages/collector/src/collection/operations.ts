/**
 * The fixed operation and metric sets, and how each metric kind maps onto
 * directory names, file names and report headers.
 */

import type {
  MetricKind,
  OperationKind,
  ReadOperation,
  WriteOperation,
} from "@ddb-metrics/shared";

export const READ_OPERATIONS: readonly ReadOperation[] = ["GetItem", "Query", "Scan"];

export const WRITE_OPERATIONS: readonly WriteOperation[] = [
  "PutItem",
  "UpdateItem",
  "DeleteItem",
  "BatchWriteItem",
];

export const ALL_OPERATIONS: readonly OperationKind[] = [
  ...READ_OPERATIONS,
  ...WRITE_OPERATIONS,
];

export const METRIC_KINDS: readonly MetricKind[] = ["SampleCount", "P99Latency"];

/** Directory under `<table>/<operation>/` holding a metric's raw artifacts */
export const METRIC_DIR: Record<MetricKind, string> = {
  SampleCount: "sample_count",
  P99Latency: "p99_latency",
};

/** `METRIC:` line of a consolidated report header */
export const METRIC_TITLE: Record<MetricKind, string> = {
  SampleCount: "Sample Count",
  P99Latency: "P99 Latency",
};

export function isOperationKind(value: string): value is OperationKind {
  return ALL_OPERATIONS.some((op) => op === value);
}

export function isMetricKind(value: string): value is MetricKind {
  return METRIC_KINDS.some((kind) => kind === value);
}
