/**
 * Types describing what is asked of the monitoring API and what comes back.
 *
 * The operation and metric sets are closed: every sweep covers the full
 * cross product of {@link OperationKind} × {@link MetricKind}.
 */

// ---------------------------------------------------------------------------
// Operations & metrics
// ---------------------------------------------------------------------------

export type ReadOperation = "GetItem" | "Query" | "Scan";

export type WriteOperation =
  | "PutItem"
  | "UpdateItem"
  | "DeleteItem"
  | "BatchWriteItem";

/** A table operation reported as a dimension by the monitoring API */
export type OperationKind = ReadOperation | WriteOperation;

/** Request count per period, or P99 request latency per period */
export type MetricKind = "SampleCount" | "P99Latency";

// ---------------------------------------------------------------------------
// Query / response
// ---------------------------------------------------------------------------

export interface MetricQuery {
  table: string;
  operation: OperationKind;
  metricKind: MetricKind;
  start: Date;
  end: Date;
  /** Aggregation period in seconds */
  periodSeconds: number;
}

/** One aggregated value for one period */
export interface MetricDatapoint {
  /** ISO 8601 timestamp of the period start */
  timestamp: string;
  value: number;
  unit?: string;
}

/** Everything a single statistics call returned */
export interface MetricStatistics {
  label: string;
  datapoints: MetricDatapoint[];
}
