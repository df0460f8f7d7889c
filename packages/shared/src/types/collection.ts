/**
 * Types for the collection engine: horizons, slices, jobs, sweep results
 * and consolidated reports.
 */

import type { MetricKind, OperationKind } from "./metrics.js";

// ---------------------------------------------------------------------------
// Horizons & slices
// ---------------------------------------------------------------------------

export type HorizonType = "3hr" | "7day";

/** A reporting horizon and how it is cut into slices */
export interface HorizonDefinition {
  type: HorizonType;
  horizonSeconds: number;
  sliceCount: number;
  /** Human-readable description written into report headers */
  description: string;
}

/** One bounded sub-interval of a horizon, queried independently */
export interface TimeSlice {
  start: Date;
  end: Date;
  resolutionSeconds: number;
}

// ---------------------------------------------------------------------------
// Jobs
// ---------------------------------------------------------------------------

/** One slice × one operation × one metric × one table */
export interface CollectionJob {
  readonly region: string;
  readonly table: string;
  readonly operation: OperationKind;
  readonly metricKind: MetricKind;
  readonly slice: TimeSlice;
}

/** Where a job's raw result was persisted, and what it contained */
export interface ArtifactRef {
  job: CollectionJob;
  path: string;
  datapoints: number;
}

export interface JobFailure {
  job: CollectionJob;
  message: string;
  transient: boolean;
}

export interface SweepResult {
  region: string;
  table: string;
  horizon: HorizonType;
  succeeded: number;
  failed: JobFailure[];
  artifacts: ArtifactRef[];
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

/** Identifies one consolidated report */
export interface ReportTuple {
  region: string;
  table: string;
  operation: OperationKind;
  metricKind: MetricKind;
  horizon: HorizonType;
}

export interface ConsolidatedReport extends ReportTuple {
  path: string;
  /** Artifact file names, in the order they were concatenated */
  sources: string[];
  generatedAt: Date;
  content: string;
}

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

/** Per table, per horizon: Planned → Sweeping → Barriered → Consolidated */
export type SweepState = "planned" | "sweeping" | "barriered" | "consolidated";

export interface RunSummary {
  runRoot: string;
  regions: string[];
  tables: number;
  totalCalls: number;
  succeeded: number;
  failed: number;
  skippedSlices: number;
  barriers: number;
  reportsWritten: number;
  reportsFailed: number;
}
