// Collector error taxonomy.
//
// Only ConfigurationError is allowed to escape a run; the others are
// recorded against a single job or report and the run carries on.

import type { CollectionJob, ReportTuple } from "@ddb-metrics/shared";

// =============================================================================
// Base Error Class
// =============================================================================

export type CollectorErrorCode =
  | "CONFIGURATION_ERROR"
  | "METRIC_SOURCE_ERROR"
  | "JOB_ERROR"
  | "CONSOLIDATION_ERROR"
  | "PLAN_ERROR";

export abstract class CollectorError extends Error {
  abstract readonly code: CollectorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/** Bad configuration, credentials or table set. Aborts before any sweep. */
export class ConfigurationError extends CollectorError {
  readonly code = "CONFIGURATION_ERROR" as const;

  constructor(
    message: string,
    public readonly details: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message, options);
  }
}

/** A MetricSource call failed */
export class MetricSourceError extends CollectorError {
  readonly code = "METRIC_SOURCE_ERROR" as const;

  constructor(
    message: string,
    public readonly transient: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A single collection job failed; carries the full job identity */
export class JobError extends CollectorError {
  readonly code = "JOB_ERROR" as const;
  readonly transient: boolean;

  constructor(
    public readonly job: CollectionJob,
    cause: unknown,
  ) {
    super(
      `${job.region}/${job.table} ${job.operation} ${job.metricKind} ` +
        `[${job.slice.start.toISOString()} → ${job.slice.end.toISOString()}]: ${errorMessage(cause)}`,
      { cause },
    );
    this.transient = cause instanceof MetricSourceError ? cause.transient : false;
  }
}

/** Writing one consolidated report failed */
export class ConsolidationError extends CollectorError {
  readonly code = "CONSOLIDATION_ERROR" as const;

  constructor(
    public readonly tuple: ReportTuple,
    cause: unknown,
  ) {
    super(
      `Failed to consolidate ${tuple.table} ${tuple.operation} ${tuple.metricKind} ` +
        `(${tuple.horizon}): ${errorMessage(cause)}`,
      { cause },
    );
  }
}

/** Invalid input to the window planner */
export class PlanError extends CollectorError {
  readonly code = "PLAN_ERROR" as const;
}

// =============================================================================
// Helpers
// =============================================================================

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
