/**
 * Job Executor: runs one horizon sweep for one table.
 *
 * Expands the sweep's slices into jobs (slice × operation × metric), pushes
 * them through a bounded worker pool gated by the {@link Throttle}, and
 * persists every successful result through the {@link ArtifactStore}.
 *
 * A failed job is recorded and logged, never retried; the sweep always runs
 * to completion and ends with the throttle's end-of-sweep barrier.
 */

import type { Logger } from "pino";
import type {
  ArtifactRef,
  CollectionJob,
  HorizonType,
  JobFailure,
  MetricSource,
  SweepResult,
  TimeSlice,
} from "@ddb-metrics/shared";
import { JobError } from "../errors.js";
import { ALL_OPERATIONS, METRIC_KINDS } from "./operations.js";
import type { ArtifactStore } from "./artifact-store.js";
import type { Throttle } from "./throttle.js";

export interface JobExecutorOptions {
  logger?: Logger;
}

type JobOutcome =
  | { ok: true; artifact: ArtifactRef }
  | { ok: false; failure: JobFailure };

/** Cross product of slices × operations × metric kinds for one table */
export function buildJobs(region: string, table: string, slices: TimeSlice[]): CollectionJob[] {
  const jobs: CollectionJob[] = [];
  for (const slice of slices) {
    for (const operation of ALL_OPERATIONS) {
      for (const metricKind of METRIC_KINDS) {
        jobs.push({ region, table, operation, metricKind, slice });
      }
    }
  }
  return jobs;
}

export class JobExecutor {
  private source: MetricSource;
  private throttle: Throttle;
  private store: ArtifactStore;
  private logger: Logger | null;

  constructor(
    source: MetricSource,
    throttle: Throttle,
    store: ArtifactStore,
    options?: JobExecutorOptions,
  ) {
    this.source = source;
    this.throttle = throttle;
    this.store = store;
    this.logger = options?.logger ?? null;
  }

  /**
   * Collect every job for one table and horizon. Resolves once all jobs have
   * finished and the end-of-sweep barrier has fired.
   */
  async runSweep(
    table: string,
    region: string,
    horizon: HorizonType,
    slices: TimeSlice[],
  ): Promise<SweepResult> {
    const jobs = buildJobs(region, table, slices);
    const log = this.logger?.child({ region, table, horizon });
    const result: SweepResult = {
      region,
      table,
      horizon,
      succeeded: 0,
      failed: [],
      artifacts: [],
    };

    log?.info({ jobs: jobs.length, slices: slices.length }, "Sweep started");

    let next = 0;
    const worker = async () => {
      while (next < jobs.length) {
        const job = jobs[next++];
        const outcome = await this.runJob(job, log);
        if (outcome.ok) {
          result.succeeded++;
          result.artifacts.push(outcome.artifact);
        } else {
          result.failed.push(outcome.failure);
        }
      }
    };

    const workers = Math.min(this.throttle.maxParallel, jobs.length);
    await Promise.all(Array.from({ length: workers }, worker));
    await this.throttle.drain();

    log?.info(
      { succeeded: result.succeeded, failed: result.failed.length },
      "Sweep finished",
    );
    return result;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async runJob(job: CollectionJob, log: Logger | undefined): Promise<JobOutcome> {
    const permit = await this.throttle.acquire();
    try {
      const stats = await this.source.getStatistics({
        table: job.table,
        operation: job.operation,
        metricKind: job.metricKind,
        start: job.slice.start,
        end: job.slice.end,
        periodSeconds: job.slice.resolutionSeconds,
      });
      const artifact = await this.store.write(job, stats);
      return { ok: true, artifact };
    } catch (err) {
      const error = new JobError(job, err);
      log?.warn(
        {
          operation: job.operation,
          metric: job.metricKind,
          start: job.slice.start.toISOString(),
          end: job.slice.end.toISOString(),
          period: job.slice.resolutionSeconds,
          transient: error.transient,
          err: error,
        },
        "Job failed",
      );
      return { ok: false, failure: { job, message: error.message, transient: error.transient } };
    } finally {
      this.throttle.release(permit);
      this.throttle.recordCall();
    }
  }
}
