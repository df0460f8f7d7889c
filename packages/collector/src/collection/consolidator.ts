/**
 * Consolidator: merges the raw artifacts of one (table, operation, metric,
 * horizon) tuple into a single human-readable report.
 *
 * Artifacts are discovered purely through the ArtifactStore's directory
 * shape and ordered by the slice start encoded in their file names. Both
 * horizons share a directory, so an artifact is attributed to a horizon by
 * its slice width; a sweep can additionally restrict the report to exactly
 * the slices it planned.
 *
 * Must only run for a tuple whose sweep has passed its end-of-sweep barrier.
 */

import type { Logger } from "pino";
import type {
  ConsolidatedReport,
  HorizonDefinition,
  HorizonType,
  ReportTuple,
  TimeSlice,
} from "@ddb-metrics/shared";
import { ConsolidationError, errorMessage } from "../errors.js";
import type { ArtifactEntry, ArtifactStore } from "./artifact-store.js";
import { ALL_OPERATIONS, METRIC_KINDS, METRIC_TITLE } from "./operations.js";
import { HORIZONS, sliceWidths } from "./window-planner.js";

const RULE = "=".repeat(48);

export interface ConsolidatorOptions {
  /** Horizon definitions used for report headers and width matching */
  horizons?: Record<HorizonType, HorizonDefinition>;
  /** Source of the header's generation time (default: `new Date()`) */
  clock?: () => Date;
  logger?: Logger;
}

/** Outcome of consolidating several tuples */
export interface ConsolidationBatch {
  written: ConsolidatedReport[];
  /** Tuples with no artifacts for the horizon */
  empty: ReportTuple[];
  failed: ConsolidationError[];
}

/** `YYYY-MM-DD HH:MM:SS (UTC)` */
export function formatGeneratedAt(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} (UTC)`;
}

export function renderHeader(
  tuple: ReportTuple,
  horizon: HorizonDefinition,
  generatedAt: Date,
): string {
  return [
    RULE,
    `TABLE: ${tuple.table}`,
    `OPERATION: ${tuple.operation}`,
    `METRIC: ${METRIC_TITLE[tuple.metricKind]}`,
    `PERIOD: ${horizon.description}`,
    `GENERATED: ${formatGeneratedAt(generatedAt)}`,
    RULE,
    "",
    "",
  ].join("\n");
}

export class Consolidator {
  private store: ArtifactStore;
  private horizons: Record<HorizonType, HorizonDefinition>;
  private clock: () => Date;
  private logger: Logger | null;

  constructor(store: ArtifactStore, options?: ConsolidatorOptions) {
    this.store = store;
    this.horizons = options?.horizons ?? HORIZONS;
    this.clock = options?.clock ?? (() => new Date());
    this.logger = options?.logger ?? null;
  }

  /**
   * Build and write the report for one tuple. With `slices`, only artifacts
   * whose bounds equal one of those slices are merged. Resolves to null when
   * the tuple has no artifacts for the horizon; rejects with
   * ConsolidationError on any I/O failure.
   */
  async consolidate(tuple: ReportTuple, slices?: TimeSlice[]): Promise<ConsolidatedReport | null> {
    const horizon = this.horizons[tuple.horizon];

    try {
      const entries = this.select(
        await this.store.list(tuple.region, tuple.table, tuple.operation, tuple.metricKind),
        horizon,
        slices,
      );
      if (entries.length === 0) return null;

      const generatedAt = this.clock();
      let content = renderHeader(tuple, horizon, generatedAt);
      for (const entry of entries) {
        content += `--- ${entry.fileName} ---\n`;
        content += await this.store.readArtifact(entry.path);
        content += "\n";
      }

      const path = await this.store.writeReport(tuple, content);
      return {
        ...tuple,
        path,
        sources: entries.map((e) => e.fileName),
        generatedAt,
        content,
      };
    } catch (err) {
      throw new ConsolidationError(tuple, err);
    }
  }

  /** Consolidate every (operation, metric) pair of one table and horizon */
  async consolidateSweep(
    region: string,
    table: string,
    horizon: HorizonType,
    slices?: TimeSlice[],
  ): Promise<ConsolidationBatch> {
    const batch: ConsolidationBatch = { written: [], empty: [], failed: [] };
    const log = this.logger?.child({ region, table, horizon });

    for (const operation of ALL_OPERATIONS) {
      for (const metricKind of METRIC_KINDS) {
        const tuple: ReportTuple = { region, table, operation, metricKind, horizon };
        try {
          const report = await this.consolidate(tuple, slices);
          if (report) {
            batch.written.push(report);
            log?.debug({ path: report.path, sources: report.sources.length }, "Report written");
          } else {
            batch.empty.push(tuple);
            log?.debug({ operation, metric: metricKind }, "No artifacts, report skipped");
          }
        } catch (err) {
          const error = err instanceof ConsolidationError ? err : new ConsolidationError(tuple, err);
          batch.failed.push(error);
          log?.error({ operation, metric: metricKind, err: errorMessage(err) }, "Consolidation failed");
        }
      }
    }

    log?.info(
      { written: batch.written.length, empty: batch.empty.length, failed: batch.failed.length },
      "Consolidation finished",
    );
    return batch;
  }

  /**
   * Re-consolidate a whole run root: every region and table found on disk,
   * for each of the given horizons.
   */
  async consolidateRunRoot(horizons: HorizonType[]): Promise<ConsolidationBatch> {
    const total: ConsolidationBatch = { written: [], empty: [], failed: [] };

    for (const region of await this.store.listRegions()) {
      for (const table of await this.store.listTables(region)) {
        for (const horizon of horizons) {
          const batch = await this.consolidateSweep(region, table, horizon);
          total.written.push(...batch.written);
          total.empty.push(...batch.empty);
          total.failed.push(...batch.failed);
        }
      }
    }

    return total;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Artifacts belonging to the horizon, optionally only the given slices */
  private select(
    entries: ArtifactEntry[],
    horizon: HorizonDefinition,
    slices: TimeSlice[] | undefined,
  ): ArtifactEntry[] {
    const widths = sliceWidths(horizon);
    const planned = slices && new Set(slices.map((s) => sliceKey(s.start, s.end)));
    return entries.filter((entry) => {
      const width = (entry.end.getTime() - entry.start.getTime()) / 1000;
      if (!widths.includes(width)) return false;
      return !planned || planned.has(sliceKey(entry.start, entry.end));
    });
  }
}

function sliceKey(start: Date, end: Date): string {
  return `${start.getTime()}-${end.getTime()}`;
}
