/**
 * Orchestrator: top-level driver of a collection run.
 *
 * Discovers and filters the table set of every region up front, then for
 * each table runs the configured horizons one after another:
 *
 *   planned → sweeping → barriered → consolidated
 *
 * A horizon must reach `consolidated` before the next horizon (or the next
 * table) starts. One Throttle and CallLedger are shared by the whole run.
 *
 * Only ConfigurationError escapes {@link Orchestrator.run}; job and report
 * failures end up in the returned summary.
 */

import type { Logger } from "pino";
import type {
  HorizonDefinition,
  HorizonType,
  MetricSource,
  RunSummary,
  SweepState,
  TableCatalog,
} from "@ddb-metrics/shared";
import { ConfigurationError, errorMessage } from "../errors.js";
import type { ArtifactStore } from "./artifact-store.js";
import { Consolidator } from "./consolidator.js";
import { JobExecutor } from "./job-executor.js";
import { describeFilter, filterTables, type TableFilter } from "./table-filter.js";
import { CallLedger, Throttle } from "./throttle.js";
import { HORIZONS, planHorizon, skipBeforeCreation } from "./window-planner.js";

/** Region-bound collaborators */
export interface RegionClients {
  metricSource: MetricSource;
  catalog: TableCatalog;
}

export type ConnectFn = (region: string) => Promise<RegionClients>;

export interface OrchestratorOptions {
  regions: string[];
  /** Horizons to collect, in order (default: 3hr, 7day) */
  horizons?: HorizonType[];
  filter?: TableFilter;
  /** Maximum in-flight calls (default: 8) */
  maxParallel?: number;
  /** Completed calls between drain barriers (default: 1000) */
  barrierThreshold?: number;
  /** Shared call counters (default: a fresh ledger) */
  ledger?: CallLedger;
  /** Source of "now" for planning and report headers */
  clock?: () => Date;
  logger?: Logger;
  /** Called on every sweep state transition */
  onStateChange?: (
    table: string,
    horizon: HorizonType,
    prev: SweepState | null,
    next: SweepState,
  ) => void;
}

interface RegionTarget {
  region: string;
  clients: RegionClients;
  tables: string[];
}

const DEFAULT_HORIZONS: HorizonType[] = ["3hr", "7day"];

export class Orchestrator {
  private store: ArtifactStore;
  private connect: ConnectFn;
  private regions: string[];
  private horizons: HorizonDefinition[];
  private filter: TableFilter;
  private ledger: CallLedger;
  private throttle: Throttle;
  private consolidator: Consolidator;
  private clock: () => Date;
  private logger: Logger | null;
  private onStateChange?: OrchestratorOptions["onStateChange"];

  /** Current state per `region/table/horizon` */
  private states = new Map<string, SweepState>();

  constructor(store: ArtifactStore, connect: ConnectFn, options: OrchestratorOptions) {
    this.store = store;
    this.connect = connect;
    this.regions = options.regions;
    this.horizons = (options.horizons ?? DEFAULT_HORIZONS).map((h) => HORIZONS[h]);
    this.filter = options.filter ?? {};
    this.ledger = options.ledger ?? new CallLedger();
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? null;
    this.onStateChange = options.onStateChange;

    this.throttle = new Throttle(this.ledger, {
      maxParallel: options.maxParallel,
      barrierThreshold: options.barrierThreshold,
      logger: options.logger,
    });
    this.consolidator = new Consolidator(store, {
      clock: this.clock,
      logger: options.logger,
    });
  }

  getState(region: string, table: string, horizon: HorizonType): SweepState | undefined {
    return this.states.get(stateKey(region, table, horizon));
  }

  async run(): Promise<RunSummary> {
    const targets = await this.discover();
    const tableCount = targets.reduce((n, t) => n + t.tables.length, 0);
    if (tableCount === 0) {
      throw new ConfigurationError("No tables found to process", [
        `regions=${this.regions.join(",")}`,
        describeFilter(this.filter),
      ]);
    }

    // Whole seconds keep slice bounds aligned with artifact names
    const now = new Date(Math.floor(this.clock().getTime() / 1000) * 1000);
    const summary: RunSummary = {
      runRoot: this.store.root,
      regions: targets.map((t) => t.region),
      tables: tableCount,
      totalCalls: 0,
      succeeded: 0,
      failed: 0,
      skippedSlices: 0,
      barriers: 0,
      reportsWritten: 0,
      reportsFailed: 0,
    };

    this.logger?.info(
      { regions: summary.regions, tables: tableCount, horizons: this.horizons.map((h) => h.type) },
      "Collection started",
    );

    for (const target of targets) {
      const executor = new JobExecutor(target.clients.metricSource, this.throttle, this.store, {
        logger: this.logger ?? undefined,
      });
      for (const table of target.tables) {
        await this.runTable(target, table, executor, now, summary);
      }
    }

    summary.totalCalls = this.ledger.totalCalls;
    summary.barriers = this.ledger.barriers.threshold + this.ledger.barriers.sweep;
    this.logger?.info({ ...summary }, "Collection finished");
    return summary;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Connect, list and filter every region before any sweep starts */
  private async discover(): Promise<RegionTarget[]> {
    const targets: RegionTarget[] = [];

    for (const region of this.regions) {
      const clients = await this.connect(region);
      let names: string[];
      try {
        names = await clients.catalog.listTables();
      } catch (err) {
        throw new ConfigurationError(`Failed to list tables in ${region}`, [errorMessage(err)], {
          cause: err,
        });
      }

      const tables = filterTables(names, this.filter);
      this.logger?.info(
        { region, listed: names.length, selected: tables.length, filter: describeFilter(this.filter) },
        "Tables discovered",
      );
      targets.push({ region, clients, tables });
    }

    return targets;
  }

  private async runTable(
    target: RegionTarget,
    table: string,
    executor: JobExecutor,
    now: Date,
    summary: RunSummary,
  ): Promise<void> {
    const { region } = target;
    const log = this.logger?.child({ region, table });

    let creationTime: Date | undefined;
    try {
      const description = await target.clients.catalog.describe(table);
      creationTime = description.creationTime;
      log?.info(
        {
          creationTime: creationTime.toISOString(),
          status: description.status,
          itemCount: description.itemCount,
          sizeBytes: description.sizeBytes,
        },
        "Table described",
      );
    } catch (err) {
      log?.warn({ err: errorMessage(err) }, "Describe failed, sweeping without creation-time bound");
    }

    for (const horizon of this.horizons) {
      const { kept, skipped } = skipBeforeCreation(planHorizon(now, horizon), creationTime);
      this.transition(region, table, horizon.type, "planned");
      summary.skippedSlices += skipped.length;
      if (skipped.length > 0) {
        log?.info(
          { horizon: horizon.type, skipped: skipped.length, kept: kept.length },
          "Skipping slices before table creation",
        );
      }

      this.transition(region, table, horizon.type, "sweeping");
      const result = await executor.runSweep(table, region, horizon.type, kept);
      summary.succeeded += result.succeeded;
      summary.failed += result.failed.length;

      // runSweep resolves only after the end-of-sweep drain
      this.transition(region, table, horizon.type, "barriered");

      // Only this sweep's slices; a resumed run root may hold older, unaligned ones
      if (kept.length > 0) {
        const batch = await this.consolidator.consolidateSweep(region, table, horizon.type, kept);
        summary.reportsWritten += batch.written.length;
        summary.reportsFailed += batch.failed.length;
      }
      this.transition(region, table, horizon.type, "consolidated");
    }
  }

  private transition(region: string, table: string, horizon: HorizonType, next: SweepState): void {
    const key = stateKey(region, table, horizon);
    const prev = this.states.get(key) ?? null;
    this.states.set(key, next);
    this.logger?.debug({ region, table, horizon, prev, next }, "Sweep state changed");
    this.onStateChange?.(table, horizon, prev, next);
  }
}

function stateKey(region: string, table: string, horizon: HorizonType): string {
  return `${region}/${table}/${horizon}`;
}
