/**
 * Entry points behind the CLI: a full collection run and a standalone
 * re-consolidation of an existing run root.
 */

import { join } from "node:path";
import type { Logger } from "pino";
import type { RunSummary } from "@ddb-metrics/shared";
import { createConnector, resolveDefaultRegion, type AwsClientFactory } from "./aws/index.js";
import {
  ArtifactStore,
  Consolidator,
  Orchestrator,
  type ConnectFn,
  type ConsolidationBatch,
} from "./collection/index.js";
import type { CollectorConfig } from "./config.js";
import { createLogger, executionLogName } from "./logger.js";

export interface RunDeps {
  /** Replaces AWS client wiring entirely */
  connect?: ConnectFn;
  clientFactory?: AwsClientFactory;
  /** Used when no region is configured */
  resolveRegion?: (profile: string | undefined, logger: Logger) => Promise<string>;
  logger?: Logger;
  clock?: () => Date;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `dynamo_metrics_logs_<MMDDYYHHMMSS>` in UTC */
export function runRootName(date: Date): string {
  const stamp =
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCFullYear() % 100) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds());
  return `dynamo_metrics_logs_${stamp}`;
}

export function formatSummary(summary: RunSummary): string {
  const rows: [string, string | number][] = [
    ["Run root", summary.runRoot],
    ["Regions", summary.regions.join(", ")],
    ["Tables", summary.tables],
    ["API calls", summary.totalCalls],
    ["Jobs succeeded", summary.succeeded],
    ["Jobs failed", summary.failed],
    ["Slices skipped", summary.skippedSlices],
    ["Barriers", summary.barriers],
    ["Reports written", summary.reportsWritten],
    ["Reports failed", summary.reportsFailed],
  ];
  const width = Math.max(...rows.map(([label]) => label.length)) + 1;
  return [
    "Collection complete",
    ...rows.map(([label, value]) => `  ${`${label}:`.padEnd(width + 1)}${value}`),
  ].join("\n");
}

// ---------------------------------------------------------------------------
// collect
// ---------------------------------------------------------------------------

export async function collect(config: CollectorConfig, deps?: RunDeps): Promise<RunSummary> {
  const clock = deps?.clock ?? (() => new Date());
  const startedAt = clock();
  const runRoot = config.runRoot ?? join(config.outputDir, runRootName(startedAt));
  const logger =
    deps?.logger ??
    createLogger({ level: config.logLevel, file: join(runRoot, executionLogName(startedAt)) });

  // Instance-profile credentials ignore any profile set in the environment
  const profile = config.instanceProfile ? undefined : config.profile;
  const resolveRegion = deps?.resolveRegion ?? resolveDefaultRegion;
  const regions =
    config.regions.length > 0 ? config.regions : [await resolveRegion(profile, logger)];

  logger.info(
    {
      runRoot,
      regions,
      horizons: config.horizons,
      waitThreshold: config.waitThreshold,
      maxParallel: config.maxParallel,
      profile: profile ?? (config.instanceProfile ? "instance-profile" : "default"),
    },
    "Starting collection",
  );

  const connect =
    deps?.connect ??
    createConnector({
      profile,
      instanceProfile: config.instanceProfile,
      maxAttempts: config.maxAttempts,
      logger,
      clientFactory: deps?.clientFactory,
    });

  const orchestrator = new Orchestrator(new ArtifactStore(runRoot), connect, {
    regions,
    horizons: config.horizons,
    filter: {
      tables: config.tables,
      prefix: config.tablePrefix,
      suffix: config.tableSuffix,
      matchBoth: config.matchBoth,
    },
    maxParallel: config.maxParallel,
    barrierThreshold: config.waitThreshold,
    clock,
    logger,
  });

  return orchestrator.run();
}

// ---------------------------------------------------------------------------
// consolidate
// ---------------------------------------------------------------------------

export async function consolidate(
  config: CollectorConfig,
  deps?: Pick<RunDeps, "logger" | "clock">,
): Promise<ConsolidationBatch> {
  const runRoot = config.runRoot ?? config.outputDir;
  const logger = deps?.logger ?? createLogger({ level: config.logLevel });
  const consolidator = new Consolidator(new ArtifactStore(runRoot), {
    clock: deps?.clock,
    logger,
  });

  logger.info({ runRoot, horizons: config.horizons }, "Re-consolidating run root");
  return consolidator.consolidateRunRoot(config.horizons);
}
