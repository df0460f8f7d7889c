/**
 * Collection Module
 *
 * The collection engine: window planning, throttled job execution, artifact
 * persistence, consolidation and orchestration.
 *
 * IMPORTANT: This module must NOT import from or depend on the AWS SDK.
 * Everything remote goes through the MetricSource and TableCatalog
 * interfaces in @ddb-metrics/shared.
 */

export { ArtifactStore, artifactFileName, parseArtifactFileName, renderArtifact } from "./artifact-store.js";
export type { ArtifactEntry } from "./artifact-store.js";
export { Consolidator, renderHeader } from "./consolidator.js";
export type { ConsolidationBatch, ConsolidatorOptions } from "./consolidator.js";
export { JobExecutor, buildJobs } from "./job-executor.js";
export type { JobExecutorOptions } from "./job-executor.js";
export { ALL_OPERATIONS, METRIC_KINDS, READ_OPERATIONS, WRITE_OPERATIONS } from "./operations.js";
export { Orchestrator } from "./orchestrator.js";
export type { ConnectFn, OrchestratorOptions, RegionClients } from "./orchestrator.js";
export { filterTables, matchesFilter } from "./table-filter.js";
export type { TableFilter } from "./table-filter.js";
export { CallLedger, Throttle } from "./throttle.js";
export type { BarrierReason, Permit, ThrottleOptions } from "./throttle.js";
export { HORIZONS, plan, planHorizon, skipBeforeCreation, sliceWidths } from "./window-planner.js";
