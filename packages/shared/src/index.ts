export type {
  ReadOperation,
  WriteOperation,
  OperationKind,
  MetricKind,
  MetricQuery,
  MetricDatapoint,
  MetricStatistics,
} from "./types/metrics.js";
export type {
  HorizonType,
  HorizonDefinition,
  TimeSlice,
  CollectionJob,
  ArtifactRef,
  JobFailure,
  SweepResult,
  ReportTuple,
  ConsolidatedReport,
  SweepState,
  RunSummary,
} from "./types/collection.js";
export type {
  MetricSource,
  TableDescription,
  TableCatalog,
} from "./types/sources.js";
