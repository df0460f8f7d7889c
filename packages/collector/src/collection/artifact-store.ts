/**
 * Artifact Store: deterministic paths and crash-safe persistence for raw
 * per-job results and consolidated reports.
 *
 * Layout under the run root:
 *
 *   <region>/<table>/<operation>/{sample_count|p99_latency}/<op>_<Metric>_<start>to<end>.log
 *   <region>/<table>/<table>_<operation>_{sample_count|p99_latency}-<horizon>.log
 *
 * Timestamps are UTC `YYYYMMDDHHMMSS`, so file names sort chronologically and
 * a job's identity can be read back from its path alone.
 */

import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { dirname, join } from "node:path";
import type {
  ArtifactRef,
  CollectionJob,
  MetricKind,
  MetricStatistics,
  OperationKind,
  ReportTuple,
} from "@ddb-metrics/shared";
import { METRIC_DIR, isMetricKind, isOperationKind } from "./operations.js";

// ---------------------------------------------------------------------------
// Names
// ---------------------------------------------------------------------------

/** `<op>_<Metric>_<YYYYMMDDHHMMSS>to<YYYYMMDDHHMMSS>.log` */
const ARTIFACT_NAME_RE = /^([A-Za-z]+)_([A-Za-z0-9]+)_(\d{14})to(\d{14})\.log$/;
const TIMESTAMP_RE = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

/** Identity recovered from an artifact's file name */
export interface ArtifactEntry {
  operation: OperationKind;
  metricKind: MetricKind;
  start: Date;
  end: Date;
  fileName: string;
  path: string;
}

/** UTC `YYYYMMDDHHMMSS` */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace(/[-:T]/g, "");
}

export function parseTimestamp(value: string): Date | null {
  const m = TIMESTAMP_RE.exec(value);
  if (!m) return null;
  const [, y, mo, d, h, mi, s] = m.map(Number);
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  // Reject values that rolled over (e.g. month 13)
  return formatTimestamp(date) === value ? date : null;
}

export function artifactFileName(
  operation: OperationKind,
  metricKind: MetricKind,
  start: Date,
  end: Date,
): string {
  return `${operation}_${metricKind}_${formatTimestamp(start)}to${formatTimestamp(end)}.log`;
}

/** Inverse of {@link artifactFileName}; null for anything that is not an artifact */
export function parseArtifactFileName(
  fileName: string,
): Omit<ArtifactEntry, "fileName" | "path"> | null {
  const m = ARTIFACT_NAME_RE.exec(fileName);
  if (!m) return null;
  const [, operation, metricKind, startRaw, endRaw] = m;
  if (!isOperationKind(operation) || !isMetricKind(metricKind)) return null;

  const start = parseTimestamp(startRaw);
  const end = parseTimestamp(endRaw);
  if (!start || !end || start.getTime() >= end.getTime()) return null;

  return { operation, metricKind, start, end };
}

/** `<table>_<operation>_<metric dir>-<horizon>.log` */
export function reportFileName(tuple: Omit<ReportTuple, "region">): string {
  return `${tuple.table}_${tuple.operation}_${METRIC_DIR[tuple.metricKind]}-${tuple.horizon}.log`;
}

// ---------------------------------------------------------------------------
// Artifact body
// ---------------------------------------------------------------------------

/** `2024-05-01T12:00:00Z`, without milliseconds */
function formatDatapointTime(timestamp: string): string {
  return new Date(timestamp).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Render a statistics response as the raw artifact body: the monitoring
 * API's response shape, datapoints in ascending time order.
 */
export function renderArtifact(metricKind: MetricKind, stats: MetricStatistics): string {
  const datapoints = [...stats.datapoints]
    .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp))
    .map((dp) => {
      const Timestamp = formatDatapointTime(dp.timestamp);
      return metricKind === "SampleCount"
        ? { Timestamp, SampleCount: dp.value, Unit: dp.unit }
        : { Timestamp, ExtendedStatistics: { p99: dp.value }, Unit: dp.unit };
    });

  return JSON.stringify({ Label: stats.label, Datapoints: datapoints }, null, 2) + "\n";
}

// ---------------------------------------------------------------------------
// ArtifactStore
// ---------------------------------------------------------------------------

export class ArtifactStore {
  constructor(readonly root: string) {}

  /** Directory holding one (region, table, operation, metric)'s artifacts */
  dirFor(region: string, table: string, operation: OperationKind, metricKind: MetricKind): string {
    return join(this.root, region, table, operation, METRIC_DIR[metricKind]);
  }

  /** Pure: the same job identity always maps to the same path */
  pathFor(job: CollectionJob): string {
    return join(
      this.dirFor(job.region, job.table, job.operation, job.metricKind),
      artifactFileName(job.operation, job.metricKind, job.slice.start, job.slice.end),
    );
  }

  reportPathFor(tuple: ReportTuple): string {
    return join(this.root, tuple.region, tuple.table, reportFileName(tuple));
  }

  /** Persist one job's result; never visible half-written at its final path */
  async write(job: CollectionJob, stats: MetricStatistics): Promise<ArtifactRef> {
    const path = this.pathFor(job);
    await writeAtomic(path, renderArtifact(job.metricKind, stats));
    return { job, path, datapoints: stats.datapoints.length };
  }

  async writeReport(tuple: ReportTuple, content: string): Promise<string> {
    const path = this.reportPathFor(tuple);
    await writeAtomic(path, content);
    return path;
  }

  readArtifact(path: string): Promise<string> {
    return readFile(path, "utf-8");
  }

  /**
   * Every artifact for one (region, table, operation, metric), oldest slice
   * first. Files that do not follow the naming scheme are ignored.
   */
  async list(
    region: string,
    table: string,
    operation: OperationKind,
    metricKind: MetricKind,
  ): Promise<ArtifactEntry[]> {
    const dir = this.dirFor(region, table, operation, metricKind);
    const names = await readdirOrEmpty(dir);

    const entries: ArtifactEntry[] = [];
    for (const fileName of names) {
      const parsed = parseArtifactFileName(fileName);
      if (!parsed || parsed.operation !== operation || parsed.metricKind !== metricKind) continue;
      entries.push({ ...parsed, fileName, path: join(dir, fileName) });
    }

    return entries.sort(
      (a, b) =>
        a.start.getTime() - b.start.getTime() ||
        a.end.getTime() - b.end.getTime(),
    );
  }

  /** Region directories under the run root */
  async listRegions(): Promise<string[]> {
    return listDirectories(this.root);
  }

  /** Table directories under a region */
  async listTables(region: string): Promise<string[]> {
    return listDirectories(join(this.root, region));
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Write to a sibling temp file, then rename over the destination */
async function writeAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
  try {
    await writeFile(tmp, content, "utf-8");
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readdirOrEmpty(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

async function listDirectories(dir: string): Promise<string[]> {
  try {
    const dirents = await readdir(dir, { withFileTypes: true });
    return dirents
      .filter((d) => d.isDirectory())
      .map((d) => d.name)
      .sort();
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}
