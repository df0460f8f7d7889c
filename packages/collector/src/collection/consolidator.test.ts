import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CollectionJob, ReportTuple, TimeSlice } from "@ddb-metrics/shared";
import { ConsolidationError } from "../errors.js";
import { ArtifactStore } from "./artifact-store.js";
import { Consolidator, formatGeneratedAt, renderHeader } from "./consolidator.js";
import { HORIZONS, plan } from "./window-planner.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date("2024-05-01T12:00:00Z");
const GENERATED = new Date("2024-05-01T12:00:05Z");

const TUPLE: ReportTuple = {
  region: "us-east-1",
  table: "orders",
  operation: "GetItem",
  metricKind: "SampleCount",
  horizon: "3hr",
};

function jobFor(slice: TimeSlice, overrides?: Partial<CollectionJob>): CollectionJob {
  return {
    region: "us-east-1",
    table: "orders",
    operation: "GetItem",
    metricKind: "SampleCount",
    slice,
    ...overrides,
  };
}

/** Write one artifact per slice, value = slice index */
async function seed(store: ArtifactStore, slices: TimeSlice[], overrides?: Partial<CollectionJob>) {
  for (const [i, slice] of slices.entries()) {
    await store.write(jobFor(slice, overrides), {
      label: "SuccessfulRequestLatency",
      datapoints: [{ timestamp: slice.start.toISOString(), value: i }],
    });
  }
}

function stripGenerated(content: string): string {
  return content.replace(/^GENERATED: .*$/m, "GENERATED:");
}

let root: string;
let store: ArtifactStore;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "consolidator-"));
  store = new ArtifactStore(root);
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Header
// ---------------------------------------------------------------------------

describe("renderHeader", () => {
  it("writes the fixed header block", () => {
    expect(renderHeader(TUPLE, HORIZONS["3hr"], GENERATED)).toBe(
      "================================================\n" +
        "TABLE: orders\n" +
        "OPERATION: GetItem\n" +
        "METRIC: Sample Count\n" +
        "PERIOD: 3 hours (20-minute intervals)\n" +
        "GENERATED: 2024-05-01 12:00:05 (UTC)\n" +
        "================================================\n" +
        "\n",
    );
  });

  it("formats the generation time in UTC", () => {
    expect(formatGeneratedAt(new Date("2024-12-31T23:59:59.999Z"))).toBe("2024-12-31 23:59:59 (UTC)");
  });
});

// ---------------------------------------------------------------------------
// consolidate
// ---------------------------------------------------------------------------

describe("Consolidator.consolidate", () => {
  it("concatenates artifacts oldest slice first", async () => {
    const slices = plan(NOW, 10_800, 9).slice(0, 3);
    await seed(store, slices);
    const consolidator = new Consolidator(store, { clock: () => GENERATED });

    const report = await consolidator.consolidate(TUPLE);

    expect(report?.path).toBe(join(root, "us-east-1", "orders", "orders_GetItem_sample_count-3hr.log"));
    expect(report?.sources).toEqual([
      "GetItem_SampleCount_20240501110000to20240501112000.log",
      "GetItem_SampleCount_20240501112000to20240501114000.log",
      "GetItem_SampleCount_20240501114000to20240501120000.log",
    ]);
    expect(report?.generatedAt).toBe(GENERATED);

    const oldest = await store.readArtifact(store.pathFor(jobFor(slices[2])));
    const expectedStart =
      renderHeader(TUPLE, HORIZONS["3hr"], GENERATED) +
      "--- GetItem_SampleCount_20240501110000to20240501112000.log ---\n" +
      oldest +
      "\n" +
      "--- GetItem_SampleCount_20240501112000to20240501114000.log ---\n";
    expect(report?.content.startsWith(expectedStart)).toBe(true);
    expect(await readFile(report?.path ?? "", "utf-8")).toBe(report?.content);
  });

  it("is idempotent apart from the generation time", async () => {
    await seed(store, plan(NOW, 10_800, 9));
    let tick = 0;
    const consolidator = new Consolidator(store, {
      clock: () => new Date(GENERATED.getTime() + 1000 * tick++),
    });

    const first = await consolidator.consolidate(TUPLE);
    const second = await consolidator.consolidate(TUPLE);

    expect(first?.content).not.toBe(second?.content);
    expect(stripGenerated(second?.content ?? "")).toBe(stripGenerated(first?.content ?? ""));
  });

  it("returns null when the tuple has no artifacts", async () => {
    const consolidator = new Consolidator(store);
    expect(await consolidator.consolidate(TUPLE)).toBeNull();
  });

  it("keeps each horizon's artifacts apart by slice width", async () => {
    await seed(store, plan(NOW, 10_800, 9).slice(0, 2));
    await seed(store, plan(NOW, 604_800, 7).slice(0, 1));
    const consolidator = new Consolidator(store, { clock: () => GENERATED });

    const short = await consolidator.consolidate(TUPLE);
    const long = await consolidator.consolidate({ ...TUPLE, horizon: "7day" });

    expect(short?.sources).toHaveLength(2);
    expect(long?.sources).toEqual(["GetItem_SampleCount_20240430120000to20240501120000.log"]);
    expect(long?.content).toContain("PERIOD: 7 days (24-hour intervals)\n");
  });

  it("limits the report to the given slices", async () => {
    const earlier = plan(new Date("2024-05-01T09:00:00Z"), 10_800, 9);
    const current = plan(NOW, 10_800, 9);
    await seed(store, earlier);
    await seed(store, current);
    const consolidator = new Consolidator(store, { clock: () => GENERATED });

    const report = await consolidator.consolidate(TUPLE, current);

    expect(report?.sources).toHaveLength(9);
    expect(report?.sources[0]).toBe("GetItem_SampleCount_20240501090000to20240501092000.log");
  });

  it("drops same-width artifacts that are not aligned with the given slices", async () => {
    await seed(store, plan(new Date("2024-05-01T11:50:00Z"), 10_800, 9));
    const current = plan(NOW, 10_800, 9);
    await seed(store, current);
    const consolidator = new Consolidator(store, { clock: () => GENERATED });

    const report = await consolidator.consolidate(TUPLE, current);

    expect(report?.sources).toHaveLength(9);
    expect(report?.sources[8]).toBe("GetItem_SampleCount_20240501114000to20240501120000.log");
    expect(report?.sources).not.toContain("GetItem_SampleCount_20240501113000to20240501115000.log");
  });

  it("wraps I/O failures in ConsolidationError", async () => {
    await seed(store, plan(NOW, 10_800, 9).slice(0, 1));
    vi.spyOn(store, "writeReport").mockRejectedValueOnce(new Error("EACCES: permission denied"));
    const consolidator = new Consolidator(store);

    const attempt = consolidator.consolidate(TUPLE);

    await expect(attempt).rejects.toBeInstanceOf(ConsolidationError);
    await expect(attempt).rejects.toThrow(
      "Failed to consolidate orders GetItem SampleCount (3hr): EACCES: permission denied",
    );
  });
});

// ---------------------------------------------------------------------------
// consolidateSweep / consolidateRunRoot
// ---------------------------------------------------------------------------

describe("Consolidator.consolidateSweep", () => {
  it("writes a report for every tuple that has artifacts", async () => {
    const slices = plan(NOW, 10_800, 9).slice(0, 1);
    await seed(store, slices);
    await seed(store, slices, { operation: "PutItem", metricKind: "P99Latency" });
    const consolidator = new Consolidator(store, { clock: () => GENERATED });

    const batch = await consolidator.consolidateSweep("us-east-1", "orders", "3hr");

    expect(batch.written.map((r) => `${r.operation}/${r.metricKind}`)).toEqual([
      "GetItem/SampleCount",
      "PutItem/P99Latency",
    ]);
    expect(batch.empty).toHaveLength(12);
    expect(batch.failed).toEqual([]);
  });

  it("skips a failing tuple and carries on", async () => {
    const slices = plan(NOW, 10_800, 9).slice(0, 1);
    await seed(store, slices);
    await seed(store, slices, { operation: "Query" });
    const write = store.writeReport.bind(store);
    vi.spyOn(store, "writeReport").mockImplementation(async (tuple, content) => {
      if (tuple.operation === "GetItem") throw new Error("disk full");
      return write(tuple, content);
    });
    const consolidator = new Consolidator(store);

    const batch = await consolidator.consolidateSweep("us-east-1", "orders", "3hr");

    expect(batch.failed).toHaveLength(1);
    expect(batch.failed[0].tuple.operation).toBe("GetItem");
    expect(batch.written.map((r) => r.operation)).toEqual(["Query"]);
  });
});

describe("Consolidator.consolidateRunRoot", () => {
  it("discovers regions and tables from disk", async () => {
    const slices = plan(NOW, 10_800, 9).slice(0, 1);
    await seed(store, slices);
    await seed(store, slices, { region: "eu-west-1", table: "users" });
    await writeFile(join(root, "collector_20240501_120000.log"), "");
    const consolidator = new Consolidator(store, { clock: () => GENERATED });

    const batch = await consolidator.consolidateRunRoot(["3hr", "7day"]);

    expect(batch.written.map((r) => `${r.region}/${r.table}/${r.horizon}`)).toEqual([
      "eu-west-1/users/3hr",
      "us-east-1/orders/3hr",
    ]);
    expect(batch.empty).toHaveLength(2 * (14 + 13));
  });
});
