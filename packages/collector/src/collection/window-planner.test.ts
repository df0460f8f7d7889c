import { describe, it, expect } from "vitest";
import {
  HORIZONS,
  MAX_DATAPOINTS,
  baseResolution,
  coarsenResolution,
  plan,
  planHorizon,
  skipBeforeCreation,
  sliceWidths,
} from "./window-planner.js";
import { PlanError } from "../errors.js";

const NOW = new Date("2024-05-01T12:00:00Z");

// ---------------------------------------------------------------------------
// plan
// ---------------------------------------------------------------------------

describe("plan", () => {
  it("cuts the 3-hour horizon into nine 20-minute slices at 1s resolution", () => {
    const slices = plan(NOW, 10_800, 9);

    expect(slices).toHaveLength(9);
    for (const s of slices) {
      expect(s.end.getTime() - s.start.getTime()).toBe(1_200_000);
      expect(s.resolutionSeconds).toBe(1);
    }
    expect(slices[0].end.toISOString()).toBe("2024-05-01T12:00:00.000Z");
    expect(slices[0].start.toISOString()).toBe("2024-05-01T11:40:00.000Z");
    expect(slices[8].start.toISOString()).toBe("2024-05-01T09:00:00.000Z");
  });

  it("cuts the 7-day horizon into seven 24-hour slices at 60s resolution", () => {
    const slices = plan(NOW, 604_800, 7);

    expect(slices).toHaveLength(7);
    for (const s of slices) {
      expect(s.end.getTime() - s.start.getTime()).toBe(86_400_000);
      expect(s.resolutionSeconds).toBe(60);
    }
    expect(slices[6].start.toISOString()).toBe("2024-04-24T12:00:00.000Z");
  });

  it.each([
    [10_800, 9],
    [604_800, 7],
    [1_000, 3],
    [100, 7],
    [7, 7],
    [2_592_000, 30],
  ])("returns exactly n contiguous slices inside the horizon (%i s, n=%i)", (horizon, n) => {
    const slices = plan(NOW, horizon, n);

    expect(slices).toHaveLength(n);
    for (let i = 1; i < slices.length; i++) {
      expect(slices[i].end.getTime()).toBe(slices[i - 1].start.getTime());
    }
    for (const s of slices) {
      expect(s.start.getTime()).toBeLessThan(s.end.getTime());
    }
    const earliest = slices[slices.length - 1].start.getTime();
    expect(earliest).toBeGreaterThanOrEqual(NOW.getTime() - horizon * 1000);
  });

  it("clamps the final slice to the horizon boundary", () => {
    // increment = ceil(1000 / 3) = 334
    const slices = plan(NOW, 1_000, 3);

    expect(slices[2].end.getTime()).toBe(NOW.getTime() - 668_000);
    expect(slices[2].start.getTime()).toBe(NOW.getTime() - 1_000_000);
  });

  it("rejects a non-positive or fractional slice count", () => {
    expect(() => plan(NOW, 100, 0)).toThrow(PlanError);
    expect(() => plan(NOW, 100, 2.5)).toThrow(PlanError);
  });

  it("rejects a non-positive horizon", () => {
    expect(() => plan(NOW, 0, 3)).toThrow(PlanError);
  });

  it("rejects a horizon that cannot yield n non-empty slices", () => {
    // increment = ceil(10 / 6) = 2; five full slices already cover 10s
    expect(() => plan(NOW, 10, 6)).toThrow(PlanError);
  });

  it("coarsens slices that would exceed the datapoint ceiling", () => {
    // 2h horizon → base 1s; one 7200s slice needs ≥ 5s
    expect(plan(NOW, 7_200, 1)[0].resolutionSeconds).toBe(5);
    // 10d horizon → base 60s; one 864000s slice needs ≥ 600s
    expect(plan(NOW, 864_000, 1)[0].resolutionSeconds).toBe(600);
  });
});

// ---------------------------------------------------------------------------
// resolution helpers
// ---------------------------------------------------------------------------

describe("baseResolution", () => {
  it("follows the horizon-length table", () => {
    expect(baseResolution(10_800)).toBe(1);
    expect(baseResolution(10_801)).toBe(60);
    expect(baseResolution(15 * 86_400)).toBe(60);
    expect(baseResolution(15 * 86_400 + 1)).toBe(300);
  });
});

describe("coarsenResolution", () => {
  it("keeps a resolution already under the ceiling", () => {
    expect(coarsenResolution(MAX_DATAPOINTS, 1)).toBe(1);
    expect(coarsenResolution(86_400, 60)).toBe(60);
  });

  it("picks the next sub-minute period", () => {
    expect(coarsenResolution(20_000, 1)).toBe(30);
  });

  it("rounds up to a whole minute beyond 30s", () => {
    expect(coarsenResolution(86_400, 1)).toBe(60);
    expect(coarsenResolution(172_800, 60)).toBe(120);
  });
});

// ---------------------------------------------------------------------------
// horizons
// ---------------------------------------------------------------------------

describe("planHorizon / sliceWidths", () => {
  it("plans the built-in horizons", () => {
    expect(planHorizon(NOW, HORIZONS["3hr"])).toHaveLength(9);
    expect(planHorizon(NOW, HORIZONS["7day"])).toHaveLength(7);
  });

  it("reports one width when the horizon divides evenly", () => {
    expect(sliceWidths(HORIZONS["3hr"])).toEqual([1_200]);
    expect(sliceWidths(HORIZONS["7day"])).toEqual([86_400]);
  });

  it("reports the clamped final width as well", () => {
    expect(
      sliceWidths({ type: "3hr", horizonSeconds: 1_000, sliceCount: 3, description: "" }),
    ).toEqual([334, 332]);
  });
});

// ---------------------------------------------------------------------------
// skipBeforeCreation
// ---------------------------------------------------------------------------

describe("skipBeforeCreation", () => {
  it("skips slices lying entirely before the table was created", () => {
    const slices = plan(NOW, 10_800, 9);
    const createdAt = new Date(NOW.getTime() - 2 * 3_600_000);

    const { kept, skipped } = skipBeforeCreation(slices, createdAt);

    expect(kept).toHaveLength(6);
    expect(skipped).toHaveLength(3);
    expect(skipped[0].end.toISOString()).toBe("2024-05-01T10:00:00.000Z");
  });

  it("keeps every slice when the creation time is unknown", () => {
    const slices = plan(NOW, 10_800, 9);
    expect(skipBeforeCreation(slices, undefined).kept).toHaveLength(9);
  });
});
