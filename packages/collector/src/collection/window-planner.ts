/**
 * Window Planner: cuts a reporting horizon into a fixed number of
 * contiguous, non-overlapping slices, most recent first.
 *
 * Each slice carries its own resolution. The base resolution is picked from
 * the horizon length; a slice whose datapoint count would exceed the
 * monitoring API's per-request ceiling is coarsened to the next valid period.
 */

import type { HorizonDefinition, HorizonType, TimeSlice } from "@ddb-metrics/shared";
import { PlanError } from "../errors.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/** Most datapoints a single statistics request may return */
export const MAX_DATAPOINTS = 1440;

/** The two horizons collected by default */
export const HORIZONS: Record<HorizonType, HorizonDefinition> = {
  "3hr": {
    type: "3hr",
    horizonSeconds: 3 * HOUR,
    sliceCount: 9,
    description: "3 hours (20-minute intervals)",
  },
  "7day": {
    type: "7day",
    horizonSeconds: 7 * DAY,
    sliceCount: 7,
    description: "7 days (24-hour intervals)",
  },
};

/** Base resolution keyed on horizon length (first match wins) */
const RESOLUTION_TABLE: { maxHorizonSeconds: number; resolutionSeconds: number }[] = [
  { maxHorizonSeconds: 3 * HOUR, resolutionSeconds: 1 },
  { maxHorizonSeconds: 15 * DAY, resolutionSeconds: 60 },
  { maxHorizonSeconds: Infinity, resolutionSeconds: 5 * MINUTE },
];

/** Valid periods below one minute; anything longer is a multiple of 60 */
const SUB_MINUTE_PERIODS = [1, 5, 10, 30];

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export function baseResolution(horizonSeconds: number): number {
  for (const row of RESOLUTION_TABLE) {
    if (horizonSeconds <= row.maxHorizonSeconds) return row.resolutionSeconds;
  }
  return RESOLUTION_TABLE[RESOLUTION_TABLE.length - 1].resolutionSeconds;
}

/** Smallest valid period ≥ `resolutionSeconds` keeping the slice under MAX_DATAPOINTS */
export function coarsenResolution(widthSeconds: number, resolutionSeconds: number): number {
  if (widthSeconds / resolutionSeconds <= MAX_DATAPOINTS) return resolutionSeconds;

  const needed = Math.max(resolutionSeconds, Math.ceil(widthSeconds / MAX_DATAPOINTS));
  for (const period of SUB_MINUTE_PERIODS) {
    if (period >= needed) return period;
  }
  return Math.ceil(needed / MINUTE) * MINUTE;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

function sliceIncrement(horizonSeconds: number, sliceCount: number): number {
  if (!Number.isInteger(sliceCount) || sliceCount < 1) {
    throw new PlanError(`sliceCount must be a positive integer, got ${sliceCount}`);
  }
  if (!Number.isFinite(horizonSeconds) || horizonSeconds <= 0) {
    throw new PlanError(`horizonSeconds must be positive, got ${horizonSeconds}`);
  }

  const increment = Math.ceil(horizonSeconds / sliceCount);
  // The clamped final slice must still be non-empty
  if ((sliceCount - 1) * increment >= horizonSeconds) {
    throw new PlanError(
      `A ${horizonSeconds}s horizon cannot be split into ${sliceCount} non-empty slices`,
    );
  }
  return increment;
}

/**
 * Plan `sliceCount` slices covering `[now - horizonSeconds, now]`.
 * Slice `i` ends at `now - i*increment`; the last one is clamped to the
 * horizon boundary.
 */
export function plan(now: Date, horizonSeconds: number, sliceCount: number): TimeSlice[] {
  const increment = sliceIncrement(horizonSeconds, sliceCount);
  const base = baseResolution(horizonSeconds);
  const nowMs = now.getTime();
  const floorMs = nowMs - horizonSeconds * 1000;

  const slices: TimeSlice[] = [];
  for (let i = 0; i < sliceCount; i++) {
    const endMs = nowMs - i * increment * 1000;
    const startMs = Math.max(nowMs - (i + 1) * increment * 1000, floorMs);
    slices.push({
      start: new Date(startMs),
      end: new Date(endMs),
      resolutionSeconds: coarsenResolution((endMs - startMs) / 1000, base),
    });
  }
  return slices;
}

export function planHorizon(now: Date, horizon: HorizonDefinition): TimeSlice[] {
  return plan(now, horizon.horizonSeconds, horizon.sliceCount);
}

/** Every slice width (seconds) a horizon's plan can contain */
export function sliceWidths(horizon: HorizonDefinition): number[] {
  const increment = sliceIncrement(horizon.horizonSeconds, horizon.sliceCount);
  const last = horizon.horizonSeconds - (horizon.sliceCount - 1) * increment;
  return last === increment ? [increment] : [increment, last];
}

/**
 * Drop slices lying entirely before a table existed.
 * A slice that straddles the creation time is kept whole.
 */
export function skipBeforeCreation(
  slices: TimeSlice[],
  creationTime: Date | undefined,
): { kept: TimeSlice[]; skipped: TimeSlice[] } {
  if (!creationTime) return { kept: slices, skipped: [] };
  const kept: TimeSlice[] = [];
  const skipped: TimeSlice[] = [];
  for (const slice of slices) {
    if (slice.end.getTime() <= creationTime.getTime()) skipped.push(slice);
    else kept.push(slice);
  }
  return { kept, skipped };
}
