// Demographics assembly: face crop region, age bucket and age midpoint from
// the classifier's raw age-range label.

import type { AgeBucket, BoundingBox, DemographicsResult } from "./types.js";

/** Pixels added around the detected face before classification. */
export const FACE_CROP_PADDING = 20;

/** Lower bound assumed for labels without a range ("60+" style). */
const OPEN_RANGE_LOWER_BOUND = 60;

/**
 * Face box grown by `padding` on every side and clamped to the frame.
 * Returns null when nothing of the region lies inside the frame.
 */
export function faceCropRegion(
  box: BoundingBox,
  frameWidth: number,
  frameHeight: number,
  padding: number = FACE_CROP_PADDING,
): BoundingBox | null {
  const region: BoundingBox = {
    x1: Math.max(0, box.x1 - padding),
    y1: Math.max(0, box.y1 - padding),
    x2: Math.min(frameWidth, box.x2 + padding),
    y2: Math.min(frameHeight, box.y2 + padding),
  };
  if (region.x2 <= region.x1 || region.y2 <= region.y1) {
    return null;
  }
  return region;
}

function parseRange(ageRange: string): [number, number] | null {
  const parts = ageRange.split("-").map((p) => p.trim());
  if (parts.length !== 2 || parts.some((p) => !/^\d+$/.test(p))) {
    return null;
  }
  return [Number(parts[0]), Number(parts[1])];
}

/**
 * Coarse bucket from the range's lower bound. Lower bounds in [30, 40)
 * fall through to "senior" and 60 maps to "adult"; the classifier's ranges
 * (…, "25-32", "33-43", "44-53", "60-100") are bucketed accordingly.
 */
export function mapAgeBucket(ageRange: string): AgeBucket {
  let lo: number;
  if (ageRange.includes("-")) {
    lo = parseInt(ageRange.split("-")[0], 10);
  } else {
    lo = OPEN_RANGE_LOWER_BOUND;
  }

  if (lo < 18) return "child";
  if (lo >= 18 && lo < 30) return "young";
  if (lo >= 40 && lo <= 60) return "adult";
  return "senior";
}

/** Midpoint of an "a-b" label, or null when the label is not a numeric range. */
export function ageMidpoint(ageRange: string): number | null {
  const range = parseRange(ageRange);
  if (range === null) return null;
  return (range[0] + range[1]) / 2;
}

export function buildDemographics(ageRange: string, gender: string): DemographicsResult | null {
  const age = ageMidpoint(ageRange);
  if (age === null) return null;
  return {
    gender,
    ageRange,
    ageBucket: mapAgeBucket(ageRange),
    age,
  };
}
