// Property-Based Test: slowdown verdict follows the sliding displacement window

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { PresenceTracker } from "./presence-tracker.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** Horizontal positions in frame pixels. */
const arbitraryPositions = (minLength: number): fc.Arbitrary<number[]> =>
  fc.array(fc.integer({ min: 0, max: 1920 }), { minLength, maxLength: 60 });

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("Property: slowdown verdict follows the sliding displacement window", () => {
  it("is false for the first 10 updates regardless of input", () => {
    fc.assert(
      fc.property(arbitraryPositions(10), (xs) => {
        const tracker = new PresenceTracker();
        for (const x of xs.slice(0, 10)) {
          expect(tracker.update({ x, y: 0 })).toBe(false);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("reflects the mean of the last 5 displacements once the window is full", () => {
    fc.assert(
      fc.property(arbitraryPositions(11), (xs) => {
        const tracker = new PresenceTracker();
        const displacements: number[] = [];

        xs.forEach((x, i) => {
          const result = tracker.update({ x, y: 0 });
          if (i > 0) displacements.push(Math.abs(x - xs[i - 1]));

          if (displacements.length >= 10) {
            const recent = displacements.slice(-5);
            const mean = recent.reduce((a, b) => a + b, 0) / recent.length;
            expect(result).toBe(mean < 0.8);
          } else {
            expect(result).toBe(false);
          }
        });
      }),
      { numRuns: 200 },
    );
  });
});
