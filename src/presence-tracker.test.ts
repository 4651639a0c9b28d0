/**
 * Unit tests for presence-tracker.ts
 */

import { describe, it, expect } from "vitest";
import { PresenceTracker } from "./presence-tracker.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function feed(tracker: PresenceTracker, xs: number[]): boolean[] {
  return xs.map((x) => tracker.update({ x, y: 100 }));
}

describe("PresenceTracker", () => {
  describe("warm-up", () => {
    it("seeds the reference on the first update without recording a displacement", () => {
      const tracker = new PresenceTracker();
      expect(tracker.update({ x: 10, y: 10 })).toBe(false);
      expect(tracker.windowSize).toBe(0);
    });

    it("stays false until the window holds 10 displacements", () => {
      const tracker = new PresenceTracker();
      // 1 seed + 9 displacements: still one short of a full window
      const results = feed(tracker, Array(10).fill(50));
      expect(results).toEqual(Array(10).fill(false));
      expect(tracker.windowSize).toBe(9);
    });

    it("reports a stationary visitor once the window is full", () => {
      const tracker = new PresenceTracker();
      const results = feed(tracker, Array(11).fill(50));
      expect(results[10]).toBe(true);
      expect(tracker.slowingDown).toBe(true);
    });
  });

  describe("speed threshold", () => {
    it("is false for a visitor walking past at 5 px/frame", () => {
      const tracker = new PresenceTracker();
      const results = feed(tracker, Array.from({ length: 15 }, (_, i) => i * 5));
      expect(results.every((r) => r === false)).toBe(true);
      expect(tracker.slowingDown).toBe(false);
    });

    it("only averages the 5 most recent displacements", () => {
      const tracker = new PresenceTracker();
      // Five displacements of 10 px followed by five of 0.5 px
      const results = feed(tracker, [0, 10, 20, 30, 40, 50, 50.5, 51, 51.5, 52, 52.5]);
      expect(results[10]).toBe(true);
    });

    it("is false when the recent mean equals the threshold exactly", () => {
      const tracker = new PresenceTracker();
      // Displacements 1,1,1,1,1,1,1,1,0,1 → last five average 4/5 = 0.8
      const results = feed(tracker, [0, 1, 2, 3, 4, 5, 6, 7, 8, 8, 9]);
      expect(results[10]).toBe(false);
    });

    it("is true when the recent mean drops just below the threshold", () => {
      const tracker = new PresenceTracker();
      // Last five displacements 1,1,1,0,0 → 0.6
      const results = feed(tracker, [0, 1, 2, 3, 4, 5, 6, 7, 8, 8, 8]);
      expect(results[10]).toBe(true);
    });

    it("uses the absolute horizontal displacement only", () => {
      const tracker = new PresenceTracker();
      for (let i = 0; i < 11; i++) {
        // Alternating left/right by 3 px while moving vertically
        tracker.update({ x: i % 2 === 0 ? 0 : 3, y: i * 40 });
      }
      expect(tracker.slowingDown).toBe(false);
    });
  });

  describe("presence loss", () => {
    it("re-seeds the reference after clearReference()", () => {
      const tracker = new PresenceTracker();
      feed(tracker, [0, 0, 0]);
      tracker.clearReference();
      // Jump of 500 px is not recorded: the first center only re-seeds
      expect(tracker.update({ x: 500, y: 0 })).toBe(false);
      expect(tracker.windowSize).toBe(2);
    });

    it("keeps the displacement window across a reset", () => {
      const tracker = new PresenceTracker();
      feed(tracker, Array(11).fill(50));
      expect(tracker.windowSize).toBe(10);

      tracker.clearReference();
      expect(tracker.update({ x: 300, y: 0 })).toBe(false);
      expect(tracker.windowSize).toBe(10);

      // Window is still full, so the very next displacement yields a verdict
      expect(tracker.update({ x: 300, y: 0 })).toBe(true);
    });
  });
});
