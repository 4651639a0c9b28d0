/**
 * Sliding-window slowdown detector for the visitor in front of the stand.
 * Tracks horizontal displacement of the person's center between consecutive
 * frames and reports "slowing down" once the recent average speed drops
 * below a threshold.
 */

import type { Point } from "./types.js";

export const DISPLACEMENT_WINDOW_SIZE = 10;
export const RECENT_SAMPLE_COUNT = 5;
/** Pixels per frame. */
export const SLOWDOWN_SPEED_THRESHOLD = 0.8;

export class PresenceTracker {
  private displacements: number[];
  private lastCenter: Point | null;
  private slowing: boolean;

  constructor() {
    this.displacements = [];
    this.lastCenter = null;
    this.slowing = false;
  }

  /**
   * Feed the current center. The first center after a reference reset only
   * seeds the reference. Returns false until the window is full.
   */
  update(center: Point): boolean {
    if (this.lastCenter === null) {
      this.lastCenter = center;
      return false;
    }

    const dx = Math.abs(center.x - this.lastCenter.x);
    this.lastCenter = center;
    this.displacements.push(dx);
    if (this.displacements.length > DISPLACEMENT_WINDOW_SIZE) {
      this.displacements.shift();
    }

    if (this.displacements.length < DISPLACEMENT_WINDOW_SIZE) {
      return false;
    }

    const recent = this.displacements.slice(-RECENT_SAMPLE_COUNT);
    const avgSpeed = recent.reduce((a, b) => a + b, 0) / recent.length;
    this.slowing = avgSpeed < SLOWDOWN_SPEED_THRESHOLD;
    return this.slowing;
  }

  /**
   * Person left the frame: drop the reference so the next center re-seeds it.
   * The displacement window is kept as is.
   */
  clearReference(): void {
    this.lastCenter = null;
  }

  /** Last computed slowdown flag. */
  get slowingDown(): boolean {
    return this.slowing;
  }

  /** Number of displacement samples currently held. */
  get windowSize(): number {
    return this.displacements.length;
  }
}
