/**
 * PresenceEstimator: turns a pose detection into a PresenceSample.
 * Distance is estimated from the person's bounding-box height; the nose
 * keypoint becomes the reference point for face matching. Every detected
 * person box also feeds the slowdown tracker, confident or not.
 */

import type { BoundingBox, Point, PoseDetection, PresenceSample } from "./types.js";
import { PresenceTracker } from "./presence-tracker.js";

export const KEYPOINT_CONFIDENCE_THRESHOLD = 0.5;
/** Calibration constant: box height in pixels of a person standing 1 m away. */
export const DISTANCE_SCALE_PX = 300;
export const MIN_DISTANCE_METERS = 0.5;

export function estimateDistance(box: BoundingBox): number {
  const height = box.y2 - box.y1;
  if (height <= 0) return Number.POSITIVE_INFINITY;
  return Math.max(MIN_DISTANCE_METERS, DISTANCE_SCALE_PX / height);
}

export function boxCenter(box: BoundingBox): Point {
  return {
    x: Math.floor((box.x1 + box.x2) / 2),
    y: Math.floor((box.y1 + box.y2) / 2),
  };
}

/** Nose plus at least one shoulder above the confidence threshold. */
export function isConfidentPose(pose: PoseDetection): boolean {
  const { nose, leftShoulder, rightShoulder } = pose.keypoints;
  const confident = (c: number | undefined) =>
    c !== undefined && c > KEYPOINT_CONFIDENCE_THRESHOLD;
  return (
    confident(nose?.confidence) &&
    (confident(leftShoulder?.confidence) || confident(rightShoulder?.confidence))
  );
}

export class PresenceEstimator {
  private readonly tracker: PresenceTracker;

  constructor(tracker: PresenceTracker = new PresenceTracker()) {
    this.tracker = tracker;
  }

  estimate(pose: PoseDetection | null): PresenceSample | null {
    if (pose === null) {
      this.tracker.clearReference();
      return null;
    }

    this.tracker.update(boxCenter(pose.box));

    const nose = pose.keypoints.nose;
    if (!isConfidentPose(pose) || nose === undefined) {
      return null;
    }

    return {
      distance: estimateDistance(pose.box),
      referencePoint: { x: nose.x, y: nose.y },
    };
  }

  get slowingDown(): boolean {
    return this.tracker.slowingDown;
  }
}
