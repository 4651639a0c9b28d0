/**
 * Picks the face that belongs to the tracked visitor.
 *
 * A candidate wins only when it is strictly closer to the reference point than
 * the running best AND strictly more confident than the running best
 * confidence. An early high-confidence face therefore raises the bar for every
 * later one, even a nearer face.
 */

import type { BoundingBox, FaceCandidate, Point } from "./types.js";

export function faceCenter(box: BoundingBox): Point {
  return { x: (box.x1 + box.x2) / 2, y: (box.y1 + box.y2) / 2 };
}

export function distanceBetween(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function selectCandidate(
  candidates: readonly FaceCandidate[],
  referencePoint: Point,
): FaceCandidate | null {
  let best: FaceCandidate | null = null;
  let minDistance = Number.POSITIVE_INFINITY;
  let maxConfidence = 0;

  for (const candidate of candidates) {
    const d = distanceBetween(faceCenter(candidate.box), referencePoint);
    if (d < minDistance && candidate.confidence > maxConfidence) {
      best = candidate;
      minDistance = d;
      maxConfidence = candidate.confidence;
    }
  }

  return best;
}
