// Shared geometry helpers for the Body Measurement Pipeline.
//
// Deterministic functions used by the calibration engine, the measurement
// engine and the mesh parametrizer so every stage measures pixels the same way.

import type { Keypoint } from "./types.js";

/**
 * Euclidean distance between two keypoints in the image plane.
 * Depth (z) is detector-relative and never mixed into pixel distances.
 */
export function pixelDistance(a: Pick<Keypoint, "x" | "y">, b: Pick<Keypoint, "x" | "y">): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/**
 * Sum of the segment lengths along an ordered list of points.
 * Fewer than two points yields 0.
 */
export function pixelPathLength(points: ReadonlyArray<Pick<Keypoint, "x" | "y">>): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += pixelDistance(points[i - 1], points[i]);
  }
  return total;
}

/**
 * Ramanujan's first approximation of an ellipse perimeter:
 *   π × (3(a+b) − √((3a+b)(a+3b)))
 * where a and b are the two semi-axes.
 */
export function ellipseCircumference(a: number, b: number): number {
  return Math.PI * (3 * (a + b) - Math.sqrt((3 * a + b) * (a + 3 * b)));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** True for finite numbers strictly greater than zero. */
export function isPositiveFinite(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}
