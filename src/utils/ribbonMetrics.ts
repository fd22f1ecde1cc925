/**
 * Ribbon metrics - convex hull and minimum-width measurements for 2D point sets
 *
 * The ribbon width of a strip is the smallest perpendicular extent over all
 * directions, i.e. the narrowest tape the strip can lie on. For a convex hull
 * the minimum is always reached with one hull edge flat against the tape
 * border, so only hull edge directions need to be tested.
 */

import type { Point2D, Bounds2D } from '../engine/types';

/** Slack for comparing a ribbon width against the tape width (mm) */
export const WIDTH_TOLERANCE = 1e-6;

export interface RibbonWidth {
  width: number;
  /** Direction (radians) of the hull edge that lies along the tape */
  angle: number;
}

const cross = (o: Point2D, a: Point2D, b: Point2D): number =>
  (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);

/**
 * Convex hull (Andrew's monotone chain), counter-clockwise, collinear points dropped.
 */
export function convexHull(points: Point2D[]): Point2D[] {
  const sorted = [...points].sort((p, q) => (p.x === q.x ? p.y - q.y : p.x - q.x));
  if (sorted.length < 3) return sorted;

  const lower: Point2D[] = [];
  for (const p of sorted) {
    while (lower.length >= 2 && cross(lower[lower.length - 2], lower[lower.length - 1], p) <= 0) {
      lower.pop();
    }
    lower.push(p);
  }

  const upper: Point2D[] = [];
  for (let i = sorted.length - 1; i >= 0; i--) {
    const p = sorted[i];
    while (upper.length >= 2 && cross(upper[upper.length - 2], upper[upper.length - 1], p) <= 0) {
      upper.pop();
    }
    upper.push(p);
  }

  lower.pop();
  upper.pop();
  return lower.concat(upper);
}

/**
 * Minimum width of a point set and the hull edge direction that achieves it.
 */
export function minimumWidth(points: Point2D[]): RibbonWidth {
  const hull = convexHull(points);
  if (hull.length < 2) return { width: 0, angle: 0 };
  if (hull.length === 2) {
    return { width: 0, angle: Math.atan2(hull[1].y - hull[0].y, hull[1].x - hull[0].x) };
  }

  let best: RibbonWidth = { width: Infinity, angle: 0 };
  const n = hull.length;

  for (let i = 0; i < n; i++) {
    const p = hull[i];
    const q = hull[(i + 1) % n];
    const len = Math.hypot(q.x - p.x, q.y - p.y);
    if (len === 0) continue;

    // Hull is CCW so every point lies on the left of p→q
    let extent = 0;
    for (const r of hull) {
      extent = Math.max(extent, cross(p, q, r) / len);
    }

    if (extent < best.width) {
      best = { width: extent, angle: Math.atan2(q.y - p.y, q.x - p.x) };
    }
  }

  return best;
}

/**
 * Spread of the points projected on the direction `angle` (radians).
 */
export function extentAlong(points: Point2D[], angle: number): number {
  if (points.length === 0) return 0;
  const dx = Math.cos(angle);
  const dy = Math.sin(angle);
  let min = Infinity;
  let max = -Infinity;
  for (const p of points) {
    const d = p.x * dx + p.y * dy;
    min = Math.min(min, d);
    max = Math.max(max, d);
  }
  return max - min;
}

export function computeBounds(points: Point2D[]): Bounds2D {
  if (points.length === 0) {
    return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
  }

  let minX = points[0].x;
  let maxX = points[0].x;
  let minY = points[0].y;
  let maxY = points[0].y;

  for (const p of points) {
    minX = Math.min(minX, p.x);
    maxX = Math.max(maxX, p.x);
    minY = Math.min(minY, p.y);
    maxY = Math.max(maxY, p.y);
  }

  return { minX, minY, maxX, maxY };
}

/**
 * Vertex average. Faces are convex, so this lies inside the polygon.
 */
export function centroid(points: Point2D[]): Point2D {
  let x = 0;
  let y = 0;
  for (const p of points) {
    x += p.x;
    y += p.y;
  }
  return { x: x / points.length, y: y / points.length };
}

/**
 * Signed area (shoelace). Positive for counter-clockwise.
 */
export function signedArea(points: Point2D[]): number {
  let area = 0;
  const n = points.length;
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += points[i].x * points[j].y - points[j].x * points[i].y;
  }
  return area / 2;
}

export function rotatePoint(p: Point2D, angle: number): Point2D {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return { x: p.x * cos - p.y * sin, y: p.x * sin + p.y * cos };
}
