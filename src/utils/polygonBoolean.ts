/**
 * Boolean polygon operations utility
 *
 * Wraps the polygon-clipping library to work with our Point2D format.
 * Used to merge a strip's faces into one cut outline and to measure how much
 * two placed faces overlap. Also hosts the inward offset used for shrink.
 */

import polygonClipping from 'polygon-clipping';
import type { Pair, Ring, Polygon, MultiPolygon } from 'polygon-clipping';
import type { Point2D } from '../engine/types';
import { signedArea } from './ribbonMetrics';
import { debug } from './debug';

// Convert our Point2D array to polygon-clipping format
function pathToRing(points: Point2D[]): Ring {
  return points.map((p): Pair => [p.x, p.y]);
}

// Convert polygon-clipping ring back to Point2D array, dropping the closing point
function ringToPath(ring: Ring): Point2D[] {
  const points = ring.map(([x, y]) => ({ x, y }));
  const first = points[0];
  const last = points[points.length - 1];
  if (points.length > 1 && first.x === last.x && first.y === last.y) {
    points.pop();
  }
  return points;
}

function pathToPolygon(points: Point2D[]): Polygon {
  return [pathToRing(points)];
}

/**
 * Union of any number of polygons.
 * Returns every polygon of the result as a list of rings (outer ring first,
 * then holes), or null if the operation fails.
 */
export function unionPolygons(polygons: Point2D[][]): Point2D[][][] | null {
  const valid = polygons.filter((p) => p.length >= 3);
  if (valid.length === 0) {
    return [];
  }

  try {
    const [first, ...rest] = valid.map(pathToPolygon);
    const result: MultiPolygon = polygonClipping.union(first, ...rest);
    return result.map((polygon) => polygon.map(ringToPath));
  } catch (e) {
    debug('layout', `Union operation failed: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

/**
 * Area of the intersection of two polygons (0 when disjoint or touching).
 */
export function intersectionArea(a: Point2D[], b: Point2D[]): number {
  if (a.length < 3 || b.length < 3) {
    return 0;
  }

  const result: MultiPolygon = polygonClipping.intersection(pathToPolygon(a), pathToPolygon(b));
  let area = 0;
  for (const polygon of result) {
    polygon.forEach((ring, i) => {
      const ringArea = Math.abs(signedArea(ringToPath(ring)));
      area += i === 0 ? ringArea : -ringArea;
    });
  }
  return area;
}

/**
 * Unsigned polygon area, whatever the winding.
 */
export function computePolygonArea(points: Point2D[]): number {
  return Math.abs(signedArea(points));
}

/**
 * Check if a polygon is valid (at least 3 points, non-zero area)
 */
export function isValidPolygon(points: Point2D[]): boolean {
  if (points.length < 3) return false;
  const area = computePolygonArea(points);
  return area > 1e-10; // Small epsilon for numerical stability
}

// =============================================================================
// Inward Offset (shrink)
// =============================================================================

/**
 * Offset a convex polygon inward: every edge moves a fixed perpendicular
 * distance towards the interior. Implemented as successive half-plane clips
 * (Sutherland-Hodgman), so edges that vanish simply drop out.
 *
 * Returns null when nothing is left of the polygon. Output keeps the input's
 * winding.
 */
export function insetConvexPolygon(points: Point2D[], distance: number): Point2D[] | null {
  if (distance <= 0) {
    return points.map((p) => ({ ...p }));
  }
  if (points.length < 3) return null;

  // Interior lies to the left of each edge for CCW input, right for CW
  const orientation = signedArea(points) >= 0 ? 1 : -1;

  let result: Point2D[] = points.map((p) => ({ ...p }));
  const n = points.length;

  for (let i = 0; i < n && result.length > 0; i++) {
    const p = points[i];
    const q = points[(i + 1) % n];
    const len = Math.hypot(q.x - p.x, q.y - p.y);
    if (len === 0) continue;

    // Signed distance of r from the offset edge line, positive inside
    const inside = (r: Point2D): number =>
      (orientation * ((q.x - p.x) * (r.y - p.y) - (q.y - p.y) * (r.x - p.x))) / len - distance;

    const clipped: Point2D[] = [];
    for (let k = 0; k < result.length; k++) {
      const cur = result[k];
      const nxt = result[(k + 1) % result.length];
      const dc = inside(cur);
      const dn = inside(nxt);

      if (dc >= 0) clipped.push(cur);
      if ((dc >= 0) !== (dn >= 0)) {
        const t = dc / (dc - dn);
        clipped.push({ x: cur.x + t * (nxt.x - cur.x), y: cur.y + t * (nxt.y - cur.y) });
      }
    }
    result = clipped;
  }

  return isValidPolygon(result) ? result : null;
}
