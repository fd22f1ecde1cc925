/**
 * Overlap Checker - Validates that no two unfolded faces cover the same area
 *
 * Placed faces that share a hinge touch along it; faces that meet at a
 * vertex touch at a point. Neither is an overlap. Only interior
 * intersection deeper than OVERLAP_TOLERANCE is flagged.
 *
 * Rules validated:
 * 1. overlap:interior-intersection - Placed faces in a strip must not overlap
 *
 * Algorithm:
 * 1. Broad phase (AABB): Compute axis-aligned bounding box for each face
 * 2. Narrow phase (SAT): Faces are convex, so the Separating Axis Theorem over
 *    both polygons' edge normals gives the exact penetration depth
 */

import type { PlacedFace, Point2D, Strip, Bounds2D } from '../types';
import { computeBounds } from '../../utils/ribbonMetrics';
import { intersectionArea } from '../../utils/polygonBoolean';

// =============================================================================
// Types
// =============================================================================

export type OverlapRuleId = 'overlap:interior-intersection';

export interface OverlapValidationError {
  rule: OverlapRuleId;
  message: string;
  details: {
    stripId?: number;
    faceAId?: number;
    faceBId?: number;
    penetration?: number;
    overlapArea?: number;
    [key: string]: unknown;
  };
}

export interface OverlapCheckResult {
  valid: boolean;
  errors: OverlapValidationError[];
  summary: {
    stripId: number;
    rulesChecked: OverlapRuleId[];
    errorCount: number;
    faceCount: number;
    pairsChecked: number;
  };
}

/**
 * Result of testing one candidate placement against a strip.
 */
export interface OverlapQueryResult {
  overlap: boolean;
  /** First prior face found overlapping the candidate */
  conflictingFaceId?: number;
  /** Penetration depth against that face (mm); 0 when clear */
  penetration: number;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Penetration allowed before two faces count as overlapping (mm).
 * Absorbs rounding along shared hinges; mesh units are millimetres.
 */
export const OVERLAP_TOLERANCE = 1e-4;

// =============================================================================
// Geometry Helpers
// =============================================================================

function aabbOverlap(a: Bounds2D, b: Bounds2D): boolean {
  // Touching boxes (within tolerance) are treated as separate
  if (a.maxX <= b.minX + OVERLAP_TOLERANCE || b.maxX <= a.minX + OVERLAP_TOLERANCE) return false;
  if (a.maxY <= b.minY + OVERLAP_TOLERANCE || b.maxY <= a.minY + OVERLAP_TOLERANCE) return false;
  return true;
}

function project(points: Point2D[], ax: number, ay: number): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const p of points) {
    const d = p.x * ax + p.y * ay;
    if (d < min) min = d;
    if (d > max) max = d;
  }
  return [min, max];
}

/**
 * Penetration depth of two convex polygons along their least-overlapping
 * edge normal. Zero or negative means separated or touching.
 */
export function penetrationDepth(a: Point2D[], b: Point2D[]): number {
  let minPenetration = Infinity;

  for (const poly of [a, b]) {
    const n = poly.length;
    for (let i = 0; i < n; i++) {
      const p = poly[i];
      const q = poly[(i + 1) % n];
      const len = Math.hypot(q.x - p.x, q.y - p.y);

      // Skip degenerate axes (repeated vertices)
      if (len < 1e-12) continue;

      const ax = -(q.y - p.y) / len;
      const ay = (q.x - p.x) / len;
      const [minA, maxA] = project(a, ax, ay);
      const [minB, maxB] = project(b, ax, ay);
      const overlap = Math.min(maxA, maxB) - Math.max(minA, minB);

      if (overlap <= 0) return overlap; // Separated
      minPenetration = Math.min(minPenetration, overlap);
    }
  }

  return minPenetration;
}

// =============================================================================
// Overlap Checker Class
// =============================================================================

export class OverlapChecker {
  private errors: OverlapValidationError[] = [];
  private rulesChecked = new Set<OverlapRuleId>();
  private stripId = 0;
  private faceCount = 0;
  private pairsChecked = 0;

  /**
   * Test a proposed placement against every face already in the strip.
   * Pure query; neither argument is modified.
   */
  query(placed: readonly PlacedFace[], candidate: PlacedFace): OverlapQueryResult {
    const candidateBounds = computeBounds(candidate.points);

    for (const prior of placed) {
      if (!aabbOverlap(candidateBounds, computeBounds(prior.points))) {
        continue;
      }

      const penetration = penetrationDepth(prior.points, candidate.points);
      if (penetration > OVERLAP_TOLERANCE) {
        return { overlap: true, conflictingFaceId: prior.faceId, penetration };
      }
    }

    return { overlap: false, penetration: 0 };
  }

  /**
   * Audit every pair of faces in a finished strip.
   */
  checkStrip(strip: Strip): OverlapCheckResult {
    this.errors = [];
    this.rulesChecked.clear();
    this.stripId = strip.id;
    this.faceCount = strip.faces.length;
    this.pairsChecked = 0;

    this.checkInteriorIntersection(strip);

    return this.buildResult();
  }

  private buildResult(): OverlapCheckResult {
    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      summary: {
        stripId: this.stripId,
        rulesChecked: Array.from(this.rulesChecked),
        errorCount: this.errors.length,
        faceCount: this.faceCount,
        pairsChecked: this.pairsChecked,
      },
    };
  }

  private addError(
    rule: OverlapRuleId,
    message: string,
    details: OverlapValidationError['details']
  ): void {
    this.rulesChecked.add(rule);
    this.errors.push({ rule, message, details });
  }

  // ===========================================================================
  // Rule: overlap:interior-intersection
  // ===========================================================================

  private checkInteriorIntersection(strip: Strip): void {
    this.rulesChecked.add('overlap:interior-intersection');

    const faces = strip.faces;
    const bounds = faces.map((f) => computeBounds(f.points));

    // All pairs: O(n^2), n is the face count of a die (tens at most)
    for (let i = 0; i < faces.length; i++) {
      for (let j = i + 1; j < faces.length; j++) {
        this.pairsChecked++;

        if (!aabbOverlap(bounds[i], bounds[j])) {
          continue;
        }

        const penetration = penetrationDepth(faces[i].points, faces[j].points);
        if (penetration > OVERLAP_TOLERANCE) {
          this.addError(
            'overlap:interior-intersection',
            `Faces ${faces[i].faceId} and ${faces[j].faceId} overlap in strip ${strip.id}`,
            {
              stripId: strip.id,
              faceAId: faces[i].faceId,
              faceBId: faces[j].faceId,
              penetration,
              overlapArea: intersectionArea(faces[i].points, faces[j].points),
            }
          );
        }
      }
    }
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Check a finished strip for overlapping faces
 */
export function checkOverlap(strip: Strip): OverlapCheckResult {
  const checker = new OverlapChecker();
  return checker.checkStrip(strip);
}

const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? '' : 's'}`;

/**
 * One summary line per strip, then one line per overlapping pair.
 *
 *   strip 4: 3 faces, 3 pairs, INVALID (1 overlap)
 *     [overlap:interior-intersection] Faces 0 and 1 overlap in strip 4 (depth 5.0000mm, area 50.0000mm²)
 */
export function formatOverlapCheckResult(result: OverlapCheckResult): string {
  const { stripId, faceCount, pairsChecked, errorCount } = result.summary;
  const status = result.valid ? 'valid' : `INVALID (${plural(errorCount, 'overlap')})`;
  const lines = [`strip ${stripId}: ${plural(faceCount, 'face')}, ${plural(pairsChecked, 'pair')}, ${status}`];

  for (const error of result.errors) {
    const { penetration, overlapArea } = error.details;
    const measures = [
      typeof penetration === 'number' ? `depth ${penetration.toFixed(4)}mm` : null,
      typeof overlapArea === 'number' ? `area ${overlapArea.toFixed(4)}mm²` : null,
    ].filter((m): m is string => m !== null);
    lines.push(`  [${error.rule}] ${error.message}${measures.length > 0 ? ` (${measures.join(', ')})` : ''}`);
  }

  return lines.join('\n');
}
