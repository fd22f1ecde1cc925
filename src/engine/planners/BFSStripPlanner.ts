/**
 * BFS Strip Planner - Cover every face with tape-width-bounded strips
 *
 * Strips grow breadth-first from a seed face. Within the shallowest layer of
 * the frontier the candidate that widens the strip least is accepted; a
 * candidate that overlaps, overflows the tape or cannot be hinged is dropped
 * from this strip and left for a later seed. Strips keep being seeded until
 * every face belongs to exactly one of them.
 *
 * Cannot fail once every face fits the tape on its own: in the worst case
 * each face becomes a one-face strip.
 */

import type { AdjacencyEdge, PlacedFace, Point2D, Strip } from '../types';
import type { AdjacencyGraph } from '../AdjacencyGraph';
import { DegenerateEdgeError, TapeWidthError } from '../errors';
import { seedPlacement, unfoldFace } from '../unfoldTransform';
import { OverlapChecker } from '../validators/OverlapChecker';
import { convexHull, minimumWidth, WIDTH_TOLERANCE } from '../../utils/ribbonMetrics';
import { debug } from '../../utils/debug';

// =============================================================================
// Types
// =============================================================================

export interface BfsPlannerOptions {
  /** Tape width in mm */
  tapeWidth: number;
  overlapChecker?: OverlapChecker;
}

interface FrontierEntry {
  parentId: number;
  childId: number;
  edge: AdjacencyEdge;
  depth: number;
}

interface Candidate {
  entry: FrontierEntry;
  placed: PlacedFace;
  hull: Point2D[];
  width: number;
}

// Widths closer than this are considered equal when breaking ties
const TIE_EPSILON = 1e-9;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Throw if any single face is wider than the tape: no strip could hold it.
 */
export function assertFacesFitTape(graph: AdjacencyGraph, tapeWidth: number): void {
  for (const face of graph.faces) {
    const { width } = minimumWidth(face.outline);
    if (width > tapeWidth + WIDTH_TOLERANCE) {
      throw new TapeWidthError(
        `Face ${face.id} is ${width.toFixed(3)}mm wide; tape is only ${tapeWidth}mm`,
        { faceId: face.id, faceWidth: width, tapeWidth }
      );
    }
  }
}

/**
 * Highest-degree unassigned face; lowest id on ties.
 */
function pickSeed(graph: AdjacencyGraph, unassigned: Set<number>): number {
  let best = -1;
  for (const id of unassigned) {
    if (best < 0 || graph.degree(id) > graph.degree(best) || (graph.degree(id) === graph.degree(best) && id < best)) {
      best = id;
    }
  }
  return best;
}

function frontierFrom(
  graph: AdjacencyGraph,
  parentId: number,
  depth: number,
  unassigned: Set<number>
): FrontierEntry[] {
  return graph
    .incidentEdges(parentId)
    .map((edge) => ({ parentId, childId: graph.otherFace(edge, parentId), edge, depth }))
    .filter((entry) => unassigned.has(entry.childId))
    .sort((a, b) => a.childId - b.childId);
}

function isBetter(candidate: Candidate, best: Candidate | null): boolean {
  if (!best) return true;
  if (candidate.width < best.width - TIE_EPSILON) return true;
  if (candidate.width > best.width + TIE_EPSILON) return false;
  if (candidate.entry.childId !== best.entry.childId) {
    return candidate.entry.childId < best.entry.childId;
  }
  return candidate.entry.parentId < best.entry.parentId;
}

// =============================================================================
// Planner
// =============================================================================

/**
 * Partition the graph's faces into strips no wider than the tape.
 *
 * @throws TapeWidthError if a face on its own exceeds the tape width
 */
export function planBfsStrips(graph: AdjacencyGraph, options: BfsPlannerOptions): Strip[] {
  const { tapeWidth } = options;
  const checker = options.overlapChecker ?? new OverlapChecker();
  const limit = tapeWidth + WIDTH_TOLERANCE;

  assertFacesFitTape(graph, tapeWidth);

  const unassigned = new Set(graph.faces.map((f) => f.id));
  const strips: Strip[] = [];

  while (unassigned.size > 0) {
    const seedId = pickSeed(graph, unassigned);
    unassigned.delete(seedId);

    const seed = seedPlacement(graph.getFace(seedId));
    const placed: PlacedFace[] = [seed];
    const placedById = new Map<number, PlacedFace>([[seedId, seed]]);
    const excluded = new Set<number>();
    let hull = convexHull(seed.points);
    let width = minimumWidth(hull).width;
    let frontier = frontierFrom(graph, seedId, 1, unassigned);

    for (;;) {
      frontier = frontier.filter((e) => unassigned.has(e.childId) && !excluded.has(e.childId));
      if (frontier.length === 0) break;

      const minDepth = Math.min(...frontier.map((e) => e.depth));
      const rejected = new Set<FrontierEntry>();
      let best: Candidate | null = null;

      for (const entry of frontier) {
        if (entry.depth !== minDepth) continue;

        const parent = placedById.get(entry.parentId);
        if (!parent) {
          rejected.add(entry);
          continue;
        }

        let candidate: PlacedFace;
        try {
          candidate = unfoldFace(graph, parent, entry.edge);
        } catch (e) {
          if (!(e instanceof DegenerateEdgeError)) throw e;
          debug('bfs', `Strip ${strips.length}: ${e.message}; face ${entry.childId} deferred`);
          excluded.add(entry.childId);
          rejected.add(entry);
          continue;
        }

        const overlap = checker.query(placed, candidate);
        if (overlap.overlap) {
          debug('bfs', `Strip ${strips.length}: face ${entry.childId} overlaps face ${overlap.conflictingFaceId}`);
          rejected.add(entry);
          continue;
        }

        const nextHull = convexHull([...hull, ...candidate.points]);
        const nextWidth = minimumWidth(nextHull).width;
        if (nextWidth > limit) {
          rejected.add(entry);
          continue;
        }

        const option: Candidate = { entry, placed: candidate, hull: nextHull, width: nextWidth };
        if (isBetter(option, best)) best = option;
      }

      // Strips only grow, so a rejected placement stays invalid
      frontier = frontier.filter((e) => !rejected.has(e));
      if (!best) continue;

      const childId = best.entry.childId;
      placed.push(best.placed);
      placedById.set(childId, best.placed);
      unassigned.delete(childId);
      hull = best.hull;
      width = best.width;
      frontier.push(...frontierFrom(graph, childId, best.entry.depth + 1, unassigned));
    }

    debug('bfs', `Strip ${strips.length}: ${placed.length} face(s), width ${width.toFixed(3)}mm`);
    strips.push({ id: strips.length, faces: placed, width });
  }

  return strips;
}
