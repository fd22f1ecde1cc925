/**
 * Hamiltonian Ribbon Planner - One serpentine strip through every face
 *
 * Searches for a face order where each face is adjacent to the previous one
 * and unfolding in that order never overlaps or exceeds the tape width.
 * Exhaustive search explodes combinatorially, so this is a beam search:
 *
 * - The frontier holds partial paths of equal length, one depth at a time.
 * - Each state is expanded through every unvisited neighbour of its last
 *   face; overlapping, overflowing and un-hingeable placements are pruned,
 *   as are states whose remaining faces are cut off from the path end.
 * - States reaching the same face set at the same end face are merged.
 * - Survivors are ranked and only the best `beamWidth` are kept.
 *
 * A pass that runs dry after dropping states is repeated with twice the beam.
 * A pass that never truncates has seen every merged state, so its failure is
 * final.
 *
 * The wall-clock deadline spans all passes and is checked before every state
 * expansion, so the search overruns its timeout by at most one expansion.
 *
 * Failure is returned as data, never thrown; the caller decides whether to
 * fall back to strip planning.
 */

import type { PlacedFace, Point2D, Strip } from '../types';
import type { AdjacencyGraph } from '../AdjacencyGraph';
import type { HamiltonianFailureReason } from '../errors';
import { DegenerateEdgeError } from '../errors';
import { seedPlacement, unfoldFace } from '../unfoldTransform';
import { OverlapChecker } from '../validators/OverlapChecker';
import { convexHull, extentAlong, minimumWidth, signedArea, WIDTH_TOLERANCE } from '../../utils/ribbonMetrics';
import { debug } from '../../utils/debug';

// =============================================================================
// Types
// =============================================================================

/**
 * What a ranking policy sees about a partial ribbon.
 */
export interface RankedStateInfo {
  /** Current ribbon width (mm) */
  width: number;
  tapeWidth: number;
  /** Area of the ribbon's convex hull (mm²) */
  hullArea: number;
  /** Hull extent along the tape direction (mm) */
  length: number;
  /** Unvisited neighbours of the path's last face */
  onwardDegree: number;
  /** Faces placed so far */
  depth: number;
}

/** Lower scores rank first */
export type RankingPolicy = (info: RankedStateInfo) => number;

export interface HamiltonianPlannerOptions {
  tapeWidth: number;
  /** States kept per depth on the first pass (default 24) */
  beamWidth?: number;
  /** Wall-clock budget in seconds (default 2.0) */
  timeoutSeconds?: number;
  /** Millisecond clock; defaults to performance.now */
  clock?: () => number;
  rank?: RankingPolicy;
  overlapChecker?: OverlapChecker;
}

export interface RibbonSearchStats {
  /** States taken off the frontier and expanded */
  expansions: number;
  /** Child states that passed every check */
  statesGenerated: number;
  /** Longest partial path held in the frontier */
  depthReached: number;
  /** Beam passes run; each after the first doubles the beam */
  passes: number;
  elapsedMs: number;
}

export type RibbonSearchResult =
  | { ok: true; strip: Strip; stats: RibbonSearchStats }
  | {
      ok: false;
      reason: HamiltonianFailureReason;
      stats: RibbonSearchStats;
      details: Record<string, unknown>;
    };

type PassOutcome = { done: true; result: RibbonSearchResult } | { done: false; truncated: boolean; beam: number };

interface RibbonState {
  path: number[];
  placed: PlacedFace[];
  visited: Set<number>;
  hull: Point2D[];
  width: number;
  score: number;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_BEAM_WIDTH = 24;
export const DEFAULT_TIMEOUT_SECONDS = 2.0;

/** Widths closer than this are treated as equal when merging states (mm) */
const WIDTH_EPSILON = 1e-9;

/**
 * Default policy: normalised width plus compactness. Early partial ribbons
 * often tie on width; hull area over length squared then favours ribbons
 * that run along the tape over fans that bunch up and dead-end.
 */
export const defaultRanking: RankingPolicy = ({ width, tapeWidth, hullArea, length }) =>
  width / tapeWidth + (length > 0 ? hullArea / (length * length) : 0);

// =============================================================================
// Helpers
// =============================================================================

function onwardDegree(graph: AdjacencyGraph, faceId: number, visited: Set<number>): number {
  return graph.neighbors(faceId).filter((id) => !visited.has(id)).length;
}

/**
 * True when every unvisited face can still be reached from the path end
 * through unvisited faces only.
 */
function remainingConnected(graph: AdjacencyGraph, end: number, visited: Set<number>): boolean {
  const remaining = graph.faceCount - visited.size;
  if (remaining === 0) return true;

  const seen = new Set<number>();
  const queue = graph.neighbors(end).filter((id) => !visited.has(id));
  queue.forEach((id) => seen.add(id));

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    for (const nb of graph.neighbors(id)) {
      if (!visited.has(nb) && !seen.has(nb)) {
        seen.add(nb);
        queue.push(nb);
      }
    }
  }

  return seen.size === remaining;
}

function rankState(
  rank: RankingPolicy,
  graph: AdjacencyGraph,
  state: Omit<RibbonState, 'score'>,
  tapeWidth: number
): number {
  const end = state.path[state.path.length - 1];
  const { angle } = minimumWidth(state.hull);
  return rank({
    width: state.width,
    tapeWidth,
    hullArea: Math.abs(signedArea(state.hull)),
    length: extentAlong(state.hull, angle),
    onwardDegree: onwardDegree(graph, end, state.visited),
    depth: state.path.length,
  });
}

/** Narrower ribbon wins a merge; equal widths fall back to the ranking */
const supersedes = (child: RibbonState, existing: RibbonState): boolean =>
  child.width < existing.width - WIDTH_EPSILON ||
  (Math.abs(child.width - existing.width) <= WIDTH_EPSILON && child.score < existing.score);

const stateKey = (state: { visited: Set<number>; path: number[] }): string =>
  `${[...state.visited].sort((a, b) => a - b).join(',')}>${state.path[state.path.length - 1]}`;

// =============================================================================
// Planner
// =============================================================================

export function findHamiltonianRibbon(
  graph: AdjacencyGraph,
  options: HamiltonianPlannerOptions
): RibbonSearchResult {
  const { tapeWidth } = options;
  const beamWidth = Math.max(1, Math.floor(options.beamWidth ?? DEFAULT_BEAM_WIDTH));
  const timeoutMs = Math.max(0, (options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000);
  const clock = options.clock ?? (() => performance.now());
  const rank = options.rank ?? defaultRanking;
  const checker = options.overlapChecker ?? new OverlapChecker();
  const limit = tapeWidth + WIDTH_TOLERANCE;
  const faceCount = graph.faceCount;

  const start = clock();
  const stats: RibbonSearchStats = { expansions: 0, statesGenerated: 0, depthReached: 0, passes: 0, elapsedMs: 0 };

  const fail = (reason: HamiltonianFailureReason, details: Record<string, unknown> = {}): RibbonSearchResult => {
    stats.elapsedMs = clock() - start;
    debug('hamiltonian', `Search failed (${reason}) after ${stats.expansions} expansions, depth ${stats.depthReached}/${faceCount}`);
    return { ok: false, reason, stats, details };
  };

  const succeed = (state: RibbonState): RibbonSearchResult => {
    stats.elapsedMs = clock() - start;
    stats.depthReached = faceCount;
    debug('hamiltonian', `Ribbon found: [${state.path.join(' → ')}], width ${state.width.toFixed(3)}mm`);
    return { ok: true, strip: { id: 0, faces: state.placed, width: state.width }, stats };
  };

  // A face wider than the tape rules out any single ribbon
  for (const face of graph.faces) {
    const { width } = minimumWidth(face.outline);
    if (width > limit) {
      return fail('face-exceeds-width', { faceId: face.id, faceWidth: width, tapeWidth });
    }
  }

  // Every face is a possible start
  const seeds: RibbonState[] = graph.faces.map((face) => {
    const seed = seedPlacement(face);
    const state = {
      path: [face.id],
      placed: [seed],
      visited: new Set([face.id]),
      hull: convexHull(seed.points),
      width: minimumWidth(seed.points).width,
    };
    return { ...state, score: rankState(rank, graph, state, tapeWidth) };
  });
  seeds.sort((a, b) => a.score - b.score);

  const runPass = (beam: number): PassOutcome => {
    stats.passes++;
    let truncated = seeds.length > beam;
    let frontier = seeds.slice(0, beam);
    stats.depthReached = Math.max(stats.depthReached, 1);

    if (faceCount === 1) {
      return { done: true, result: succeed(frontier[0]) };
    }

    while (frontier.length > 0) {
      const next = new Map<string, RibbonState>();

      for (const state of frontier) {
        if (clock() - start >= timeoutMs) {
          return { done: true, result: fail('deadline-exceeded', { timeoutSeconds: timeoutMs / 1000, beamWidth: beam }) };
        }
        stats.expansions++;

        const endId = state.path[state.path.length - 1];
        const end = state.placed[state.placed.length - 1];

        for (const edge of graph.incidentEdges(endId)) {
          const nb = graph.otherFace(edge, endId);
          if (state.visited.has(nb)) continue;

          let candidate: PlacedFace;
          try {
            candidate = unfoldFace(graph, end, edge);
          } catch (e) {
            if (!(e instanceof DegenerateEdgeError)) throw e;
            debug('hamiltonian', `Pruned ${endId} → ${nb}: ${e.message}`);
            continue;
          }

          if (checker.query(state.placed, candidate).overlap) continue;

          const hull = convexHull([...state.hull, ...candidate.points]);
          const width = minimumWidth(hull).width;
          if (width > limit) continue;

          const visited = new Set(state.visited);
          visited.add(nb);
          const grown = { path: [...state.path, nb], placed: [...state.placed, candidate], visited, hull, width };

          if (grown.path.length === faceCount) {
            return { done: true, result: succeed({ ...grown, score: 0 }) };
          }
          if (!remainingConnected(graph, nb, visited)) continue;

          const child: RibbonState = { ...grown, score: rankState(rank, graph, grown, tapeWidth) };
          stats.statesGenerated++;

          const key = stateKey(child);
          const existing = next.get(key);
          if (!existing || supersedes(child, existing)) {
            next.set(key, child);
          }
        }
      }

      const ranked = [...next.values()].sort((a, b) => a.score - b.score);
      if (ranked.length > beam) truncated = true;
      frontier = ranked.slice(0, beam);
      if (frontier.length > 0) {
        stats.depthReached = Math.max(stats.depthReached, frontier[0].path.length);
        debug('hamiltonian', `Depth ${frontier[0].path.length}: ${next.size} states, kept ${frontier.length}`);
      }
    }

    return { done: false, truncated, beam };
  };

  let beam = beamWidth;
  for (;;) {
    const outcome = runPass(beam);
    if (outcome.done) return outcome.result;
    if (!outcome.truncated) {
      return fail('beam-exhausted', { beamWidth: outcome.beam, passes: stats.passes });
    }
    debug('hamiltonian', `Beam ${beam} ran dry after truncating; widening to ${beam * 2}`);
    beam *= 2;
  }
}
