/**
 * Hamiltonian ribbon planner tests
 *
 * A fixed clock keeps the search deterministic; the deadline tests drive the
 * clock forward by hand.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { AdjacencyGraph } from '../../../src/engine/AdjacencyGraph';
import {
  findHamiltonianRibbon,
  defaultRanking,
} from '../../../src/engine/planners/HamiltonianRibbonPlanner';
import type { RankedStateInfo } from '../../../src/engine/planners/HamiltonianRibbonPlanner';
import { cube, octahedron, prism, tetrahedron } from '../../../src/builder/polyhedra';
import { expectHamiltonianStrip, expectNoOverlap, expectWithinTape } from '../../fixtures/assertions';
import { splitApexPyramid } from '../../fixtures/meshes';
import { clearDebug, getDebugLines, setDebugTags } from '../../../src/utils/debug';

const frozenClock = (): number => 0;

/** Clock that advances 10ms every time it is read */
function steppingClock(): () => number {
  let now = 0;
  return () => {
    const value = now;
    now += 10;
    return value;
  };
}

describe('findHamiltonianRibbon', () => {
  describe('Cube on tape three faces wide', () => {
    const graph = AdjacencyGraph.fromFaces(cube(10));
    const result = findHamiltonianRibbon(graph, { tapeWidth: 30, clock: frozenClock });

    it('finds a single ribbon', () => {
      expect(result.ok).toBe(true);
    });

    it('visits every face once, each hinged to its predecessor', () => {
      if (!result.ok) throw new Error(`search failed: ${result.reason}`);
      expect(result.strip.faces).toHaveLength(6);
      expectHamiltonianStrip(graph, result.strip);
      expectNoOverlap(result.strip);
      expectWithinTape([result.strip], 30);
    });

    it('reports search statistics', () => {
      if (!result.ok) throw new Error(`search failed: ${result.reason}`);
      expect(result.stats.depthReached).toBe(6);
      expect(result.stats.expansions).toBeGreaterThan(0);
      expect(result.stats.elapsedMs).toBe(0);
    });
  });

  describe('Other solids', () => {
    it('threads a tetrahedron on generous tape', () => {
      const graph = AdjacencyGraph.fromFaces(tetrahedron(10));
      const result = findHamiltonianRibbon(graph, { tapeWidth: 100, clock: frozenClock });
      if (!result.ok) throw new Error(`search failed: ${result.reason}`);
      expectHamiltonianStrip(graph, result.strip);
      expectNoOverlap(result.strip);
    });
  });

  describe('Default beam and timeout', () => {
    it('threads an octahedron on 18mm tape', () => {
      const graph = AdjacencyGraph.fromFaces(octahedron(10));
      const result = findHamiltonianRibbon(graph, { tapeWidth: 18 });
      if (!result.ok) throw new Error(`search failed: ${result.reason}`);
      expectHamiltonianStrip(graph, result.strip);
      expectNoOverlap(result.strip);
      expectWithinTape([result.strip], 18);
    });

    it('threads a hexagonal prism on 24mm tape', () => {
      const graph = AdjacencyGraph.fromFaces(prism(6, 10, 5));
      const result = findHamiltonianRibbon(graph, { tapeWidth: 24 });
      if (!result.ok) throw new Error(`search failed: ${result.reason}`);
      expectHamiltonianStrip(graph, result.strip);
      expectNoOverlap(result.strip);
      expectWithinTape([result.strip], 24);
    });
  });

  describe('Hinge too short to unfold', () => {
    afterEach(() => {
      setDebugTags([]);
      clearDebug();
    });

    it('prunes the move across it and threads the other faces', () => {
      setDebugTags(['hamiltonian']);
      const graph = AdjacencyGraph.fromFaces(splitApexPyramid());
      const result = findHamiltonianRibbon(graph, { tapeWidth: 100, clock: frozenClock });

      if (!result.ok) throw new Error(`search failed: ${result.reason}`);
      expectHamiltonianStrip(graph, result.strip);
      expectNoOverlap(result.strip);
      expect(getDebugLines().some((l) => l.endsWith('[hamiltonian] Pruned 0 → 1: Hinge between faces 0 and 1 has zero length'))).toBe(true);
    });
  });

  describe('Infeasible inputs', () => {
    it('reports face-exceeds-width when a face is wider than the tape', () => {
      const graph = AdjacencyGraph.fromFaces(cube(20));
      const result = findHamiltonianRibbon(graph, { tapeWidth: 10, clock: frozenClock });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('face-exceeds-width');
      expect(result.details.faceId).toBe(0);
      expect(result.stats.expansions).toBe(0);
    });

    it('exhausts the beam when every ribbon must turn a corner', () => {
      // Any turn makes an L of three 20mm squares, 40mm wide
      const graph = AdjacencyGraph.fromFaces(cube(20));
      const result = findHamiltonianRibbon(graph, { tapeWidth: 25, clock: frozenClock });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('beam-exhausted');
      expect(result.stats.depthReached).toBe(4);
      expect(result.stats.passes).toBe(1);
    });

    it('doubles a truncating beam until a pass keeps every state', () => {
      // 24 two-face states need a beam of 32: passes at 1, 2, 4, 8, 16 and 32
      const graph = AdjacencyGraph.fromFaces(cube(20));
      const result = findHamiltonianRibbon(graph, { tapeWidth: 25, beamWidth: 1, clock: frozenClock });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('beam-exhausted');
      expect(result.stats.passes).toBe(6);
      expect(result.stats.depthReached).toBe(4);
      expect(result.details).toEqual({ beamWidth: 32, passes: 6 });
    });
  });

  describe('Deadline', () => {
    const graph = AdjacencyGraph.fromFaces(cube(10));

    it('fails before expanding anything with a zero timeout', () => {
      const result = findHamiltonianRibbon(graph, { tapeWidth: 30, timeoutSeconds: 0, clock: frozenClock });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('deadline-exceeded');
      expect(result.stats.expansions).toBe(0);
    });

    it('stops at the first state checked past the deadline', () => {
      // Start reads 0; checks read 10, 20, 30, 40 and then 50 ≥ 50ms
      const result = findHamiltonianRibbon(graph, {
        tapeWidth: 30,
        timeoutSeconds: 0.05,
        clock: steppingClock(),
      });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('deadline-exceeded');
      expect(result.stats.expansions).toBe(4);
      expect(result.stats.elapsedMs).toBe(60);
    });
  });

  describe('Ranking', () => {
    it('prefers narrow ribbons, then elongated ones', () => {
      const base: RankedStateInfo = { width: 10, tapeWidth: 20, hullArea: 200, length: 20, onwardDegree: 1, depth: 2 };
      expect(defaultRanking(base)).toBeCloseTo(1, 12);
      expect(defaultRanking({ ...base, width: 15 })).toBeGreaterThan(defaultRanking(base));
      expect(defaultRanking({ ...base, hullArea: 400, length: 40 })).toBeCloseTo(0.75, 12);
      expect(defaultRanking({ ...base, onwardDegree: 3 })).toBe(defaultRanking(base));
    });

    it('uses a custom policy when given', () => {
      const seen: RankedStateInfo[] = [];
      const graph = AdjacencyGraph.fromFaces(tetrahedron(10));
      const result = findHamiltonianRibbon(graph, {
        tapeWidth: 100,
        clock: frozenClock,
        rank: (info) => {
          seen.push(info);
          return info.width;
        },
      });

      expect(result.ok).toBe(true);
      expect(seen.length).toBeGreaterThanOrEqual(4);
      expect(seen.slice(0, 4).every((info) => info.depth === 1)).toBe(true);
    });

    it('still succeeds with a beam of one on the tetrahedron', () => {
      const graph = AdjacencyGraph.fromFaces(tetrahedron(10));
      const result = findHamiltonianRibbon(graph, { tapeWidth: 100, beamWidth: 1, clock: frozenClock });
      expect(result.ok).toBe(true);
    });
  });
});
