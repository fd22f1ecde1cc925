/**
 * Unfold transform tests: hinging a face flat against a placed neighbour
 */

import { describe, it, expect } from 'vitest';
import { AdjacencyGraph } from '../../../src/engine/AdjacencyGraph';
import {
  applyTransform,
  computeUnfoldTransform,
  IDENTITY_TRANSFORM,
  seedPlacement,
  unfoldFace,
} from '../../../src/engine/unfoldTransform';
import { DegenerateEdgeError } from '../../../src/engine/errors';
import type { AdjacencyEdge } from '../../../src/engine/types';
import { cube } from '../../../src/builder/polyhedra';
import { computeBounds } from '../../../src/utils/ribbonMetrics';
import { computePolygonArea } from '../../../src/utils/polygonBoolean';
import { checkOverlap } from '../../../src/engine/validators/OverlapChecker';
import { expectBoundsEqual } from '../../fixtures/assertions';
import { cubeWithFlippedFace, placed } from '../../fixtures/meshes';

function edge(graph: AdjacencyGraph, a: number, b: number): AdjacencyEdge {
  const found = graph.edgeBetween(a, b);
  if (!found) throw new Error(`No edge between ${a} and ${b}`);
  return found;
}

describe('unfoldTransform', () => {
  const graph = AdjacencyGraph.fromFaces(cube(10));
  const bottom = seedPlacement(graph.getFace(0));

  it('seeds a strip with the face outline', () => {
    expect(bottom.points).toEqual(graph.getFace(0).outline);
    expect(bottom.points).not.toBe(graph.getFace(0).outline);
    expect(bottom.parentFaceId).toBeNull();
    expect(bottom.attachEdgeId).toBeNull();
  });

  it('lays the front face on the far side of the shared edge', () => {
    const front = unfoldFace(graph, bottom, edge(graph, 0, 2));

    expect(front.faceId).toBe(2);
    expect(front.parentFaceId).toBe(0);
    expect(front.attachEdgeId).toBe(edge(graph, 0, 2).id);
    expect(front.mirrored).toBe(false);
    expectBoundsEqual(computeBounds(front.points), { minX: -10, minY: 0, maxX: 0, maxY: 10 });
  });

  it('snaps hinge endpoints to the placed coordinates exactly', () => {
    const front = unfoldFace(graph, bottom, edge(graph, 0, 2));
    expect(front.points).toContainEqual(bottom.points[0]);
    expect(front.points).toContainEqual(bottom.points[3]);
  });

  it('produces a rigid, orientation-preserving map', () => {
    const t = computeUnfoldTransform(graph, bottom, edge(graph, 0, 2));
    expect(t.a * t.d - t.b * t.c).toBeCloseTo(1, 12);
    expect(t.a * t.a + t.b * t.b).toBeCloseTo(1, 12);
    expect(t.mirrored).toBe(false);
  });

  it('preserves face area and does not overlap the parent', () => {
    const back = unfoldFace(graph, bottom, edge(graph, 0, 3));
    expect(computePolygonArea(back.points)).toBeCloseTo(100, 9);
    expect(checkOverlap({ id: 0, faces: [bottom, back], width: 10 }).valid).toBe(true);
  });

  it('chains across several hinges', () => {
    const front = unfoldFace(graph, bottom, edge(graph, 0, 2));
    const top = unfoldFace(graph, front, edge(graph, 2, 1));
    expectBoundsEqual(computeBounds(top.points), { minX: -20, minY: 0, maxX: -10, maxY: 10 });
  });

  it('unfolds a face given the wrong way round like its outward twin', () => {
    const flipped = AdjacencyGraph.fromFaces(cubeWithFlippedFace(10));
    const seed = seedPlacement(flipped.getFace(0));
    const front = unfoldFace(flipped, seed, edge(flipped, 0, 2));

    expect(front.mirrored).toBe(false);
    expectBoundsEqual(computeBounds(front.points), { minX: -10, minY: 0, maxX: 0, maxY: 10 });
  });

  it('reflects across the hinge when the parent lies mirror-image', () => {
    const mirroredBottom = placed(0, bottom.points.map((p) => ({ x: p.x, y: -p.y })));
    const t = computeUnfoldTransform(graph, mirroredBottom, edge(graph, 0, 2));
    expect(t.mirrored).toBe(true);
    expect(t.a * t.d - t.b * t.c).toBeCloseTo(-1, 12);

    const front = unfoldFace(graph, mirroredBottom, edge(graph, 0, 2));
    expect(front.mirrored).toBe(true);
    expectBoundsEqual(computeBounds(front.points), { minX: -10, minY: -10, maxX: 0, maxY: 0 });
  });

  it('throws DegenerateEdgeError for a collapsed hinge', () => {
    const collapsed = placed(0, bottom.points.map(() => ({ x: 3, y: 3 })));
    expect(() => unfoldFace(graph, collapsed, edge(graph, 0, 2))).toThrow(DegenerateEdgeError);
  });

  it('rejects an edge that does not touch the placed face', () => {
    expect(() => computeUnfoldTransform(graph, bottom, edge(graph, 1, 2))).toThrow(/does not touch face 0/);
  });

  it('applies the identity transform', () => {
    expect(applyTransform(IDENTITY_TRANSFORM, { x: 3, y: -2 })).toEqual({ x: 3, y: -2 });
  });
});
