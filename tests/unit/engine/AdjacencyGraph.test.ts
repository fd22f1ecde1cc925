/**
 * AdjacencyGraph Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { AdjacencyGraph, vertexKey } from '../../../src/engine/AdjacencyGraph';
import { MalformedMeshError } from '../../../src/engine/errors';
import { cube, octahedron, prism, tetrahedron } from '../../../src/builder/polyhedra';
import { cubeWithFlippedFace, openBox, pillow } from '../../fixtures/meshes';

function expectMalformed(build: () => unknown): MalformedMeshError {
  try {
    build();
  } catch (e) {
    expect(e).toBeInstanceOf(MalformedMeshError);
    if (e instanceof MalformedMeshError) return e;
  }
  throw new Error('Expected MalformedMeshError');
}

describe('AdjacencyGraph', () => {
  describe('Cube', () => {
    const graph = AdjacencyGraph.fromFaces(cube(10));

    it('has six faces and twelve edges', () => {
      expect(graph.faceCount).toBe(6);
      expect(graph.edges).toHaveLength(12);
    });

    it('gives every face four neighbours', () => {
      for (const face of graph.faces) {
        expect(graph.degree(face.id)).toBe(4);
      }
    });

    it('connects the bottom to the four sides but not the top', () => {
      expect(graph.neighbors(0)).toEqual([2, 3, 4, 5]);
      expect(graph.edgeBetween(0, 1)).toBeUndefined();
      expect(graph.edgeBetween(0, 2)).toBeDefined();
      expect(graph.edgeBetween(2, 0)).toBe(graph.edgeBetween(0, 2));
    });

    it('records right-angle folds and edge lengths', () => {
      for (const edge of graph.edges) {
        expect(edge.dihedralAngle).toBeCloseTo(Math.PI / 2, 9);
        expect(edge.length).toBeCloseTo(10, 9);
        expect(edge.faceA).toBeLessThan(edge.faceB);
      }
    });

    it('expresses each face in its own plane frame', () => {
      const bottom = graph.getFace(0);
      const expected = [
        { x: 0, y: 0 },
        { x: 10, y: 0 },
        { x: 10, y: 10 },
        { x: 0, y: 10 },
      ];
      bottom.outline.forEach((p, i) => {
        expect(p.x).toBeCloseTo(expected[i].x, 9);
        expect(p.y).toBeCloseTo(expected[i].y, 9);
      });
      expect(bottom.normal.z).toBeCloseTo(-1, 9);
      expect(bottom.area).toBeCloseTo(100, 9);
    });

    it('every edge borders exactly two faces', () => {
      const counts = new Map<number, number>();
      for (const edge of graph.edges) {
        counts.set(edge.faceA, (counts.get(edge.faceA) ?? 0) + 1);
        counts.set(edge.faceB, (counts.get(edge.faceB) ?? 0) + 1);
      }
      expect([...counts.values()].reduce((a, b) => a + b, 0)).toBe(24);
    });

    it('throws RangeError for unknown ids', () => {
      expect(() => graph.getFace(6)).toThrow(RangeError);
      expect(() => graph.getEdge(12)).toThrow(RangeError);
    });
  });

  describe('Other solids', () => {
    it('builds the tetrahedron with acute folds', () => {
      const graph = AdjacencyGraph.fromFaces(tetrahedron(10));
      expect(graph.faceCount).toBe(4);
      expect(graph.edges).toHaveLength(6);
      for (const edge of graph.edges) {
        expect(edge.dihedralAngle).toBeCloseTo(Math.acos(1 / 3), 9);
      }
    });

    it('builds the octahedron', () => {
      const graph = AdjacencyGraph.fromFaces(octahedron(10));
      expect(graph.faceCount).toBe(8);
      expect(graph.edges).toHaveLength(12);
      expect(graph.faces.every((f) => graph.degree(f.id) === 3)).toBe(true);
    });

    it('builds a hexagonal prism', () => {
      const graph = AdjacencyGraph.fromFaces(prism(6, 10, 5));
      expect(graph.faceCount).toBe(8);
      expect(graph.edges).toHaveLength(18);
      expect(graph.degree(0)).toBe(6);
      expect(graph.degree(2)).toBe(4);
    });
  });

  describe('Winding', () => {
    it('reverses a cube face wound inward', () => {
      const graph = AdjacencyGraph.fromFaces(cubeWithFlippedFace(10));
      const reference = AdjacencyGraph.fromFaces(cube(10));

      expect(graph.getFace(2).normal.y).toBeCloseTo(-1, 9);
      expect(graph.getFace(2).vertexKeys).toEqual(reference.getFace(2).vertexKeys);
      for (const edge of graph.edges) {
        expect(edge.dihedralAngle).toBeCloseTo(Math.PI / 2, 9);
      }
    });

    it('reverses an octahedron face wound inward', () => {
      const faces = octahedron(10).map((face, i) => (i === 3 ? { vertices: [...face.vertices].reverse() } : face));
      const graph = AdjacencyGraph.fromFaces(faces);

      const face = graph.getFace(3);
      const c = face.vertices.reduce((acc, p) => acc + p.x * face.normal.x + p.y * face.normal.y + p.z * face.normal.z, 0);
      expect(c).toBeGreaterThan(0);
      for (const edge of graph.edges) {
        expect(edge.dihedralAngle).toBeCloseTo(Math.acos(-1 / 3), 9);
      }
    });

    it('follows a supplied outward normal', () => {
      const faces = cube(10).map((face, i) =>
        i === 0 ? { vertices: [...face.vertices].reverse(), normal: { x: 0, y: 0, z: -1 } } : face
      );
      const graph = AdjacencyGraph.fromFaces(faces);
      expect(graph.getFace(0).normal.z).toBeCloseTo(-1, 9);
    });
  });

  describe('Malformed meshes', () => {
    it('rejects an empty mesh', () => {
      expectMalformed(() => AdjacencyGraph.fromFaces([]));
    });

    it('rejects an open box with the rim edge in the details', () => {
      const error = expectMalformed(() => AdjacencyGraph.fromFaces(openBox(10)));
      expect(error.stage).toBe('adjacency');
      expect(error.details.incidentFaces).toHaveLength(1);
      expect(typeof error.details.edgeKey).toBe('string');
    });

    it('rejects a face with fewer than three vertices', () => {
      const faces = cube(10);
      faces[3] = { vertices: faces[3].vertices.slice(0, 2) };
      const error = expectMalformed(() => AdjacencyGraph.fromFaces(faces));
      expect(error.details.faceId).toBe(3);
    });

    it('rejects a zero-area face', () => {
      const error = expectMalformed(() =>
        AdjacencyGraph.fromFaces([
          {
            vertices: [
              { x: 0, y: 0, z: 0 },
              { x: 1, y: 1, z: 1 },
              { x: 2, y: 2, z: 2 },
            ],
          },
        ])
      );
      expect(error.details.faceId).toBe(0);
    });

    it('rejects two faces sharing more than one edge', () => {
      const error = expectMalformed(() => AdjacencyGraph.fromFaces(pillow(10)));
      expect(error.details.faceA).toBe(0);
      expect(error.details.faceB).toBe(1);
    });
  });

  describe('vertexKey', () => {
    it('welds coordinates closer than the grid', () => {
      expect(vertexKey({ x: 1, y: 2, z: 3 })).toBe(vertexKey({ x: 1 + 1e-8, y: 2 - 1e-8, z: 3 }));
      expect(vertexKey({ x: 0, y: 0, z: 0 })).toBe(vertexKey({ x: -0, y: -1e-9, z: 0 }));
    });

    it('keeps distinct vertices apart', () => {
      expect(vertexKey({ x: 1, y: 2, z: 3 })).not.toBe(vertexKey({ x: 1.00001, y: 2, z: 3 }));
    });
  });
});
