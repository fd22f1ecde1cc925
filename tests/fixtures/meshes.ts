/**
 * Hand-built meshes and placements shared by the tests.
 */

import type { MeshFace, PlacedFace, Point2D, Strip } from '../../src/engine/types';
import { cube } from '../../src/builder/polyhedra';

export function square(x: number, y: number, size: number): Point2D[] {
  return [
    { x, y },
    { x: x + size, y },
    { x: x + size, y: y + size },
    { x, y: y + size },
  ];
}

export function placed(faceId: number, points: Point2D[]): PlacedFace {
  return { faceId, points, attachEdgeId: null, parentFaceId: null, mirrored: false };
}

export function stripOf(id: number, faces: PlacedFace[], width: number): Strip {
  return { id, faces, width };
}

/**
 * Cube missing its top face: the rim edges border only one face.
 */
export function openBox(side: number): MeshFace[] {
  return cube(side).filter((_, i) => i !== 1);
}

/**
 * Two squares glued back to back: every edge has two faces, but the pair
 * shares four edges.
 */
export function pillow(side: number): MeshFace[] {
  const front = [
    { x: 0, y: 0, z: 0 },
    { x: side, y: 0, z: 0 },
    { x: side, y: side, z: 0 },
    { x: 0, y: side, z: 0 },
  ];
  return [{ vertices: front }, { vertices: [...front].reverse() }];
}

/**
 * Cube with one face wound the wrong way round (front, id 2).
 */
export function cubeWithFlippedFace(side: number): MeshFace[] {
  return cube(side).map((face, i) => (i === 2 ? { vertices: [...face.vertices].reverse() } : face));
}

/**
 * Square pyramid whose apex is split in two points 1e-12 mm apart, either
 * side of a weld grid line. The split makes a hinge too short to unfold
 * across, between the front (0) and back (1) faces.
 * Face order: front, back, base, left, right.
 */
export function splitApexPyramid(): MeshFace[] {
  const b0 = { x: -5, y: -5, z: 0 };
  const b1 = { x: 5, y: -5, z: 0 };
  const b2 = { x: 5, y: 5, z: 0 };
  const b3 = { x: -5, y: 5, z: 0 };
  const p = { x: 5e-7 - 5e-13, y: 0, z: 10 };
  const q = { x: 5e-7 + 5e-13, y: 0, z: 10 };
  return [
    { vertices: [b0, b1, q, p] },
    { vertices: [b2, b3, p, q] },
    { vertices: [b0, b3, b2, b1] },
    { vertices: [b3, b0, p] },
    { vertices: [b1, b2, q] },
  ];
}
