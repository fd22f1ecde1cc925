/**
 * Convex polyhedron face lists for sample blanks and tests.
 *
 * Every solid is centred on the origin. Faces are wound counter-clockwise
 * seen from outside, so their Newell normals point outward.
 */

import type { MeshFace, Point3D } from '../engine/types';

/**
 * Build faces from a vertex table and index loops, flipping any loop that
 * winds inward.
 */
export function facesFromIndices(vertices: Point3D[], loops: number[][]): MeshFace[] {
  const center = vertices.reduce(
    (acc, v) => ({ x: acc.x + v.x / vertices.length, y: acc.y + v.y / vertices.length, z: acc.z + v.z / vertices.length }),
    { x: 0, y: 0, z: 0 }
  );

  return loops.map((loop) => {
    const pts = loop.map((i) => ({ ...vertices[i] }));
    const a = pts[0];
    const b = pts[1];
    const c = pts[2];
    // Normal of the first corner; loops are convex
    const nx = (b.y - a.y) * (c.z - a.z) - (b.z - a.z) * (c.y - a.y);
    const ny = (b.z - a.z) * (c.x - a.x) - (b.x - a.x) * (c.z - a.z);
    const nz = (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
    const outward = nx * (a.x - center.x) + ny * (a.y - center.y) + nz * (a.z - center.z);
    return { vertices: outward < 0 ? pts.reverse() : pts };
  });
}

/**
 * Rectangular box.
 * Face order: bottom, top, front (−y), back (+y), left (−x), right (+x).
 */
export function box(width: number, height: number, depth: number): MeshFace[] {
  const vertices: Point3D[] = [];
  // Corner index = i + 2j + 4k for x, y, z sides
  for (let k = 0; k < 2; k++) {
    for (let j = 0; j < 2; j++) {
      for (let i = 0; i < 2; i++) {
        vertices.push({ x: (i - 0.5) * width, y: (j - 0.5) * height, z: (k - 0.5) * depth });
      }
    }
  }
  return facesFromIndices(vertices, [
    [0, 2, 3, 1],
    [4, 5, 7, 6],
    [0, 1, 5, 4],
    [2, 6, 7, 3],
    [0, 4, 6, 2],
    [1, 3, 7, 5],
  ]);
}

export function cube(side: number): MeshFace[] {
  return box(side, side, side);
}

/**
 * Regular tetrahedron with the given edge length (d4).
 */
export function tetrahedron(edge: number): MeshFace[] {
  const s = edge / (2 * Math.SQRT2);
  const vertices: Point3D[] = [
    { x: s, y: s, z: s },
    { x: s, y: -s, z: -s },
    { x: -s, y: s, z: -s },
    { x: -s, y: -s, z: s },
  ];
  return facesFromIndices(vertices, [
    [1, 2, 3],
    [0, 3, 2],
    [0, 1, 3],
    [0, 2, 1],
  ]);
}

/**
 * Regular octahedron with the given edge length (d8).
 */
export function octahedron(edge: number): MeshFace[] {
  const r = edge / Math.SQRT2;
  const vertices: Point3D[] = [
    { x: r, y: 0, z: 0 },
    { x: -r, y: 0, z: 0 },
    { x: 0, y: r, z: 0 },
    { x: 0, y: -r, z: 0 },
    { x: 0, y: 0, z: r },
    { x: 0, y: 0, z: -r },
  ];
  const loops: number[][] = [];
  for (const x of [0, 1]) {
    for (const y of [2, 3]) {
      for (const z of [4, 5]) {
        loops.push([x, y, z]);
      }
    }
  }
  return facesFromIndices(vertices, loops);
}

/**
 * Right prism over a regular polygon.
 * Face order: bottom, top, then the sides counter-clockwise from +x.
 */
export function prism(sides: number, radius: number, height: number): MeshFace[] {
  if (!Number.isInteger(sides) || sides < 3) {
    throw new RangeError(`A prism needs at least 3 sides, got ${sides}`);
  }

  const vertices: Point3D[] = [];
  for (const z of [-height / 2, height / 2]) {
    for (let i = 0; i < sides; i++) {
      const angle = (i / sides) * Math.PI * 2;
      vertices.push({ x: Math.cos(angle) * radius, y: Math.sin(angle) * radius, z });
    }
  }

  const ring = Array.from({ length: sides }, (_, i) => i);
  const loops: number[][] = [ring, ring.map((i) => i + sides)];
  for (let i = 0; i < sides; i++) {
    const j = (i + 1) % sides;
    loops.push([i, j, j + sides, i + sides]);
  }
  return facesFromIndices(vertices, loops);
}
