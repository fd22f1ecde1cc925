/**
 * STL loading - triangle soup to planar convex faces
 *
 * three.js parses ASCII or binary STL into a flat triangle list. From there
 * (shared with the OBJ loader):
 * 1. Weld vertices by quantised key and scale to millimetres
 * 2. Drop degenerate and duplicate triangles
 * 3. Merge edge-connected coplanar triangles into facets (union-find)
 * 4. Walk each facet's boundary into one ordered loop
 * 5. Drop collinear boundary vertices and orient every loop outward
 */

import { readFileSync } from 'node:fs';
import { Vector3 } from 'three';
import { STLLoader } from 'three/examples/jsm/loaders/STLLoader.js';
import type { MeshFace, Point3D } from '../engine/types';
import { MalformedMeshError } from '../engine/errors';
import { vertexKey } from '../engine/AdjacencyGraph';
import { debug } from '../utils/debug';

export type MeshUnit = 'mm' | 'inch';

export interface MeshLoadOptions {
  /** Unit the file was authored in; output is always millimetres */
  unit?: MeshUnit;
}

export const MM_PER_INCH = 25.4;

// Triangles whose unit normals differ by less than this are coplanar
const COPLANAR_DOT = 1 - 1e-6;
// Plane offsets closer than this are the same plane (mm)
const PLANE_OFFSET_TOLERANCE = 1e-4;
const MIN_TRIANGLE_AREA = 1e-12;
// |sin| of the turn angle below which a boundary vertex is collinear
const COLLINEAR_SINE = 1e-9;

interface Triangle {
  v: [number, number, number];
  normal: Vector3;
  /** Cross product of two edges: twice the area, along the winding normal */
  weighted: Vector3;
  offset: number;
}

// =============================================================================
// Union-find
// =============================================================================

class DisjointSet {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    // Path compression
    while (this.parent[i] !== root) {
      const next = this.parent[i];
      this.parent[i] = root;
      i = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    // Smaller root wins so grouping is independent of union order
    if (ra < rb) this.parent[rb] = ra;
    else this.parent[ra] = rb;
  }
}

// =============================================================================
// Steps
// =============================================================================

function weldTriangles(positions: Vector3[]): { vertices: Vector3[]; triangles: Triangle[] } {
  const vertices: Vector3[] = [];
  const indexByKey = new Map<string, number>();
  const weld = (p: Vector3): number => {
    const key = vertexKey(p);
    const existing = indexByKey.get(key);
    if (existing !== undefined) return existing;
    indexByKey.set(key, vertices.length);
    vertices.push(p);
    return vertices.length - 1;
  };

  const triangles: Triangle[] = [];
  const seen = new Set<string>();
  let dropped = 0;

  for (let i = 0; i + 2 < positions.length; i += 3) {
    const v: [number, number, number] = [weld(positions[i]), weld(positions[i + 1]), weld(positions[i + 2])];
    const [a, b, c] = v.map((index) => vertices[index]);
    const weighted = new Vector3().subVectors(b, a).cross(new Vector3().subVectors(c, a));
    const duplicateKey = [...v].sort((x, y) => x - y).join(',');

    if (v[0] === v[1] || v[1] === v[2] || v[0] === v[2] || weighted.length() / 2 < MIN_TRIANGLE_AREA || seen.has(duplicateKey)) {
      dropped++;
      continue;
    }
    seen.add(duplicateKey);

    const normal = weighted.clone().normalize();
    triangles.push({ v, normal, weighted, offset: normal.dot(a) });
  }

  if (dropped > 0) {
    debug('mesh', `Dropped ${dropped} degenerate or duplicate triangle(s)`);
  }
  return { vertices, triangles };
}

function groupCoplanar(triangles: Triangle[]): number[][] {
  const sets = new DisjointSet(triangles.length);
  const byEdge = new Map<string, number[]>();

  triangles.forEach((tri, t) => {
    for (let k = 0; k < 3; k++) {
      const a = tri.v[k];
      const b = tri.v[(k + 1) % 3];
      const key = a < b ? `${a}-${b}` : `${b}-${a}`;
      const list = byEdge.get(key);
      if (list) list.push(t);
      else byEdge.set(key, [t]);
    }
  });

  for (const list of byEdge.values()) {
    if (list.length !== 2) continue;
    const [s, t] = list;
    const a = triangles[s];
    const b = triangles[t];
    if (a.normal.dot(b.normal) > COPLANAR_DOT && Math.abs(a.offset - b.offset) < PLANE_OFFSET_TOLERANCE) {
      sets.union(s, t);
    }
  }

  const groups = new Map<number, number[]>();
  triangles.forEach((_, t) => {
    const root = sets.find(t);
    const group = groups.get(root);
    if (group) group.push(t);
    else groups.set(root, [t]);
  });

  // Roots are the smallest member, so facets come out in first-triangle order
  return [...groups.values()];
}

/**
 * Directed edges with no reverse twin inside the facet form its boundary.
 * They must chain into exactly one closed loop.
 */
function boundaryLoop(triangles: Triangle[], group: number[], facetIndex: number): number[] {
  const directed = new Set<string>();
  for (const t of group) {
    const { v } = triangles[t];
    for (let k = 0; k < 3; k++) directed.add(`${v[k]}>${v[(k + 1) % 3]}`);
  }

  const next = new Map<number, number>();
  for (const t of group) {
    const { v } = triangles[t];
    for (let k = 0; k < 3; k++) {
      const a = v[k];
      const b = v[(k + 1) % 3];
      if (directed.has(`${b}>${a}`)) continue;
      if (next.has(a)) {
        throw new MalformedMeshError(
          `Facet ${facetIndex} has a non-manifold boundary at vertex ${a}`,
          { facetIndex, vertex: a },
          'mesh'
        );
      }
      next.set(a, b);
    }
  }

  if (next.size < 3) {
    throw new MalformedMeshError(`Facet ${facetIndex} has no closed boundary`, { facetIndex }, 'mesh');
  }

  const start = Math.min(...next.keys());
  const loop = [start];
  let current = next.get(start);
  while (current !== undefined && current !== start) {
    if (loop.length > next.size) break;
    loop.push(current);
    current = next.get(current);
  }

  if (current !== start || loop.length !== next.size) {
    throw new MalformedMeshError(
      `Facet ${facetIndex} boundary is not a single closed loop (holes or pinched vertices)`,
      { facetIndex, loopLength: loop.length, boundaryEdges: next.size },
      'mesh'
    );
  }
  return loop;
}

function dropCollinear(loop: Vector3[]): Vector3[] {
  const result = [...loop];
  let changed = true;
  while (changed && result.length > 3) {
    changed = false;
    for (let i = 0; i < result.length; i++) {
      const prev = result[(i + result.length - 1) % result.length];
      const cur = result[i];
      const nxt = result[(i + 1) % result.length];
      const e1 = new Vector3().subVectors(cur, prev);
      const e2 = new Vector3().subVectors(nxt, cur);
      const scale = e1.length() * e2.length();
      if (scale === 0 || new Vector3().crossVectors(e1, e2).length() / scale < COLLINEAR_SINE) {
        result.splice(i, 1);
        changed = true;
        break;
      }
    }
  }
  return result;
}

const toPoint = (v: Vector3): Point3D => ({ x: v.x, y: v.y, z: v.z });

// =============================================================================
// Public API
// =============================================================================

/**
 * Turn a flat triangle list (three consecutive positions per triangle, already
 * in millimetres) into outward planar faces.
 *
 * @throws MalformedMeshError (stage 'mesh') for empty meshes or facets whose
 *   boundary is not a single loop
 */
export function facesFromTriangleSoup(positions: Vector3[], format: string): MeshFace[] {
  const { vertices, triangles } = weldTriangles(positions);
  if (triangles.length === 0) {
    throw new MalformedMeshError(`${format} contains no usable triangles`, { triangles: Math.floor(positions.length / 3) }, 'mesh');
  }

  const meshCentroid = new Vector3();
  vertices.forEach((v) => meshCentroid.add(v));
  meshCentroid.divideScalar(vertices.length);

  const faces = groupCoplanar(triangles).map((group, facetIndex): MeshFace => {
    const normal = new Vector3();
    group.forEach((t) => normal.add(triangles[t].weighted));
    normal.normalize();

    let loop = dropCollinear(boundaryLoop(triangles, group, facetIndex).map((i) => vertices[i]));

    const facetCentroid = new Vector3();
    loop.forEach((v) => facetCentroid.add(v));
    facetCentroid.divideScalar(loop.length);

    // Loop follows triangle winding; flip the facet if that points inward
    if (normal.dot(new Vector3().subVectors(facetCentroid, meshCentroid)) < 0) {
      loop = [...loop].reverse();
      normal.negate();
    }

    return { vertices: loop.map(toPoint), normal: toPoint(normal) };
  });

  debug('mesh', `Loaded ${format}: ${triangles.length} triangles (${vertices.length} vertices) as ${faces.length} facets`);
  return faces;
}

export const unitScale = (unit: MeshUnit | undefined): number => (unit === 'inch' ? MM_PER_INCH : 1);

/**
 * Parse STL data (ASCII text or binary) into planar faces in millimetres.
 */
export function loadStl(data: ArrayBuffer | string, options: MeshLoadOptions = {}): MeshFace[] {
  const scale = unitScale(options.unit);
  const geometry = new STLLoader().parse(data);
  const position = geometry.getAttribute('position');

  const positions: Vector3[] = [];
  for (let i = 0; i < position.count; i++) {
    positions.push(new Vector3(position.getX(i), position.getY(i), position.getZ(i)).multiplyScalar(scale));
  }
  geometry.dispose();

  return facesFromTriangleSoup(positions, 'STL');
}

/**
 * Read and parse an STL file from disk.
 */
export function readStlFile(path: string, options: MeshLoadOptions = {}): MeshFace[] {
  const bytes = readFileSync(path);
  const data = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(data).set(bytes);
  return loadStl(data, options);
}
