/**
 * AdjacencyGraph - Face adjacency of a convex polyhedron
 *
 * Nodes are faces (integer ids indexing the face table), edges are the mesh
 * edges shared by exactly two faces. The dual graph of a polyhedron is
 * cyclic, so it is kept as flat tables keyed by id rather than as linked
 * face objects.
 *
 * Vertices are welded by quantised coordinates: two faces share an edge
 * when both endpoints produce the same keys.
 */

import { Vector3 } from 'three';
import type { AdjacencyEdge, Face, MeshFace, Point2D, Point3D } from './types';
import { MalformedMeshError } from './errors';
import { debug } from '../utils/debug';

// =============================================================================
// Constants
// =============================================================================

/** Grid used to weld vertex coordinates into keys (mm) */
export const WELD_PRECISION = 1e-6;

/** Faces with less area than this are degenerate (mm²) */
const MIN_FACE_AREA = 1e-9;

// =============================================================================
// Helpers
// =============================================================================

export function vertexKey(p: Point3D): string {
  const q = (v: number): number => Math.round(v / WELD_PRECISION) + 0;
  return `${q(p.x)},${q(p.y)},${q(p.z)}`;
}

const edgeKeyOf = (ka: string, kb: string): string => (ka < kb ? `${ka}|${kb}` : `${kb}|${ka}`);

const pairKeyOf = (a: number, b: number): string => (a < b ? `${a}-${b}` : `${b}-${a}`);

const toVector = (p: Point3D): Vector3 => new Vector3(p.x, p.y, p.z);

/**
 * Newell's method: area-weighted normal of a planar polygon.
 * Its length is twice the polygon area.
 */
function newellNormal(vertices: Point3D[]): Vector3 {
  const n = new Vector3();
  for (let i = 0; i < vertices.length; i++) {
    const p = vertices[i];
    const q = vertices[(i + 1) % vertices.length];
    n.x += (p.y - q.y) * (p.z + q.z);
    n.y += (p.z - q.z) * (p.x + q.x);
    n.z += (p.x - q.x) * (p.y + q.y);
  }
  return n;
}

/**
 * Express a planar face in its own 2D frame: origin at vertex 0, x along the
 * first non-zero edge, y = normal × x.
 */
function planeOutline(vertices: Point3D[], normal: Vector3): Point2D[] | null {
  const origin = toVector(vertices[0]);
  let u: Vector3 | null = null;
  for (let i = 1; i < vertices.length; i++) {
    const e = toVector(vertices[i]).sub(origin);
    if (e.length() > WELD_PRECISION) {
      u = e.normalize();
      break;
    }
  }
  if (!u) return null;

  const v = new Vector3().crossVectors(normal, u).normalize();
  return vertices.map((p) => {
    const d = toVector(p).sub(origin);
    return { x: d.dot(u), y: d.dot(v) };
  });
}

const averageOf = (points: Point3D[]): Vector3 => {
  const sum = new Vector3();
  points.forEach((p) => sum.add(toVector(p)));
  return sum.divideScalar(points.length);
};

/**
 * Mean of the welded vertices. The mesh is convex, so this lies inside it.
 */
function meshCentroid(meshFaces: MeshFace[]): Vector3 {
  const unique = new Map<string, Point3D>();
  for (const mf of meshFaces) {
    for (const p of mf.vertices) unique.set(vertexKey(p), p);
  }
  return unique.size > 0 ? averageOf([...unique.values()]) : new Vector3();
}

interface EdgeAccumulator {
  keys: [string, string];
  segment: [Point3D, Point3D];
  faces: number[];
}

// =============================================================================
// Graph
// =============================================================================

export class AdjacencyGraph {
  private readonly incident: number[][];
  private readonly pairIndex = new Map<string, number>();

  private constructor(
    readonly faces: readonly Face[],
    readonly edges: readonly AdjacencyEdge[]
  ) {
    this.incident = faces.map(() => []);
    for (const edge of edges) {
      this.incident[edge.faceA].push(edge.id);
      this.incident[edge.faceB].push(edge.id);
      this.pairIndex.set(pairKeyOf(edge.faceA, edge.faceB), edge.id);
    }
  }

  /**
   * Derive faces and shared-edge relations from a validated face list.
   *
   * @throws MalformedMeshError for degenerate faces, edges not bordered by
   *   exactly two faces, or face pairs sharing more than one edge
   */
  static fromFaces(meshFaces: MeshFace[]): AdjacencyGraph {
    if (meshFaces.length === 0) {
      throw new MalformedMeshError('Mesh has no faces');
    }

    const center = meshCentroid(meshFaces);
    const faces: Face[] = meshFaces.map((mf, id) => AdjacencyGraph.buildFace(mf, id, center));

    // Edge-keyed hashing: each undirected vertex-key pair collects its faces
    const accumulators = new Map<string, EdgeAccumulator>();
    for (const face of faces) {
      const n = face.vertices.length;
      for (let i = 0; i < n; i++) {
        const j = (i + 1) % n;
        const ka = face.vertexKeys[i];
        const kb = face.vertexKeys[j];
        if (ka === kb) continue; // repeated vertex, not a real edge

        const key = edgeKeyOf(ka, kb);
        const existing = accumulators.get(key);
        if (existing) {
          existing.faces.push(face.id);
        } else {
          accumulators.set(key, {
            keys: [ka, kb],
            segment: [face.vertices[i], face.vertices[j]],
            faces: [face.id],
          });
        }
      }
    }

    const edges: AdjacencyEdge[] = [];
    const seenPairs = new Set<string>();

    for (const [key, acc] of accumulators) {
      if (acc.faces.length !== 2 || acc.faces[0] === acc.faces[1]) {
        throw new MalformedMeshError(
          `Edge ${key} borders ${acc.faces.length} face(s); a watertight mesh needs exactly 2`,
          { edgeKey: key, incidentFaces: [...acc.faces], segment: acc.segment }
        );
      }

      const [faceA, faceB] = acc.faces[0] < acc.faces[1] ? [acc.faces[0], acc.faces[1]] : [acc.faces[1], acc.faces[0]];
      const pairKey = pairKeyOf(faceA, faceB);
      if (seenPairs.has(pairKey)) {
        throw new MalformedMeshError(
          `Faces ${faceA} and ${faceB} share more than one edge (collinear boundary vertices?)`,
          { faceA, faceB, edgeKey: key }
        );
      }
      seenPairs.add(pairKey);

      const cosFold = Math.max(-1, Math.min(1, toVector(faces[faceA].normal).dot(toVector(faces[faceB].normal))));
      const [p, q] = acc.segment;

      edges.push({
        id: edges.length,
        faceA,
        faceB,
        segment: acc.segment,
        vertexKeys: acc.keys,
        dihedralAngle: Math.PI - Math.acos(cosFold),
        length: toVector(q).sub(toVector(p)).length(),
      });
    }

    debug('adjacency', `Built graph: ${faces.length} faces, ${edges.length} edges`);
    return new AdjacencyGraph(faces, edges);
  }

  /**
   * Faces wound inward are rewound so the normal points outward and the
   * outline runs counter-clockwise seen from outside. The outward reference
   * is the supplied normal, or the direction from the mesh centroid.
   */
  private static buildFace(mf: MeshFace, id: number, center: Vector3): Face {
    if (mf.vertices.length < 3) {
      throw new MalformedMeshError(`Face ${id} has ${mf.vertices.length} vertices; need at least 3`, { faceId: id });
    }

    let vertices = mf.vertices.map((p) => ({ ...p }));
    const newell = newellNormal(vertices);
    const area = newell.length() / 2;
    if (!(area > MIN_FACE_AREA)) {
      throw new MalformedMeshError(`Face ${id} is degenerate (area ${area.toExponential(2)} mm²)`, { faceId: id, area });
    }

    const outward = mf.normal ? toVector(mf.normal) : averageOf(vertices).sub(center);
    const normal = newell.clone().normalize();
    if (outward.dot(normal) < 0) {
      debug('adjacency', `Face ${id} is wound inward; reversing it`);
      vertices = vertices.reverse();
      normal.negate();
    }

    const outline = planeOutline(vertices, normal);
    if (!outline) {
      throw new MalformedMeshError(`Face ${id} has no non-zero edge`, { faceId: id });
    }

    return {
      id,
      vertices,
      normal: { x: normal.x, y: normal.y, z: normal.z },
      outline,
      vertexKeys: vertices.map(vertexKey),
      area,
    };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get faceCount(): number {
    return this.faces.length;
  }

  getFace(id: number): Face {
    const face = this.faces[id];
    if (!face) throw new RangeError(`Unknown face id ${id}`);
    return face;
  }

  getEdge(id: number): AdjacencyEdge {
    const edge = this.edges[id];
    if (!edge) throw new RangeError(`Unknown edge id ${id}`);
    return edge;
  }

  incidentEdges(faceId: number): AdjacencyEdge[] {
    return this.incident[faceId].map((edgeId) => this.edges[edgeId]);
  }

  /**
   * Neighbouring face ids, ascending.
   */
  neighbors(faceId: number): number[] {
    return this.incidentEdges(faceId)
      .map((edge) => this.otherFace(edge, faceId))
      .sort((a, b) => a - b);
  }

  degree(faceId: number): number {
    return this.incident[faceId].length;
  }

  edgeBetween(a: number, b: number): AdjacencyEdge | undefined {
    const id = this.pairIndex.get(pairKeyOf(a, b));
    return id === undefined ? undefined : this.edges[id];
  }

  otherFace(edge: AdjacencyEdge, faceId: number): number {
    return edge.faceA === faceId ? edge.faceB : edge.faceA;
  }
}
