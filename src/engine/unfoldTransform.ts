/**
 * Unfold Transform - Lay a face flat against an already placed neighbour
 *
 * Each face carries its outline in its own plane frame, so flattening across
 * a hinge is a rigid 2D map: rotate the new face's copy of the shared edge
 * onto the placed copy, then translate. This zeroes the fold angle at the
 * hinge.
 *
 * A rigid map fixing the hinge has two solutions, one on each side of the
 * hinge line. The new face goes on the side opposite its parent; if the
 * rotation alone lands it on the parent's side (the parent was placed
 * mirror-image) it is reflected across the hinge.
 */

import type { AdjacencyEdge, PlacedFace, Point2D, RigidTransform2D, Face } from './types';
import type { AdjacencyGraph } from './AdjacencyGraph';
import { DegenerateEdgeError } from './errors';
import { centroid } from '../utils/ribbonMetrics';
import { debug } from '../utils/debug';

/** Hinges shorter than this cannot orient a face (mm) */
export const MIN_HINGE_LENGTH = 1e-9;

export const IDENTITY_TRANSFORM: RigidTransform2D = { a: 1, b: 0, c: 0, d: 1, tx: 0, ty: 0, mirrored: false };

export function applyTransform(t: RigidTransform2D, p: Point2D): Point2D {
  return {
    x: t.a * p.x + t.c * p.y + t.tx,
    y: t.b * p.x + t.d * p.y + t.ty,
  };
}

const sideOf = (a: Point2D, b: Point2D, p: Point2D): number =>
  (b.x - a.x) * (p.y - a.y) - (b.y - a.y) * (p.x - a.x);

/**
 * Place the first face of a strip in its own plane frame.
 */
export function seedPlacement(face: Face): PlacedFace {
  return {
    faceId: face.id,
    points: face.outline.map((p) => ({ ...p })),
    attachEdgeId: null,
    parentFaceId: null,
    mirrored: false,
  };
}

interface HingeIndices {
  prev: [number, number];
  next: [number, number];
}

function hingeIndices(prevFace: Face, nextFace: Face, edge: AdjacencyEdge): HingeIndices {
  const [ka, kb] = edge.vertexKeys;
  const indices: HingeIndices = {
    prev: [prevFace.vertexKeys.indexOf(ka), prevFace.vertexKeys.indexOf(kb)],
    next: [nextFace.vertexKeys.indexOf(ka), nextFace.vertexKeys.indexOf(kb)],
  };
  if ([...indices.prev, ...indices.next].some((i) => i < 0)) {
    throw new Error(`Edge ${edge.id} endpoints are not vertices of faces ${prevFace.id} and ${nextFace.id}`);
  }
  return indices;
}

/**
 * Rigid transform taking the next face's plane outline into the strip plane,
 * hinged on `edge` against the placed `prev`.
 *
 * @throws DegenerateEdgeError if the hinge has zero length
 */
export function computeUnfoldTransform(
  graph: AdjacencyGraph,
  prev: PlacedFace,
  edge: AdjacencyEdge
): RigidTransform2D {
  if (edge.faceA !== prev.faceId && edge.faceB !== prev.faceId) {
    throw new Error(`Edge ${edge.id} does not touch face ${prev.faceId}`);
  }

  const prevFace = graph.getFace(prev.faceId);
  const nextFace = graph.getFace(graph.otherFace(edge, prev.faceId));
  const { prev: [ia, ib], next: [ja, jb] } = hingeIndices(prevFace, nextFace, edge);

  const A = prev.points[ia];
  const B = prev.points[ib];
  const a = nextFace.outline[ja];
  const b = nextFace.outline[jb];

  const placedLength = Math.hypot(B.x - A.x, B.y - A.y);
  const sourceLength = Math.hypot(b.x - a.x, b.y - a.y);
  if (placedLength < MIN_HINGE_LENGTH || sourceLength < MIN_HINGE_LENGTH) {
    throw new DegenerateEdgeError(
      `Hinge between faces ${prevFace.id} and ${nextFace.id} has zero length`,
      { edgeId: edge.id, fromFace: prevFace.id, toFace: nextFace.id, placedLength, sourceLength }
    );
  }

  const theta = Math.atan2(B.y - A.y, B.x - A.x) - Math.atan2(b.y - a.y, b.x - a.x);
  const cos = Math.cos(theta);
  const sin = Math.sin(theta);
  const rotation: RigidTransform2D = {
    a: cos,
    b: sin,
    c: -sin,
    d: cos,
    tx: A.x - (cos * a.x - sin * a.y),
    ty: A.y - (sin * a.x + cos * a.y),
    mirrored: false,
  };

  const prevSide = sideOf(A, B, centroid(prev.points));
  const nextSide = sideOf(A, B, applyTransform(rotation, centroid(nextFace.outline)));
  if (prevSide * nextSide <= 0) {
    return rotation;
  }

  // Reflect across the hinge line: p' = M(p - A) + A
  const phi = Math.atan2(B.y - A.y, B.x - A.x);
  const m00 = Math.cos(2 * phi);
  const m01 = Math.sin(2 * phi);
  const m10 = m01;
  const m11 = -m00;

  debug('unfold', `Face ${nextFace.id} reflected across edge ${edge.id}`);

  const sx = rotation.tx - A.x;
  const sy = rotation.ty - A.y;
  return {
    a: m00 * rotation.a + m01 * rotation.b,
    b: m10 * rotation.a + m11 * rotation.b,
    c: m00 * rotation.c + m01 * rotation.d,
    d: m10 * rotation.c + m11 * rotation.d,
    tx: m00 * sx + m01 * sy + A.x,
    ty: m10 * sx + m11 * sy + A.y,
    mirrored: true,
  };
}

/**
 * Unfold the face across `edge` from `prev`. The hinge endpoints of the
 * result are the exact coordinates of the placed hinge.
 */
export function unfoldFace(graph: AdjacencyGraph, prev: PlacedFace, edge: AdjacencyEdge): PlacedFace {
  const transform = computeUnfoldTransform(graph, prev, edge);
  const prevFace = graph.getFace(prev.faceId);
  const nextFace = graph.getFace(graph.otherFace(edge, prev.faceId));
  const { prev: [ia, ib], next: [ja, jb] } = hingeIndices(prevFace, nextFace, edge);

  const points = nextFace.outline.map((p) => applyTransform(transform, p));
  points[ja] = { ...prev.points[ia] };
  points[jb] = { ...prev.points[ib] };

  return {
    faceId: nextFace.id,
    points,
    attachEdgeId: edge.id,
    parentFaceId: prev.faceId,
    mirrored: transform.mirrored,
  };
}
