/**
 * Engine Types - Plain data passed between the unfolding stages
 *
 * Every value here is immutable once produced. Stages consume these and
 * return new values; nothing holds references back into another stage.
 * All lengths are millimetres.
 */

// =============================================================================
// Geometry Types
// =============================================================================

export interface Point2D {
  x: number;
  y: number;
}

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

export interface Bounds2D {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// =============================================================================
// Mesh Input
// =============================================================================

/**
 * One planar convex face as handed over by the mesh loader.
 * Vertices are ordered around the boundary. `normal`, when given, marks the
 * outward side; a face wound against it is reversed by the graph.
 */
export interface MeshFace {
  vertices: Point3D[];
  normal?: Point3D;
}

// =============================================================================
// Adjacency Graph
// =============================================================================

/**
 * A face of the polyhedron. `id` indexes the graph's face table.
 *
 * `outline` is the same polygon expressed in the face's own plane frame
 * (origin at vertex 0, x along the first non-zero edge, y = normal × x),
 * index-aligned with `vertices`.
 */
export interface Face {
  id: number;
  vertices: Point3D[];
  normal: Point3D;
  outline: Point2D[];
  /** Welded vertex keys, index-aligned with `vertices` */
  vertexKeys: string[];
  area: number;
}

/**
 * Two faces sharing exactly one mesh edge.
 */
export interface AdjacencyEdge {
  id: number;
  faceA: number;
  faceB: number;
  segment: [Point3D, Point3D];
  vertexKeys: [string, string];
  /** Interior angle between the faces in radians (π = coplanar) */
  dihedralAngle: number;
  length: number;
}

// =============================================================================
// Unfolding
// =============================================================================

/**
 * Rigid 2D map: x' = a·x + c·y + tx, y' = b·x + d·y + ty
 */
export interface RigidTransform2D {
  a: number;
  b: number;
  c: number;
  d: number;
  tx: number;
  ty: number;
  /** True when the map includes a reflection across the hinge line */
  mirrored: boolean;
}

export interface PlacedFace {
  faceId: number;
  points: Point2D[];
  /** Adjacency edge used to attach this face; null for a strip's seed */
  attachEdgeId: number | null;
  parentFaceId: number | null;
  mirrored: boolean;
}

export interface Strip {
  id: number;
  faces: PlacedFace[];
  /** Minimum perpendicular extent of the strip (ribbon width) */
  width: number;
}

// =============================================================================
// Layout
// =============================================================================

export interface LayoutFace {
  faceId: number;
  points: Point2D[];
}

/**
 * One strip copy placed on the sheet.
 */
export interface LayoutPiece {
  stripId: number;
  copyIndex: number;
  faces: LayoutFace[];
  /** Rings of the union of this piece's faces (outer rings and holes) */
  outline: Point2D[][];
  bounds: Bounds2D;
}

export interface Layout {
  pieces: LayoutPiece[];
  sheetWidth: number;
  sheetHeight: number;
  /** Width of a single copy of the strip arrangement, without margins */
  copyWidth: number;
  duplicates: number;
}
