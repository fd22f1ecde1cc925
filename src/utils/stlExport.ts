/**
 * STL Export Utility
 *
 * Writes planar faces back out as STL, mainly for sample blanks and test
 * fixtures that feed the loader.
 */

import * as THREE from 'three';
import { STLExporter } from 'three/examples/jsm/exporters/STLExporter.js';
import type { MeshFace } from '../engine/types';

/**
 * Triangulate faces as fans around their first vertex.
 * Faces are convex, so every fan triangle keeps the face winding.
 */
function createFacesMesh(faces: MeshFace[]): THREE.Mesh {
  const positions: number[] = [];

  for (const face of faces) {
    const [first, ...rest] = face.vertices;
    for (let i = 0; i + 1 < rest.length; i++) {
      const b = rest[i];
      const c = rest[i + 1];
      positions.push(first.x, first.y, first.z, b.x, b.y, b.z, c.x, c.y, c.z);
    }
  }

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.Float32BufferAttribute(positions, 3));
  return new THREE.Mesh(geometry);
}

/**
 * Export faces to ASCII STL text
 */
export function generateSTL(faces: MeshFace[]): string {
  const mesh = createFacesMesh(faces);
  const result = new STLExporter().parse(mesh, { binary: false });
  mesh.geometry.dispose();
  if (typeof result !== 'string') {
    throw new TypeError('STL exporter returned binary data for an ASCII export');
  }
  return result;
}

/**
 * Export faces to binary STL
 */
export function generateBinarySTL(faces: MeshFace[]): DataView {
  const mesh = createFacesMesh(faces);
  const result = new STLExporter().parse(mesh, { binary: true });
  mesh.geometry.dispose();
  if (!(result instanceof DataView)) {
    throw new TypeError('STL exporter returned text for a binary export');
  }
  return result;
}
